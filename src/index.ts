#!/usr/bin/env node

import { Command } from "commander";
import { createGeminiGenerator } from "./augment/generator.js";
import { loadConfig } from "./config.js";
import type { AugmentConfig } from "./config.js";
import { DeckAugmentError } from "./errors.js";
import { consoleLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { augmentPackage } from "./pipeline/file-pipeline.js";
import { formatPreviewLine, readPromptFile } from "./pipeline/job.js";
import type { AugmentJob } from "./pipeline/job.js";
import { augmentLive } from "./pipeline/live-pipeline.js";
import { AnkiConnectClient } from "./remote/anki-connect.js";
import type { AugmentReport } from "./types.js";

const VERSION = "0.1.0";

const ExitCodes = {
  SUCCESS: 0,
  FAILURE: 1,
  USAGE_ERROR: 2,
} as const;

interface CliOptions {
  input?: string;
  output?: string;
  ankiConnect?: boolean;
  noteType: string;
  targetField: string;
  promptFile: string;
  dryRun?: boolean;
  concurrency?: string;
  model?: string;
  timeout?: string;
  skipEmptySources?: boolean;
  workDir?: string;
  ankiConnectUrl?: string;
}

function printReport(report: AugmentReport): void {
  if (report.dryRun) {
    const target = report.mode === "live" ? " via AnkiConnect" : "";
    console.log(`--- Dry Run: Notes to be updated${target} ---`);
    for (const entry of report.preview) console.log(formatPreviewLine(entry));
    console.log("\nDry run complete. No changes made.");
    return;
  }

  console.log(
    `Notes: ${report.totalNotes} total, ${report.pending} pending, ${report.alreadyDone} already filled` +
      (report.skipped > 0 ? `, ${report.skipped} skipped (empty source)` : ""),
  );
  console.log(`Generated: ${report.generated}, failed: ${report.failed.length}, updated: ${report.updated}`);
  if (report.outputPath) console.log(`Output: ${report.outputPath}`);
}

async function run(options: CliOptions, logger: Logger): Promise<AugmentReport> {
  const config: AugmentConfig = loadConfig({
    concurrency: options.concurrency,
    model: options.model,
    timeoutMs: options.timeout,
    workDir: options.workDir,
    ankiConnectUrl: options.ankiConnectUrl,
  });

  const job: AugmentJob = {
    noteType: options.noteType,
    targetField: options.targetField,
    promptTemplate: await readPromptFile(options.promptFile),
    dryRun: options.dryRun ?? false,
    skipEmptySources: options.skipEmptySources ?? false,
  };
  const createGenerator = () => createGeminiGenerator(config);

  if (options.ankiConnect) {
    const client = new AnkiConnectClient({
      url: config.ankiConnectUrl,
      version: config.ankiConnectVersion,
      timeoutMs: config.timeoutMs,
    });
    return augmentLive(job, { client, config, logger, createGenerator });
  }

  if (!options.input || !options.output) {
    console.error("Error: --input and --output are required when not using --anki-connect.");
    process.exit(ExitCodes.USAGE_ERROR);
  }

  return augmentPackage(
    { ...job, input: options.input, output: options.output },
    { config, logger, createGenerator },
  );
}

const program = new Command();

program
  .name("deck-augment")
  .description("Fill empty flashcard fields with generated content")
  .version(VERSION, "-V, --version", "output the version number")
  .option("--input <path>", "input .apkg file path")
  .option("--output <path>", "output .apkg file path")
  .option("--anki-connect", "update a running Anki instance through AnkiConnect")
  .requiredOption("--note-type <name>", "note type (model) name")
  .requiredOption("--target-field <name>", "field to fill (e.g. 'Notes', 'Mnemonic')")
  .requiredOption("--prompt-file <path>", "prompt template file; use {FieldName} for placeholders")
  .option("--dry-run", "list the notes that would be augmented without generating anything")
  .option("--concurrency <n>", "maximum generation requests in flight")
  .option("--model <name>", "generation model name")
  .option("--timeout <ms>", "timeout for a single generation request")
  .option("--skip-empty-sources", "skip notes whose prompt source fields are all empty")
  .option("--work-dir <path>", "directory under which a scratch directory is created for unpacking")
  .option("--anki-connect-url <url>", "AnkiConnect endpoint")
  .action(async (options: CliOptions) => {
    const report = await run(options, consoleLogger);
    printReport(report);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof DeckAugmentError) {
    console.error(`Error: ${err.message}`);
  } else if (process.env["DEBUG"]) {
    console.error("Fatal error:", err);
  } else {
    console.error(`Fatal error: ${err instanceof Error ? err.message : String(err)}`);
  }
  process.exit(ExitCodes.FAILURE);
});
