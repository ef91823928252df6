import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import type { ContentGenerator } from "../augment/generator.js";
import { assertSourceFields, excerpt } from "../augment/prompt.js";
import { fieldIndex, fieldValue } from "../augment/selector.js";
import type { AugmentConfig } from "../config.js";
import { fieldNames } from "../db/schema.js";
import { FieldNotFoundError, FileReadError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { AugmentReport, FieldMap, NoteRecord, PreviewEntry } from "../types.js";

/** What to augment; the same for file and live mode. */
export interface AugmentJob {
  noteType: string;
  targetField: string;
  promptTemplate: string;
  dryRun?: boolean;
  skipEmptySources?: boolean;
}

export interface PipelineDeps {
  config: AugmentConfig;
  logger: Logger;
  /** Called only once there is something to generate. */
  createGenerator: () => ContentGenerator;
}

export interface CheckedJob {
  targetIndex: number;
  sourceFields: string[];
}

/**
 * Fail fast before any remote call: the target field and every prompt
 * placeholder must exist in the note type.
 */
export function checkJob(job: AugmentJob, fieldMap: FieldMap): CheckedJob {
  const targetIndex = fieldIndex(fieldMap, job.targetField);
  if (targetIndex === undefined) {
    throw new FieldNotFoundError(job.targetField, job.noteType, fieldNames(fieldMap));
  }
  const sourceFields = assertSourceFields(job.promptTemplate, fieldMap);
  return { targetIndex, sourceFields };
}

/** Preview shows the first prompt source field, or the target when the prompt has none. */
export function buildPreview(
  records: readonly NoteRecord[],
  fieldMap: FieldMap,
  job: AugmentJob,
  sourceFields: readonly string[],
): PreviewEntry[] {
  const field = sourceFields[0] ?? job.targetField;
  return records.map((record) => {
    const index = fieldIndex(fieldMap, field) ?? 0;
    const text = index < record.values.length ? fieldValue(record, fieldMap, field) : "[Empty]";
    return { noteId: record.id, field, text: excerpt(text) };
  });
}

export function formatPreviewLine(entry: PreviewEntry): string {
  return `ID: ${entry.noteId} | ${entry.field}: ${entry.text}...`;
}

export function emptyReport(mode: AugmentReport["mode"], job: AugmentJob): AugmentReport {
  return {
    mode,
    dryRun: job.dryRun ?? false,
    noteType: job.noteType,
    noteTypeId: null,
    totalNotes: 0,
    pending: 0,
    alreadyDone: 0,
    skipped: 0,
    generated: 0,
    failed: [],
    updated: 0,
    preview: [],
    outputPath: null,
  };
}

export async function readPromptFile(filePath: string): Promise<string> {
  const absolutePath = resolve(filePath);
  let content: string;

  try {
    content = await readFile(absolutePath, "utf-8");
  } catch (err: unknown) {
    const error = err as NodeJS.ErrnoException;
    let cause = "Unknown error";

    if (error.code === "ENOENT") {
      cause = "File not found";
    } else if (error.code === "EACCES") {
      cause = "Permission denied";
    } else if (error.code === "EISDIR") {
      cause = "Path is a directory, not a file";
    } else if (error.message) {
      cause = error.message;
    }

    throw new FileReadError(filePath, cause);
  }

  if (content.trim().length === 0) {
    throw new FileReadError(filePath, "File is empty");
  }
  return content;
}

export function progressLogger(logger: Logger, label: string): (completed: number, total: number) => void {
  const step = (total: number) => Math.max(1, Math.ceil(total / 10));
  return (completed, total) => {
    if (completed === total || completed % step(total) === 0) {
      logger.info(`${label}: ${completed}/${total}`);
    }
  };
}
