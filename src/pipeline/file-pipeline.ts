import { generateAll, planTasks } from "../augment/orchestrator.js";
import { joinFields, padFields, selectPending, splitFields } from "../augment/selector.js";
import { CollectionDatabase, NoteRepository, resolveNoteType } from "../db/index.js";
import { PackageContainer } from "../package/container.js";
import type { AugmentReport, FieldMap, FieldUpdate, NoteId, NoteRecord } from "../types.js";
import type { AugmentJob, PipelineDeps } from "./job.js";
import { buildPreview, checkJob, emptyReport, progressLogger } from "./job.js";

export interface FileJob extends AugmentJob {
  input: string;
  output: string;
}

/**
 * Augment a package file: open, resolve, select, generate, write back, repack.
 * Nothing is written to `output` on a dry run or when a fatal error occurs.
 * The scratch directory is removed either way.
 */
export async function augmentPackage(job: FileJob, deps: PipelineDeps): Promise<AugmentReport> {
  const { config, logger } = deps;
  const report = emptyReport("file", job);
  const container = new PackageContainer(config.workDir, logger);

  try {
    return await runInContainer(job, deps, container, report);
  } finally {
    container.dispose();
  }
}

async function runInContainer(
  job: FileJob,
  deps: PipelineDeps,
  container: PackageContainer,
  report: AugmentReport,
): Promise<AugmentReport> {
  const { config, logger } = deps;
  const db = new CollectionDatabase();
  const workingPath = await container.open(job.input);
  let updates: FieldUpdate[] = [];

  db.open(workingPath);
  try {
    const noteType = resolveNoteType(db, job.noteType, logger);
    report.noteTypeId = noteType.id;
    logger.info(`Resolved note type '${job.noteType}' to ID ${noteType.id} (${noteType.source} schema)`);

    const { targetIndex, sourceFields } = checkJob(job, noteType.fieldMap);
    logger.info(`Target field: ${job.targetField} (index ${targetIndex})`);
    logger.info(`Required source fields: ${sourceFields.length > 0 ? sourceFields.join(", ") : "(none)"}`);

    const notes = new NoteRepository(db.connection);
    const records: NoteRecord[] = notes
      .listByNoteType(noteType.id)
      .map((note) => ({ id: note.id, values: splitFields(note.flds) }));
    report.totalNotes = records.length;
    logger.info(`Found ${records.length} total notes.`);

    const { pending, alreadyDone } = selectPending(records, noteType.fieldMap, job.targetField, job.noteType);
    report.pending = pending.length;
    report.alreadyDone = alreadyDone.length;
    logger.info(`Found ${pending.length} notes that require augmentation.`);

    if (job.dryRun) {
      report.preview = buildPreview(pending, noteType.fieldMap, job, sourceFields);
      return report;
    }

    const { tasks, skipped } = planTasks(pending, job.promptTemplate, noteType.fieldMap, {
      skipEmptySources: job.skipEmptySources,
    });
    report.skipped = skipped.length;

    if (tasks.length > 0) {
      const generator = deps.createGenerator();
      logger.info(`Starting parallel processing with ${config.concurrency} workers...`);
      const { results, failures } = await generateAll(tasks, generator, {
        concurrency: config.concurrency,
        timeoutMs: config.timeoutMs,
        logger,
        onProgress: progressLogger(logger, "Augmenting notes"),
      });
      report.generated = results.size;
      report.failed = failures;
      updates = buildUpdates(pending, results, noteType.fieldMap, targetIndex);
    }

    if (updates.length > 0) {
      logger.info(`Updating ${updates.length} notes in database...`);
      report.updated = notes.applyUpdates(updates);
    } else {
      logger.info("No updates needed.");
    }
  } finally {
    db.close();
  }

  logger.info("Preparing output files...");
  await container.close(job.output);
  report.outputPath = job.output;
  logger.info(`Done! Created ${job.output}`);
  return report;
}

/** New field strings for every generated note; other fields stay as stored. */
export function buildUpdates(
  pending: readonly NoteRecord[],
  results: ReadonlyMap<NoteId, string>,
  fieldMap: FieldMap,
  targetIndex: number,
  now: () => number = () => Math.floor(Date.now() / 1000),
): FieldUpdate[] {
  const updates: FieldUpdate[] = [];
  for (const record of pending) {
    const html = results.get(record.id);
    if (html === undefined) continue;
    const values = padFields(record.values, fieldMap);
    values[targetIndex] = html;
    updates.push({ id: record.id, flds: joinFields(values), mod: now() });
  }
  return updates;
}
