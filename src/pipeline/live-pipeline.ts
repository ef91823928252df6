import { generateAll, planTasks } from "../augment/orchestrator.js";
import { selectPending } from "../augment/selector.js";
import type { AnkiConnectClient, AnkiConnectNote } from "../remote/anki-connect.js";
import { noteTypeQuery } from "../remote/anki-connect.js";
import type { AugmentReport, FieldMap, NoteId, NoteRecord } from "../types.js";
import type { AugmentJob, PipelineDeps } from "./job.js";
import { buildPreview, checkJob, emptyReport, progressLogger } from "./job.js";

export interface LiveDeps extends PipelineDeps {
  client: AnkiConnectClient;
}

/** Field map of a live note, from each field's `order`. */
export function liveFieldMap(note: AnkiConnectNote): FieldMap {
  const map: FieldMap = {};
  for (const [name, field] of Object.entries(note.fields)) map[name] = field.order;
  return map;
}

export function liveRecord(note: AnkiConnectNote, fieldMap: FieldMap): NoteRecord {
  const width = Math.max(-1, ...Object.values(fieldMap)) + 1;
  const values = new Array<string>(width).fill("");
  for (const [name, field] of Object.entries(note.fields)) {
    const index = fieldMap[name];
    if (index !== undefined && index >= 0 && index < width) values[index] = field.value;
  }
  return { id: note.noteId, values };
}

/**
 * Augment the notes of a running Anki instance through AnkiConnect. Selection
 * and generation are the same as in file mode; write-back is one
 * updateNoteFields call per note, in sequence.
 */
export async function augmentLive(job: AugmentJob, deps: LiveDeps): Promise<AugmentReport> {
  const { client, config, logger } = deps;
  const report = emptyReport("live", job);

  logger.info(`Querying Anki for note type '${job.noteType}'...`);
  const noteIds = await client.findNotes(noteTypeQuery(job.noteType));
  if (noteIds.length === 0) {
    logger.info("No notes found for this query.");
    return report;
  }
  logger.info(`Found ${noteIds.length} notes. Fetching details...`);

  const infos: AnkiConnectNote[] = [];
  for (let i = 0; i < noteIds.length; i += config.notesInfoBatchSize) {
    infos.push(...(await client.notesInfo(noteIds.slice(i, i + config.notesInfoBatchSize))));
  }
  const matching = infos.filter((info) => info.modelName === job.noteType);
  if (matching.length < infos.length) {
    logger.warn(
      `Ignoring ${infos.length - matching.length} notes whose note type is not exactly '${job.noteType}'.`,
    );
  }

  const first = matching[0];
  if (!first) {
    logger.info("No notes found for this query.");
    return report;
  }
  const fieldMap = liveFieldMap(first);
  const { sourceFields } = checkJob(job, fieldMap);
  logger.info(`Verified fields: target '${job.targetField}', sources ${JSON.stringify(sourceFields)}`);

  const records = matching.map((info) => liveRecord(info, fieldMap));
  report.totalNotes = records.length;

  const { pending, alreadyDone } = selectPending(records, fieldMap, job.targetField, job.noteType);
  report.pending = pending.length;
  report.alreadyDone = alreadyDone.length;
  logger.info(`Found ${pending.length} notes that require augmentation.`);

  if (job.dryRun) {
    report.preview = buildPreview(pending, fieldMap, job, sourceFields);
    return report;
  }

  const { tasks, skipped } = planTasks(pending, job.promptTemplate, fieldMap, {
    skipEmptySources: job.skipEmptySources,
  });
  report.skipped = skipped.length;

  if (tasks.length === 0) {
    logger.info("No updates needed.");
    return report;
  }

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

  if (results.size === 0) {
    logger.info("No notes generated.");
    return report;
  }

  logger.info(`Updating ${results.size} notes via AnkiConnect...`);
  report.updated = await applyLiveUpdates(client, job.targetField, results, progressLogger(logger, "Sending updates"));
  logger.info("Done!");
  return report;
}

/**
 * One remote call per note, in sequence. A failing call stops the loop;
 * notes already updated stay updated.
 */
export async function applyLiveUpdates(
  client: AnkiConnectClient,
  targetField: string,
  updates: ReadonlyMap<NoteId, string>,
  onProgress?: (completed: number, total: number) => void,
): Promise<number> {
  let applied = 0;
  for (const [noteId, html] of updates) {
    await client.updateNoteFields(noteId, { [targetField]: html });
    applied += 1;
    onProgress?.(applied, updates.size);
  }
  return applied;
}
