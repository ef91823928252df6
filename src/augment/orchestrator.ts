import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import { GenerationTimeoutError } from "../errors.js";
import type {
  FieldMap,
  GenerationFailure,
  GenerationResult,
  GenerationTask,
  NoteId,
  NoteRecord,
} from "../types.js";
import { FIELD_SEPARATOR } from "../types.js";
import type { ContentGenerator } from "./generator.js";
import { markdownToHtml } from "./markup.js";
import { runPool, withTimeout } from "./pool.js";
import { buildRequest, excerpt, extractPlaceholders } from "./prompt.js";
import { fieldValue } from "./selector.js";

export interface PlanOptions {
  /** Leave out records whose every prompt source field is blank. */
  skipEmptySources?: boolean;
}

export interface TaskPlan<T extends NoteRecord> {
  tasks: GenerationTask[];
  skipped: T[];
}

/**
 * Fill the prompt for every pending record. Source values are copied out
 * here, so generation never reads the database.
 */
export function planTasks<T extends NoteRecord>(
  pending: readonly T[],
  template: string,
  fieldMap: FieldMap,
  options: PlanOptions = {},
): TaskPlan<T> {
  const sources = extractPlaceholders(template);
  const tasks: GenerationTask[] = [];
  const skipped: T[] = [];

  for (const record of pending) {
    const values = sources.map((field) => fieldValue(record, fieldMap, field));
    if (options.skipEmptySources && sources.length > 0 && values.every((v) => v.trim() === "")) {
      skipped.push(record);
      continue;
    }

    const prompt = buildRequest(template, record, fieldMap);
    tasks.push({
      noteId: record.id,
      prompt,
      excerpt: excerpt(values.find((v) => v.trim() !== "") ?? prompt, 40),
    });
  }

  return { tasks, skipped };
}

/**
 * One generation call: service text converted to HTML, or a failure reason.
 * Never throws.
 */
export async function generate(
  generator: ContentGenerator,
  task: GenerationTask,
  timeoutMs: number,
): Promise<GenerationResult> {
  let text: string;
  try {
    text = await withTimeout(
      generator.generate(task.prompt),
      timeoutMs,
      () => new GenerationTimeoutError(timeoutMs),
    );
  } catch (err) {
    return { ok: false, noteId: task.noteId, reason: err instanceof Error ? err.message : String(err) };
  }

  const html = markdownToHtml(text);
  if (html === "") {
    return { ok: false, noteId: task.noteId, reason: "Empty response" };
  }
  if (html.includes(FIELD_SEPARATOR)) {
    return { ok: false, noteId: task.noteId, reason: "Response contains the field separator character" };
  }
  return { ok: true, noteId: task.noteId, html };
}

export interface GenerateAllOptions {
  concurrency: number;
  timeoutMs: number;
  logger?: Logger;
  onProgress?: (completed: number, total: number) => void;
}

export interface GenerationOutcome {
  results: Map<NoteId, string>;
  failures: GenerationFailure[];
}

/**
 * Dispatch every task through a bounded pool. Results are keyed by note id in
 * completion order; failed notes are logged and left out.
 */
export async function generateAll(
  tasks: readonly GenerationTask[],
  generator: ContentGenerator,
  options: GenerateAllOptions,
): Promise<GenerationOutcome> {
  const logger = options.logger ?? silentLogger;
  const results = new Map<NoteId, string>();
  const failures: GenerationFailure[] = [];

  await runPool(
    tasks,
    async (task) => {
      const result = await generate(generator, task, options.timeoutMs);
      if (result.ok) {
        results.set(result.noteId, result.html);
      } else {
        failures.push({ noteId: task.noteId, excerpt: task.excerpt, reason: result.reason });
        logger.warn(`Generation failed for note ${task.noteId} ('${task.excerpt}...'): ${result.reason}`);
      }
    },
    { concurrency: options.concurrency, onProgress: options.onProgress },
  );

  return { results, failures };
}
