import axios from "axios";
import type { AxiosInstance } from "axios";
import { z } from "zod";
import { AnkiConnectError, RemoteUnreachableError } from "../errors.js";
import type { NoteId } from "../types.js";

const envelopeSchema = z
  .object({
    result: z.unknown(),
    error: z.string().nullable(),
  })
  .strict();

const noteIdsSchema = z.array(z.number().int());

const noteInfoSchema = z
  .object({
    noteId: z.number().int(),
    modelName: z.string(),
    fields: z.record(z.string(), z.object({ value: z.string(), order: z.number().int() })),
  })
  .passthrough();

export type AnkiConnectNote = z.infer<typeof noteInfoSchema>;

export interface AnkiConnectOptions {
  url: string;
  version: number;
  timeoutMs?: number;
  http?: AxiosInstance;
}

/**
 * Client for the AnkiConnect add-on: every call is a POST of
 * `{ action, version, params }` answered by `{ result, error }`.
 */
export class AnkiConnectClient {
  private http: AxiosInstance;

  constructor(private readonly options: AnkiConnectOptions) {
    this.http = options.http ?? axios.create({ timeout: options.timeoutMs });
  }

  async invoke<T>(action: string, params: Record<string, unknown>, schema: z.ZodType<T>): Promise<T> {
    let data: unknown;
    try {
      const response = await this.http.post(
        this.options.url,
        { action, version: this.options.version, params },
        { headers: { "Content-Type": "application/json" } },
      );
      data = response.data;
    } catch (err) {
      if (axios.isAxiosError(err) && !err.response) {
        throw new RemoteUnreachableError(this.options.url);
      }
      throw new AnkiConnectError(action, err instanceof Error ? err.message : String(err));
    }

    const envelope = envelopeSchema.safeParse(data);
    if (!envelope.success || !Object.hasOwn(envelope.data, "result")) {
      throw new AnkiConnectError(action, "response has an unexpected number of fields");
    }
    if (envelope.data.error !== null) {
      throw new AnkiConnectError(action, envelope.data.error);
    }

    const result = schema.safeParse(envelope.data.result);
    if (!result.success) {
      throw new AnkiConnectError(action, `unexpected result: ${result.error.issues[0]?.message ?? "invalid"}`);
    }
    return result.data;
  }

  findNotes(query: string): Promise<NoteId[]> {
    return this.invoke("findNotes", { query }, noteIdsSchema);
  }

  notesInfo(noteIds: readonly NoteId[]): Promise<AnkiConnectNote[]> {
    return this.invoke("notesInfo", { notes: noteIds }, z.array(noteInfoSchema));
  }

  async updateNoteFields(noteId: NoteId, fields: Record<string, string>): Promise<void> {
    await this.invoke("updateNoteFields", { note: { id: noteId, fields } }, z.null());
  }
}

/**
 * Search query for the notes of a note type. Anki matches it ignoring case, so
 * callers still compare `modelName` exactly; `*` and `_` are escaped so they
 * are not wildcards.
 */
export function noteTypeQuery(noteType: string): string {
  return `note:"${noteType.replace(/[\\"*_]/g, "\\$&")}"`;
}
