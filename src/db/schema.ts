import { z } from "zod";
import type { CollectionDatabase } from "./database.js";
import type { FieldMap, NoteTypeId, ResolvedNoteType, SchemaSourceKind } from "../types.js";
import { NoteTypeNotFoundError } from "../errors.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";

/**
 * One place note-type definitions can live. Newer collections keep them in the
 * `notetypes` and `fields` tables; older ones keep a JSON object in `col.models`.
 */
export interface SchemaSource {
  readonly kind: SchemaSourceKind;
  isAvailable(): boolean;
  /** Every note-type id carrying this exact name, in storage order. */
  findNoteTypeIds(name: string): NoteTypeId[];
  resolveNoteTypeId(name: string): NoteTypeId | null;
  resolveFieldMap(noteTypeId: NoteTypeId): FieldMap;
}

export class TableSource implements SchemaSource {
  readonly kind = "table" as const;

  constructor(private readonly db: CollectionDatabase) {}

  isAvailable(): boolean {
    return this.db.hasTable("notetypes");
  }

  findNoteTypeIds(name: string): NoteTypeId[] {
    if (!this.isAvailable()) return [];
    const rows = this.db.connection.prepare(`SELECT id, name FROM notetypes`).all() as {
      id: number;
      name: string;
    }[];
    return rows.filter((row) => row.name === name).map((row) => row.id);
  }

  resolveNoteTypeId(name: string): NoteTypeId | null {
    return this.findNoteTypeIds(name)[0] ?? null;
  }

  resolveFieldMap(noteTypeId: NoteTypeId): FieldMap {
    if (!this.db.hasTable("fields")) return {};
    const rows = this.db.connection
      .prepare(`SELECT name, ord FROM fields WHERE ntid = ? ORDER BY ord ASC`)
      .all(noteTypeId) as { name: string; ord: number }[];

    const map: FieldMap = {};
    for (const row of rows) map[row.name] = row.ord;
    return map;
  }
}

const legacyModelsSchema = z.record(
  z.string(),
  z
    .object({
      name: z.string(),
      flds: z.array(z.object({ name: z.string() }).passthrough()).default([]),
    })
    .passthrough(),
);

type LegacyModels = z.infer<typeof legacyModelsSchema>;

export class BlobSource implements SchemaSource {
  readonly kind = "blob" as const;
  private cached: LegacyModels | null = null;

  constructor(private readonly db: CollectionDatabase) {}

  isAvailable(): boolean {
    return this.db.hasTable("col");
  }

  findNoteTypeIds(name: string): NoteTypeId[] {
    return Object.entries(this.models())
      .filter(([, model]) => model.name === name)
      .map(([id]) => Number(id))
      .filter((id) => Number.isInteger(id));
  }

  resolveNoteTypeId(name: string): NoteTypeId | null {
    return this.findNoteTypeIds(name)[0] ?? null;
  }

  /** Positions follow the order of the model's `flds` list. */
  resolveFieldMap(noteTypeId: NoteTypeId): FieldMap {
    const model = this.models()[String(noteTypeId)];
    const map: FieldMap = {};
    if (!model) return map;
    model.flds.forEach((field, index) => {
      map[field.name] = index;
    });
    return map;
  }

  private models(): LegacyModels {
    if (this.cached) return this.cached;
    this.cached = this.readModels();
    return this.cached;
  }

  private readModels(): LegacyModels {
    if (!this.isAvailable()) return {};

    const row = this.db.connection.prepare(`SELECT models FROM col LIMIT 1`).get() as
      | { models: string | Buffer | null }
      | undefined;
    if (!row || !row.models) return {};

    const raw = typeof row.models === "string" ? row.models : row.models.toString("utf-8");
    if (raw.trim() === "") return {};

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch {
      return {};
    }

    const parsed = legacyModelsSchema.safeParse(decoded);
    return parsed.success ? parsed.data : {};
  }
}

/** Sources in the order they are consulted. */
export function schemaSources(db: CollectionDatabase): SchemaSource[] {
  return [new TableSource(db), new BlobSource(db)];
}

export function resolveNoteTypeId(db: CollectionDatabase, name: string): NoteTypeId {
  for (const source of schemaSources(db)) {
    if (!source.isAvailable()) continue;
    const id = source.resolveNoteTypeId(name);
    if (id !== null) return id;
  }
  throw new NoteTypeNotFoundError(name);
}

export function resolveFieldMap(db: CollectionDatabase, noteTypeId: NoteTypeId): FieldMap {
  for (const source of schemaSources(db)) {
    if (!source.isAvailable()) continue;
    const map = source.resolveFieldMap(noteTypeId);
    if (Object.keys(map).length > 0) return map;
  }
  return {};
}

/**
 * Resolve a note type by name together with its field map, taking both from
 * the same source. Duplicate names resolve to the first match; the others are
 * reported through the logger.
 */
export function resolveNoteType(
  db: CollectionDatabase,
  name: string,
  logger: Logger = silentLogger,
): ResolvedNoteType {
  for (const source of schemaSources(db)) {
    if (!source.isAvailable()) continue;

    const ids = source.findNoteTypeIds(name);
    const id = ids[0];
    if (id === undefined) continue;

    if (ids.length > 1) {
      logger.warn(`Note type name '${name}' is ambiguous (ids ${ids.join(", ")}); using ${id}.`);
    }

    let fieldMap = source.resolveFieldMap(id);
    if (Object.keys(fieldMap).length === 0) fieldMap = resolveFieldMap(db, id);

    return { id, name, source: source.kind, fieldMap };
  }

  throw new NoteTypeNotFoundError(name);
}

export function fieldNames(fieldMap: FieldMap): string[] {
  return Object.entries(fieldMap)
    .sort(([, a], [, b]) => a - b)
    .map(([name]) => name);
}
