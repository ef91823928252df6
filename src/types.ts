// ---- Identifiers ----

export type NoteId = number; // notes.id (epoch millis at creation)
export type NoteTypeId = number; // notetypes.id / notes.mid

// ---- Package layout ----

export const LEGACY_DB_FILE = "collection.anki2";
export const MODERN_DB_FILE = "collection.anki21b";
export const WORKING_DB_FILE = "collection_working.db";

/** Files the codec writes for itself and never puts back into a package. */
export const SCRATCH_FILES: readonly string[] = [
  WORKING_DB_FILE,
  `${WORKING_DB_FILE}-journal`,
  `${WORKING_DB_FILE}-wal`,
  `${WORKING_DB_FILE}-shm`,
  "collection_legacy.anki2",
  "collection_new.anki2",
];

export type PayloadKind = "modern" | "legacy";

// ---- Schema ----

/** Field name -> position inside a note's field string. */
export type FieldMap = Record<string, number>;

export type SchemaSourceKind = "table" | "blob";

export interface ResolvedNoteType {
  id: NoteTypeId;
  name: string;
  source: SchemaSourceKind;
  fieldMap: FieldMap;
}

// ---- Notes ----

/** Separator between field values in notes.flds. Assumed never to occur in content. */
export const FIELD_SEPARATOR = "\x1f";

export interface StoredNote {
  id: NoteId;
  mid: NoteTypeId;
  flds: string;
  mod: number;
}

/** A note reduced to what selection and prompting need, in either mode. */
export interface NoteRecord {
  id: NoteId;
  values: string[];
}

export interface FieldUpdate {
  id: NoteId;
  flds: string;
  mod: number;
}

// ---- Generation ----

export interface GenerationTask {
  noteId: NoteId;
  prompt: string;
  /** Short excerpt of the source text, for logs. */
  excerpt: string;
}

export type GenerationResult =
  | { ok: true; noteId: NoteId; html: string }
  | { ok: false; noteId: NoteId; reason: string };

export interface GenerationFailure {
  noteId: NoteId;
  excerpt: string;
  reason: string;
}

// ---- Reporting ----

export interface PreviewEntry {
  noteId: NoteId;
  field: string;
  text: string;
}

export interface AugmentReport {
  mode: "file" | "live";
  dryRun: boolean;
  noteType: string;
  noteTypeId: NoteTypeId | null;
  totalNotes: number;
  pending: number;
  alreadyDone: number;
  skipped: number;
  generated: number;
  failed: GenerationFailure[];
  updated: number;
  preview: PreviewEntry[];
  outputPath: string | null;
}
