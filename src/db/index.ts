export { CollectionDatabase } from "./database.js";
export { NoteRepository } from "./repositories/note-repository.js";
export {
  TableSource,
  BlobSource,
  schemaSources,
  resolveNoteTypeId,
  resolveFieldMap,
  resolveNoteType,
  fieldNames,
} from "./schema.js";
export type { SchemaSource } from "./schema.js";
