import type { Database as DatabaseType } from "better-sqlite3";
import type { FieldUpdate, NoteTypeId, StoredNote } from "../../types.js";

export class NoteRepository {
  constructor(private db: DatabaseType) {}

  listByNoteType(noteTypeId: NoteTypeId): StoredNote[] {
    return this.db
      .prepare(`SELECT id, mid, flds, mod FROM notes WHERE mid = ? ORDER BY id ASC`)
      .all(noteTypeId) as StoredNote[];
  }

  /**
   * Write new field strings in a single transaction. Only flds and mod change;
   * an empty list touches nothing. Returns the number of rows updated.
   */
  applyUpdates(updates: readonly FieldUpdate[]): number {
    if (updates.length === 0) return 0;

    const statement = this.db.prepare(`UPDATE notes SET flds = ?, mod = ? WHERE id = ?`);
    const applyAll = this.db.transaction((batch: readonly FieldUpdate[]) => {
      let changed = 0;
      for (const update of batch) {
        changed += statement.run(update.flds, update.mod, update.id).changes;
      }
      return changed;
    });

    return applyAll(updates);
  }
}
