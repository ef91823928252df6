import Database from "better-sqlite3";
import type { Database as DatabaseType } from "better-sqlite3";

/**
 * Handle on the working collection database materialized by the package
 * container (or any collection file opened directly).
 *
 * No pragmas are changed on open: switching the journal mode would rewrite the
 * file header and leave -wal/-shm files next to it, and the database is copied
 * back into the package byte for byte.
 */
export class CollectionDatabase {
  private db: DatabaseType | null = null;

  get connection(): DatabaseType {
    if (!this.db) {
      throw new Error("Collection database not opened. Call open() first.");
    }
    return this.db;
  }

  open(path: string, options: { readonly?: boolean } = {}): void {
    this.db = new Database(path, { readonly: options.readonly ?? false, fileMustExist: path !== ":memory:" });
  }

  hasTable(name: string): boolean {
    const row = this.connection
      .prepare(`SELECT name FROM sqlite_master WHERE type='table' AND name = ?`)
      .get(name) as { name: string } | undefined;
    return row !== undefined;
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }
}
