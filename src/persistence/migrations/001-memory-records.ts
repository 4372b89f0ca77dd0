/**
 * Migration 001: context store schema.
 *
 * One append-only table of memory records. `seq` gives a stable insertion
 * order; `type` and `session_id` are copied out of the metadata for filtering.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const migration001MemoryRecords: Migration = {
  version: 1,
  name: '001-memory-records',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS memory_records (
        seq           INTEGER PRIMARY KEY AUTOINCREMENT,
        id            TEXT    NOT NULL UNIQUE,
        owner_scope   TEXT    NOT NULL,
        type          TEXT    NOT NULL,
        session_id    TEXT,
        content       TEXT    NOT NULL,
        metadata_json TEXT    NOT NULL,
        created_at    TEXT    NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_memory_records_session ON memory_records(session_id, type);
      CREATE INDEX IF NOT EXISTS idx_memory_records_type ON memory_records(type);

      CREATE TRIGGER IF NOT EXISTS trg_memory_records_no_update
      BEFORE UPDATE ON memory_records
      BEGIN
        SELECT RAISE(ABORT, 'memory_records is append-only');
      END;
    `)
  },
}
