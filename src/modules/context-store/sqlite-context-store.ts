/**
 * ContextStore backed by the memory_records table in SQLite.
 *
 * better-sqlite3 is synchronous, so writes are visible to the next query;
 * callers still go through the visibility helpers so other backends can lag.
 */

import { ZodError } from 'zod'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { ContextStoreError, errorMessage } from '../../core/errors.js'
import { insertMemoryRecord, queryMemoryRecords } from '../../persistence/queries/memory-records.js'
import { assertQueryFilter } from './context-store.js'
import type {
  ContextStore,
  MemoryRecord,
  MemoryRecordFilter,
  MemoryRecordMetadata,
  WriteReceipt,
} from './context-store.js'

export class SqliteContextStore implements ContextStore {
  private readonly _db: () => BetterSqlite3Database

  /**
   * @param db - The database, or a getter resolved on each call so the store
   *   can be built before the database service is initialized
   */
  constructor(db: BetterSqlite3Database | (() => BetterSqlite3Database)) {
    this._db = typeof db === 'function' ? db : () => db
  }

  async write(ownerScope: string, content: string, metadata: MemoryRecordMetadata): Promise<WriteReceipt> {
    try {
      const record = insertMemoryRecord(this._db(), { owner_scope: ownerScope, content, metadata })
      return {
        id: record.id,
        session_id: record.metadata.session_id,
        type: record.metadata.type,
        written_at: record.created_at,
      }
    } catch (err) {
      if (err instanceof ZodError) throw err
      throw new ContextStoreError(`Context store write failed: ${errorMessage(err)}`, {
        type: metadata.type,
        sessionId: metadata.session_id,
      })
    }
  }

  async query(filter: MemoryRecordFilter): Promise<MemoryRecord[]> {
    assertQueryFilter(filter)
    try {
      return queryMemoryRecords(this._db(), filter)
    } catch (err) {
      if (err instanceof ZodError) throw err
      throw new ContextStoreError(`Context store query failed: ${errorMessage(err)}`, { filter })
    }
  }
}
