/**
 * In-process context stores for tests.
 */

import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type {
  ContextStore,
  MemoryRecord,
  MemoryRecordFilter,
  MemoryRecordMetadata,
  WriteReceipt,
} from '../../src/modules/context-store/context-store.js'
import { SqliteContextStore } from '../../src/modules/context-store/sqlite-context-store.js'
import { runMigrations } from '../../src/persistence/migrations/index.js'

export interface MemoryStore {
  store: SqliteContextStore
  db: BetterSqlite3Database
  close(): void
}

/** SqliteContextStore over a migrated in-memory database */
export function createMemoryStore(): MemoryStore {
  const db = new BetterSqlite3(':memory:')
  runMigrations(db)
  return { store: new SqliteContextStore(db), db, close: () => db.close() }
}

/**
 * Hides each written record from the next `hiddenQueries` queries that would
 * return it. `hiddenQueries: Infinity` never makes writes visible.
 */
export class LaggyContextStore implements ContextStore {
  readonly writes: WriteReceipt[] = []
  queryCount = 0
  private readonly _hidden = new Map<string, number>()

  constructor(
    private readonly _inner: ContextStore,
    private readonly _hiddenQueries: number
  ) {}

  async write(ownerScope: string, content: string, metadata: MemoryRecordMetadata): Promise<WriteReceipt> {
    const receipt = await this._inner.write(ownerScope, content, metadata)
    this.writes.push(receipt)
    this._hidden.set(receipt.id, this._hiddenQueries)
    return receipt
  }

  async query(filter: MemoryRecordFilter): Promise<MemoryRecord[]> {
    this.queryCount++
    const records = await this._inner.query(filter)
    return records.filter((record) => {
      const remaining = this._hidden.get(record.id) ?? 0
      if (remaining <= 0) return true
      this._hidden.set(record.id, remaining - 1)
      return false
    })
  }
}

/**
 * Fails the first `failures` calls of the chosen operation with a plain Error.
 */
export class FlakyContextStore implements ContextStore {
  writeCalls = 0
  queryCalls = 0

  constructor(
    private readonly _inner: ContextStore,
    private readonly _failures: { write?: number; query?: number }
  ) {}

  async write(ownerScope: string, content: string, metadata: MemoryRecordMetadata): Promise<WriteReceipt> {
    this.writeCalls++
    if (this.writeCalls <= (this._failures.write ?? 0)) {
      throw new Error('database is locked')
    }
    return this._inner.write(ownerScope, content, metadata)
  }

  async query(filter: MemoryRecordFilter): Promise<MemoryRecord[]> {
    this.queryCalls++
    if (this.queryCalls <= (this._failures.query ?? 0)) {
      throw new Error('database is locked')
    }
    return this._inner.query(filter)
  }
}
