/**
 * DatabaseWrapper: thin wrapper around better-sqlite3.
 *
 * - Opens the database with WAL journaling and a busy timeout
 * - Exposes the raw BetterSqlite3.Database instance to query modules
 * - Implements the BaseService lifecycle (initialize runs migrations)
 */

import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { BaseService } from '../core/di.js'
import { runMigrations } from './migrations/index.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('persistence:database')

/** Path that opens a private in-memory database */
export const IN_MEMORY_DATABASE = ':memory:'

export class DatabaseWrapper {
  private _db: BetterSqlite3Database | null = null
  private readonly _path: string

  constructor(databasePath: string) {
    this._path = databasePath
  }

  /**
   * Open the database and apply PRAGMAs. No-op when already open.
   */
  open(): void {
    if (this._db !== null) {
      return
    }

    if (this._path !== IN_MEMORY_DATABASE) {
      mkdirSync(dirname(this._path), { recursive: true })
    }

    logger.debug({ path: this._path }, 'Opening SQLite database')
    const db = new BetterSqlite3(this._path)

    const journalMode: unknown = db.pragma('journal_mode = WAL', { simple: true })
    if (journalMode !== 'wal') {
      // In-memory databases report "memory"
      logger.debug({ journalMode }, 'WAL journal mode not available')
    }
    db.pragma('busy_timeout = 5000')
    db.pragma('synchronous = NORMAL')

    this._db = db
  }

  /** Close the database. No-op when already closed. */
  close(): void {
    if (this._db === null) {
      return
    }
    this._db.close()
    this._db = null
    logger.debug({ path: this._path }, 'SQLite database closed')
  }

  /**
   * @throws {Error} if the database has not been opened yet.
   */
  get db(): BetterSqlite3Database {
    if (this._db === null) {
      throw new Error('DatabaseWrapper: database is not open. Call open() first.')
    }
    return this._db
  }

  get isOpen(): boolean {
    return this._db !== null
  }
}

export interface DatabaseService extends BaseService {
  readonly isOpen: boolean
  /** Raw BetterSqlite3 instance for prepared statements */
  readonly db: BetterSqlite3Database
}

export class DatabaseServiceImpl implements DatabaseService {
  private readonly _wrapper: DatabaseWrapper

  constructor(databasePath: string) {
    this._wrapper = new DatabaseWrapper(databasePath)
  }

  get isOpen(): boolean {
    return this._wrapper.isOpen
  }

  get db(): BetterSqlite3Database {
    return this._wrapper.db
  }

  async initialize(): Promise<void> {
    this._wrapper.open()
    runMigrations(this._wrapper.db)
  }

  async shutdown(): Promise<void> {
    this._wrapper.close()
  }
}

export function createDatabaseService(databasePath: string): DatabaseService {
  return new DatabaseServiceImpl(databasePath)
}
