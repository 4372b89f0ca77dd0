/**
 * Migration runner for the SQLite persistence layer.
 *
 * - Ensures the `schema_migrations` table exists
 * - Applies pending migrations in version order, each in its own transaction
 * - Safe to call repeatedly
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { createLogger } from '../../utils/logger.js'
import { migration001MemoryRecords } from './001-memory-records.js'

const logger = createLogger('persistence:migrations')

export interface Migration {
  /** Unique version number */
  version: number
  name: string
  /** Must be idempotent */
  up(db: BetterSqlite3Database): void
}

const MIGRATIONS: Migration[] = [migration001MemoryRecords]

/**
 * Ensure `schema_migrations` exists and run any pending migrations.
 * @returns the versions applied by this call
 */
export function runMigrations(db: BetterSqlite3Database, migrations: Migration[] = MIGRATIONS): number[] {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version    INTEGER PRIMARY KEY,
      name       TEXT    NOT NULL,
      applied_at TEXT    NOT NULL DEFAULT (datetime('now'))
    )
  `)

  const appliedVersions = new Set<number>()
  for (const row of db.prepare('SELECT version FROM schema_migrations').all()) {
    if (typeof row === 'object' && row !== null && 'version' in row && typeof row.version === 'number') {
      appliedVersions.add(row.version)
    }
  }

  const pending = migrations
    .filter((m) => !appliedVersions.has(m.version))
    .sort((a, b) => a.version - b.version)

  if (pending.length === 0) {
    logger.debug('No pending migrations')
    return []
  }

  const insertMigration = db.prepare('INSERT INTO schema_migrations (version, name) VALUES (?, ?)')

  for (const migration of pending) {
    logger.info({ version: migration.version, name: migration.name }, 'Applying migration')
    const applyMigration = db.transaction(() => {
      migration.up(db)
      insertMigration.run(migration.version, migration.name)
    })
    applyMigration()
  }

  logger.info({ count: pending.length }, 'All pending migrations applied')
  return pending.map((m) => m.version)
}
