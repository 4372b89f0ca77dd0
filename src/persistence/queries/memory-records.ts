/**
 * Query functions for the memory_records table.
 *
 * Records are inserted once and never updated; reads filter on the `type` and
 * `session_id` columns copied out of the metadata.
 */

import { randomUUID } from 'node:crypto'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import {
  CreateMemoryRecordInputSchema,
  MemoryRecordFilterSchema,
  MemoryRecordMetadataSchema,
  MemoryRecordRowSchema,
} from '../schemas/memory-records.js'
import type {
  CreateMemoryRecordInput,
  MemoryRecord,
  MemoryRecordFilter,
  MemoryRecordRow,
} from '../schemas/memory-records.js'

export type { CreateMemoryRecordInput, MemoryRecord, MemoryRecordFilter }

function rowToRecord(row: MemoryRecordRow): MemoryRecord {
  const metadata = MemoryRecordMetadataSchema.parse(JSON.parse(row.metadata_json))
  return {
    id: row.id,
    owner_scope: row.owner_scope,
    content: row.content,
    metadata,
    created_at: row.created_at,
  }
}

/**
 * Insert a memory record with a generated UUID.
 */
export function insertMemoryRecord(
  db: BetterSqlite3Database,
  input: CreateMemoryRecordInput,
  now: Date = new Date()
): MemoryRecord {
  const validated = CreateMemoryRecordInputSchema.parse(input)
  const id = randomUUID()
  const createdAt = now.toISOString()

  db.prepare(`
    INSERT INTO memory_records (id, owner_scope, type, session_id, content, metadata_json, created_at)
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `).run(
    id,
    validated.owner_scope,
    validated.metadata.type,
    validated.metadata.session_id,
    validated.content,
    JSON.stringify(validated.metadata),
    createdAt,
  )

  return {
    id,
    owner_scope: validated.owner_scope,
    content: validated.content,
    metadata: validated.metadata,
    created_at: createdAt,
  }
}

/**
 * Select memory records matching a filter, in insertion order.
 * The caller is responsible for rejecting unconstrained filters.
 */
export function queryMemoryRecords(db: BetterSqlite3Database, filter: MemoryRecordFilter): MemoryRecord[] {
  const validated = MemoryRecordFilterSchema.parse(filter)
  const conditions: string[] = []
  const params: Array<string | number> = []

  if (validated.session_id !== undefined) {
    conditions.push('session_id = ?')
    params.push(validated.session_id)
  }
  if (validated.type !== undefined) {
    const types = Array.isArray(validated.type) ? validated.type : [validated.type]
    conditions.push(`type IN (${types.map(() => '?').join(', ')})`)
    params.push(...types)
  }
  if (validated.owner_scope !== undefined) {
    conditions.push('owner_scope = ?')
    params.push(validated.owner_scope)
  }

  const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : ''
  const order = validated.order === 'desc' ? 'DESC' : 'ASC'
  let sql = `SELECT * FROM memory_records ${where} ORDER BY seq ${order}`
  if (validated.limit !== undefined) {
    sql += ' LIMIT ?'
    params.push(validated.limit)
  }

  return db
    .prepare(sql)
    .all(...params)
    .map((row) => rowToRecord(MemoryRecordRowSchema.parse(row)))
}

/**
 * Look up a single record by id.
 */
export function getMemoryRecord(db: BetterSqlite3Database, id: string): MemoryRecord | undefined {
  const row: unknown = db.prepare('SELECT * FROM memory_records WHERE id = ?').get(id)
  if (row === undefined) return undefined
  return rowToRecord(MemoryRecordRowSchema.parse(row))
}
