/**
 * ContextStore: the append-only, eventually consistent record store shared by
 * the orchestrator and every stage.
 *
 * Writes may become visible to queries late. Callers that need
 * read-after-write use `awaitVisible` from ./visibility.ts.
 */

import { InvalidQueryFilterError } from '../../core/errors.js'
import type {
  MemoryRecord,
  MemoryRecordFilter,
  MemoryRecordMetadata,
  MemoryRecordType,
} from '../../persistence/schemas/memory-records.js'

export type { MemoryRecord, MemoryRecordFilter, MemoryRecordMetadata, MemoryRecordType }

/** Proof of a write; used to wait for the record to become visible */
export interface WriteReceipt {
  id: string
  session_id: string | null
  type: MemoryRecordType
  written_at: string
}

export interface ContextStore {
  /**
   * Append a record. Records are never mutated after the write.
   * @throws {ContextStoreError} when the backend rejects the write
   */
  write(ownerScope: string, content: string, metadata: MemoryRecordMetadata): Promise<WriteReceipt>

  /**
   * Records matching the filter in insertion order. An empty array means the
   * query succeeded and nothing is visible yet; failures throw.
   * @throws {InvalidQueryFilterError} when neither session_id nor type is given
   * @throws {ContextStoreError} when the backend query fails
   */
  query(filter: MemoryRecordFilter): Promise<MemoryRecord[]>
}

/**
 * Reject unconstrained scans.
 */
export function assertQueryFilter(filter: MemoryRecordFilter): void {
  if (filter.session_id === undefined && filter.type === undefined) {
    throw new InvalidQueryFilterError()
  }
}
