/**
 * Read-after-write helpers for an eventually consistent ContextStore.
 *
 * Three outcomes are kept apart:
 * - visible: every expected record can be read
 * - pending: records were written (a receipt exists) but are not readable yet
 * - absent: the query succeeded and nothing matches
 *
 * A failing query is none of these; it throws.
 */

import { backoffDelay, sleep } from '../../utils/helpers.js'
import type { ContextStore, MemoryRecord, MemoryRecordFilter, WriteReceipt } from './context-store.js'

export type RecordVisibility =
  | { state: 'visible'; records: MemoryRecord[] }
  | { state: 'pending'; missing: string[] }
  | { state: 'absent' }

export interface VisibilityOptions {
  /** Give up after this long */
  timeoutMs: number
  /** First wait between polls; doubles up to maxPollIntervalMs */
  pollIntervalMs: number
  maxPollIntervalMs: number
}

export const DEFAULT_VISIBILITY: VisibilityOptions = {
  timeoutMs: 30_000,
  pollIntervalMs: 250,
  maxPollIntervalMs: 5_000,
}

function receiptFilter(receipts: WriteReceipt[]): MemoryRecordFilter[] {
  const groups = new Map<string, MemoryRecordFilter>()
  for (const receipt of receipts) {
    const key = `${receipt.session_id ?? ''}\u0000${receipt.type}`
    if (!groups.has(key)) {
      groups.set(
        key,
        receipt.session_id !== null ? { session_id: receipt.session_id, type: receipt.type } : { type: receipt.type }
      )
    }
  }
  return [...groups.values()]
}

/**
 * Poll until every receipt's record can be read, or the timeout passes.
 * Visible records come back in receipt order.
 */
export async function awaitVisible(
  store: ContextStore,
  receipts: WriteReceipt[],
  options: VisibilityOptions = DEFAULT_VISIBILITY
): Promise<Extract<RecordVisibility, { state: 'visible' | 'pending' }>> {
  if (receipts.length === 0) {
    return { state: 'visible', records: [] }
  }

  const filters = receiptFilter(receipts)
  const deadline = Date.now() + options.timeoutMs
  const backoff = { baseDelayMs: options.pollIntervalMs, maxDelayMs: options.maxPollIntervalMs }

  for (let attempt = 0; ; attempt++) {
    const seen = new Map<string, MemoryRecord>()
    for (const filter of filters) {
      for (const record of await store.query(filter)) {
        seen.set(record.id, record)
      }
    }

    const missing = receipts.filter((r) => !seen.has(r.id)).map((r) => r.id)
    if (missing.length === 0) {
      const records: MemoryRecord[] = []
      for (const receipt of receipts) {
        const record = seen.get(receipt.id)
        if (record !== undefined) records.push(record)
      }
      return { state: 'visible', records }
    }

    const remaining = deadline - Date.now()
    if (remaining <= 0) {
      return { state: 'pending', missing }
    }
    await sleep(Math.min(backoffDelay(attempt, backoff), remaining))
  }
}

/**
 * One read with no write to wait for.
 */
export async function readRecords(
  store: ContextStore,
  filter: MemoryRecordFilter
): Promise<Extract<RecordVisibility, { state: 'visible' | 'absent' }>> {
  const records = await store.query(filter)
  return records.length > 0 ? { state: 'visible', records } : { state: 'absent' }
}
