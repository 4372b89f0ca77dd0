/**
 * Decorator that retries transient store failures with exponential backoff.
 *
 * Validation failures (bad filter, bad metadata) are raised immediately and
 * never retried. Once the attempts run out the last error is re-thrown as a
 * ContextStoreError.
 */

import { ContextStoreError, errorMessage } from '../../core/errors.js'
import { MemoryRecordMetadataSchema } from '../../persistence/schemas/memory-records.js'
import { withRetry } from '../../utils/helpers.js'
import type { BackoffOptions } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import { assertQueryFilter } from './context-store.js'
import type {
  ContextStore,
  MemoryRecord,
  MemoryRecordFilter,
  MemoryRecordMetadata,
  WriteReceipt,
} from './context-store.js'

const logger = createLogger('context-store')

export const DEFAULT_STORE_RETRY: BackoffOptions = {
  attempts: 3,
  baseDelayMs: 200,
  maxDelayMs: 5_000,
}

export class ResilientContextStore implements ContextStore {
  constructor(
    private readonly _inner: ContextStore,
    private readonly _retry: BackoffOptions = DEFAULT_STORE_RETRY
  ) {}

  async write(ownerScope: string, content: string, metadata: MemoryRecordMetadata): Promise<WriteReceipt> {
    const validated = MemoryRecordMetadataSchema.parse(metadata)
    return this._withRetry('write', { type: validated.type, sessionId: validated.session_id }, () =>
      this._inner.write(ownerScope, content, validated)
    )
  }

  async query(filter: MemoryRecordFilter): Promise<MemoryRecord[]> {
    assertQueryFilter(filter)
    return this._withRetry('query', { filter }, () => this._inner.query(filter))
  }

  private async _withRetry<T>(
    operation: 'write' | 'query',
    context: Record<string, unknown>,
    fn: () => Promise<T>
  ): Promise<T> {
    try {
      return await withRetry(fn, this._retry, (err, attempt) => {
        logger.warn({ ...context, attempt, error: err.message }, `Context store ${operation} failed, retrying`)
      })
    } catch (err) {
      throw new ContextStoreError(
        `Context store ${operation} failed after ${String(this._retry.attempts)} attempts: ${errorMessage(err)}`,
        { ...context, attempts: this._retry.attempts }
      )
    }
  }
}
