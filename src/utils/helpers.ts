/**
 * General utility helpers for idea-gauntlet
 */

import { randomUUID } from 'node:crypto'

/**
 * Sleep for a given number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Format a duration in milliseconds to a human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(ms)}ms`
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`
  if (ms < 3600000) {
    const minutes = Math.floor(ms / 60000)
    const seconds = Math.floor((ms % 60000) / 1000)
    return `${String(minutes)}m ${String(seconds)}s`
  }
  const hours = Math.floor(ms / 3600000)
  const minutes = Math.floor((ms % 3600000) / 60000)
  return `${String(hours)}h ${String(minutes)}m`
}

/**
 * Generate a unique identifier using crypto.randomUUID()
 * @param prefix - Optional prefix for the ID
 */
export function generateId(prefix = ''): string {
  const uuid = randomUUID()
  return prefix ? `${prefix}-${uuid}` : uuid
}

/**
 * Check if a value is a plain object (not an array, Date, or other special object)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false
  }
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/** Backoff settings shared by retrying and polling loops */
export interface BackoffOptions {
  /** Total attempts, including the first */
  attempts: number
  baseDelayMs: number
  maxDelayMs: number
}

/**
 * Delay before retry number `attempt` (0-based), doubling up to the cap.
 */
export function backoffDelay(attempt: number, options: Pick<BackoffOptions, 'baseDelayMs' | 'maxDelayMs'>): number {
  return Math.min(options.baseDelayMs * Math.pow(2, attempt), options.maxDelayMs)
}

/**
 * Retry an async operation with exponential backoff.
 * `onRetry` is called before each wait with the failed attempt number (1-based).
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: BackoffOptions,
  onRetry?: (error: Error, attempt: number) => void
): Promise<T> {
  let lastError: Error | undefined
  for (let attempt = 0; attempt < options.attempts; attempt++) {
    try {
      return await fn()
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error))
      if (attempt < options.attempts - 1) {
        onRetry?.(lastError, attempt + 1)
        await sleep(backoffDelay(attempt, options))
      }
    }
  }
  throw lastError ?? new Error('Operation failed after retries')
}

/**
 * Lowercase, hyphenated identifier safe for file names.
 * Falls back to `fallback` when nothing usable remains.
 */
export function slugify(text: string, maxLength = 50, fallback = 'session'): string {
  const slug = text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, maxLength)
    .replace(/-+$/g, '')
  return slug !== '' ? slug : fallback
}
