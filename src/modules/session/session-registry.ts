/**
 * In-process registry of live sessions keyed by session_id.
 */

import { SessionNotFoundError } from '../../core/errors.js'
import type { SessionHandle } from './session-handle.js'

export class SessionRegistry {
  private readonly _sessions = new Map<string, SessionHandle>()

  register(handle: SessionHandle): void {
    this._sessions.set(handle.id, handle)
  }

  /**
   * @throws {SessionNotFoundError} for unknown ids
   */
  get(sessionId: string): SessionHandle {
    const handle = this._sessions.get(sessionId)
    if (handle === undefined) {
      throw new SessionNotFoundError(sessionId)
    }
    return handle
  }

  find(sessionId: string): SessionHandle | undefined {
    return this._sessions.get(sessionId)
  }

  list(): SessionHandle[] {
    return [...this._sessions.values()]
  }

  /** Sessions that have not reached a terminal state */
  active(): SessionHandle[] {
    return this.list().filter((h) => !h.isTerminal)
  }

  remove(sessionId: string): boolean {
    return this._sessions.delete(sessionId)
  }
}
