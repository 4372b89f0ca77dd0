/**
 * Notification channel port.
 *
 * Delivery is best effort: the orchestrator logs a failed send and moves on.
 */

import { describeOutcome } from '../report/report-compiler.js'
import type { SessionDocument } from '../session/session-types.js'

export type NotifierKind = 'none' | 'console' | 'slack'

export interface NotificationMessage {
  sessionId: string
  /** Short plain-text title */
  title: string
  /** One-line outcome with score and verdict */
  headline: string
  /** Full Markdown report */
  body: string
}

export interface DeliveryReceipt {
  channel: NotifierKind
  /** Channel-specific ids of the posted messages, empty when nothing was posted */
  messageIds: string[]
}

export interface Notifier {
  readonly kind: NotifierKind
  /**
   * @throws {NotificationError} when the channel rejects the message
   */
  send(message: NotificationMessage): Promise<DeliveryReceipt>
}

export interface NotifierSettings {
  kind: NotifierKind
  channel?: string
  /** Name of the environment variable holding the bot token */
  token_env: string
}

const TITLE_LIMIT = 140

export function buildNotification(session: SessionDocument, report: string): NotificationMessage {
  const score = session.scores.combined ?? session.scores.problem
  const statement =
    session.input_statement.length > TITLE_LIMIT
      ? `${session.input_statement.slice(0, TITLE_LIMIT - 3)}...`
      : session.input_statement

  return {
    sessionId: session.session_id,
    title: statement,
    headline: `Session ${session.session_id} - Score ${score === null ? 'n/a' : score.toFixed(2)} - ${describeOutcome(session)}`,
    body: report,
  }
}
