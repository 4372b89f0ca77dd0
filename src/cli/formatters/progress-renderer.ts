/**
 * Line-oriented progress renderer for `gauntlet evaluate`.
 *
 * Subscribes to the event bus and writes one line per meaningful event.
 * Colors are used only when the stream is a TTY and `NO_COLOR` is unset or empty
 * (https://no-color.org/).
 */

import type { Writable } from 'node:stream'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { GauntletEvents } from '../../core/event-bus.types.js'
import { formatDuration } from '../../utils/helpers.js'

const ANSI_RESET = '\x1b[0m'
const ANSI_DIM = '\x1b[2m'
const ANSI_YELLOW = '\x1b[33m'
const ANSI_GREEN = '\x1b[32m'
const ANSI_RED = '\x1b[31m'

export interface ProgressRenderer {
  attach(bus: TypedEventBus): void
  /** Unsubscribe every handler registered by attach(). */
  detach(): void
}

function streamIsTTY(stream: Writable): boolean {
  return 'isTTY' in stream && stream.isTTY === true
}

/**
 * @param stream - destination, usually `process.stderr`
 * @param isTTY  - override for TTY detection (tests)
 */
export function createProgressRenderer(stream: Writable, isTTY?: boolean): ProgressRenderer {
  const tty = isTTY ?? streamIsTTY(stream)
  const color = tty && (process.env['NO_COLOR'] ?? '') === ''

  let attached: TypedEventBus | null = null

  function paint(text: string, code: string): string {
    return color ? `${code}${text}${ANSI_RESET}` : text
  }

  function line(sessionId: string, text: string): void {
    stream.write(`${paint(`[${sessionId}]`, ANSI_DIM)} ${text}\n`)
  }

  const onStarted = ({ sessionId, statement, pack }: GauntletEvents['session:started']): void => {
    line(sessionId, `evaluating "${statement}" with pack ${pack}`)
  }

  const onSimilar = ({ sessionId, matches }: GauntletEvents['session:similar']): void => {
    for (const match of matches) {
      line(
        sessionId,
        paint(`similar to ${match.sessionId} (${match.similarity.toFixed(2)}, ${match.status}): ${match.statement}`, ANSI_YELLOW)
      )
    }
  }

  const onStageStarted = ({ sessionId, stage }: GauntletEvents['stage:started']): void => {
    line(sessionId, `  ${stage} ...`)
  }

  const onStageComplete = ({ sessionId, stage, durationMs }: GauntletEvents['stage:complete']): void => {
    line(sessionId, `  ${paint('✓', ANSI_GREEN)} ${stage} ${paint(formatDuration(durationMs), ANSI_DIM)}`)
  }

  const onStageFailed = ({ sessionId, stage, kind, error }: GauntletEvents['stage:failed']): void => {
    line(sessionId, `  ${paint('✗', ANSI_RED)} ${stage} [${kind}] ${error}`)
  }

  const onScored = ({ sessionId, bucket, score }: GauntletEvents['session:scored']): void => {
    line(sessionId, `${bucket} score ${score.toFixed(2)}`)
  }

  const onReport = ({ sessionId, artifact }: GauntletEvents['report:written']): void => {
    line(sessionId, `report written: ${artifact}`)
  }

  const onNotifyFailed = ({ sessionId, error }: GauntletEvents['notify:failed']): void => {
    line(sessionId, paint(`notification failed: ${error}`, ANSI_YELLOW))
  }

  const onFinished = ({ sessionId, status, verdict, failureKind }: GauntletEvents['session:finished']): void => {
    if (status === 'complete') {
      const label = verdict === 'PASS' ? paint('PASS', ANSI_GREEN) : paint(verdict ?? 'done', ANSI_RED)
      line(sessionId, `finished: ${label}`)
    } else {
      line(sessionId, paint(`${status}${failureKind !== null ? ` (${failureKind})` : ''}`, ANSI_RED))
    }
  }

  return {
    attach(bus: TypedEventBus): void {
      if (attached !== null) return
      attached = bus
      bus.on('session:started', onStarted)
      bus.on('session:similar', onSimilar)
      bus.on('stage:started', onStageStarted)
      bus.on('stage:complete', onStageComplete)
      bus.on('stage:failed', onStageFailed)
      bus.on('session:scored', onScored)
      bus.on('report:written', onReport)
      bus.on('notify:failed', onNotifyFailed)
      bus.on('session:finished', onFinished)
    },

    detach(): void {
      if (attached === null) return
      const bus = attached
      bus.off('session:started', onStarted)
      bus.off('session:similar', onSimilar)
      bus.off('stage:started', onStageStarted)
      bus.off('stage:complete', onStageComplete)
      bus.off('stage:failed', onStageFailed)
      bus.off('session:scored', onScored)
      bus.off('report:written', onReport)
      bus.off('notify:failed', onNotifyFailed)
      bus.off('session:finished', onFinished)
      attached = null
    },
  }
}
