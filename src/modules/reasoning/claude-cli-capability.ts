/**
 * ClaudeCliCapability: reasoning capability backed by the `claude` CLI in
 * print mode.
 *
 * - Spawned with child_process.spawn (never exec); the prompt goes over stdin
 * - Raw text output (no JSON envelope) so the trailing YAML block survives
 * - Honours an AbortSignal by sending SIGTERM
 * - Non-zero exit, spawn failure and abort reject with CapabilityError
 */

import { spawn } from 'node:child_process'
import { CapabilityError } from '../../core/errors.js'
import { maskSecrets } from '../../cli/utils/masking.js'
import { createLogger } from '../../utils/logger.js'
import type { ReasoningCapability, ReasoningRequest, ReasoningResponse } from './types.js'

const logger = createLogger('reasoning:claude-cli')

/** Approximate characters per token for estimation */
const CHARS_PER_TOKEN = 3

const STAGE_SYSTEM_PROMPT =
  'You are one analysis stage in an idea evaluation pipeline. ' +
  'Ignore session startup context and memory notes. ' +
  'Follow the instructions in the user message exactly and finish with the YAML block ' +
  'described in its Output Contract.'

export interface ClaudeCliCapabilityOptions {
  /** Binary name or path (default: claude) */
  binary?: string
  model?: string
  /** Default turn budget when a request does not set one */
  maxTurns?: number
  /** Extra environment for the child process */
  env?: Record<string, string>
}

export class ClaudeCliCapability implements ReasoningCapability {
  readonly id = 'claude-cli'
  private readonly _binary: string
  private readonly _model: string | undefined
  private readonly _maxTurns: number | undefined
  private readonly _env: Record<string, string>

  constructor(options: ClaudeCliCapabilityOptions = {}) {
    this._binary = options.binary ?? 'claude'
    this._model = options.model
    this._maxTurns = options.maxTurns
    this._env = options.env ?? {}
  }

  /** Arguments passed to the CLI for one request */
  buildArgs(request: ReasoningRequest): string[] {
    const args = ['-p', '--system-prompt', STAGE_SYSTEM_PROMPT]
    if (this._model !== undefined) {
      args.push('--model', this._model)
    }
    const maxTurns = request.maxTurns ?? this._maxTurns
    if (maxTurns !== undefined) {
      args.push('--max-turns', String(maxTurns))
    }
    if (request.allowedTools.length > 0) {
      args.push('--allowedTools', request.allowedTools.join(','))
    }
    return args
  }

  invoke(request: ReasoningRequest): Promise<ReasoningResponse> {
    const { prompt, signal, stage, sessionId } = request

    if (signal?.aborted === true) {
      return Promise.reject(new CapabilityError('Request aborted before dispatch', { stage, sessionId }))
    }

    return new Promise<ReasoningResponse>((resolve, reject) => {
      const startedAt = Date.now()
      const proc = spawn(this._binary, this.buildArgs(request), {
        env: { ...process.env, ...this._env },
        stdio: ['pipe', 'pipe', 'pipe'],
      })

      let settled = false
      const stdoutChunks: Buffer[] = []
      const stderrChunks: Buffer[] = []

      const onAbort = (): void => {
        finish(new CapabilityError('Request aborted', { stage, sessionId }))
        proc.kill('SIGTERM')
      }

      const finish = (error: CapabilityError | null): void => {
        if (settled) return
        settled = true
        signal?.removeEventListener('abort', onAbort)
        if (error !== null) {
          reject(error)
          return
        }
        const output = Buffer.concat(stdoutChunks).toString('utf-8')
        resolve({
          output,
          durationMs: Date.now() - startedAt,
          tokenEstimate: {
            input: Math.ceil(prompt.length / CHARS_PER_TOKEN),
            output: Math.ceil(output.length / CHARS_PER_TOKEN),
          },
        })
      }

      signal?.addEventListener('abort', onAbort, { once: true })

      proc.stdout.on('data', (chunk: Buffer) => {
        stdoutChunks.push(chunk)
      })
      proc.stderr.on('data', (chunk: Buffer) => {
        stderrChunks.push(chunk)
      })

      proc.stdin.on('error', (err: NodeJS.ErrnoException) => {
        // EPIPE: the process exited before reading its prompt; close reports it
        if (err.code !== 'EPIPE') {
          logger.warn({ sessionId, stage, error: err.message }, 'stdin write error')
        }
      })
      proc.stdin.end(prompt)

      proc.on('error', (err) => {
        finish(new CapabilityError(`Failed to start ${this._binary}: ${err.message}`, { stage, sessionId }))
      })

      proc.on('close', (exitCode) => {
        if (exitCode === 0) {
          logger.debug({ sessionId, stage, durationMs: Date.now() - startedAt }, 'Capability call completed')
          finish(null)
          return
        }
        const stderr = maskSecrets(Buffer.concat(stderrChunks).toString('utf-8').trim())
        finish(
          new CapabilityError(
            stderr !== '' ? stderr : `${this._binary} exited with code ${String(exitCode ?? 'null')}`,
            { stage, sessionId, exitCode }
          )
        )
      })
    })
  }
}

export function createClaudeCliCapability(options: ClaudeCliCapabilityOptions = {}): ReasoningCapability {
  return new ClaudeCliCapability(options)
}
