/**
 * Reasoning capability port.
 *
 * Stages never generate analysis in-process: they hand a prompt to a
 * capability and get text back. Adapters implement this interface; tests use
 * fakes.
 */

export type { StageOutput } from './output-schema.js'

export interface ReasoningRequest {
  sessionId: string
  stage: string
  prompt: string
  /** Tools the capability may use while reasoning, e.g. WebSearch */
  allowedTools: string[]
  maxTurns?: number
  /** Aborted when the stage times out */
  signal?: AbortSignal
}

export interface ReasoningResponse {
  /** Raw text; the structured YAML block is expected at the end */
  output: string
  durationMs: number
  tokenEstimate: { input: number; output: number }
}

/**
 * Single-shot call: each invocation is one attempt, never retried by callers.
 */
export interface ReasoningCapability {
  readonly id: string
  invoke(request: ReasoningRequest): Promise<ReasoningResponse>
}
