/**
 * StageRunner: executes one stage of one session.
 *
 * 1. Marks the stage's PhaseRecord running
 * 2. Reads the session's prior stage outputs from the context store
 * 3. Renders the stage prompt and invokes the reasoning capability once,
 *    bounded by the stage timeout
 * 4. Extracts and validates the YAML output block and the owned criteria
 * 5. Appends a stage_output record, then marks the PhaseRecord complete
 *
 * Any failure marks the PhaseRecord failed and is returned, never thrown:
 * the orchestrator decides what a failure means for the session.
 */

import {
  CapabilityError,
  ContextStoreError,
  PipelineDefinitionError,
  ScoreValidationError,
  StageOutputError,
  StageTimeoutError,
  errorMessage,
} from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import { maskSecrets } from '../../cli/utils/masking.js'
import { childLogger, createLogger } from '../../utils/logger.js'
import type { Logger } from '../../utils/logger.js'
import type { ContextStore, WriteReceipt } from '../context-store/context-store.js'
import type { PipelinePack } from '../pipeline-pack/pipeline-pack.js'
import type { StageDefinition } from '../pipeline-pack/schemas.js'
import { StageOutputSchema } from '../reasoning/output-schema.js'
import type { ReasoningCapability, ReasoningResponse, StageOutput } from '../reasoning/types.js'
import { extractYamlBlock, parseYamlResult } from '../reasoning/yaml-parser.js'
import { validateCriterion } from '../scoring/scoring-engine.js'
import type { OutOfRangePolicy } from '../scoring/scoring-engine.js'
import type { SessionHandle } from '../session/session-handle.js'
import type { FailureKind, PhaseRecord } from '../session/session-types.js'
import {
  formatOutputContract,
  formatScores,
  formatSimilarWarning,
  formatStageContext,
  renderTemplate,
} from './prompt-assembler.js'

const logger = createLogger('stage-runner')

export interface StageRunnerDeps {
  capability: ReasoningCapability
  store: ContextStore
  pack: PipelinePack
  eventBus: TypedEventBus
  outOfRangePolicy?: OutOfRangePolicy
}

export interface StageRunOptions {
  /** Extra instruction rendered into the {{instructions}} placeholder */
  instructions?: string
  /** Text rendered into the {{decision}} placeholder */
  decision?: string
}

export interface StageFailure {
  stage: string
  kind: FailureKind
  message: string
}

export type StageRunResult =
  | { ok: true; record: PhaseRecord; receipt: WriteReceipt }
  | { ok: false; record: PhaseRecord; failure: StageFailure }

/** Map a stage error onto the failure kind carried by the session */
export function classifyStageError(err: unknown): FailureKind {
  if (err instanceof StageTimeoutError) return 'timeout'
  if (err instanceof StageOutputError) return 'output'
  if (err instanceof ScoreValidationError) return 'validation'
  if (err instanceof PipelineDefinitionError) return 'validation'
  if (err instanceof ContextStoreError) return 'store'
  return 'capability'
}

export class StageRunner {
  private readonly _capability: ReasoningCapability
  private readonly _store: ContextStore
  private readonly _pack: PipelinePack
  private readonly _eventBus: TypedEventBus
  private readonly _policy: OutOfRangePolicy

  constructor(deps: StageRunnerDeps) {
    this._capability = deps.capability
    this._store = deps.store
    this._pack = deps.pack
    this._eventBus = deps.eventBus
    this._policy = deps.outOfRangePolicy ?? 'reject'
  }

  async run(stage: StageDefinition, session: SessionHandle, options: StageRunOptions = {}): Promise<StageRunResult> {
    const log = childLogger(logger, { sessionId: session.id, stage: stage.name })
    const startedAt = Date.now()

    session.startPhase(stage.name)
    this._eventBus.emit('stage:started', { sessionId: session.id, stage: stage.name })
    log.debug('Stage dispatched')

    try {
      const prompt = await this._buildPrompt(stage, session, options)
      const response = await this._invokeWithTimeout(stage, session, prompt)
      const output = this._parseOutput(stage, response.output, log)
      const receipt = await this._store.write(stage.name, formatStageRecord(output), {
        type: 'stage_output',
        session_id: session.id,
        stage: stage.name,
        group: stage.group,
        scores: output.scores,
      })

      session.completePhase(stage.name, output)
      const durationMs = Date.now() - startedAt
      this._eventBus.emit('stage:complete', { sessionId: session.id, stage: stage.name, durationMs })
      log.info({ durationMs, scores: output.scores }, 'Stage complete')

      return { ok: true, record: this._record(session, stage.name), receipt }
    } catch (err) {
      return this._fail(stage, session, err, log)
    }
  }

  private async _buildPrompt(stage: StageDefinition, session: SessionHandle, options: StageRunOptions): Promise<string> {
    const template = await this._pack.getPrompt(stage.name)
    const records = await this._store.query({ session_id: session.id, type: 'stage_output' })
    // Only outputs of stages this session completed
    const prior = records.filter((r) => r.metadata.stage !== undefined && session.phase(r.metadata.stage)?.status === 'complete')

    const body = renderTemplate(template, {
      statement: session.statement,
      stage: stage.name,
      description: stage.description,
      threshold: session.threshold.toFixed(1),
      context: formatStageContext(prior),
      similar_warning: formatSimilarWarning(session.similarSessions),
      scores: formatScores(session.scores, session.threshold),
      instructions: options.instructions ?? '',
      decision: options.decision ?? '',
    })

    return `${body.trim()}\n\n${formatOutputContract(stage)}\n`
  }

  private async _invokeWithTimeout(
    stage: StageDefinition,
    session: SessionHandle,
    prompt: string
  ): Promise<ReasoningResponse> {
    const timeoutMs = this._pack.timeoutFor(stage)
    const controller = new AbortController()
    let timer: ReturnType<typeof setTimeout> | undefined

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new StageTimeoutError(stage.name, timeoutMs))
        controller.abort()
      }, timeoutMs)
    })

    try {
      const call = this._capability.invoke({
        sessionId: session.id,
        stage: stage.name,
        prompt,
        allowedTools: stage.tools,
        ...(stage.max_turns !== undefined ? { maxTurns: stage.max_turns } : {}),
        signal: controller.signal,
      })
      return await Promise.race([call, timeout])
    } catch (err) {
      if (err instanceof StageTimeoutError || err instanceof CapabilityError) throw err
      throw new CapabilityError(errorMessage(err), { stage: stage.name, sessionId: session.id })
    } finally {
      clearTimeout(timer)
    }
  }

  /**
   * @throws {StageOutputError} for a missing or malformed block, or a missing criterion
   * @throws {ScoreValidationError} for a rating outside [1, 10] under the reject policy
   */
  private _parseOutput(stage: StageDefinition, raw: string, log: Logger): StageOutput {
    const block = extractYamlBlock(raw)
    if (block === null) {
      throw new StageOutputError(stage.name, 'no YAML output block found')
    }

    const result = parseYamlResult(block, StageOutputSchema)
    if (!result.ok) {
      throw new StageOutputError(stage.name, result.error)
    }

    const output = result.parsed
    if (output.result === 'failed') {
      throw new StageOutputError(stage.name, `stage reported failure: ${output.summary}`)
    }

    const scores: Record<string, number> = {}
    for (const criterion of stage.criteria) {
      const value = output.scores[criterion]
      if (value === undefined) {
        throw new StageOutputError(stage.name, `missing score for criterion "${criterion}"`, { criterion })
      }
      scores[criterion] = validateCriterion(criterion, value, this._policy)
    }

    const extra = Object.keys(output.scores).filter((k) => !stage.criteria.some((c) => c === k))
    if (extra.length > 0) {
      log.debug({ extra }, 'Ignoring scores for criteria the stage does not own')
    }

    return { ...output, scores }
  }

  private _fail(stage: StageDefinition, session: SessionHandle, err: unknown, log: Logger): StageRunResult {
    const kind = classifyStageError(err)
    const message = maskSecrets(errorMessage(err))

    session.failPhase(stage.name, message, kind)
    this._eventBus.emit('stage:failed', { sessionId: session.id, stage: stage.name, kind, error: message })
    log.warn({ kind, error: message }, 'Stage failed')

    return { ok: false, record: this._record(session, stage.name), failure: { stage: stage.name, kind, message } }
  }

  private _record(session: SessionHandle, name: string): PhaseRecord {
    const record = session.phase(name)
    if (record === undefined) {
      throw new PipelineDefinitionError(`Stage "${name}" has no phase record`, { stage: name })
    }
    return structuredClone(record)
  }
}

/** Markdown body stored for a completed stage and shown to later stages */
export function formatStageRecord(output: StageOutput): string {
  const parts = [output.summary.trim()]
  const scoreEntries = Object.entries(output.scores)
  if (scoreEntries.length > 0) {
    parts.push(`Scores: ${scoreEntries.map(([k, v]) => `${k}=${String(v)}`).join(', ')}`)
  }
  if (output.findings.length > 0) {
    parts.push(['Findings:', ...output.findings.map((f) => `- ${f}`)].join('\n'))
  }
  if (output.suggestions !== undefined && output.suggestions.length > 0) {
    parts.push(['Suggestions:', ...output.suggestions.map((s) => `- ${s}`)].join('\n'))
  }
  return parts.join('\n\n')
}
