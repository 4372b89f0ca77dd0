/**
 * PipelineOrchestratorImpl: concrete implementation of PipelineOrchestrator.
 *
 * Each session runs as one async task:
 *  1. Appends a session_state record and looks up similar past sessions
 *  2. Runs the problem group, scores it and applies the elimination decision
 *  3. Waits for Phase 1 records to be visible, then runs the solution group
 *  4. Runs the report group, writes the report artifact and completes
 *  5. Appends the session_outcome record and notifies (best effort)
 *
 * Stage and store failures end the session FAILED with a typed failure on the
 * document; `done` always resolves with the final document.
 */

import {
  InvalidInputError,
  MissingScoreError,
  ReportError,
  errorMessage,
} from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import { generateId } from '../../utils/helpers.js'
import { childLogger, createLogger } from '../../utils/logger.js'
import type { Logger } from '../../utils/logger.js'
import type { ContextStore, WriteReceipt } from '../context-store/context-store.js'
import { DEFAULT_VISIBILITY, awaitVisible } from '../context-store/visibility.js'
import type { VisibilityOptions } from '../context-store/visibility.js'
import { outcomeMetadata } from '../history/outcome-record.js'
import { buildNotification } from '../notify/types.js'
import type { Notifier } from '../notify/types.js'
import type { PipelinePack } from '../pipeline-pack/pipeline-pack.js'
import type { StageDefinition, StageGroup } from '../pipeline-pack/schemas.js'
import type { ReasoningCapability } from '../reasoning/types.js'
import { artifactName, compileReport, describeOutcome } from '../report/report-compiler.js'
import type { ReportSink } from '../report/report-sink.js'
import { MAX_SCORE, MIN_SCORE } from '../scoring/criteria.js'
import {
  collectCriteria,
  combineScores,
  decideVerdict,
  scoreProblem,
  scoreSolution,
  shouldEliminate,
} from '../scoring/scoring-engine.js'
import type { OutOfRangePolicy } from '../scoring/scoring-engine.js'
import { SessionHandle } from '../session/session-handle.js'
import type { Clock } from '../session/session-handle.js'
import { SessionRegistry } from '../session/session-registry.js'
import type {
  EliminationPolicy,
  FailureKind,
  PipelineState,
  SessionDocument,
  SessionFailure,
  Verdict,
} from '../session/session-types.js'
import { DEFAULT_SIMILARITY_LIMIT, DEFAULT_SIMILARITY_THRESHOLD } from '../similarity/similarity-search.js'
import type { SimilaritySearch } from '../similarity/similarity-search.js'
import { ALTERNATIVE_DIRECTIONS_INSTRUCTION } from '../stage-runner/prompt-assembler.js'
import { StageRunner, classifyStageError } from '../stage-runner/stage-runner.js'
import type { StageRunOptions } from '../stage-runner/stage-runner.js'
import { runStageGroup } from './group-scheduler.js'
import type { GroupRunResult } from './group-scheduler.js'
import type { EvaluateOptions, PipelineOrchestrator, StartedSession } from './orchestrator.js'

const logger = createLogger('orchestrator')

/** Owner scope of records the orchestrator writes itself */
export const ORCHESTRATOR_SCOPE = 'orchestrator'

// ---------------------------------------------------------------------------
// Settings and dependencies
// ---------------------------------------------------------------------------

export interface OrchestratorSettings {
  /** Overrides the pack threshold */
  threshold?: number
  /** Overrides the pack elimination policy */
  eliminationPolicy?: EliminationPolicy
  /** Overrides the pack elimination bar */
  eliminationBar?: number
  outOfRangePolicy: OutOfRangePolicy
  visibility: VisibilityOptions
  similarity: { threshold: number; limit: number }
}

export const DEFAULT_ORCHESTRATOR_SETTINGS: OrchestratorSettings = {
  outOfRangePolicy: 'reject',
  visibility: DEFAULT_VISIBILITY,
  similarity: { threshold: DEFAULT_SIMILARITY_THRESHOLD, limit: DEFAULT_SIMILARITY_LIMIT },
}

export interface PipelineOrchestratorDeps {
  pack: PipelinePack
  capability: ReasoningCapability
  store: ContextStore
  eventBus: TypedEventBus
  reportSink: ReportSink
  notifier: Notifier
  /** Omit to skip the duplicate-session lookup */
  similarity?: SimilaritySearch
  registry?: SessionRegistry
  settings?: Partial<OrchestratorSettings>
  clock?: Clock
  generateSessionId?: () => string
}

/** Thrown inside a run once the session is already terminal */
class HaltRun extends Error {
  constructor() {
    super('session halted')
    this.name = 'HaltRun'
  }
}

function isCancelled(handle: SessionHandle): boolean {
  return handle.status === 'cancelled'
}

/** Failure kind for errors raised outside a stage */
export function classifyRunError(err: unknown): FailureKind {
  if (err instanceof MissingScoreError) return 'decision'
  if (err instanceof ReportError) return 'report'
  return classifyStageError(err)
}

function shortSessionId(): string {
  return generateId().slice(0, 8)
}

// ---------------------------------------------------------------------------
// PipelineOrchestratorImpl
// ---------------------------------------------------------------------------

export class PipelineOrchestratorImpl implements PipelineOrchestrator {
  readonly pack: PipelinePack
  private readonly _store: ContextStore
  private readonly _eventBus: TypedEventBus
  private readonly _reportSink: ReportSink
  private readonly _notifier: Notifier
  private readonly _similarity: SimilaritySearch | undefined
  private readonly _registry: SessionRegistry
  private readonly _settings: OrchestratorSettings
  private readonly _runner: StageRunner
  private readonly _clock: Clock
  private readonly _generateSessionId: () => string
  /** Sessions whose report artifact is being written */
  private readonly _committing = new Set<string>()

  constructor(deps: PipelineOrchestratorDeps) {
    this.pack = deps.pack
    this._store = deps.store
    this._eventBus = deps.eventBus
    this._reportSink = deps.reportSink
    this._notifier = deps.notifier
    this._similarity = deps.similarity
    this._registry = deps.registry ?? new SessionRegistry()
    this._settings = { ...DEFAULT_ORCHESTRATOR_SETTINGS, ...deps.settings }
    this._clock = deps.clock ?? (() => new Date())
    this._generateSessionId = deps.generateSessionId ?? shortSessionId
    this._runner = new StageRunner({
      capability: deps.capability,
      store: deps.store,
      pack: deps.pack,
      eventBus: deps.eventBus,
      outOfRangePolicy: this._settings.outOfRangePolicy,
    })
  }

  async evaluate(statement: string, options: EvaluateOptions = {}): Promise<SessionDocument> {
    return this.start(statement, options).done
  }

  start(statement: string, options: EvaluateOptions = {}): StartedSession {
    const trimmed = statement.trim()
    if (trimmed === '') {
      throw new InvalidInputError('Statement must not be empty')
    }
    const threshold = options.threshold ?? this._settings.threshold ?? this.pack.manifest.threshold
    if (!Number.isFinite(threshold) || threshold < MIN_SCORE || threshold > MAX_SCORE) {
      throw new InvalidInputError(
        `Threshold must be between ${String(MIN_SCORE)} and ${String(MAX_SCORE)}, got ${String(threshold)}`,
        { threshold }
      )
    }

    const handle = SessionHandle.create(
      {
        sessionId: this._generateSessionId(),
        statement: trimmed,
        threshold,
        pack: this.pack.name,
        policy: options.policy ?? this._settings.eliminationPolicy ?? this.pack.manifest.elimination_policy,
        problemOnly: options.problemOnly ?? false,
      },
      this._clock
    )
    this._registry.register(handle)
    this._eventBus.emit('session:started', { sessionId: handle.id, statement: trimmed, pack: this.pack.name })
    logger.info({ sessionId: handle.id, threshold, policy: handle.policy, problemOnly: handle.problemOnly }, 'Session started')

    return { sessionId: handle.id, done: this._run(handle) }
  }

  cancel(sessionId: string): SessionDocument {
    const handle = this._registry.get(sessionId)
    if (this._committing.has(sessionId)) {
      logger.info({ sessionId }, 'Cancel ignored: report artifact already being written')
    } else if (!handle.isTerminal) {
      handle.setFailure({ stage: null, kind: 'cancelled', message: 'Cancelled by caller' })
      this._transition(handle, 'CANCELLED')
      logger.info({ sessionId }, 'Session cancelled')
    }
    return handle.snapshot()
  }

  getSession(sessionId: string): SessionDocument | undefined {
    return this._registry.find(sessionId)?.snapshot()
  }

  // -------------------------------------------------------------------------
  // Session run
  // -------------------------------------------------------------------------

  private async _run(handle: SessionHandle): Promise<SessionDocument> {
    const log = childLogger(logger, { sessionId: handle.id })
    try {
      await this._persistState(handle)
      await this._lookupSimilar(handle, log)

      // Phase 1: problem validation
      await this._advance(handle, 'PHASE1_RUNNING')
      const phase1 = await this._runGroup(handle, 'problem')
      const problemScore = scoreProblem(collectCriteria('problem', this._groupScores(handle, 'problem')))
      await this._recordScore(handle, 'problem', problemScore)
      await this._advance(handle, 'PHASE1_SCORED')

      const bar = this._settings.eliminationBar ?? this.pack.eliminationBar(handle.threshold)
      const eliminated = shouldEliminate(problemScore, bar)
      await this._recordDecision(handle, problemScore, bar, eliminated)
      if (eliminated) {
        handle.markEliminated('problem')
        await this._advance(handle, 'ELIMINATED')
        log.info({ problemScore, bar }, 'Eliminated after problem phase')
      }

      let verdict: Verdict
      if (eliminated && (handle.policy === 'early' || handle.problemOnly)) {
        await this._recordScore(handle, 'combined', combineScores(problemScore, null))
        verdict = 'FAIL'
      } else if (handle.problemOnly) {
        if (isCancelled(handle)) throw new HaltRun()
        handle.markPassed()
        verdict = 'PASS'
      } else {
        // Phase 2: solution validation, after Phase 1 records are readable
        if (eliminated) handle.markSolutionAfterElimination()
        await this._ensureVisible(handle, phase1.receipts, 'problem')
        await this._advance(handle, 'PHASE2_RUNNING')
        const phase2 = await this._runGroup(handle, 'solution')
        await this._ensureVisible(handle, phase2.receipts, 'solution')

        const solutionScore = scoreSolution(collectCriteria('solution', this._groupScores(handle, 'solution')))
        await this._recordScore(handle, 'solution', solutionScore)
        const combined = combineScores(problemScore, solutionScore)
        await this._recordScore(handle, 'combined', combined)
        verdict = eliminated ? 'FAIL' : decideVerdict(combined, handle.threshold)
        await this._advance(handle, 'PHASE2_SCORED')
        if (verdict === 'PASS') handle.markPassed()
      }
      handle.setVerdict(verdict)

      // Reporting always runs
      await this._advance(handle, 'REPORTING')
      await this._runGroup(handle, 'report')
      await this._completeWithReport(handle)
    } catch (err) {
      if (!(err instanceof HaltRun)) {
        if (handle.isTerminal) {
          log.error({ err: errorMessage(err) }, 'Error after session reached a terminal state')
        } else {
          this._fail(handle, { stage: null, kind: classifyRunError(err), message: errorMessage(err) })
        }
      }
    }

    return this._finish(handle, log)
  }

  private async _runGroup(handle: SessionHandle, group: StageGroup): Promise<GroupRunResult> {
    const notPassed = handle.eliminated || handle.verdict === 'FAIL'
    const stages = this.pack
      .getStages(group)
      .filter((stage) => stage.run_when === 'always' || notPassed)

    const stageOptions: StageRunOptions =
      group === 'report'
        ? {
            instructions: notPassed ? ALTERNATIVE_DIRECTIONS_INSTRUCTION : '',
            decision: describeOutcome(handle.snapshot()),
          }
        : {}

    const result = await runStageGroup(stages, handle, {
      runStage: (stage: StageDefinition) => this._runner.run(stage, handle, stageOptions),
      isCancelled: () => isCancelled(handle),
    })

    for (const stage of result.degraded) {
      handle.addDegradedStage(stage)
    }
    if (isCancelled(handle)) {
      throw new HaltRun()
    }
    if (result.failure !== null) {
      this._fail(handle, result.failure)
      throw new HaltRun()
    }
    return result
  }

  /** Score maps of the completed stages of a group, in scheduling order */
  private _groupScores(handle: SessionHandle, group: StageGroup): Array<Readonly<Record<string, number>>> {
    const names = new Set(this.pack.getStages(group).map((s) => s.name))
    return handle.phaseNames
      .filter((name) => names.has(name))
      .map((name) => handle.phase(name))
      .flatMap((record) => (record?.status === 'complete' && record.output !== null ? [record.output.scores] : []))
  }

  /**
   * @throws {ContextStoreError} when the records are still not readable after the visibility timeout
   */
  private async _ensureVisible(handle: SessionHandle, receipts: WriteReceipt[], group: StageGroup): Promise<void> {
    const visibility = await awaitVisible(this._store, receipts, this._settings.visibility)
    if (visibility.state === 'pending') {
      this._fail(handle, {
        stage: null,
        kind: 'store',
        message: `Stage outputs of the ${group} phase not visible after ${String(this._settings.visibility.timeoutMs)}ms (${String(visibility.missing.length)} missing)`,
      })
      throw new HaltRun()
    }
  }

  private async _lookupSimilar(handle: SessionHandle, log: Logger): Promise<void> {
    if (this._similarity === undefined) return
    try {
      const matches = await this._similarity.findSimilar(handle.statement, {
        threshold: this._settings.similarity.threshold,
        limit: this._settings.similarity.limit,
        excludeSessionId: handle.id,
      })
      if (matches.length === 0) return
      handle.setSimilarSessions(
        matches.map((m) => ({ session_id: m.sessionId, statement: m.statement, similarity: m.similarity, status: m.status }))
      )
      this._eventBus.emit('session:similar', { sessionId: handle.id, matches })
      log.info({ matches: matches.length }, 'Similar past sessions found')
    } catch (err) {
      // Advisory only
      log.warn({ err: errorMessage(err) }, 'Similarity lookup failed')
    }
  }

  private async _recordScore(handle: SessionHandle, bucket: 'problem' | 'solution' | 'combined', score: number): Promise<void> {
    handle.setScore(bucket, score)
    this._eventBus.emit('session:scored', { sessionId: handle.id, bucket, score })
    await this._store.write(ORCHESTRATOR_SCOPE, `${bucket} score ${score.toFixed(2)}`, {
      type: 'scoring_decision',
      session_id: handle.id,
      bucket,
      score,
    })
  }

  private async _recordDecision(handle: SessionHandle, problemScore: number, bar: number, eliminated: boolean): Promise<void> {
    const decision = eliminated ? 'eliminate' : 'continue'
    await this._store.write(
      ORCHESTRATOR_SCOPE,
      `problem score ${problemScore.toFixed(2)} against bar ${bar.toFixed(1)}: ${decision}`,
      { type: 'scoring_decision', session_id: handle.id, bucket: 'decision', score: problemScore, bar, decision }
    )
  }

  /**
   * Write the artifact and complete the session. The artifact carries the
   * final view: status complete and the artifact name already set. Once the
   * write has started the session can no longer be cancelled.
   */
  private async _completeWithReport(handle: SessionHandle): Promise<void> {
    if (isCancelled(handle)) {
      throw new HaltRun()
    }
    const finalView = handle.snapshot()
    finalView.status = 'complete'
    finalView.pipeline_state = 'COMPLETE'
    finalView.report_artifact = artifactName(finalView)

    this._committing.add(handle.id)
    try {
      const artifact = await this._reportSink.write(finalView)
      handle.setReportArtifact(artifact.name)
      await this._store.write(ORCHESTRATOR_SCOPE, artifact.location, {
        type: 'report',
        session_id: handle.id,
        artifact: artifact.name,
        location: artifact.location,
      })
      this._eventBus.emit('report:written', { sessionId: handle.id, artifact: artifact.name })
      await this._advance(handle, 'COMPLETE')
    } finally {
      this._committing.delete(handle.id)
    }
  }

  // -------------------------------------------------------------------------
  // State
  // -------------------------------------------------------------------------

  private _transition(handle: SessionHandle, to: PipelineState): void {
    const { from } = handle.transition(to)
    this._eventBus.emit('session:transition', { sessionId: handle.id, from, to })
  }

  /** Transition and append the new state; halts when the session was cancelled meanwhile */
  private async _advance(handle: SessionHandle, to: PipelineState): Promise<void> {
    if (isCancelled(handle)) {
      throw new HaltRun()
    }
    this._transition(handle, to)
    if (!handle.isTerminal) {
      await this._persistState(handle)
    }
  }

  private async _persistState(handle: SessionHandle): Promise<void> {
    const doc = handle.snapshot()
    await this._store.write(ORCHESTRATOR_SCOPE, JSON.stringify(doc), {
      type: 'session_state',
      session_id: doc.session_id,
      pipeline_state: doc.pipeline_state,
      status: doc.status,
    })
  }

  private _fail(handle: SessionHandle, failure: SessionFailure): void {
    if (handle.isTerminal) return
    handle.setFailure(failure)
    this._transition(handle, 'FAILED')
    logger.warn({ sessionId: handle.id, ...failure }, 'Session failed')
  }

  /**
   * Append the terminal state and the outcome, then notify. Store errors here
   * cannot change the outcome any more and are logged.
   */
  private async _finish(handle: SessionHandle, log: Logger): Promise<SessionDocument> {
    const doc = handle.snapshot()

    try {
      await this._persistState(handle)
      await this._store.write(ORCHESTRATOR_SCOPE, doc.input_statement, outcomeMetadata(doc))
    } catch (err) {
      log.error({ err: errorMessage(err) }, 'Failed to append final session records')
    }

    this._eventBus.emit('session:finished', {
      sessionId: doc.session_id,
      status: doc.status,
      verdict: doc.verdict,
      failureKind: doc.failure?.kind ?? null,
    })
    log.info({ status: doc.status, verdict: doc.verdict, scores: doc.scores }, 'Session finished')

    if (doc.status === 'complete') {
      await this._notify(doc, log)
    }
    return doc
  }

  private async _notify(doc: SessionDocument, log: Logger): Promise<void> {
    try {
      const receipt = await this._notifier.send(buildNotification(doc, compileReport(doc)))
      log.debug({ channel: receipt.channel, messages: receipt.messageIds.length }, 'Notification delivered')
    } catch (err) {
      const message = errorMessage(err)
      log.warn({ err: message }, 'Notification failed')
      this._eventBus.emit('notify:failed', { sessionId: doc.session_id, error: message })
    }
  }
}

export function createPipelineOrchestrator(deps: PipelineOrchestratorDeps): PipelineOrchestrator {
  return new PipelineOrchestratorImpl(deps)
}
