/**
 * Composition root for CLI commands.
 *
 * createRuntime():
 *  1. Registers the database service and opens it (migrations included)
 *  2. Wraps the SQLite context store in the retrying decorator
 *  3. Builds the history service, capability, report sink and notifier
 *  4. Hands out orchestrators bound to a loaded pipeline pack
 *
 * Commands call `shutdown()` when done; it closes services in reverse order.
 */

import { ServiceRegistry } from '../core/di.js'
import { createEventBus } from '../core/event-bus.js'
import type { TypedEventBus } from '../core/event-bus.js'
import type { GauntletConfig } from '../modules/config/config-schema.js'
import { ResilientContextStore } from '../modules/context-store/resilient-context-store.js'
import { SqliteContextStore } from '../modules/context-store/sqlite-context-store.js'
import type { ContextStore } from '../modules/context-store/context-store.js'
import { createHistoryService } from '../modules/history/history-service.js'
import type { HistoryService } from '../modules/history/history-service.js'
import { createNotifier } from '../modules/notify/notifier-factory.js'
import type { Notifier } from '../modules/notify/types.js'
import { createPipelineOrchestrator } from '../modules/orchestrator/orchestrator-impl.js'
import type { PipelineOrchestrator } from '../modules/orchestrator/orchestrator.js'
import { createPackLoader, resolvePackPath } from '../modules/pipeline-pack/pack-loader.js'
import { PipelinePack } from '../modules/pipeline-pack/pipeline-pack.js'
import { createClaudeCliCapability } from '../modules/reasoning/claude-cli-capability.js'
import type { ReasoningCapability } from '../modules/reasoning/types.js'
import { FileReportSink } from '../modules/report/report-sink.js'
import type { ReportSink } from '../modules/report/report-sink.js'
import { StoreSimilaritySearch } from '../modules/similarity/similarity-search.js'
import { createDatabaseService } from '../persistence/database.js'
import { createLogger, setLogLevel } from '../utils/logger.js'

const logger = createLogger('runtime')

export interface RuntimeOverrides {
  /** Replaces the configured capability (tests, alternative adapters) */
  capability?: ReasoningCapability
  notifier?: Notifier
  reportSink?: ReportSink
  /** Pack directory holding built-in packs, for bare pack names */
  packsDir?: string
}

export interface Runtime {
  readonly config: GauntletConfig
  readonly eventBus: TypedEventBus
  readonly store: ContextStore
  readonly history: HistoryService

  /** Load a pack by built-in name or path, applying the configured stage timeout */
  loadPack(ref?: string): Promise<PipelinePack>

  /**
   * Orchestrator over `pack`.
   * @throws {ConfigError} when the notifier configuration is unusable
   */
  createOrchestrator(pack: PipelinePack, reportDir?: string): PipelineOrchestrator

  shutdown(): Promise<void>
}

class RuntimeImpl implements Runtime {
  readonly eventBus: TypedEventBus
  readonly store: ContextStore
  readonly history: HistoryService
  private readonly _similarity: StoreSimilaritySearch

  constructor(
    readonly config: GauntletConfig,
    private readonly _registry: ServiceRegistry,
    store: ContextStore,
    private readonly _overrides: RuntimeOverrides
  ) {
    this.eventBus = createEventBus()
    this.store = store
    this._similarity = new StoreSimilaritySearch(store)
    this.history = createHistoryService(store, this._similarity)
  }

  async loadPack(ref: string = this.config.pipeline.pack): Promise<PipelinePack> {
    const pack = await createPackLoader().load(resolvePackPath(ref, this._overrides.packsDir))
    const timeout = this.config.pipeline.stage_timeout_ms
    return timeout === undefined ? pack : new PipelinePack({ ...pack.manifest, stage_timeout_ms: timeout }, pack.path)
  }

  createOrchestrator(pack: PipelinePack, reportDir: string = this.config.report.output_dir): PipelineOrchestrator {
    const { pipeline, store, capability, similarity, notify } = this.config
    return createPipelineOrchestrator({
      pack,
      capability:
        this._overrides.capability ??
        createClaudeCliCapability({
          binary: capability.binary,
          ...(capability.model !== undefined ? { model: capability.model } : {}),
          ...(capability.max_turns !== undefined ? { maxTurns: capability.max_turns } : {}),
        }),
      store: this.store,
      eventBus: this.eventBus,
      reportSink: this._overrides.reportSink ?? new FileReportSink(reportDir),
      notifier: this._overrides.notifier ?? createNotifier(notify),
      similarity: this._similarity,
      settings: {
        ...(pipeline.threshold !== undefined ? { threshold: pipeline.threshold } : {}),
        ...(pipeline.elimination_policy !== undefined ? { eliminationPolicy: pipeline.elimination_policy } : {}),
        ...(pipeline.elimination_bar !== undefined ? { eliminationBar: pipeline.elimination_bar } : {}),
        outOfRangePolicy: pipeline.out_of_range,
        visibility: {
          timeoutMs: store.visibility.timeout_ms,
          pollIntervalMs: store.visibility.poll_interval_ms,
          maxPollIntervalMs: store.visibility.max_poll_interval_ms,
        },
        similarity: { threshold: similarity.threshold, limit: similarity.limit },
      },
    })
  }

  async shutdown(): Promise<void> {
    await this._registry.shutdownAll()
  }
}

export async function createRuntime(config: GauntletConfig, overrides: RuntimeOverrides = {}): Promise<Runtime> {
  if (process.env['LOG_LEVEL'] === undefined) {
    setLogLevel(config.log_level)
  }

  const registry = new ServiceRegistry()
  const database = createDatabaseService(config.store.database_path)
  registry.register('database', database)
  await registry.initializeAll()
  logger.debug({ databasePath: config.store.database_path }, 'Runtime initialized')

  const store = new ResilientContextStore(new SqliteContextStore(() => database.db), {
    attempts: config.store.retry.attempts,
    baseDelayMs: config.store.retry.base_delay_ms,
    maxDelayMs: config.store.retry.max_delay_ms,
  })

  return new RuntimeImpl(config, registry, store, overrides)
}
