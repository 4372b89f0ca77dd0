export type { EvaluateOptions, PipelineOrchestrator, StartedSession } from './orchestrator.js'
export {
  PipelineOrchestratorImpl,
  createPipelineOrchestrator,
  classifyRunError,
  DEFAULT_ORCHESTRATOR_SETTINGS,
  ORCHESTRATOR_SCOPE,
} from './orchestrator-impl.js'
export type { OrchestratorSettings, PipelineOrchestratorDeps } from './orchestrator-impl.js'
export { runStageGroup } from './group-scheduler.js'
export type { GroupRunResult, GroupSchedulerOptions } from './group-scheduler.js'
