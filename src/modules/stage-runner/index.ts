export { StageRunner, classifyStageError, formatStageRecord } from './stage-runner.js'
export type { StageRunnerDeps, StageRunOptions, StageRunResult, StageFailure } from './stage-runner.js'
export { ALTERNATIVE_DIRECTIONS_INSTRUCTION, renderTemplate, formatOutputContract } from './prompt-assembler.js'
