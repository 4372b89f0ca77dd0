/**
 * Error definitions for idea-gauntlet
 * Provides one structured error hierarchy for pipeline, store and scoring failures
 */

/** Base error class for all gauntlet errors */
export class GauntletError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'GauntletError'
    this.code = code
    this.context = context
    Error.captureStackTrace(this, GauntletError)
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Error thrown when configuration is missing or invalid */
export class ConfigError extends GauntletError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** Error thrown when a pipeline pack cannot be loaded or fails validation */
export class PipelineDefinitionError extends GauntletError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'PIPELINE_DEFINITION_ERROR', context)
    this.name = 'PipelineDefinitionError'
  }
}

/** Error thrown when a pipeline's stage dependencies contain a cycle */
export class StageGraphCycleError extends PipelineDefinitionError {
  constructor(cycle: string[]) {
    super(`Circular dependency detected in stage graph: ${cycle.join(' -> ')}`, {
      cycle,
    })
    this.name = 'StageGraphCycleError'
  }
}

/** Error thrown when a criterion score is not a number in [1, 10] */
export class ScoreValidationError extends GauntletError {
  constructor(criterion: string, value: unknown) {
    super(`Score for criterion "${criterion}" must be a number in [1, 10], got ${String(value)}`, 'SCORE_VALIDATION_ERROR', {
      criterion,
      value,
    })
    this.name = 'ScoreValidationError'
  }
}

/** Error thrown when a score bucket cannot be computed because criteria are absent */
export class MissingScoreError extends GauntletError {
  constructor(bucket: string, missing: string[]) {
    super(`Cannot compute ${bucket} score: missing criteria ${missing.join(', ')}`, 'MISSING_SCORE', {
      bucket,
      missing,
    })
    this.name = 'MissingScoreError'
  }
}

/** Error thrown when a context store read or write fails */
export class ContextStoreError extends GauntletError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONTEXT_STORE_ERROR', context)
    this.name = 'ContextStoreError'
  }
}

/** Error thrown when a context store query carries neither session_id nor type */
export class InvalidQueryFilterError extends ContextStoreError {
  constructor() {
    super('Query filter must include session_id or type')
    this.name = 'InvalidQueryFilterError'
  }
}

/** Error thrown when the reasoning capability fails */
export class CapabilityError extends GauntletError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CAPABILITY_ERROR', context)
    this.name = 'CapabilityError'
  }
}

/** Error thrown when a stage exceeds its time budget */
export class StageTimeoutError extends GauntletError {
  constructor(stage: string, timeoutMs: number) {
    super(`Stage "${stage}" timed out after ${String(timeoutMs)}ms`, 'STAGE_TIMEOUT', {
      stage,
      timeoutMs,
    })
    this.name = 'StageTimeoutError'
  }
}

/** Error thrown when stage output is missing, malformed or lacks required scores */
export class StageOutputError extends GauntletError {
  constructor(stage: string, message: string, context: Record<string, unknown> = {}) {
    super(`Stage "${stage}" produced invalid output: ${message}`, 'STAGE_OUTPUT_ERROR', {
      stage,
      ...context,
    })
    this.name = 'StageOutputError'
  }
}

/** Error thrown when a state machine transition is not allowed */
export class InvalidTransitionError extends GauntletError {
  constructor(from: string, to: string) {
    super(`Invalid pipeline transition: ${from} -> ${to}`, 'INVALID_TRANSITION', {
      from,
      to,
    })
    this.name = 'InvalidTransitionError'
  }
}

/** Error thrown when a session id is unknown */
export class SessionNotFoundError extends GauntletError {
  constructor(sessionId: string) {
    super(`Session not found: ${sessionId}`, 'SESSION_NOT_FOUND', { sessionId })
    this.name = 'SessionNotFoundError'
  }
}

/** Error thrown when an evaluation request is rejected before a session starts */
export class InvalidInputError extends GauntletError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'INVALID_INPUT', context)
    this.name = 'InvalidInputError'
  }
}

/** Error thrown when a report artifact cannot be written */
export class ReportError extends GauntletError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'REPORT_ERROR', context)
    this.name = 'ReportError'
  }
}

/** Error thrown when a notification cannot be delivered */
export class NotificationError extends GauntletError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'NOTIFICATION_ERROR', context)
    this.name = 'NotificationError'
  }
}

/** Render any thrown value as a message string */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
