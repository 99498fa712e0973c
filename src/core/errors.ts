import type {TokenUsage} from './pricing.js'

export type ErrorCode =
  | 'duplicate_tool'
  | 'unknown_tool'
  | 'invalid_arguments'
  | 'execution_failed'
  | 'ledger_write_failed'
  | 'budget_exceeded'
  | 'timeout'
  | 'reasoning_backend'
  | 'cancelled'
  | 'session_not_found'
  | 'invalid_config'

export class CoursemateError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string, options?: {cause?: unknown}) {
    super(message, options)
    this.name = new.target.name
    this.code = code
  }
}

export class DuplicateToolError extends CoursemateError {
  constructor(readonly toolName: string) {
    super('duplicate_tool', `Tool already registered: ${toolName}`)
  }
}

export class UnknownToolError extends CoursemateError {
  constructor(readonly toolName: string) {
    super('unknown_tool', `Unknown tool: ${toolName}`)
  }
}

export class ArgumentValidationError extends CoursemateError {
  constructor(
    readonly toolName: string,
    readonly issues: string[]
  ) {
    super('invalid_arguments', `Invalid arguments for ${toolName}: ${issues.join('; ')}`)
  }
}

export class ExecutionError extends CoursemateError {
  constructor(
    readonly toolName: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super('execution_failed', message, options)
  }
}

export class LedgerWriteError extends CoursemateError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('ledger_write_failed', message, options)
  }
}

export class BudgetExceededError extends CoursemateError {
  constructor(readonly maxIterations: number) {
    super(
      'budget_exceeded',
      `Stopped after ${maxIterations} reasoning steps without a final answer. Please refine the question and retry.`
    )
  }
}

export class TimeoutError extends CoursemateError {
  constructor(message: string) {
    super('timeout', message)
  }
}

/** `usage` is set when the failed call still reported the tokens it consumed. */
export class ReasoningBackendError extends CoursemateError {
  readonly usage?: TokenUsage

  constructor(message: string, options?: {cause?: unknown; usage?: TokenUsage}) {
    super('reasoning_backend', message, {cause: options?.cause})
    this.usage = options?.usage
  }
}

export class QueryCancelledError extends CoursemateError {
  constructor() {
    super('cancelled', 'Query cancelled.')
  }
}

export class ConfigError extends CoursemateError {
  constructor(message: string) {
    super('invalid_config', message)
  }
}

export class SessionNotFoundError extends CoursemateError {
  constructor(readonly sessionId: string) {
    super('session_not_found', `Session not found: ${sessionId}`)
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
