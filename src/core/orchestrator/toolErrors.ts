/** Model typed error categories raised across the orchestration boundaries. */
export type OrchestratorErrorKind =
  | 'unknown_tool'
  | 'duplicate_tool'
  | 'schema_validation'
  | 'dangerous_pattern'
  | 'tool_banned'
  | 'execution_timeout'
  | 'tool_execution'
  | 'retry_exhausted'
  | 'output_validation'
  | 'all_strategies_failed'
  | 'step_failure'
  | 'plan_failure'
  | 'collaborator_contract';

/** Base for every tagged orchestration error. Branching reads `kind`, not `instanceof`. */
export abstract class OrchestratorError extends Error {
  abstract readonly kind: OrchestratorErrorKind;
}

/** Signal that a step named a tool the registry does not know. */
export class UnknownToolError extends OrchestratorError {
  readonly kind = 'unknown_tool' as const;

  constructor(readonly toolName: string, knownTools: string[] = []) {
    super(`Unknown tool: "${toolName}". Registered tools: ${knownTools.join(', ') || 'none'}`);
    this.name = 'UnknownToolError';
  }
}

/** Signal that a tool name was registered twice. */
export class DuplicateToolError extends OrchestratorError {
  readonly kind = 'duplicate_tool' as const;

  constructor(readonly toolName: string) {
    super(`Tool "${toolName}" is already registered`);
    this.name = 'DuplicateToolError';
  }
}

/**
 * Signal that tool input failed field-constraint validation.
 *
 * @param issues - One entry per failing field, formatted `field: reason`.
 */
export class SchemaValidationError extends OrchestratorError {
  readonly kind = 'schema_validation' as const;

  constructor(readonly toolName: string, readonly issues: string[]) {
    super(`Invalid arguments for tool "${toolName}": ${issues.join('; ')}`);
    this.name = 'SchemaValidationError';
  }
}

/** Signal that a string argument matched the dangerous-pattern deny-list. */
export class DangerousPatternError extends OrchestratorError {
  readonly kind = 'dangerous_pattern' as const;

  constructor(readonly toolName: string, readonly field: string, readonly pattern: string) {
    super(`Argument "${field}" for tool "${toolName}" matches blocked pattern "${pattern}"`);
    this.name = 'DangerousPatternError';
  }
}

/** Signal that a step named a tool the session has banned. */
export class ToolBannedError extends OrchestratorError {
  readonly kind = 'tool_banned' as const;

  constructor(readonly toolName: string) {
    super(`Tool "${toolName}" is banned for this session after repeated failures`);
    this.name = 'ToolBannedError';
  }
}

/** Signal that a tool did not complete before its deadline. */
export class ExecutionTimeoutError extends OrchestratorError {
  readonly kind = 'execution_timeout' as const;

  constructor(readonly toolName: string, readonly timeoutMs: number) {
    super(`Tool "${toolName}" timed out after ${timeoutMs}ms`);
    this.name = 'ExecutionTimeoutError';
  }
}

/**
 * Signal that a tool failed during execution. Tools throw this with `retryable: false`
 * to stop the executor from retrying; any other thrown error counts as transient.
 */
export class ToolExecutionError extends OrchestratorError {
  readonly kind = 'tool_execution' as const;
  readonly retryable: boolean;

  constructor(readonly toolName: string, message: string, options: { retryable?: boolean; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'ToolExecutionError';
    this.retryable = options.retryable ?? true;
  }
}

/** Signal that every allowed attempt of a tool failed transiently. */
export class RetryExhaustedError extends OrchestratorError {
  readonly kind = 'retry_exhausted' as const;

  constructor(
    readonly toolName: string,
    readonly attempts: number,
    readonly lastError: ExecutionTimeoutError | ToolExecutionError,
    readonly attemptErrors: ReadonlyArray<ExecutionTimeoutError | ToolExecutionError>,
  ) {
    super(`Tool "${toolName}" failed after ${attempts} attempts: ${lastError.message}`, { cause: lastError });
    this.name = 'RetryExhaustedError';
  }
}

/** Signal that a tool returned a payload violating its output constraints. */
export class OutputValidationError extends OrchestratorError {
  readonly kind = 'output_validation' as const;

  constructor(readonly toolName: string, readonly issues: string[]) {
    super(`Invalid output from tool "${toolName}": ${issues.join('; ')}`);
    this.name = 'OutputValidationError';
  }
}

/** One failed strategy inside an aggregated strategy failure. */
export interface StrategyFailure {
  strategy: string;
  error: Error;
}

/** Signal that no strategy produced a usable result for a step. */
export class AllStrategiesFailedError extends OrchestratorError {
  readonly kind = 'all_strategies_failed' as const;

  constructor(readonly stepId: string, readonly failures: StrategyFailure[]) {
    super(
      `All strategies failed for step ${stepId}: ${failures
        .map((failure) => `${failure.strategy}: ${failure.error.message}`)
        .join('; ')}`,
    );
    this.name = 'AllStrategiesFailedError';
  }
}

/** Signal that the critic rejected a step result. */
export class StepFailureError extends OrchestratorError {
  readonly kind = 'step_failure' as const;

  constructor(readonly stepId: string, readonly issues: string[]) {
    super(`Step ${stepId} was rejected${issues.length > 0 ? `: ${issues.join('; ')}` : ''}`);
    this.name = 'StepFailureError';
  }
}

/** Signal that the session exhausted its budgets or hit a hard failure. */
export class PlanFailureError extends OrchestratorError {
  readonly kind = 'plan_failure' as const;

  constructor(readonly reason: string, cause?: unknown) {
    super(reason, { cause });
    this.name = 'PlanFailureError';
  }
}

/** Signal that a collaborator returned a value outside its contract. */
export class CollaboratorContractError extends OrchestratorError {
  readonly kind = 'collaborator_contract' as const;

  constructor(readonly collaborator: string, readonly issues: string[]) {
    super(`${collaborator} violated its contract: ${issues.join('; ')}`);
    this.name = 'CollaboratorContractError';
  }
}

/** Errors the Safe Executor can return for one tool call. */
export type ToolCallError =
  | UnknownToolError
  | SchemaValidationError
  | DangerousPatternError
  | ToolBannedError
  | ExecutionTimeoutError
  | ToolExecutionError
  | RetryExhaustedError
  | OutputValidationError;

/** Errors the Parallel Strategy Executor can return for one step. */
export type StrategyRunError = ToolCallError | AllStrategiesFailedError;

/** Describe an unknown thrown value as an Error. */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(String(value));
}
