/**
 * Error taxonomy for household-agents.
 *
 * Tool- and parse-level errors are folded into the reasoning trace by the agents;
 * data-level errors surface as a failed run. Every class carries a stable `code`.
 */

export class HouseholdAgentError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "HouseholdAgentError";
    Object.setPrototypeOf(this, HouseholdAgentError.prototype);
  }
}

/**
 * Remote statistics source unreachable or answered with a non-success status.
 */
export class FetchError extends HouseholdAgentError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, "FETCH_ERROR", details, { cause });
    this.name = "FetchError";
    Object.setPrototypeOf(this, FetchError.prototype);
  }
}

/**
 * Payload (or cache file) does not match the expected tabular schema.
 */
export class ParseError extends HouseholdAgentError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, "PARSE_ERROR", details, { cause });
    this.name = "ParseError";
    Object.setPrototypeOf(this, ParseError.prototype);
  }
}

export class ToolArgumentError extends HouseholdAgentError {
  constructor(message: string, details?: Record<string, unknown>, code: string = "TOOL_ARGUMENT_ERROR") {
    super(message, code, details);
    this.name = "ToolArgumentError";
    Object.setPrototypeOf(this, ToolArgumentError.prototype);
  }
}

export class ToolLookupError extends HouseholdAgentError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "TOOL_LOOKUP_ERROR", details);
    this.name = "ToolLookupError";
    Object.setPrototypeOf(this, ToolLookupError.prototype);
  }
}

export class IterationLimitExceeded extends HouseholdAgentError {
  constructor(public readonly maxIterations: number) {
    super(
      `No final answer within ${maxIterations} iterations`,
      "ITERATION_LIMIT_EXCEEDED",
      { maxIterations }
    );
    this.name = "IterationLimitExceeded";
    Object.setPrototypeOf(this, IterationLimitExceeded.prototype);
  }
}

export class TimeoutError extends HouseholdAgentError {
  constructor(message: string, public readonly timeoutMs?: number) {
    super(message, "TIMEOUT_ERROR", { timeoutMs });
    this.name = "TimeoutError";
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }
}

export type ModelErrorCode =
  | "timeout_error"
  | "network_error"
  | "rate_limit_error"
  | "server_overload"
  | "invalid_response"
  | "model_error";

export class ModelError extends HouseholdAgentError {
  constructor(
    message: string,
    public readonly modelId: string,
    public readonly reason: ModelErrorCode = "model_error",
    cause?: unknown
  ) {
    super(message, reason, { modelId }, { cause });
    this.name = "ModelError";
    Object.setPrototypeOf(this, ModelError.prototype);
  }
}

export class ConfigError extends HouseholdAgentError {
  constructor(message: string, public readonly field?: string, cause?: unknown) {
    super(message, "CONFIG_ERROR", { field }, { cause });
    this.name = "ConfigError";
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
