/**
 * Error codes for automaton construction and configuration.
 * Every code describes a failure detected before the first generation;
 * stepping itself never produces one.
 */
export type AutomatonErrorCode =
  | "CONFIG_INVALID"
  | "RULE_STATE_INVALID"
  | "RULE_COUNT_OUT_OF_RANGE"
  | "RULE_NEIGHBORHOOD_MISMATCH"
  | "RULESTRING_INVALID"
  | "GRID_DIMENSION_INVALID"
  | "GRID_SIZE_MISMATCH"
  | "GRID_STATE_INVALID"
  | "STRATEGY_NOT_FOUND";

/**
 * Unified error type for the automaton packages.
 *
 * @example
 * ```typescript
 * throw new AutomatonError(
 *   "RULE_NEIGHBORHOOD_MISMATCH",
 *   "Von Neumann neighborhoods have at most 4 neighbors",
 *   { field: "birth", counts: [5, 6] },
 * );
 * ```
 */
export class AutomatonError extends Error {
  readonly name = "AutomatonError";

  constructor(
    public readonly code: AutomatonErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    // Maintains proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AutomatonError);
    }
  }

  static configInvalid(
    message: string,
    details?: Record<string, unknown>,
  ): AutomatonError {
    return new AutomatonError("CONFIG_INVALID", message, details);
  }

  static ruleInvalid(
    code: Extract<
      AutomatonErrorCode,
      | "RULE_STATE_INVALID"
      | "RULE_COUNT_OUT_OF_RANGE"
      | "RULE_NEIGHBORHOOD_MISMATCH"
      | "RULESTRING_INVALID"
    >,
    message: string,
    details?: Record<string, unknown>,
  ): AutomatonError {
    return new AutomatonError(code, message, details);
  }

  static gridInvalid(
    code: Extract<
      AutomatonErrorCode,
      "GRID_DIMENSION_INVALID" | "GRID_SIZE_MISMATCH" | "GRID_STATE_INVALID"
    >,
    message: string,
    details?: Record<string, unknown>,
  ): AutomatonError {
    return new AutomatonError(code, message, details);
  }

  static strategyNotFound(name: string): AutomatonError {
    return new AutomatonError(
      "STRATEGY_NOT_FOUND",
      `Unknown stepping strategy: ${name}`,
      { name },
    );
  }

  /**
   * Check if an unknown error is an AutomatonError.
   */
  static isAutomatonError(error: unknown): error is AutomatonError {
    return error instanceof AutomatonError;
  }

  /**
   * Convert to a plain object for serialization.
   */
  toJSON(): {
    name: string;
    code: AutomatonErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}
