/**
 * Policy Errors
 *
 * Custom error classes for the decision primitives.
 */

/**
 * Policy Error Codes
 */
export enum PolicyErrorCode {
  VALIDATION_ERROR = "VALIDATION_ERROR",
  PATTERN_SYNTAX_ERROR = "PATTERN_SYNTAX_ERROR",
  MATCH_TIMEOUT = "MATCH_TIMEOUT",
  CONDITION_DECODE_ERROR = "CONDITION_DECODE_ERROR",
}

/**
 * Base Policy Error
 */
export class PolicyError extends Error {
  constructor(
    message: string,
    public code: PolicyErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "PolicyError";
  }
}

/**
 * Validation Error
 */
export class ValidationError extends PolicyError {
  constructor(message: string) {
    super(message, PolicyErrorCode.VALIDATION_ERROR);
    this.name = "ValidationError";
  }
}

/**
 * Structural error in a pattern template (unbalanced or invalid delimiters).
 * Raised before any regex compilation takes place.
 */
export class PatternSyntaxError extends PolicyError {
  constructor(
    message: string,
    public readonly template: string,
  ) {
    super(message, PolicyErrorCode.PATTERN_SYNTAX_ERROR);
    this.name = "PatternSyntaxError";
  }
}

/**
 * Regex evaluation exceeded its time budget.
 * Distinct from a non-match: the matcher could not reach a verdict.
 */
export class MatchTimeoutError extends PolicyError {
  constructor(
    public readonly pattern: string,
    public readonly timeoutMs: number,
    cause?: unknown,
  ) {
    super(
      `Matching against "${pattern}" exceeded ${timeoutMs}ms`,
      PolicyErrorCode.MATCH_TIMEOUT,
      { cause },
    );
    this.name = "MatchTimeoutError";
  }
}

export type ConditionInputSource = "context" | "condition";

export interface ConditionDecodeIssue {
  path: (string | number)[];
  message: string;
}

/**
 * Context or condition input could not be decoded
 */
export class ConditionDecodeError extends PolicyError {
  constructor(
    public readonly source: ConditionInputSource,
    message: string,
    public readonly issues: ConditionDecodeIssue[] = [],
    cause?: unknown,
  ) {
    super(
      `Invalid ${source} input: ${message}`,
      PolicyErrorCode.CONDITION_DECODE_ERROR,
      { cause },
    );
    this.name = "ConditionDecodeError";
  }
}
