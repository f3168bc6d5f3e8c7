/**
 * Errors Module Index
 */

export {
  PolicyError,
  PolicyErrorCode,
  ValidationError,
  PatternSyntaxError,
  MatchTimeoutError,
  ConditionDecodeError,
} from "./PolicyError";
export type {
  ConditionInputSource,
  ConditionDecodeIssue,
} from "./PolicyError";
