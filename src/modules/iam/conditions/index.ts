/**
 * Conditions Module Index
 *
 * Exports the pattern matcher and condition evaluation components.
 */

export {
  ConditionEvaluator,
  resolveCondition,
  toDecodedContext,
} from "./ConditionEvaluator";
export type {
  DecodedCondition,
  DecodedConditionBlock,
  DecodedContext,
} from "./ConditionEvaluator";
export {
  ConditionOperatorName,
  CONDITION_OPERATORS,
  applyOperator,
  getOperator,
  hasOperator,
  getAllOperatorNames,
  ipMatches,
  parseIPAddress,
  parseIPCondition,
  parseRfc3339,
  toBoolean,
  toInteger,
} from "./ConditionOperators";
export type {
  ConditionOperator,
  ConditionOperatorKind,
  ConditionScalar,
  IPAddress,
  IPCondition,
} from "./ConditionOperators";
export { conditionScalarSchema, conditionValuesSchema } from "./schemas";
export type { Condition, ConditionContext, ConditionValue } from "./schemas";
export {
  CompiledPattern,
  compileRegex,
  compileWildcardRegex,
  delimiterIndices,
  quoteMeta,
} from "./RegexCompiler";
export type { CompileOptions } from "./RegexCompiler";
export { WildcardMatcher } from "./WildcardMatcher";
export type { WildcardMatcherOptions } from "./WildcardMatcher";
export * from "./parsers";
