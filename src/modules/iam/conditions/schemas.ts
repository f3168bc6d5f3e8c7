import { z } from "zod";

// Documents are split into entries by their own keys; each schema checks
// a single value.

export const conditionScalarSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
]);

/**
 * ["<value1>", "<value2>", ...]
 */
export const conditionValuesSchema = z.array(z.string());

/**
 * {"<attributeName>": <scalar>, ...}
 */
export type ConditionContext = Record<
  string,
  z.infer<typeof conditionScalarSchema>
>;

/**
 * {"<attributeName>": ["<value1>", "<value2>", ...], ...}
 */
export type ConditionValue = Record<
  string,
  z.infer<typeof conditionValuesSchema>
>;

/**
 * {"<Operator>": {"<attributeName>": ["<value>", ...]}, ...}
 */
export type Condition = Record<string, ConditionValue>;
