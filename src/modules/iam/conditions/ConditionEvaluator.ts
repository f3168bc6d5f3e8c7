/**
 * Condition Evaluator for ABAC Policy Engine
 *
 * Decides whether a set of request attributes satisfies a policy's
 * declared conditions.
 *
 * Evaluation is fail-closed: an unknown operator, a missing attribute or a
 * failed comparison resolves to false. Only undecodable input is an error.
 */

import { ZodError } from "zod";
import {
  ConditionOperator,
  ConditionScalar,
  applyOperator,
  getOperator,
} from "./ConditionOperators";
import {
  Condition,
  ConditionContext,
  conditionScalarSchema,
  conditionValuesSchema,
} from "./schemas";
import {
  ConditionDecodeError,
  ConditionDecodeIssue,
  ConditionInputSource,
} from "../errors";
import { logger } from "../../../shared/logger";

// ============================================================================
// Interfaces
// ============================================================================

/**
 * Attribute name to value, keyed by the document's own keys
 */
export type DecodedContext = ReadonlyMap<string, ConditionScalar>;

/**
 * One operator block of a condition with its operator resolved
 */
export interface DecodedConditionBlock {
  /** Operator name as written in the policy */
  operatorName: string;
  /** Resolved operator; undefined when the name is not a known operator */
  operator: ConditionOperator | undefined;
  /** Attribute name and acceptable values, in document order */
  values: ReadonlyArray<readonly [string, string[]]>;
}

export type DecodedCondition = DecodedConditionBlock[];

type DecodePath = (string | number)[];

/**
 * Resolve every operator name of a condition once, ahead of evaluation
 */
export function resolveCondition(condition: Condition): DecodedCondition {
  return Object.entries(condition).map(([operatorName, values]) => ({
    operatorName,
    operator: getOperator(operatorName),
    values: Object.entries(values),
  }));
}

export function toDecodedContext(context: ConditionContext): DecodedContext {
  return new Map(Object.entries(context));
}

function describeValue(value: unknown): string {
  if (value === null) {
    return "null";
  }
  return Array.isArray(value) ? "array" : typeof value;
}

/**
 * Own enumerable entries of a JSON object. Reports an issue and yields
 * nothing for any other value.
 */
function objectEntries(
  value: unknown,
  path: DecodePath,
  issues: ConditionDecodeIssue[],
): [string, unknown][] {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    issues.push({
      path,
      message: `Expected object, received ${describeValue(value)}`,
    });
    return [];
  }
  return Object.entries(value);
}

function zodIssues(error: ZodError, prefix: DecodePath): ConditionDecodeIssue[] {
  return error.issues.map((issue) => ({
    path: [...prefix, ...issue.path],
    message: issue.message,
  }));
}

// ============================================================================
// Condition Evaluator Class
// ============================================================================

/**
 * ConditionEvaluator
 *
 * Stateless; one instance can serve any number of concurrent callers.
 */
export class ConditionEvaluator {
  /**
   * Evaluate JSON-encoded conditions against a JSON-encoded context.
   *
   * @param contextJson - {"<attributeName>": <scalar>, ...}
   * @param conditionJson - {"<Operator>": {"<attributeName>": ["<value>", ...]}, ...}
   * @throws ConditionDecodeError when either input cannot be decoded
   */
  evaluateConditions(contextJson: string, conditionJson: string): boolean {
    const condition = this.decodeCondition(conditionJson);
    const context = this.decodeContext(contextJson);
    return this.evaluateDecoded(context, condition);
  }

  /**
   * Evaluate already-decoded conditions against a context
   */
  evaluate(context: ConditionContext, condition: Condition): boolean {
    return this.evaluateDecoded(
      toDecodedContext(context),
      resolveCondition(condition),
    );
  }

  /**
   * Decode and validate a context document
   */
  decodeContext(json: string): DecodedContext {
    const document = this.parse(json, "context");
    const issues: ConditionDecodeIssue[] = [];
    const context = new Map<string, ConditionScalar>();

    for (const [key, value] of objectEntries(document, [], issues)) {
      const result = conditionScalarSchema.safeParse(value);
      if (result.success) {
        context.set(key, result.data);
      } else {
        issues.push(...zodIssues(result.error, [key]));
      }
    }

    this.assertValid("context", issues);
    return context;
  }

  /**
   * Decode a condition document and resolve its operators
   */
  decodeCondition(json: string): DecodedCondition {
    const document = this.parse(json, "condition");
    const issues: ConditionDecodeIssue[] = [];
    const condition: DecodedCondition = [];

    for (const [operatorName, block] of objectEntries(document, [], issues)) {
      const values: [string, string[]][] = [];
      for (const [key, list] of objectEntries(block, [operatorName], issues)) {
        const result = conditionValuesSchema.safeParse(list);
        if (result.success) {
          values.push([key, result.data]);
        } else {
          issues.push(...zodIssues(result.error, [operatorName, key]));
        }
      }
      condition.push({
        operatorName,
        operator: getOperator(operatorName),
        values,
      });
    }

    this.assertValid("condition", issues);
    return condition;
  }

  /**
   * AND across operator blocks and attributes, OR across each value list.
   */
  evaluateDecoded(
    context: DecodedContext,
    condition: DecodedCondition,
  ): boolean {
    for (const { operatorName, operator, values } of condition) {
      if (!operator) {
        logger.logDecision("condition", false, {
          operator: operatorName,
          reason: "unknown operator",
        });
        return false;
      }

      for (const [key, expected] of values) {
        const actual = context.get(key);
        if (actual === undefined) {
          logger.logDecision("condition", false, {
            operator: operatorName,
            key,
            reason: "attribute missing from context",
          });
          return false;
        }

        if (!applyOperator(operator, actual, expected)) {
          logger.logDecision("condition", false, {
            operator: operatorName,
            key,
            reason: "no acceptable value matched",
          });
          return false;
        }
      }
    }

    logger.logDecision("condition", true);
    return true;
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private parse(json: string, source: ConditionInputSource): unknown {
    try {
      return JSON.parse(json);
    } catch (error) {
      throw new ConditionDecodeError(
        source,
        error instanceof Error ? error.message : String(error),
        [],
        error,
      );
    }
  }

  private assertValid(
    source: ConditionInputSource,
    issues: ConditionDecodeIssue[],
  ): void {
    if (issues.length > 0) {
      throw new ConditionDecodeError(
        source,
        "document does not match the expected shape",
        issues,
      );
    }
  }
}

export { ConditionEvaluator as default };
