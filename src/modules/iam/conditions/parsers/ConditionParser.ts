import type { Request } from "express";
import type { ConditionScalar } from "../ConditionOperators";

/**
 * The part of an incoming request attribute parsers read.
 * An Express Request satisfies it.
 */
export type ConditionRequest = Pick<Request, "headers"> & {
  socket: { remoteAddress?: string };
};

/**
 * Produces the single scalar value of one condition key for a request
 */
export interface ConditionParser {
  parseCondition(request: ConditionRequest): ConditionScalar;
}

/**
 * Read a header as one string; repeated headers yield their first value
 */
export function headerValue(
  request: ConditionRequest,
  name: string,
): string | undefined {
  const value = request.headers[name.toLowerCase()];
  if (Array.isArray(value)) {
    return value[0];
  }
  return value;
}
