/**
 * Condition key parsers
 *
 * Each condition key maps to a parser that extracts its value from a request.
 */

import { ConditionParser, ConditionRequest } from "./ConditionParser";
import { CurrentTimeParser } from "./CurrentTimeParser";
import { ServiceNameParser } from "./ServiceNameParser";
import { SourceIpParser } from "./SourceIpParser";
import type { ConditionContext } from "../schemas";

export const SOURCE_IP_KEY = "inf:SourceIP";
export const CURRENT_TIME_KEY = "inf:CurrentTime";
export const SERVICE_NAME_KEY = "iam:ServiceName";

export const CONDITION_KEY_MAP: Readonly<Record<string, ConditionParser>> = {
  [SOURCE_IP_KEY]: new SourceIpParser(),
  [CURRENT_TIME_KEY]: new CurrentTimeParser(),
  [SERVICE_NAME_KEY]: new ServiceNameParser(),
};

/**
 * Build the condition context of a request from a set of parsers
 */
export function buildConditionContext(
  request: ConditionRequest,
  parsers: Readonly<Record<string, ConditionParser>> = CONDITION_KEY_MAP,
): ConditionContext {
  const context: ConditionContext = {};
  for (const [key, parser] of Object.entries(parsers)) {
    context[key] = parser.parseCondition(request);
  }
  return context;
}

export { headerValue } from "./ConditionParser";
export type { ConditionParser, ConditionRequest } from "./ConditionParser";
export {
  SourceIpParser,
  X_CLIENT_IP,
  X_REAL_IP,
  X_FORWARDED_FOR,
} from "./SourceIpParser";
export { CurrentTimeParser } from "./CurrentTimeParser";
export type { Clock } from "./CurrentTimeParser";
export { ServiceNameParser, X_SERVICE_NAME } from "./ServiceNameParser";
