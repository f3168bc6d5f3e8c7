import {
  ConditionParser,
  ConditionRequest,
  headerValue,
} from "./ConditionParser";

export const X_SERVICE_NAME = "x-service-name";

/**
 * Calling service, e.g. {"iam:ServiceName": "ecs.example.com"}
 */
export class ServiceNameParser implements ConditionParser {
  parseCondition(request: ConditionRequest): string {
    return headerValue(request, X_SERVICE_NAME) ?? "";
  }
}
