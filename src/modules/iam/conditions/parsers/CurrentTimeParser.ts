import { ConditionParser } from "./ConditionParser";

export type Clock = () => Date;

/**
 * Current UTC time in RFC3339 with second precision,
 * e.g. {"inf:CurrentTime": "2024-01-10T08:30:00Z"}
 */
export class CurrentTimeParser implements ConditionParser {
  constructor(private readonly clock: Clock = () => new Date()) {}

  parseCondition(): string {
    return this.clock().toISOString().replace(/\.\d{3}Z$/, "Z");
  }
}
