/**
 * Condition Operators for ABAC Policy Evaluation
 *
 * Every operator is a tagged variant carrying a comparator typed for its
 * value family:
 * - string: equals, not equals, case-insensitive variants, like (substring)
 * - numeric: integer comparisons
 * - date: RFC3339 timestamp comparisons
 * - bool: boolean equality
 * - ip: IP literal equality or CIDR containment
 *
 * The context value and each acceptable value are converted to the
 * operator's type before comparing. A value list is OR-combined: one
 * acceptable value satisfying the comparator is enough.
 */

import ipaddr from "ipaddr.js";

// ============================================================================
// Operator Names
// ============================================================================

export enum ConditionOperatorName {
  StringEquals = "StringEquals",
  StringNotEquals = "StringNotEquals",
  StringEqualsIgnoreCase = "StringEqualsIgnoreCase",
  StringNotEqualsIgnoreCase = "StringNotEqualsIgnoreCase",
  StringLike = "StringLike",
  StringNotLike = "StringNotLike",

  NumericEquals = "NumericEquals",
  NumericNotEquals = "NumericNotEquals",
  NumericLessThan = "NumericLessThan",
  NumericLessThanEquals = "NumericLessThanEquals",
  NumericGreaterThan = "NumericGreaterThan",
  NumericGreaterThanEquals = "NumericGreaterThanEquals",

  DateEquals = "DateEquals",
  DateNotEquals = "DateNotEquals",
  DateLessThan = "DateLessThan",
  DateLessThanEquals = "DateLessThanEquals",
  DateGreaterThan = "DateGreaterThan",
  DateGreaterThanEquals = "DateGreaterThanEquals",

  Bool = "Bool",

  IPAddress = "IPAddress",
  NotIPAddress = "NotIPAddress",
}

// ============================================================================
// Types
// ============================================================================

/**
 * A single request attribute value
 */
export type ConditionScalar = string | number | boolean;

export type IPAddress = ipaddr.IPv4 | ipaddr.IPv6;

/**
 * An acceptable value of an IP operator, parsed
 */
export type IPCondition =
  | { type: "address"; address: IPAddress }
  | { type: "cidr"; network: IPAddress; prefixLength: number };

type Comparator<T, U = T> = (actual: T, expected: U) => boolean;

export type ConditionOperator =
  | { kind: "string"; name: ConditionOperatorName; compare: Comparator<string> }
  | { kind: "numeric"; name: ConditionOperatorName; compare: Comparator<number> }
  | {
      kind: "date";
      name: ConditionOperatorName;
      compare: Comparator<Date>;
      /** Result when either side is not a valid RFC3339 timestamp */
      whenUnparsable: boolean;
    }
  | { kind: "bool"; name: ConditionOperatorName; compare: Comparator<boolean> }
  | {
      kind: "ip";
      name: ConditionOperatorName;
      compare: Comparator<IPAddress, IPCondition>;
    };

export type ConditionOperatorKind = ConditionOperator["kind"];

// ============================================================================
// Value Conversion
// ============================================================================

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Convert to a safe integer, or null when the value is not one
 */
export function toInteger(value: ConditionScalar): number | null {
  if (typeof value === "number") {
    return Number.isSafeInteger(value) ? value : null;
  }
  if (typeof value === "string" && INTEGER_PATTERN.test(value)) {
    const parsed = Number(value);
    return Number.isSafeInteger(parsed) ? parsed : null;
  }
  return null;
}

const BOOLEAN_STRINGS: Record<string, boolean> = {
  "1": true,
  t: true,
  T: true,
  TRUE: true,
  true: true,
  True: true,
  "0": false,
  f: false,
  F: false,
  FALSE: false,
  false: false,
  False: false,
};

/**
 * Convert to a boolean, or null when the value is not one
 */
export function toBoolean(value: ConditionScalar): boolean | null {
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "string" && Object.hasOwn(BOOLEAN_STRINGS, value)) {
    return BOOLEAN_STRINGS[value];
  }
  return null;
}

const RFC3339_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[Tt](\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?([Zz]|[+-](\d{2}):(\d{2}))$/;

/**
 * Parse an RFC3339 timestamp, e.g. "2024-01-10T00:00:00Z".
 * Precision beyond milliseconds is dropped.
 */
export function parseRfc3339(value: ConditionScalar): Date | null {
  if (typeof value !== "string") {
    return null;
  }
  const match = RFC3339_PATTERN.exec(value);
  if (!match) {
    return null;
  }

  const [, year, month, day, hour, minute, second, fraction, zone, zoneHour, zoneMinute] =
    match;
  const y = Number(year);
  const mo = Number(month);
  const d = Number(day);
  if (mo < 1 || mo > 12 || d < 1) {
    return null;
  }
  // Day 0 of the next month is the last day of this one. setUTCFullYear
  // keeps years 0-99 as written.
  const lastDay = new Date(0);
  lastDay.setUTCFullYear(y, mo, 0);
  if (d > lastDay.getUTCDate()) {
    return null;
  }
  if (Number(hour) > 23 || Number(minute) > 59 || Number(second) > 59) {
    return null;
  }
  if (
    zoneHour !== undefined &&
    (Number(zoneHour) > 23 || Number(zoneMinute) > 59)
  ) {
    return null;
  }

  const millis = (fraction ?? "").padEnd(3, "0").slice(0, 3);
  const offset = zone.toUpperCase() === "Z" ? "Z" : zone;
  const timestamp = Date.parse(
    `${year}-${month}-${day}T${hour}:${minute}:${second}.${millis}${offset}`,
  );
  return Number.isNaN(timestamp) ? null : new Date(timestamp);
}

/**
 * Parse an IP literal. Only dotted-quad IPv4 and IPv6 are accepted;
 * IPv4-mapped IPv6 addresses are normalised to IPv4 unless `keepMapped`.
 */
export function parseIPAddress(
  value: ConditionScalar,
  keepMapped = false,
): IPAddress | null {
  if (typeof value !== "string") {
    return null;
  }
  if (ipaddr.IPv4.isValidFourPartDecimal(value)) {
    return ipaddr.IPv4.parse(value);
  }
  if (value.includes(":") && ipaddr.IPv6.isValid(value)) {
    const address = ipaddr.IPv6.parse(value);
    return !keepMapped && address.isIPv4MappedAddress()
      ? address.toIPv4Address()
      : address;
  }
  return null;
}

const PREFIX_LENGTH_PATTERN = /^(0|[1-9]\d{0,2})$/;

/**
 * Parse an acceptable IP value: first as a literal address, then as a
 * CIDR block. Host bits in a CIDR block are allowed.
 */
export function parseIPCondition(value: string): IPCondition | null {
  const address = parseIPAddress(value);
  if (address) {
    return { type: "address", address };
  }

  const parts = value.split("/");
  if (parts.length !== 2 || !PREFIX_LENGTH_PATTERN.test(parts[1])) {
    return null;
  }
  const network = parseIPAddress(parts[0], true);
  if (!network) {
    return null;
  }
  const prefixLength = Number(parts[1]);
  const maxPrefix = network.kind() === "ipv4" ? 32 : 128;
  if (prefixLength > maxPrefix) {
    return null;
  }
  return { type: "cidr", network, prefixLength };
}

function sameAddress(a: IPAddress, b: IPAddress): boolean {
  return (
    a.kind() === b.kind() && a.toNormalizedString() === b.toNormalizedString()
  );
}

function inNetwork(ip: IPAddress, network: IPAddress, bits: number): boolean {
  if (ip instanceof ipaddr.IPv4 && network instanceof ipaddr.IPv4) {
    return ip.match([network, bits]);
  }
  if (ip instanceof ipaddr.IPv6 && network instanceof ipaddr.IPv6) {
    return ip.match([network, bits]);
  }
  // Address families differ
  return false;
}

/**
 * Whether an address satisfies an IP condition
 */
export function ipMatches(ip: IPAddress, condition: IPCondition): boolean {
  if (condition.type === "address") {
    return sameAddress(ip, condition.address);
  }
  return inNetwork(ip, condition.network, condition.prefixLength);
}

// ============================================================================
// Operator Table
// ============================================================================

export const CONDITION_OPERATORS: Record<
  ConditionOperatorName,
  ConditionOperator
> = {
  // String operators
  [ConditionOperatorName.StringEquals]: {
    kind: "string",
    name: ConditionOperatorName.StringEquals,
    compare: (a, b) => a === b,
  },
  [ConditionOperatorName.StringNotEquals]: {
    kind: "string",
    name: ConditionOperatorName.StringNotEquals,
    compare: (a, b) => a !== b,
  },
  [ConditionOperatorName.StringEqualsIgnoreCase]: {
    kind: "string",
    name: ConditionOperatorName.StringEqualsIgnoreCase,
    compare: (a, b) => a.toLowerCase() === b.toLowerCase(),
  },
  [ConditionOperatorName.StringNotEqualsIgnoreCase]: {
    kind: "string",
    name: ConditionOperatorName.StringNotEqualsIgnoreCase,
    compare: (a, b) => a.toLowerCase() !== b.toLowerCase(),
  },
  [ConditionOperatorName.StringLike]: {
    kind: "string",
    name: ConditionOperatorName.StringLike,
    compare: (a, b) => a.includes(b),
  },
  [ConditionOperatorName.StringNotLike]: {
    kind: "string",
    name: ConditionOperatorName.StringNotLike,
    compare: (a, b) => !a.includes(b),
  },

  // Numeric operators
  [ConditionOperatorName.NumericEquals]: {
    kind: "numeric",
    name: ConditionOperatorName.NumericEquals,
    compare: (a, b) => a === b,
  },
  [ConditionOperatorName.NumericNotEquals]: {
    kind: "numeric",
    name: ConditionOperatorName.NumericNotEquals,
    compare: (a, b) => a !== b,
  },
  [ConditionOperatorName.NumericLessThan]: {
    kind: "numeric",
    name: ConditionOperatorName.NumericLessThan,
    compare: (a, b) => a < b,
  },
  [ConditionOperatorName.NumericLessThanEquals]: {
    kind: "numeric",
    name: ConditionOperatorName.NumericLessThanEquals,
    compare: (a, b) => a <= b,
  },
  [ConditionOperatorName.NumericGreaterThan]: {
    kind: "numeric",
    name: ConditionOperatorName.NumericGreaterThan,
    compare: (a, b) => a > b,
  },
  [ConditionOperatorName.NumericGreaterThanEquals]: {
    kind: "numeric",
    name: ConditionOperatorName.NumericGreaterThanEquals,
    compare: (a, b) => a >= b,
  },

  // Date operators
  [ConditionOperatorName.DateEquals]: {
    kind: "date",
    name: ConditionOperatorName.DateEquals,
    compare: (a, b) => a.getTime() === b.getTime(),
    whenUnparsable: false,
  },
  [ConditionOperatorName.DateNotEquals]: {
    kind: "date",
    name: ConditionOperatorName.DateNotEquals,
    compare: (a, b) => a.getTime() !== b.getTime(),
    whenUnparsable: true,
  },
  [ConditionOperatorName.DateLessThan]: {
    kind: "date",
    name: ConditionOperatorName.DateLessThan,
    compare: (a, b) => a.getTime() < b.getTime(),
    whenUnparsable: false,
  },
  [ConditionOperatorName.DateLessThanEquals]: {
    kind: "date",
    name: ConditionOperatorName.DateLessThanEquals,
    compare: (a, b) => a.getTime() <= b.getTime(),
    whenUnparsable: false,
  },
  [ConditionOperatorName.DateGreaterThan]: {
    kind: "date",
    name: ConditionOperatorName.DateGreaterThan,
    compare: (a, b) => a.getTime() > b.getTime(),
    whenUnparsable: false,
  },
  [ConditionOperatorName.DateGreaterThanEquals]: {
    kind: "date",
    name: ConditionOperatorName.DateGreaterThanEquals,
    compare: (a, b) => a.getTime() >= b.getTime(),
    whenUnparsable: false,
  },

  // Boolean operator
  [ConditionOperatorName.Bool]: {
    kind: "bool",
    name: ConditionOperatorName.Bool,
    compare: (a, b) => a === b,
  },

  // IP address operators
  [ConditionOperatorName.IPAddress]: {
    kind: "ip",
    name: ConditionOperatorName.IPAddress,
    compare: ipMatches,
  },
  [ConditionOperatorName.NotIPAddress]: {
    kind: "ip",
    name: ConditionOperatorName.NotIPAddress,
    compare: (ip, condition) => !ipMatches(ip, condition),
  },
};

const OPERATORS_BY_NAME: ReadonlyMap<string, ConditionOperator> = new Map(
  Object.values(CONDITION_OPERATORS).map((operator) => [
    operator.name,
    operator,
  ]),
);

/**
 * Get operator by name (case-sensitive)
 */
export function getOperator(name: string): ConditionOperator | undefined {
  return OPERATORS_BY_NAME.get(name);
}

/**
 * Check if operator exists
 */
export function hasOperator(name: string): boolean {
  return OPERATORS_BY_NAME.has(name);
}

/**
 * Get all operator names
 */
export function getAllOperatorNames(): string[] {
  return Array.from(OPERATORS_BY_NAME.keys());
}

// ============================================================================
// Evaluation
// ============================================================================

function anyMatch<T>(
  expected: string[],
  parse: (value: string) => T | null,
  test: (value: T) => boolean,
): boolean {
  for (const raw of expected) {
    const value = parse(raw);
    if (value !== null && test(value)) {
      return true;
    }
  }
  return false;
}

/**
 * Apply an operator to a context value and the list of acceptable values.
 * Returns true when at least one acceptable value satisfies the operator.
 */
export function applyOperator(
  operator: ConditionOperator,
  actual: ConditionScalar,
  expected: string[],
): boolean {
  switch (operator.kind) {
    case "string": {
      const value = String(actual);
      return expected.some((candidate) => operator.compare(value, candidate));
    }

    case "numeric": {
      const value = toInteger(actual);
      if (value === null) {
        return false;
      }
      return anyMatch(expected, toInteger, (candidate) =>
        operator.compare(value, candidate),
      );
    }

    case "date": {
      const value = parseRfc3339(actual);
      return expected.some((raw) => {
        const candidate = parseRfc3339(raw);
        if (value === null || candidate === null) {
          return operator.whenUnparsable;
        }
        return operator.compare(value, candidate);
      });
    }

    case "bool": {
      const value = toBoolean(actual);
      if (value === null) {
        return false;
      }
      return anyMatch(expected, toBoolean, (candidate) =>
        operator.compare(value, candidate),
      );
    }

    case "ip": {
      const value = parseIPAddress(actual);
      if (value === null) {
        return false;
      }
      return anyMatch(expected, parseIPCondition, (candidate) =>
        operator.compare(value, candidate),
      );
    }
  }
}
