/**
 * IAM Module - ABAC decision primitives
 *
 * Wildcard matching for resource and action identifiers, and condition
 * evaluation over request attributes. Composing them into allow/deny
 * verdicts is left to the caller.
 */

export * from "./conditions";

export { PatternCache } from "./cache/PatternCache";
export type { PatternCacheStats } from "./cache/PatternCache";

export * from "./errors";
