import * as dotenv from "dotenv";

// Load environment variables
dotenv.config();

interface Config {
  nodeEnv: string;

  // Pattern matching
  patternCacheSize: number;
  regexMatchTimeoutMs: number;

  // Logging
  logLevel: string;
  jsonLogFormat: boolean;
}

export const DEFAULT_PATTERN_CACHE_SIZE = 512;
export const DEFAULT_REGEX_MATCH_TIMEOUT_MS = 250;

/**
 * Parse a positive integer from an environment variable, falling back to
 * the default when unset, malformed or not positive.
 */
function parsePositiveInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) || parsed <= 0 ? fallback : parsed;
}

const config: Config = {
  nodeEnv: process.env.NODE_ENV || "development",

  patternCacheSize: parsePositiveInt(
    process.env.PATTERN_CACHE_SIZE,
    DEFAULT_PATTERN_CACHE_SIZE,
  ),
  regexMatchTimeoutMs: parsePositiveInt(
    process.env.REGEX_MATCH_TIMEOUT_MS,
    DEFAULT_REGEX_MATCH_TIMEOUT_MS,
  ),

  logLevel: process.env.LOG_LEVEL || "info",
  jsonLogFormat: process.env.JSON_LOG_FORMAT === "true",
};

export { config, parsePositiveInt };
