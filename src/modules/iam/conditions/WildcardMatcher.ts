/**
 * Wildcard Pattern Matcher
 *
 * Matches request identifiers (actions, resources) against policy-declared
 * patterns such as "ecs:Describe*". A pattern list is a comma-separated
 * string; the candidate matches when any element matches.
 */

import { PatternCache, PatternCacheStats } from "../cache/PatternCache";
import { CompiledPattern, compileWildcardRegex } from "./RegexCompiler";
import { MatchTimeoutError } from "../errors";
import { config } from "../../../shared/config";
import { logger } from "../../../shared/logger";

export interface WildcardMatcherOptions {
  /**
   * Maximum number of compiled patterns kept (default: PATTERN_CACHE_SIZE or 512)
   */
  cacheSize?: number;

  /**
   * Evaluation budget per regex match (default: REGEX_MATCH_TIMEOUT_MS or 250)
   */
  matchTimeoutMs?: number;
}

/**
 * WildcardMatcher
 *
 * `*` matches zero or more characters; every other character is literal.
 * Elements without a wildcard are compared for exact equality and never
 * touch the regex engine or the cache.
 */
export class WildcardMatcher {
  private readonly cache: PatternCache<CompiledPattern>;
  private readonly matchTimeoutMs: number;

  constructor(options: WildcardMatcherOptions = {}) {
    const cacheSize =
      options.cacheSize !== undefined && options.cacheSize > 0
        ? options.cacheSize
        : config.patternCacheSize;
    this.matchTimeoutMs =
      options.matchTimeoutMs !== undefined && options.matchTimeoutMs > 0
        ? options.matchTimeoutMs
        : config.regexMatchTimeoutMs;
    this.cache = new PatternCache<CompiledPattern>(cacheSize);
  }

  /**
   * Match a candidate against a comma-separated pattern list.
   *
   * @param candidate - Value from the request (e.g., "ecs:DescribeInstances")
   * @param patternList - Patterns from the policy (e.g., "ecs:Describe*,ecs:List*")
   * @throws MatchTimeoutError when a regex evaluation exceeds its budget
   */
  matches(candidate: string, patternList: string): boolean {
    return this.matchesAny(candidate, patternList.split(","));
  }

  /**
   * Like matches(), but resolves any matcher failure to false
   */
  mustMatch(candidate: string, patternList: string): boolean {
    try {
      return this.matches(candidate, patternList);
    } catch (error) {
      logger.warn("Pattern match failed, treating as no match", {
        candidate,
        patternList,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  private matchesAny(candidate: string, patterns: string[]): boolean {
    for (const pattern of patterns) {
      if (!pattern.includes("*")) {
        if (pattern === candidate) {
          logger.logDecision("pattern", true, { candidate, pattern });
          return true;
        }
        continue;
      }

      if (this.testCompiled(this.getCompiled(pattern), candidate)) {
        logger.logDecision("pattern", true, { candidate, pattern });
        return true;
      }
    }

    logger.logDecision("pattern", false, { candidate });
    return false;
  }

  private testCompiled(compiled: CompiledPattern, candidate: string): boolean {
    try {
      return compiled.matches(candidate);
    } catch (error) {
      if (error instanceof MatchTimeoutError) {
        logger.warn("Pattern evaluation timed out", {
          pattern: error.pattern,
          timeoutMs: error.timeoutMs,
        });
      }
      throw error;
    }
  }

  /**
   * Fetch the compiled form of a pattern, compiling and caching it on a miss.
   * Lookup, compilation and insert run in one synchronous step.
   */
  private getCompiled(pattern: string): CompiledPattern {
    const cached = this.cache.get(pattern);
    if (cached) {
      return cached;
    }

    const compiled = compileWildcardRegex(pattern, {
      timeoutMs: this.matchTimeoutMs,
    });
    this.cache.set(pattern, compiled);
    return compiled;
  }

  /**
   * Cache statistics for monitoring
   */
  getCacheStats(): PatternCacheStats {
    return this.cache.getStats();
  }

  /**
   * Drop every compiled pattern. Results are unaffected; only latency is.
   */
  clearCache(): void {
    this.cache.clear();
  }
}
