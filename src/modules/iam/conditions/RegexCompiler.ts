/**
 * Regex Compiler
 *
 * Turns wildcard patterns and delimiter templates into anchored regular
 * expressions whose evaluation is bounded in time.
 *
 * V8's regex engine backtracks, so a crafted template fragment such as
 * `(a+)+b` can run for seconds. Every match therefore runs as a tiny script
 * inside a `vm` context with a timeout; the runtime interrupts the regex
 * when the budget is spent and the timeout surfaces as MatchTimeoutError.
 */

import vm from "vm";
import { MatchTimeoutError, PatternSyntaxError } from "../errors";
import { DEFAULT_REGEX_MATCH_TIMEOUT_MS } from "../../../shared/config";

export interface CompileOptions {
  /**
   * Evaluation budget per match in milliseconds (default: 250)
   */
  timeoutMs?: number;
}

interface MatchSandbox {
  regex: RegExp;
  candidate: string;
}

// Matches are synchronous, so one shared sandbox is never used by two
// evaluations at the same time.
const sandbox: MatchSandbox = { regex: /$^/, candidate: "" };
const matchContext = vm.createContext(sandbox);
const matchScript = new vm.Script("regex.test(candidate)");

const VM_TIMEOUT_CODE = "ERR_SCRIPT_EXECUTION_TIMEOUT";

function isVmTimeout(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === VM_TIMEOUT_CODE
  );
}

/**
 * An anchored regular expression with a fixed evaluation budget.
 * Immutable once built.
 */
export class CompiledPattern {
  private readonly regex: RegExp;

  constructor(
    readonly pattern: string,
    readonly source: string,
    readonly flags: string,
    readonly timeoutMs: number,
  ) {
    this.regex = new RegExp(source, flags);
  }

  /**
   * Test a candidate against the expression.
   *
   * @throws MatchTimeoutError when evaluation exceeds the budget
   */
  matches(candidate: string): boolean {
    sandbox.regex = this.regex;
    sandbox.candidate = candidate;
    try {
      const result: unknown = matchScript.runInContext(matchContext, {
        timeout: this.timeoutMs,
      });
      return result === true;
    } catch (error) {
      if (isVmTimeout(error)) {
        throw new MatchTimeoutError(this.pattern, this.timeoutMs, error);
      }
      throw error;
    } finally {
      sandbox.candidate = "";
    }
  }
}

/**
 * Escape every regex metacharacter so the text matches literally
 */
export function quoteMeta(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function resolveTimeout(options: CompileOptions): number {
  const timeoutMs = options.timeoutMs;
  return timeoutMs !== undefined && timeoutMs > 0
    ? timeoutMs
    : DEFAULT_REGEX_MATCH_TIMEOUT_MS;
}

/**
 * Convert a wildcard pattern (using *) to an anchored CompiledPattern.
 *
 * - "ecs:Describe*" matches "ecs:DescribeInstances" and "ecs:Describe"
 * - "*" matches any string
 * - "ecs:*:instance/*" matches "ecs:cn-hangzhou:instance/i-001"
 */
export function compileWildcardRegex(
  pattern: string,
  options: CompileOptions = {},
): CompiledPattern {
  const body = pattern.split("*").map(quoteMeta).join(".*");
  return new CompiledPattern(pattern, `^${body}$`, "s", resolveTimeout(options));
}

/**
 * Returns the first-level delimiter indices of a template as flat pairs of
 * [start, endExclusive].
 *
 * @throws PatternSyntaxError on unbalanced delimiters
 */
export function delimiterIndices(
  template: string,
  delimiterStart: string,
  delimiterEnd: string,
): number[] {
  let level = 0;
  let start = 0;
  const indices: number[] = [];

  for (let i = 0; i < template.length; i++) {
    const ch = template[i];
    if (ch === delimiterStart) {
      level++;
      if (level === 1) {
        start = i;
      }
    } else if (ch === delimiterEnd) {
      level--;
      if (level === 0) {
        indices.push(start, i + 1);
      } else if (level < 0) {
        throw new PatternSyntaxError(
          `Unbalanced delimiters in "${template}"`,
          template,
        );
      }
    }
  }

  if (level !== 0) {
    throw new PatternSyntaxError(
      `Unbalanced delimiters in "${template}"`,
      template,
    );
  }

  return indices;
}

function assertDelimiters(
  template: string,
  delimiterStart: string,
  delimiterEnd: string,
): void {
  if (delimiterStart.length !== 1 || delimiterEnd.length !== 1) {
    throw new PatternSyntaxError(
      "Template delimiters must be single characters",
      template,
    );
  }
  if (delimiterStart === delimiterEnd) {
    throw new PatternSyntaxError(
      "Template delimiters must differ",
      template,
    );
  }
}

/**
 * Compile a template mixing literal text with delimited raw regex spans.
 * Pick delimiters without meaning in regex, such as < and >:
 *
 *   compileRegex("foo:bar.baz:<[0-9]{2,10}>", "<", ">")
 *     .matches("foo:bar.baz:123"); // true
 *
 * Delimiter balance is checked before anything is compiled. A fragment the
 * regex engine rejects raises its SyntaxError unchanged.
 */
export function compileRegex(
  template: string,
  delimiterStart: string,
  delimiterEnd: string,
  options: CompileOptions = {},
): CompiledPattern {
  assertDelimiters(template, delimiterStart, delimiterEnd);
  const indices = delimiterIndices(template, delimiterStart, delimiterEnd);

  let source = "^";
  let end = 0;
  for (let i = 0; i < indices.length; i += 2) {
    const raw = template.slice(end, indices[i]);
    end = indices[i + 1];
    const fragment = template.slice(indices[i] + 1, end - 1);

    // Compile each fragment alone first so errors point at the span
    new RegExp(`^${fragment}$`);
    source += `${quoteMeta(raw)}(${fragment})`;
  }
  source += `${quoteMeta(template.slice(end))}$`;

  return new CompiledPattern(template, source, "", resolveTimeout(options));
}
