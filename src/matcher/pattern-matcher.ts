import type { CompiledPattern } from "../catalog/types.js";

export interface PatternMatch {
  readonly count: number;
  /** Source of every pattern that matched, once per pattern, in rule order. */
  readonly matched: readonly string[];
}

export function matchPatterns(
  text: string,
  patterns: readonly CompiledPattern[],
): PatternMatch {
  const matched: string[] = [];
  for (const pattern of patterns) {
    if (pattern.regex.test(text)) {
      matched.push(pattern.source);
    }
  }
  return { count: matched.length, matched };
}

export function countMatches(
  text: string,
  patterns: readonly CompiledPattern[],
): number {
  let count = 0;
  for (const pattern of patterns) {
    if (pattern.regex.test(text)) {
      count += 1;
    }
  }
  return count;
}
