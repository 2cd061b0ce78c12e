import type { ComplianceResult } from "../scoring/types.js";

export const DEFAULT_MAX_RECOMMENDATIONS = 10;

/**
 * Most frequent recommendations first. Equal counts keep the order in which
 * the recommendation was first seen.
 */
export function rankRecommendations(
  results: readonly ComplianceResult[],
  limit: number = DEFAULT_MAX_RECOMMENDATIONS,
): string[] {
  const counts = new Map<string, number>();
  for (const result of results) {
    for (const recommendation of result.recommendations) {
      counts.set(recommendation, (counts.get(recommendation) ?? 0) + 1);
    }
  }

  // Array.prototype.sort is stable, and Map iterates in insertion order.
  return Array.from(counts.entries())
    .sort((a, b) => b[1] - a[1])
    .slice(0, Math.max(0, limit))
    .map(([text, count]) => `${text} (mentioned ${count} times)`);
}
