import type { ValidationCriteria } from "../catalog/types.js";

export const CRITERIA_KEYWORDS: Readonly<Record<string, readonly string[]>> = {
  requires_traceability: ["traceability", "trace"],
  requires_verification: ["verify", "verification"],
  requires_validation: ["validate", "validation"],
  requires_risk_analysis: ["risk", "hazard"],
  requires_security_testing: ["security", "secure"],
  requires_documentation: ["document", "record"],
};

/**
 * Share of required criteria whose keywords appear in `text`. Criteria
 * without a keyword mapping are left out of both sides of the ratio.
 */
export function checkCriteria(
  text: string,
  criteria: ValidationCriteria,
): number {
  let applicable = 0;
  let satisfied = 0;

  for (const [criterion, required] of Object.entries(criteria)) {
    if (!required) {
      continue;
    }
    const keywords = CRITERIA_KEYWORDS[criterion];
    if (!keywords) {
      continue;
    }
    applicable += 1;
    if (keywords.some((keyword) => text.includes(keyword))) {
      satisfied += 1;
    }
  }

  if (applicable === 0) {
    return 1;
  }
  return satisfied / applicable;
}

export function isRequired(
  criteria: ValidationCriteria,
  criterion: string,
): boolean {
  return criteria[criterion] === true;
}
