export { matchPatterns, countMatches, type PatternMatch } from "./pattern-matcher.js";
export { checkCriteria, isRequired, CRITERIA_KEYWORDS } from "./criteria-checker.js";
