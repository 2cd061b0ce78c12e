export { RuleCatalog } from "./rule-catalog.js";
export { loadCatalog, type LoadCatalogOptions } from "./load-catalog.js";
export {
  loadRules,
  loadRulesWithOverrides,
  orderRules,
  parseRule,
  type LoadedRules,
  type LoadRulesOptions,
} from "./rule-loader.js";
export { resolveRulesDirectory } from "./runtime-paths.js";
export type {
  CatalogMeta,
  CompiledPattern,
  CompiledRule,
  ComplianceRule,
  StandardInfo,
  ValidationCriteria,
} from "./types.js";
export { RiskLevel } from "./types.js";
