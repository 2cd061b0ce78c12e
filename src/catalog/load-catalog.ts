import { RuleCatalog } from "./rule-catalog.js";
import { loadRulesWithOverrides } from "./rule-loader.js";
import { resolveRulesDirectory } from "./runtime-paths.js";

export interface LoadCatalogOptions {
  /** Replaces the bundled rules directory. */
  readonly baseDir?: string;
  /** Rules merged over the base set by rule_id. */
  readonly overrideDir?: string;
}

export async function loadCatalog(
  options: LoadCatalogOptions = {},
): Promise<RuleCatalog> {
  const baseDir = await resolveRulesDirectory(options.baseDir);
  const { rules, meta } = await loadRulesWithOverrides({
    baseDir,
    overrideDir: options.overrideDir,
  });
  return new RuleCatalog(rules, meta);
}
