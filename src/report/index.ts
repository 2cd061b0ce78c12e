export { generateReport } from "./report-builder.js";
export { filterReport } from "./report-filter.js";
export {
  DEFAULT_MAX_RECOMMENDATIONS,
  rankRecommendations,
} from "./recommendations.js";
export {
  renderCoverageReport,
  renderMarkdownReport,
  renderStandardsTable,
  type MarkdownRenderOptions,
} from "./markdown-reporter.js";
export { formatLevel, formatScore } from "./report-utils.js";
export type {
  ComplianceReport,
  ReportOptions,
  ReportSummary,
  RequirementCompliance,
  TestCaseCompliance,
} from "./types.js";
