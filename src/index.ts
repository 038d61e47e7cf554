export { AccessibilityEngine, evaluateDocument, type EngineOptions } from "./core/engine.js";
export { CategoryAggregator, type AggregateScore } from "./core/aggregate.js";
export { composeReport } from "./core/compose.js";
export { runAudit, summarize, type AuditRunResult } from "./core/auditRunner.js";
export { AuditError, ConfigError, EvaluatorFault, InputError } from "./core/errors.js";
export { contrastRatio, parseCssColor, type Rgba } from "./core/color.js";
export { CATEGORY_CATALOG } from "./core/ruleCatalog.js";
export { DEFAULT_CONFIG, DEFAULT_THRESHOLDS, DEFAULT_WEIGHTS, validateWeights } from "./config/schema.js";
export { loadConfig } from "./config/load.js";
export { createDocument } from "./document/model.js";
export { parseHtml } from "./document/parse.js";
export {
  createDocumentLoader,
  FileDocumentLoader,
  HttpDocumentLoader,
} from "./document/loader.js";
export { DEFAULT_POLICIES } from "./rules/policy.js";
export { EVALUATORS } from "./rules/index.js";
export { toFlatRecord, type FlatIssue, type FlatReport } from "./report/json.js";
export { renderPageMarkdown } from "./report/markdown.js";
export { scoreRating, shouldFailRun } from "./severity/policy.js";
export * from "./core/types.js";
