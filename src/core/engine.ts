import { DEFAULT_THRESHOLDS, DEFAULT_WEIGHTS } from "../config/schema.js";
import { executeEvaluators, EVALUATORS } from "../rules/index.js";
import { resolvePolicies } from "../rules/policy.js";
import { CategoryAggregator } from "./aggregate.js";
import { composeReport } from "./compose.js";
import { InputError } from "./errors.js";
import type {
  AccessibilityReport,
  CategoryEvaluator,
  CategoryWeights,
  HtmlDocument,
  RulePolicies,
  Thresholds,
} from "./types.js";

export interface EngineOptions {
  weights?: CategoryWeights;
  thresholds?: Thresholds;
  policies?: Partial<RulePolicies>;
  evaluators?: readonly CategoryEvaluator[];
}

/**
 * Validates configuration once, then scores any number of documents.
 * Holds no per-document state.
 */
export class AccessibilityEngine {
  private readonly aggregator: CategoryAggregator;

  private readonly thresholds: Thresholds;

  private readonly policies: RulePolicies;

  private readonly evaluators: readonly CategoryEvaluator[];

  constructor(options: EngineOptions = {}) {
    this.aggregator = new CategoryAggregator(options.weights ?? DEFAULT_WEIGHTS);
    this.thresholds = options.thresholds ?? DEFAULT_THRESHOLDS;
    this.policies = resolvePolicies(options.policies);
    this.evaluators = options.evaluators ?? EVALUATORS;
  }

  evaluate(document: HtmlDocument | null | undefined): AccessibilityReport {
    if (!document || !document.root || document.elements.length === 0) {
      throw new InputError("Cannot evaluate a missing or empty document.");
    }

    const results = executeEvaluators(
      {
        document,
        thresholds: this.thresholds,
        policies: this.policies,
      },
      this.evaluators,
    );

    return composeReport(results, this.aggregator);
  }
}

export function evaluateDocument(
  document: HtmlDocument | null | undefined,
  options?: EngineOptions,
): AccessibilityReport {
  return new AccessibilityEngine(options).evaluate(document);
}
