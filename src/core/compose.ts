import { type CategoryAggregator, indexResults } from "./aggregate.js";
import { CATEGORIES, type AccessibilityReport, type CategoryResult, type Issue } from "./types.js";

export function composeReport(
  results: readonly CategoryResult[],
  aggregator: CategoryAggregator,
): AccessibilityReport {
  const { overallScore, categories } = aggregator.aggregate(results);
  const byCategory = indexResults(results);

  const issues: Issue[] = CATEGORIES.flatMap(
    (category) => byCategory.get(category)?.issues ?? [],
  );

  return Object.freeze({
    overallScore,
    categories: Object.freeze(categories),
    issues: Object.freeze(issues),
  });
}
