import { validateWeights } from "../config/schema.js";
import { CATEGORIES, type Category, type CategoryResult, type CategoryWeights } from "./types.js";

export interface AggregateScore {
  overallScore: number;
  categories: Record<Category, number>;
}

/**
 * Holds the weight table and folds the seven category scores into the
 * overall score: round(Σ weight × score / 100).
 */
export class CategoryAggregator {
  readonly weights: CategoryWeights;

  constructor(weights: CategoryWeights) {
    this.weights = validateWeights(weights);
  }

  aggregate(results: readonly CategoryResult[]): AggregateScore {
    const byCategory = indexResults(results);
    const scoreOf = (category: Category): number => {
      const result = byCategory.get(category);
      if (!result) {
        throw new Error(`Missing result for category "${category}".`);
      }
      if (!Number.isFinite(result.score) || result.score < 0 || result.score > 100) {
        throw new Error(`Score for "${category}" is out of range: ${result.score}.`);
      }
      return result.score;
    };

    const categories: Record<Category, number> = {
      images: scoreOf("images"),
      headings: scoreOf("headings"),
      links: scoreOf("links"),
      forms: scoreOf("forms"),
      structure: scoreOf("structure"),
      contrast: scoreOf("contrast"),
      keyboard: scoreOf("keyboard"),
    };
    const weighted = CATEGORIES.reduce(
      (sum, category) => sum + this.weights[category] * categories[category],
      0,
    );

    return {
      overallScore: Math.round(weighted / 100),
      categories,
    };
  }
}

export function indexResults(results: readonly CategoryResult[]): Map<Category, CategoryResult> {
  const byCategory = new Map<Category, CategoryResult>();
  for (const result of results) {
    if (byCategory.has(result.category)) {
      throw new Error(`Duplicate result for category "${result.category}".`);
    }
    byCategory.set(result.category, result);
  }
  return byCategory;
}

