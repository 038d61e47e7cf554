import type { CategoryEvaluator, CategoryResult, EvaluationContext } from "../core/types.js";
import { contrastEvaluator } from "./rule-contrast.js";
import { formsEvaluator } from "./rule-forms.js";
import { headingsEvaluator } from "./rule-headings.js";
import { imagesEvaluator } from "./rule-images.js";
import { keyboardEvaluator } from "./rule-keyboard.js";
import { linksEvaluator } from "./rule-links.js";
import { runEvaluator } from "./shared.js";
import { structureEvaluator } from "./rule-structure.js";

export const EVALUATORS: readonly CategoryEvaluator[] = [
  imagesEvaluator,
  headingsEvaluator,
  linksEvaluator,
  formsEvaluator,
  structureEvaluator,
  contrastEvaluator,
  keyboardEvaluator,
];

export function executeEvaluators(
  ctx: EvaluationContext,
  evaluators: readonly CategoryEvaluator[] = EVALUATORS,
): CategoryResult[] {
  return evaluators.map((evaluator) => runEvaluator(evaluator, ctx));
}
