import { errorMessage, EvaluatorFault } from "../core/errors.js";
import { stableId } from "../core/id.js";
import { categoryTitle } from "../core/ruleCatalog.js";
import type {
  Category,
  CategoryEvaluator,
  CategoryResult,
  EvaluationContext,
  HtmlElement,
  Issue,
  Severity,
} from "../core/types.js";
import { describeElement } from "../document/query.js";

export interface IssueInput {
  ruleId: string;
  severity: Severity;
  message: string;
  element?: HtmlElement;
  fix?: string;
}

/** Accumulates a category's issues in detection order. */
export class IssueCollector {
  private readonly issues: Issue[] = [];

  constructor(readonly category: Category) {}

  add(input: IssueInput): void {
    const ruleId = `${this.category}/${input.ruleId}`;
    const issue: Issue = {
      id: stableId([
        ruleId,
        input.element?.index,
        input.message,
        this.issues.length,
      ]),
      category: this.category,
      ruleId,
      severity: input.severity,
      message: input.message,
      ...(input.element ? { element: Object.freeze(describeElement(input.element)) } : {}),
      ...(input.fix ? { fix: input.fix } : {}),
    };
    this.issues.push(Object.freeze(issue));
  }

  result(score: number): CategoryResult {
    return Object.freeze({
      category: this.category,
      score: clampScore(score),
      issues: Object.freeze([...this.issues]),
    });
  }
}

export function clampScore(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.round(Math.min(100, Math.max(0, value)));
}

/** 100 × passed / total, or the neutral 100 when nothing applied. */
export function ratioScore(passed: number, total: number): number {
  return total === 0 ? 100 : (100 * passed) / total;
}

/**
 * Runs `check` per element. An element whose check throws is left out of
 * the results and recorded as an info issue; the rest of the category
 * carries on.
 */
export function checkEach<R>(
  elements: readonly HtmlElement[],
  issues: IssueCollector,
  check: (element: HtmlElement) => R,
): R[] {
  const results: R[] = [];
  for (const element of elements) {
    try {
      results.push(check(element));
    } catch (error) {
      issues.add({
        ruleId: "element-skipped",
        severity: "info",
        message: `Skipped <${element.tagName}>: ${errorMessage(error)}`,
        element,
      });
    }
  }
  return results;
}

export function runEvaluator(
  evaluator: CategoryEvaluator,
  ctx: EvaluationContext,
): CategoryResult {
  try {
    const result = evaluator.evaluate(ctx);
    if (result.category !== evaluator.category) {
      throw new EvaluatorFault(
        evaluator.category,
        `evaluator returned a result for "${result.category}"`,
      );
    }
    return result;
  } catch (error) {
    const fault =
      error instanceof EvaluatorFault
        ? error
        : new EvaluatorFault(evaluator.category, errorMessage(error), { cause: error });
    return notAssessable(fault);
  }
}

export function notAssessable(fault: EvaluatorFault): CategoryResult {
  const issues = new IssueCollector(fault.category);
  issues.add({
    ruleId: "not-assessable",
    severity: "info",
    message: `${categoryTitle(fault.category)} category not assessable for this page: ${fault.message}`,
  });
  return issues.result(100);
}
