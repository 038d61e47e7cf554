import type { PageResult, Severity } from "../core/types.js";

export interface FailGate {
  failOn: readonly Severity[];
  minScore: number;
}

export function shouldFailRun(pages: PageResult[], gate: FailGate): boolean {
  const severities = new Set(gate.failOn);

  return pages.some((page) => {
    if (!page.report) {
      return true;
    }
    if (page.report.overallScore < gate.minScore) {
      return true;
    }
    return page.report.issues.some((issue) => severities.has(issue.severity));
  });
}

export type ScoreRating = "Excellent" | "Good" | "Fair" | "Poor" | "Very Poor";

export function scoreRating(score: number): ScoreRating {
  if (score >= 90) {
    return "Excellent";
  }
  if (score >= 80) {
    return "Good";
  }
  if (score >= 70) {
    return "Fair";
  }
  if (score >= 50) {
    return "Poor";
  }
  return "Very Poor";
}
