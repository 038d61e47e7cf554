import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { AccessibilityReport, AuditRun, Category, Severity } from "../core/types.js";
import { scoreRating } from "../severity/policy.js";

export interface FlatIssue {
  category: Category;
  severity: Severity;
  message: string;
  fix?: string;
}

export interface FlatReport {
  overall_score: number;
  categories: Record<Category, number>;
  issues: FlatIssue[];
}

/** The record shape handed to downstream consumers. */
export function toFlatRecord(report: AccessibilityReport): FlatReport {
  return {
    overall_score: report.overallScore,
    categories: { ...report.categories },
    issues: report.issues.map((issue) => ({
      category: issue.category,
      severity: issue.severity,
      message: issue.message,
      ...(issue.fix ? { fix: issue.fix } : {}),
    })),
  };
}

export function serializeRun(run: AuditRun): string {
  return JSON.stringify(
    {
      runId: run.runId,
      startedAt: run.startedAt,
      finishedAt: run.finishedAt,
      summary: run.summary,
      pages: run.pages.map((page) =>
        page.report
          ? {
              source: page.source,
              rating: scoreRating(page.report.overallScore),
              ...toFlatRecord(page.report),
            }
          : { source: page.source, error: page.error },
      ),
    },
    null,
    2,
  );
}

export async function writeJsonReport(outDir: string, run: AuditRun): Promise<string> {
  await mkdir(outDir, { recursive: true });

  const outputPath = join(outDir, "a11y-report.json");
  await writeFile(outputPath, serializeRun(run), "utf8");
  return outputPath;
}
