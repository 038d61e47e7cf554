import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { categoryTitle } from "../core/ruleCatalog.js";
import { CATEGORIES, type AccessibilityReport, type AuditRun } from "../core/types.js";
import { scoreRating } from "../severity/policy.js";

const TOP_ISSUES = 10;

export function renderPageMarkdown(source: string, report: AccessibilityReport): string {
  const score = report.overallScore;
  const lines = [
    `## Accessibility Report for ${source}`,
    "",
    `### Overall Score: ${score}/100 - ${scoreRating(score)}`,
    "",
    "### Category Scores:",
    "",
    ...CATEGORIES.map(
      (category) => `- **${categoryTitle(category)}**: ${report.categories[category]}/100`,
    ),
    "",
    "### Top Issues:",
    "",
  ];

  if (report.issues.length === 0) {
    lines.push("No issues found.");
  }

  report.issues.slice(0, TOP_ISSUES).forEach((issue, index) => {
    lines.push(`${index + 1}. [${issue.severity}] ${issue.message}`);
  });

  if (report.issues.length > TOP_ISSUES) {
    lines.push("", `...and ${report.issues.length - TOP_ISSUES} more issues.`);
  }

  return `${lines.join("\n")}\n`;
}

export function renderRunMarkdown(run: AuditRun): string {
  return run.pages
    .map((page) =>
      page.report
        ? renderPageMarkdown(page.source, page.report)
        : `## Accessibility Report for ${page.source}\n\nFailed to load page: ${page.error ?? "unknown error"}\n`,
    )
    .join("\n");
}

export async function writeMarkdownReport(outDir: string, run: AuditRun): Promise<string> {
  await mkdir(outDir, { recursive: true });

  const outputPath = join(outDir, "a11y-report.md");
  await writeFile(outputPath, renderRunMarkdown(run), "utf8");
  return outputPath;
}
