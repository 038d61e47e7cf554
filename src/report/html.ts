import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { categoryTitle } from "../core/ruleCatalog.js";
import { CATEGORIES, type AuditRun, type Issue, type PageResult } from "../core/types.js";
import { formatElementRef } from "../document/query.js";
import { scoreRating } from "../severity/policy.js";

export async function writeHtmlReport(outDir: string, run: AuditRun): Promise<string> {
  await mkdir(outDir, { recursive: true });
  const outputPath = join(outDir, "a11y-report.html");

  await writeFile(outputPath, renderHtml(run), "utf8");
  return outputPath;
}

export function renderHtml(run: AuditRun): string {
  const severityRows = Object.entries(run.summary.bySeverity)
    .map(([severity, count]) => `<tr><td>${escapeHtml(severity)}</td><td>${count}</td></tr>`)
    .join("\n");

  const pageSections = run.pages.map(renderPage).join("\n");

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1.0" />
  <title>Accessibility Score Report</title>
  <style>
    body { font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", sans-serif; margin: 24px; color: #1f2937; }
    h1, h2, h3 { margin-bottom: 8px; }
    table { width: 100%; border-collapse: collapse; margin: 12px 0 20px; }
    th, td { border: 1px solid #e5e7eb; padding: 8px 10px; text-align: left; vertical-align: top; }
    th { background: #f8fafc; }
    .badge { display: inline-block; padding: 2px 8px; border-radius: 999px; font-size: 12px; font-weight: 600; }
    .critical { background: #fee2e2; color: #991b1b; }
    .warning { background: #fef9c3; color: #854d0e; }
    .info { background: #e0f2fe; color: #0c4a6e; }
    .score { font-size: 32px; font-weight: 700; }
    .muted { color: #4b5563; }
    .section { margin-bottom: 28px; }
  </style>
</head>
<body>
  <h1>Accessibility Score Report</h1>
  <p class="muted">Run ID: ${escapeHtml(run.runId)} | Started: ${escapeHtml(run.startedAt)} | Finished: ${escapeHtml(run.finishedAt)}</p>

  <div class="section">
    <h2>Summary</h2>
    <table>
      <tr><th>Pages</th><td>${run.summary.totalPages}</td></tr>
      <tr><th>Failed pages</th><td>${run.summary.failedPages}</td></tr>
      <tr><th>Average score</th><td>${run.summary.averageScore ?? "-"}</td></tr>
      <tr><th>Total issues</th><td>${run.summary.totalIssues}</td></tr>
    </table>
    <h3>Issues by Severity</h3>
    <table>
      <thead><tr><th>Severity</th><th>Count</th></tr></thead>
      <tbody>${severityRows}</tbody>
    </table>
  </div>

  ${pageSections}
</body>
</html>`;
}

function renderPage(page: PageResult): string {
  if (!page.report) {
    return `<div class="section">
    <h2>${escapeHtml(page.source)}</h2>
    <p class="critical">Failed to load page: ${escapeHtml(page.error ?? "unknown error")}</p>
  </div>`;
  }

  const { report } = page;
  const categoryRows = CATEGORIES.map(
    (category) =>
      `<tr><td>${escapeHtml(categoryTitle(category))}</td><td>${report.categories[category]}</td></tr>`,
  ).join("\n");

  const issueRows = report.issues.length
    ? report.issues.map(renderIssueRow).join("\n")
    : '<tr><td colspan="5" class="muted">No issues.</td></tr>';

  return `<div class="section">
    <h2>${escapeHtml(page.source)}</h2>
    <p><span class="score">${report.overallScore}/100</span> ${escapeHtml(
      scoreRating(report.overallScore),
    )}</p>
    <h3>Category Scores</h3>
    <table>
      <thead><tr><th>Category</th><th>Score</th></tr></thead>
      <tbody>${categoryRows}</tbody>
    </table>
    <h3>Issues</h3>
    <table>
      <thead><tr><th>Severity</th><th>Category</th><th>Element</th><th>Message</th><th>Fix</th></tr></thead>
      <tbody>${issueRows}</tbody>
    </table>
  </div>`;
}

function renderIssueRow(issue: Issue): string {
  const severityClass = escapeHtml(issue.severity);

  return `<tr>
    <td><span class="badge ${severityClass}">${escapeHtml(issue.severity)}</span></td>
    <td>${escapeHtml(issue.category)}</td>
    <td><code>${escapeHtml(formatElementRef(issue.element) || "-")}</code></td>
    <td>${escapeHtml(issue.message)}</td>
    <td>${escapeHtml(issue.fix ?? "-")}</td>
  </tr>`;
}

export function escapeHtml(input: string): string {
  return input
    .replaceAll("&", "&amp;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;")
    .replaceAll('"', "&quot;")
    .replaceAll("'", "&#039;");
}
