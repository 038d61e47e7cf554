import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { stringify } from "csv-stringify/sync";
import type { AuditRun } from "../core/types.js";
import { formatElementRef } from "../document/query.js";

const COLUMNS = ["source", "category", "severity", "message", "element", "fix"];

export function renderIssuesCsv(run: AuditRun): string {
  const rows = run.pages.flatMap((page) =>
    (page.report?.issues ?? []).map((issue) => ({
      source: page.source,
      category: issue.category,
      severity: issue.severity,
      message: issue.message,
      element: formatElementRef(issue.element),
      fix: issue.fix ?? "",
    })),
  );

  return stringify(rows, { header: true, columns: COLUMNS });
}

export async function writeCsvReport(outDir: string, run: AuditRun): Promise<string> {
  await mkdir(outDir, { recursive: true });

  const outputPath = join(outDir, "a11y-issues.csv");
  await writeFile(outputPath, renderIssuesCsv(run), "utf8");
  return outputPath;
}
