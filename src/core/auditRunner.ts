import { mkdir } from "node:fs/promises";
import { parseHtml } from "../document/parse.js";
import { writeCsvReport } from "../report/csv.js";
import { writeHtmlReport } from "../report/html.js";
import { writeJsonReport } from "../report/json.js";
import { writeMarkdownReport } from "../report/markdown.js";
import { shouldFailRun } from "../severity/policy.js";
import { AccessibilityEngine } from "./engine.js";
import { errorMessage } from "./errors.js";
import type {
  AuditProgressEvent,
  AuditProgressStage,
  AuditRun,
  AuditRunDeps,
  AuditRunOptions,
  AuditSummary,
  PageResult,
  ReportFormat,
  Severity,
} from "./types.js";

export interface AuditRunResult {
  run: AuditRun;
  shouldFail: boolean;
  outputs: Partial<Record<ReportFormat, string>>;
}

const WRITERS: Record<ReportFormat, (outDir: string, run: AuditRun) => Promise<string>> = {
  json: writeJsonReport,
  html: writeHtmlReport,
  csv: writeCsvReport,
  md: writeMarkdownReport,
};

export async function runAudit(
  options: AuditRunOptions,
  deps: AuditRunDeps,
): Promise<AuditRunResult> {
  const startedAt = deps.now().toISOString();
  const totalTargets = options.targets.length;
  // Throws ConfigError before any page is fetched.
  const engine = new AccessibilityEngine({
    weights: options.config.weights,
    thresholds: options.config.thresholds,
  });

  emitProgress(deps, { type: "run-start", totalTargets });
  await mkdir(options.outDir, { recursive: true });

  const pages: PageResult[] = [];

  for (let index = 0; index < options.targets.length; index += 1) {
    const source = options.targets[index];
    const targetIndex = index + 1;
    emitProgress(deps, { type: "target-start", totalTargets, targetIndex, source });

    let currentStage: AuditProgressStage | undefined;
    const startStage = (stage: AuditProgressStage): void => {
      currentStage = stage;
      emitProgress(deps, { type: "stage-start", totalTargets, targetIndex, source, stage });
    };
    const endStage = (success = true, message?: string): void => {
      if (!currentStage) {
        return;
      }
      emitProgress(deps, {
        type: "stage-end",
        totalTargets,
        targetIndex,
        source,
        stage: currentStage,
        success,
        message,
      });
      currentStage = undefined;
    };

    try {
      startStage("fetch");
      const loaded = await deps.loader.load(source);
      endStage();

      startStage("parse");
      const document = parseHtml(loaded.html);
      endStage();

      startStage("evaluate");
      const report = engine.evaluate(document);
      endStage();

      pages.push({ source, report });
      emitProgress(deps, { type: "target-end", totalTargets, targetIndex, source, success: true });
    } catch (error) {
      const message = errorMessage(error);
      endStage(false, message);
      pages.push({ source, error: message });
      emitProgress(deps, {
        type: "target-end",
        totalTargets,
        targetIndex,
        source,
        success: false,
        message,
      });
    }
  }

  const run: AuditRun = {
    runId: deps.runIdFactory(),
    startedAt,
    finishedAt: deps.now().toISOString(),
    summary: summarize(pages),
    pages,
  };

  const outputs: Partial<Record<ReportFormat, string>> = {};
  emitProgress(deps, {
    type: "stage-start",
    totalTargets,
    targetIndex: totalTargets,
    source: options.targets[totalTargets - 1] ?? "",
    stage: "report",
  });
  for (const format of options.formats) {
    outputs[format] = await WRITERS[format](options.outDir, run);
  }
  emitProgress(deps, {
    type: "stage-end",
    totalTargets,
    targetIndex: totalTargets,
    source: options.targets[totalTargets - 1] ?? "",
    stage: "report",
    success: true,
  });
  emitProgress(deps, { type: "run-end", totalTargets });

  return {
    run,
    shouldFail: shouldFailRun(pages, { failOn: options.failOn, minScore: options.minScore }),
    outputs,
  };
}

function emitProgress(deps: AuditRunDeps, event: AuditProgressEvent): void {
  deps.onProgress?.(event);
}

export function summarize(pages: PageResult[]): AuditSummary {
  const scored = pages.flatMap((page) => (page.report ? [page.report] : []));
  const issues = scored.flatMap((report) => report.issues);

  const bySeverity = issues.reduce<Record<Severity, number>>(
    (acc, issue) => {
      acc[issue.severity] += 1;
      return acc;
    },
    { critical: 0, warning: 0, info: 0 },
  );

  return {
    totalPages: pages.length,
    failedPages: pages.length - scored.length,
    averageScore:
      scored.length === 0
        ? undefined
        : Math.round(
            scored.reduce((sum, report) => sum + report.overallScore, 0) / scored.length,
          ),
    totalIssues: issues.length,
    bySeverity,
  };
}
