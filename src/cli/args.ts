import { isReportFormat, isSeverity } from "../config/schema.js";
import type { ReportFormat, Severity } from "../core/types.js";

export interface AuditArgs {
  targets: string[];
  outDir: string;
  configPath?: string;
  formats?: ReportFormat[];
  minScore?: number;
  failOn?: Severity[];
}

export function parseAuditArgs(args: string[]): AuditArgs {
  const targets: string[] = [];
  let outDir: string | undefined;
  let configPath: string | undefined;
  let formats: ReportFormat[] | undefined;
  let minScore: number | undefined;
  let failOn: Severity[] | undefined;

  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];

    if (token === "--url" || token === "--file") {
      targets.push(requireValue(args[i + 1], token));
      i += 1;
      continue;
    }

    if (token === "--out") {
      outDir = requireValue(args[i + 1], "--out");
      i += 1;
      continue;
    }

    if (token === "--config") {
      configPath = requireValue(args[i + 1], "--config");
      i += 1;
      continue;
    }

    if (token === "--format") {
      formats = parseCsvList(requireValue(args[i + 1], "--format"), "--format", isReportFormat);
      i += 1;
      continue;
    }

    if (token === "--fail-on") {
      failOn = parseCsvList(requireValue(args[i + 1], "--fail-on"), "--fail-on", isSeverity);
      i += 1;
      continue;
    }

    if (token === "--min-score") {
      const value = Number(requireValue(args[i + 1], "--min-score"));
      if (!Number.isFinite(value) || value < 0 || value > 100) {
        throw new Error("--min-score must be a number between 0 and 100.");
      }
      minScore = value;
      i += 1;
      continue;
    }

    throw new Error(`Unknown audit option: ${token}`);
  }

  if (targets.length === 0) {
    throw new Error("At least one --url or --file argument is required.");
  }

  if (!outDir) {
    throw new Error("--out is required.");
  }

  return { targets, outDir, configPath, formats, minScore, failOn };
}

function parseCsvList<T extends string>(
  value: string,
  flagName: string,
  guard: (entry: unknown) => entry is T,
): T[] {
  const entries = value
    .split(",")
    .map((part) => part.trim())
    .filter(Boolean);

  if (entries.length === 0) {
    throw new Error(`${flagName} must contain at least one value.`);
  }

  const parsed: T[] = [];
  for (const entry of entries) {
    if (!guard(entry)) {
      throw new Error(`Invalid value in ${flagName}: ${entry}`);
    }
    parsed.push(entry);
  }

  return Array.from(new Set(parsed));
}

export function requireValue(value: string | undefined, flagName: string): string {
  if (!value || value.startsWith("--")) {
    throw new Error(`${flagName} requires a value.`);
  }
  return value;
}
