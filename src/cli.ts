#!/usr/bin/env node
import { existsSync, writeFileSync } from "node:fs";
import { resolve } from "node:path";
import { randomUUID } from "node:crypto";
import { parseAuditArgs, requireValue } from "./cli/args.js";
import { TerminalProgressRenderer } from "./cli/progress.js";
import { loadConfig } from "./config/load.js";
import { createDefaultConfigYaml } from "./config/schema.js";
import { runAudit } from "./core/auditRunner.js";
import { errorMessage } from "./core/errors.js";
import { CATEGORY_CATALOG } from "./core/ruleCatalog.js";
import { createDocumentLoader } from "./document/loader.js";
import { scoreRating } from "./severity/policy.js";

void main();

async function main(): Promise<void> {
  const command = process.argv[2];

  try {
    if (command === "audit") {
      await runAuditCommand(process.argv.slice(3));
      return;
    }

    if (command === "rules" && process.argv[3] === "list") {
      runRulesListCommand();
      return;
    }

    if (command === "config" && process.argv[3] === "init") {
      runConfigInitCommand(process.argv.slice(4));
      return;
    }

    printUsage();
    process.exitCode = 1;
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    process.exitCode = 1;
  }
}

async function runAuditCommand(args: string[]): Promise<void> {
  const parsed = parseAuditArgs(args);
  const { config, source } = loadConfig(parsed.configPath);

  const progress = new TerminalProgressRenderer(Boolean(process.stdout.isTTY));
  const result = await runAudit(
    {
      targets: parsed.targets,
      outDir: resolve(parsed.outDir),
      config,
      formats: parsed.formats ?? config.report.formats,
      failOn: parsed.failOn ?? config.failOn,
      minScore: parsed.minScore ?? config.minScore,
    },
    {
      loader: createDocumentLoader(config),
      now: () => new Date(),
      runIdFactory: () => randomUUID(),
      onProgress: (event) => progress.onEvent(event),
    },
  ).finally(() => progress.close());

  console.log(`Config source: ${source}`);
  for (const [format, path] of Object.entries(result.outputs)) {
    console.log(`${format.toUpperCase()} report: ${path}`);
  }

  for (const page of result.run.pages) {
    if (page.report) {
      console.log(
        `${page.source}: ${page.report.overallScore}/100 (${scoreRating(
          page.report.overallScore,
        )}), ${page.report.issues.length} issues`,
      );
    } else {
      console.warn(`${page.source}: failed (${page.error ?? "unknown error"})`);
    }
  }

  process.exitCode = result.shouldFail ? 2 : 0;
}

function runRulesListCommand(): void {
  for (const entry of CATEGORY_CATALOG) {
    console.log(`${entry.category} [weight ${entry.defaultWeight}]`);
    console.log(`  ${entry.title}`);
    console.log(`  ${entry.description}`);
  }
}

function runConfigInitCommand(args: string[]): void {
  let targetPath = ".a11y-score.yml";
  let force = false;

  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    if (token === "--path") {
      targetPath = requireValue(args[i + 1], "--path");
      i += 1;
      continue;
    }
    if (token === "--force") {
      force = true;
      continue;
    }

    throw new Error(`Unknown config init option: ${token}`);
  }

  const resolved = resolve(targetPath);

  if (existsSync(resolved) && !force) {
    throw new Error(`Config already exists at ${resolved}. Re-run with --force to overwrite.`);
  }

  writeFileSync(resolved, createDefaultConfigYaml(), "utf8");
  console.log(`Wrote config template: ${resolved}`);
}

function printUsage(): void {
  console.log(`a11y-score

Commands:
  a11y-score audit (--url <url> | --file <path>) [...] --out <dir> [--config <path>] [--format json,html,csv,md] [--min-score <n>] [--fail-on critical,warning]
  a11y-score rules list
  a11y-score config init [--path <path>] [--force]
`);
}
