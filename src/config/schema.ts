import { ConfigError } from "../core/errors.js";
import { CATEGORY_CATALOG } from "../core/ruleCatalog.js";
import {
  CATEGORIES,
  type AppConfig,
  type Category,
  type CategoryWeights,
  type ReportFormat,
  type Severity,
  type Thresholds,
} from "../core/types.js";

const VALID_SEVERITIES: Severity[] = ["critical", "warning", "info"];

const VALID_FORMATS: ReportFormat[] = ["json", "html", "csv", "md"];

export const DEFAULT_WEIGHTS: CategoryWeights = validateWeights(
  Object.fromEntries(
    CATEGORY_CATALOG.map((entry) => [entry.category, entry.defaultWeight]),
  ),
);

export const DEFAULT_GENERIC_LINK_TEXTS: readonly string[] = deepFreeze([
  "click here",
  "read more",
  "more",
  "link",
  "here",
  "this",
  "page",
  "learn more",
]);

export const DEFAULT_THRESHOLDS: Thresholds = deepFreeze<Thresholds>({
  images: {
    maxAltLength: 125,
  },
  headings: {
    missingH1: 50,
    multipleH1: 30,
    levelSkip: 10,
    maxLevelSkip: 50,
    emptyHeading: 10,
  },
  links: {
    flaggedLink: 10,
    maxDeduction: 60,
    genericTexts: DEFAULT_GENERIC_LINK_TEXTS,
  },
  structure: {
    missingBanner: 10,
    missingNavigation: 10,
    missingMain: 30,
    missingContentInfo: 10,
    missingLang: 20,
    missingTitle: 10,
    multipleMain: 10,
  },
  contrast: {
    normalText: 4.5,
    largeText: 3,
  },
  keyboard: {
    negativeTabindex: 10,
    positiveTabindex: 5,
    outlineRemoved: 5,
    unfocusableWidget: 15,
  },
});

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0 Safari/537.36";

export const DEFAULT_CONFIG: AppConfig = deepFreeze<AppConfig>({
  weights: DEFAULT_WEIGHTS,
  thresholds: DEFAULT_THRESHOLDS,
  failOn: ["critical"],
  minScore: 0,
  report: {
    formats: ["json", "html"],
  },
  http: {
    timeoutMs: 30_000,
    userAgent: DEFAULT_USER_AGENT,
  },
});

/**
 * Throws unless every category has a finite, non-negative weight and the
 * weights sum to 100.
 */
export function validateWeights(weights: Partial<Record<Category, unknown>>): CategoryWeights {
  const weightOf = (category: Category): number => {
    const weight = weights[category];
    if (typeof weight !== "number" || !Number.isFinite(weight) || weight < 0) {
      throw new ConfigError(`weights.${category} must be a non-negative number.`);
    }
    return weight;
  };

  const validated: CategoryWeights = {
    images: weightOf("images"),
    headings: weightOf("headings"),
    links: weightOf("links"),
    forms: weightOf("forms"),
    structure: weightOf("structure"),
    contrast: weightOf("contrast"),
    keyboard: weightOf("keyboard"),
  };

  const unknown = Object.keys(weights).filter(
    (key) => !CATEGORIES.some((category) => category === key),
  );
  if (unknown.length > 0) {
    throw new ConfigError(`weights contains unknown categories: ${unknown.join(", ")}.`);
  }

  const total = CATEGORIES.reduce((sum, category) => sum + validated[category], 0);
  if (Math.abs(total - 100) > 1e-9) {
    throw new ConfigError(`weights must sum to 100 (got ${total}).`);
  }

  return Object.freeze(validated);
}

/** Recursively freezes plain objects and arrays. */
export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

export function createDefaultConfigYaml(): string {
  const t = DEFAULT_THRESHOLDS;
  return [
    "weights:",
    ...CATEGORY_CATALOG.map((entry) => `  ${entry.category}: ${entry.defaultWeight}`),
    "failOn:",
    "  - critical",
    "minScore: 0",
    "report:",
    "  formats:",
    "    - json",
    "    - html",
    "http:",
    `  timeoutMs: ${DEFAULT_CONFIG.http.timeoutMs}`,
    "thresholds:",
    "  images:",
    `    maxAltLength: ${t.images.maxAltLength}`,
    "  headings:",
    ...numberLines(t.headings, 4),
    "  links:",
    `    flaggedLink: ${t.links.flaggedLink}`,
    `    maxDeduction: ${t.links.maxDeduction}`,
    "    genericTexts:",
    ...t.links.genericTexts.map((text) => `      - "${text}"`),
    "  structure:",
    ...numberLines(t.structure, 4),
    "  contrast:",
    ...numberLines(t.contrast, 4),
    "  keyboard:",
    ...numberLines(t.keyboard, 4),
    "",
  ].join("\n");
}

function numberLines(values: Record<string, number>, indent: number): string[] {
  return Object.entries(values).map(([key, value]) => `${" ".repeat(indent)}${key}: ${value}`);
}

export function validateAndNormalizeConfig(input: unknown): AppConfig {
  if (input === null || input === undefined) {
    return DEFAULT_CONFIG;
  }

  if (!isObject(input)) {
    throw new ConfigError("Config root must be a YAML object.");
  }

  const weights =
    input.weights === undefined
      ? DEFAULT_WEIGHTS
      : validateWeights(requireObject(input.weights, "weights"));

  const thresholds = normalizeThresholds(input.thresholds);
  const failOn = normalizeSeverityList(input.failOn, "failOn", DEFAULT_CONFIG.failOn);

  const minScore =
    input.minScore === undefined
      ? DEFAULT_CONFIG.minScore
      : parseScore(input.minScore, "minScore");

  const reportValue = input.report === undefined ? {} : requireObject(input.report, "report");
  const formats = normalizeReportFormats(reportValue.formats, DEFAULT_CONFIG.report.formats);

  const httpValue = input.http === undefined ? {} : requireObject(input.http, "http");
  const timeoutMs =
    httpValue.timeoutMs === undefined
      ? DEFAULT_CONFIG.http.timeoutMs
      : parsePositiveNumber(httpValue.timeoutMs, "http.timeoutMs");
  const userAgent =
    httpValue.userAgent === undefined
      ? DEFAULT_CONFIG.http.userAgent
      : toStringField(httpValue.userAgent, "http.userAgent");

  return {
    weights,
    thresholds,
    failOn,
    minScore,
    report: { formats },
    http: { timeoutMs, userAgent },
  };
}

function normalizeThresholds(value: unknown): Thresholds {
  const base = DEFAULT_THRESHOLDS;
  if (value === undefined) {
    return base;
  }

  const input = requireObject(value, "thresholds");
  const section = (name: keyof Thresholds): Record<string, unknown> =>
    input[name] === undefined ? {} : requireObject(input[name], `thresholds.${name}`);

  const images = section("images");
  const headings = section("headings");
  const links = section("links");
  const structure = section("structure");
  const contrast = section("contrast");
  const keyboard = section("keyboard");

  return {
    images: mergeNumbers(base.images, images, "thresholds.images"),
    headings: mergeNumbers(base.headings, headings, "thresholds.headings"),
    links: {
      flaggedLink: numberOr(links.flaggedLink, base.links.flaggedLink, "thresholds.links.flaggedLink"),
      maxDeduction: numberOr(
        links.maxDeduction,
        base.links.maxDeduction,
        "thresholds.links.maxDeduction",
      ),
      genericTexts: normalizeGenericTexts(links.genericTexts, base.links.genericTexts),
    },
    structure: mergeNumbers(base.structure, structure, "thresholds.structure"),
    contrast: mergeNumbers(base.contrast, contrast, "thresholds.contrast"),
    keyboard: mergeNumbers(base.keyboard, keyboard, "thresholds.keyboard"),
  };
}

function mergeNumbers<T extends Record<string, number>>(
  base: T,
  overrides: Record<string, unknown>,
  label: string,
): T {
  const out = { ...base };
  for (const [key, raw] of Object.entries(overrides)) {
    if (!(key in base)) {
      throw new ConfigError(`${label}.${key} is not a known threshold.`);
    }
    Object.assign(out, { [key]: parsePositiveNumber(raw, `${label}.${key}`, true) });
  }
  return out;
}

function numberOr(value: unknown, fallback: number, label: string): number {
  return value === undefined ? fallback : parsePositiveNumber(value, label, true);
}

function normalizeGenericTexts(value: unknown, fallback: readonly string[]): string[] {
  if (value === undefined) {
    return [...fallback];
  }
  if (!Array.isArray(value)) {
    throw new ConfigError("thresholds.links.genericTexts must be an array of strings.");
  }
  return value.map((entry, idx) =>
    toStringField(entry, `thresholds.links.genericTexts[${idx}]`).toLowerCase(),
  );
}

function normalizeSeverityList(
  value: unknown,
  label: string,
  fallback: readonly Severity[],
): Severity[] {
  if (value === undefined) {
    return [...fallback];
  }

  if (!Array.isArray(value)) {
    throw new ConfigError(`${label} must be an array of severities.`);
  }

  return Array.from(new Set(value.map((entry, idx) => parseSeverity(entry, `${label}[${idx}]`))));
}

function normalizeReportFormats(
  value: unknown,
  fallback: readonly ReportFormat[],
): ReportFormat[] {
  if (value === undefined) {
    return [...fallback];
  }

  if (!Array.isArray(value) || value.length === 0) {
    throw new ConfigError("report.formats must be a non-empty array.");
  }

  const formats = value.map((entry, idx) => {
    if (!isReportFormat(entry)) {
      throw new ConfigError(
        `report.formats[${idx}] must be one of: ${VALID_FORMATS.join(", ")}.`,
      );
    }
    return entry;
  });

  return Array.from(new Set(formats));
}

export function parseSeverity(value: unknown, label: string): Severity {
  if (!isSeverity(value)) {
    throw new ConfigError(`${label} must be one of: ${VALID_SEVERITIES.join(", ")}.`);
  }
  return value;
}

export function isSeverity(value: unknown): value is Severity {
  return VALID_SEVERITIES.some((severity) => severity === value);
}

export function isReportFormat(value: unknown): value is ReportFormat {
  return VALID_FORMATS.some((format) => format === value);
}

export function parseScore(value: unknown, label: string): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0 || value > 100) {
    throw new ConfigError(`${label} must be a number between 0 and 100.`);
  }
  return value;
}

function parsePositiveNumber(value: unknown, label: string, allowZero = false): number {
  if (
    typeof value !== "number" ||
    !Number.isFinite(value) ||
    value < 0 ||
    (!allowZero && value === 0)
  ) {
    throw new ConfigError(`${label} must be a ${allowZero ? "non-negative" : "positive"} number.`);
  }
  return value;
}

function requireObject(value: unknown, label: string): Record<string, unknown> {
  if (!isObject(value)) {
    throw new ConfigError(`${label} must be an object.`);
  }
  return value;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toStringField(value: unknown, label: string): string {
  if (typeof value !== "string" || value.trim() === "") {
    throw new ConfigError(`${label} must be a non-empty string.`);
  }
  return value.trim();
}
