export const CATEGORIES = [
  "images",
  "headings",
  "links",
  "forms",
  "structure",
  "contrast",
  "keyboard",
] as const;

export type Category = (typeof CATEGORIES)[number];

export type Severity = "critical" | "warning" | "info";

export type ReportFormat = "json" | "html" | "csv" | "md";

export interface HtmlElement {
  readonly index: number;
  readonly tagName: string;
  readonly attributes: ReadonlyMap<string, string>;
  readonly children: readonly HtmlElement[];
  /** Text of descendants too, minus script, style, template and noscript. */
  readonly text: string;
  /** Text of direct text-node children only. */
  readonly ownText: string;
  readonly parentIndex?: number;
}

export interface HtmlDocument {
  readonly root: HtmlElement;
  /** Every element, in document order; `elements[i].index === i`. */
  readonly elements: readonly HtmlElement[];
}

export interface RawNode {
  tagName: string;
  attributes?: Record<string, string>;
  children?: Array<RawNode | string>;
}

export interface ElementRef {
  tagName: string;
  attribute?: {
    name: string;
    value: string;
  };
}

export interface Issue {
  readonly id: string;
  readonly category: Category;
  readonly ruleId: string;
  readonly severity: Severity;
  readonly message: string;
  readonly element?: ElementRef;
  readonly fix?: string;
}

export interface CategoryResult {
  readonly category: Category;
  readonly score: number;
  readonly issues: readonly Issue[];
}

export interface AccessibilityReport {
  readonly overallScore: number;
  readonly categories: Readonly<Record<Category, number>>;
  readonly issues: readonly Issue[];
}

export type CategoryWeights = Readonly<Record<Category, number>>;

export interface Thresholds {
  readonly images: {
    readonly maxAltLength: number;
  };
  readonly headings: {
    readonly missingH1: number;
    readonly multipleH1: number;
    readonly levelSkip: number;
    readonly maxLevelSkip: number;
    readonly emptyHeading: number;
  };
  readonly links: {
    readonly flaggedLink: number;
    readonly maxDeduction: number;
    readonly genericTexts: readonly string[];
  };
  readonly structure: {
    readonly missingBanner: number;
    readonly missingNavigation: number;
    readonly missingMain: number;
    readonly missingContentInfo: number;
    readonly missingLang: number;
    readonly missingTitle: number;
    readonly multipleMain: number;
  };
  readonly contrast: {
    readonly normalText: number;
    readonly largeText: number;
  };
  readonly keyboard: {
    readonly negativeTabindex: number;
    readonly positiveTabindex: number;
    readonly outlineRemoved: number;
    readonly unfocusableWidget: number;
  };
}

export interface EngineConfig {
  readonly weights: CategoryWeights;
  readonly thresholds: Thresholds;
}

export interface RulePolicies {
  isGenericLinkText: (name: string, thresholds: Thresholds) => boolean;
  isMeaningfulImage: (image: HtmlElement, document: HtmlDocument) => boolean;
  hasFocusAffordance: (element: HtmlElement, document: HtmlDocument) => boolean;
  isLargeText: (fontSizePx?: number, fontWeight?: number) => boolean;
}

export interface EvaluationContext {
  document: HtmlDocument;
  thresholds: Thresholds;
  policies: RulePolicies;
}

export interface CategoryEvaluator {
  category: Category;
  title: string;
  description: string;
  evaluate: (ctx: EvaluationContext) => CategoryResult;
}

export interface AppConfig extends EngineConfig {
  readonly failOn: readonly Severity[];
  readonly minScore: number;
  readonly report: {
    readonly formats: readonly ReportFormat[];
  };
  readonly http: {
    readonly timeoutMs: number;
    readonly userAgent: string;
  };
}

export interface LoadedPage {
  source: string;
  html: string;
}

export interface DocumentLoader {
  load(source: string): Promise<LoadedPage>;
}

export interface PageResult {
  source: string;
  report?: AccessibilityReport;
  error?: string;
}

export interface AuditSummary {
  totalPages: number;
  failedPages: number;
  averageScore?: number;
  totalIssues: number;
  bySeverity: Record<Severity, number>;
}

export interface AuditRun {
  runId: string;
  startedAt: string;
  finishedAt: string;
  summary: AuditSummary;
  pages: PageResult[];
}

export type AuditProgressStage = "fetch" | "parse" | "evaluate" | "report";

export type AuditProgressEvent =
  | { type: "run-start"; totalTargets: number }
  | { type: "run-end"; totalTargets: number }
  | {
      type: "target-start";
      totalTargets: number;
      targetIndex: number;
      source: string;
    }
  | {
      type: "target-end";
      totalTargets: number;
      targetIndex: number;
      source: string;
      success: boolean;
      message?: string;
    }
  | {
      type: "stage-start";
      totalTargets: number;
      targetIndex: number;
      source: string;
      stage: AuditProgressStage;
    }
  | {
      type: "stage-end";
      totalTargets: number;
      targetIndex: number;
      source: string;
      stage: AuditProgressStage;
      success?: boolean;
      message?: string;
    };

export interface AuditRunOptions {
  targets: string[];
  outDir: string;
  config: AppConfig;
  formats: readonly ReportFormat[];
  failOn: readonly Severity[];
  minScore: number;
}

export interface AuditRunDeps {
  loader: DocumentLoader;
  now: () => Date;
  runIdFactory: () => string;
  onProgress?: (event: AuditProgressEvent) => void;
}
