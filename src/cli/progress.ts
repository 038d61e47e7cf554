import type { AuditProgressEvent, AuditProgressStage } from "../core/types.js";

const SPINNER_FRAMES = ["|", "/", "-", "\\"];

const STAGE_LABELS: Record<AuditProgressStage, string> = {
  fetch: "fetch",
  parse: "parse",
  evaluate: "evaluate",
  report: "write-report",
};

interface ActiveStage {
  prefix: string;
  stage: AuditProgressStage;
  startedAt: number;
}

/** Renders runner progress: a spinner on a TTY, one line per event otherwise. */
export class TerminalProgressRenderer {
  private spinnerTimer: ReturnType<typeof setInterval> | undefined;

  private spinnerFrame = 0;

  private activeStage: ActiveStage | undefined;

  private runStartedAt = 0;

  constructor(
    private readonly isTty: boolean,
    private readonly write: (line: string) => void = (line) => console.log(line),
  ) {}

  onEvent(event: AuditProgressEvent): void {
    switch (event.type) {
      case "run-start":
        this.runStartedAt = Date.now();
        this.writeLine(`=> auditing ${event.totalTargets} page(s)`);
        return;
      case "target-start":
        this.stopSpinner();
        this.writeLine(`=> [${event.targetIndex}/${event.totalTargets}] page ${event.source}`);
        return;
      case "stage-start":
        this.activeStage = {
          prefix: `[${event.targetIndex}/${event.totalTargets}]`,
          stage: event.stage,
          startedAt: Date.now(),
        };
        this.startSpinner();
        return;
      case "stage-end": {
        const elapsed = formatElapsed(Date.now() - (this.activeStage?.startedAt ?? Date.now()));
        this.stopSpinner();
        const status = event.success === false ? "failed" : "done";
        const detail = event.message ? ` (${event.message})` : "";
        this.writeLine(
          `=> [${event.targetIndex}/${event.totalTargets}] ${STAGE_LABELS[event.stage]} ${status} in ${elapsed}${detail}`,
        );
        this.activeStage = undefined;
        return;
      }
      case "target-end": {
        const status = event.success ? "scored" : "failed";
        const detail = event.message ? ` (${event.message})` : "";
        this.writeLine(`=> [${event.targetIndex}/${event.totalTargets}] page ${status}${detail}`);
        return;
      }
      case "run-end":
        this.stopSpinner();
        this.writeLine(`=> finished in ${formatElapsed(Date.now() - this.runStartedAt)}`);
        return;
    }
  }

  close(): void {
    this.stopSpinner();
  }

  private startSpinner(): void {
    if (!this.isTty || !this.activeStage) {
      return;
    }

    this.stopSpinner();
    this.spinnerTimer = setInterval(() => {
      const active = this.activeStage;
      if (!active) {
        return;
      }
      const frame = SPINNER_FRAMES[this.spinnerFrame % SPINNER_FRAMES.length];
      this.spinnerFrame += 1;
      process.stdout.write(
        `\r=> ${active.prefix} ${STAGE_LABELS[active.stage]} ${frame} ${formatElapsed(
          Date.now() - active.startedAt,
        )}`,
      );
    }, 125);
  }

  private stopSpinner(): void {
    if (!this.spinnerTimer) {
      return;
    }
    clearInterval(this.spinnerTimer);
    this.spinnerTimer = undefined;
    if (this.isTty) {
      process.stdout.write("\r");
    }
  }

  private writeLine(line: string): void {
    this.write(line);
  }
}

function formatElapsed(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}
