import type { Category } from "./types.js";

export class AuditError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The document is missing, empty or could not be parsed. */
export class InputError extends AuditError {}

/** Invalid weights or configuration; raised before any page is evaluated. */
export class ConfigError extends AuditError {}

export class EvaluatorFault extends AuditError {
  constructor(
    readonly category: Category,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
