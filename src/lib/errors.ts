// src/lib/errors.ts

export type SectionOperation = "generate" | "critique" | "refine";

/**
 * Unknown agency code, missing or malformed configuration (agency JSON,
 * company context, environment). Fatal to the run.
 */
export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

/**
 * A completion call failed or came back unusable while working on a section.
 */
export class GenerationError extends Error {
  readonly sectionName: string;
  readonly operation: SectionOperation;

  constructor(
    sectionName: string,
    operation: SectionOperation,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super(`${operation} failed for "${sectionName}": ${detail}`, options);
    this.name = "GenerationError";
    this.sectionName = sectionName;
    this.operation = operation;
  }
}

/**
 * The caller went away (client disconnect) before the run finished. Raised
 * between calls, so the named operation was never started.
 */
export class RunCancelledError extends GenerationError {
  constructor(sectionName: string, operation: SectionOperation) {
    super(sectionName, operation, "run cancelled");
    this.name = "RunCancelledError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * A proposal run stopped partway. Carries the section and operation that
 * failed and what the run had spent by then.
 */
export class ProposalRunError extends Error {
  readonly sectionName: string;
  readonly operation: SectionOperation;
  readonly costSoFar: number;

  constructor(cause: GenerationError, costSoFar: number) {
    super(cause.message, { cause });
    this.name = "ProposalRunError";
    this.sectionName = cause.sectionName;
    this.operation = cause.operation;
    this.costSoFar = costSoFar;
  }
}
