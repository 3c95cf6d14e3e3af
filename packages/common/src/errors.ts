/**
 * Error taxonomy shared by the pipeline and the CLI.
 *
 * Configuration and input errors are raised before any work starts.
 * Analysis errors stay inside the orchestrator unless every unit fails.
 */

export class ChangedocError extends Error {
  constructor(
    message: string,
    public readonly internalDetails?: string,
  ) {
    super(message);
    this.name = "ChangedocError";
    Object.setPrototypeOf(this, ChangedocError.prototype);
  }
}

/** Invalid sizes, budgets or pool settings. */
export class ConfigurationError extends ChangedocError {
  constructor(message: string, internalDetails?: string) {
    super(message, internalDetails);
    this.name = "ConfigurationError";
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/** Nothing to analyse (e.g. empty modified code). */
export class InputError extends ChangedocError {
  constructor(message: string, internalDetails?: string) {
    super(message, internalDetails);
    this.name = "InputError";
    Object.setPrototypeOf(this, InputError.prototype);
  }
}

export class AnalysisError extends ChangedocError {
  constructor(message: string, internalDetails?: string) {
    super(message, internalDetails);
    this.name = "AnalysisError";
    Object.setPrototypeOf(this, AnalysisError.prototype);
  }
}

export class AnalysisTimeoutError extends AnalysisError {
  constructor(public readonly timeoutMs: number) {
    super(`Analysis call timed out after ${timeoutMs}ms`);
    this.name = "AnalysisTimeoutError";
    Object.setPrototypeOf(this, AnalysisTimeoutError.prototype);
  }
}

export interface UnitFailure {
  index: number;
  reason: string;
}

/** Every prompt unit failed, so there is no document worth returning. */
export class SubmissionFailureError extends ChangedocError {
  constructor(public readonly failures: UnitFailure[]) {
    super(
      `Analysis failed for all ${failures.length} section(s)`,
      failures.map((f) => `#${f.index + 1}: ${f.reason}`).join("; "),
    );
    this.name = "SubmissionFailureError";
    Object.setPrototypeOf(this, SubmissionFailureError.prototype);
  }
}

export class SubmissionCancelledError extends ChangedocError {
  constructor() {
    super("Submission was cancelled");
    this.name = "SubmissionCancelledError";
    Object.setPrototypeOf(this, SubmissionCancelledError.prototype);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
