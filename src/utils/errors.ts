/**
 * Error types raised by the analysis pipeline.
 * Per-metric arithmetic failures are recovered inside the calculator; the rest propagate.
 */

export class FinanceHealthError extends Error {
  constructor(
    message: string,
    public code: string
  ) {
    super(message);
    this.name = "FinanceHealthError";
  }
}

export class MissingProfileError extends FinanceHealthError {
  constructor() {
    super("A user profile is required to run the analysis.", "MISSING_PROFILE");
    this.name = "MissingProfileError";
  }
}

/**
 * A metric could not be computed, e.g. its denominator is zero.
 */
export class InvalidMetricParameterError extends FinanceHealthError {
  constructor(
    public metric: string,
    public parameter: string
  ) {
    super(
      `Cannot compute '${metric}' due to invalid (possibly zero) value of '${parameter}'.`,
      "INVALID_METRIC_PARAMETER"
    );
    this.name = "InvalidMetricParameterError";
  }
}

export class InvalidConfigurationError extends FinanceHealthError {
  constructor(public problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`, "INVALID_CONFIGURATION");
    this.name = "InvalidConfigurationError";
  }
}

export class FeedbackAssemblyError extends FinanceHealthError {
  constructor(missing: string) {
    super(`Cannot assemble feedback without ${missing}.`, "FEEDBACK_ASSEMBLY_FAILED");
    this.name = "FeedbackAssemblyError";
  }
}

/**
 * Input failed schema validation. Carries one "path: message" entry per issue.
 */
export class RequestValidationError extends FinanceHealthError {
  constructor(public issues: string[]) {
    super(`Invalid input: ${issues.join("; ")}`, "VALIDATION_FAILED");
    this.name = "RequestValidationError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
