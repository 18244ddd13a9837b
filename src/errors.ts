/**
 * Error hierarchy for the text pipeline.
 *
 * Configuration problems surface from pipeline construction. Step
 * problems surface per run and are subject to the failure policy.
 */

import type { RunResult } from "./types/result.js";

/**
 * Individual validation issue.
 */
export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code, or a pipeline-specific code such as "unknown_step" */
  code: string;
}

function formatIssues(title: string, issues: readonly ConfigValidationIssue[]): string {
  const lines = [title];
  for (const issue of issues) {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    lines.push(`  - ${path}: ${issue.message}`);
  }
  return lines.join("\n");
}

export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineError";
  }
}

/**
 * The pipeline configuration was rejected before any text was processed.
 */
export class PipelineConfigError extends PipelineError {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[], options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    return formatIssues("Pipeline configuration validation failed:", this.issues);
  }
}

/**
 * A step name that the registry does not know.
 */
export class UnknownStepError extends PipelineConfigError {
  public readonly stepName: string;
  public readonly available: readonly string[];

  constructor(stepName: string, available: readonly string[], path: (string | number)[] = []) {
    const message = `Unknown step '${stepName}'. Available steps: ${available.join(", ")}`;
    super(message, [{ path, message, code: "unknown_step" }]);
    this.name = "UnknownStepError";
    this.stepName = stepName;
    this.available = available;
  }
}

/**
 * A step was constructed with a missing, unknown or wrong-typed parameter.
 */
export class StepParameterError extends PipelineError {
  public readonly stepName: string;
  public readonly issues: ConfigValidationIssue[];

  constructor(stepName: string, issues: ConfigValidationIssue[]) {
    const detail = issues
      .map((issue) => `${issue.path.join(".") || "(params)"}: ${issue.message}`)
      .join("; ");
    super(`Invalid parameters for step '${stepName}': ${detail}`);
    this.name = "StepParameterError";
    this.stepName = stepName;
    this.issues = issues;
  }

  format(): string {
    return formatIssues(`Parameters for step '${this.stepName}' are invalid:`, this.issues);
  }
}

/**
 * A step failed while being constructed or while processing text.
 */
export class StepError extends PipelineError {
  public readonly stepName: string;
  /** Message of the underlying fault, without the step prefix */
  public readonly reason: string;

  constructor(stepName: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Step '${stepName}' failed: ${reason}`, { cause });
    this.name = "StepError";
    this.stepName = stepName;
    this.reason = reason;
  }
}

/**
 * A run ended early under the stop policy.
 * Carries the partial result assembled up to and including the failing step.
 */
export class PipelineAbortedError extends PipelineError {
  public readonly stepName: string;
  public readonly result: RunResult;
  /** Position of the failing text when a batch was submitted */
  public readonly itemIndex: number | undefined;

  constructor(cause: StepError, result: RunResult, itemIndex?: number) {
    const where = itemIndex === undefined ? "" : ` (item ${itemIndex})`;
    super(`Pipeline aborted at step '${cause.stepName}'${where}: ${cause.reason}`, { cause });
    this.name = "PipelineAbortedError";
    this.stepName = cause.stepName;
    this.result = result;
    this.itemIndex = itemIndex;
  }

  /**
   * Same failure, tagged with its position in a batch.
   */
  atItem(itemIndex: number): PipelineAbortedError {
    const cause = this.cause instanceof StepError ? this.cause : new StepError(this.stepName, this.cause);
    return new PipelineAbortedError(cause, this.result, itemIndex);
  }
}
