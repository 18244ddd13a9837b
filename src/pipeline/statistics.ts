/**
 * Statistics collector for one pipeline run.
 *
 * A collector belongs to exactly one run. The pipeline brackets the run
 * with start() and stop(), records every step attempt, and assembles the
 * result with finalize(). Reading does not clear anything, so finalize()
 * and summary() can be called any number of times.
 */

import { PipelineError, StepError } from "../errors.js";
import { PipelineState, type RunStatus, type StepMetadata, type StepParamsInput } from "../types/pipeline.js";
import type { AnalysisMetrics, RunResult, RunSummary } from "../types/result.js";

export type Clock = () => number;

function errorMessage(error: unknown): string {
  if (error instanceof StepError) {
    return error.reason;
  }
  return error instanceof Error ? error.message : String(error);
}

export class StatisticsCollector {
  private readonly _stepsApplied: string[] = [];
  private readonly _stepsSkipped: string[] = [];
  private readonly _errors: string[] = [];
  private readonly _stepMetadata: StepMetadata[] = [];
  private _analysis: AnalysisMetrics = {};
  private _startedAt: number | null = null;
  private _elapsed: number | null = null;
  private _finishedAt: string | null = null;
  private readonly clock: Clock;

  /**
   * @param clock - Millisecond clock; defaults to performance.now
   */
  constructor(clock: Clock = () => performance.now()) {
    this.clock = clock;
  }

  start(): void {
    this._startedAt = this.clock();
    this._elapsed = null;
    this._finishedAt = null;
  }

  stop(): void {
    if (this._startedAt === null) {
      throw new PipelineError("Statistics collector stopped before it was started");
    }
    this._elapsed = Math.max(0, this.clock() - this._startedAt);
    this._finishedAt = new Date().toISOString();
  }

  /** Elapsed run time in milliseconds, or null until stop() */
  get elapsed(): number | null {
    return this._elapsed;
  }

  recordSuccess(stepName: string, executionTime: number, parameters: StepParamsInput): void {
    this._stepsApplied.push(stepName);
    this._stepMetadata.push({
      stepName,
      executionTime,
      success: true,
      parameters,
    });
  }

  recordFailure(
    stepName: string,
    executionTime: number,
    error: unknown,
    parameters: StepParamsInput
  ): void {
    const message = errorMessage(error);
    this._stepsSkipped.push(stepName);
    this._errors.push(`${stepName}: ${message}`);
    this._stepMetadata.push({
      stepName,
      executionTime,
      success: false,
      errorMessage: message,
      parameters,
    });
  }

  /**
   * Merge metrics into the run's analysis; later values win per key.
   */
  recordAnalysis(metrics: AnalysisMetrics): void {
    this._analysis = { ...this._analysis, ...metrics };
  }

  /**
   * Assemble the run result.
   *
   * @throws PipelineError if the run has not been stopped
   */
  finalize(processedText: string, status: RunStatus = PipelineState.Completed): RunResult {
    if (this._elapsed === null || this._finishedAt === null) {
      throw new PipelineError("Cannot finalize a run that has not been stopped");
    }

    return Object.freeze({
      processedText,
      stepsApplied: Object.freeze([...this._stepsApplied]),
      stepsSkipped: Object.freeze([...this._stepsSkipped]),
      errors: Object.freeze([...this._errors]),
      analysis: Object.freeze({ ...this._analysis }),
      processingTime: this._elapsed,
      status,
      stepMetadata: Object.freeze(this._stepMetadata.map((meta) => Object.freeze({ ...meta }))),
      timestamp: this._finishedAt,
    });
  }

  summary(): RunSummary {
    const stepCount = this._stepMetadata.length;
    const totalExecutionTime = this._stepMetadata.reduce(
      (sum, meta) => sum + meta.executionTime,
      0
    );

    return {
      stepsApplied: [...this._stepsApplied],
      stepsSkipped: [...this._stepsSkipped],
      errors: [...this._errors],
      totalExecutionTime,
      stepCount,
      successRate: stepCount === 0 ? 0 : this._stepsApplied.length / stepCount,
      analysis: { ...this._analysis },
    };
  }
}
