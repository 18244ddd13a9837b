/**
 * Run results and analysis metrics.
 */

import type { RunStatus, StepMetadata } from "./pipeline.js";

export type ReadingLevel = "Basic" | "Intermediate" | "Advanced" | "Unknown";

/**
 * Metrics produced by an analyzer step. Each field is present only when
 * the corresponding flag was enabled.
 */
export interface AnalysisMetrics {
  wordCount?: number;
  characterCount?: number;
  characterCountNoSpaces?: number;
  sentenceCount?: number;
  paragraphCount?: number;
  averageWordLength?: number;
  readingLevel?: ReadingLevel;
}

/**
 * Outcome of processing one text.
 */
export interface RunResult {
  readonly processedText: string;
  readonly stepsApplied: readonly string[];
  readonly stepsSkipped: readonly string[];
  /** One "<step>: <message>" entry per failed step */
  readonly errors: readonly string[];
  readonly analysis: Readonly<AnalysisMetrics>;
  /** Total wall time of the run in milliseconds */
  readonly processingTime: number;
  readonly status: RunStatus;
  readonly stepMetadata: readonly StepMetadata[];
  /** ISO timestamp of when the result was assembled */
  readonly timestamp: string;
}

/**
 * Aggregate view of a run's step records.
 */
export interface RunSummary {
  readonly stepsApplied: readonly string[];
  readonly stepsSkipped: readonly string[];
  readonly errors: readonly string[];
  /** Sum of per-step execution times in milliseconds */
  readonly totalExecutionTime: number;
  readonly stepCount: number;
  /** Applied steps over attempted steps; 0 when nothing was attempted */
  readonly successRate: number;
  readonly analysis: Readonly<AnalysisMetrics>;
}
