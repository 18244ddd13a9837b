/**
 * Step contract.
 *
 * A step is built from a parameter set and turns text into text. Steps
 * that also measure text implement `analyze`; the pipeline calls it after
 * `process` succeeds and keeps the metrics for the run result.
 */

import type { z } from "zod";
import type { StepParamsInput } from "../types/pipeline.js";
import type { AnalysisMetrics } from "../types/result.js";

export interface Step {
  /** Parameters after validation; fixed for the lifetime of the instance */
  readonly params: StepParamsInput;
  process(text: string): string;
}

export interface AnalyzerStep extends Step {
  analyze(text: string): AnalysisMetrics;
}

/**
 * Constructor registered under a step name.
 *
 * Parameters are validated before a step runs, in one of two ways: a
 * declared `paramsSchema`, which the registry checks before calling the
 * constructor, or the constructor itself throwing StepParameterError (the
 * built-in steps do this so that direct construction is validated too).
 * `defaultParams` is what the pipeline merges overrides into before
 * constructing.
 */
export interface StepConstructor {
  new (params: StepParamsInput): Step;
  readonly defaultParams?: StepParamsInput;
  readonly paramsSchema?: z.ZodType<StepParamsInput, z.ZodTypeDef, unknown>;
}

export function isAnalyzerStep(step: Step): step is AnalyzerStep {
  return "analyze" in step && typeof step.analyze === "function";
}
