/**
 * Run lifecycle and per-step records.
 */

/**
 * Lifecycle of a single run.
 * Idle -> Running -> Completed | Aborted
 */
export enum PipelineState {
  Idle = "idle",
  Running = "running",
  Completed = "completed",
  Aborted = "aborted",
}

/** Terminal states a run can end in */
export type RunStatus = PipelineState.Completed | PipelineState.Aborted;

/**
 * Raw step parameters as supplied to a step constructor.
 */
export type StepParamsInput = Readonly<Record<string, unknown>>;

/**
 * What happened to one step invocation.
 */
export interface StepMetadata {
  readonly stepName: string;
  /** Wall time in milliseconds */
  readonly executionTime: number;
  readonly success: boolean;
  readonly errorMessage?: string;
  readonly parameters: StepParamsInput;
}
