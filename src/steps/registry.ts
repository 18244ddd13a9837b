/**
 * Step registry.
 *
 * Maps the step names used in configuration to step constructors. The
 * pipeline only ever looks steps up here, so a new step is added by
 * registering it; nothing in the pipeline changes.
 *
 * Registering a name that already exists replaces the previous
 * constructor.
 */

import { PipelineError, UnknownStepError } from "../errors.js";
import type { StepParamsInput } from "../types/pipeline.js";
import { AnalyzeStep } from "./analyze.js";
import { CleanStep } from "./clean.js";
import { parseStepParams } from "./params.js";
import { TransformStep } from "./transform.js";
import type { Step, StepConstructor } from "./types.js";

export interface StepRegistryOptions {
  /** Register clean, transform and analyze (default true) */
  builtins?: boolean;
}

export class StepRegistry {
  private readonly _steps = new Map<string, StepConstructor>();

  constructor(options: StepRegistryOptions = {}) {
    if (options.builtins ?? true) {
      this.register("clean", CleanStep);
      this.register("transform", TransformStep);
      this.register("analyze", AnalyzeStep);
    }
  }

  /**
   * Associate a name with a step constructor. Last writer wins.
   */
  register(name: string, step: StepConstructor): this {
    if (name.trim() === "") {
      throw new PipelineError("Step name must not be empty");
    }
    this._steps.set(name, step);
    return this;
  }

  /**
   * @throws UnknownStepError if the name was never registered
   */
  resolve(name: string): StepConstructor {
    const step = this._steps.get(name);
    if (step === undefined) {
      throw new UnknownStepError(name, this.names());
    }
    return step;
  }

  has(name: string): boolean {
    return this._steps.has(name);
  }

  /**
   * Registered names in registration order.
   */
  names(): string[] {
    return [...this._steps.keys()];
  }

  /**
   * Default parameters declared by the step registered under `name`.
   */
  defaultParams(name: string): StepParamsInput {
    return this.resolve(name).defaultParams ?? {};
  }

  /**
   * Construct a fresh step instance. Parameters are checked against the
   * step's `paramsSchema` first, when it declares one; the validated
   * values are what the constructor receives.
   *
   * @throws StepParameterError from the schema check or the constructor
   */
  create(name: string, params: StepParamsInput): Step {
    const StepClass = this.resolve(name);
    const checked =
      StepClass.paramsSchema === undefined
        ? params
        : parseStepParams(name, StepClass.paramsSchema, params);
    return new StepClass(checked);
  }
}

export function createDefaultRegistry(): StepRegistry {
  return new StepRegistry();
}
