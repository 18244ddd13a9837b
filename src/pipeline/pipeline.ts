/**
 * Text processing pipeline.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * RUN LIFECYCLE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   Idle ──► Running ──► Completed
 *                   └──► Aborted      (stop policy, first failing step)
 *
 * For each configured step, in order:
 *
 * 1. Merge the step's default parameters with the configured overrides.
 * 2. Construct a fresh step instance. A parameter error here counts as a
 *    step failure.
 * 3. Run `process` on the current text. On success the output becomes the
 *    current text; an analyzer step additionally reports metrics on it.
 * 4. On failure the text stays as it was. Under `continue` the next step
 *    runs; under `stop` the run ends and `process` throws
 *    PipelineAbortedError carrying the partial result.
 *
 * Every run owns its own StatisticsCollector. Batch input runs the same
 * lifecycle once per text, in order, with nothing shared between items.
 */

import { getAppConfig } from "../config/index.js";
import { loadPipelineConfig } from "../config/pipeline/loader.js";
import type { PipelineConfig, PipelineConfigInput } from "../config/pipeline/schema.js";
import {
  PipelineAbortedError,
  PipelineConfigError,
  StepError,
  UnknownStepError,
  type ConfigValidationIssue,
} from "../errors.js";
import { createLogger, type Logger, type LogLevel } from "../logging/logger.js";
import { StepRegistry } from "../steps/registry.js";
import { isAnalyzerStep } from "../steps/types.js";
import { PipelineState, type StepParamsInput } from "../types/pipeline.js";
import type { RunResult, RunSummary } from "../types/result.js";
import { StatisticsCollector, type Clock } from "./statistics.js";

/**
 * Anything a pipeline can be built from: a configuration object (as
 * written or already loaded) or a bare list of step names.
 */
export type PipelineConfigSource = PipelineConfigInput | Readonly<PipelineConfig> | readonly string[];

export interface TextPipelineOptions {
  /** Registry to resolve step names against (default: built-in steps) */
  registry?: StepRegistry;
  /** Logger (default: console logger at logging_level, else LOG_LEVEL) */
  logger?: Logger;
  /** Millisecond clock for timings (default: performance.now) */
  clock?: Clock;
}

/**
 * Console logger, plus a log file when LOG_TO_FILE is set. DEBUG forces
 * debug output; otherwise the configured level wins over LOG_LEVEL.
 */
function defaultLogger(level: LogLevel | undefined): Logger {
  const app = getAppConfig();
  return createLogger({
    level: app.debug ? "debug" : (level ?? app.logLevel),
    file: app.logToFile,
    logDir: app.logDir,
  });
}

export class TextPipeline {
  readonly config: Readonly<PipelineConfig>;
  private readonly registry: StepRegistry;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private lastRun: StatisticsCollector | null = null;

  /**
   * @throws PipelineConfigError (or UnknownStepError) if the configuration
   *   is invalid or names a step the registry does not know
   */
  constructor(config: PipelineConfigSource = {}, options: TextPipelineOptions = {}) {
    this.config = loadPipelineConfig(config);
    this.registry = options.registry ?? new StepRegistry();
    this.clock = options.clock ?? (() => performance.now());
    this.validateStepNames();
    this.logger = options.logger ?? defaultLogger(this.config.logging_level);
  }

  private validateStepNames(): void {
    const available = this.registry.names();

    this.config.steps.forEach((name, index) => {
      if (!this.registry.has(name)) {
        throw new UnknownStepError(name, available, ["steps", index]);
      }
    });

    const issues: ConfigValidationIssue[] = Object.keys(this.config.step_params)
      .filter((name) => !this.registry.has(name))
      .map((name) => ({
        path: ["step_params", name],
        message: `Parameters given for unknown step '${name}'. Available steps: ${available.join(", ")}`,
        code: "unknown_step",
      }));

    if (issues.length > 0) {
      throw new PipelineConfigError(
        `Invalid pipeline configuration: ${issues.length} validation error(s)`,
        issues
      );
    }
  }

  /**
   * Configured step names in execution order.
   */
  stepNames(): readonly string[] {
    return this.config.steps;
  }

  /**
   * Every step name the registry can resolve.
   */
  availableSteps(): string[] {
    return this.registry.names();
  }

  /**
   * Defaults merged with the configured overrides for one step.
   */
  resolveParams(stepName: string): StepParamsInput {
    return Object.freeze({
      ...this.registry.defaultParams(stepName),
      ...this.config.step_params[stepName],
    });
  }

  /**
   * Run the pipeline over one text, or over each text of a batch.
   *
   * @throws PipelineAbortedError under the stop policy when a step fails
   */
  process(text: string): RunResult;
  process(texts: readonly string[]): RunResult[];
  process(input: string | readonly string[]): RunResult | RunResult[] {
    if (typeof input === "string") {
      return this.run(input, this.logger);
    }
    return this.processBatch(input);
  }

  /**
   * One independent run per text, in input order. Under the stop policy
   * the first aborted item ends the batch.
   */
  processBatch(texts: readonly string[]): RunResult[] {
    return texts.map((text, index) => {
      try {
        return this.run(text, this.logger.child({ item: index }));
      } catch (err) {
        if (err instanceof PipelineAbortedError) {
          throw err.atItem(index);
        }
        throw err;
      }
    });
  }

  /**
   * Summary of the most recent run, or null before the first run.
   */
  getStatistics(): RunSummary | null {
    return this.lastRun?.summary() ?? null;
  }

  private run(text: string, logger: Logger): RunResult {
    const stats = new StatisticsCollector(this.clock);
    this.lastRun = stats;

    let state = PipelineState.Idle;
    let failure: StepError | null = null;
    let current = text;

    stats.start();
    state = PipelineState.Running;
    logger.info("Starting text processing pipeline", {
      steps: this.config.steps.length,
      errorHandling: this.config.error_handling,
    });

    for (const stepName of this.config.steps) {
      const params = this.resolveParams(stepName);
      const startedAt = this.clock();
      logger.debug("Executing step", { step: stepName });

      try {
        const step = this.registry.create(stepName, params);
        const output = step.process(current);
        const metrics = isAnalyzerStep(step) ? step.analyze(output) : null;
        const duration = this.clock() - startedAt;

        stats.recordSuccess(stepName, duration, step.params);
        if (metrics !== null) {
          stats.recordAnalysis(metrics);
        }
        current = output;
        logger.debug("Step completed", { step: stepName, durationMs: duration });
      } catch (err) {
        const error = err instanceof StepError ? err : new StepError(stepName, err);
        stats.recordFailure(stepName, this.clock() - startedAt, error, params);

        if (this.config.error_handling === "stop") {
          logger.error("Step failed; stopping pipeline", { step: stepName, error: error.reason });
          failure = error;
          state = PipelineState.Aborted;
          break;
        }
        logger.warn("Step failed; continuing with unchanged text", {
          step: stepName,
          error: error.reason,
        });
      }
    }

    if (state === PipelineState.Running) {
      state = PipelineState.Completed;
    }
    stats.stop();

    const status = state === PipelineState.Aborted ? PipelineState.Aborted : PipelineState.Completed;
    const result = stats.finalize(current, status);

    logger.info("Pipeline finished", {
      status,
      applied: result.stepsApplied.length,
      skipped: result.stepsSkipped.length,
    });

    if (failure !== null) {
      throw new PipelineAbortedError(failure, result);
    }
    return result;
  }
}
