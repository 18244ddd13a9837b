/**
 * Pipeline configuration schema definition.
 *
 * A configuration is validated once, when a pipeline is constructed, and
 * is frozen afterwards. Every run of that pipeline sees the same steps,
 * the same failure policy and the same parameters.
 *
 * The field names match the on-disk JSON format (`steps`,
 * `error_handling`, `step_params`, `logging_level`).
 */

import { z } from "zod";
import { BuiltinStepName, ErrorHandling, LoggingLevel } from "./enums.js";

/**
 * Parameters of the clean step.
 */
export const CleanParamsSchema = z
  .object({
    remove_extra_spaces: z
      .boolean()
      .describe("Collapse runs of whitespace into a single space"),
    preserve_newlines: z
      .boolean()
      .describe("Collapse spaces and tabs only, keeping paragraph breaks"),
    trim_edges: z.boolean().describe("Trim leading and trailing whitespace"),
  })
  .strict();

export type CleanParams = z.infer<typeof CleanParamsSchema>;

/**
 * Parameters of the transform step.
 */
export const TransformParamsSchema = z
  .object({
    to_lowercase: z.boolean().describe("Lowercase the text"),
    remove_punctuation: z.boolean().describe("Strip ASCII punctuation"),
    remove_numbers: z.boolean().describe("Strip runs of digits"),
    remove_special_chars: z
      .boolean()
      .describe("Strip anything other than letters, digits and whitespace"),
  })
  .strict();

export type TransformParams = z.infer<typeof TransformParamsSchema>;

/**
 * Parameters of the analyze step. Each flag gates one metric.
 */
export const AnalyzeParamsSchema = z
  .object({
    count_words: z.boolean(),
    count_characters: z.boolean(),
    count_sentences: z.boolean(),
    count_paragraphs: z.boolean(),
    average_word_length: z.boolean(),
    reading_level: z.boolean(),
  })
  .strict();

export type AnalyzeParams = z.infer<typeof AnalyzeParamsSchema>;

/**
 * Parameter overrides for one step: parameter name -> boolean.
 */
export const StepParamOverridesSchema = z.record(z.string(), z.boolean());

export type StepParamOverrides = z.infer<typeof StepParamOverridesSchema>;

/**
 * Complete pipeline configuration schema.
 *
 * Missing `steps`, `error_handling` and `step_params` fall back to their
 * defaults. Without `logging_level` the default logger follows the
 * environment. Unknown fields are rejected.
 */
export const PipelineConfigSchema = z
  .object({
    /** Step names in execution order; duplicates run independently */
    steps: z
      .array(z.string().min(1, "Step name must not be empty"))
      .default([...BuiltinStepName.options])
      .describe("Ordered step names to run"),

    /** What happens when a step fails */
    error_handling: ErrorHandling.default("continue").describe(
      "Failure policy: continue past a failing step or stop the run"
    ),

    /** Per-step parameter overrides, merged over each step's defaults */
    step_params: z
      .record(z.string(), StepParamOverridesSchema)
      .default({})
      .describe("Parameter overrides keyed by step name"),

    /** Level for the pipeline's default logger */
    logging_level: LoggingLevel.optional().describe(
      "Minimum level logged by the pipeline"
    ),
  })
  .strict();

/** Validated configuration with every default applied */
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

/** Configuration as written by a caller or read from JSON */
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;
