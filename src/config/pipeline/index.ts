/**
 * Pipeline configuration module.
 *
 * Usage:
 *   import { loadPipelineConfig, loadPipelineConfigFromFile } from "./config/pipeline/index.js";
 *
 *   // Defaults: clean -> transform -> analyze, continue on failure
 *   const config = loadPipelineConfig({});
 *
 *   // Custom order and parameters
 *   const custom = loadPipelineConfig({
 *     steps: ["clean", "analyze"],
 *     error_handling: "stop",
 *     step_params: { clean: { preserve_newlines: true } },
 *   });
 */

export { ErrorHandling, LoggingLevel, BuiltinStepName } from "./enums.js";

export type {
  PipelineConfig,
  PipelineConfigInput,
  StepParamOverrides,
  CleanParams,
  TransformParams,
  AnalyzeParams,
} from "./schema.js";

export {
  PipelineConfigSchema,
  StepParamOverridesSchema,
  CleanParamsSchema,
  TransformParamsSchema,
  AnalyzeParamsSchema,
} from "./schema.js";

export {
  loadPipelineConfig,
  validatePipelineConfig,
  parsePipelineConfigJson,
  readPipelineConfigFile,
  loadPipelineConfigFromFile,
  formatZodIssues,
} from "./loader.js";

export {
  DEFAULT_PIPELINE_CONFIG,
  DEFAULT_STEP_PARAMS,
  DEFAULT_CLEAN_PARAMS,
  DEFAULT_TRANSFORM_PARAMS,
  DEFAULT_ANALYZE_PARAMS,
} from "./defaults.js";
