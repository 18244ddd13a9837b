/**
 * Configurable text processing pipeline.
 *
 *   import { TextPipeline } from "text-pipeline";
 *
 *   const pipeline = new TextPipeline({ steps: ["clean", "analyze"] });
 *   const result = pipeline.process("  Some   text.  ");
 */

export * from "./pipeline/index.js";
export * from "./steps/index.js";
export * from "./types/index.js";
export * from "./errors.js";
export {
  loadAppConfig,
  getAppConfig,
  validateConfig,
  ConfigError,
  type AppConfig,
  type Environment,
} from "./config/index.js";
export * from "./config/pipeline/index.js";
export * from "./logging/index.js";
