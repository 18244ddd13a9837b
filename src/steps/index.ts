/**
 * Text processing steps and the registry that names them.
 */

export type { Step, AnalyzerStep, StepConstructor } from "./types.js";
export { isAnalyzerStep } from "./types.js";
export { parseStepParams } from "./params.js";
export { CleanStep } from "./clean.js";
export { TransformStep } from "./transform.js";
export {
  AnalyzeStep,
  splitWords,
  countSentences,
  countParagraphs,
  averageWordLength,
  classifyReadingLevel,
} from "./analyze.js";
export { StepRegistry, createDefaultRegistry, type StepRegistryOptions } from "./registry.js";
