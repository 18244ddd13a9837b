/**
 * Pipeline orchestration and run statistics.
 */

export {
  TextPipeline,
  type TextPipelineOptions,
  type PipelineConfigSource,
} from "./pipeline.js";
export { StatisticsCollector, type Clock } from "./statistics.js";
