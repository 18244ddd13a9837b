/**
 * Default pipeline configuration and step parameters.
 */

import type {
  AnalyzeParams,
  CleanParams,
  PipelineConfig,
  TransformParams,
} from "./schema.js";

/**
 * Clean: trim the edges and collapse all whitespace, newlines included.
 */
export const DEFAULT_CLEAN_PARAMS: CleanParams = {
  remove_extra_spaces: true,
  preserve_newlines: false,
  trim_edges: true,
};

/**
 * Transform: lowercase and strip punctuation; keep digits and other symbols.
 */
export const DEFAULT_TRANSFORM_PARAMS: TransformParams = {
  to_lowercase: true,
  remove_punctuation: true,
  remove_numbers: false,
  remove_special_chars: false,
};

/**
 * Analyze: every metric enabled.
 */
export const DEFAULT_ANALYZE_PARAMS: AnalyzeParams = {
  count_words: true,
  count_characters: true,
  count_sentences: true,
  count_paragraphs: true,
  average_word_length: true,
  reading_level: true,
};

export const DEFAULT_STEP_PARAMS = {
  clean: DEFAULT_CLEAN_PARAMS,
  transform: DEFAULT_TRANSFORM_PARAMS,
  analyze: DEFAULT_ANALYZE_PARAMS,
} as const;

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  steps: ["clean", "transform", "analyze"],
  error_handling: "continue",
  step_params: {},
};
