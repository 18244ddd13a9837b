/**
 * Analyze step: leaves text untouched and reports metrics about it.
 */

import { AnalyzeParamsSchema, type AnalyzeParams } from "../config/pipeline/schema.js";
import { DEFAULT_ANALYZE_PARAMS } from "../config/pipeline/defaults.js";
import type { StepParamsInput } from "../types/pipeline.js";
import type { AnalysisMetrics, ReadingLevel } from "../types/result.js";
import { parseStepParams } from "./params.js";
import type { AnalyzerStep } from "./types.js";

const WHITESPACE_RUN = /\s+/;
const SENTENCE_END_RUN = /[.!?]+/;
const PARAGRAPH_BREAK = /\n\s*\n/;

/** Words longer than this count as long words for the reading level */
const LONG_WORD_LENGTH = 6;
const ADVANCED_SHARE = 0.3;
const INTERMEDIATE_SHARE = 0.15;

/**
 * Length in code points, so astral characters count once.
 */
function codePointLength(value: string): number {
  return Array.from(value).length;
}

function nonBlank(fragments: string[]): string[] {
  return fragments.filter((fragment) => fragment.trim() !== "");
}

export function splitWords(text: string): string[] {
  return text.split(WHITESPACE_RUN).filter((word) => word !== "");
}

export function countSentences(text: string): number {
  return nonBlank(text.split(SENTENCE_END_RUN)).length;
}

export function countParagraphs(text: string): number {
  return nonBlank(text.split(PARAGRAPH_BREAK)).length;
}

/**
 * Mean word length rounded to two decimals; undefined for no words.
 */
export function averageWordLength(words: readonly string[]): number | undefined {
  if (words.length === 0) {
    return undefined;
  }
  const total = words.reduce((sum, word) => sum + codePointLength(word), 0);
  return Math.round((total / words.length) * 100) / 100;
}

/**
 * Coarse reading level from the share of words longer than six characters.
 */
export function classifyReadingLevel(words: readonly string[]): ReadingLevel {
  if (words.length === 0) {
    return "Unknown";
  }
  const longWords = words.filter((word) => codePointLength(word) > LONG_WORD_LENGTH).length;
  const share = longWords / words.length;
  if (share > ADVANCED_SHARE) {
    return "Advanced";
  }
  if (share > INTERMEDIATE_SHARE) {
    return "Intermediate";
  }
  return "Basic";
}

export class AnalyzeStep implements AnalyzerStep {
  static readonly defaultParams: AnalyzeParams = DEFAULT_ANALYZE_PARAMS;

  readonly params: Readonly<AnalyzeParams>;

  constructor(params: StepParamsInput) {
    this.params = parseStepParams("analyze", AnalyzeParamsSchema, params);
  }

  process(text: string): string {
    return text;
  }

  analyze(text: string): AnalysisMetrics {
    const metrics: AnalysisMetrics = {};
    const words = splitWords(text);

    if (this.params.count_words) {
      metrics.wordCount = words.length;
    }
    if (this.params.count_characters) {
      metrics.characterCount = codePointLength(text);
      metrics.characterCountNoSpaces = codePointLength(text.replaceAll(" ", ""));
    }
    if (this.params.count_sentences) {
      metrics.sentenceCount = countSentences(text);
    }
    if (this.params.count_paragraphs) {
      metrics.paragraphCount = countParagraphs(text);
    }
    if (this.params.average_word_length) {
      const average = averageWordLength(words);
      if (average !== undefined) {
        metrics.averageWordLength = average;
      }
    }
    if (this.params.reading_level) {
      metrics.readingLevel = classifyReadingLevel(words);
    }

    return metrics;
  }
}
