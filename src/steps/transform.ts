/**
 * Transform step: case folding and character stripping.
 *
 * Flags apply in a fixed order: lowercase, punctuation, numbers,
 * special characters.
 */

import { TransformParamsSchema, type TransformParams } from "../config/pipeline/schema.js";
import { DEFAULT_TRANSFORM_PARAMS } from "../config/pipeline/defaults.js";
import type { StepParamsInput } from "../types/pipeline.js";
import { parseStepParams } from "./params.js";
import type { Step } from "./types.js";

/** ASCII punctuation: !"#$%&'()*+,-./:;<=>?@[\]^_`{|}~ */
const PUNCTUATION = /[!"#$%&'()*+,\-./:;<=>?@[\\\]^_`{|}~]/g;
const DIGIT_RUNS = /\d+/g;
const SPECIAL_CHARS = /[^a-zA-Z0-9\s]/g;

export class TransformStep implements Step {
  static readonly defaultParams: TransformParams = DEFAULT_TRANSFORM_PARAMS;

  readonly params: Readonly<TransformParams>;

  constructor(params: StepParamsInput) {
    this.params = parseStepParams("transform", TransformParamsSchema, params);
  }

  process(text: string): string {
    let result = text;

    if (this.params.to_lowercase) {
      result = result.toLowerCase();
    }
    if (this.params.remove_punctuation) {
      result = result.replace(PUNCTUATION, "");
    }
    if (this.params.remove_numbers) {
      result = result.replace(DIGIT_RUNS, "");
    }
    if (this.params.remove_special_chars) {
      result = result.replace(SPECIAL_CHARS, "");
    }

    return result;
  }
}
