/**
 * Clean step: whitespace normalisation.
 */

import { CleanParamsSchema, type CleanParams } from "../config/pipeline/schema.js";
import { DEFAULT_CLEAN_PARAMS } from "../config/pipeline/defaults.js";
import type { StepParamsInput } from "../types/pipeline.js";
import { parseStepParams } from "./params.js";
import type { Step } from "./types.js";

const LINE_BREAK = /\r\n?/g;
const HORIZONTAL_WHITESPACE = /[ \t]+/g;
// Line break followed by one or more blank lines
const BLANK_LINE_RUN = /\n[ \t]*\n(?:[ \t]*\n)*/g;
const ANY_WHITESPACE = /\s+/g;

export class CleanStep implements Step {
  static readonly defaultParams: CleanParams = DEFAULT_CLEAN_PARAMS;

  readonly params: Readonly<CleanParams>;

  constructor(params: StepParamsInput) {
    this.params = parseStepParams("clean", CleanParamsSchema, params);
  }

  process(text: string): string {
    let result = text;

    if (this.params.trim_edges) {
      result = result.trim();
    }

    if (this.params.remove_extra_spaces) {
      if (this.params.preserve_newlines) {
        result = result
          .replace(LINE_BREAK, "\n")
          .replace(HORIZONTAL_WHITESPACE, " ")
          .replace(BLANK_LINE_RUN, "\n\n");
      } else {
        result = result.replace(ANY_WHITESPACE, " ");
      }
    }

    return result;
  }
}
