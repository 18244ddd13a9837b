/**
 * Parameter validation shared by the built-in steps.
 */

import type { z } from "zod";
import { formatZodIssues } from "../config/pipeline/loader.js";
import { StepParameterError } from "../errors.js";
import type { StepParamsInput } from "../types/pipeline.js";

/**
 * Validate a step's parameters against its schema.
 *
 * @throws StepParameterError naming the step and every offending key
 */
export function parseStepParams<T extends z.ZodTypeAny>(
  stepName: string,
  schema: T,
  params: StepParamsInput
): Readonly<z.output<T>> {
  const result = schema.safeParse(params);
  if (!result.success) {
    throw new StepParameterError(stepName, formatZodIssues(result.error.issues));
  }
  return Object.freeze(result.data);
}
