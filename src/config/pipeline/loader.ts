/**
 * Pipeline configuration loader and validator.
 *
 * Responsible for:
 * - Accepting configuration objects, step-name shorthands and JSON files
 * - Validating against the schema with fail-fast behavior
 * - Freezing configuration to enforce immutability
 */

import { readFileSync } from "node:fs";
import type { ZodIssue } from "zod";
import { PipelineConfigError, type ConfigValidationIssue } from "../../errors.js";
import { PipelineConfigSchema, type PipelineConfig } from "./schema.js";

/**
 * Convert Zod issues to our structured format.
 */
export function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Deep freeze an object to enforce runtime immutability.
 */
function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const name of Reflect.ownKeys(obj)) {
    const value: unknown = Reflect.get(obj, name);
    if (value && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

/**
 * Validate and load pipeline configuration.
 *
 * A bare array of step names is shorthand for `{ steps: [...] }` with
 * default parameters and the continue policy.
 *
 * @throws PipelineConfigError if validation fails
 */
export function loadPipelineConfig(input: unknown = {}): Readonly<PipelineConfig> {
  const data = Array.isArray(input) ? { steps: input } : input;
  const result = PipelineConfigSchema.safeParse(data);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new PipelineConfigError(
      `Invalid pipeline configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Validate pipeline configuration without throwing.
 */
export function validatePipelineConfig(input: unknown): {
  success: boolean;
  config?: PipelineConfig;
  errors?: ConfigValidationIssue[];
} {
  try {
    return { success: true, config: loadPipelineConfig(input) };
  } catch (err) {
    if (err instanceof PipelineConfigError) {
      return { success: false, errors: err.issues };
    }
    throw err;
  }
}

/**
 * Parse a JSON document into a raw configuration object.
 */
export function parsePipelineConfigJson(json: string, source = "(inline)"): unknown {
  try {
    return JSON.parse(json);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new PipelineConfigError(
      `Pipeline configuration in ${source} is not valid JSON`,
      [{ path: [], message, code: "invalid_json" }],
      { cause: err }
    );
  }
}

/**
 * Read a raw configuration object from a JSON file, without validating it.
 * Callers that merge command-line overrides validate afterwards.
 */
export function readPipelineConfigFile(filePath: string): unknown {
  let json: string;
  try {
    json = readFileSync(filePath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new PipelineConfigError(
      `Cannot read pipeline configuration file: ${filePath}`,
      [{ path: [], message, code: "unreadable_file" }],
      { cause: err }
    );
  }
  return parsePipelineConfigJson(json, filePath);
}

/**
 * Load and validate pipeline configuration from a JSON file.
 */
export function loadPipelineConfigFromFile(filePath: string): Readonly<PipelineConfig> {
  return loadPipelineConfig(readPipelineConfigFile(filePath));
}
