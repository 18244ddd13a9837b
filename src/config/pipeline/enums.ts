/**
 * Enumerations for pipeline configuration.
 */

import { z } from "zod";

/**
 * Failure policy applied when a step fails.
 *
 * - continue: record the failure, keep the text unchanged, run the next step
 * - stop: record the failure and abort the run
 */
export const ErrorHandling = z.enum(["continue", "stop"]);
export type ErrorHandling = z.infer<typeof ErrorHandling>;

/**
 * Log levels accepted in a pipeline configuration.
 */
export const LoggingLevel = z.enum(["debug", "info", "warn", "error"]);
export type LoggingLevel = z.infer<typeof LoggingLevel>;

/**
 * Names of the steps every registry starts with.
 */
export const BuiltinStepName = z.enum(["clean", "transform", "analyze"]);
export type BuiltinStepName = z.infer<typeof BuiltinStepName>;
