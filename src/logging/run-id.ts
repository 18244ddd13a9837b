/**
 * Process-wide run ID, stamped on every log line.
 */

import { randomBytes } from "node:crypto";

const RUN_ID_PATTERN = /^\d{8}-[0-9a-f]{6}$/;

/**
 * Generate a short run ID: UTC date plus a random suffix (e.g. "20240115-a1b2c3").
 */
export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}

export function isRunId(value: string): boolean {
  return RUN_ID_PATTERN.test(value);
}

let currentRunId: string | null = null;

/**
 * Set the run ID for this process. Called once by the CLI at startup;
 * an explicit ID is used as given.
 */
export function initRunId(runId: string = generateRunId()): string {
  currentRunId = runId;
  return currentRunId;
}

/**
 * Current run ID, or null before initRunId.
 */
export function getRunId(): string | null {
  return currentRunId;
}
