#!/usr/bin/env node
/**
 * CLI command to run text through the pipeline.
 *
 * Usage:
 *   npx tsx src/cli/process-text.ts [options] <text>
 *   npm run process-text -- [options] <text>
 *
 * Options:
 *   -c, --config <path>            Pipeline configuration JSON file
 *   -s, --steps <a,b,c>            Comma-separated steps (overrides the configured order)
 *   -e, --error-handling <policy>  continue | stop (overrides the configuration)
 *   -i, --interactive              Read lines from stdin until quit/exit/q
 *   -v, --verbose                  Show the full processed text and per-step detail
 *   --json                         Print the run result as JSON
 *   --no-color                     Disable ANSI colors
 *   -h, --help                     Show help
 *
 * Exit codes:
 *   0 - Text processed
 *   1 - Invalid arguments or configuration, or the run was aborted
 */

import { existsSync, realpathSync } from "node:fs";
import { createInterface } from "node:readline";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";

import { validateConfig } from "../config/index.js";
import {
  loadPipelineConfig,
  readPipelineConfigFile,
  type PipelineConfig,
} from "../config/pipeline/index.js";
import { PipelineAbortedError, PipelineConfigError } from "../errors.js";
import { createLogger, initRunId } from "../logging/index.js";
import { TextPipeline } from "../pipeline/index.js";
import type { RunResult } from "../types/index.js";

// ============================================================
// CLI Parsing
// ============================================================

export interface CliOptions {
  text?: string;
  config?: string;
  steps?: string;
  errorHandling?: string;
  interactive: boolean;
  verbose: boolean;
  json: boolean;
  color: boolean;
  help: boolean;
}

export const HELP_TEXT = `
Usage: process-text [options] <text>

Options:
  -c, --config <path>            Pipeline configuration JSON file
  -s, --steps <a,b,c>            Comma-separated steps (overrides the configured order)
  -e, --error-handling <policy>  continue | stop (overrides the configuration)
  -i, --interactive              Read lines from stdin until quit/exit/q
  -v, --verbose                  Show the full processed text and per-step detail
  --json                         Print the run result as JSON
  --no-color                     Disable ANSI colors
  -h, --help                     Show this help message
`;

export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      config: { type: "string", short: "c" },
      steps: { type: "string", short: "s" },
      "error-handling": { type: "string", short: "e" },
      interactive: { type: "boolean", short: "i", default: false },
      verbose: { type: "boolean", short: "v", default: false },
      json: { type: "boolean", default: false },
      "no-color": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  return {
    text: positionals.length > 0 ? positionals.join(" ") : undefined,
    config: values.config,
    steps: values.steps,
    errorHandling: values["error-handling"],
    interactive: values.interactive ?? false,
    verbose: values.verbose ?? false,
    json: values.json ?? false,
    color: !(values["no-color"] ?? false) && Boolean(process.stdout.isTTY) && !process.env.NO_COLOR,
    help: values.help ?? false,
  };
}

/**
 * Split a comma-separated step list, dropping blanks.
 */
export function parseStepList(value: string): string[] {
  return value
    .split(",")
    .map((step) => step.trim())
    .filter((step) => step !== "");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Build the pipeline configuration from a config file plus flag overrides.
 * Flags win over the file; anything unset falls back to the defaults.
 */
export function buildPipelineConfig(
  options: Pick<CliOptions, "config" | "steps" | "errorHandling">
): Readonly<PipelineConfig> {
  const base = options.config === undefined ? {} : readPipelineConfigFile(options.config);

  if (!isRecord(base)) {
    throw new PipelineConfigError("Pipeline configuration file must contain a JSON object", [
      { path: [], message: "Expected an object", code: "invalid_type" },
    ]);
  }

  const merged: Record<string, unknown> = { ...base };
  if (options.steps !== undefined) {
    merged.steps = parseStepList(options.steps);
  }
  if (options.errorHandling !== undefined) {
    merged.error_handling = options.errorHandling;
  }

  return loadPipelineConfig(merged);
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

type Color = keyof typeof COLORS;
type Paint = (color: Color, text: string) => string;

function painter(enabled: boolean): Paint {
  return (color, text) => (enabled ? `${COLORS[color]}${text}${COLORS.reset}` : text);
}

const PREVIEW_LENGTH = 100;

function preview(text: string): string {
  return text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH)}...` : text;
}

function seconds(ms: number): string {
  return `${(ms / 1000).toFixed(4)}s`;
}

/**
 * "characterCountNoSpaces" -> "Character Count No Spaces"
 */
export function metricLabel(key: string): string {
  const spaced = key.replace(/([A-Z])/g, " $1");
  return spaced.charAt(0).toUpperCase() + spaced.slice(1);
}

export interface FormatOptions {
  verbose: boolean;
  color: boolean;
}

/**
 * Render a run result as the human-readable report.
 */
export function formatResult(result: RunResult, options: FormatOptions): string {
  const c = painter(options.color);
  const row = (label: string, value: string): string => `  ${c("cyan", label)}: ${value}`;

  const lines = [
    c("bold", "Processing Results"),
    row("Processed Text", preview(result.processedText)),
    row("Steps Applied", result.stepsApplied.length > 0 ? result.stepsApplied.join(", ") : "None"),
    row("Steps Skipped", result.stepsSkipped.length > 0 ? result.stepsSkipped.join(", ") : "None"),
    row("Processing Time", seconds(result.processingTime)),
  ];

  for (const [key, value] of Object.entries(result.analysis)) {
    lines.push(row(metricLabel(key), String(value)));
  }

  if (result.errors.length > 0) {
    lines.push("", c("red", "Errors encountered:"));
    for (const error of result.errors) {
      lines.push(`  ${c("red", "•")} ${error}`);
    }
  }

  if (options.verbose) {
    lines.push("", c("bold", "Full processed text:"), result.processedText);
    lines.push("", c("bold", "Step details:"));
    for (const meta of result.stepMetadata) {
      const mark = meta.success ? c("green", "✓") : c("red", "✗");
      const suffix = meta.errorMessage === undefined ? "" : `: ${meta.errorMessage}`;
      lines.push(`  ${mark} ${meta.stepName} (${seconds(meta.executionTime)})${suffix}`);
    }
  }

  return lines.join("\n");
}

// ============================================================
// Processing
// ============================================================

export type Write = (text: string) => void;

/**
 * Process one text and write its report. Returns the exit code.
 */
export function processAndReport(
  pipeline: TextPipeline,
  text: string,
  options: FormatOptions & { json: boolean },
  write: Write
): number {
  const render = (result: RunResult): string =>
    options.json ? JSON.stringify(result, null, 2) : formatResult(result, options);

  try {
    write(render(pipeline.process(text)));
    return 0;
  } catch (err) {
    if (err instanceof PipelineAbortedError) {
      write(render(err.result));
      write(painter(options.color)("red", `Error: ${err.message}`));
      return 1;
    }
    throw err;
  }
}

export const EXIT_KEYWORDS: readonly string[] = ["quit", "exit", "q"];

/**
 * Read lines until an exit keyword or end of input, reporting each line.
 * Returns the number of lines processed.
 */
export async function runInteractive(
  pipeline: TextPipeline,
  input: NodeJS.ReadableStream,
  options: FormatOptions,
  write: Write
): Promise<number> {
  const c = painter(options.color);
  const lines = createInterface({ input, crlfDelay: Infinity, terminal: false });
  let processed = 0;

  write(c("bold", "Text Processing Pipeline - Interactive Mode"));
  write(c("green", "Enter text to process (or 'quit' to exit):"));

  // Leaving the loop, by break or by throw, closes the interface
  for await (const line of lines) {
    if (EXIT_KEYWORDS.includes(line.trim().toLowerCase())) {
      break;
    }
    if (line.trim() === "") {
      write(c("yellow", "Please enter some text."));
      continue;
    }
    processAndReport(pipeline, line, { ...options, verbose: true, json: false }, write);
    processed++;
  }

  return processed;
}

// ============================================================
// Main
// ============================================================

async function main(): Promise<number> {
  const options = parseCliArgs(process.argv.slice(2));
  const write: Write = (text) => console.log(text);
  const c = painter(options.color);

  if (options.help) {
    write(HELP_TEXT);
    return 0;
  }

  initRunId();
  validateConfig();

  if (!options.interactive && options.text === undefined) {
    console.error(c("red", "Error: Text input required unless using --interactive"));
    return 1;
  }

  let pipeline: TextPipeline;
  try {
    const config = buildPipelineConfig(options);
    const logger = options.verbose ? createLogger({ level: "debug" }) : undefined;
    pipeline = new TextPipeline(config, { logger });
  } catch (err) {
    if (err instanceof PipelineConfigError) {
      console.error(c("red", err.format()));
      return 1;
    }
    throw err;
  }

  if (options.interactive) {
    await runInteractive(pipeline, process.stdin, options, write);
    return 0;
  }

  return processAndReport(pipeline, options.text ?? "", options, write);
}

/**
 * True when `entry` (usually process.argv[1]) is this module, also when it
 * is reached through a symlink such as node_modules/.bin/process-text.
 */
export function isDirectRun(entry: string | undefined, moduleUrl: string = import.meta.url): boolean {
  if (entry === undefined || !existsSync(entry)) {
    return false;
  }
  return realpathSync(entry) === realpathSync(fileURLToPath(moduleUrl));
}

// Only run when executed directly (not imported by tests)
const isDirectExecution = isDirectRun(process.argv[1]);

if (isDirectExecution) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`Error: ${message}`);
      process.exitCode = 1;
    });
}
