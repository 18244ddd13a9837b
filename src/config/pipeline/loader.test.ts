/**
 * Pipeline Config Loader Tests
 *
 * Run with: npm test
 *
 * These tests verify:
 *   1. Defaults are applied for omitted fields
 *   2. Unknown fields, bad policies and non-boolean parameters are rejected
 *   3. Loaded configuration is frozen
 *   4. JSON files load, and unreadable or malformed files fail as config errors
 */

import { strict as assert } from "node:assert";
import { describe, test } from "node:test";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { fileURLToPath } from "node:url";

import {
  loadPipelineConfig,
  loadPipelineConfigFromFile,
  validatePipelineConfig,
} from "./loader.js";
import { DEFAULT_PIPELINE_CONFIG } from "./defaults.js";
import { PipelineConfigError } from "../../errors.js";

const EXAMPLE_CONFIG = fileURLToPath(
  new URL("../../../config/pipeline.example.json", import.meta.url)
);

function captureConfigError(fn: () => unknown): PipelineConfigError {
  try {
    fn();
  } catch (err) {
    if (err instanceof PipelineConfigError) {
      return err;
    }
    throw err;
  }
  throw new Error("Expected PipelineConfigError");
}

// ═══════════════════════════════════════════════════════════════════════════
// DEFAULTS
// ═══════════════════════════════════════════════════════════════════════════

describe("Pipeline config: defaults", () => {
  test("empty object gets every default", () => {
    const config = loadPipelineConfig({});
    assert.deepEqual(config, DEFAULT_PIPELINE_CONFIG);
  });

  test("omitted input gets every default", () => {
    assert.deepEqual(loadPipelineConfig(), DEFAULT_PIPELINE_CONFIG);
  });

  test("bare step list is shorthand for steps with default policy", () => {
    const config = loadPipelineConfig(["analyze", "clean"]);
    assert.deepEqual(config.steps, ["analyze", "clean"]);
    assert.equal(config.error_handling, "continue");
    assert.deepEqual(config.step_params, {});
  });

  test("duplicate step names are kept", () => {
    const config = loadPipelineConfig({ steps: ["clean", "clean"] });
    assert.deepEqual(config.steps, ["clean", "clean"]);
  });

  test("explicit values are kept", () => {
    const config = loadPipelineConfig({
      steps: ["transform"],
      error_handling: "stop",
      step_params: { transform: { remove_numbers: true } },
      logging_level: "debug",
    });
    assert.equal(config.error_handling, "stop");
    assert.equal(config.logging_level, "debug");
    assert.deepEqual(config.step_params, { transform: { remove_numbers: true } });
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// REJECTION
// ═══════════════════════════════════════════════════════════════════════════

describe("Pipeline config: rejection", () => {
  test("unknown top-level field is rejected", () => {
    const err = captureConfigError(() => loadPipelineConfig({ steps: [], verbose: true }));
    assert.equal(err.issues.length, 1);
    assert.equal(err.issues[0].code, "unrecognized_keys");
    assert.deepEqual(err.issues[0].path, []);
  });

  test("invalid error_handling is rejected", () => {
    const err = captureConfigError(() => loadPipelineConfig({ error_handling: "retry" }));
    assert.deepEqual(err.issues[0].path, ["error_handling"]);
    assert.equal(err.issues[0].code, "invalid_enum_value");
  });

  test("non-boolean step parameter is rejected", () => {
    const err = captureConfigError(() =>
      loadPipelineConfig({ step_params: { clean: { trim_edges: "yes" } } })
    );
    assert.deepEqual(err.issues[0].path, ["step_params", "clean", "trim_edges"]);
    assert.equal(err.issues[0].code, "invalid_type");
  });

  test("steps must be strings", () => {
    const err = captureConfigError(() => loadPipelineConfig({ steps: ["clean", 3] }));
    assert.deepEqual(err.issues[0].path, ["steps", 1]);
  });

  test("empty step name is rejected", () => {
    const err = captureConfigError(() => loadPipelineConfig({ steps: [""] }));
    assert.equal(err.issues[0].message, "Step name must not be empty");
  });

  test("non-object input is rejected", () => {
    const err = captureConfigError(() => loadPipelineConfig("clean"));
    assert.equal(err.issues[0].code, "invalid_type");
  });

  test("format lists each issue with its path", () => {
    const err = captureConfigError(() =>
      loadPipelineConfig({ error_handling: "retry", extra: 1 })
    );
    const lines = err.format().split("\n");
    assert.equal(lines[0], "Pipeline configuration validation failed:");
    assert.equal(lines.length, 3);
    assert.ok(lines.includes("  - (root): Unrecognized key(s) in object: 'extra'"));
  });

  test("validatePipelineConfig reports instead of throwing", () => {
    const bad = validatePipelineConfig({ error_handling: "retry" });
    assert.equal(bad.success, false);
    assert.equal(bad.errors?.length, 1);

    const good = validatePipelineConfig({ steps: ["clean"] });
    assert.equal(good.success, true);
    assert.deepEqual(good.config?.steps, ["clean"]);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// IMMUTABILITY
// ═══════════════════════════════════════════════════════════════════════════

describe("Pipeline config: immutability", () => {
  test("loaded config is deeply frozen", () => {
    const config = loadPipelineConfig({ step_params: { clean: { trim_edges: false } } });
    assert.ok(Object.isFrozen(config));
    assert.ok(Object.isFrozen(config.steps));
    assert.ok(Object.isFrozen(config.step_params));
    assert.ok(Object.isFrozen(config.step_params.clean));
  });

  test("input object is not frozen by loading", () => {
    const input = { steps: ["clean"] };
    loadPipelineConfig(input);
    assert.equal(Object.isFrozen(input), false);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// FILES
// ═══════════════════════════════════════════════════════════════════════════

describe("Pipeline config: files", () => {
  test("example config file loads", () => {
    const config = loadPipelineConfigFromFile(EXAMPLE_CONFIG);
    assert.deepEqual(config.steps, ["clean", "transform", "analyze"]);
    assert.equal(config.logging_level, "warn");
    assert.equal(config.step_params.clean.preserve_newlines, true);
    assert.equal(config.step_params.analyze.count_characters, false);
  });

  test("missing file is a config error", () => {
    const err = captureConfigError(() =>
      loadPipelineConfigFromFile(join(tmpdir(), "no-such-pipeline-config.json"))
    );
    assert.equal(err.issues[0].code, "unreadable_file");
  });

  test("malformed JSON is a config error", () => {
    const dir = mkdtempSync(join(tmpdir(), "pipeline-config-"));
    try {
      const file = join(dir, "broken.json");
      writeFileSync(file, "{ \"steps\": [");
      const err = captureConfigError(() => loadPipelineConfigFromFile(file));
      assert.equal(err.issues[0].code, "invalid_json");
      assert.equal(err.message, `Pipeline configuration in ${file} is not valid JSON`);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  test("schema errors in a file are reported", () => {
    const dir = mkdtempSync(join(tmpdir(), "pipeline-config-"));
    try {
      const file = join(dir, "bad.json");
      writeFileSync(file, JSON.stringify({ error_handling: "halt" }));
      const err = captureConfigError(() => loadPipelineConfigFromFile(file));
      assert.deepEqual(err.issues[0].path, ["error_handling"]);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
