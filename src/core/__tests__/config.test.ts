/**
 * Configuration Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { loadConfig, resolveConfig } from "../config.js";
import { ConfigurationError } from "../errors.js";
import { CONFIG_FILE } from "../../utils/index.js";
import { DEFAULT_EXCLUDE_PATTERNS } from "../../utils/validation.js";

function configError(fn: () => unknown): ConfigurationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationError) return error;
    throw error;
  }
  throw new Error("expected a ConfigurationError");
}

describe("resolveConfig", () => {
  it("should fill in defaults", () => {
    expect(resolveConfig({})).toEqual({
      maxFileSizeBytes: 1048576,
      concurrency: 8,
      fileTimeoutMs: 30000,
      includeApproximateEdges: false,
      failFast: false,
      extensions: [".erl"],
      excludePatterns: [...DEFAULT_EXCLUDE_PATTERNS],
      repositoryRef: "HEAD",
    });
  });

  it("should list every invalid value", () => {
    const error = configError(() => resolveConfig({ concurrency: 0, extensions: ["erl"] }));

    expect(error.issues).toEqual([
      "concurrency: Number must be greater than or equal to 1",
      "extensions.0: must start with '.'",
    ]);
    expect(error.message).toBe(
      "Invalid configuration: concurrency: Number must be greater than or equal to 1; extensions.0: must start with '.'"
    );
    expect(error.severity).toBe("fatal");
  });

  it("should reject unknown keys", () => {
    const error = configError(() => resolveConfig({ concurency: 4 }));

    expect(error.issues).toEqual(["Unrecognized key(s) in object: 'concurency'"]);
  });

  it("should reject repository URLs that are not URLs", () => {
    const error = configError(() => resolveConfig({ repositoryUrl: "not a url" }));

    expect(error.issues).toEqual(["repositoryUrl: Invalid url"]);
  });
});

describe("loadConfig", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "config-test-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should use defaults when no file is present", () => {
    expect(loadConfig({ cwd: tempDir }).concurrency).toBe(8);
  });

  it("should read the default file and let overrides win", async () => {
    await fs.writeFile(
      path.join(tempDir, CONFIG_FILE),
      JSON.stringify({ concurrency: 2, failFast: true, repositoryName: "demo" })
    );

    const config = loadConfig({ cwd: tempDir, overrides: { concurrency: 4, failFast: undefined } });

    expect(config.concurrency).toBe(4);
    expect(config.failFast).toBe(true);
    expect(config.repositoryName).toBe("demo");
  });

  it("should require an explicitly named file to exist", () => {
    const missing = path.join(tempDir, "missing.json");
    const error = configError(() => loadConfig({ configPath: missing }));

    expect(error.message).toBe(`Configuration file not found: ${missing}`);
  });

  it("should reject files that are not JSON objects", async () => {
    const filePath = path.join(tempDir, "list.json");
    await fs.writeFile(filePath, "[1, 2]");

    const error = configError(() => loadConfig({ configPath: filePath }));

    expect(error.message).toBe(`Configuration file ${filePath} must contain a JSON object`);
  });

  it("should report malformed JSON", async () => {
    const filePath = path.join(tempDir, "broken.json");
    await fs.writeFile(filePath, "{ concurrency: ");

    expect(configError(() => loadConfig({ configPath: filePath })).message).toMatch(
      /^Cannot read configuration file /
    );
  });
});
