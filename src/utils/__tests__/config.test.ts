import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { CONFIG_FILE, loadConfig, resolveAssemblyPaths } from "../config.js";
import { expandFilePatterns } from "../fs.js";
import { validateConfig } from "../validation.js";
import { ConfigurationError } from "../../core/errors.js";
import { unwrap, unwrapErr } from "../../types/result.js";

describe("configuration", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "openapi-xmldoc-config-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("should use defaults when no config file exists", () => {
    const loaded = unwrap(loadConfig(undefined, tempDir));
    expect(loaded.config).toEqual({ assemblies: [], propertyNaming: "default" });
    expect(loaded.baseDir).toBe(tempDir);
    expect(loaded.configPath).toBeUndefined();
  });

  it("should fail when an explicit config file is missing", () => {
    const error = unwrapErr(loadConfig("missing.json", tempDir));
    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error.message).toBe(`Configuration file "${path.join(tempDir, "missing.json")}" does not exist`);
  });

  it("should read and validate the default config file", () => {
    fs.writeFileSync(
      path.join(tempDir, CONFIG_FILE),
      JSON.stringify({ assemblies: ["contracts/*.json"], propertyNaming: "camelCase", logLevel: "warn" })
    );

    const loaded = unwrap(loadConfig(undefined, tempDir));
    expect(loaded.config).toEqual({ assemblies: ["contracts/*.json"], propertyNaming: "camelCase", logLevel: "warn" });
    expect(loaded.configPath).toBe(path.join(tempDir, CONFIG_FILE));
  });

  it("should reject unknown keys", () => {
    fs.writeFileSync(path.join(tempDir, CONFIG_FILE), JSON.stringify({ assembly: "x.json" }));
    const error = unwrapErr(loadConfig(undefined, tempDir));
    expect(error.message.startsWith(`Invalid configuration in "${path.join(tempDir, CONFIG_FILE)}": `)).toBe(true);
  });

  it("should resolve assembly patterns against the config directory", () => {
    fs.mkdirSync(path.join(tempDir, "contracts"));
    fs.writeFileSync(path.join(tempDir, "contracts", "B.json"), "{}");
    fs.writeFileSync(path.join(tempDir, "contracts", "A.json"), "{}");
    fs.writeFileSync(path.join(tempDir, "contracts", "notes.txt"), "");

    const paths = resolveAssemblyPaths({
      config: { assemblies: ["contracts/*.json", "extra/Other.json"], propertyNaming: "default" },
      baseDir: tempDir,
    });

    expect(paths).toEqual([
      path.join(tempDir, "contracts", "A.json"),
      path.join(tempDir, "contracts", "B.json"),
      path.join(tempDir, "extra", "Other.json"),
    ]);
  });

  it("should drop duplicate files", () => {
    fs.writeFileSync(path.join(tempDir, "A.json"), "{}");
    expect(expandFilePatterns(["A.json", "*.json"], tempDir)).toEqual([path.join(tempDir, "A.json")]);
  });
});

describe("validateConfig", () => {
  it("should report the failing path", () => {
    const result = validateConfig({ propertyNaming: "snake" });
    expect(result.success).toBe(false);
    expect(!result.success && result.error.startsWith("propertyNaming: ")).toBe(true);
  });
});
