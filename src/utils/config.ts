/**
 * Configuration Loading
 *
 * Settings come from `openapi-xmldoc.config.json` (or an explicit path);
 * command line flags are merged over them by the CLI.
 *
 * @module
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { ConfigurationError, ErrorCode } from "../core/errors.js";
import { err, ok, type Result } from "../types/result.js";
import { expandFilePatterns, readJsonFile } from "./fs.js";
import { type AppConfig, validateConfig } from "./validation.js";

export const CONFIG_FILE = "openapi-xmldoc.config.json";

export interface LoadedConfig {
  config: AppConfig;
  /** Directory that relative assembly patterns resolve against */
  baseDir: string;
  /** Config file that was read, if any */
  configPath?: string;
}

/**
 * Load the configuration file. Without an explicit path, a missing default
 * file yields the default configuration.
 */
export function loadConfig(
  configPath?: string,
  cwd: string = process.cwd()
): Result<LoadedConfig, ConfigurationError> {
  const filePath = path.resolve(cwd, configPath ?? CONFIG_FILE);

  if (!fs.existsSync(filePath)) {
    if (configPath !== undefined) {
      return err(
        new ConfigurationError(`Configuration file "${filePath}" does not exist`, ErrorCode.CONFIGURATION_ERROR, {
          filePath,
        })
      );
    }
    const defaults = validateConfig({});
    if (!defaults.success) {
      return err(new ConfigurationError(`Default configuration is invalid: ${defaults.error}`));
    }
    return ok({ config: defaults.data, baseDir: cwd });
  }

  const raw = readJsonFile(filePath);
  if (!raw.ok) return raw;

  const validated = validateConfig(raw.value);
  if (!validated.success) {
    return err(
      new ConfigurationError(`Invalid configuration in "${filePath}": ${validated.error}`, ErrorCode.CONFIGURATION_ERROR, {
        filePath,
      })
    );
  }

  return ok({ config: validated.data, baseDir: path.dirname(filePath), configPath: filePath });
}

/**
 * Absolute assembly paths for the configured patterns
 */
export function resolveAssemblyPaths(loaded: LoadedConfig): string[] {
  return expandFilePatterns(loaded.config.assemblies, loaded.baseDir);
}
