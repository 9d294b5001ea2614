/**
 * Shared setup for CLI commands: configuration, assemblies and the input fragment
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { type AnnotationError, ConfigurationError, ErrorCode } from "../core/errors.js";
import { TypeFetcher } from "../core/reflection/index.js";
import { parseFragment, type DocElement } from "../core/xml/index.js";
import { err, type Result, ok } from "../types/result.js";
import { loadConfig, resolveAssemblyPaths } from "../utils/config.js";
import { expandFilePatterns } from "../utils/fs.js";
import { createLogger, getLogLevel, type LogLevel, setLogLevel } from "../utils/logger.js";
import type { PropertyNaming } from "../utils/validation.js";

const logger = createLogger("cli");

export interface CommonOptions {
  assembly?: string[];
  config?: string;
  verbose?: boolean;
}

export interface CommandContext {
  typeFetcher: TypeFetcher;
  propertyNaming: PropertyNaming;
  fragment: DocElement;
}

/**
 * CLI log level: `--verbose`, then the config file, then `LOG_LEVEL`, else info
 */
export function resolveLogLevel(verbose: boolean | undefined, configured?: LogLevel): LogLevel {
  if (verbose) return "debug";
  if (configured) return configured;
  return process.env.LOG_LEVEL ? getLogLevel() : "info";
}

function readFragmentFile(file: string, cwd: string): Result<DocElement, AnnotationError> {
  const filePath = path.resolve(cwd, file);
  let xml: string;
  try {
    xml = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(
      new ConfigurationError(`Cannot read fragment file "${filePath}": ${message}`, ErrorCode.FILE_SYSTEM_ERROR, {
        filePath,
      })
    );
  }
  return parseFragment(xml);
}

/**
 * Resolve configuration (flags over config file), load the assemblies and
 * parse the fragment file.
 */
export function createCommandContext(
  file: string,
  options: CommonOptions,
  cwd: string = process.cwd()
): Result<CommandContext, AnnotationError> {
  const loaded = loadConfig(options.config, cwd);
  if (!loaded.ok) return loaded;

  setLogLevel(resolveLogLevel(options.verbose, loaded.value.config.logLevel));

  const assemblyPaths =
    options.assembly && options.assembly.length > 0
      ? expandFilePatterns(options.assembly, cwd)
      : resolveAssemblyPaths(loaded.value);
  logger.debug({ assemblyPaths, configPath: loaded.value.configPath }, "Resolved assemblies");

  const typeFetcher = TypeFetcher.fromFiles(assemblyPaths);
  if (!typeFetcher.ok) return typeFetcher;

  const fragment = readFragmentFile(file, cwd);
  if (!fragment.ok) return fragment;

  return ok({
    typeFetcher: typeFetcher.value,
    propertyNaming: loaded.value.config.propertyNaming,
    fragment: fragment.value,
  });
}
