/**
 * File System Utilities
 */

import * as fs from "node:fs";
import * as path from "node:path";
import fg from "fast-glob";
import { ConfigurationError, ErrorCode } from "../core/errors.js";
import { err, ok, type Result } from "../types/result.js";

/**
 * Expand file patterns relative to `cwd`. Plain paths are kept even when the
 * file does not exist, so the caller can report it; glob patterns expand to
 * the matching files in sorted order.
 */
export function expandFilePatterns(patterns: readonly string[], cwd: string): string[] {
  const files: string[] = [];
  for (const pattern of patterns) {
    if (!fg.isDynamicPattern(pattern)) {
      files.push(path.resolve(cwd, pattern));
      continue;
    }
    const matches = fg.sync(pattern, {
      cwd,
      absolute: true,
      onlyFiles: true,
      ignore: ["**/node_modules/**", "**/.git/**"],
    });
    files.push(...matches.sort());
  }
  return [...new Set(files)];
}

/**
 * Read and parse a JSON file
 */
export function readJsonFile(filePath: string): Result<unknown, ConfigurationError> {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(
      new ConfigurationError(`Cannot read "${filePath}": ${message}`, ErrorCode.FILE_SYSTEM_ERROR, { filePath })
    );
  }

  try {
    const parsed: unknown = JSON.parse(content);
    return ok(parsed);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(
      new ConfigurationError(`"${filePath}" is not valid JSON: ${message}`, ErrorCode.CONFIGURATION_ERROR, {
        filePath,
      })
    );
  }
}
