/**
 * examples command - Print the OpenAPI examples of a documentation fragment
 */

import chalk from "chalk";
import { extractExamples } from "../../core/annotations/index.js";
import type { AnnotationError } from "../../core/errors.js";
import type { OpenApiExample } from "../../types/openapi.js";
import { andThen, type Result } from "../../types/result.js";
import { createLogger } from "../../utils/logger.js";
import { type CommonOptions, createCommandContext } from "../context.js";

const logger = createLogger("examples");

export type ExamplesOptions = CommonOptions;

export function runExamples(
  file: string,
  options: ExamplesOptions,
  cwd: string = process.cwd()
): Result<Record<string, OpenApiExample>, AnnotationError> {
  return andThen(createCommandContext(file, options, cwd), (context) =>
    extractExamples(context.fragment, context.typeFetcher)
  );
}

export async function examplesCommand(file: string, options: ExamplesOptions): Promise<void> {
  logger.debug({ file, options }, "Extracting examples");

  const result = runExamples(file, options);
  if (!result.ok) {
    logger.error({ err: result.error }, "Example extraction failed");
    console.error(chalk.red(`Error: ${result.error.message}`));
    process.exitCode = 1;
    return;
  }

  console.log(JSON.stringify(result.value, null, 2));
}
