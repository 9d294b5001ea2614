/**
 * headers command - Print the OpenAPI headers of a documentation fragment,
 * together with the component schemas their types registered
 */

import chalk from "chalk";
import { extractHeaders } from "../../core/annotations/index.js";
import type { AnnotationError } from "../../core/errors.js";
import {
  CamelCasePropertyNameResolver,
  DefaultPropertyNameResolver,
  SchemaGenerationSettings,
  SchemaReferenceRegistry,
} from "../../core/schema/index.js";
import type { OpenApiHeader, OpenApiSchema } from "../../types/openapi.js";
import { andThen, map, type Result } from "../../types/result.js";
import { createLogger } from "../../utils/logger.js";
import { type CommonOptions, createCommandContext } from "../context.js";

const logger = createLogger("headers");

export interface HeadersOptions extends CommonOptions {
  camelCase?: boolean;
}

export interface HeadersOutput {
  headers: Record<string, OpenApiHeader>;
  schemas: Record<string, OpenApiSchema>;
}

export function runHeaders(
  file: string,
  options: HeadersOptions,
  cwd: string = process.cwd()
): Result<HeadersOutput, AnnotationError> {
  return andThen(createCommandContext(file, options, cwd), (context) => {
    const camelCase = options.camelCase ?? context.propertyNaming === "camelCase";
    const resolver = camelCase ? new CamelCasePropertyNameResolver() : new DefaultPropertyNameResolver();
    const registry = new SchemaReferenceRegistry(context.typeFetcher, new SchemaGenerationSettings(resolver));

    return map(extractHeaders(context.fragment, context.typeFetcher, registry), (headers) => ({
      headers,
      schemas: Object.fromEntries(registry.references),
    }));
  });
}

export async function headersCommand(file: string, options: HeadersOptions): Promise<void> {
  logger.debug({ file, options }, "Extracting headers");

  const result = runHeaders(file, options);
  if (!result.ok) {
    logger.error({ err: result.error }, "Header extraction failed");
    console.error(chalk.red(`Error: ${result.error.message}`));
    process.exitCode = 1;
    return;
  }

  console.log(JSON.stringify(result.value, null, 2));
}
