/**
 * Runtime Validation Schemas
 *
 * Zod schemas for validating configuration at runtime. Contract assembly
 * schemas live with the reflection module.
 *
 * @module
 */

import { z } from "zod";

export const LogLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

/**
 * How contract property names are serialized in generated schemas
 */
export const PropertyNamingSchema = z.enum(["default", "camelCase"]);

export type PropertyNaming = z.infer<typeof PropertyNamingSchema>;

export const ConfigSchema = z
  .object({
    /** Contract assembly files or glob patterns, relative to the config file */
    assemblies: z.array(z.string().min(1)).default([]),

    propertyNaming: PropertyNamingSchema.default("default"),

    logLevel: LogLevelSchema.optional(),
  })
  .strict();

export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Validate a configuration object, returning either the parsed value or a
 * readable description of the first problem.
 */
export function validateConfig(
  input: unknown
): { success: true; data: AppConfig } | { success: false; error: string } {
  const result = ConfigSchema.safeParse(input);
  if (result.success) {
    return { success: true, data: result.data };
  }
  const issue = result.error.issues[0];
  const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
  return { success: false, error: `${where}${issue?.message ?? "invalid configuration"}` };
}
