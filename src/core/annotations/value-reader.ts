/**
 * Example Value Reader
 *
 * Turns the constant literal of a referenced field into an OpenAPI value.
 * JSON-looking literals are parsed; any other text is kept as a string.
 *
 * @module
 */

import { z } from "zod";
import { DocumentationError, ErrorCode } from "../errors.js";
import type { OpenApiAny } from "../../types/openapi.js";
import { err, ok, type Result } from "../../types/result.js";
import type { FieldDescriptor } from "../reflection/models/contract.js";
import { SpecificationGenerationMessages as Messages } from "./messages.js";

export const JsonValueSchema: z.ZodType<OpenApiAny> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

/** Literals that can only be JSON: a parse failure is an error */
const JSON_STRUCTURE = /^[{["]/;
/** Literals that may be JSON scalars or plain text such as dates */
const JSON_SCALAR = /^(?:-?\d|true$|false$|null$)/;

export function readExampleValue(field: FieldDescriptor): Result<OpenApiAny, DocumentationError> {
  const { value } = field;

  if (value === null || value === undefined) {
    return err(
      new DocumentationError(Messages.fieldHasNoValue(field.name, field.declaringType), ErrorCode.DOC_INVALID_EXAMPLE_VALUE, {
        field: field.name,
        type: field.declaringType,
      })
    );
  }

  if (typeof value !== "string") {
    return ok(value);
  }

  const literal = value.trim();
  const structured = JSON_STRUCTURE.test(literal);
  if (!structured && !JSON_SCALAR.test(literal)) {
    return ok(value);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(literal);
  } catch (error) {
    if (!structured) return ok(value);
    const reason = error instanceof Error ? error.message : String(error);
    return err(
      new DocumentationError(
        Messages.invalidExampleJson(field.name, field.declaringType, reason),
        ErrorCode.DOC_INVALID_EXAMPLE_VALUE,
        { field: field.name, type: field.declaringType }
      )
    );
  }

  const validated = JsonValueSchema.safeParse(parsed);
  if (!validated.success) {
    return err(
      new DocumentationError(
        Messages.invalidExampleJson(field.name, field.declaringType, validated.error.message),
        ErrorCode.DOC_INVALID_EXAMPLE_VALUE,
        { field: field.name, type: field.declaringType }
      )
    );
  }
  return ok(validated.data);
}
