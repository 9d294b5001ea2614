/**
 * OpenAPI model objects produced from documentation fragments.
 *
 * Only the subset of OpenAPI 3.0 that examples and headers need.
 */

/**
 * Any JSON value an example may carry
 */
export type OpenApiAny =
  | string
  | number
  | boolean
  | null
  | OpenApiAny[]
  | { [key: string]: OpenApiAny };

export type OpenApiSchemaType = "string" | "integer" | "number" | "boolean" | "array" | "object";

export interface OpenApiSchema {
  type?: OpenApiSchemaType;
  format?: string;
  items?: OpenApiSchema;
  properties?: Record<string, OpenApiSchema>;
  required?: string[];
  additionalProperties?: OpenApiSchema;
  allOf?: OpenApiSchema[];
  enum?: OpenApiAny[];
  nullable?: boolean;
  description?: string;
  /** Reference to a component schema, e.g. `#/components/schemas/Sample.Order` */
  $ref?: string;
}

export interface OpenApiExample {
  summary?: string;
  description?: string;
  /** Embedded literal example */
  value?: OpenApiAny;
  /** URL pointing at the example, mutually exclusive with `value` */
  externalValue?: string;
}

export interface OpenApiHeader {
  description?: string;
  schema: OpenApiSchema;
}
