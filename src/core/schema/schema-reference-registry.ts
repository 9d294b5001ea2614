/**
 * Schema Reference Registry
 *
 * Maps resolved types to OpenAPI schemas. Primitive and collection types are
 * described inline; enums and objects are registered once as component
 * schemas and referenced with `$ref`.
 *
 * @module
 */

import type { AnnotationError } from "../errors.js";
import type { OpenApiSchema } from "../../types/openapi.js";
import { ok, type Result } from "../../types/result.js";
import type { ITypeResolver } from "../reflection/interfaces/ITypeResolver.js";
import type { ContractType, TypeDescriptor } from "../reflection/models/contract.js";
import { createLogger } from "../../utils/logger.js";
import { DefaultPropertyNameResolver, type PropertyNameResolver } from "./property-name-resolver.js";

const logger = createLogger("schema");

export const COMPONENT_SCHEMA_PREFIX = "#/components/schemas/";

export class SchemaGenerationSettings {
  constructor(readonly propertyNameResolver: PropertyNameResolver = new DefaultPropertyNameResolver()) {}
}

/**
 * Component schema id for a type name
 */
export function sanitizeSchemaId(typeName: string): string {
  return typeName.replace(/[^A-Za-z0-9_.-]/g, "_");
}

export class SchemaReferenceRegistry {
  private readonly components = new Map<string, OpenApiSchema>();

  constructor(
    private readonly typeResolver: ITypeResolver,
    private readonly settings: SchemaGenerationSettings = new SchemaGenerationSettings()
  ) {}

  /**
   * Component schemas registered so far, keyed by schema id
   */
  get references(): ReadonlyMap<string, OpenApiSchema> {
    return this.components;
  }

  /**
   * Schema for the given type, registering a component schema when the type
   * is an enum or an object.
   */
  findOrAddReference(type: TypeDescriptor): Result<OpenApiSchema, AnnotationError> {
    switch (type.kind) {
      case "primitive":
        return ok<OpenApiSchema>({ ...type.schema });

      case "array": {
        const items = this.findOrAddReference(type.elementType);
        if (!items.ok) return items;
        return ok<OpenApiSchema>({ type: "array", items: items.value });
      }

      case "dictionary": {
        const values = this.findOrAddReference(type.valueType);
        if (!values.ok) return values;
        return ok<OpenApiSchema>({ type: "object", additionalProperties: values.value });
      }

      case "nullable": {
        const underlying = this.findOrAddReference(type.underlyingType);
        if (!underlying.ok) return underlying;
        // Siblings of $ref are ignored in OpenAPI 3.0
        if (underlying.value.$ref !== undefined) {
          return ok<OpenApiSchema>({ allOf: [underlying.value], nullable: true });
        }
        return ok<OpenApiSchema>({ ...underlying.value, nullable: true });
      }

      case "enum":
      case "object": {
        const id = sanitizeSchemaId(type.fullName);
        if (!this.components.has(id)) {
          const existing = new Set(this.components.keys());
          const registered = this.register(id, type.definition);
          if (!registered.ok) {
            this.rollback(existing);
            return registered;
          }
        }
        return ok<OpenApiSchema>({ $ref: `${COMPONENT_SCHEMA_PREFIX}${id}` });
      }
    }
  }

  private register(id: string, definition: ContractType): Result<void, AnnotationError> {
    // Placeholder first so self-referencing properties resolve to a $ref
    const schema: OpenApiSchema = {};
    this.components.set(id, schema);
    logger.debug({ id }, "Registering component schema");

    if (definition.description) schema.description = definition.description;

    if (definition.kind === "enum") {
      schema.type = "string";
      schema.enum = [...definition.enumMembers];
      return ok(undefined);
    }

    schema.type = "object";
    if (definition.properties.length === 0) return ok(undefined);

    const properties: Record<string, OpenApiSchema> = {};
    const required: string[] = [];
    for (const property of definition.properties) {
      const name = this.settings.propertyNameResolver.resolvePropertyName(property);
      const propertySchema = this.schemaForPropertyType(property.type);
      if (!propertySchema.ok) return propertySchema;
      properties[name] = property.description
        ? { ...propertySchema.value, description: property.description }
        : propertySchema.value;
      if (property.required) required.push(name);
    }

    schema.properties = properties;
    if (required.length > 0) schema.required = required;
    return ok(undefined);
  }

  /**
   * Drop every component registered since `existing` was taken, including
   * those that reference the component that failed
   */
  private rollback(existing: ReadonlySet<string>): void {
    for (const id of [...this.components.keys()]) {
      if (!existing.has(id)) this.components.delete(id);
    }
  }

  private schemaForPropertyType(typeName: string): Result<OpenApiSchema, AnnotationError> {
    const resolved = this.typeResolver.resolveType(typeName);
    if (!resolved.ok) return resolved;
    return this.findOrAddReference(resolved.value);
  }
}
