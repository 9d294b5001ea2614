export {
  SchemaReferenceRegistry,
  SchemaGenerationSettings,
  COMPONENT_SCHEMA_PREFIX,
  sanitizeSchemaId,
} from "./schema-reference-registry.js";
export {
  DefaultPropertyNameResolver,
  CamelCasePropertyNameResolver,
  type PropertyNameResolver,
} from "./property-name-resolver.js";
