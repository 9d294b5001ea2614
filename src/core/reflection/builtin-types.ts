/**
 * Platform types that resolve without any contract assembly
 */

import type { PrimitiveSchema } from "./models/contract.js";

export const PRIMITIVE_TYPES: ReadonlyMap<string, PrimitiveSchema> = new Map<string, PrimitiveSchema>([
  ["System.String", { type: "string" }],
  ["System.Char", { type: "string" }],
  ["System.Boolean", { type: "boolean" }],
  ["System.Byte", { type: "string", format: "byte" }],
  ["System.SByte", { type: "string", format: "byte" }],
  ["System.Int16", { type: "integer", format: "int32" }],
  ["System.UInt16", { type: "integer", format: "int32" }],
  ["System.Int32", { type: "integer", format: "int32" }],
  ["System.UInt32", { type: "integer", format: "int32" }],
  ["System.Int64", { type: "integer", format: "int64" }],
  ["System.UInt64", { type: "integer", format: "int64" }],
  ["System.Single", { type: "number", format: "float" }],
  ["System.Double", { type: "number", format: "double" }],
  ["System.Decimal", { type: "number", format: "double" }],
  ["System.DateTime", { type: "string", format: "date-time" }],
  ["System.DateTimeOffset", { type: "string", format: "date-time" }],
  ["System.TimeSpan", { type: "string" }],
  ["System.Guid", { type: "string", format: "uuid" }],
  ["System.Uri", { type: "string", format: "uri" }],
  ["System.Object", { type: "object" }],
]);

export type GenericShape = "array" | "dictionary" | "nullable";

/**
 * Open generic definitions, keyed by their arity-suffixed name
 */
export const GENERIC_DEFINITIONS: ReadonlyMap<string, GenericShape> = new Map<string, GenericShape>([
  ["System.Nullable`1", "nullable"],
  ["System.Collections.Generic.List`1", "array"],
  ["System.Collections.Generic.IList`1", "array"],
  ["System.Collections.Generic.ICollection`1", "array"],
  ["System.Collections.Generic.IEnumerable`1", "array"],
  ["System.Collections.Generic.IReadOnlyList`1", "array"],
  ["System.Collections.Generic.IReadOnlyCollection`1", "array"],
  ["System.Collections.Generic.HashSet`1", "array"],
  ["System.Collections.Generic.Dictionary`2", "dictionary"],
  ["System.Collections.Generic.IDictionary`2", "dictionary"],
  ["System.Collections.Generic.IReadOnlyDictionary`2", "dictionary"],
]);

/**
 * Arity of a generic definition name such as ``List`1``, or 0
 */
export function genericArity(typeName: string): number {
  const match = /`(\d+)$/.exec(typeName);
  return match ? Number.parseInt(match[1] ?? "0", 10) : 0;
}
