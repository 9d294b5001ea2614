/**
 * Contract Assembly Models
 *
 * A contract assembly is a JSON description of the types a service exposes:
 * their fields (with constant values), properties and enum members.
 * Cross-references in documentation resolve against these files.
 *
 * @module
 */

import { z } from "zod";
import type { OpenApiSchemaType } from "../../../types/openapi.js";

// =============================================================================
// Contract Schemas
// =============================================================================

export const ContractFieldSchema = z.object({
  name: z.string().min(1),
  /** Full type name of the field */
  type: z.string().min(1).default("System.String"),
  /** Constant literal assigned to the field */
  value: z.union([z.string(), z.number(), z.boolean(), z.null()]).optional(),
});

export type ContractField = z.infer<typeof ContractFieldSchema>;

export const ContractPropertySchema = z.object({
  name: z.string().min(1),
  /** Full type name, optionally suffixed with `[]` (array) or `?` (nullable) */
  type: z.string().min(1),
  /** Serialized name, when it differs from the declared name */
  jsonName: z.string().min(1).optional(),
  required: z.boolean().default(false),
  description: z.string().optional(),
});

export type ContractProperty = z.infer<typeof ContractPropertySchema>;

export const ContractTypeKindSchema = z.enum(["class", "struct", "interface", "enum"]);

export type ContractTypeKind = z.infer<typeof ContractTypeKindSchema>;

export const ContractTypeSchema = z.object({
  fullName: z.string().min(1),
  kind: ContractTypeKindSchema.default("class"),
  description: z.string().optional(),
  fields: z.array(ContractFieldSchema).default([]),
  properties: z.array(ContractPropertySchema).default([]),
  enumMembers: z.array(z.string().min(1)).default([]),
});

export type ContractType = z.infer<typeof ContractTypeSchema>;

export const ContractAssemblySchema = z.object({
  name: z.string().min(1),
  types: z.array(ContractTypeSchema).default([]),
});

export type ContractAssembly = z.infer<typeof ContractAssemblySchema>;

// =============================================================================
// Resolved Descriptors
// =============================================================================

export interface PrimitiveSchema {
  type: OpenApiSchemaType;
  format?: string;
}

/**
 * A type resolved from a cross-reference
 */
export type TypeDescriptor =
  | { kind: "primitive"; fullName: string; schema: PrimitiveSchema }
  | { kind: "object"; fullName: string; assembly: string; definition: ContractType }
  | { kind: "enum"; fullName: string; assembly: string; definition: ContractType }
  | { kind: "array"; fullName: string; elementType: TypeDescriptor }
  | { kind: "dictionary"; fullName: string; valueType: TypeDescriptor }
  | { kind: "nullable"; fullName: string; underlyingType: TypeDescriptor };

export interface FieldDescriptor {
  name: string;
  declaringType: string;
  type: string;
  value: ContractField["value"];
}
