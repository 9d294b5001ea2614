/**
 * Reflection Module
 *
 * Resolves documentation cross-references against contract assemblies.
 *
 * @module
 */

export type { ITypeResolver } from "./interfaces/ITypeResolver.js";
export { TypeFetcher, type AssemblySource } from "./impl/TypeFetcher.js";
export { PRIMITIVE_TYPES, GENERIC_DEFINITIONS, genericArity, type GenericShape } from "./builtin-types.js";
export {
  ContractAssemblySchema,
  ContractTypeSchema,
  ContractFieldSchema,
  ContractPropertySchema,
  type ContractAssembly,
  type ContractType,
  type ContractField,
  type ContractProperty,
  type TypeDescriptor,
  type FieldDescriptor,
  type PrimitiveSchema,
} from "./models/contract.js";
