/**
 * ITypeResolver - cross-reference lookup capability
 *
 * Resolves type names and field cross-references against a set of contract
 * assemblies. Implementations must be read-only after construction so a single
 * instance can be shared between extraction calls.
 *
 * @module
 */

import type { AnnotationError } from "../../errors.js";
import type { Result } from "../../../types/result.js";
import type { FieldDescriptor, TypeDescriptor } from "../models/contract.js";

export interface ITypeResolver {
  /** File names of the assemblies searched, in load order */
  readonly assemblyFileNames: readonly string[];

  /**
   * Resolve a single type name. Supports `[]` (array) and `?` (nullable) suffixes.
   */
  resolveType(typeName: string): Result<TypeDescriptor, AnnotationError>;

  /**
   * Resolve a type from a list of type names: the first names the type and,
   * when it is an open generic definition, the following names are its
   * type arguments.
   */
  loadType(typeNames: readonly string[]): Result<TypeDescriptor, AnnotationError>;

  /**
   * Resolve a field cross-reference such as `F:Sample.Contracts.Examples.Order`
   */
  resolveField(cref: string): Result<FieldDescriptor, AnnotationError>;
}
