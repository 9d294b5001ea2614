/**
 * TypeFetcher - resolves cross-references against contract assemblies
 *
 * @module
 */

import * as fs from "node:fs";
import * as path from "node:path";
import {
  type AnnotationError,
  ConfigurationError,
  DocumentationError,
  ErrorCode,
  NotFoundError,
} from "../../errors.js";
import { parseCref } from "../../cref/cref.js";
import { collect, err, ok, type Result } from "../../../types/result.js";
import { readJsonFile } from "../../../utils/fs.js";
import { createLogger } from "../../../utils/logger.js";
import { GENERIC_DEFINITIONS, PRIMITIVE_TYPES, genericArity } from "../builtin-types.js";
import type { ITypeResolver } from "../interfaces/ITypeResolver.js";
import {
  type ContractAssembly,
  ContractAssemblySchema,
  type ContractType,
  type FieldDescriptor,
  type TypeDescriptor,
} from "../models/contract.js";

const logger = createLogger("type-fetcher");

export interface AssemblySource {
  /** File name reported in lookup errors */
  fileName: string;
  assembly: ContractAssembly;
}

interface IndexedType {
  fileName: string;
  definition: ContractType;
}

/**
 * Resolves type names and field crefs against a fixed set of assemblies.
 *
 * @example
 * ```typescript
 * const fetcher = unwrap(TypeFetcher.fromFiles(["contracts/Sample.Contracts.json"]));
 * const field = fetcher.resolveField("F:Sample.Contracts.Examples.OrderExample");
 * ```
 */
export class TypeFetcher implements ITypeResolver {
  readonly assemblyFileNames: readonly string[];
  private readonly types = new Map<string, IndexedType>();

  constructor(sources: readonly AssemblySource[]) {
    this.assemblyFileNames = Object.freeze(sources.map((source) => source.fileName));

    for (const source of sources) {
      for (const definition of source.assembly.types) {
        const existing = this.types.get(definition.fullName);
        if (existing) {
          logger.debug(
            { type: definition.fullName, kept: existing.fileName, ignored: source.fileName },
            "Duplicate type definition"
          );
          continue;
        }
        this.types.set(definition.fullName, { fileName: source.fileName, definition });
      }
    }
  }

  /**
   * Build a fetcher from in-memory assemblies, reported by their names
   */
  static fromAssemblies(assemblies: readonly ContractAssembly[]): TypeFetcher {
    return new TypeFetcher(assemblies.map((assembly) => ({ fileName: assembly.name, assembly })));
  }

  /**
   * Load and validate assembly files
   */
  static fromFiles(filePaths: readonly string[]): Result<TypeFetcher, AnnotationError> {
    const sources = collect(filePaths.map(loadAssemblyFile));
    if (!sources.ok) return sources;

    logger.debug({ assemblies: filePaths.length }, "Loaded contract assemblies");
    return ok(new TypeFetcher(sources.value));
  }

  resolveType(typeName: string): Result<TypeDescriptor, AnnotationError> {
    const name = typeName.trim();

    if (name.endsWith("[]")) {
      const element = this.resolveType(name.slice(0, -2));
      if (!element.ok) return element;
      return ok<TypeDescriptor>({ kind: "array", fullName: name, elementType: element.value });
    }

    if (name.endsWith("?")) {
      const underlying = this.resolveType(name.slice(0, -1));
      if (!underlying.ok) return underlying;
      return ok<TypeDescriptor>({ kind: "nullable", fullName: name, underlyingType: underlying.value });
    }

    const primitive = PRIMITIVE_TYPES.get(name);
    if (primitive) {
      return ok<TypeDescriptor>({ kind: "primitive", fullName: name, schema: primitive });
    }

    if (GENERIC_DEFINITIONS.has(name)) {
      return err(
        new DocumentationError(
          `Generic type "${name}" requires ${genericArity(name)} type argument(s)`,
          ErrorCode.DOC_INVALID_CREF,
          { type: name }
        )
      );
    }

    const indexed = this.types.get(name);
    if (!indexed) {
      return err(this.typeNotFound(name));
    }

    const { definition, fileName } = indexed;
    if (definition.kind === "enum") {
      return ok<TypeDescriptor>({ kind: "enum", fullName: name, assembly: fileName, definition });
    }
    return ok<TypeDescriptor>({ kind: "object", fullName: name, assembly: fileName, definition });
  }

  loadType(typeNames: readonly string[]): Result<TypeDescriptor, AnnotationError> {
    const [head, ...rest] = typeNames;
    if (head === undefined) {
      return err(new DocumentationError("No type was referenced", ErrorCode.DOC_INVALID_CREF));
    }

    const shape = GENERIC_DEFINITIONS.get(head);
    if (!shape) {
      if (rest.length > 0) {
        return err(
          new DocumentationError(
            `Type "${head}" takes no type arguments but ${rest.length} were listed`,
            ErrorCode.DOC_INVALID_CREF,
            { type: head, typeArguments: rest }
          )
        );
      }
      return this.resolveType(head);
    }

    const arity = genericArity(head);
    if (rest.length > arity) {
      return err(
        new DocumentationError(
          `Generic type "${head}" takes ${arity} type argument(s) but ${rest.length} were listed`,
          ErrorCode.DOC_INVALID_CREF,
          { type: head, typeArguments: rest }
        )
      );
    }
    if (rest.length < arity) {
      return err(
        new DocumentationError(
          `Generic type "${head}" requires ${arity} type argument(s) but ${rest.length} were listed`,
          ErrorCode.DOC_INVALID_CREF,
          { type: head, typeArguments: rest }
        )
      );
    }

    const args = collect(rest.map((name) => this.resolveType(name)));
    if (!args.ok) return args;

    const fullName = `${head}[${rest.join(",")}]`;
    const [first, second] = args.value;
    switch (shape) {
      case "array":
        return first
          ? ok<TypeDescriptor>({ kind: "array", fullName, elementType: first })
          : err(this.typeNotFound(head));
      case "nullable":
        return first
          ? ok<TypeDescriptor>({ kind: "nullable", fullName, underlyingType: first })
          : err(this.typeNotFound(head));
      case "dictionary":
        return second
          ? ok<TypeDescriptor>({ kind: "dictionary", fullName, valueType: second })
          : err(this.typeNotFound(head));
    }
  }

  resolveField(cref: string): Result<FieldDescriptor, AnnotationError> {
    const parsed = parseCref(cref);
    if (!parsed.ok) return parsed;

    const { kind, typeName, memberName } = parsed.value;
    if (kind !== "field" || memberName === undefined) {
      return err(
        new DocumentationError(
          `Cross-reference "${parsed.value.raw}" must reference a field`,
          ErrorCode.DOC_INVALID_CREF,
          { cref: parsed.value.raw }
        )
      );
    }

    const indexed = this.types.get(typeName);
    if (!indexed && !PRIMITIVE_TYPES.has(typeName)) {
      return err(this.typeNotFound(typeName));
    }

    const field = indexed?.definition.fields.find((candidate) => candidate.name === memberName);
    if (!field) {
      return err(
        new NotFoundError(
          `Field "${memberName}" could not be found for type: "${typeName}".`,
          ErrorCode.FIELD_NOT_FOUND,
          { symbol: memberName, searched: [typeName] }
        )
      );
    }

    return ok({ name: field.name, declaringType: typeName, type: field.type, value: field.value });
  }

  private typeNotFound(typeName: string): NotFoundError {
    return new NotFoundError(
      `Type "${typeName}" could not be found. Ensure that it exists in one of the following assemblies: ` +
        this.assemblyFileNames.join(", "),
      ErrorCode.TYPE_NOT_FOUND,
      { symbol: typeName, searched: [...this.assemblyFileNames] }
    );
  }
}

// =============================================================================
// Assembly Loading
// =============================================================================

function loadAssemblyFile(filePath: string): Result<AssemblySource, AnnotationError> {
  const fileName = path.basename(filePath);

  if (!fs.existsSync(filePath)) {
    return err(
      new NotFoundError(`Assembly "${filePath}" could not be found.`, ErrorCode.ASSEMBLY_NOT_FOUND, {
        symbol: filePath,
      })
    );
  }

  const raw = readJsonFile(filePath);
  if (!raw.ok) return raw;

  const parsed = ContractAssemblySchema.safeParse(raw.value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    return err(
      new ConfigurationError(
        `Assembly "${fileName}" is invalid${where}: ${issue?.message ?? "unknown problem"}`,
        ErrorCode.CONFIGURATION_ERROR,
        { filePath, issues: parsed.error.issues }
      )
    );
  }

  return ok({ fileName, assembly: parsed.data });
}
