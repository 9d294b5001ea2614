/**
 * Cross-Reference Parsing
 *
 * Documentation comments reference symbols with prefixed ids such as
 * `T:Sample.Contracts.Order` (type) or `F:Sample.Contracts.Examples.Order` (field).
 *
 * @module
 */

import { DocumentationError, ErrorCode } from "../errors.js";
import { err, ok, type Result } from "../../types/result.js";

export type CrefKind = "type" | "field" | "property" | "method" | "event" | "namespace" | "unknown";

export interface Cref {
  raw: string;
  kind: CrefKind;
  /** Full name of the type, or of the declaring type for members */
  typeName: string;
  /** Member name for field, property, method and event references */
  memberName?: string;
}

const PREFIXES: Record<string, CrefKind> = {
  T: "type",
  F: "field",
  P: "property",
  M: "method",
  E: "event",
  N: "namespace",
};

/**
 * Parse a cref value. Unprefixed values are treated as type names.
 */
export function parseCref(raw: string): Result<Cref, DocumentationError> {
  const value = raw.trim();
  if (value.length === 0) {
    return err(new DocumentationError("Cross-reference is empty", ErrorCode.DOC_INVALID_CREF));
  }

  const match = /^([A-Z]):(.*)$/.exec(value);
  if (!match) {
    return ok({ raw: value, kind: "type", typeName: value });
  }

  const prefix = match[1] ?? "";
  const name = (match[2] ?? "").trim();
  const kind = PREFIXES[prefix] ?? "unknown";

  if (name.length === 0) {
    return err(
      new DocumentationError(`Cross-reference "${value}" does not name a symbol`, ErrorCode.DOC_INVALID_CREF, {
        cref: value,
      })
    );
  }

  if (kind === "type" || kind === "namespace" || kind === "unknown") {
    return ok({ raw: value, kind, typeName: name });
  }

  // Method signatures carry a parameter list that may itself contain dots
  const memberPath = kind === "method" ? name.replace(/\(.*\)$/, "") : name;
  const separator = memberPath.lastIndexOf(".");
  if (separator <= 0 || separator === memberPath.length - 1) {
    return err(
      new DocumentationError(
        `Cross-reference "${value}" must be qualified with its declaring type`,
        ErrorCode.DOC_INVALID_CREF,
        { cref: value }
      )
    );
  }

  return ok({
    raw: value,
    kind,
    typeName: memberPath.slice(0, separator),
    memberName: memberPath.slice(separator + 1),
  });
}
