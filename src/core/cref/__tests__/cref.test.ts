import { describe, it, expect } from "vitest";
import { parseCref } from "../cref.js";
import { DocumentationError, ErrorCode } from "../../errors.js";
import { unwrap, unwrapErr } from "../../../types/result.js";

describe("parseCref", () => {
  it("should parse type references", () => {
    expect(unwrap(parseCref("T:Sample.Contracts.Order"))).toEqual({
      raw: "T:Sample.Contracts.Order",
      kind: "type",
      typeName: "Sample.Contracts.Order",
    });
  });

  it("should treat unprefixed values as type names", () => {
    expect(unwrap(parseCref(" System.String "))).toEqual({
      raw: "System.String",
      kind: "type",
      typeName: "System.String",
    });
  });

  it("should split field references at the last dot", () => {
    expect(unwrap(parseCref("F:Sample.Contracts.Examples.OrderExample"))).toEqual({
      raw: "F:Sample.Contracts.Examples.OrderExample",
      kind: "field",
      typeName: "Sample.Contracts.Examples",
      memberName: "OrderExample",
    });
  });

  it("should drop method parameter lists", () => {
    const cref = unwrap(parseCref("M:Sample.Api.Orders.Get(System.String,System.Int32)"));
    expect(cref.kind).toBe("method");
    expect(cref.typeName).toBe("Sample.Api.Orders");
    expect(cref.memberName).toBe("Get");
  });

  it("should keep unknown prefixes", () => {
    expect(unwrap(parseCref("X:Something")).kind).toBe("unknown");
  });

  it("should reject empty values", () => {
    const error = unwrapErr(parseCref(""));
    expect(error).toBeInstanceOf(DocumentationError);
    expect(error.code).toBe(ErrorCode.DOC_INVALID_CREF);
    expect(error.message).toBe("Cross-reference is empty");
  });

  it("should reject prefixes without a name", () => {
    expect(unwrapErr(parseCref("T:")).message).toBe('Cross-reference "T:" does not name a symbol');
  });

  it("should reject unqualified members", () => {
    expect(unwrapErr(parseCref("F:OrderExample")).message).toBe(
      'Cross-reference "F:OrderExample" must be qualified with its declaring type'
    );
  });
});
