import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { TypeFetcher } from "../impl/TypeFetcher.js";
import { ContractAssemblySchema } from "../models/contract.js";
import { ConfigurationError, DocumentationError, ErrorCode, NotFoundError } from "../../errors.js";
import { unwrap, unwrapErr } from "../../../types/result.js";

const orders = ContractAssemblySchema.parse({
  name: "Orders.Contracts.dll",
  types: [
    {
      fullName: "Orders.Contracts.Examples",
      fields: [{ name: "OrderExample", value: '{"orderId":1}' }],
    },
    { fullName: "Orders.Contracts.Status", kind: "enum", enumMembers: ["Open", "Closed"] },
    { fullName: "Orders.Contracts.Order", properties: [{ name: "Id", type: "System.Int64" }] },
  ],
});

const billing = ContractAssemblySchema.parse({
  name: "Billing.Contracts.dll",
  types: [{ fullName: "Orders.Contracts.Order", kind: "struct" }],
});

describe("TypeFetcher", () => {
  const fetcher = TypeFetcher.fromAssemblies([orders, billing]);

  describe("resolveType", () => {
    it("should resolve platform types", () => {
      expect(unwrap(fetcher.resolveType("System.Guid"))).toEqual({
        kind: "primitive",
        fullName: "System.Guid",
        schema: { type: "string", format: "uuid" },
      });
    });

    it("should resolve contract enums and objects", () => {
      expect(unwrap(fetcher.resolveType("Orders.Contracts.Status")).kind).toBe("enum");
      const order = unwrap(fetcher.resolveType("Orders.Contracts.Order"));
      expect(order.kind).toBe("object");
      expect(order.kind === "object" && order.assembly).toBe("Orders.Contracts.dll");
    });

    it("should resolve array and nullable suffixes", () => {
      const type = unwrap(fetcher.resolveType("System.Int32?[]"));
      expect(type.kind).toBe("array");
      expect(type.kind === "array" && type.elementType.kind).toBe("nullable");
    });

    it("should report the searched assemblies for unknown types", () => {
      const error = unwrapErr(fetcher.resolveType("Orders.Contracts.Missing"));
      expect(error).toBeInstanceOf(NotFoundError);
      expect(error.code).toBe(ErrorCode.TYPE_NOT_FOUND);
      expect(error.message).toBe(
        'Type "Orders.Contracts.Missing" could not be found. ' +
          "Ensure that it exists in one of the following assemblies: Orders.Contracts.dll, Billing.Contracts.dll"
      );
    });

    it("should reject open generic definitions", () => {
      const error = unwrapErr(fetcher.resolveType("System.Collections.Generic.List`1"));
      expect(error).toBeInstanceOf(DocumentationError);
    });
  });

  describe("loadType", () => {
    it("should close generic definitions over the listed arguments", () => {
      const type = unwrap(
        fetcher.loadType(["System.Collections.Generic.Dictionary`2", "System.String", "Orders.Contracts.Order"])
      );
      expect(type.fullName).toBe("System.Collections.Generic.Dictionary`2[System.String,Orders.Contracts.Order]");
      expect(type.kind === "dictionary" && type.valueType.fullName).toBe("Orders.Contracts.Order");
    });

    it("should fail when a generic definition lacks arguments", () => {
      const error = unwrapErr(fetcher.loadType(["System.Nullable`1"]));
      expect(error.message).toBe('Generic type "System.Nullable`1" requires 1 type argument(s) but 0 were listed');
    });

    it("should reject type arguments for a non-generic type", () => {
      const error = unwrapErr(fetcher.loadType(["System.String", "System.Int32"]));
      expect(error).toBeInstanceOf(DocumentationError);
      expect(error.code).toBe(ErrorCode.DOC_INVALID_CREF);
      expect(error.message).toBe('Type "System.String" takes no type arguments but 1 were listed');
    });

    it("should reject surplus type arguments for a generic type", () => {
      const error = unwrapErr(
        fetcher.loadType(["System.Collections.Generic.List`1", "System.String", "System.Int32"])
      );
      expect(error.message).toBe(
        'Generic type "System.Collections.Generic.List`1" takes 1 type argument(s) but 2 were listed'
      );
    });

    it("should fail when no type is listed", () => {
      expect(unwrapErr(fetcher.loadType([])).message).toBe("No type was referenced");
    });
  });

  describe("resolveField", () => {
    it("should return the field literal", () => {
      expect(unwrap(fetcher.resolveField("F:Orders.Contracts.Examples.OrderExample"))).toEqual({
        name: "OrderExample",
        declaringType: "Orders.Contracts.Examples",
        type: "System.String",
        value: '{"orderId":1}',
      });
    });

    it("should fail for missing fields", () => {
      const error = unwrapErr(fetcher.resolveField("F:Orders.Contracts.Examples.Missing"));
      expect(error).toBeInstanceOf(NotFoundError);
      expect(error.code).toBe(ErrorCode.FIELD_NOT_FOUND);
      expect(error.message).toBe('Field "Missing" could not be found for type: "Orders.Contracts.Examples".');
    });

    it("should fail for non-field references", () => {
      expect(unwrapErr(fetcher.resolveField("P:Orders.Contracts.Order.Id")).message).toBe(
        'Cross-reference "P:Orders.Contracts.Order.Id" must reference a field'
      );
    });
  });

  describe("fromFiles", () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "type-fetcher-"));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it("should report assemblies by file name", () => {
      const file = path.join(tempDir, "Orders.json");
      fs.writeFileSync(file, JSON.stringify({ name: "Orders", types: [] }));

      const loaded = unwrap(TypeFetcher.fromFiles([file]));
      expect(loaded.assemblyFileNames).toEqual(["Orders.json"]);
    });

    it("should fail for missing files", () => {
      const file = path.join(tempDir, "Missing.json");
      const error = unwrapErr(TypeFetcher.fromFiles([file]));
      expect(error.code).toBe(ErrorCode.ASSEMBLY_NOT_FOUND);
      expect(error.message).toBe(`Assembly "${file}" could not be found.`);
    });

    it("should fail for invalid JSON", () => {
      const file = path.join(tempDir, "Broken.json");
      fs.writeFileSync(file, "{ not json");
      const error = unwrapErr(TypeFetcher.fromFiles([file]));
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error.message.startsWith(`"${file}" is not valid JSON`)).toBe(true);
    });

    it("should fail for files that are not contract assemblies", () => {
      const file = path.join(tempDir, "Invalid.json");
      fs.writeFileSync(file, JSON.stringify({ types: [] }));
      const error = unwrapErr(TypeFetcher.fromFiles([file]));
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error.message.startsWith('Assembly "Invalid.json" is invalid at name:')).toBe(true);
    });
  });
});
