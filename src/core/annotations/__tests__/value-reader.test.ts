import { describe, it, expect } from "vitest";
import { readExampleValue } from "../value-reader.js";
import { cleanText, removeBlankLines } from "../text.js";
import { ErrorCode } from "../../errors.js";
import type { FieldDescriptor } from "../../reflection/index.js";
import { unwrap, unwrapErr } from "../../../types/result.js";

const field = (value: FieldDescriptor["value"]): FieldDescriptor => ({
  name: "Example",
  declaringType: "Sample.Examples",
  type: "System.String",
  value,
});

describe("readExampleValue", () => {
  it("should parse JSON objects and arrays", () => {
    expect(unwrap(readExampleValue(field('{"a":[1,2],"b":null}')))).toEqual({ a: [1, 2], b: null });
    expect(unwrap(readExampleValue(field(" [true, false] ")))).toEqual([true, false]);
  });

  it("should parse JSON scalars", () => {
    expect(unwrap(readExampleValue(field("-12.5")))).toBe(-12.5);
    expect(unwrap(readExampleValue(field("true")))).toBe(true);
    expect(unwrap(readExampleValue(field("null")))).toBeNull();
    expect(unwrap(readExampleValue(field('"quoted"')))).toBe("quoted");
  });

  it("should keep other text as a string", () => {
    expect(unwrap(readExampleValue(field("hello world")))).toBe("hello world");
    expect(unwrap(readExampleValue(field("trueish")))).toBe("trueish");
  });

  it("should keep text that only starts like a JSON number", () => {
    expect(unwrap(readExampleValue(field("2024-01-01")))).toBe("2024-01-01");
    expect(unwrap(readExampleValue(field("221B Baker Street")))).toBe("221B Baker Street");
    expect(unwrap(readExampleValue(field("-5 degrees")))).toBe("-5 degrees");
  });

  it("should pass through non-string literals", () => {
    expect(unwrap(readExampleValue(field(7)))).toBe(7);
    expect(unwrap(readExampleValue(field(false)))).toBe(false);
  });

  it("should fail for fields without a value", () => {
    const error = unwrapErr(readExampleValue(field(undefined)));
    expect(error.code).toBe(ErrorCode.DOC_INVALID_EXAMPLE_VALUE);
    expect(error.message).toBe('Field "Example" of type "Sample.Examples" has no constant value to use as an example.');
    expect(unwrapErr(readExampleValue(field(null))).code).toBe(ErrorCode.DOC_INVALID_EXAMPLE_VALUE);
  });

  it("should fail for JSON-looking text that does not parse", () => {
    expect(unwrapErr(readExampleValue(field("[1, 2")))).toBeDefined();
    expect(unwrapErr(readExampleValue(field('"unterminated'))).code).toBe(ErrorCode.DOC_INVALID_EXAMPLE_VALUE);
    const error = unwrapErr(readExampleValue(field("{broken")));
    expect(error.message.startsWith('Value of field "Example" of type "Sample.Examples" is not a valid JSON example: ')).toBe(
      true
    );
  });
});

describe("text helpers", () => {
  it("should remove whitespace-only lines", () => {
    expect(removeBlankLines("a\n   \r\n\tb\n")).toBe("a\n\tb");
  });

  it("should return undefined for blank text", () => {
    expect(cleanText(" \n \n ")).toBeUndefined();
    expect(cleanText("  value  ")).toBe("value");
  });
});
