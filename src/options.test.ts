import { describe, expect, it } from "vitest";
import { InvalidInputError } from "./errors";
import { parseOptions } from "./options";

function rejectedInput(input: unknown): string | undefined {
  try {
    parseOptions(input);
  } catch (error) {
    if (error instanceof InvalidInputError) {
      return error.invalidInput;
    }
    throw error;
  }
  return undefined;
}

describe("parseOptions", () => {
  it("accepts a text override", () => {
    expect(parseOptions({ text: "Shelf 4" })).toEqual({ text: "Shelf 4" });
  });

  it("treats missing options as empty", () => {
    expect(parseOptions(undefined)).toEqual({});
    expect(parseOptions(null)).toEqual({});
  });

  it("rejects unrecognized keys", () => {
    expect(() => parseOptions({ label: "x" })).toThrow(InvalidInputError);
    expect(() => parseOptions({ label: "x" })).toThrow(/label/);
    expect(rejectedInput({ label: "x" })).toBe("label");
  });

  it("rejects a non-string text", () => {
    expect(() => parseOptions({ text: 5 })).toThrow(/^Invalid barcode options: text: /);
  });

  it("rejects a bigint text", () => {
    expect(() => parseOptions({ text: 1n })).toThrow(InvalidInputError);
    expect(rejectedInput({ text: 1n })).toBe("text");
  });

  it("names the unknown keys of a circular object", () => {
    const options: Record<string, unknown> = { label: "x" };
    options.self = options;
    expect(() => parseOptions(options)).toThrow(InvalidInputError);
    expect(rejectedInput(options)).toBe("label, self");
  });
});
