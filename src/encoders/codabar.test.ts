import { describe, expect, it } from "vitest";
import { UnmappedCharacterError } from "../errors";
import { lookup, patternLength } from "../table";
import { INTER_CHARACTER_GAP } from "../tables/codabar";
import { codabar } from "./codabar";

// Cuts a bar pattern back into one table pattern per character of `normalized`.
function splitPattern(barPattern: string, normalized: string): string[] {
  const parts: string[] = [];
  let offset = 0;
  [...normalized].forEach((char, i) => {
    if (i > 0) {
      expect(barPattern[offset]).toBe(INTER_CHARACTER_GAP);
      offset += 1;
    }
    const length = patternLength("codabar", char);
    parts.push(barPattern.slice(offset, offset + length));
    offset += length;
  });
  expect(offset).toBe(barPattern.length);
  return parts;
}

describe("codabar.validate", () => {
  it("accepts digits and - $ : . + /", () => {
    expect(codabar.validate("0123456789-$:.+/")).toBe(true);
    expect(codabar.validate("0")).toBe(true);
    expect(codabar.validate("$1.5")).toBe(true);
  });

  it("rejects any character outside the set", () => {
    expect(codabar.validate("12 34")).toBe(false);
    expect(codabar.validate("12a")).toBe(false);
    expect(codabar.validate("1*2")).toBe(false);
  });

  it("rejects guard characters in the data", () => {
    expect(codabar.validate("A12")).toBe(false);
  });

  it("rejects the empty string", () => {
    expect(codabar.validate("")).toBe(false);
  });
});

describe("codabar.normalize", () => {
  it("frames the data with A", () => {
    expect(codabar.normalize("0")).toBe("A0A");
    expect(codabar.normalize("12-34")).toBe("A12-34A");
  });
});

describe("codabar.encode", () => {
  it("encodes a single digit between guards", () => {
    expect(codabar.encode("A0A")).toBe("1011001001" + "0" + "101010011" + "0" + "1011001001");
  });

  it("adds one gap module between characters", () => {
    const inputs: Array<[string, number]> = [
      ["1234", 61],
      ["$1.5", 62],
    ];
    for (const [raw, expected] of inputs) {
      const normalized = codabar.normalize(raw);
      const total = [...normalized].reduce((acc, char) => acc + patternLength("codabar", char), 0);
      const encoded = codabar.encode(normalized);
      expect(encoded).toHaveLength(total + normalized.length - 1);
      expect(encoded).toHaveLength(expected);
    }
  });

  it("splits back into the table patterns it was built from", () => {
    const normalized = codabar.normalize("90:/+");
    const parts = splitPattern(codabar.encode(normalized), normalized);
    expect(parts).toEqual([...normalized].map((char) => lookup("codabar", char)));
  });

  it("throws UnmappedCharacterError for data that skipped validation", () => {
    expect(() => codabar.encode("A0EA")).toThrow(UnmappedCharacterError);
  });
});

describe("codabar.displayText", () => {
  it("strips the guards", () => {
    expect(codabar.displayText("A1234A", {})).toBe("1234");
  });

  it("prefers options.text", () => {
    expect(codabar.displayText("A1234A", { text: "X" })).toBe("X");
  });

  it("keeps an empty override", () => {
    expect(codabar.displayText("A1234A", { text: "" })).toBe("");
  });
});
