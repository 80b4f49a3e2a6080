import { NotImplementedError, UnmappedCharacterError } from "./errors";
import type { Symbology } from "./symbology";
import { CODABAR_PATTERNS } from "./tables/codabar";

/**
 * Bar pattern of one character. Data that passed the symbology's validation
 * always has an entry, so an UnmappedCharacterError here points at a bug.
 */
export function lookup(symbology: Symbology, character: string): string {
  switch (symbology) {
    case "codabar": {
      const pattern = CODABAR_PATTERNS.get(character);
      if (pattern === undefined) {
        throw new UnmappedCharacterError(symbology, character);
      }
      return pattern;
    }
    case "upc":
      throw new NotImplementedError("upc bar patterns");
  }
}

export function patternLength(symbology: Symbology, character: string): number {
  return lookup(symbology, character).length;
}
