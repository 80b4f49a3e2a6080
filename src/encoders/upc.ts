/*
 UPC-A placeholder. Input is accepted and kept as-is, but there is no bar
 table or check digit algorithm yet: both steps throw NotImplementedError.
*/

import { isDigitString } from "../digits";
import { InvalidInputError, NotImplementedError } from "../errors";
import type { SymbologyEncoder } from "./types";

export const upc: SymbologyEncoder = {
  name: "upc",

  validate(raw) {
    return isDigitString(raw) && (raw.length === 11 || raw.length === 12);
  },

  normalize(raw) {
    return raw;
  },

  encode() {
    throw new NotImplementedError("upc encoding");
  },

  displayText(normalized, options) {
    return options.text ?? normalized;
  },
};

/** Check digit for the first 11 digits of a UPC-A number. */
export function computeUpcChecksum(digits: string): number {
  if (digits.length !== 11 || !isDigitString(digits)) {
    throw new InvalidInputError(`UPC check digit needs exactly 11 digits, got "${digits}"`, digits);
  }
  throw new NotImplementedError("upc check digit");
}
