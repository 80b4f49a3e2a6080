/*
 Codabar encoder

 - Data characters: 0-9 - $ : . + /
 - Frames the data with the fixed guard "A" on both sides
 - Joins character patterns with a one-module space
*/

import { consistsOf } from "../digits";
import { lookup } from "../table";
import { CODABAR_DATA_CHARACTERS, CODABAR_GUARD, INTER_CHARACTER_GAP } from "../tables/codabar";
import type { SymbologyEncoder } from "./types";

const GUARD_CHARACTERS = /[ABCD]/g;

export const codabar: SymbologyEncoder = {
  name: "codabar",

  validate(raw) {
    return consistsOf(raw, CODABAR_DATA_CHARACTERS);
  },

  normalize(raw) {
    return `${CODABAR_GUARD}${raw}${CODABAR_GUARD}`.toUpperCase();
  },

  encode(normalized) {
    const patterns: string[] = [];
    for (const char of normalized) {
      patterns.push(lookup("codabar", char));
    }
    return patterns.join(INTER_CHARACTER_GAP);
  },

  displayText(normalized, options) {
    return options.text ?? normalized.replace(GUARD_CHARACTERS, "");
  },
};
