/*
 Codabar bar patterns, 1 = bar module and 0 = space module.

 - 0-9, "-" and "$" are 9 modules wide; ":", "/", ".", "+" and the guards A-D are 10
 - every pattern has 4 bars and 3 spaces, and starts and ends with a bar
*/

export const CODABAR_PATTERNS: ReadonlyMap<string, string> = new Map([
  ["0", "101010011"],
  ["1", "101011001"],
  ["2", "101001011"],
  ["3", "110010101"],
  ["4", "101101001"],
  ["5", "110101001"],
  ["6", "100101011"],
  ["7", "100101101"],
  ["8", "100110101"],
  ["9", "110100101"],
  ["-", "101001101"],
  ["$", "101100101"],
  [":", "1101011011"],
  ["/", "1101101011"],
  [".", "1101101101"],
  ["+", "1011011011"],
  ["A", "1011001001"],
  ["B", "1001001011"],
  ["C", "1010010011"],
  ["D", "1010011001"],
]);

// Start/stop characters. Only A is ever written; B-D are readable but unused here.
export const CODABAR_GUARDS: readonly string[] = ["A", "B", "C", "D"];

export const CODABAR_GUARD = "A";

export const CODABAR_DATA_CHARACTERS: ReadonlySet<string> = new Set(
  [...CODABAR_PATTERNS.keys()].filter((char) => !CODABAR_GUARDS.includes(char))
);

// Narrow space written between two adjacent characters.
export const INTER_CHARACTER_GAP = "0";
