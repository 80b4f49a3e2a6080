import type { BarcodeOptions } from "../options";
import type { Symbology } from "../symbology";

export type SymbologyEncoder = {
  name: Symbology;
  validate(raw: string): boolean;
  normalize(raw: string): string;
  encode(normalized: string): string; // flat string of "1" (bar) and "0" (space) modules
  displayText(normalized: string, options: BarcodeOptions): string;
};
