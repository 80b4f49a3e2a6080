import { InvalidInputError } from "../errors";
import { symbologySchema, type Symbology } from "../symbology";
import { codabar } from "./codabar";
import type { SymbologyEncoder } from "./types";
import { upc } from "./upc";

export const ENCODERS = {
  codabar,
  upc,
} satisfies Record<Symbology, SymbologyEncoder>;

// Checked at run time too: plain JS callers can pass any string.
export function encoderFor(symbology: Symbology): SymbologyEncoder {
  const parsed = symbologySchema.safeParse(symbology);
  if (!parsed.success) {
    throw new InvalidInputError(`Unsupported symbology "${String(symbology)}"`, String(symbology));
  }
  return ENCODERS[parsed.data];
}

export { codabar } from "./codabar";
export { upc, computeUpcChecksum } from "./upc";
export type { SymbologyEncoder } from "./types";
