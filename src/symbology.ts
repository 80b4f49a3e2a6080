import { z } from "zod";
import { InvalidInputError } from "./errors";

export const symbologySchema = z.enum(["codabar", "upc"]);

export type Symbology = z.infer<typeof symbologySchema>;

export const SYMBOLOGIES: readonly Symbology[] = symbologySchema.options;

export function parseSymbology(value: string): Symbology {
  const parsed = symbologySchema.safeParse(value.trim().toLowerCase());
  if (!parsed.success) {
    throw new InvalidInputError(
      `Unsupported symbology "${value}"; expected one of ${SYMBOLOGIES.join(", ")}`,
      value
    );
  }
  return parsed.data;
}
