import { z } from "zod";
import { InvalidInputError } from "./errors";

export const barcodeOptionsSchema = z
  .object({
    text: z.string().optional(), // caption shown instead of the encoded data
  })
  .strict();

export type BarcodeOptions = z.infer<typeof barcodeOptionsSchema>;

export function parseOptions(input: unknown): BarcodeOptions {
  const parsed = barcodeOptionsSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    const rejected = parsed.error.issues.flatMap((issue) =>
      issue.code === "unrecognized_keys" ? issue.keys : [issue.path.join(".")]
    );
    throw new InvalidInputError(`Invalid barcode options: ${issues}`, rejected.join(", "));
  }
  return parsed.data;
}
