import { encoderFor } from "./encoders";
import { InvalidInputError } from "./errors";
import { parseOptions, type BarcodeOptions } from "./options";
import type { Symbology } from "./symbology";

export type Barcode = Readonly<{
  rawData: string; // as supplied by the caller
  normalizedData: string; // what is actually encoded
  symbology: Symbology;
  options: Readonly<BarcodeOptions>;
}>;

/** Everything a renderer needs to draw and name one barcode. */
export type BarcodeOutput = {
  barPattern: string;
  displayText: string;
  normalizedData: string;
  symbologyName: Symbology;
};

export function createBarcode(rawData: string, symbology: Symbology, options: BarcodeOptions = {}): Barcode {
  const encoder = encoderFor(symbology);
  const parsedOptions = parseOptions(options);
  if (!encoder.validate(rawData)) {
    throw new InvalidInputError(`Not a valid ${symbology} value: ${rawData}`, rawData);
  }
  return Object.freeze({
    rawData,
    normalizedData: encoder.normalize(rawData),
    symbology,
    options: Object.freeze(parsedOptions),
  });
}

export function encodeBarcode(barcode: Barcode): string {
  return encoderFor(barcode.symbology).encode(barcode.normalizedData);
}

export function barcodeText(barcode: Barcode): string {
  return encoderFor(barcode.symbology).displayText(barcode.normalizedData, barcode.options);
}

export function describeBarcode(barcode: Barcode): BarcodeOutput {
  return {
    barPattern: encodeBarcode(barcode),
    displayText: barcodeText(barcode),
    normalizedData: barcode.normalizedData,
    symbologyName: encoderFor(barcode.symbology).name,
  };
}

export function defaultFilename(
  output: Pick<BarcodeOutput, "symbologyName" | "normalizedData">,
  extension: string = "png"
): string {
  return `${output.symbologyName}-${output.normalizedData}.${extension}`;
}
