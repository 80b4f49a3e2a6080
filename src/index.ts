export {
  createBarcode,
  encodeBarcode,
  barcodeText,
  describeBarcode,
  defaultFilename,
  type Barcode,
  type BarcodeOutput,
} from "./barcode";
export { ENCODERS, encoderFor, codabar, upc, computeUpcChecksum, type SymbologyEncoder } from "./encoders";
export {
  BarcodeError,
  InvalidInputError,
  NotImplementedError,
  UnmappedCharacterError,
  type BarcodeErrorCode,
} from "./errors";
export { barcodeOptionsSchema, parseOptions, type BarcodeOptions } from "./options";
export { renderBarcodeToSvg, renderBarsToSvg, type BarRenderOptions } from "./render";
export { SYMBOLOGIES, parseSymbology, symbologySchema, type Symbology } from "./symbology";
export { lookup, patternLength } from "./table";
export {
  CODABAR_DATA_CHARACTERS,
  CODABAR_GUARD,
  CODABAR_GUARDS,
  CODABAR_PATTERNS,
  INTER_CHARACTER_GAP,
} from "./tables/codabar";
