/*
 Errors raised while building or encoding a barcode.

 - InvalidInputError: the caller's data or options do not fit the symbology
 - UnmappedCharacterError: validated data reached a character with no pattern
 - NotImplementedError: the symbology has no algorithm for this step yet
*/

export type BarcodeErrorCode = "INVALID_INPUT" | "UNMAPPED_CHARACTER" | "NOT_IMPLEMENTED";

export class BarcodeError extends Error {
  readonly code: BarcodeErrorCode;

  constructor(code: BarcodeErrorCode, message: string) {
    super(message);
    this.name = "BarcodeError";
    this.code = code;
    Object.setPrototypeOf(this, BarcodeError.prototype);
  }
}

export class InvalidInputError extends BarcodeError {
  /** The rejected value, as received */
  readonly invalidInput: string;

  constructor(message: string, invalidInput: string = "") {
    super("INVALID_INPUT", message);
    this.name = "InvalidInputError";
    this.invalidInput = invalidInput;
    Object.setPrototypeOf(this, InvalidInputError.prototype);
  }
}

export class UnmappedCharacterError extends BarcodeError {
  readonly symbology: string;
  readonly character: string;

  constructor(symbology: string, character: string) {
    const code = character.length > 0 ? character.charCodeAt(0) : 0;
    super(
      "UNMAPPED_CHARACTER",
      `Character "${character}" (U+${code.toString(16).toUpperCase().padStart(4, "0")}) has no ${symbology} pattern`
    );
    this.name = "UnmappedCharacterError";
    this.symbology = symbology;
    this.character = character;
    Object.setPrototypeOf(this, UnmappedCharacterError.prototype);
  }
}

export class NotImplementedError extends BarcodeError {
  /** What is missing, e.g. "upc encoding" */
  readonly feature: string;

  constructor(feature: string) {
    super("NOT_IMPLEMENTED", `Not implemented: ${feature}`);
    this.name = "NotImplementedError";
    this.feature = feature;
    Object.setPrototypeOf(this, NotImplementedError.prototype);
  }
}
