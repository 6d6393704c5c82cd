/**
 * Stable error kinds raised by the image model, the record codecs and the format readers.
 *
 * Callers (the CLI, tests) branch on `kind` rather than on class identity.
 */
export const ErrorKinds = {
  /** Malformed line: bad sentinel character, wrong length, bad field. */
  Parse: 'ParseError',

  /** Decoded checksum differs from the computed one. */
  Checksum: 'ChecksumError',

  /** Record or output type outside the accepted set. */
  UnsupportedType: 'UnsupportedTypeError',

  /** Data is neither adjacent to nor allowed to overlap stored data. */
  AddData: 'AddDataError',

  /** Address outside what the target format can represent, or an inverted range. */
  Range: 'RangeError',

  /** Auto-detection recognized no known grammar. */
  UnsupportedFileFormat: 'UnsupportedFileFormatError',
} as const;

export type ErrorKind = (typeof ErrorKinds)[keyof typeof ErrorKinds];

/**
 * Base class of every error thrown by binsplice.
 */
export class ImageError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string) {
    super(message);
    this.kind = kind;
    this.name = kind;
  }
}

export class ParseError extends ImageError {
  constructor(message: string) {
    super(ErrorKinds.Parse, message);
  }
}

/**
 * Checksum mismatch. `expected` is the value computed from the record body, `actual` the one read.
 */
export class ChecksumError extends ImageError {
  readonly expected: number;
  readonly actual: number;

  constructor(message: string, expected: number, actual: number) {
    super(ErrorKinds.Checksum, message);
    this.expected = expected;
    this.actual = actual;
  }
}

export class UnsupportedTypeError extends ImageError {
  constructor(message: string) {
    super(ErrorKinds.UnsupportedType, message);
  }
}

export class AddDataError extends ImageError {
  constructor(message: string) {
    super(ErrorKinds.AddData, message);
  }
}

/**
 * The `RangeError` kind. Named apart from the global `RangeError`.
 */
export class AddressRangeError extends ImageError {
  constructor(message: string) {
    super(ErrorKinds.Range, message);
  }
}

export class UnsupportedFileFormatError extends ImageError {
  constructor(message = 'unsupported file format') {
    super(ErrorKinds.UnsupportedFileFormat, message);
  }
}

export type TiTxtErrorReason =
  | 'bad file terminator'
  | 'bad line length'
  | 'bad data'
  | 'missing section address'
  | 'missing file terminator'
  | 'bad section address';

/**
 * TI-TXT grammar violation. The message is the reason itself.
 */
export class TiTxtError extends ParseError {
  readonly reason: TiTxtErrorReason;

  constructor(reason: TiTxtErrorReason) {
    super(reason);
    this.reason = reason;
  }
}

export function isImageError(err: unknown): err is ImageError {
  return err instanceof ImageError;
}
