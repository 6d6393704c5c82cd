import type { SegmentStore } from '../memory/segments.js';

/**
 * The part of an image that format readers fill in.
 *
 * `segments` is byte addressed; `executionStartAddress` is stored as read from the input.
 */
export interface ImageState {
  readonly wordSizeBytes: number;
  readonly segments: SegmentStore;
  header: Uint8Array | undefined;
  executionStartAddress: number | undefined;
}

/**
 * Read-only view handed to format writers.
 */
export type ImageView = Readonly<ImageState>;

/** S-Record data record address width. */
export type SrecAddressLength = 16 | 24 | 32;

/** Intel HEX address mode: I8HEX (16), I16HEX (24, segmented 20-bit) or I32HEX (32). */
export type IhexAddressLength = 16 | 24 | 32;

/**
 * Options shared by the record writers.
 */
export interface WriteRecordsOptions {
  /** Data bytes per record. Default 32. */
  numberOfDataBytes?: number;
  /** Address width in bits. Default 32. */
  addressLengthBits?: number;
}

/**
 * Options for flattening an image into bytes. Addresses are in words.
 */
export interface WriteBinOptions {
  minimumAddress?: number;
  maximumAddress?: number;
  /** One word of padding written into gaps. Default is 0xFF in every byte. */
  padding?: Uint8Array;
}

export interface WriteArrayOptions extends WriteBinOptions {
  /** Default `', '`. */
  separator?: string;
}

/**
 * Supported input formats. `binary` carries its load address in words.
 */
export type InputFormat =
  | { kind: 'srec' }
  | { kind: 'ihex' }
  | { kind: 'ti_txt' }
  | { kind: 'verilog_vmem' }
  | { kind: 'binary'; address: number }
  | { kind: 'elf' };

/** Text formats that auto-detection can recognize. */
export type TextFormatKind = 'srec' | 'ihex' | 'ti_txt' | 'verilog_vmem';

/**
 * Supported output formats.
 */
export type OutputFormat =
  | ({ kind: 'srec' } & WriteRecordsOptions)
  | ({ kind: 'ihex' } & WriteRecordsOptions)
  | { kind: 'ti_txt' }
  | { kind: 'verilog_vmem' }
  | ({ kind: 'binary' } & WriteBinOptions)
  | ({ kind: 'array' } & WriteArrayOptions)
  | { kind: 'hexdump' };

/**
 * In-memory output: text for record formats, bytes for `binary`.
 */
export type Artifact = { kind: 'text'; text: string } | { kind: 'bytes'; bytes: Uint8Array };
