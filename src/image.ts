import type { ElfLayout } from './elf/parseElf.js';
import { isElf, parseElf } from './elf/parseElf.js';
import { AddressRangeError } from './errors.js';
import { detectFormat } from './formats/detect.js';
import type { HeaderEncoding } from './formats/header.js';
import { DEFAULT_HEADER_ENCODING, decodeHeader, encodeHeader } from './formats/header.js';
import { textReaders, writeArtifact } from './formats/index.js';
import { readElf } from './formats/readElf.js';
import { readIhex } from './formats/readIhex.js';
import { readSrec } from './formats/readSrec.js';
import { readTiTxt } from './formats/readTiTxt.js';
import { readVmem } from './formats/readVmem.js';
import type {
  Artifact,
  ImageState,
  InputFormat,
  OutputFormat,
  WriteArrayOptions,
  WriteBinOptions,
} from './formats/types.js';
import { writeArray } from './formats/writeArray.js';
import { writeBin } from './formats/writeBin.js';
import { writeHexdump } from './formats/writeHexdump.js';
import { writeIhex } from './formats/writeIhex.js';
import { writeSrec } from './formats/writeSrec.js';
import { writeTiTxt } from './formats/writeTiTxt.js';
import { writeVmem } from './formats/writeVmem.js';
import { Segment } from './memory/segment.js';
import { SegmentStore } from './memory/segments.js';
import { writeInfo } from './info.js';
import { uintToBytes } from './records/hex.js';

export const DEFAULT_WORD_SIZE_BITS = 8;

export interface MemoryImageOptions {
  /** Bits per addressable word; a multiple of 8. Default 8. */
  wordSizeBits?: number;
  /** Default is UTF-8 text. */
  headerEncoding?: HeaderEncoding;
}

/**
 * A sparse memory image: optional header, optional execution start address and the stored data.
 *
 * Every address taken or returned here is in words; the segment store underneath is byte addressed.
 */
export class MemoryImage implements ImageState {
  readonly wordSizeBits: number;
  readonly wordSizeBytes: number;
  readonly headerEncoding: HeaderEncoding;
  readonly segments: SegmentStore;
  /** Raw header bytes, as found in an `S0` record. */
  header: Uint8Array | undefined;
  executionStartAddress: number | undefined;

  constructor(options: MemoryImageOptions = {}) {
    const wordSizeBits = options.wordSizeBits ?? DEFAULT_WORD_SIZE_BITS;
    if (!Number.isInteger(wordSizeBits) || wordSizeBits <= 0 || wordSizeBits % 8 !== 0) {
      throw new AddressRangeError(
        `word size must be a multiple of 8 bits, but got ${wordSizeBits} bits`,
      );
    }
    this.wordSizeBits = wordSizeBits;
    this.wordSizeBytes = wordSizeBits / 8;
    this.headerEncoding = options.headerEncoding ?? DEFAULT_HEADER_ENCODING;
    this.segments = new SegmentStore(this.wordSizeBytes);
  }

  /**
   * Header decoded with the header encoding. With the raw policy, non-printable bytes are escaped.
   */
  get headerText(): string | undefined {
    return this.header === undefined ? undefined : decodeHeader(this.header, this.headerEncoding);
  }

  /**
   * Set the header. Text is only accepted when the header encoding names a codec.
   */
  setHeader(value: string | Uint8Array | undefined): void {
    if (typeof value !== 'string') {
      this.header = value?.slice();
      return;
    }
    if (this.headerEncoding.kind === 'raw') {
      throw new TypeError('expected header bytes, but got a string (header encoding is raw)');
    }
    this.header = encodeHeader(value, this.headerEncoding.encoding);
  }

  /** First stored word address, or `undefined` when the image is empty. */
  get minimumAddress(): number | undefined {
    const min = this.segments.minimumAddress;
    return min === undefined ? undefined : Math.floor(min / this.wordSizeBytes);
  }

  /** One past the last stored word address, or `undefined` when the image is empty. */
  get maximumAddress(): number | undefined {
    const max = this.segments.maximumAddress;
    return max === undefined ? undefined : Math.floor(max / this.wordSizeBytes);
  }

  /** Number of stored words. */
  get length(): number {
    let bytes = 0;
    for (const segment of this.segments.segments()) bytes += segment.size;
    return Math.floor(bytes / this.wordSizeBytes);
  }

  addSrec(records: string, overwrite = false): void {
    readSrec(this, records, overwrite);
  }

  addIhex(records: string, overwrite = false): void {
    readIhex(this, records, overwrite);
  }

  addTiTxt(text: string, overwrite = false): void {
    readTiTxt(this, text, overwrite);
  }

  addVerilogVmem(text: string, overwrite = false): void {
    readVmem(this, text, overwrite);
  }

  /**
   * Add `data` at word `address`.
   */
  addBinary(data: Uint8Array, address = 0, overwrite = false): void {
    const min = address * this.wordSizeBytes;
    this.segments.add(new Segment(min, min + data.length, data, this.wordSizeBytes), overwrite);
  }

  /**
   * Add the loadable sections of an ELF file, given as bytes or as an already parsed layout.
   */
  addElf(elf: Uint8Array | ElfLayout, overwrite = true): void {
    readElf(this, elf instanceof Uint8Array ? parseElf(elf) : elf, overwrite);
  }

  /**
   * Add text in any recognized format; see {@link detectFormat}.
   */
  add(text: string, overwrite = false): void {
    textReaders[detectFormat(text)](this, text, overwrite);
  }

  /**
   * Add file contents in the given input format. `auto` detects ELF by magic, else a text format.
   */
  addInput(format: InputFormat | { kind: 'auto' }, bytes: Uint8Array, overwrite = false): void {
    const text = (): string => Buffer.from(bytes).toString('utf8');
    switch (format.kind) {
      case 'auto':
        if (isElf(bytes)) {
          this.addElf(bytes, overwrite);
        } else {
          this.add(text(), overwrite);
        }
        return;
      case 'srec':
      case 'ihex':
      case 'ti_txt':
      case 'verilog_vmem':
        textReaders[format.kind](this, text(), overwrite);
        return;
      case 'binary':
        this.addBinary(bytes, format.address, overwrite);
        return;
      case 'elf':
        this.addElf(bytes, overwrite);
        return;
    }
  }

  /**
   * Add all data of `other` by re-encoding it as S-Records. Its header and start address, when set,
   * replace ours.
   */
  merge(other: MemoryImage, overwrite = false): void {
    this.addSrec(other.asSrec(), overwrite);
  }

  asSrec(numberOfDataBytes = 32, addressLengthBits = 32): string {
    return writeSrec(this, { numberOfDataBytes, addressLengthBits });
  }

  asIhex(numberOfDataBytes = 32, addressLengthBits = 32): string {
    return writeIhex(this, { numberOfDataBytes, addressLengthBits });
  }

  asTiTxt(): string {
    return writeTiTxt(this);
  }

  asVerilogVmem(): string {
    return writeVmem(this);
  }

  asBinary(opts?: WriteBinOptions): Uint8Array {
    return writeBin(this, opts);
  }

  asArray(opts?: WriteArrayOptions): string {
    return writeArray(this, opts);
  }

  asHexdump(): string {
    return writeHexdump(this);
  }

  encode(format: OutputFormat): Artifact {
    return writeArtifact(this, format);
  }

  /**
   * Fill gaps between segments with `value` (one word, default 0xFF bytes).
   *
   * With `maxWords`, only gaps of at most that many words are filled.
   */
  fill(value?: Uint8Array, maxWords?: number): void {
    const word = value ?? new Uint8Array(this.wordSizeBytes).fill(0xff);
    if (word.length !== this.wordSizeBytes) {
      throw new AddressRangeError(
        `fill value must be one word (${this.wordSizeBytes} bytes), but got ${word.length} bytes`,
      );
    }

    const fillers: Segment[] = [];
    let previousMaximum: number | undefined;
    for (const segment of this.segments.segments()) {
      if (previousMaximum !== undefined) {
        const words = Math.floor((segment.minimumAddress - previousMaximum) / this.wordSizeBytes);
        if (maxWords === undefined || words <= maxWords) {
          const data = new Uint8Array(words * this.wordSizeBytes);
          for (let i = 0; i < words; i++) data.set(word, i * this.wordSizeBytes);
          fillers.push(
            new Segment(previousMaximum, previousMaximum + data.length, data, this.wordSizeBytes),
          );
        }
      }
      previousMaximum = segment.maximumAddress;
    }

    for (const filler of fillers) this.segments.add(filler);
  }

  /**
   * Remove `[minimumAddress, maximumAddress)`.
   */
  exclude(minimumAddress: number, maximumAddress: number): void {
    if (maximumAddress < minimumAddress) throw new AddressRangeError('bad address range');
    this.segments.remove(minimumAddress * this.wordSizeBytes, maximumAddress * this.wordSizeBytes);
  }

  /**
   * Keep only `[minimumAddress, maximumAddress)`.
   */
  crop(minimumAddress: number, maximumAddress: number): void {
    if (maximumAddress < minimumAddress) throw new AddressRangeError('bad address range');
    const storedMin = this.segments.minimumAddress;
    const storedMax = this.segments.maximumAddress;
    if (storedMin === undefined || storedMax === undefined) return;
    this.segments.remove(Math.min(storedMin, 0), minimumAddress * this.wordSizeBytes);
    this.segments.remove(maximumAddress * this.wordSizeBytes, storedMax);
  }

  /**
   * The word at `address` as an unsigned big-endian number.
   *
   * Gaps between segments read as padding (all ones); `undefined` outside the stored range.
   */
  wordAt(address: number): number | undefined {
    const min = this.minimumAddress;
    const max = this.maximumAddress;
    if (min === undefined || max === undefined || address < min || address >= max) {
      return undefined;
    }
    const bytes = this.slice(address, address + 1);
    let value = 0;
    for (const b of bytes) value = value * 0x100 + b;
    return value;
  }

  /**
   * Bytes of the word range `[minimumAddress, maximumAddress)` with 0xFF in gaps; both ends default
   * to the stored range.
   */
  slice(minimumAddress?: number, maximumAddress?: number): Uint8Array {
    return writeBin(this, { minimumAddress, maximumAddress });
  }

  /**
   * Overwrite the word at `address` with `value`.
   */
  setWord(address: number, value: number): void {
    this.addBinary(this.wordBytes(value), address, true);
  }

  /**
   * `value` as the big-endian bytes of one word; throws when it does not fit.
   */
  wordBytes(value: number): Uint8Array {
    if (!Number.isInteger(value) || value < 0 || value >= 2 ** this.wordSizeBits) {
      throw new AddressRangeError(`word value ${value} does not fit in ${this.wordSizeBits} bits`);
    }
    return uintToBytes(value, this.wordSizeBytes);
  }

  info(): string {
    return writeInfo(this);
  }

  toString(): string {
    return this.segments.toString();
  }
}
