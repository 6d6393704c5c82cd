import { AddDataError, AddressRangeError } from '../errors.js';
import { bytesToHex } from '../records/hex.js';

/**
 * One `(address, data)` pair produced when walking stored data.
 *
 * `address` is in words; `data` is a read-only view in bytes.
 */
export interface Chunk {
  address: number;
  data: Uint8Array;
}

/**
 * Validate a chunk request and return it in bytes.
 */
export function chunkGeometry(
  size: number,
  alignment: number,
  wordSizeBytes: number,
): { sizeBytes: number; alignmentBytes: number } {
  if (!Number.isInteger(size) || !Number.isInteger(alignment) || size <= 0 || alignment <= 0) {
    throw new AddressRangeError(`bad chunk size ${size} or alignment ${alignment}`);
  }
  if (size % alignment !== 0) {
    throw new AddressRangeError(`size ${size} is not a multiple of alignment ${alignment}`);
  }
  return { sizeBytes: size * wordSizeBytes, alignmentBytes: alignment * wordSizeBytes };
}

/**
 * Split `data`, stored at byte address `minimumAddress`, into chunks of at most `sizeBytes`.
 *
 * When the data does not start on an alignment boundary, the first chunk stops at the next one so
 * that every later chunk starts aligned.
 */
export function* chunkBytes(
  minimumAddress: number,
  data: Uint8Array,
  sizeBytes: number,
  alignmentBytes: number,
  wordSizeBytes: number,
): Generator<Chunk> {
  let offset = 0;
  const misalignment = minimumAddress % alignmentBytes;
  if (misalignment !== 0 && data.length > 0) {
    offset = Math.min(alignmentBytes - misalignment, data.length);
    yield { address: Math.floor(minimumAddress / wordSizeBytes), data: data.subarray(0, offset) };
  }
  for (; offset < data.length; offset += sizeBytes) {
    yield {
      address: Math.floor((minimumAddress + offset) / wordSizeBytes),
      data: data.subarray(offset, offset + sizeBytes),
    };
  }
}

/**
 * A contiguous run of bytes over the half-open byte range `[minimumAddress, maximumAddress)`.
 *
 * Appends grow an over-allocated buffer so that long sequential record streams stay linear.
 */
export class Segment {
  readonly wordSizeBytes: number;
  private min: number;
  private max: number;
  private buffer: Uint8Array;

  constructor(minimumAddress: number, maximumAddress: number, data: Uint8Array, wordSizeBytes = 1) {
    if (data.length !== maximumAddress - minimumAddress) {
      throw new AddDataError(
        `segment range 0x${minimumAddress.toString(16)}..0x${maximumAddress.toString(16)} ` +
          `does not match ${data.length} data bytes`,
      );
    }
    this.min = minimumAddress;
    this.max = maximumAddress;
    this.buffer = data.slice();
    this.wordSizeBytes = wordSizeBytes;
  }

  get minimumAddress(): number {
    return this.min;
  }

  get maximumAddress(): number {
    return this.max;
  }

  /** First word address. */
  get address(): number {
    return Math.floor(this.min / this.wordSizeBytes);
  }

  get size(): number {
    return this.max - this.min;
  }

  get isEmpty(): boolean {
    return this.max === this.min;
  }

  /**
   * View of the stored bytes. Invalidated by the next mutation of this segment.
   */
  get data(): Uint8Array {
    return this.buffer.subarray(0, this.size);
  }

  /**
   * Add `data` covering `[minimumAddress, maximumAddress)` to this segment.
   *
   * The range must touch the segment at either end, or overlap it with `overwrite` set.
   */
  addData(minimumAddress: number, maximumAddress: number, data: Uint8Array, overwrite: boolean): void {
    if (data.length !== maximumAddress - minimumAddress) {
      throw new AddDataError(`data length ${data.length} does not match the added range`);
    }
    if (minimumAddress === this.max) {
      this.append(data);
      this.max = maximumAddress;
    } else if (maximumAddress === this.min) {
      this.prepend(data);
      this.min = minimumAddress;
    } else if (overwrite && minimumAddress < this.max && maximumAddress > this.min) {
      this.splice(minimumAddress, maximumAddress, data);
    } else {
      throw new AddDataError(
        'data added to a segment must be adjacent to or overlapping with the original segment data',
      );
    }
  }

  /**
   * Remove `[minimumAddress, maximumAddress)` clipped to this segment.
   *
   * A range that misses the segment is a no-op. Removing an interior slice keeps the left part here
   * and returns the right part as a new segment.
   */
  removeData(minimumAddress: number, maximumAddress: number): Segment | undefined {
    if (minimumAddress >= maximumAddress) return undefined;
    if (minimumAddress >= this.max || maximumAddress <= this.min) return undefined;

    const lo = Math.max(minimumAddress, this.min);
    const hi = Math.min(maximumAddress, this.max);
    const leftSize = lo - this.min;
    const rightSize = this.max - hi;

    if (leftSize > 0 && rightSize > 0) {
      const right = new Segment(hi, this.max, this.data.subarray(hi - this.min), this.wordSizeBytes);
      this.max = lo;
      return right;
    }
    if (leftSize > 0) {
      this.max = lo;
    } else if (rightSize > 0) {
      this.buffer = this.buffer.slice(hi - this.min, this.size);
      this.min = hi;
    } else {
      this.buffer = new Uint8Array(0);
      this.max = this.min;
    }
    return undefined;
  }

  /**
   * Chunks of at most `size` words; see {@link chunkBytes}.
   */
  chunks(size = 32, alignment = 1): Iterable<Chunk> {
    const { sizeBytes, alignmentBytes } = chunkGeometry(size, alignment, this.wordSizeBytes);
    return {
      [Symbol.iterator]: () =>
        chunkBytes(this.min, this.data, sizeBytes, alignmentBytes, this.wordSizeBytes),
    };
  }

  toString(): string {
    return `[0x${this.min.toString(16)} .. 0x${this.max.toString(16)}]: ${bytesToHex(this.data)}`;
  }

  private append(bytes: Uint8Array): void {
    const size = this.size;
    const needed = size + bytes.length;
    if (needed > this.buffer.length) {
      const grown = new Uint8Array(Math.max(needed, this.buffer.length * 2));
      grown.set(this.buffer.subarray(0, size), 0);
      this.buffer = grown;
    }
    this.buffer.set(bytes, size);
  }

  private prepend(bytes: Uint8Array): void {
    const grown = new Uint8Array(bytes.length + this.size);
    grown.set(bytes, 0);
    grown.set(this.data, bytes.length);
    this.buffer = grown;
  }

  private splice(minimumAddress: number, maximumAddress: number, data: Uint8Array): void {
    let offset = minimumAddress - this.min;
    let rest = data;

    if (offset < 0) {
      const before = -offset;
      this.prepend(rest.subarray(0, before));
      this.min = minimumAddress;
      rest = rest.subarray(before);
      offset = before;
    }

    const overlap = this.size - offset;
    if (rest.length <= overlap) {
      this.buffer.set(rest, offset);
      return;
    }
    this.buffer.set(rest.subarray(0, overlap), offset);
    this.append(rest.subarray(overlap));
    this.max = maximumAddress;
  }
}
