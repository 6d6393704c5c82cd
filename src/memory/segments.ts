import { AddDataError } from '../errors.js';
import type { Chunk } from './segment.js';
import { Segment, chunkBytes, chunkGeometry } from './segment.js';

/**
 * Ordered collection of disjoint segments.
 *
 * Invariant: `list[i].maximumAddress < list[i + 1].minimumAddress`. Touching or overlapping data is
 * always merged into one segment.
 */
export class SegmentStore implements Iterable<Chunk> {
  readonly wordSizeBytes: number;
  private list: Segment[] = [];
  /** Index of the segment grown or inserted by the last `add`. */
  private current = 0;

  constructor(wordSizeBytes = 1) {
    this.wordSizeBytes = wordSizeBytes;
  }

  /** Number of segments. */
  get length(): number {
    return this.list.length;
  }

  get(index: number): Segment | undefined {
    return this.list[index];
  }

  /** First stored byte address, or `undefined` when empty. */
  get minimumAddress(): number | undefined {
    return this.list[0]?.minimumAddress;
  }

  /** One past the last stored byte address, or `undefined` when empty. */
  get maximumAddress(): number | undefined {
    return this.list[this.list.length - 1]?.maximumAddress;
  }

  /**
   * Add `segment`, merging it with touching neighbours.
   *
   * Without `overwrite`, data overlapping anything already stored is rejected and the store is left
   * untouched. With `overwrite`, the new bytes win and every neighbour they cover is absorbed.
   */
  add(segment: Segment, overwrite = false): void {
    if (segment.isEmpty) return;
    if (this.list.length === 0) {
      this.list.push(segment);
      this.current = 0;
      return;
    }
    if (!overwrite) this.assertNoOverlap(segment);

    const { minimumAddress, maximumAddress, data } = segment;
    const last = this.list[this.current];
    let index: number;

    if (last !== undefined && minimumAddress === last.maximumAddress) {
      // Sequential records: grow the segment touched last.
      last.addData(minimumAddress, maximumAddress, data, overwrite);
      index = this.current;
    } else {
      index = this.firstReaching(minimumAddress);
      const s = this.list[index];
      if (s === undefined) {
        this.list.push(segment);
      } else if (maximumAddress < s.minimumAddress) {
        this.list.splice(index, 0, segment);
      } else {
        s.addData(minimumAddress, maximumAddress, data, overwrite);
      }
    }

    this.current = index;
    this.mergeForward(index);
  }

  /**
   * Remove `[minimumAddress, maximumAddress)` from every segment it intersects.
   */
  remove(minimumAddress: number, maximumAddress: number): void {
    if (minimumAddress >= maximumAddress) return;
    const next: Segment[] = [];
    for (const segment of this.list) {
      if (segment.maximumAddress <= minimumAddress || maximumAddress <= segment.minimumAddress) {
        next.push(segment);
        continue;
      }
      const split = segment.removeData(minimumAddress, maximumAddress);
      if (!segment.isEmpty) next.push(segment);
      if (split) next.push(split);
    }
    this.list = next;
    this.current = 0;
  }

  /**
   * Chunks of at most `size` words over every segment, in address order.
   *
   * The result can be iterated more than once; each pass walks the segments stored when it starts.
   */
  chunks(size = 32, alignment = 1): Iterable<Chunk> {
    const { sizeBytes, alignmentBytes } = chunkGeometry(size, alignment, this.wordSizeBytes);
    const wordSizeBytes = this.wordSizeBytes;
    const stored = (): Segment[] => [...this.list];
    return {
      *[Symbol.iterator]() {
        for (const segment of stored()) {
          yield* chunkBytes(
            segment.minimumAddress,
            segment.data,
            sizeBytes,
            alignmentBytes,
            wordSizeBytes,
          );
        }
      },
    };
  }

  /**
   * Segments as `(word address, data)` pairs.
   */
  *[Symbol.iterator](): Iterator<Chunk> {
    for (const segment of [...this.list]) {
      yield { address: segment.address, data: segment.data };
    }
  }

  /** Snapshot of the stored segments. */
  segments(): readonly Segment[] {
    return [...this.list];
  }

  toString(): string {
    return this.list.map((s) => s.toString()).join('\n');
  }

  /**
   * Index of the first segment whose end reaches `address`, or `length` when there is none.
   */
  private firstReaching(address: number): number {
    let lo = 0;
    let hi = this.list.length;
    while (lo < hi) {
      const mid = (lo + hi) >> 1;
      const s = this.list[mid];
      if (s !== undefined && s.maximumAddress < address) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo;
  }

  private assertNoOverlap(segment: Segment): void {
    const s = this.list[this.firstReaching(segment.minimumAddress + 1)];
    if (s !== undefined && s.minimumAddress < segment.maximumAddress) {
      throw new AddDataError(
        `data at 0x${segment.minimumAddress.toString(16)}..0x${segment.maximumAddress.toString(16)} ` +
          `overlaps segment 0x${s.minimumAddress.toString(16)}..0x${s.maximumAddress.toString(16)}`,
      );
    }
  }

  /**
   * Absorb the neighbours following `index` that the grown segment now covers or touches.
   */
  private mergeForward(index: number): void {
    const grown = this.list[index];
    if (grown === undefined) return;

    for (let next = this.list[index + 1]; next !== undefined; next = this.list[index + 1]) {
      if (grown.maximumAddress >= next.maximumAddress) {
        this.list.splice(index + 1, 1);
        continue;
      }
      if (grown.maximumAddress >= next.minimumAddress) {
        const tail = next.data.subarray(grown.maximumAddress - next.minimumAddress);
        grown.addData(grown.maximumAddress, next.maximumAddress, tail, false);
        this.list.splice(index + 1, 1);
      }
      break;
    }
  }
}
