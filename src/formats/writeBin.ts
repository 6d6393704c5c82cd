import { AddressRangeError } from '../errors.js';
import type { ImageView, WriteBinOptions } from './types.js';

function resolvePadding(padding: Uint8Array | undefined, wordSizeBytes: number): Uint8Array {
  if (padding === undefined) return new Uint8Array(wordSizeBytes).fill(0xff);
  if (padding.length !== wordSizeBytes) {
    throw new AddressRangeError(
      `padding must be one word (${wordSizeBytes} bytes), but got ${padding.length} bytes`,
    );
  }
  return padding;
}

/**
 * Growable byte sink for flattening segments.
 */
class ByteSink {
  private buffer = new Uint8Array(256);
  private size = 0;

  push(bytes: Uint8Array): void {
    const needed = this.size + bytes.length;
    if (needed > this.buffer.length) {
      const grown = new Uint8Array(Math.max(needed, this.buffer.length * 2));
      grown.set(this.buffer.subarray(0, this.size), 0);
      this.buffer = grown;
    }
    this.buffer.set(bytes, this.size);
    this.size = needed;
  }

  pad(word: Uint8Array, words: number): void {
    for (let i = 0; i < words; i++) this.push(word);
  }

  bytes(): Uint8Array {
    return this.buffer.slice(0, this.size);
  }
}

/**
 * Flatten `image` over the word window `[minimumAddress, maximumAddress)`.
 *
 * The window defaults to the stored range. Gaps between segments are filled with `padding`; data
 * outside the window is dropped. A window ending inside a gap is padded up to its end, but nothing
 * is padded after the last segment. An empty or inverted window gives an empty buffer.
 */
export function writeBin(image: ImageView, opts?: WriteBinOptions): Uint8Array {
  const wordSizeBytes = image.wordSizeBytes;
  const storedMin = image.segments.minimumAddress;
  const storedMax = image.segments.maximumAddress;
  if (storedMin === undefined || storedMax === undefined) return new Uint8Array(0);

  let current = opts?.minimumAddress ?? Math.floor(storedMin / wordSizeBytes);
  const maximumAddress = opts?.maximumAddress ?? Math.floor(storedMax / wordSizeBytes);
  if (current >= maximumAddress) return new Uint8Array(0);

  const padding = resolvePadding(opts?.padding, wordSizeBytes);
  const out = new ByteSink();

  for (const chunk of image.segments) {
    let address = chunk.address;
    let data = chunk.data;
    let length = Math.floor(data.length / wordSizeBytes);

    // Drop data below the window.
    if (address < current) {
      if (address + length <= current) continue;
      data = data.subarray((current - address) * wordSizeBytes);
      length = Math.floor(data.length / wordSizeBytes);
      address = current;
    }

    // Drop data above the window.
    if (address + length > maximumAddress) {
      if (address >= maximumAddress) {
        // The window ends inside a gap.
        out.pad(padding, maximumAddress - current);
        break;
      }
      data = data.subarray(0, (maximumAddress - address) * wordSizeBytes);
      length = maximumAddress - address;
    }

    out.pad(padding, address - current);
    out.push(data);
    current = address + length;
  }

  return out.bytes();
}
