import { ParseError } from '../errors.js';
import { Segment } from '../memory/segment.js';
import { concatBytes, hexToBytes, isHex } from '../records/hex.js';
import type { ImageState } from './types.js';

const COMMENT_RE = /\/\/[^\n]*|\/\*[\s\S]*?\*\/|'(?:\\.|[^\\'])*'|"(?:\\.|[^\\"])*"/g;

/**
 * Replace `//` and `/* *\/` comments by a space. String and character literals are kept as is, so
 * comment markers inside them survive.
 */
export function stripComments(text: string): string {
  return text.replace(COMMENT_RE, (match) => (match.startsWith('/') ? ' ' : match));
}

/**
 * Whitespace-separated tokens of a VMEM text after comment removal.
 */
export function vmemTokens(text: string): string[] {
  const stripped = stripComments(text).trim();
  return stripped.length === 0 ? [] : stripped.split(/\s+/);
}

/**
 * Byte width shared by every data word, or `undefined` when there are no data words.
 */
function detectWordWidth(tokens: string[]): number | undefined {
  let width: number | undefined;
  for (const token of tokens) {
    if (token.startsWith('@')) continue;
    if (token.length % 2 !== 0) throw new ParseError('Invalid word length.');
    const length = token.length / 2;
    if (width === undefined) {
      width = length;
    } else if (length !== width) {
      throw new ParseError(`Mixed word lengths ${length} and ${width}.`);
    }
  }
  return width;
}

/**
 * Add Verilog `$readmemh` data to `image`.
 *
 * `@ADDR` markers count words of the detected width; data words are stored big-endian.
 */
export function readVmem(image: ImageState, text: string, overwrite = false): void {
  const tokens = vmemTokens(text);
  const width = detectWordWidth(tokens) ?? 1;
  let address: number | undefined;
  let chunk: Uint8Array = new Uint8Array(0);

  const flush = (): void => {
    if (address === undefined || chunk.length === 0) return;
    image.segments.add(
      new Segment(address, address + chunk.length, chunk, image.wordSizeBytes),
      overwrite,
    );
  };

  for (const token of tokens) {
    if (token.startsWith('@')) {
      const hex = token.slice(1);
      if (hex.length === 0 || !isHex(hex)) throw new ParseError(`bad address '${token}'`);
      flush();
      address = parseInt(hex, 16) * width;
      chunk = new Uint8Array(0);
    } else {
      if (!isHex(token)) throw new ParseError(`bad data word '${token}'`);
      if (address === undefined) address = 0;
      chunk = concatBytes(chunk, hexToBytes(token));
    }
  }
  flush();
}
