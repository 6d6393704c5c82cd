import type { ImageView } from './types.js';

const BYTES_PER_LINE = 16;

function formatLine(address: number, data: Array<number | undefined>): string {
  const cells: Array<number | undefined> = [...data];
  while (cells.length < BYTES_PER_LINE) cells.push(undefined);

  const hex = cells.map((b) => (b === undefined ? '  ' : b.toString(16).padStart(2, '0')));
  const text = cells
    .map((b) => {
      if (b === undefined) return ' ';
      return b >= 0x20 && b < 0x7f ? String.fromCharCode(b) : '.';
    })
    .join('');

  const first = hex.slice(0, 8).join(' ');
  const second = hex.slice(8, BYTES_PER_LINE).join(' ');
  return `${address.toString(16).padStart(8, '0')}  ${first}  ${second}  |${text}|`;
}

/**
 * Create a `hexdump -C` style listing of `image`.
 *
 * Line addresses are in words. Bytes missing from a line are blank, and a gap of more than one
 * line is shown as a single `...` line. An empty image gives `"\n"`.
 */
export function writeHexdump(image: ImageView): string {
  const wordSizeBytes = image.wordSizeBytes;
  const storedMin = image.segments.minimumAddress;
  if (storedMin === undefined) return '\n';

  const wordsPerLine = Math.max(1, Math.floor(BYTES_PER_LINE / wordSizeBytes));
  const align = (address: number): number => address - (address % wordsPerLine);

  const lines: string[] = [];
  let lineAddress = align(Math.floor(storedMin / wordSizeBytes));
  let lineData: Array<number | undefined> = [];

  for (const { address, data } of image.segments.chunks(wordsPerLine, wordsPerLine)) {
    const aligned = align(address);
    if (aligned > lineAddress) {
      lines.push(formatLine(lineAddress, lineData));
      if (aligned > lineAddress + wordsPerLine) lines.push('...');
      lineAddress = aligned;
      lineData = [];
    }
    const gap = wordSizeBytes * (address - lineAddress) - lineData.length;
    for (let i = 0; i < gap; i++) lineData.push(undefined);
    for (const b of data) lineData.push(b);
  }

  lines.push(formatLine(lineAddress, lineData));
  return lines.join('\n') + '\n';
}
