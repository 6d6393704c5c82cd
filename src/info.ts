import type { MemoryImage } from './image.js';

function hex32(value: number): string {
  return `0x${value.toString(16).padStart(8, '0')}`;
}

/**
 * `1 byte`, `1023 bytes`, `1.5 KiB`, `2 MiB`.
 */
export function formatSize(bytes: number): string {
  if (bytes === 1) return '1 byte';
  if (bytes < 1024) return `${bytes} bytes`;
  const units = ['KiB', 'MiB', 'GiB'] as const;
  let value = bytes;
  let unit: string = units[0];
  for (const u of units) {
    value /= 1024;
    unit = u;
    if (value < 1024) break;
  }
  return `${Number(value.toFixed(2))} ${unit}`;
}

/**
 * Human-readable summary of `image`: header, execution start address, word size and data ranges.
 *
 * Ranges are in words; sizes are in bytes.
 */
export function writeInfo(image: MemoryImage): string {
  let info = '';
  const header = image.headerText;
  if (header !== undefined) {
    info += `Header:                  "${header}"\n`;
  }
  if (image.executionStartAddress !== undefined) {
    info += `Execution start address: ${hex32(image.executionStartAddress)}\n`;
  }
  if (image.wordSizeBits !== 8) {
    info += `Word size:               ${image.wordSizeBits} bits\n`;
  }

  info += 'Data ranges:\n\n';
  for (const segment of image.segments.segments()) {
    const min = Math.floor(segment.minimumAddress / image.wordSizeBytes);
    const max = Math.floor(segment.maximumAddress / image.wordSizeBytes);
    info += `    ${hex32(min)} - ${hex32(max)} (${formatSize(segment.size)})\n`;
  }
  return info;
}
