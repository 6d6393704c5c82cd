import type { Artifact, ImageState, ImageView, OutputFormat, TextFormatKind } from './types.js';
import { readIhex } from './readIhex.js';
import { readSrec } from './readSrec.js';
import { readTiTxt } from './readTiTxt.js';
import { readVmem } from './readVmem.js';
import { writeArray } from './writeArray.js';
import { writeBin } from './writeBin.js';
import { writeHexdump } from './writeHexdump.js';
import { writeIhex } from './writeIhex.js';
import { writeSrec } from './writeSrec.js';
import { writeTiTxt } from './writeTiTxt.js';
import { writeVmem } from './writeVmem.js';

export type TextReader = (image: ImageState, text: string, overwrite?: boolean) => void;

/**
 * Readers of the line-oriented formats, keyed by format.
 */
export const textReaders: Record<TextFormatKind, TextReader> = {
  srec: readSrec,
  ihex: readIhex,
  ti_txt: readTiTxt,
  verilog_vmem: readVmem,
};

/**
 * Serialize `image` in the given output format.
 */
export function writeArtifact(image: ImageView, format: OutputFormat): Artifact {
  switch (format.kind) {
    case 'srec':
      return { kind: 'text', text: writeSrec(image, format) };
    case 'ihex':
      return { kind: 'text', text: writeIhex(image, format) };
    case 'ti_txt':
      return { kind: 'text', text: writeTiTxt(image) };
    case 'verilog_vmem':
      return { kind: 'text', text: writeVmem(image) };
    case 'binary':
      return { kind: 'bytes', bytes: writeBin(image, format) };
    case 'array':
      return { kind: 'text', text: writeArray(image, format) };
    case 'hexdump':
      return { kind: 'text', text: writeHexdump(image) };
  }
}
