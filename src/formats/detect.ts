import { ImageError, UnsupportedFileFormatError } from '../errors.js';
import { recordLines } from '../records/lines.js';
import { unpackIhex } from '../records/ihex.js';
import { unpackSrec } from '../records/srec.js';
import type { TextFormatKind } from './types.js';
import { vmemTokens } from './readVmem.js';

const TI_TXT_LINE_RE = /^(?:@[0-9A-Fa-f]+|q|[0-9A-Fa-f]{2}(?: [0-9A-Fa-f]{2})*)$/;
const VMEM_TOKEN_RE = /^@?[0-9A-Fa-f]+$/;

function firstLineParses(text: string, unpack: (record: string) => unknown): boolean {
  const first = recordLines(text)[0];
  if (first === undefined) return false;
  try {
    unpack(first);
    return true;
  } catch (err) {
    if (err instanceof ImageError) return false;
    throw err;
  }
}

export function isSrec(text: string): boolean {
  return firstLineParses(text, unpackSrec);
}

export function isIhex(text: string): boolean {
  return firstLineParses(text, unpackIhex);
}

export function isTiTxt(text: string): boolean {
  const lines = recordLines(text);
  return lines.includes('q') && lines.every((line) => TI_TXT_LINE_RE.test(line));
}

export function isVerilogVmem(text: string): boolean {
  const tokens = vmemTokens(text);
  return tokens.length > 0 && tokens.every((token) => VMEM_TOKEN_RE.test(token));
}

/**
 * Recognize the text format of `text` from its content.
 *
 * S-Record and Intel HEX are recognized by their first record; TI-TXT and VMEM by their whole
 * grammar.
 */
export function detectFormat(text: string): TextFormatKind {
  if (isSrec(text)) return 'srec';
  if (isIhex(text)) return 'ihex';
  if (isTiTxt(text)) return 'ti_txt';
  if (isVerilogVmem(text)) return 'verilog_vmem';
  throw new UnsupportedFileFormatError();
}
