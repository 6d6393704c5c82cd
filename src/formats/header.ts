/**
 * How header bytes map to text.
 *
 * `raw` keeps the header as bytes only; `text` decodes and encodes it with a named codec.
 */
export type HeaderEncoding = { kind: 'raw' } | { kind: 'text'; encoding: BufferEncoding };

export const DEFAULT_HEADER_ENCODING: HeaderEncoding = { kind: 'text', encoding: 'utf8' };

/**
 * Parse a codec name. `none` selects raw bytes.
 */
export function parseHeaderEncoding(name: string): HeaderEncoding | undefined {
  if (name === 'none') return { kind: 'raw' };
  const normalized = name.toLowerCase().replace(/_/g, '-');
  const aliases: Record<string, BufferEncoding> = {
    'utf8': 'utf8',
    'utf-8': 'utf8',
    'ascii': 'ascii',
    'latin1': 'latin1',
    'latin-1': 'latin1',
    'iso-8859-1': 'latin1',
    'utf16le': 'utf16le',
    'utf-16le': 'utf16le',
  };
  const encoding = aliases[normalized];
  return encoding === undefined ? undefined : { kind: 'text', encoding };
}

/**
 * Printable ASCII is kept; every other byte becomes `\xNN`.
 */
export function printableHeader(header: Uint8Array): string {
  let out = '';
  for (const b of header) {
    out += b >= 0x20 && b < 0x7f ? String.fromCharCode(b) : `\\x${b.toString(16).padStart(2, '0')}`;
  }
  return out;
}

export function decodeHeader(header: Uint8Array, encoding: HeaderEncoding): string {
  if (encoding.kind === 'raw') return printableHeader(header);
  return Buffer.from(header).toString(encoding.encoding);
}

export function encodeHeader(text: string, encoding: BufferEncoding): Uint8Array {
  return new Uint8Array(Buffer.from(text, encoding));
}
