import { ParseError } from '../errors.js';

export const PT_LOAD = 1;
export const SHT_NOBITS = 8;
export const SHF_ALLOC = 0x2;

export interface ElfProgramHeader {
  type: number;
  offset: number;
  virtualAddress: number;
  physicalAddress: number;
  fileSize: number;
  memorySize: number;
}

export interface ElfSection {
  name: string;
  type: number;
  flags: number;
  address: number;
  offset: number;
  size: number;
  /** File contents; empty for `SHT_NOBITS`. */
  data: Uint8Array;
}

/**
 * The parts of an ELF file that loading needs.
 */
export interface ElfLayout {
  entry: number;
  programHeaders: ElfProgramHeader[];
  sections: ElfSection[];
}

export function isElf(bytes: Uint8Array): boolean {
  return (
    bytes.length >= 4 &&
    bytes[0] === 0x7f &&
    bytes[1] === 0x45 &&
    bytes[2] === 0x4c &&
    bytes[3] === 0x46
  );
}

/**
 * Field reader over an ELF image honouring its class and byte order.
 */
class ElfReader {
  private readonly view: DataView;

  constructor(
    private readonly bytes: Uint8Array,
    readonly is64: boolean,
    private readonly littleEndian: boolean,
  ) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  private check(offset: number, size: number): void {
    if (offset < 0 || offset + size > this.bytes.length) {
      throw new ParseError(`ELF field at offset ${offset} is outside the file`);
    }
  }

  u16(offset: number): number {
    this.check(offset, 2);
    return this.view.getUint16(offset, this.littleEndian);
  }

  u32(offset: number): number {
    this.check(offset, 4);
    return this.view.getUint32(offset, this.littleEndian);
  }

  /** Address-sized field: 4 bytes for ELF32, 8 for ELF64. */
  word(offset: number): number {
    if (!this.is64) return this.u32(offset);
    this.check(offset, 8);
    return Number(this.view.getBigUint64(offset, this.littleEndian));
  }

  slice(offset: number, size: number): Uint8Array {
    this.check(offset, size);
    return this.bytes.slice(offset, offset + size);
  }

  cString(offset: number): string {
    let end = offset;
    while (end < this.bytes.length && this.bytes[end] !== 0) end++;
    return Buffer.from(this.bytes.subarray(offset, end)).toString('latin1');
  }
}

function readProgramHeader(r: ElfReader, base: number): ElfProgramHeader {
  if (r.is64) {
    return {
      type: r.u32(base),
      offset: r.word(base + 8),
      virtualAddress: r.word(base + 16),
      physicalAddress: r.word(base + 24),
      fileSize: r.word(base + 32),
      memorySize: r.word(base + 40),
    };
  }
  return {
    type: r.u32(base),
    offset: r.u32(base + 4),
    virtualAddress: r.u32(base + 8),
    physicalAddress: r.u32(base + 12),
    fileSize: r.u32(base + 16),
    memorySize: r.u32(base + 20),
  };
}

type RawSection = Omit<ElfSection, 'name' | 'data'> & { nameOffset: number };

function readSectionHeader(r: ElfReader, base: number): RawSection {
  if (r.is64) {
    return {
      nameOffset: r.u32(base),
      type: r.u32(base + 4),
      flags: r.word(base + 8),
      address: r.word(base + 16),
      offset: r.word(base + 24),
      size: r.word(base + 32),
    };
  }
  return {
    nameOffset: r.u32(base),
    type: r.u32(base + 4),
    flags: r.u32(base + 8),
    address: r.u32(base + 12),
    offset: r.u32(base + 16),
    size: r.u32(base + 20),
  };
}

/**
 * Read the entry point, program headers and section headers of an ELF32 or ELF64 file of either
 * byte order.
 */
export function parseElf(bytes: Uint8Array): ElfLayout {
  if (!isElf(bytes)) throw new ParseError('not an ELF file (bad magic)');
  const elfClass = bytes[4];
  const elfData = bytes[5];
  if (elfClass !== 1 && elfClass !== 2) throw new ParseError(`bad ELF class ${String(elfClass)}`);
  if (elfData !== 1 && elfData !== 2) throw new ParseError(`bad ELF data encoding ${String(elfData)}`);

  const r = new ElfReader(bytes, elfClass === 2, elfData === 1);
  const entry = r.word(24);
  const phoff = r.is64 ? r.word(32) : r.u32(28);
  const shoff = r.is64 ? r.word(40) : r.u32(32);
  const at = r.is64 ? 54 : 42;
  const phentsize = r.u16(at);
  const phnum = r.u16(at + 2);
  const shentsize = r.u16(at + 4);
  const shnum = r.u16(at + 6);
  const shstrndx = r.u16(at + 8);

  const programHeaders: ElfProgramHeader[] = [];
  for (let i = 0; i < phnum; i++) {
    programHeaders.push(readProgramHeader(r, phoff + i * phentsize));
  }

  const raw: RawSection[] = [];
  for (let i = 0; i < shnum; i++) {
    raw.push(readSectionHeader(r, shoff + i * shentsize));
  }

  const names = raw[shstrndx];
  const sections = raw.map((s): ElfSection => {
    const { nameOffset, ...header } = s;
    return {
      ...header,
      name: names === undefined ? '' : r.cString(names.offset + nameOffset),
      data: s.type === SHT_NOBITS ? new Uint8Array(0) : r.slice(s.offset, s.size),
    };
  });

  return { entry, programHeaders, sections };
}
