import { describe, expect, it } from 'vitest';

import { AddressRangeError, ParseError, TiTxtError, UnsupportedFileFormatError } from '../src/errors.js';
import { detectFormat } from '../src/formats/detect.js';
import { MemoryImage } from '../src/image.js';

const bytes = (...values: number[]): Uint8Array => Uint8Array.from(values);

function segmentsOf(image: MemoryImage): Array<[number, number[]]> {
  return [...image.segments].map((c) => [c.address, [...c.data]]);
}

describe('S-Record format', () => {
  it('writes header, data, count and start address', () => {
    const image = new MemoryImage();
    image.setHeader('hdr');
    image.addBinary(bytes(1, 2, 3), 0x1000);
    image.executionStartAddress = 0x1000;

    const srec = image.asSrec();
    expect(srec).toBe(
      ['S0060000686472BB', 'S30800001000010203E1', 'S5030001FB', 'S70500001000EA', ''].join('\n'),
    );
    expect(image.asSrec(32, 16)).toBe(
      ['S0060000686472BB', 'S1061000010203E3', 'S5030001FB', 'S9031000EC', ''].join('\n'),
    );

    const copy = new MemoryImage();
    copy.addSrec(srec);
    expect(copy.headerText).toBe('hdr');
    expect(copy.executionStartAddress).toBe(0x1000);
    expect(segmentsOf(copy)).toEqual([[0x1000, [1, 2, 3]]]);
  });

  it('writes 24-bit records with a start address', () => {
    const image = new MemoryImage();
    image.addBinary(bytes(0));
    image.executionStartAddress = 0x123456;
    expect(image.asSrec(32, 24)).toBe(['S20500000000FA', 'S5030001FB', 'S8041234565F', ''].join('\n'));
  });

  it('addresses records in words', () => {
    const image = new MemoryImage({ wordSizeBits: 16 });
    image.addSrec('S107001001020304DE\n');
    expect(image.minimumAddress).toBe(0x10);
    expect(image.maximumAddress).toBe(0x12);
    expect(image.segments.minimumAddress).toBe(0x20);
    expect(image.asSrec(32, 16)).toBe(['S107001001020304DE', 'S5030001FB', ''].join('\n'));
  });

  it('rejects an unsupported address length', () => {
    const image = new MemoryImage();
    expect(() => image.asSrec(32, 40)).toThrow('expected data record type 1..3, but got 4');
  });

  it('rejects overlapping records unless overwriting', () => {
    const image = new MemoryImage();
    image.addSrec('S1061000010203E3');
    expect(() => image.addSrec('S1061000010203E3')).toThrow('overlaps segment');
    image.addSrec('S1061000010203E3', true);
    expect(segmentsOf(image)).toEqual([[0x1000, [1, 2, 3]]]);
  });
});

describe('TI-TXT format', () => {
  const text = [
    '@0100',
    '01 02 03 04 05 06 07 08 09 0A 0B 0C 0D 0E 0F 10',
    '11 12 13 14',
    '@0200',
    'AA BB',
    'q',
    '',
  ].join('\n');

  it('reads and writes sections', () => {
    const image = new MemoryImage();
    image.addTiTxt(text);
    expect(segmentsOf(image)).toEqual([
      [0x100, Array.from({ length: 20 }, (_, i) => i + 1)],
      [0x200, [0xaa, 0xbb]],
    ]);
    expect(image.asTiTxt()).toBe(text);
  });

  it('writes only the terminator for an empty image', () => {
    expect(new MemoryImage().asTiTxt()).toBe('q\n');
  });

  it.each([
    ['@01G0\n01\nq\n', 'bad section address'],
    ['@0100\n01\nq\n01\n', 'bad file terminator'],
    ['@0100\n0X\nq\n', 'bad data'],
    ['@0100\n01\n02\nq\n', 'missing section address'],
    ['@0100\n' + '01 '.repeat(17).trim() + '\nq\n', 'bad line length'],
    ['01 02\nq\n', 'missing section address'],
    ['@0100\n01 02\n', 'missing file terminator'],
    ['@0100\n\n01 02\nq\n', 'bad line length'],
  ])('rejects %j with "%s"', (input, reason) => {
    const image = new MemoryImage();
    let caught: unknown;
    try {
      image.addTiTxt(input);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(TiTxtError);
    expect(caught).toMatchObject({ reason, message: reason, kind: 'ParseError' });
  });
});

describe('Verilog VMEM format', () => {
  it('reads and writes 32-bit words', () => {
    const text = '@00000000 01020304 05060708\n@00000010 AABBCCDD\n';
    const image = new MemoryImage({ wordSizeBits: 32 });
    image.addVerilogVmem(text);
    expect(segmentsOf(image)).toEqual([
      [0, [1, 2, 3, 4, 5, 6, 7, 8]],
      [0x10, [0xaa, 0xbb, 0xcc, 0xdd]],
    ]);
    expect(image.asVerilogVmem()).toBe(text);
  });

  it('skips comments and starts at address zero', () => {
    const image = new MemoryImage();
    image.addVerilogVmem('/* header */\n01 02 // trailing\n03\n@10 04\n');
    expect(segmentsOf(image)).toEqual([
      [0, [1, 2, 3]],
      [0x10, [4]],
    ]);
  });

  it('writes the header as a comment', () => {
    const image = new MemoryImage();
    image.setHeader('v1');
    image.addBinary(bytes(0xde, 0xad));
    expect(image.asVerilogVmem()).toBe('/* v1 */\n@00000000 DE AD\n');
  });

  it('keeps a header comment closed when it contains the end marker', () => {
    const image = new MemoryImage();
    image.setHeader('a*/b');
    image.addBinary(bytes(0x01, 0x02));
    const text = image.asVerilogVmem();
    expect(text).toBe('/* a\\x2a/b */\n@00000000 01 02\n');
    const copy = new MemoryImage();
    copy.addVerilogVmem(text);
    expect(segmentsOf(copy)).toEqual([[0, [1, 2]]]);
  });

  it('rejects odd and mixed word lengths', () => {
    expect(() => new MemoryImage().addVerilogVmem('@0 010 02')).toThrow('Invalid word length.');
    expect(() => new MemoryImage().addVerilogVmem('@0 01 0203')).toThrow(
      'Mixed word lengths 2 and 1.',
    );
    expect(() => new MemoryImage().addVerilogVmem('@0 0G')).toThrow(ParseError);
  });
});

describe('re-reading written records', () => {
  type Writer = (image: MemoryImage) => string;
  type Reader = (image: MemoryImage, text: string) => void;

  const cases: Array<[string, Writer, Reader]> = [
    ['srec', (image) => image.asSrec(), (image, text) => image.addSrec(text)],
    ['ihex 24', (image) => image.asIhex(32, 24), (image, text) => image.addIhex(text)],
    ['ihex 32', (image) => image.asIhex(32, 32), (image, text) => image.addIhex(text)],
    ['ti_txt', (image) => image.asTiTxt(), (image, text) => image.addTiTxt(text)],
    ['verilog_vmem', (image) => image.asVerilogVmem(), (image, text) => image.addVerilogVmem(text)],
  ];

  const low = Array.from({ length: 40 }, (_, i) => i);
  const high = [0xa1, 0xa2, 0xa3, 0xa4];

  it.each(cases)('restores %s at 8 and 16 bits per word', (_name, write, read) => {
    for (const wordSizeBits of [8, 16]) {
      const image = new MemoryImage({ wordSizeBits });
      // The first segment crosses the 64 KiB word address line.
      image.addBinary(Uint8Array.from(low), 0xfff8);
      image.addBinary(Uint8Array.from(high), 0x20000);
      const copy = new MemoryImage({ wordSizeBits });
      read(copy, write(image));
      expect(segmentsOf(copy)).toEqual([
        [0xfff8, low],
        [0x20000, high],
      ]);
    }
  });
});

describe('binary output', () => {
  function chunksImage(): MemoryImage {
    const image = new MemoryImage();
    image.addBinary(bytes(0x00, 0x00, 0x01, 0x01, 0x02), 0);
    image.addBinary(bytes(0x04, 0x05, 0x05, 0x06, 0x06, 0x07), 9);
    image.addBinary(bytes(0x09), 19);
    image.addBinary(bytes(0x0a), 21);
    return image;
  }

  it('pads gaps between segments', () => {
    expect([...chunksImage().asBinary()]).toEqual([
      0x00, 0x00, 0x01, 0x01, 0x02, 0xff, 0xff, 0xff, 0xff, 0x04, 0x05, 0x05, 0x06, 0x06, 0x07,
      0xff, 0xff, 0xff, 0xff, 0x09, 0xff, 0x0a,
    ]);
  });

  it('honours the window and padding', () => {
    const image = chunksImage();
    expect([...image.asBinary({ minimumAddress: 3, maximumAddress: 10, padding: bytes(0) })]).toEqual([
      0x01, 0x02, 0x00, 0x00, 0x00, 0x00, 0x04,
    ]);
    expect([...image.asBinary({ minimumAddress: 20, maximumAddress: 21 })]).toEqual([0xff]);
    expect([...image.asBinary({ minimumAddress: 22 })]).toEqual([]);
    expect([...image.asBinary({ minimumAddress: 2, maximumAddress: 0 })]).toEqual([]);
    expect(image.asBinary({ maximumAddress: 1024 }).length).toBe(22);
  });

  it('rejects padding that is not one word', () => {
    expect(() => chunksImage().asBinary({ padding: bytes(0, 0) })).toThrow(AddressRangeError);
  });

  it('windows 16-bit words', () => {
    const image = new MemoryImage({ wordSizeBits: 16 });
    image.addBinary(bytes(0x35, 0x30, 0x36, 0x30, 0x37, 0x30), 5);
    image.addBinary(bytes(0x61, 0x30, 0x62, 0x30, 0x63, 0x30), 10);

    expect(image.minimumAddress).toBe(5);
    expect(image.maximumAddress).toBe(13);
    expect(image.length).toBe(6);
    expect([...image.asBinary({ minimumAddress: 14 })]).toEqual([]);
    expect([...image.asBinary({ minimumAddress: 13 })]).toEqual([]);
    expect([...image.asBinary({ minimumAddress: 12 })]).toEqual([0x63, 0x30]);
    expect([...image.asBinary({ minimumAddress: 6, maximumAddress: 11 })]).toEqual([
      0x36, 0x30, 0x37, 0x30, 0xff, 0xff, 0xff, 0xff, 0x61, 0x30,
    ]);
    expect(image.asHexdump()).toBe(
      [
        '00000000                                 35 30 36 30 37 30  |          506070|',
        '00000008              61 30 62 30  63 30                    |    a0b0c0      |',
        '',
      ].join('\n'),
    );
  });

  it('formats a C array', () => {
    const image = new MemoryImage();
    image.addBinary(bytes(1, 2), 0);
    image.addBinary(bytes(3), 3);
    expect(image.asArray()).toBe('0x01, 0x02, 0xff, 0x03');

    const words = new MemoryImage({ wordSizeBits: 16 });
    words.addBinary(bytes(0x01, 0x02, 0xab, 0xcd));
    expect(words.asArray({ separator: ',' })).toBe('0x0102,0xabcd');
  });
});

describe('hexdump output', () => {
  it('collapses gaps of more than one line', () => {
    const image = new MemoryImage();
    image.addBinary(Buffer.from('Hello', 'ascii'), 0x10);
    image.addBinary(bytes(0), 0x40);
    expect(image.asHexdump()).toBe(
      [
        '00000010  48 65 6c 6c 6f                                    |Hello           |',
        '...',
        '00000040  00                                                |.               |',
        '',
      ].join('\n'),
    );
  });

  it('prints a newline for an empty image', () => {
    expect(new MemoryImage().asHexdump()).toBe('\n');
  });
});

describe('detectFormat', () => {
  it.each([
    ['S1061000010203E3\n', 'srec'],
    [':0100000001FE\n:00000001FF\n', 'ihex'],
    ['@0100\n01 02\nq\n', 'ti_txt'],
    ['@00000000 01020304\n', 'verilog_vmem'],
  ])('recognizes %j as %s', (text, format) => {
    expect(detectFormat(text)).toBe(format);
  });

  it('rejects unknown text', () => {
    expect(() => detectFormat('hello world\n')).toThrow(UnsupportedFileFormatError);
    expect(() => detectFormat('')).toThrow('unsupported file format');
  });

  it('adds text in any recognized format', () => {
    const image = new MemoryImage();
    image.add(':0100000001FE\n:00000001FF\n');
    image.add('@0010\n02\nq\n');
    expect(segmentsOf(image)).toEqual([
      [0, [1]],
      [0x10, [2]],
    ]);
  });
});
