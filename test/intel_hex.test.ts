import { describe, expect, it } from 'vitest';

import { MemoryImage } from '../src/image.js';

function segmentsOf(image: MemoryImage): Array<[number, number[]]> {
  return [...image.segments].map((c) => [c.address, [...c.data]]);
}

describe('Intel HEX', () => {
  it('reads and writes I8HEX', () => {
    const image = new MemoryImage();
    image.addIhex(
      [
        ':0100000001FE',
        ':0101000002FC',
        ':01FFFF0003FE',
        ':0400000300000000F9',
        ':00000001FF',
        '',
      ].join('\n'),
    );

    expect(segmentsOf(image)).toEqual([
      [0, [1]],
      [0x100, [2]],
      [0xffff, [3]],
    ]);
    expect(image.asIhex(32, 16)).toBe(
      [':0100000001FE', ':0101000002FC', ':01FFFF0003FE', ':00000001FF', ''].join('\n'),
    );
  });

  it('reads and writes I16HEX with extended segment addresses', () => {
    const image = new MemoryImage();
    image.addIhex(
      [
        ':0100000001FE',
        ':01F00000020D',
        ':01FFFF0003FE',
        ':02000002C0003C',
        ':0110000005EA',
        ':02000002FFFFFE',
        ':0100000006F9',
        ':01FFFF0007FA',
        ':020000021000EC',
        ':0100000004FB',
        ':0400000500000000F7',
        ':00000001FF',
      ].join('\n'),
    );

    expect(segmentsOf(image)).toEqual([
      [0, [1]],
      [0xf000, [2]],
      [0xffff, [3, 4]],
      [16 * 0xc000 + 0x1000, [5]],
      [16 * 0xffff, [6]],
      [17 * 0xffff, [7]],
    ]);
    expect(image.asIhex(32, 24)).toBe(
      [
        ':0100000001FE',
        ':01F00000020D',
        ':02FFFF000304F9',
        ':02000002C0003C',
        ':0110000005EA',
        ':02000002F0000C',
        ':01FFF000060A',
        ':02000002FFFFFE',
        ':01FFFF0007FA',
        ':0400000300000000F9',
        ':00000001FF',
        '',
      ].join('\n'),
    );
  });

  it('reads and writes I32HEX with extended linear addresses', () => {
    const image = new MemoryImage();
    image.addIhex(
      [
        ':0100000001FE',
        ':01FFFF0002FF',
        ':02000004FFFFFC',
        ':0100000004FB',
        ':01FFFF0005FC',
        ':020000040001F9',
        ':0100000003FC',
        ':0400000500000000F7',
        ':00000001FF',
      ].join('\n'),
    );

    expect(image.asIhex()).toBe(
      [
        ':0100000001FE',
        ':02FFFF000203FB',
        ':02000004FFFFFC',
        ':0100000004FB',
        ':01FFFF0005FC',
        ':0400000500000000F7',
        ':00000001FF',
        '',
      ].join('\n'),
    );
    expect(image.minimumAddress).toBe(0);
    expect(image.maximumAddress).toBe(0x100000000);
    expect(image.executionStartAddress).toBe(0);
    expect(image.wordAt(0)).toBe(1);
    expect(image.wordAt(0xffff)).toBe(2);
    expect(image.wordAt(0x10000)).toBe(3);
    expect(image.wordAt(0xffff0000)).toBe(4);
    expect([...image.slice(0xffff0002, 0xffff0004)]).toEqual([0xff, 0xff]);
    expect([...image.slice(0xffffffff, 0x100000000)]).toEqual([5]);
  });

  it('stores the raw start segment address value', () => {
    const image = new MemoryImage();
    image.addIhex(':0400000302030405EB\n:00000001FF\n');
    expect(image.executionStartAddress).toBe(0x02030405);
  });

  it('stops reading at the end of file record', () => {
    const image = new MemoryImage();
    image.addIhex(':0100000001FE\n:00000001FF\n:0100010002FC\n');
    expect(segmentsOf(image)).toEqual([[0, [1]]]);
  });

  it('rejects unknown record types', () => {
    const image = new MemoryImage();
    expect(() => image.addIhex(':00000006FA')).toThrow(
      'expected type 1..5 in record :00000006FA, but got 6',
    );
  });

  it.each([
    [16, 0x10000, 'cannot address more than 64 kB in I8HEX files (16 bits addresses)'],
    [24, 17 * 0xffff + 1, 'cannot address more than 1 MB in I16HEX files (20 bits addresses)'],
    [32, 0x100000000, 'cannot address more than 4 GB in I32HEX files (32 bits addresses)'],
  ])('rejects addresses beyond the %i bit mode', (bits, address, message) => {
    const image = new MemoryImage();
    image.addBinary(Uint8Array.of(0), address);
    expect(() => image.asIhex(32, bits)).toThrow(message);
  });

  it('rejects an unsupported address length', () => {
    const image = new MemoryImage();
    image.addBinary(Uint8Array.of(0));
    expect(() => image.asIhex(32, 8)).toThrow('expected address length 16, 24 or 32, but got 8');
  });

  it('splits data into records of the requested size', () => {
    const image = new MemoryImage();
    image.addBinary(Uint8Array.of(1, 2, 3, 4, 5), 0x10);
    expect(image.asIhex(2, 16)).toBe(
      [':020010000102EB', ':020012000304E5', ':0100140005E6', ':00000001FF', ''].join('\n'),
    );
  });
});
