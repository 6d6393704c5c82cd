import { describe, expect, it } from 'vitest';

import { AddDataError, AddressRangeError } from '../src/errors.js';
import { Segment } from '../src/memory/segment.js';

const bytes = (...values: number[]): Uint8Array => Uint8Array.from(values);

function chunkList(segment: Segment, size: number, alignment?: number): Array<[number, number[]]> {
  return [...segment.chunks(size, alignment)].map((c) => [c.address, [...c.data]]);
}

describe('Segment', () => {
  it('appends and prepends adjacent data', () => {
    const s = new Segment(4, 6, bytes(1, 2));
    s.addData(6, 8, bytes(3, 4), false);
    s.addData(2, 4, bytes(9, 9), false);
    expect(s.minimumAddress).toBe(2);
    expect(s.maximumAddress).toBe(8);
    expect([...s.data]).toEqual([9, 9, 1, 2, 3, 4]);
  });

  it('grows over many appends', () => {
    const s = new Segment(0, 1, bytes(0));
    for (let i = 1; i < 1000; i++) s.addData(i, i + 1, bytes(i & 0xff), false);
    expect(s.size).toBe(1000);
    expect(s.data[999]).toBe(999 & 0xff);
  });

  it('rejects overlapping data without overwrite', () => {
    const s = new Segment(0, 4, bytes(1, 2, 3, 4));
    expect(() => s.addData(2, 6, bytes(5, 6, 7, 8), false)).toThrow(AddDataError);
    expect(() => s.addData(10, 11, bytes(5), true)).toThrow(
      'data added to a segment must be adjacent to or overlapping with the original segment data',
    );
  });

  it('overwrites and extends on both sides', () => {
    const s = new Segment(2, 4, bytes(1, 2));
    s.addData(1, 6, bytes(7, 8, 9, 10, 11), true);
    expect(s.minimumAddress).toBe(1);
    expect(s.maximumAddress).toBe(6);
    expect([...s.data]).toEqual([7, 8, 9, 10, 11]);

    s.addData(2, 3, bytes(0), true);
    expect([...s.data]).toEqual([7, 0, 9, 10, 11]);
  });

  it('removes an interior range by splitting', () => {
    const s = new Segment(0, 6, bytes(0, 1, 2, 3, 4, 5));
    const right = s.removeData(2, 4);
    expect([...s.data]).toEqual([0, 1]);
    expect(right?.minimumAddress).toBe(4);
    expect([...(right?.data ?? [])]).toEqual([4, 5]);
  });

  it('clips removal at either end and ignores disjoint ranges', () => {
    const s = new Segment(10, 16, bytes(0, 1, 2, 3, 4, 5));
    expect(s.removeData(0, 5)).toBeUndefined();
    expect(s.removeData(20, 30)).toBeUndefined();
    expect(s.size).toBe(6);

    s.removeData(0, 12);
    expect(s.minimumAddress).toBe(12);
    expect([...s.data]).toEqual([2, 3, 4, 5]);

    s.removeData(15, 100);
    expect([...s.data]).toEqual([2, 3, 4]);

    s.removeData(0, 100);
    expect(s.isEmpty).toBe(true);
  });

  it('chunks with alignment', () => {
    const s = new Segment(2, 7, bytes(0, 1, 2, 3, 4));
    expect(chunkList(s, 4, 4)).toEqual([
      [2, [0, 1]],
      [4, [2, 3, 4]],
    ]);
    expect(() => [...s.chunks(4, 8)]).toThrow('size 4 is not a multiple of alignment 8');
  });

  it('chunks in words', () => {
    const s = new Segment(10, 16, bytes(0x35, 0x30, 0x36, 0x30, 0x37, 0x30), 2);
    expect(s.address).toBe(5);
    expect(chunkList(s, 2)).toEqual([
      [5, [0x35, 0x30, 0x36, 0x30]],
      [7, [0x37, 0x30]],
    ]);
  });

  it('rejects a range that does not match the data', () => {
    expect(() => new Segment(0, 3, bytes(1))).toThrow(AddDataError);
    expect(() => [...new Segment(0, 1, bytes(1)).chunks(0)]).toThrow(AddressRangeError);
  });
});
