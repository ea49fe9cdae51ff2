import { describe, it, expect } from 'vitest';
import { ByteCursor } from '../src/index';

describe('ByteCursor — fixed-width reads', () => {
  it('reads little-endian fields in sequence and advances by each width', () => {
    const cursor = new ByteCursor(Uint8Array.from([1, 2, 3, 4, 5, 6, 7, 8, 9]));

    expect(cursor.readU8()).toBe(1);
    expect(cursor.offset).toBe(1);
    expect(cursor.readU16()).toBe(0x0302);
    expect(cursor.offset).toBe(3);
    expect(cursor.readU32()).toBe(0x07060504);
    expect(cursor.offset).toBe(7);
    expect(cursor.remaining).toBe(2);
  });

  it('returns null and leaves the offset alone on short input', () => {
    const cursor = new ByteCursor(Uint8Array.from([1, 2, 3, 4, 5, 6, 7, 8, 9]));
    cursor.skip(7);

    expect(cursor.readU64()).toBeNull();
    expect(cursor.offset).toBe(7);
    expect(cursor.readU32()).toBeNull();
    expect(cursor.offset).toBe(7);
    expect(cursor.readU16()).toBe(0x0908);
    expect(cursor.readU8()).toBeNull();
    expect(cursor.offset).toBe(9);
  });

  it('reads signed 32-bit and unsigned 64-bit values', () => {
    const cursor = new ByteCursor(new Uint8Array(12).fill(0xff));
    expect(cursor.readI32()).toBe(-1);
    expect(cursor.readU64()).toBe(18446744073709551615n);
    expect(cursor.remaining).toBe(0);
  });

  it('honours big-endian byte order when configured', () => {
    const cursor = new ByteCursor(Uint8Array.from([0x12, 0x34]), { littleEndian: false });
    expect(cursor.littleEndian).toBe(false);
    expect(cursor.readU16()).toBe(0x1234);
  });

  it('respects the byteOffset of a subarray', () => {
    const cursor = new ByteCursor(Uint8Array.from([9, 9, 1, 0]).subarray(2));
    expect(cursor.length).toBe(2);
    expect(cursor.readU16()).toBe(1);
  });
});

describe('ByteCursor — readBytes', () => {
  it('returns a copy that does not alias the source buffer', () => {
    const source = Uint8Array.from([10, 20, 30]);
    const cursor = new ByteCursor(source);
    const out    = cursor.readBytes(2);
    source[0] = 99;
    expect(out).toEqual(Uint8Array.from([10, 20]));
    expect(cursor.offset).toBe(2);
  });

  it('returns null without moving when too few bytes remain', () => {
    const cursor = new ByteCursor(Uint8Array.from([10, 20, 30]));
    expect(cursor.readBytes(4)).toBeNull();
    expect(cursor.offset).toBe(0);
  });
});

describe('ByteCursor — positioning', () => {
  it('skip() refuses to pass the end of the buffer', () => {
    const cursor = new ByteCursor(new Uint8Array(4));
    expect(cursor.skip(5)).toBe(false);
    expect(cursor.offset).toBe(0);
    expect(cursor.skip(4)).toBe(true);
    expect(cursor.offset).toBe(4);
  });

  it('seek() only moves forward', () => {
    const cursor = new ByteCursor(new Uint8Array(8));
    cursor.seek(5);
    expect(cursor.offset).toBe(5);
    expect(() => cursor.seek(4)).toThrow(RangeError);
    expect(() => cursor.seek(9)).toThrow(RangeError);
    expect(cursor.offset).toBe(5);
  });

  it('fork() is independent of its parent', () => {
    const cursor = new ByteCursor(Uint8Array.from([1, 2, 3, 4]));
    cursor.skip(1);
    const fork = cursor.fork();
    expect(fork.readU16()).toBe(0x0302);
    expect(fork.offset).toBe(3);
    expect(cursor.offset).toBe(1);

    const back = cursor.fork(0);
    expect(back.readU8()).toBe(1);
  });

  it('rejects a starting offset outside the buffer', () => {
    expect(() => new ByteCursor(new Uint8Array(2), {}, 3)).toThrow(RangeError);
    expect(() => new ByteCursor(new Uint8Array(2), {}, -1)).toThrow(RangeError);
    expect(new ByteCursor(new Uint8Array(2), {}, 2).remaining).toBe(0);
  });
});
