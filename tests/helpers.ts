/**
 * Byte-level builders for hand-made trace logs. Little-endian throughout.
 */

import { TraceDecodeError } from '../src/index';

const textEncoder = new TextEncoder();

function fixed(size: number, write: (dv: DataView) => void): Uint8Array {
  const out = new Uint8Array(size);
  write(new DataView(out.buffer));
  return out;
}

export const u8  = (...values: number[]): Uint8Array => Uint8Array.from(values);
export const u16 = (v: number): Uint8Array => fixed(2, dv => dv.setUint16(0, v, true));
export const u32 = (v: number): Uint8Array => fixed(4, dv => dv.setUint32(0, v, true));
export const i32 = (v: number): Uint8Array => fixed(4, dv => dv.setInt32(0, v, true));
export const u64 = (v: bigint): Uint8Array => fixed(8, dv => dv.setBigUint64(0, v, true));
export const utf8 = (s: string): Uint8Array => textEncoder.encode(s);

export function concat(...parts: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((n, p) => n + p.length, 0));
  let off = 0;
  for (const p of parts) {
    out.set(p, off);
    off += p.length;
  }
  return out;
}

/** A 16-byte metadata record: tag, body fields, zero padding. */
export function metadataRecord(code: number, ...body: Uint8Array[]): Uint8Array {
  const fields = concat(...body);
  if (fields.length > 15) throw new Error(`metadata body of ${fields.length} bytes does not fit`);
  const out = new Uint8Array(16);
  out[0] = (code << 1) | 1;
  out.set(fields, 1);
  return out;
}

/** An 8-byte function record. */
export function functionRecord(type: number, funcId: number, delta: number): Uint8Array {
  const word = ((funcId << 4) | (type << 1)) >>> 0;
  return concat(u32(word), u32(delta));
}

export interface HeaderFields {
  version:         number;
  type?:           number;
  bitfield?:       number;
  cycleFrequency?: bigint;
  freeForm?:       Uint8Array;
}

export function fileHeader(fields: HeaderFields): Uint8Array {
  return concat(
    u16(fields.version),
    u16(fields.type ?? 1),
    u32(fields.bitfield ?? 0),
    u64(fields.cycleFrequency ?? 0n),
    fields.freeForm ?? new Uint8Array(16),
  );
}

/** Run `fn` and return the TraceDecodeError it throws. */
export function catchDecodeError(fn: () => unknown): TraceDecodeError {
  try {
    fn();
  } catch (err) {
    if (err instanceof TraceDecodeError) return err;
    throw err;
  }
  throw new Error('expected a TraceDecodeError to be thrown');
}
