/**
 * fdr-records — ByteCursor
 *
 * Sequential reader over an immutable byte buffer with an explicit,
 * forward-only offset. Every fixed-width read is bounded: when fewer bytes
 * remain than the field needs, the read returns null and the offset does not
 * move. Callers treat null as "nothing consumed", never as a value.
 *
 * A cursor belongs to one decoding session. It is not safe to share between
 * concurrent readers; fork() hands out an independent cursor over the same
 * bytes for speculative decoding, and seek() commits its progress back.
 *
 *   const cursor = new ByteCursor(bytes);
 *   const body   = cursor.fork();
 *   const size   = body.readU64();       // bigint | null
 *   if (size !== null) cursor.seek(body.offset);
 */

export interface ByteCursorOptions {
  /** Byte order of multi-byte fields. Defaults to little-endian. */
  readonly littleEndian?: boolean;
}

export class ByteCursor {
  private _offset: number;
  private readonly _view: DataView;
  private readonly _littleEndian: boolean;

  constructor(
    private readonly _bytes: Uint8Array,
    options: ByteCursorOptions = {},
    offset: number = 0,
  ) {
    if (!Number.isInteger(offset) || offset < 0 || offset > _bytes.length) {
      throw new RangeError(
        `Cursor offset ${offset} is outside the buffer [0, ${_bytes.length}].`,
      );
    }
    this._offset       = offset;
    this._view         = new DataView(_bytes.buffer, _bytes.byteOffset, _bytes.byteLength);
    this._littleEndian = options.littleEndian ?? true;
  }

  // ── Position ───────────────────────────────────────────────────────────────

  get offset(): number {
    return this._offset;
  }

  get length(): number {
    return this._bytes.length;
  }

  get remaining(): number {
    return this._bytes.length - this._offset;
  }

  get littleEndian(): boolean {
    return this._littleEndian;
  }

  canRead(byteCount: number): boolean {
    return byteCount >= 0 && this._offset + byteCount <= this._bytes.length;
  }

  /**
   * Advance to `offset`. The offset never moves backwards: a cursor that has
   * handed out a record must not hand it out again.
   */
  seek(offset: number): void {
    if (offset < this._offset || offset > this._bytes.length) {
      throw new RangeError(
        `Cannot seek from ${this._offset} to ${offset}; ` +
        `cursors only move forward within [${this._offset}, ${this._bytes.length}].`,
      );
    }
    this._offset = offset;
  }

  /** Skip `byteCount` bytes. Returns false, without moving, on short input. */
  skip(byteCount: number): boolean {
    if (!this.canRead(byteCount)) return false;
    this._offset += byteCount;
    return true;
  }

  /** Independent cursor over the same bytes, same byte order. */
  fork(offset: number = this._offset): ByteCursor {
    return new ByteCursor(this._bytes, { littleEndian: this._littleEndian }, offset);
  }

  // ── Fixed-width reads ──────────────────────────────────────────────────────

  readU8(): number | null {
    if (!this.canRead(1)) return null;
    const value = this._view.getUint8(this._offset);
    this._offset += 1;
    return value;
  }

  readU16(): number | null {
    if (!this.canRead(2)) return null;
    const value = this._view.getUint16(this._offset, this._littleEndian);
    this._offset += 2;
    return value;
  }

  readU32(): number | null {
    if (!this.canRead(4)) return null;
    const value = this._view.getUint32(this._offset, this._littleEndian);
    this._offset += 4;
    return value;
  }

  readI32(): number | null {
    if (!this.canRead(4)) return null;
    const value = this._view.getInt32(this._offset, this._littleEndian);
    this._offset += 4;
    return value;
  }

  readU64(): bigint | null {
    if (!this.canRead(8)) return null;
    const value = this._view.getBigUint64(this._offset, this._littleEndian);
    this._offset += 8;
    return value;
  }

  /** Copy of the next `byteCount` bytes; the copy does not alias the buffer. */
  readBytes(byteCount: number): Uint8Array | null {
    if (!this.canRead(byteCount)) return null;
    const out = this._bytes.slice(this._offset, this._offset + byteCount);
    this._offset += byteCount;
    return out;
  }
}
