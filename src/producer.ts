/**
 * fdr-records — RecordProducer
 *
 * Turns the bytes under a cursor into one record per produce() call.
 *
 *   AwaitingTag ──tag bit 0 = 1──▶ DecodingMetadata ─┐
 *        │                                           ├──▶ Done   (record)
 *        └────tag bit 0 = 0──▶ DecodingFunction ─────┘    Failed (throws)
 *
 * The tag byte is consumed before anything is validated, so after a failed
 * call the cursor sits immediately after the tag (or, when no tag byte was
 * available, exactly where it started). Field decoding runs on a fork of the
 * cursor and is only committed when the whole record decoded.
 *
 * Usage:
 *
 *   const producer = new RecordProducer(header, new ByteCursor(bytes, {}, FILE_HEADER_SIZE));
 *   while (producer.hasMore) {
 *     const record = producer.produce();
 *     …
 *   }
 */

import { TAG_METADATA_BIT } from './constants';
import type { ByteCursor } from './cursor';
import { decodeRecord } from './decoder';
import { TraceDecodeError } from './errors';
import { resolveMetadataKind } from './resolver';
import type { RecordKind, TraceRecord, XRayFileHeader } from './types';

export class RecordProducer {
  constructor(
    private readonly _header: Pick<XRayFileHeader, 'version'>,
    private readonly _cursor: ByteCursor,
  ) {}

  get version(): number {
    return this._header.version;
  }

  /** Offset of the next tag byte. */
  get offset(): number {
    return this._cursor.offset;
  }

  get hasMore(): boolean {
    return this._cursor.remaining > 0;
  }

  /**
   * Decode the record starting at the cursor.
   *
   * Throws TraceDecodeError; never returns a partially decoded record.
   * Errors from resolving a metadata kind keep their code and are rethrown
   * with the raw kind and tag offset attached, the original kept as `cause`.
   */
  produce(): TraceRecord {
    const version   = this._header.version;
    const tagOffset = this._cursor.offset;
    const tag       = this._cursor.readU8();
    if (tag === null) {
      throw new TraceDecodeError(
        'TruncatedInput',
        `Failed reading one byte from offset ${tagOffset}.`,
        { offset: tagOffset, version },
      );
    }

    let kind: RecordKind;
    if (tag & TAG_METADATA_BIT) {
      const code = tag >>> 1;
      try {
        kind = resolveMetadataKind(version, code);
      } catch (err) {
        if (!(err instanceof TraceDecodeError)) throw err;
        throw new TraceDecodeError(
          err.code,
          `${err.message}\n` +
          `Encountered an unsupported metadata record (${code}) at offset ${tagOffset}.`,
          { offset: tagOffset, kind: code, version, cause: err },
        );
      }
    } else {
      kind = 'function';
    }

    const body   = this._cursor.fork(tagOffset);
    const record = decodeRecord(kind, body, version);
    this._cursor.seek(body.offset);
    return record;
  }
}
