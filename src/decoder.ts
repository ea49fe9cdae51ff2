/**
 * fdr-records — per-variant record decoding
 *
 * decodeRecord() consumes exactly one record, starting at its tag byte, and
 * returns a freshly built record object. Layouts (all offsets relative to
 * the tag byte):
 *
 *   new-buffer       [1] tid i32
 *   end-of-buffer    (body is padding only)
 *   new-cpu-id       [1] cpu u16   [3] tsc u64
 *   tsc-wrap         [1] base u64
 *   wallclock        [1] seconds u64  [9] nanos u32
 *   custom-event     [1] size i32  [5] tsc u64  [13] cpu u16 (v4+)   + size bytes
 *   custom-event-v5  [1] size i32  [5] delta i32                      + size bytes
 *   call-argument    [1] arg u64
 *   buffer-extents   [1] size u64
 *   typed-event      [1] size i32  [5] delta i32  [9] type u16        + size bytes
 *   pid              [1] pid i32
 *   function         [0] word u32 (type bits 1..3, id bits 4..31)  [4] delta u32
 *
 * Metadata records are always METADATA_RECORD_SIZE bytes before their
 * payload; unread body bytes are padding. Any failure throws and leaves no
 * record behind. The cursor passed in may have been advanced part-way; callers
 * that need all-or-nothing progress decode on a fork (see RecordProducer).
 */

import {
  FUNCTION_ID_SHIFT,
  FUNCTION_RECORD_SIZE,
  FUNCTION_TYPE_MASK,
  FunctionRecordCode,
  METADATA_RECORD_SIZE,
} from './constants';
import type { ByteCursor } from './cursor';
import { TraceDecodeError } from './errors';
import { customEventHasCpu } from './resolver';
import type {
  FunctionRecord,
  FunctionRecordType,
  MetadataRecord,
  MetadataRecordKind,
  RecordKind,
  TraceRecord,
} from './types';

const FUNCTION_RECORD_TYPES: Readonly<Record<number, FunctionRecordType>> = {
  [FunctionRecordCode.Enter]:        'enter',
  [FunctionRecordCode.Exit]:         'exit',
  [FunctionRecordCode.TailExit]:     'tail-exit',
  [FunctionRecordCode.EnterWithArg]: 'enter-arg',
};

// ─── Internal helpers ─────────────────────────────────────────────────────────

function truncated(what: string, offset: number): TraceDecodeError {
  return new TraceDecodeError('TruncatedInput', `Cannot read ${what} at offset ${offset}.`, { offset });
}

/** Unwrap a cursor read, turning "nothing consumed" into TruncatedInput. */
function required<T>(cursor: ByteCursor, what: string, read: (c: ByteCursor) => T | null): T {
  const offset = cursor.offset;
  const value  = read(cursor);
  if (value === null) throw truncated(what, offset);
  return value;
}

function readEventSize(cursor: ByteCursor, what: string): number {
  const offset = cursor.offset;
  const size   = required(cursor, `${what} size`, c => c.readI32());
  if (size <= 0) {
    throw new TraceDecodeError(
      'MalformedField',
      `Invalid size for ${what} (size = ${size}) at offset ${offset}.`,
      { offset },
    );
  }
  return size;
}

function readPayload(cursor: ByteCursor, size: number, what: string): Uint8Array {
  const offset = cursor.offset;
  const data   = cursor.readBytes(size);
  if (data === null) {
    throw new TraceDecodeError(
      'TruncatedInput',
      `Cannot read ${size} bytes of ${what} data from offset ${offset}; ` +
      `${cursor.remaining} remain.`,
      { offset },
    );
  }
  return data;
}

// ─── Metadata records ─────────────────────────────────────────────────────────

function decodeMetadata(kind: MetadataRecordKind, cursor: ByteCursor, version: number): MetadataRecord {
  const start = cursor.offset;
  if (!cursor.canRead(METADATA_RECORD_SIZE)) {
    throw new TraceDecodeError(
      'TruncatedInput',
      `Invalid offset for a ${kind} record (${start}); ` +
      `need ${METADATA_RECORD_SIZE} bytes, ${cursor.remaining} remain.`,
      { offset: start },
    );
  }
  cursor.skip(1); // tag byte, already dispatched on

  // Skip body padding: the next byte is either payload or the next tag.
  const endOfBody = (): void => cursor.seek(start + METADATA_RECORD_SIZE);

  let record: MetadataRecord;

  switch (kind) {
    case 'new-buffer':
      record = { kind, tid: required(cursor, 'new buffer thread id', c => c.readI32()) };
      break;

    case 'end-of-buffer':
      record = { kind };
      break;

    case 'new-cpu-id': {
      const cpuId = required(cursor, 'CPU id', c => c.readU16());
      const tsc   = required(cursor, 'CPU TSC', c => c.readU64());
      record = { kind, cpuId, tsc };
      break;
    }

    case 'tsc-wrap':
      record = { kind, baseTsc: required(cursor, 'TSC wrap base', c => c.readU64()) };
      break;

    case 'wallclock': {
      const seconds = required(cursor, 'wall time seconds', c => c.readU64());
      const nanos   = required(cursor, 'wall time nanoseconds', c => c.readU32());
      record = { kind, seconds, nanos };
      break;
    }

    case 'custom-event': {
      const size = readEventSize(cursor, 'custom event');
      const tsc  = required(cursor, 'custom event TSC', c => c.readU64());
      const cpu  = customEventHasCpu(version)
        ? required(cursor, 'custom event CPU', c => c.readU16())
        : undefined;
      endOfBody();
      return { kind, size, tsc, cpu, data: readPayload(cursor, size, 'custom event') };
    }

    case 'custom-event-v5': {
      const size  = readEventSize(cursor, 'custom event');
      const delta = required(cursor, 'custom event TSC delta', c => c.readI32());
      endOfBody();
      return { kind, size, delta, data: readPayload(cursor, size, 'custom event') };
    }

    case 'call-argument':
      record = { kind, arg: required(cursor, 'call argument', c => c.readU64()) };
      break;

    case 'buffer-extents':
      record = { kind, size: required(cursor, 'buffer extent', c => c.readU64()) };
      break;

    case 'typed-event': {
      const size      = readEventSize(cursor, 'typed event');
      const delta     = required(cursor, 'typed event TSC delta', c => c.readI32());
      const eventType = required(cursor, 'typed event type', c => c.readU16());
      endOfBody();
      return { kind, size, delta, eventType, data: readPayload(cursor, size, 'typed event') };
    }

    case 'pid':
      record = { kind, pid: required(cursor, 'process id', c => c.readI32()) };
      break;

    default: {
      const unhandled: never = kind;
      throw new TraceDecodeError(
        'InternalInvariantViolation',
        `Unhandled metadata record kind: ${String(unhandled)}`,
        { offset: start },
      );
    }
  }

  endOfBody();
  return record;
}

// ─── Function records ─────────────────────────────────────────────────────────

function decodeFunction(cursor: ByteCursor): FunctionRecord {
  const start = cursor.offset;
  if (!cursor.canRead(FUNCTION_RECORD_SIZE)) {
    throw new TraceDecodeError(
      'TruncatedInput',
      `Invalid offset for a function record (${start}); ` +
      `need ${FUNCTION_RECORD_SIZE} bytes, ${cursor.remaining} remain.`,
      { offset: start },
    );
  }

  const word = required(cursor, 'function record', c => c.readU32());

  // Drop the metadata bit, then take three bits of record type.
  const typeCode   = (word >>> 1) & FUNCTION_TYPE_MASK;
  const recordType = FUNCTION_RECORD_TYPES[typeCode];
  if (recordType === undefined) {
    throw new TraceDecodeError(
      'MalformedField',
      `Unknown function record type '${typeCode}' at offset ${start}.`,
      { offset: start },
    );
  }

  const funcId = word >>> FUNCTION_ID_SHIFT;
  const delta  = required(cursor, 'TSC delta', c => c.readU32());
  return { kind: 'function', recordType, funcId, delta };
}

// ─── decodeRecord ─────────────────────────────────────────────────────────────

/**
 * Decode one record of the given kind. `cursor` must sit on the record's tag
 * byte; on success it sits on the first byte of the next record.
 *
 * `version` only matters for the legacy custom-event shape, whose CPU field
 * appeared in version 4.
 */
export function decodeRecord(kind: RecordKind, cursor: ByteCursor, version: number): TraceRecord {
  if (kind === 'function') return decodeFunction(cursor);
  return decodeMetadata(kind, cursor, version);
}
