/**
 * fdr-records — type definitions
 *
 * The record model: a closed tagged union with one member per on-wire
 * variant. Each variant owns exactly the fields its layout defines and
 * never refers to another record. Records are readonly once decoded.
 */

// ─── Record kinds ─────────────────────────────────────────────────────────────

export type MetadataRecordKind =
  | 'new-buffer'
  | 'end-of-buffer'
  | 'new-cpu-id'
  | 'tsc-wrap'
  | 'wallclock'
  | 'custom-event'
  | 'custom-event-v5'
  | 'call-argument'
  | 'buffer-extents'
  | 'typed-event'
  | 'pid';

export type RecordKind = MetadataRecordKind | 'function';

export type FunctionRecordType = 'enter' | 'exit' | 'tail-exit' | 'enter-arg';

// ─── Metadata records ─────────────────────────────────────────────────────────

/** Start of a per-thread buffer. */
export interface NewBufferRecord {
  readonly kind: 'new-buffer';
  readonly tid:  number;
}

/** Explicit end of a buffer. Only present in version 1 logs. */
export interface EndOfBufferRecord {
  readonly kind: 'end-of-buffer';
}

export interface NewCPUIdRecord {
  readonly kind:  'new-cpu-id';
  readonly cpuId: number;
  readonly tsc:   bigint;
}

/** The delta-encoded TSC wrapped; following deltas are relative to baseTsc. */
export interface TSCWrapRecord {
  readonly kind:    'tsc-wrap';
  readonly baseTsc: bigint;
}

export interface WallclockRecord {
  readonly kind:    'wallclock';
  readonly seconds: bigint;
  readonly nanos:   number;
}

/**
 * Custom event in the shape used before version 5.
 *
 * cpu is only on the wire from version 4 onwards; it is undefined for
 * older logs rather than zero.
 */
export interface CustomEventRecord {
  readonly kind: 'custom-event';
  readonly size: number;
  readonly tsc:  bigint;
  readonly cpu?: number;
  readonly data: Uint8Array;
}

export interface CustomEventV5Record {
  readonly kind:  'custom-event-v5';
  readonly size:  number;
  readonly delta: number;
  readonly data:  Uint8Array;
}

export interface CallArgumentRecord {
  readonly kind: 'call-argument';
  readonly arg:  bigint;
}

/** Number of bytes of records that follow in the current buffer. */
export interface BufferExtentsRecord {
  readonly kind: 'buffer-extents';
  readonly size: bigint;
}

export interface TypedEventRecord {
  readonly kind:      'typed-event';
  readonly size:      number;
  readonly delta:     number;
  readonly eventType: number;
  readonly data:      Uint8Array;
}

export interface PidRecord {
  readonly kind: 'pid';
  readonly pid:  number;
}

export type MetadataRecord =
  | NewBufferRecord
  | EndOfBufferRecord
  | NewCPUIdRecord
  | TSCWrapRecord
  | WallclockRecord
  | CustomEventRecord
  | CustomEventV5Record
  | CallArgumentRecord
  | BufferExtentsRecord
  | TypedEventRecord
  | PidRecord;

// ─── Function records ─────────────────────────────────────────────────────────

export interface FunctionRecord {
  readonly kind:       'function';
  readonly recordType: FunctionRecordType;
  /** 28-bit function id assigned by the instrumentation map. */
  readonly funcId:     number;
  /** TSC delta from the previous record on this buffer. */
  readonly delta:      number;
}

export type TraceRecord = MetadataRecord | FunctionRecord;

// ─── File header ──────────────────────────────────────────────────────────────

/**
 * The 32-byte header at the start of every log file.
 * Immutable for the whole decoding session.
 */
export interface XRayFileHeader {
  readonly version:        number;
  readonly type:           number;
  readonly constantTsc:    boolean;
  readonly nonstopTsc:     boolean;
  readonly cycleFrequency: bigint;
  readonly freeFormData:   Uint8Array;
}
