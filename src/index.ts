// ─── Types ────────────────────────────────────────────────────────────────────
export type {
  RecordKind,
  MetadataRecordKind,
  FunctionRecordType,
  NewBufferRecord,
  EndOfBufferRecord,
  NewCPUIdRecord,
  TSCWrapRecord,
  WallclockRecord,
  CustomEventRecord,
  CustomEventV5Record,
  CallArgumentRecord,
  BufferExtentsRecord,
  TypedEventRecord,
  PidRecord,
  MetadataRecord,
  FunctionRecord,
  TraceRecord,
  XRayFileHeader,
} from './types';

// ─── Constants ────────────────────────────────────────────────────────────────
export {
  FILE_HEADER_SIZE,
  METADATA_RECORD_SIZE,
  METADATA_BODY_SIZE,
  FUNCTION_RECORD_SIZE,
  TAG_METADATA_BIT,
  MetadataKindCode,
  FunctionRecordCode,
  NAIVE_LOG,
  FDR_LOG,
  END_OF_BUFFER_RETIRED_VERSION,
  CUSTOM_EVENT_CPU_VERSION,
  CUSTOM_EVENT_V5_VERSION,
} from './constants';

// ─── Errors ───────────────────────────────────────────────────────────────────
export { TraceDecodeError, isTraceDecodeError } from './errors';
export type { TraceDecodeErrorCode, TraceDecodeErrorContext } from './errors';

// ─── Cursor ───────────────────────────────────────────────────────────────────
export { ByteCursor } from './cursor';
export type { ByteCursorOptions } from './cursor';

// ─── Decoding ─────────────────────────────────────────────────────────────────
export { resolveMetadataKind, customEventHasCpu } from './resolver';
export { decodeRecord } from './decoder';
export { RecordProducer } from './producer';

// ─── Files ────────────────────────────────────────────────────────────────────
export { readFileHeader, assertFdrHeader } from './header';
export { openTrace, readRecords, loadTrace } from './reader';
export type { ReadRecordsOptions, LoadedTrace } from './reader';

// ─── Printing ─────────────────────────────────────────────────────────────────
export { formatRecord, formatRecords } from './printer';
