/**
 * fdr-records — metadata kind resolution
 *
 * Maps (format version, 7-bit kind code) to the record variant to decode.
 * This is the only place where the format version decides which record
 * shape a kind code denotes; decoders never re-check it.
 *
 * Pure: no cursor access. Failures throw TraceDecodeError with the raw code,
 * and the caller adds the stream offset.
 */

import {
  CUSTOM_EVENT_CPU_VERSION,
  CUSTOM_EVENT_V5_VERSION,
  END_OF_BUFFER_RETIRED_VERSION,
  MetadataKindCode,
} from './constants';
import { TraceDecodeError } from './errors';
import type { MetadataRecordKind } from './types';

// Fixed 1:1 mappings. CustomEventMarker and EndOfBuffer are version-gated and
// handled before this table is consulted.
const FIXED_KINDS: Readonly<Record<number, MetadataRecordKind>> = {
  [MetadataKindCode.NewBuffer]:        'new-buffer',
  [MetadataKindCode.EndOfBuffer]:      'end-of-buffer',
  [MetadataKindCode.NewCPUId]:         'new-cpu-id',
  [MetadataKindCode.TSCWrap]:          'tsc-wrap',
  [MetadataKindCode.WallclockMarker]:  'wallclock',
  [MetadataKindCode.CallArgument]:     'call-argument',
  [MetadataKindCode.BufferExtents]:    'buffer-extents',
  [MetadataKindCode.TypedEventMarker]: 'typed-event',
  [MetadataKindCode.ProcessId]:        'pid',
};

/**
 * Resolve a metadata kind code.
 *
 * Throws:
 *   InvalidMetadataKind   code >= the end marker (10)
 *   UnsupportedInVersion  EndOfBuffer in a version 2+ log
 */
export function resolveMetadataKind(version: number, code: number): MetadataRecordKind {
  if (code >= MetadataKindCode.EndMarker) {
    throw new TraceDecodeError(
      'InvalidMetadataKind',
      `Invalid metadata record type: ${code}`,
      { kind: code, version },
    );
  }

  if (code === MetadataKindCode.EndOfBuffer && version >= END_OF_BUFFER_RETIRED_VERSION) {
    throw new TraceDecodeError(
      'UnsupportedInVersion',
      `End of buffer records are no longer supported starting version ` +
      `${END_OF_BUFFER_RETIRED_VERSION} of the log (log version ${version}).`,
      { kind: code, version },
    );
  }

  if (code === MetadataKindCode.CustomEventMarker) {
    return version >= CUSTOM_EVENT_V5_VERSION ? 'custom-event-v5' : 'custom-event';
  }

  const kind = FIXED_KINDS[code];
  if (kind === undefined) {
    // Negative or fractional codes cannot come out of a tag byte.
    throw new TraceDecodeError(
      'InternalInvariantViolation',
      `Unhandled metadata record type: ${code}`,
      { kind: code, version },
    );
  }
  return kind;
}

/** Legacy custom events carry a CPU id after the TSC from version 4 on. */
export function customEventHasCpu(version: number): boolean {
  return version >= CUSTOM_EVENT_CPU_VERSION;
}
