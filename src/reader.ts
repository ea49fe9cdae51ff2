/**
 * fdr-records — sequential record reader
 *
 * Drives a RecordProducer over a whole log file: header first, then one
 * record per produce() call until the bytes run out. The first error ends
 * the stream; there is no skipping ahead to find the next valid record.
 */

import { ByteCursor, type ByteCursorOptions } from './cursor';
import { assertFdrHeader, readFileHeader } from './header';
import { RecordProducer } from './producer';
import type { TraceRecord, XRayFileHeader } from './types';

export type ReadRecordsOptions = ByteCursorOptions;

export interface LoadedTrace {
  readonly header:  XRayFileHeader;
  readonly records: readonly TraceRecord[];
}

/** Read and validate the header, returning a producer positioned on the first record. */
export function openTrace(bytes: Uint8Array, options: ReadRecordsOptions = {}): RecordProducer {
  const cursor = new ByteCursor(bytes, options);
  const header = readFileHeader(cursor);
  assertFdrHeader(header);
  return new RecordProducer(header, cursor);
}

/** Lazily yield every record in an FDR log. */
export function* readRecords(
  bytes: Uint8Array,
  options: ReadRecordsOptions = {},
): Generator<TraceRecord, void, undefined> {
  const producer = openTrace(bytes, options);
  while (producer.hasMore) {
    yield producer.produce();
  }
}

/** Decode a whole FDR log eagerly. */
export function loadTrace(bytes: Uint8Array, options: ReadRecordsOptions = {}): LoadedTrace {
  const cursor  = new ByteCursor(bytes, options);
  const header  = readFileHeader(cursor);
  assertFdrHeader(header);

  const producer = new RecordProducer(header, cursor);
  const records: TraceRecord[] = [];
  while (producer.hasMore) {
    records.push(producer.produce());
  }
  return { header, records };
}
