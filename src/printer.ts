/**
 * fdr-records — one-line text rendering of records (dump format).
 */

import type { FunctionRecordType, TraceRecord } from './types';

// Stateless when not streaming; shared across calls.
const utf8Decoder = new TextDecoder();

const FUNCTION_LABELS: Readonly<Record<FunctionRecordType, string>> = {
  'enter':     'Function Enter',
  'enter-arg': 'Function Enter With Arg',
  'exit':      'Function Exit',
  'tail-exit': 'Function Tail Exit',
};

export function formatRecord(record: TraceRecord): string {
  switch (record.kind) {
    case 'buffer-extents':
      return `<Buffer: size = ${record.size} bytes>`;
    case 'wallclock':
      return `<Wall Time: seconds = ${record.seconds}.${String(record.nanos).padStart(6, '0')}>`;
    case 'new-cpu-id':
      return `<CPU: id = ${record.cpuId}, tsc = ${record.tsc}>`;
    case 'tsc-wrap':
      return `<TSC Wrap: base = ${record.baseTsc}>`;
    case 'custom-event':
      return `<Custom Event: tsc = ${record.tsc}, cpu = ${record.cpu ?? 'n/a'}, ` +
        `size = ${record.size}, data = '${utf8Decoder.decode(record.data)}'>`;
    case 'custom-event-v5':
      return `<Custom Event: delta = +${record.delta}, size = ${record.size}, ` +
        `data = '${utf8Decoder.decode(record.data)}'>`;
    case 'typed-event':
      return `<Typed Event: delta = +${record.delta}, type = ${record.eventType}, ` +
        `size = ${record.size}, data = '${utf8Decoder.decode(record.data)}'>`;
    case 'call-argument':
      return `<Call Argument: data = ${record.arg} (hex = ${record.arg.toString(16)})>`;
    case 'pid':
      return `<PID: ${record.pid}>`;
    case 'new-buffer':
      return `<Thread ID: ${record.tid}>`;
    case 'end-of-buffer':
      return '<End of Buffer>';
    case 'function':
      return `<${FUNCTION_LABELS[record.recordType]}: #${record.funcId} delta = +${record.delta}>`;
  }
}

/** Render every record, one per line. */
export function formatRecords(records: Iterable<TraceRecord>): string {
  const lines: string[] = [];
  for (const record of records) lines.push(formatRecord(record));
  return lines.join('\n');
}
