// ─── Errors ───────────────────────────────────────────────────────────────────

export type TraceDecodeErrorCode =
  | 'TruncatedInput'
  | 'InvalidMetadataKind'
  | 'UnsupportedInVersion'
  | 'MalformedField'
  | 'InternalInvariantViolation';

export interface TraceDecodeErrorContext {
  /** Byte offset the error refers to. Absent for pure lookups. */
  readonly offset?:  number;
  /** Raw metadata kind code, when the error concerns one. */
  readonly kind?:    number;
  readonly version?: number;
  readonly cause?:   unknown;
}

/**
 * Thrown for every decoding failure. `code` is stable and meant for
 * programmatic checks; the message is for humans.
 */
export class TraceDecodeError extends Error {
  readonly code:     TraceDecodeErrorCode;
  readonly offset:   number | undefined;
  readonly kind:     number | undefined;
  readonly version:  number | undefined;

  constructor(code: TraceDecodeErrorCode, message: string, context: TraceDecodeErrorContext) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.name    = 'TraceDecodeError';
    this.code    = code;
    this.offset  = context.offset;
    this.kind    = context.kind;
    this.version = context.version;
  }
}

export function isTraceDecodeError(err: unknown): err is TraceDecodeError {
  return err instanceof TraceDecodeError;
}
