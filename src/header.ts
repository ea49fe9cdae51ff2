/**
 * fdr-records — file header reading and validation
 *
 * readFileHeader()     — decode the 32-byte header at the cursor.
 * assertFdrHeader()    — reject headers this package cannot decode records
 *                        for (wrong log type, unknown version).
 *
 * The header is decoded once per file and handed to RecordProducer as an
 * immutable value; nothing downstream re-reads it.
 */

import {
  FDR_LOG,
  FILE_HEADER_FREE_FORM,
  FILE_HEADER_SIZE,
  MAX_SUPPORTED_VERSION,
  MIN_SUPPORTED_VERSION,
} from './constants';
import type { ByteCursor } from './cursor';
import { TraceDecodeError } from './errors';
import type { XRayFileHeader } from './types';

const BIT_CONSTANT_TSC = 0b01;
const BIT_NONSTOP_TSC  = 0b10;

// ─── readFileHeader ───────────────────────────────────────────────────────────

/**
 * Read the file header at the cursor and advance past it.
 *
 * Throws TraceDecodeError (TruncatedInput) when fewer than 32 bytes remain;
 * the cursor does not move in that case.
 */
export function readFileHeader(cursor: ByteCursor): XRayFileHeader {
  const start = cursor.offset;
  const body  = cursor.fork();

  const version        = body.readU16();
  const type           = body.readU16();
  const bitfield       = body.readU32();
  const cycleFrequency = body.readU64();
  const freeFormData   = body.readBytes(FILE_HEADER_FREE_FORM);

  if (
    version === null || type === null || bitfield === null ||
    cycleFrequency === null || freeFormData === null
  ) {
    throw new TraceDecodeError(
      'TruncatedInput',
      `File header at offset ${start} needs ${FILE_HEADER_SIZE} bytes; ` +
      `${cursor.remaining} remain.`,
      { offset: start },
    );
  }

  cursor.seek(body.offset);

  return Object.freeze({
    version,
    type,
    constantTsc: (bitfield & BIT_CONSTANT_TSC) !== 0,
    nonstopTsc:  (bitfield & BIT_NONSTOP_TSC) !== 0,
    cycleFrequency,
    freeFormData,
  });
}

// ─── assertFdrHeader ──────────────────────────────────────────────────────────

/**
 * Throws TraceDecodeError on:
 *   - MalformedField        type is not the FDR log type
 *   - UnsupportedInVersion  version outside the range this package decodes
 */
export function assertFdrHeader(header: XRayFileHeader): void {
  if (header.type !== FDR_LOG) {
    throw new TraceDecodeError(
      'MalformedField',
      `Unsupported log type ${header.type}; expected FDR mode logs (type ${FDR_LOG}).`,
      { offset: 2, version: header.version },
    );
  }

  if (header.version < MIN_SUPPORTED_VERSION || header.version > MAX_SUPPORTED_VERSION) {
    throw new TraceDecodeError(
      'UnsupportedInVersion',
      `Unsupported FDR log version ${header.version}; ` +
      `supported versions are ${MIN_SUPPORTED_VERSION} to ${MAX_SUPPORTED_VERSION}.`,
      { offset: 0, version: header.version },
    );
  }
}
