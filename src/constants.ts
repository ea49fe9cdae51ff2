/**
 * fdr-records — layout constants
 *
 * These constants define the binary contract of an FDR-mode trace log as
 * written by the instrumentation runtime. They are not ours to change: an
 * off-by-one in any width desynchronizes every record that follows.
 *
 *   ── File header (32 bytes, once per file) ───────────────────────────────
 *   [0..1]    version          u16
 *   [2..3]    type             u16  = FDR_LOG
 *   [4..7]    bitfield         u32  bit 0: constant TSC, bit 1: non-stop TSC
 *   [8..15]   cycle_frequency  u64
 *   [16..31]  free-form data   16 bytes
 *
 *   ── Metadata record (16 bytes + optional payload) ──────────────────────
 *   [0]       tag              u8   bit 0 = 1, bits 1..7 = kind code
 *   [1..15]   body             15 bytes, fields from the start, rest padding
 *   [16..]    payload          custom / typed events only
 *
 *   ── Function record (8 bytes) ──────────────────────────────────────────
 *   [0..3]    word             u32  bit 0 = 0, bits 1..3 = type, bits 4..31 = id
 *   [4..7]    tsc_delta        u32
 */

// ─── Record sizes ─────────────────────────────────────────────────────────────

export const FILE_HEADER_SIZE      = 32; // bytes
export const FILE_HEADER_FREE_FORM = 16; // trailing opaque bytes of the header

export const METADATA_RECORD_SIZE = 16;
export const METADATA_BODY_SIZE   = METADATA_RECORD_SIZE - 1; // 15

export const FUNCTION_RECORD_SIZE = 8;

// ─── Tag byte ─────────────────────────────────────────────────────────────────

/** Bit 0 of the tag byte. Set for metadata records, clear for function records. */
export const TAG_METADATA_BIT = 0x01;

// ─── Metadata kind codes ──────────────────────────────────────────────────────

/**
 * Kind codes carried in bits 1..7 of a metadata tag byte.
 * Must stay in sync with the values the runtime writes.
 */
export const MetadataKindCode = {
  NewBuffer:         0,
  EndOfBuffer:       1,
  NewCPUId:          2,
  TSCWrap:           3,
  WallclockMarker:   4,
  CustomEventMarker: 5,
  CallArgument:      6,
  BufferExtents:     7,
  TypedEventMarker:  8,
  ProcessId:         9,
  /** Upper bound of the valid range. Never a valid kind. */
  EndMarker:         10,
} as const;

export type MetadataKindCode = (typeof MetadataKindCode)[keyof typeof MetadataKindCode];

// ─── Function record types ────────────────────────────────────────────────────

/** Values of bits 1..3 of a function record word. 4..7 are not function records. */
export const FunctionRecordCode = {
  Enter:        0,
  Exit:         1,
  TailExit:     2,
  EnterWithArg: 3,
} as const;

export const FUNCTION_TYPE_MASK  = 0x07;
export const FUNCTION_ID_SHIFT   = 4;

// ─── File types ───────────────────────────────────────────────────────────────

export const NAIVE_LOG = 0;
export const FDR_LOG   = 1;

// ─── Version gates ────────────────────────────────────────────────────────────

/**
 * Format version history, as far as record shapes are concerned:
 *   v1 → v2: EndOfBuffer records retired (buffer extents are used instead).
 *   v3 → v4: legacy custom events gain a u16 CPU field after the TSC.
 *   v4 → v5: custom events switch to the delta-encoded v5 shape.
 */
export const END_OF_BUFFER_RETIRED_VERSION = 2;
export const CUSTOM_EVENT_CPU_VERSION      = 4;
export const CUSTOM_EVENT_V5_VERSION       = 5;

export const MIN_SUPPORTED_VERSION = 1;
export const MAX_SUPPORTED_VERSION = 5;
