/**
 * @icsjson/ics -- Domain types for decoded iCalendar data.
 *
 * Only the VCALENDAR envelope and its VEVENT children are modelled.
 * Everything else in a feed is skipped by the decoder.
 */

// ---------------------------------------------------------------------------
// Decoded calendar
// ---------------------------------------------------------------------------

/**
 * One VEVENT block.
 *
 * Text fields are stored exactly as they appear after unfolding (no
 * RFC 5545 text unescaping). `start` and `end` are null when the block
 * had no DTSTART/DTEND line.
 */
export interface IcsEvent {
  readonly uid: string;
  readonly start: Date | null;
  readonly end: Date | null;
  readonly summary: string;
  readonly location: string;
  readonly description: string;
}

/** A decoded VCALENDAR block. Events are ordered by start time. */
export interface Calendar {
  readonly events: readonly IcsEvent[];
}

// ---------------------------------------------------------------------------
// Reader / decoder plumbing
// ---------------------------------------------------------------------------

/** One unfolded KEY:VALUE record. */
export interface LogicalLine {
  readonly key: string;
  readonly value: string;
  /** 1-based physical line number where the record starts. */
  readonly line: number;
}

/** Options accepted by decode() and decodeStream(). */
export interface DecodeOptions {
  /**
   * Longest physical line accepted, in bytes, excluding the line feed.
   * Defaults to DEFAULT_MAX_LINE_LENGTH.
   */
  readonly maxLineLength?: number;
}

/** Anything that yields raw input chunks: Node readables, async generators. */
export type ByteSource = AsyncIterable<Uint8Array | string>;
