/**
 * @icsjson/ics -- Constants for the iCalendar decoder.
 */

// ---------------------------------------------------------------------------
// Block markers
// ---------------------------------------------------------------------------

/** Property name that opens a block. */
export const BEGIN = "BEGIN" as const;

/** Property name that closes a block. */
export const END = "END" as const;

/** Outer envelope block name. */
export const VCALENDAR = "VCALENDAR" as const;

/** Event block name. */
export const VEVENT = "VEVENT" as const;

// ---------------------------------------------------------------------------
// Line reader limits
// ---------------------------------------------------------------------------

/**
 * Default longest physical line, in bytes, excluding the line feed.
 * One byte short of a 4 KiB read buffer so that the line and its
 * terminator fit together.
 */
export const DEFAULT_MAX_LINE_LENGTH = 4095;

/** Leading byte that marks a folded continuation line. */
export const FOLD_MARKER = 0x20;

/** Line feed. */
export const LF = 0x0a;

/** Carriage return. */
export const CR = 0x0d;

// ---------------------------------------------------------------------------
// Timestamps
// ---------------------------------------------------------------------------

/** Human-readable layout used in error messages. */
export const TIMESTAMP_LAYOUT = "YYYYMMDDThhmmssZ" as const;
