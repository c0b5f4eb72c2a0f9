/**
 * @icsjson/ics -- Logical line reader.
 *
 * Turns raw bytes into unfolded KEY:VALUE records, one per call.
 * A physical line that starts with a single space continues the previous
 * one; the space is dropped and the rest appended. Tab is not a
 * continuation marker here.
 *
 * Lines are joined as bytes and decoded afterwards, so a multi-byte UTF-8
 * character split across a fold comes back whole.
 */

import { CR, DEFAULT_MAX_LINE_LENGTH, FOLD_MARKER, LF } from "./constants";
import { IcsLineFormatError, IcsStructureError } from "./errors";
import type { LogicalLine } from "./types";

const utf8 = new TextDecoder("utf-8");

export class LineReader {
  private readonly bytes: Uint8Array;
  private readonly maxLineLength: number;
  /** Offset of the next unread byte. */
  private pos = 0;
  /** Number of physical lines consumed so far. */
  private physicalLines = 0;

  constructor(bytes: Uint8Array, maxLineLength: number = DEFAULT_MAX_LINE_LENGTH) {
    if (!Number.isInteger(maxLineLength) || maxLineLength < 1) {
      throw new RangeError(`maxLineLength must be a positive integer, got ${maxLineLength}`);
    }
    this.bytes = bytes;
    this.maxLineLength = maxLineLength;
  }

  /** True once every byte has been consumed. */
  get done(): boolean {
    return this.pos >= this.bytes.length;
  }

  /**
   * Read the next logical line.
   *
   * @throws IcsStructureError at end of input
   * @throws IcsLineFormatError for blank, overlong or colon-less lines
   */
  readLine(): LogicalLine {
    if (this.done) {
      throw new IcsStructureError("unexpected end of input", this.physicalLines || undefined);
    }

    const startLine = this.physicalLines + 1;
    const parts: Uint8Array[] = [];
    let length = 0;

    for (;;) {
      let physical = this.readPhysicalLine();
      if (physical.length === 0) {
        throw new IcsLineFormatError("unexpected blank line", this.physicalLines);
      }
      if (physical[0] === FOLD_MARKER) {
        physical = physical.subarray(1);
      }
      parts.push(physical);
      length += physical.length;

      if (this.done || this.bytes[this.pos] !== FOLD_MARKER) {
        break;
      }
    }

    const text = utf8.decode(concat(parts, length));
    const colonIdx = text.indexOf(":");
    if (colonIdx === -1) {
      throw new IcsLineFormatError("malformed line, expected KEY:VALUE", startLine);
    }

    return {
      key: text.substring(0, colonIdx),
      value: text.substring(colonIdx + 1),
      line: startLine,
    };
  }

  /**
   * Consume one physical line and return it without its terminator.
   * Only called when at least one byte remains.
   */
  private readPhysicalLine(): Uint8Array {
    const start = this.pos;
    const lfIdx = this.bytes.indexOf(LF, start);
    const end = lfIdx === -1 ? this.bytes.length : lfIdx;

    this.physicalLines++;
    if (end - start > this.maxLineLength) {
      throw new IcsLineFormatError("unexpected long line", this.physicalLines);
    }

    this.pos = lfIdx === -1 ? end : lfIdx + 1;

    // CR is only part of the terminator when a LF follows it.
    const contentEnd = lfIdx !== -1 && end > start && this.bytes[end - 1] === CR ? end - 1 : end;
    return this.bytes.subarray(start, contentEnd);
  }
}

function concat(parts: readonly Uint8Array[], length: number): Uint8Array {
  if (parts.length === 1) return parts[0];
  const out = new Uint8Array(length);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}
