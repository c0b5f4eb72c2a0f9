/**
 * @icsjson/ics -- VCALENDAR / VEVENT decoder.
 *
 * Two explicit state machines sit on top of LineReader:
 *
 *   calendar:  start --BEGIN:VCALENDAR--> in-calendar --END:VCALENDAR--> done
 *   event:     in-event --END:VEVENT--> (returned to the calendar)
 *
 * Unknown properties are skipped at both levels. Any error aborts the
 * whole decode; no partial calendar is ever returned.
 */

import { BEGIN, END, VCALENDAR, VEVENT } from "./constants";
import { IcsStructureError } from "./errors";
import { LineReader } from "./line-reader";
import { sortEvents } from "./order";
import { parseTimestamp } from "./timestamp";
import type { ByteSource, Calendar, DecodeOptions, IcsEvent, LogicalLine } from "./types";

// ---------------------------------------------------------------------------
// Calendar level
// ---------------------------------------------------------------------------

/** Calendar-level decoder state. */
export type CalendarState = "start" | "in-calendar" | "done";

/**
 * Decode a complete iCalendar document.
 *
 * @param input - Raw bytes, or text (encoded as UTF-8 before reading)
 * @returns The calendar with its events sorted by start time
 * @throws IcsDecodeError subclass describing the first problem found
 */
export function decode(input: string | Uint8Array, options: DecodeOptions = {}): Calendar {
  const bytes = typeof input === "string" ? new TextEncoder().encode(input) : input;
  return decodeCalendar(new LineReader(bytes, options.maxLineLength));
}

/**
 * Collect a byte stream (process.stdin, fs.createReadStream, ...) and
 * decode it. Rejects with the same errors decode() throws.
 */
export async function decodeStream(source: ByteSource, options: DecodeOptions = {}): Promise<Calendar> {
  const encoder = new TextEncoder();
  const chunks: Uint8Array[] = [];
  let total = 0;
  for await (const chunk of source) {
    const bytes = typeof chunk === "string" ? encoder.encode(chunk) : chunk;
    chunks.push(bytes);
    total += bytes.length;
  }

  const buffer = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    buffer.set(chunk, offset);
    offset += chunk.length;
  }
  return decode(buffer, options);
}

function decodeCalendar(reader: LineReader): Calendar {
  let state: CalendarState = "start";
  const events: IcsEvent[] = [];

  while (state !== "done") {
    const line = reader.readLine();
    switch (state) {
      case "start":
        state = stepStart(line);
        break;
      case "in-calendar":
        state = stepInCalendar(line, reader, events);
        break;
    }
  }

  return { events: sortEvents(events) };
}

function stepStart({ key, value, line }: LogicalLine): CalendarState {
  if (key === BEGIN && value === VCALENDAR) {
    return "in-calendar";
  }
  if (key === BEGIN || key === END) {
    throw new IcsStructureError(`missing ${BEGIN}:${VCALENDAR}`, line);
  }
  return "start";
}

function stepInCalendar(
  { key, value, line }: LogicalLine,
  reader: LineReader,
  events: IcsEvent[],
): CalendarState {
  switch (key) {
    case BEGIN:
      if (value === VEVENT) {
        events.push(decodeEvent(reader, line));
      }
      return "in-calendar";
    case END:
      return value === VCALENDAR ? "done" : "in-calendar";
    default:
      return "in-calendar";
  }
}

// ---------------------------------------------------------------------------
// Event level
// ---------------------------------------------------------------------------

type EventDraft = { -readonly [K in keyof IcsEvent]: IcsEvent[K] };

/**
 * Consume lines up to and including END:VEVENT.
 *
 * @param openedAt - Line of the BEGIN:VEVENT, reported if input runs out
 */
function decodeEvent(reader: LineReader, openedAt: number): IcsEvent {
  const draft: EventDraft = {
    uid: "",
    start: null,
    end: null,
    summary: "",
    location: "",
    description: "",
  };

  for (;;) {
    if (reader.done) {
      throw new IcsStructureError(`unexpected end of input inside ${VEVENT} opened at line ${openedAt}`);
    }
    const { key, value, line } = reader.readLine();
    switch (key) {
      case END:
        if (value !== VEVENT) {
          throw new IcsStructureError(`unexpected END value "${value}" inside ${VEVENT}`, line);
        }
        return Object.freeze({ ...draft });
      case "UID":
        draft.uid = value;
        break;
      case "DTSTART":
        draft.start = parseTimestamp(value, line);
        break;
      case "DTEND":
        draft.end = parseTimestamp(value, line);
        break;
      case "SUMMARY":
        draft.summary = value;
        break;
      case "LOCATION":
        draft.location = value;
        break;
      case "DESCRIPTION":
        draft.description = value;
        break;
    }
  }
}
