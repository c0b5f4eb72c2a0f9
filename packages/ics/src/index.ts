/**
 * @icsjson/ics -- decoder for the VCALENDAR/VEVENT subset of iCalendar.
 */

export type { IcsEvent, Calendar, LogicalLine, DecodeOptions, ByteSource } from "./types";

export {
  BEGIN,
  END,
  VCALENDAR,
  VEVENT,
  DEFAULT_MAX_LINE_LENGTH,
  TIMESTAMP_LAYOUT,
} from "./constants";

export type { IcsErrorKind } from "./errors";
export {
  IcsDecodeError,
  IcsStructureError,
  IcsLineFormatError,
  IcsValueFormatError,
  isIcsDecodeError,
} from "./errors";

export { LineReader } from "./line-reader";

export { parseTimestamp, formatTimestamp } from "./timestamp";

export { compareEvents, sortEvents } from "./order";

export type { CalendarState } from "./decode";
export { decode, decodeStream } from "./decode";
