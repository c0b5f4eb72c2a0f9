/**
 * ics2json -- JSON rendering of a decoded calendar.
 *
 * Field names and event order are kept as decoded. Timestamps become
 * second-precision ISO 8601 strings; unset ones become null.
 */

import { formatTimestamp } from "@icsjson/ics";
import type { Calendar, IcsEvent } from "@icsjson/ics";

export interface EventJson {
  readonly uid: string;
  readonly start: string | null;
  readonly end: string | null;
  readonly summary: string;
  readonly location: string;
  readonly description: string;
}

export interface CalendarJson {
  readonly events: readonly EventJson[];
}

function timestampToJson(date: Date | null): string | null {
  return date === null ? null : formatTimestamp(date);
}

export function eventToJson(event: IcsEvent): EventJson {
  return {
    uid: event.uid,
    start: timestampToJson(event.start),
    end: timestampToJson(event.end),
    summary: event.summary,
    location: event.location,
    description: event.description,
  };
}

export function calendarToJson(calendar: Calendar): CalendarJson {
  return { events: calendar.events.map(eventToJson) };
}

/** Indented JSON document followed by a newline. */
export function serializeCalendar(calendar: Calendar, indent: string = "\t"): string {
  return JSON.stringify(calendarToJson(calendar), null, indent) + "\n";
}
