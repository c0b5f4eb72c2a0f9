/**
 * @icsjson/ics -- Event ordering.
 *
 * Undated events first, then chronological by start.
 */

import type { IcsEvent } from "./types";

/** Comparator: events without a start sort before every dated event. */
export function compareEvents(a: IcsEvent, b: IcsEvent): number {
  if (a.start === null) {
    return b.start === null ? 0 : -1;
  }
  if (b.start === null) {
    return 1;
  }
  return a.start.getTime() - b.start.getTime();
}

/** Return a new array of the events in start order. The input is not modified. */
export function sortEvents(events: readonly IcsEvent[]): IcsEvent[] {
  return [...events].sort(compareEvents);
}
