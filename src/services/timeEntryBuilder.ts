// src/services/timeEntryBuilder.ts
import { differenceInSeconds, isValid, parseISO } from "date-fns";

import type { CalendarEvent } from "../types/events";
import type { ParsedSummary, TimeEntry } from "../types/timesheet";
import { createLogger } from "../lib/logger";
import { HOURS_PER_DAY, roundHours } from "../lib/numbers";
import type { SummaryParser } from "./summaryParser";

const log = createLogger("entries");

export function isAllDayEvent(event: CalendarEvent): boolean {
  return event.start.date !== undefined && event.start.dateTime === undefined;
}

/**
 * Local calendar date of the event start. For timed events this is the date
 * part of the zoned timestamp as the calendar wrote it, not a re-projection
 * into the server's timezone.
 */
export function eventDate(event: CalendarEvent): string {
  if (event.start.dateTime) return event.start.dateTime.slice(0, 10);
  return event.start.date ?? "";
}

/** Duration of a timed event in hours (two decimals). End before start is clamped to 0. */
export function timedDurationHours(event: CalendarEvent): number {
  const startISO = event.start.dateTime;
  const endISO = event.end.dateTime ?? startISO;
  if (!startISO || !endISO) return 0;

  const start = parseISO(startISO);
  const end = parseISO(endISO);
  if (!isValid(start) || !isValid(end)) {
    log.warn(`unreadable timestamps on "${event.summary}"`, startISO, endISO);
    return 0;
  }

  const hours = roundHours(differenceInSeconds(end, start) / 3600);
  if (hours < 0) {
    log.warn(`event "${event.summary}" ends before it starts, counting 0h`, startISO, endISO);
    return 0;
  }
  return hours;
}

export function buildTimeEntry(event: CalendarEvent, parsed: ParsedSummary): TimeEntry {
  const allDay = isAllDayEvent(event);
  return {
    ...parsed,
    date: eventDate(event),
    durationHours: allDay ? HOURS_PER_DAY : timedDurationHours(event),
    isAllDay: allDay,
  };
}

export function parseEvents(events: CalendarEvent[], parse: SummaryParser): TimeEntry[] {
  return events.map((event) => buildTimeEntry(event, parse(event.summary)));
}
