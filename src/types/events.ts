//  CalendarEvent: raw event contract
// -----------------------------
// - The shape the calendar collaborator hands us, trimmed to what the
//   timesheet needs (title + start/end).
// - Timed events carry `dateTime` (ISO 8601 with offset), all-day events
//   carry `date` (YYYY-MM-DD) and no `dateTime`.
// - Kept as plain strings (no Date objects) so fixtures and API payloads
//   map onto it one to one.
// =============================
export type EventTime = {
    /** ISO 8601 timestamp with offset, e.g. "2025-03-10T09:00:00+02:00" */
    dateTime?: string;

    /** Date-only value for all-day events, e.g. "2025-03-10" */
    date?: string;

    /** IANA timezone the calendar reported for this boundary */
    timeZone?: string;
};

export type CalendarEvent = {
    id?: string;

    /** User-typed title, the thing we parse */
    summary: string;

    start: EventTime;
    end: EventTime;

    /** "confirmed" | "tentative" | "cancelled" as reported by the calendar */
    status?: string;
};


//  CalendarClient: event source
// -----------------------------
// - Given a calendar id and an instant range, returns the events in it.
// - Auth, account selection and paging belong to the implementation.
// =============================
export interface CalendarClient {
    listEvents(calendarId: string, start: Date, end: Date): Promise<CalendarEvent[]>;
}
