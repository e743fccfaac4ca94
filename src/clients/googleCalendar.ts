// src/clients/googleCalendar.ts
// Google Calendar v3 events.list over fetch. The access token is handed to us
// by whatever performs the OAuth dance; we only read events.
import { formatISO } from "date-fns";
import { z } from "zod";

import type { CalendarClient, CalendarEvent } from "../types/events";
import { UpstreamError, errorMessage } from "../lib/errors";
import { createLogger } from "../lib/logger";

const log = createLogger("calendar");

const MAX_RESULTS = 2500;

// -------- JSON schema guard (Zod) --------
const EventTimeSchema = z.object({
  dateTime: z.string().optional(),
  date: z.string().optional(),
  timeZone: z.string().optional(),
});

const GoogleEventSchema = z
  .object({
    id: z.string().optional(),
    summary: z.string().default(""),
    status: z.string().optional(),
    start: EventTimeSchema,
    end: EventTimeSchema.default({}),
  })
  .refine((e) => e.start.dateTime !== undefined || e.start.date !== undefined, {
    message: "start has neither dateTime nor date",
  });

const EventsPageSchema = z.object({
  items: z.array(z.unknown()).default([]),
});

export type GoogleCalendarOptions = {
  baseUrl: string;
  accessToken?: string;
  fetchImpl?: typeof fetch;
};

export function createGoogleCalendarClient(options: GoogleCalendarOptions): CalendarClient {
  const fetchImpl = options.fetchImpl ?? fetch;

  return {
    async listEvents(calendarId: string, start: Date, end: Date): Promise<CalendarEvent[]> {
      if (!options.accessToken) {
        throw new UpstreamError("calendar", "GOOGLE_ACCESS_TOKEN is not configured");
      }

      const params = new URLSearchParams({
        timeMin: formatISO(start),
        timeMax: formatISO(end),
        singleEvents: "true",
        orderBy: "startTime",
        maxResults: String(MAX_RESULTS),
      });
      const url = `${options.baseUrl}/calendars/${encodeURIComponent(calendarId)}/events?${params}`;

      let resp: Response;
      try {
        resp = await fetchImpl(url, { headers: { Authorization: `Bearer ${options.accessToken}` } });
      } catch (err) {
        throw new UpstreamError("calendar", errorMessage(err), { cause: err });
      }

      if (!resp.ok) {
        const text = await resp.text().catch(() => "");
        throw new UpstreamError("calendar", `HTTP ${resp.status}: ${text}`.trim());
      }

      const page = EventsPageSchema.safeParse(await resp.json());
      if (!page.success) {
        throw new UpstreamError("calendar", "unexpected events.list response");
      }

      const events: CalendarEvent[] = [];
      for (const item of page.data.items) {
        const parsed = GoogleEventSchema.safeParse(item);
        if (!parsed.success) {
          log.warn("dropping malformed event:", parsed.error.issues.map((i) => i.message).join("; "));
          continue;
        }
        if (parsed.data.status === "cancelled") continue;
        events.push(parsed.data);
      }
      return events;
    },
  };
}
