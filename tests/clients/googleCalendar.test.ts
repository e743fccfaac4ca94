import { formatISO } from "date-fns";
import { beforeAll, describe, expect, it, vi } from "vitest";

import { createGoogleCalendarClient } from "../../src/clients/googleCalendar";
import { UpstreamError } from "../../src/lib/errors";
import { setLogLevel } from "../../src/lib/logger";

const start = new Date(2025, 2, 1);
const end = new Date(2025, 2, 12, 23, 59, 59);

function respondWith(body: string, status = 200) {
  return vi.fn(async (..._args: Parameters<typeof fetch>) => new Response(body, { status }));
}

function client(fetchImpl: typeof fetch, accessToken: string | undefined = "test-token") {
  return createGoogleCalendarClient({ baseUrl: "https://calendar.test/v3", accessToken, fetchImpl });
}

describe("createGoogleCalendarClient", () => {
  beforeAll(() => setLogLevel("silent"));

  it("asks events.list for expanded events in the window", async () => {
    const fetchImpl = respondWith(JSON.stringify({ items: [] }));

    await client(fetchImpl).listEvents("team@example.com", start, end);

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [input, init] = fetchImpl.mock.calls[0];
    const url = new URL(String(input));
    expect(url.origin + url.pathname).toBe("https://calendar.test/v3/calendars/team%40example.com/events");
    expect(Object.fromEntries(url.searchParams)).toEqual({
      timeMin: formatISO(start),
      timeMax: formatISO(end),
      singleEvents: "true",
      orderBy: "startTime",
      maxResults: "2500",
    });
    expect(init?.headers).toEqual({ Authorization: "Bearer test-token" });
  });

  it("keeps well-formed events and drops cancelled or broken ones", async () => {
    const fetchImpl = respondWith(
      JSON.stringify({
        items: [
          {
            id: "a",
            summary: "UFSP * prep",
            start: { dateTime: "2025-03-10T09:00:00+05:00" },
            end: { dateTime: "2025-03-10T10:00:00+05:00" },
          },
          { id: "b", summary: "Away", start: { date: "2025-03-11" }, end: { date: "2025-03-12" } },
          { id: "c", summary: "moved", status: "cancelled", start: { date: "2025-03-11" } },
          { id: "d", summary: "no start", start: {} },
          { id: "e", start: { date: "2025-03-12" } },
        ],
      })
    );

    const events = await client(fetchImpl).listEvents("primary", start, end);

    expect(events).toEqual([
      {
        id: "a",
        summary: "UFSP * prep",
        start: { dateTime: "2025-03-10T09:00:00+05:00" },
        end: { dateTime: "2025-03-10T10:00:00+05:00" },
      },
      { id: "b", summary: "Away", start: { date: "2025-03-11" }, end: { date: "2025-03-12" } },
      { id: "e", summary: "", start: { date: "2025-03-12" }, end: {} },
    ]);
  });

  it("treats a missing items array as no events", async () => {
    const events = await client(respondWith("{}")).listEvents("primary", start, end);
    expect(events).toEqual([]);
  });

  it("fails without an access token and does not call out", async () => {
    const fetchImpl = respondWith("{}");

    await expect(client(fetchImpl, undefined).listEvents("primary", start, end)).rejects.toThrow(
      "GOOGLE_ACCESS_TOKEN is not configured"
    );
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("surfaces HTTP errors with their body", async () => {
    const call = client(respondWith("invalid credentials", 401)).listEvents("primary", start, end);

    await expect(call).rejects.toBeInstanceOf(UpstreamError);
    await expect(call).rejects.toThrow("HTTP 401: invalid credentials");
  });

  it("wraps network failures", async () => {
    const fetchImpl = vi.fn(async (..._args: Parameters<typeof fetch>): Promise<Response> => {
      throw new Error("getaddrinfo ENOTFOUND calendar.test");
    });

    await expect(client(fetchImpl).listEvents("primary", start, end)).rejects.toThrow(
      new UpstreamError("calendar", "getaddrinfo ENOTFOUND calendar.test")
    );
  });

  it("rejects a response that is not an events page", async () => {
    await expect(
      client(respondWith(JSON.stringify({ items: "nope" }))).listEvents("primary", start, end)
    ).rejects.toThrow("unexpected events.list response");
  });
});
