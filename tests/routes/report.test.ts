import { once } from "node:events";
import { mkdtemp, rm } from "node:fs/promises";
import type { Server } from "node:http";
import os from "node:os";
import path from "node:path";

import * as XLSX from "xlsx";
import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";

import { createApp } from "../../src/app";
import { setLogLevel } from "../../src/lib/logger";
import { XlsxReportExporter } from "../../src/services/exportService";
import type { ReportRequest } from "../../src/services/reportService";
import type { ReportResponse, StatusReport } from "../../src/types/report";

const block = {
  total_hours: 3,
  billable_hours: 2,
  norm_hours: 40,
  hours_elapsed: 24,
  pct_of_norm: 7.5,
  pct_of_elapsed_norm: 12.5,
  pct_of_elapsed_target: 11.1,
  workdays_elapsed: 3,
  errors: 0,
};

const statusReport: StatusReport = {
  week: block,
  month: block,
  message: "🔴 MTD: 3h total, 2h billable (11% on-track). WTD: 3h total, 2h billable (11% on-track).",
};

describe("/api/report", () => {
  const generateReport = vi.fn(async (_request: ReportRequest): Promise<ReportResponse> => statusReport);
  let exporter: XlsxReportExporter;
  let exportDir: string;
  let server: Server;
  let base: string;

  beforeAll(async () => {
    setLogLevel("silent");
    exportDir = await mkdtemp(path.join(os.tmpdir(), "timesheet-routes-"));
    exporter = new XlsxReportExporter({ dir: exportDir, ttlMinutes: 60 });

    server = createApp({ reportService: { generateReport }, exports: exporter }).listen(0, "127.0.0.1");
    await once(server, "listening");
    const address = server.address();
    if (!address || typeof address === "string") throw new Error("server has no port");
    base = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    await rm(exportDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    generateReport.mockClear();
  });

  const post = (body: unknown) =>
    fetch(`${base}/api/report`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });

  it("answers health checks", async () => {
    const res = await fetch(`${base}/api/healthz`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true });
  });

  it("passes a valid body to the report service", async () => {
    const res = await post({ report_type: "custom", start_date: "2025-03-01", end_date: "2025-03-12", export: true });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true, data: statusReport });
    expect(generateReport).toHaveBeenCalledWith({
      reportType: "custom",
      startDate: "2025-03-01",
      endDate: "2025-03-12",
      export: true,
    });
  });

  it("defaults to the status report", async () => {
    const res = await post({});

    expect(res.status).toBe(200);
    expect(generateReport).toHaveBeenCalledWith({ reportType: "status", export: false });
  });

  it("serves the status shorthand", async () => {
    const res = await fetch(`${base}/api/report/status`);

    expect(res.status).toBe(200);
    expect(generateReport).toHaveBeenCalledWith({ reportType: "status" });
  });

  it("rejects an unknown report type", async () => {
    const res = await post({ report_type: "year" });

    expect(res.status).toBe(422);
    expect(await res.json()).toMatchObject({ ok: false, error: { code: "E_BAD_INPUT", message: "Invalid body" } });
    expect(generateReport).not.toHaveBeenCalled();
  });

  it("names the missing custom date", async () => {
    const res = await post({ report_type: "custom", start_date: "2025-03-01" });

    expect(res.status).toBe(422);
    expect(await res.json()).toMatchObject({
      error: {
        details: { fieldErrors: { end_date: ["start_date and end_date required for custom report"] } },
      },
    });
  });

  it("rejects malformed dates", async () => {
    const res = await post({ report_type: "custom", start_date: "01.03.2025", end_date: "2025-03-12" });

    expect(res.status).toBe(422);
    expect(await res.json()).toMatchObject({
      error: { details: { fieldErrors: { start_date: ["Dates must look like YYYY-MM-DD"] } } },
    });
  });

  it("maps request errors from the service to 422", async () => {
    generateReport.mockResolvedValueOnce({ error: "end_date must not be before start_date", code: "E_BAD_INPUT" });

    const res = await post({ report_type: "custom", start_date: "2025-03-12", end_date: "2025-03-01" });

    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({
      ok: false,
      error: { code: "E_BAD_INPUT", message: "end_date must not be before start_date" },
    });
  });

  it("maps upstream failures to 502", async () => {
    generateReport.mockResolvedValueOnce({ error: "Failed to fetch events: HTTP 401", code: "E_UPSTREAM" });

    const res = await fetch(`${base}/api/report/status`);

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({
      ok: false,
      error: { code: "E_UPSTREAM", message: "Failed to fetch events: HTTP 401" },
    });
  });

  it("maps unexpected exceptions to 500", async () => {
    generateReport.mockRejectedValueOnce(new Error("boom"));

    const res = await post({ report_type: "week" });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ ok: false, error: { code: "E_INTERNAL", message: "boom" } });
  });

  describe("exports", () => {
    it("downloads a stored spreadsheet", async () => {
      const { url, filename } = await exporter.export([], {
        periodType: "week",
        start: new Date(2025, 2, 10),
        end: new Date(2025, 2, 12),
      });

      const res = await fetch(`${base}${url}`);

      expect(res.status).toBe(200);
      expect(res.headers.get("content-disposition")).toContain(`filename="${filename}"`);
      const book = XLSX.read(Buffer.from(await res.arrayBuffer()), { type: "buffer" });
      expect(book.SheetNames).toEqual(["week-to-date"]);
    });

    it("answers 404 for unknown ids", async () => {
      const res = await fetch(`${base}/api/report/exports/00000000-0000-4000-8000-000000000000`);

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        ok: false,
        error: { code: "E_NOT_FOUND", message: "Export not found or expired" },
      });
    });
  });
});
