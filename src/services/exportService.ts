// src/services/exportService.ts
// Row-level export: one row per non-excluded entry, in the fixed column order
// the timesheet import expects, plus an .xlsx rendering of those rows.
import { randomUUID } from "node:crypto";
import { mkdir, rm, writeFile } from "node:fs/promises";
import path from "node:path";

import { addMinutes, format, isAfter, parseISO } from "date-fns";
import * as XLSX from "xlsx";

import type { ExportDownload, ExportRow, ExportRowSet, PeriodType } from "../types/report";
import type { TimeEntry } from "../types/timesheet";
import { UpstreamError, errorMessage } from "../lib/errors";
import { createLogger } from "../lib/logger";
import { JOIN_DELIMITER } from "./summaryParser";

const log = createLogger("export");

export const EXPORT_COLUMNS: ReadonlyArray<{ key: keyof ExportRow; header: string; width: number }> = [
  { key: "date", header: "Date", width: 12 },
  { key: "hours", header: "Fact hours", width: 10 },
  { key: "project", header: "Project", width: 12 },
  { key: "phase", header: "Project phase", width: 15 },
  { key: "location", header: "Location", width: 12 },
  { key: "description", header: "Description", width: 80 },
  { key: "per_diems", header: "Per diems", width: 10 },
  { key: "title", header: "Title", width: 30 },
  { key: "comment", header: "Comment", width: 15 },
  { key: "errors", header: "Errors", width: 30 },
];

/** "TASK * description" when a task was recognised, otherwise the bare description. */
export function exportDescription(entry: TimeEntry): string {
  if (entry.taskCode && entry.description) return `${entry.taskCode}${JOIN_DELIMITER}${entry.description}`;
  if (entry.taskCode) return entry.taskCode;
  return entry.description ?? "";
}

export function buildExportRows(entries: TimeEntry[], baseLocation: string): ExportRow[] {
  return entries
    .filter((e) => !e.isExcluded)
    .map((e) => {
      const description = exportDescription(e);
      return {
        date: e.date,
        hours: e.durationHours,
        project: e.projectCode ?? "",
        phase: e.phaseCode ?? "",
        location: baseLocation,
        description,
        per_diems: null,
        title: e.position ?? "",
        comment: e.rawSummary !== description ? e.rawSummary : "",
        errors: e.errors.length ? e.errors.join("; ") : null,
      };
    });
}

export function toRowSet(rows: ExportRow[]): ExportRowSet {
  return { columns: EXPORT_COLUMNS.map((c) => c.key), rows, count: rows.length };
}

function spreadsheetDate(isoDate: string): string {
  return isoDate ? format(parseISO(isoDate), "dd.MM.yyyy") : "";
}

export function buildWorkbook(rows: ExportRow[], sheetName: string): Buffer {
  const header = EXPORT_COLUMNS.map((c) => c.header);
  const body = rows.map((r) => [
    spreadsheetDate(r.date),
    r.hours,
    r.project,
    r.phase,
    r.location,
    r.description,
    r.per_diems ?? "",
    r.title,
    r.comment,
    r.errors ?? "",
  ]);

  const sheet = XLSX.utils.aoa_to_sheet([header, ...body]);
  sheet["!cols"] = EXPORT_COLUMNS.map((c) => ({ wch: c.width }));

  const book = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(book, sheet, sheetName);
  const out: Buffer = XLSX.write(book, { bookType: "xlsx", type: "buffer" });
  return out;
}

/* ============================== Exporter ================================ */

export type ExportMeta = {
  periodType: PeriodType;
  start: Date;
  end: Date;
};

/** Receives the row set of a report and makes it downloadable. */
export interface ReportExporter {
  export(rows: ExportRow[], meta: ExportMeta): Promise<ExportDownload>;
}

export type StoredExport = {
  id: string;
  filePath: string;
  filename: string;
  expiresAt: Date;
};

/** Lookup side of the exporter, used by the download route. */
export interface ExportLookup {
  find(id: string, now?: Date): StoredExport | undefined;
}

const EXPORT_ID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

export type XlsxExporterOptions = {
  dir: string;
  ttlMinutes: number;
  /** Prefix of the download URL, the export id is appended */
  urlBase?: string;
  now?: () => Date;
};

/**
 * Writes workbooks to `dir` under random ids and remembers them for `ttlMinutes`.
 * The registry is per instance; files from a previous process are not served.
 */
export class XlsxReportExporter implements ReportExporter, ExportLookup {
  private readonly files = new Map<string, StoredExport>();
  private readonly now: () => Date;
  private readonly urlBase: string;

  constructor(private readonly options: XlsxExporterOptions) {
    this.now = options.now ?? (() => new Date());
    this.urlBase = options.urlBase ?? "/api/report/exports";
  }

  async export(rows: ExportRow[], meta: ExportMeta): Promise<ExportDownload> {
    await this.purgeExpired();

    const id = randomUUID();
    const filePath = path.join(this.options.dir, `${id}.xlsx`);
    const filename = `report_${format(meta.start, "yyyyMMdd")}_${format(meta.end, "yyyyMMdd")}.xlsx`;
    const expiresAt = addMinutes(this.now(), this.options.ttlMinutes);

    try {
      await mkdir(this.options.dir, { recursive: true });
      await writeFile(filePath, buildWorkbook(rows, `${meta.periodType}-to-date`));
    } catch (err) {
      throw new UpstreamError("export", `could not write ${filePath}: ${errorMessage(err)}`, { cause: err });
    }

    this.files.set(id, { id, filePath, filename, expiresAt });
    log.info(`wrote ${rows.length} rows to ${filename} (${id})`);

    return { url: `${this.urlBase}/${id}`, filename, expires_at: expiresAt.toISOString() };
  }

  find(id: string, now: Date = this.now()): StoredExport | undefined {
    if (!EXPORT_ID.test(id)) return undefined;
    const stored = this.files.get(id);
    if (!stored || isAfter(now, stored.expiresAt)) return undefined;
    return stored;
  }

  async purgeExpired(now: Date = this.now()): Promise<number> {
    let removed = 0;
    for (const stored of [...this.files.values()]) {
      if (!isAfter(now, stored.expiresAt)) continue;
      this.files.delete(stored.id);
      await rm(stored.filePath, { force: true });
      removed++;
    }
    return removed;
  }
}
