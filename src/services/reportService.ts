// src/services/reportService.ts
// Report orchestration: period -> events -> parsed entries -> metrics.
// Stateless across calls; the catalog is loaded fresh for every report.
import { endOfDay, endOfMonth, format, min, startOfMonth } from "date-fns";

import type { Settings } from "../types/catalog";
import type { CalendarClient, CalendarEvent } from "../types/events";
import type {
  FullReport,
  PeriodInfo,
  ReportError,
  ReportResponse,
  ReportType,
  StatusBlock,
  StatusReport,
} from "../types/report";
import { isValidSummary, type TimeEntry } from "../types/timesheet";
import { ReportRequestError, errorMessage } from "../lib/errors";
import { createLogger } from "../lib/logger";
import { HOURS_PER_DAY, percentOf, roundHours, roundTo } from "../lib/numbers";
import type { CatalogStore } from "../clients/catalogStore";
import type { CatalogSnapshot } from "./catalogSnapshot";
import { createExclusionMatcher, type ExclusionMode } from "./exclusionMatcher";
import { buildExportRows, toRowSet, type ReportExporter } from "./exportService";
import {
  aggregate,
  elapsedBillableTarget,
  extractErrorRecords,
  partitionEntries,
  sumHours,
} from "./periodAggregator";
import { countWorkdays, isoWeekStart, resolvePeriod, type ResolvedPeriod } from "./periodResolver";
import { createSummaryParser } from "./summaryParser";
import { parseEvents } from "./timeEntryBuilder";

const log = createLogger("report");

/** Norm used for the week block of the status report. */
export const WEEK_NORM_HOURS = 40;

export type ReportRequest = {
  reportType: ReportType;
  startDate?: string;
  endDate?: string;
  /** Also render the rows as a downloadable spreadsheet */
  export?: boolean;
};

export type ReportServiceDeps = {
  catalogStore: CatalogStore;
  calendar: CalendarClient;
  exporter?: ReportExporter;
  exclusionMode?: ExclusionMode;
  now?: () => Date;
};

export interface ReportService {
  generateReport(request: ReportRequest): Promise<ReportResponse>;
}

export type BillableTarget = { days: number; hours: number };

/** days x 8, or percent of the monthly norm. */
export function billableTarget(settings: Settings, normHours: number): BillableTarget {
  if (settings.billableTargetType === "days") {
    return { days: settings.billableTargetValue, hours: settings.billableTargetValue * HOURS_PER_DAY };
  }
  const hours = (settings.billableTargetValue * normHours) / 100;
  return { days: roundHours(hours / HOURS_PER_DAY), hours };
}

export function statusEmoji(billableOnTrackPct: number): string {
  if (billableOnTrackPct >= 95) return "✅";
  if (billableOnTrackPct >= 80) return "⚠️";
  return "🔴";
}

export function statusMessage(week: StatusBlock, month: StatusBlock, errorCount: number): string {
  const part = (label: string, b: StatusBlock) =>
    `${label}: ${roundTo(b.total_hours, 1)}h total, ${roundTo(b.billable_hours, 1)}h billable ` +
    `(${Math.round(b.pct_of_elapsed_target)}% on-track).`;

  let message = `${statusEmoji(month.pct_of_elapsed_target)} ${part("MTD", month)} ${part("WTD", week)}`;
  if (errorCount > 0) message += ` ⚠️ ${errorCount} events need attention.`;
  return message;
}

function condense(
  entries: TimeEntry[],
  workdays: number,
  normHours: number,
  monthNormHours: number,
  billableTargetHours: number
): StatusBlock {
  const { valid, errored } = partitionEntries(entries);
  const total = sumHours(valid);
  const billable = sumHours(valid.filter((e) => e.isBillable));
  const hoursElapsed = workdays * HOURS_PER_DAY;
  const elapsedTarget = elapsedBillableTarget(hoursElapsed, billableTargetHours, monthNormHours);

  return {
    total_hours: roundHours(total),
    billable_hours: roundHours(billable),
    norm_hours: normHours,
    hours_elapsed: hoursElapsed,
    pct_of_norm: percentOf(total, normHours),
    pct_of_elapsed_norm: percentOf(total, hoursElapsed),
    pct_of_elapsed_target: percentOf(billable, elapsedTarget),
    workdays_elapsed: workdays,
    errors: errored.length,
  };
}

const dayKey = (d: Date) => format(d, "yyyy-MM-dd");

export function createReportService(deps: ReportServiceDeps): ReportService {
  const clock = deps.now ?? (() => new Date());

  async function loadCatalog(): Promise<CatalogSnapshot | ReportError> {
    try {
      return await deps.catalogStore.load();
    } catch (err) {
      log.error("catalog load failed:", errorMessage(err));
      return { error: `Failed to load catalog: ${errorMessage(err)}`, code: "E_UPSTREAM" };
    }
  }

  async function fetchEntries(
    catalog: CatalogSnapshot,
    start: Date,
    end: Date
  ): Promise<TimeEntry[] | ReportError> {
    const calendarId = catalog.settings.workCalendar;
    let events: CalendarEvent[];
    try {
      events = await deps.calendar.listEvents(calendarId, start, end);
    } catch (err) {
      log.error(`fetching ${calendarId} failed:`, errorMessage(err));
      return { error: `Failed to fetch events: ${errorMessage(err)}`, code: "E_UPSTREAM" };
    }

    const parse = createSummaryParser(
      catalog,
      createExclusionMatcher(catalog.exclusions, deps.exclusionMode)
    );
    return parseEvents(events, parse);
  }

  async function statusReport(now: Date): Promise<StatusReport | ReportError> {
    const catalog = await loadCatalog();
    if ("error" in catalog) return catalog;

    const weekStart = isoWeekStart(now);
    const monthStart = startOfMonth(now);
    const end = endOfDay(now);

    // A week that began last month still needs its first days.
    const entries = await fetchEntries(catalog, min([weekStart, monthStart]), end);
    if ("error" in entries) return entries;

    const active = entries.filter((e) => !e.isExcluded);
    const today = dayKey(now);
    const inRange = (from: Date) => active.filter((e) => e.date >= dayKey(from) && e.date <= today);
    const weekEntries = inRange(weekStart);
    const monthEntries = inRange(monthStart);

    const monthNorm =
      catalog.norm(now.getFullYear(), now.getMonth() + 1)?.hours ??
      countWorkdays(monthStart, endOfMonth(now)) * HOURS_PER_DAY;
    const target = billableTarget(catalog.settings, monthNorm);

    const week = condense(weekEntries, countWorkdays(weekStart, now), WEEK_NORM_HOURS, monthNorm, target.hours);
    const month = condense(monthEntries, countWorkdays(monthStart, now), monthNorm, monthNorm, target.hours);
    const errorCount = active.filter((e) => e.date <= today && e.errors.length > 0).length;

    log.info(`status ${dayKey(weekStart)}/${dayKey(monthStart)}..${today}: ${active.length} active entries`);
    return { week, month, message: statusMessage(week, month, errorCount) };
  }

  async function periodReport(request: ReportRequest, now: Date): Promise<ReportResponse> {
    if (request.reportType === "status") return statusReport(now);

    let period: ResolvedPeriod;
    try {
      period = resolvePeriod(request.reportType, now, request.startDate, request.endDate);
    } catch (err) {
      if (err instanceof ReportRequestError) return { error: err.message, code: "E_BAD_INPUT" };
      throw err;
    }

    const catalog = await loadCatalog();
    if ("error" in catalog) return catalog;

    const normHours = catalog.norm(period.normYear, period.normMonth)?.hours ?? period.fallbackNormHours;
    const target = billableTarget(catalog.settings, normHours);

    const entries = await fetchEntries(catalog, period.start, period.end);
    if ("error" in entries) return entries;

    const info: PeriodInfo = {
      type: period.type,
      start: dayKey(period.start),
      end: dayKey(period.end),
      norm_hours: normHours,
      workdays_elapsed: period.workdaysElapsed,
      hours_elapsed: period.workdaysElapsed * HOURS_PER_DAY,
      billable_target_days: target.days,
      billable_target_hours: roundHours(target.hours),
    };

    const report: FullReport = {
      summary: {
        period: info,
        ...aggregate(entries, {
          normHours,
          billableTargetHours: target.hours,
          workdaysElapsed: period.workdaysElapsed,
        }),
      },
      error_records: extractErrorRecords(entries),
    };

    log.info(
      `${period.type} ${info.start}..${info.end}: ${entries.length} events,`,
      `${entries.filter(isValidSummary).length} valid, ${report.error_records.length} with errors`
    );

    if (request.export && deps.exporter) {
      const rows = buildExportRows(entries, catalog.settings.baseLocation);
      try {
        const download = await deps.exporter.export(rows, {
          periodType: period.type,
          start: period.start,
          end: period.end,
        });
        report.export = { rows: toRowSet(rows), download };
      } catch (err) {
        log.error("export failed:", errorMessage(err));
        return { error: `Failed to export report: ${errorMessage(err)}`, code: "E_UPSTREAM" };
      }
    }

    return report;
  }

  return {
    generateReport(request: ReportRequest) {
      return periodReport(request, clock());
    },
  };
}
