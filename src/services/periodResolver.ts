// src/services/periodResolver.ts
import {
  eachDayOfInterval,
  endOfDay,
  endOfMonth,
  isAfter,
  isValid,
  isWeekend,
  min,
  parseISO,
  startOfDay,
  startOfMonth,
  startOfWeek,
} from "date-fns";

import type { PeriodType } from "../types/report";
import { ReportRequestError } from "../lib/errors";
import { HOURS_PER_DAY } from "../lib/numbers";

export type ResolvedPeriod = {
  type: PeriodType;
  start: Date;
  end: Date;
  /** Monday-Friday days from start up to min(now, end) */
  workdaysElapsed: number;
  /** Month whose norm applies to this period */
  normYear: number;
  normMonth: number;
  /** Used when no norm is stored for that month */
  fallbackNormHours: number;
};

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/** Monday-Friday days between two instants, both calendar days included. */
export function countWorkdays(from: Date, to: Date): number {
  const first = startOfDay(from);
  const last = startOfDay(to);
  if (isAfter(first, last)) return 0;
  return eachDayOfInterval({ start: first, end: last }).filter((d) => !isWeekend(d)).length;
}

export function isoWeekStart(now: Date): Date {
  return startOfWeek(now, { weekStartsOn: 1 });
}

function monthNormFallback(now: Date): number {
  return countWorkdays(startOfMonth(now), endOfMonth(now)) * HOURS_PER_DAY;
}

function parseDateParam(name: string, value: string): Date {
  const parsed = parseISO(value);
  if (!DATE_ONLY.test(value) || !isValid(parsed)) {
    throw new ReportRequestError(`${name} must be a date in YYYY-MM-DD format, got "${value}"`);
  }
  return parsed;
}

function finish(type: PeriodType, start: Date, end: Date, now: Date, normFrom: Date, fallbackNormHours: number): ResolvedPeriod {
  return {
    type,
    start,
    end,
    workdaysElapsed: countWorkdays(start, min([endOfDay(now), end])),
    normYear: normFrom.getFullYear(),
    normMonth: normFrom.getMonth() + 1,
    fallbackNormHours,
  };
}

/**
 * week   = Monday 00:00 .. today 23:59:59
 * month  = 1st 00:00 .. today 23:59:59
 * custom = startDate 00:00 .. endDate 23:59:59 (both required)
 */
export function resolvePeriod(
  type: PeriodType,
  now: Date,
  startDate?: string,
  endDate?: string
): ResolvedPeriod {
  switch (type) {
    case "week":
      return finish(type, isoWeekStart(now), endOfDay(now), now, now, monthNormFallback(now));

    case "month":
      return finish(type, startOfMonth(now), endOfDay(now), now, now, monthNormFallback(now));

    case "custom": {
      if (!startDate || !endDate) {
        throw new ReportRequestError("start_date and end_date required for custom report");
      }
      const start = startOfDay(parseDateParam("start_date", startDate));
      const end = endOfDay(parseDateParam("end_date", endDate));
      if (isAfter(start, end)) {
        throw new ReportRequestError("end_date must not be before start_date");
      }
      return finish(type, start, end, now, start, countWorkdays(start, end) * HOURS_PER_DAY);
    }
  }
}
