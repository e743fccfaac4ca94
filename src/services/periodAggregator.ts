// src/services/periodAggregator.ts
// Totals, billable split and on-track percentages for one batch of entries.
// Sums are kept at full precision; rounding happens only on the way out.
import type { ErrorRecord, ProjectBreakdown, SummaryMetrics } from "../types/report";
import { hasErrors, isValidSummary, type TimeEntry } from "../types/timesheet";
import { HOURS_PER_DAY, percentOf, roundHours } from "../lib/numbers";

export const UNTRACKED_PROJECT = "UNTRACKED";

export type AggregateOptions = {
  /** Expected hours for the whole month */
  normHours: number;
  /** Billable goal for the whole month, in hours */
  billableTargetHours: number;
  workdaysElapsed: number;
};

export type EntryPartition = {
  active: TimeEntry[];
  valid: TimeEntry[];
  errored: TimeEntry[];
};

export function partitionEntries(entries: TimeEntry[]): EntryPartition {
  const active = entries.filter((e) => !e.isExcluded);
  return {
    active,
    valid: active.filter(isValidSummary),
    errored: active.filter(hasErrors),
  };
}

export function sumHours(entries: TimeEntry[]): number {
  return entries.reduce((acc, e) => acc + e.durationHours, 0);
}

/**
 * The monthly billable target scaled to the elapsed part of the period:
 * elapsed hours x (billable target / monthly norm).
 */
export function elapsedBillableTarget(
  hoursElapsed: number,
  billableTargetHours: number,
  normHours: number
): number {
  return normHours > 0 ? (hoursElapsed * billableTargetHours) / normHours : 0;
}

function breakdownByProject(valid: TimeEntry[], totalHours: number): Record<string, ProjectBreakdown> {
  const buckets = new Map<string, { hours: number; billable: boolean }>();
  for (const e of valid) {
    const code = e.projectCode ?? UNTRACKED_PROJECT;
    const bucket = buckets.get(code) ?? { hours: 0, billable: e.isBillable };
    bucket.hours += e.durationHours;
    buckets.set(code, bucket);
  }

  const out: Record<string, ProjectBreakdown> = {};
  for (const [code, bucket] of buckets) {
    out[code] = {
      hours: roundHours(bucket.hours),
      billable: bucket.billable,
      pct_of_total: percentOf(bucket.hours, totalHours),
    };
  }
  return out;
}

export function aggregate(entries: TimeEntry[], options: AggregateOptions): SummaryMetrics {
  const { normHours, billableTargetHours, workdaysElapsed } = options;
  const { valid, errored } = partitionEntries(entries);

  const totalHours = sumHours(valid);
  const billable = valid.filter((e) => e.isBillable);
  const billableHours = sumHours(billable);
  const nonBillableHours = totalHours - billableHours;

  const withPhaseAndTask = sumHours(billable.filter((e) => e.phaseCode && e.taskCode));
  const withPhaseNoTask = sumHours(billable.filter((e) => e.phaseCode && !e.taskCode));
  const withoutPhase = sumHours(billable.filter((e) => !e.phaseCode));

  const hoursElapsed = workdaysElapsed * HOURS_PER_DAY;
  const elapsedTarget = elapsedBillableTarget(hoursElapsed, billableTargetHours, normHours);

  const errorHours = sumHours(errored);

  return {
    total: {
      hours: roundHours(totalHours),
      pct_of_monthly_norm: percentOf(totalHours, normHours),
      pct_of_elapsed_norm: percentOf(totalHours, hoursElapsed),
    },
    billable: {
      hours: roundHours(billableHours),
      pct_of_total_worked: percentOf(billableHours, totalHours),
      pct_of_monthly_target: percentOf(billableHours, billableTargetHours),
      pct_of_elapsed_target: percentOf(billableHours, elapsedTarget),
      with_phase_and_task: roundHours(withPhaseAndTask),
      with_phase_no_task: roundHours(withPhaseNoTask),
      without_phase: roundHours(withoutPhase),
    },
    non_billable: {
      hours: roundHours(nonBillableHours),
      pct_of_total_worked: percentOf(nonBillableHours, totalHours),
    },
    errors: {
      hours: roundHours(errorHours),
      count: errored.length,
      pct_of_total_reported: percentOf(errorHours, totalHours + errorHours),
    },
    by_project: breakdownByProject(valid, totalHours),
  };
}

/** The "fix these calendar entries" list. */
export function extractErrorRecords(entries: TimeEntry[]): ErrorRecord[] {
  return partitionEntries(entries).errored.map((e) => ({
    date: e.date,
    hours: e.durationHours,
    project: e.projectCode ?? null,
    phase: e.phaseCode ?? null,
    description: e.description || e.rawSummary,
    billable: e.projectCode !== undefined && e.isBillable,
    error: e.errors[0] ?? "Unknown error",
  }));
}
