// Wire shapes of the report endpoints. Keys are snake_case because this is
// the JSON contract consumers (and the spreadsheet import) already rely on.

export type ReportType = "status" | "week" | "month" | "custom";
export type PeriodType = Exclude<ReportType, "status">;

export type ProjectBreakdown = {
  hours: number;
  billable: boolean;
  pct_of_total: number;
};

export type SummaryMetrics = {
  total: {
    hours: number;
    pct_of_monthly_norm: number;
    pct_of_elapsed_norm: number;
  };
  billable: {
    hours: number;
    pct_of_total_worked: number;
    pct_of_monthly_target: number;
    pct_of_elapsed_target: number;
    with_phase_and_task: number;
    with_phase_no_task: number;
    without_phase: number;
  };
  non_billable: {
    hours: number;
    pct_of_total_worked: number;
  };
  errors: {
    hours: number;
    count: number;
    pct_of_total_reported: number;
  };
  by_project: Record<string, ProjectBreakdown>;
};

export type PeriodInfo = {
  type: PeriodType;
  start: string;
  end: string;
  norm_hours: number;
  workdays_elapsed: number;
  hours_elapsed: number;
  billable_target_days: number;
  billable_target_hours: number;
};

export type ReportSummary = { period: PeriodInfo } & SummaryMetrics;

export type ErrorRecord = {
  date: string;
  hours: number;
  project: string | null;
  phase: string | null;
  description: string;
  billable: boolean;
  error: string;
};

export type ExportRow = {
  date: string;
  hours: number;
  project: string;
  phase: string;
  location: string;
  description: string;
  per_diems: number | null;
  title: string;
  comment: string;
  errors: string | null;
};

export type ExportRowSet = {
  columns: string[];
  rows: ExportRow[];
  count: number;
};

export type ExportDownload = {
  url: string;
  filename: string;
  expires_at: string;
};

export type FullReport = {
  summary: ReportSummary;
  error_records: ErrorRecord[];
  export?: {
    rows: ExportRowSet;
    download: ExportDownload;
  };
};

export type StatusBlock = {
  total_hours: number;
  billable_hours: number;
  norm_hours: number;
  hours_elapsed: number;
  pct_of_norm: number;
  pct_of_elapsed_norm: number;
  pct_of_elapsed_target: number;
  workdays_elapsed: number;
  errors: number;
};

export type StatusReport = {
  week: StatusBlock;
  month: StatusBlock;
  message: string;
};

export type ReportErrorCode = "E_BAD_INPUT" | "E_UPSTREAM";

export type ReportError = {
  error: string;
  code: ReportErrorCode;
};

export type ReportResponse = FullReport | StatusReport | ReportError;

export function isReportError(response: ReportResponse): response is ReportError {
  return "error" in response;
}
