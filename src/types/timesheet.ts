// Parsed summaries and time entries live for one report pass and are never stored.

export type ParsedSummary = {
    /** Title exactly as it came from the calendar */
    rawSummary: string;

    projectCode?: string;
    projectId?: number;
    phaseCode?: string;
    taskCode?: string;
    description?: string;

    isBillable: boolean;

    /** Free-text role label of the matched project */
    position?: string;

    /** Diagnostics; an entry with any error is left out of valid totals */
    errors: string[];

    /** Matched an exclusion pattern; ignored by every report */
    isExcluded: boolean;
};

export type TimeEntry = ParsedSummary & {
    /** Local calendar date of the event start, YYYY-MM-DD */
    date: string;

    /** Hours, >= 0, two decimals; all-day events count as a full workday */
    durationHours: number;

    isAllDay: boolean;
};

export function isValidSummary(parsed: ParsedSummary): boolean {
    return parsed.projectCode !== undefined && parsed.errors.length === 0;
}

export function hasErrors(parsed: ParsedSummary): boolean {
    return parsed.errors.length > 0;
}
