// src/services/exclusionMatcher.ts

export type ExclusionMode = "exact" | "contains";

export type ExclusionMatcher = (summary: string) => boolean;

/**
 * Case-insensitive matcher over the exclusion patterns ("Away", "Lunch", ...).
 * `exact` compares the whole trimmed title, `contains` looks for the pattern anywhere in it.
 */
export function createExclusionMatcher(
  patterns: readonly string[],
  mode: ExclusionMode = "exact"
): ExclusionMatcher {
  const normalized = patterns.map((p) => p.trim().toLowerCase()).filter((p) => p.length > 0);

  return (summary: string) => {
    const text = summary.trim().toLowerCase();
    if (!text) return false;
    return mode === "exact"
      ? normalized.includes(text)
      : normalized.some((p) => text.includes(p));
  };
}
