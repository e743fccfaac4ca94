// src/services/summaryParser.ts
// Turns a calendar title into project / phase / task / description.
//
//   PROJECT * Description                    (level 1)
//   PROJECT * PHASE * Description            (level 2)
//   PROJECT * PHASE * TASK * Description     (level 3)
//
// ":" and a bare "*" are accepted in place of " * ".
import type { Project, StructureLevel } from "../types/catalog";
import { isValidSummary, type ParsedSummary } from "../types/timesheet";
import type { CatalogSnapshot } from "./catalogSnapshot";
import type { ExclusionMatcher } from "./exclusionMatcher";
import { createProjectResolver, type ProjectResolver } from "./projectResolver";

/** Tried in this order; the first one present in the title wins. */
export const DELIMITERS = [" * ", ":", "*"] as const;

/** Used when re-joining tokens into a description. */
export const JOIN_DELIMITER = " * ";

export type SummaryParser = (rawSummary: string) => ParsedSummary;

type LevelParser = (
  parts: string[],
  result: ParsedSummary,
  project: Project,
  catalog: CatalogSnapshot
) => ParsedSummary;

/**
 * Split a trimmed title into non-empty tokens.
 * Without any delimiter the first word is taken as the project token and the
 * rest of the title as a single description token.
 */
export function splitSummary(summary: string): string[] {
  const delimiter = DELIMITERS.find((d) => summary.includes(d));

  const raw =
    delimiter !== undefined
      ? summary.split(delimiter)
      : (summary.match(/^(\S+)\s+([\s\S]+)$/)?.slice(1) ?? [summary]);

  return raw.map((p) => p.trim()).filter((p) => p.length > 0);
}

function joinParts(parts: string[]): string | undefined {
  return parts.length ? parts.join(JOIN_DELIMITER) : undefined;
}

function emptyResult(rawSummary: string): ParsedSummary {
  return { rawSummary, isBillable: false, errors: [], isExcluded: false };
}

/* ============================== Levels ================================== */

const parseLevel1: LevelParser = (parts, result) => ({
  ...result,
  description: joinParts(parts.slice(1)),
});

// Shared by levels 2 and 3: an unknown phase is an error, the remainder is kept as description.
function resolvePhase(
  parts: string[],
  result: ParsedSummary,
  project: Project,
  catalog: CatalogSnapshot
): { result: ParsedSummary; phaseId?: number } {
  if (parts.length < 2) {
    return {
      result: {
        ...result,
        errors: [...result.errors, `Missing phase for Level ${project.structureLevel} project`],
      },
    };
  }

  const candidate = parts[1].toUpperCase();
  const phase = catalog.findPhase(project.id, candidate);
  if (!phase) {
    return {
      result: {
        ...result,
        description: joinParts(parts.slice(1)),
        errors: [...result.errors, `Phase '${candidate}' not found`],
      },
    };
  }

  return { result: { ...result, phaseCode: phase.code }, phaseId: phase.id };
}

const parseLevel2: LevelParser = (parts, result, project, catalog) => {
  const resolved = resolvePhase(parts, result, project, catalog);
  if (resolved.phaseId === undefined) return resolved.result;
  return { ...resolved.result, description: joinParts(parts.slice(2)) };
};

// Token 3 is a task only if the catalog knows it; anything else is free text.
const parseLevel3: LevelParser = (parts, result, project, catalog) => {
  const resolved = resolvePhase(parts, result, project, catalog);
  if (resolved.phaseId === undefined) return resolved.result;
  if (parts.length < 3) return resolved.result;

  const task = catalog.findTask(project.id, resolved.phaseId, parts[2].toUpperCase());
  if (task) {
    return { ...resolved.result, taskCode: task.code, description: joinParts(parts.slice(3)) };
  }
  return { ...resolved.result, description: joinParts(parts.slice(2)) };
};

export const LEVEL_PARSERS: Record<StructureLevel, LevelParser> = {
  1: parseLevel1,
  2: parseLevel2,
  3: parseLevel3,
};

/** One extraction attempt against a specific catalog project. */
export function parseWithProject(
  parts: string[],
  project: Project,
  catalog: CatalogSnapshot,
  rawSummary: string
): ParsedSummary {
  const base: ParsedSummary = {
    ...emptyResult(rawSummary),
    projectCode: project.code,
    projectId: project.id,
    isBillable: project.isBillable,
    position: project.position,
  };
  return LEVEL_PARSERS[project.structureLevel](parts, base, project, catalog);
}

/* ============================== Public API ============================== */

export function createSummaryParser(
  catalog: CatalogSnapshot,
  isExcluded: ExclusionMatcher,
  resolveCandidates: ProjectResolver = createProjectResolver(catalog)
): SummaryParser {
  return (rawSummary: string) => {
    const result = emptyResult(rawSummary);
    const summary = rawSummary.trim();

    if (!summary) return { ...result, errors: ["Empty summary"] };
    if (isExcluded(summary)) return { ...result, isExcluded: true };

    const parts = splitSummary(summary);
    if (!parts.length) return { ...result, errors: ["No content after parsing"] };

    const code = parts[0].toUpperCase();
    const candidates = resolveCandidates(code);
    if (!candidates.length) {
      return { ...result, description: summary, errors: [`Project code '${code}' not found`] };
    }

    for (const project of candidates) {
      const attempt = parseWithProject(parts, project, catalog, rawSummary);
      if (isValidSummary(attempt)) return attempt;
    }

    // Nothing validated: report against the richest variant, it has the most useful errors.
    return parseWithProject(parts, candidates[0], catalog, rawSummary);
  };
}
