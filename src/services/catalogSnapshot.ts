// src/services/catalogSnapshot.ts
import type { CatalogData, Norm, Phase, Project, Settings, Task } from "../types/catalog";

const sameCode = (a: string, b: string) => a.trim().toUpperCase() === b.trim().toUpperCase();

/**
 * Read-only view of the reference data, loaded once per report.
 * Lookups are synchronous so parsing never waits on I/O.
 */
export class CatalogSnapshot {
  constructor(private readonly data: CatalogData) {}

  get settings(): Settings {
    return this.data.settings;
  }

  get exclusions(): readonly string[] {
    return this.data.exclusions;
  }

  projectsByCode(code: string): Project[] {
    return this.data.projects.filter((p) => sameCode(p.code, code));
  }

  findPhase(projectId: number, code: string): Phase | undefined {
    return this.data.phases.find((ph) => ph.projectId === projectId && sameCode(ph.code, code));
  }

  findTask(projectId: number, phaseId: number, code: string): Task | undefined {
    return this.data.tasks.find(
      (t) =>
        t.projectId === projectId &&
        (t.phaseId === undefined || t.phaseId === phaseId) &&
        sameCode(t.code, code)
    );
  }

  norm(year: number, month: number): Norm | undefined {
    return this.data.norms.find((n) => n.year === year && n.month === month);
  }
}
