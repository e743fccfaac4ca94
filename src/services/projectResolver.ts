// src/services/projectResolver.ts
import type { Project } from "../types/catalog";
import type { CatalogSnapshot } from "./catalogSnapshot";

export type ProjectResolver = (code: string) => Project[];

/**
 * All active projects registered under `code`, richest structure first (3, 2, 1).
 * Ties keep catalog order.
 */
export function createProjectResolver(catalog: CatalogSnapshot): ProjectResolver {
  return (code: string) =>
    catalog
      .projectsByCode(code)
      .filter((p) => p.isActive)
      .sort((a, b) => b.structureLevel - a.structureLevel);
}
