// src/clients/catalogStore.ts
// Reference data (projects, phases, tasks, exclusions, norms, settings) kept
// in a JSON file maintained by the admin tooling. Re-read on every report so
// edits show up without a restart.
import { readFile } from "node:fs/promises";

import { CatalogDataSchema } from "../types/catalog";
import { UpstreamError, errorMessage } from "../lib/errors";
import { CatalogSnapshot } from "../services/catalogSnapshot";

export interface CatalogStore {
  load(): Promise<CatalogSnapshot>;
}

export function createJsonCatalogStore(filePath: string): CatalogStore {
  return {
    async load() {
      let json: unknown;
      try {
        json = JSON.parse(await readFile(filePath, "utf8"));
      } catch (err) {
        throw new UpstreamError("catalog", `cannot read ${filePath}: ${errorMessage(err)}`, { cause: err });
      }

      const parsed = CatalogDataSchema.safeParse(json);
      if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
        throw new UpstreamError("catalog", `invalid catalog ${filePath}: ${issues}`);
      }
      return new CatalogSnapshot(parsed.data);
    },
  };
}

/** In-memory store, for tests and embedding. */
export function createStaticCatalogStore(snapshot: CatalogSnapshot): CatalogStore {
  return { load: async () => snapshot };
}
