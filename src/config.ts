// src/config.ts
// Process configuration from the environment (load .env first via `import "dotenv/config"`).
import { z } from "zod";

import type { LogLevel } from "./lib/logger";
import type { ExclusionMode } from "./services/exclusionMatcher";

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  CATALOG_PATH: z.string().min(1).default("data/catalog.json"),
  GOOGLE_CALENDAR_BASE_URL: z.string().url().default("https://www.googleapis.com/calendar/v3"),
  GOOGLE_ACCESS_TOKEN: z.string().optional(),
  EXPORT_DIR: z.string().min(1).default("exports"),
  EXPORT_TTL_MINUTES: z.coerce.number().int().positive().default(60),
  EXCLUSION_MATCH: z.enum(["exact", "contains"]).default("exact"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
});

export type AppConfig = {
  port: number;
  catalogPath: string;
  calendarBaseUrl: string;
  accessToken?: string;
  exportDir: string;
  exportTtlMinutes: number;
  exclusionMode: ExclusionMode;
  logLevel: LogLevel;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    catalogPath: e.CATALOG_PATH,
    calendarBaseUrl: e.GOOGLE_CALENDAR_BASE_URL.replace(/\/+$/, ""),
    accessToken: e.GOOGLE_ACCESS_TOKEN || undefined,
    exportDir: e.EXPORT_DIR,
    exportTtlMinutes: e.EXPORT_TTL_MINUTES,
    exclusionMode: e.EXCLUSION_MATCH,
    logLevel: e.LOG_LEVEL,
  };
}
