// src/app.ts
import express from "express";
import cors from "cors";

import { createReportController } from "./controller/reportController";
import { createReportRouter } from "./routes/report";
import type { ReportService } from "./services/reportService";
import type { ExportLookup } from "./services/exportService";

export type AppDeps = {
  reportService: ReportService;
  exports?: ExportLookup;
};

export function createApp({ reportService, exports }: AppDeps) {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));

  app.get("/api/healthz", (_req, res) => res.json({ ok: true }));

  app.use("/api/report", createReportRouter(createReportController(reportService, exports)));

  return app;
}
