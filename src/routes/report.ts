// src/routes/report.ts
import { Router } from "express";

import type { ReportController } from "../controller/reportController";

/**
 * POST /api/report              { report_type, start_date?, end_date?, export? }
 * GET  /api/report/status       week-to-date + month-to-date shorthand
 * GET  /api/report/exports/:id  spreadsheet produced by an earlier export
 *
 * Responds with { ok, data } or { ok:false, error }
 */
export function createReportRouter(controller: ReportController): Router {
  const router = Router();
  router.post("/", controller.postReport);
  router.get("/status", controller.getStatus);
  router.get("/exports/:id", controller.getExport);
  return router;
}
