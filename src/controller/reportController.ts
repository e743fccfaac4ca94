// controllers/reportController.ts
import type { Request, Response } from "express";

import { ReportBody } from "../schemas/report.schema";
import { sendOk, sendErr } from "../lib/http";
import { errorMessage } from "../lib/errors";
import { createLogger } from "../lib/logger";
import type { ReportRequest, ReportService } from "../services/reportService";
import type { ExportLookup } from "../services/exportService";
import { isReportError } from "../types/report";

const log = createLogger("http");

export type ReportController = {
  postReport(req: Request, res: Response): Promise<Response>;
  getStatus(req: Request, res: Response): Promise<Response>;
  getExport(req: Request, res: Response): Promise<Response | void>;
};

export function createReportController(service: ReportService, exports?: ExportLookup): ReportController {
  async function run(res: Response, request: ReportRequest) {
    try {
      const result = await service.generateReport(request);
      if (isReportError(result)) {
        const status = result.code === "E_BAD_INPUT" ? 422 : 502;
        return sendErr(res, result.code, result.error, undefined, status);
      }
      return sendOk(res, result);
    } catch (e) {
      log.error("report failed:", e);
      return sendErr(res, "E_INTERNAL", errorMessage(e) || "Report failed", undefined, 500);
    }
  }

  //post report
  async function postReport(req: Request, res: Response) {
    const parsed = ReportBody.safeParse(req.body ?? {});
    if (!parsed.success) {
      return sendErr(res, "E_BAD_INPUT", "Invalid body", parsed.error.flatten(), 422);
    }

    const body = parsed.data;
    return run(res, {
      reportType: body.report_type,
      startDate: body.start_date,
      endDate: body.end_date,
      export: body.export,
    });
  }

  async function getStatus(_req: Request, res: Response) {
    return run(res, { reportType: "status" });
  }

  async function getExport(req: Request, res: Response) {
    const stored = exports?.find(req.params.id ?? "");
    if (!stored) {
      return sendErr(res, "E_NOT_FOUND", "Export not found or expired", undefined, 404);
    }
    res.download(stored.filePath, stored.filename, (err) => {
      if (err && !res.headersSent) {
        log.error(`download ${stored.id} failed:`, err.message);
        sendErr(res, "E_NOT_FOUND", "Export file is gone", undefined, 404);
      }
    });
  }

  return { postReport, getStatus, getExport };
}
