// src/lib/http.ts
// Response envelope shared by every controller:
//   { ok: true, data }  or  { ok: false, error: { code, message, details } }
import type { Response } from "express";

export type ErrorCode = "E_BAD_INPUT" | "E_UPSTREAM" | "E_NOT_FOUND" | "E_INTERNAL";

export function sendOk<T>(res: Response, data: T, status = 200) {
  return res.status(status).json({ ok: true, data });
}

export function sendErr(
  res: Response,
  code: ErrorCode,
  message: string,
  details?: unknown,
  status = 400
) {
  return res.status(status).json({ ok: false, error: { code, message, details } });
}
