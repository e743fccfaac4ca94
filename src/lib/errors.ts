// src/lib/errors.ts

export type Collaborator = "calendar" | "catalog" | "export";

/** I/O failure in something we depend on; fatal for the current report only. */
export class UpstreamError extends Error {
  readonly collaborator: Collaborator;

  constructor(collaborator: Collaborator, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "UpstreamError";
    this.collaborator = collaborator;
  }
}

/** The caller asked for something we cannot resolve (bad or missing parameters). */
export class ReportRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ReportRequestError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
