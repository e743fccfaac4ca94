// src/schemas/report.schema.ts
import { z } from "zod";

const IsoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Dates must look like YYYY-MM-DD");

export const ReportBody = z
  .object({
    report_type: z.enum(["status", "week", "month", "custom"]).default("status"),
    start_date: IsoDate.optional(),
    end_date: IsoDate.optional(),
    export: z.boolean().default(false),
  })
  .superRefine((body, ctx) => {
    if (body.report_type !== "custom") return;
    for (const key of ["start_date", "end_date"] as const) {
      if (!body[key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: "start_date and end_date required for custom report",
        });
      }
    }
  });

export type ReportBodyInput = z.infer<typeof ReportBody>;
