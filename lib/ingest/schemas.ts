import { z } from "zod";
import { MISSING_MARKERS } from "@/lib/config";
import { parseCalendarDate } from "./dates";

// Helpers
function isMissing(v: unknown): boolean {
  if (v === null || v === undefined) return true;
  return MISSING_MARKERS.has(String(v).trim().toLowerCase());
}

const toNum = z
  .unknown()
  .refine((v) => !isMissing(v), { message: "missing value" })
  .transform((v) => (typeof v === "number" ? v : Number(String(v).trim())))
  .pipe(z.number().finite());

const toDate = z
  .unknown()
  .refine((v) => !isMissing(v), { message: "missing value" })
  .transform((v, ctx) => {
    const d = parseCalendarDate(String(v));
    if (!d) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unparseable date "${String(v).trim()}"` });
      return z.NEVER;
    }
    return d;
  });

// Kept verbatim: categories are compared by exact string equality
const toOptStr = z
  .unknown()
  .transform((v) => (isMissing(v) ? null : String(v)));

// Row schema after header normalization and aliasing
export const ObservationCsvSchema = z.object({
  terrestrial_date: toDate,
  min_temp: toNum,
  max_temp: toNum,
  pressure: toNum,
  ls: toNum,
  atmospheric_opacity: toOptStr,
});

export type ObservationCsv = z.infer<typeof ObservationCsvSchema>;
