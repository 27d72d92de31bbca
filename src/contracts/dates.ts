// /src/contracts/dates.ts
import { z } from "zod";
import { isValid, parseISO, startOfDay } from "date-fns";

/**
 * Calendar date (no time of day). Accepts a Date or an ISO string and yields
 * a local-midnight Date, so "2024-03-15" means March 15 in the server's zone.
 */
export const CalendarDateSchema = z.union([z.date(), z.string().min(1)]).transform((value, ctx) => {
  const d = typeof value === "string" ? parseISO(value) : value;
  if (!isValid(d)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Invalid calendar date" });
    return z.NEVER;
  }
  return startOfDay(d);
});

/** Point in time. ISO strings without an offset are read as local time. */
export const TimestampSchema = z.union([z.date(), z.string().min(1)]).transform((value, ctx) => {
  const d = typeof value === "string" ? parseISO(value) : value;
  if (!isValid(d)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Invalid timestamp" });
    return z.NEVER;
  }
  return d;
});
