// /src/contracts/vacation.ts
import { z } from "zod";
import { CalendarDateSchema } from "./dates";

export const MAX_VACATION_DAYS = 30;
export const MAX_CASH_OUT_DAYS = 10;

/**
 * A requested leave period. Range limits are not enforced here so a request
 * can be parsed and then reported on by validateVacationRequest.
 */
export const VacationRequestSchema = z
  .object({
    acquisitionStart: CalendarDateSchema,
    acquisitionEnd: CalendarDateSchema,
    start: CalendarDateSchema,
    end: CalendarDateSchema,
    daysTaken: z.number().int(),
    cashOutDays: z.number().int().default(0),
  })
  .strict();

export type VacationRequest = z.infer<typeof VacationRequestSchema>;
