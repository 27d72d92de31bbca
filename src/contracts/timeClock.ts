// /src/contracts/timeClock.ts
import { z } from "zod";
import { TimestampSchema } from "./dates";

export const CLOCK_EVENT_KINDS = ["entry", "exit", "break_start", "break_end"] as const;

export type ClockEventKind = typeof CLOCK_EVENT_KINDS[number];

export const ClockEventKindSchema = z.enum(CLOCK_EVENT_KINDS);

/** One punch on the time clock. A day's worked time is derived from its ordered events. */
export const ClockEventSchema = z
  .object({
    timestamp: TimestampSchema,
    kind: ClockEventKindSchema,
  })
  .strict();

export type ClockEvent = z.infer<typeof ClockEventSchema>;

/** Kinds that open a worked interval. */
export function isClockIn(kind: ClockEventKind): boolean {
  return kind === "entry" || kind === "break_end";
}
