// /src/contracts/employee.ts
/**
 * Employee records supplied by the HR system.
 *
 * Calculators only ever see these as immutable snapshots; the HR system owns
 * the records and the salary history.
 */

import { z } from "zod";
import { CalendarDateSchema } from "./dates";

export const SalaryHistoryEntrySchema = z
  .object({
    effectiveDate: CalendarDateSchema,
    amount: z.number().min(0),
    reason: z.string().default(""),
  })
  .strict();

export type SalaryHistoryEntry = z.infer<typeof SalaryHistoryEntrySchema>;
export type SalaryHistoryEntryInput = z.input<typeof SalaryHistoryEntrySchema>;

export const EmployeeSnapshotSchema = z
  .object({
    employeeId: z.string().min(1),
    tenantId: z.string().min(1).nullable().default(null),
    fullName: z.string().optional(),
    baseSalary: z.number().min(0),
    dependentCount: z.number().int().min(0),
    admissionDate: CalendarDateSchema,
    terminationDate: CalendarDateSchema.nullable().default(null),
    birthDate: CalendarDateSchema.optional(),
    nationalId: z.string().optional(),
    salaryHistory: z.array(SalaryHistoryEntrySchema).default([]),
  })
  .strict()
  .refine((e) => e.terminationDate === null || e.terminationDate.getTime() >= e.admissionDate.getTime(), {
    message: "terminationDate must not precede admissionDate",
    path: ["terminationDate"],
  });

export type EmployeeSnapshot = z.infer<typeof EmployeeSnapshotSchema>;
export type EmployeeSnapshotInput = z.input<typeof EmployeeSnapshotSchema>;
