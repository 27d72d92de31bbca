// /src/contracts/benefits.ts
/**
 * Benefit/discount rows emitted by the payroll batch, one per statutory
 * charge per employee per reference month.
 */

import { z } from "zod";
import { CalendarDateSchema } from "./dates";

export const BENEFIT_TYPES = ["INSS", "FGTS", "IRRF"] as const;
export type BenefitType = typeof BENEFIT_TYPES[number];

export const BenefitCategorySchema = z.enum(["discount", "benefit"]);
export type BenefitCategory = z.infer<typeof BenefitCategorySchema>;

export const BenefitRecordSchema = z
  .object({
    employeeId: z.string().min(1),
    tenantId: z.string().min(1).nullable(),
    type: z.enum(BENEFIT_TYPES),
    category: BenefitCategorySchema,
    value: z.number().positive(),
    referenceDate: CalendarDateSchema,
    recurring: z.boolean(),
    notes: z.string(),
  })
  .strict();

export type BenefitRecord = z.infer<typeof BenefitRecordSchema>;

/** INSS and IRRF are withheld from the employee; FGTS is an employer deposit. */
export const BENEFIT_CATEGORY_BY_TYPE: Record<BenefitType, BenefitCategory> = {
  INSS: "discount",
  FGTS: "benefit",
  IRRF: "discount",
};
