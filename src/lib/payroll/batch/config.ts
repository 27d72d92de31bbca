// /src/lib/payroll/batch/config.ts
// Run parameters for the command-line payroll batch, read from the environment.

import { z } from "zod";

import { PayrollConfigError, zodIssues } from "../errors";

const BooleanFlagSchema = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((v) => v === "true" || v === "1" || v === "yes");

const BatchEnvSchema = z.object({
  PAYROLL_ROSTER_FILE: z.string().min(1),
  PAYROLL_OUTPUT_FILE: z.string().min(1).optional(),
  PAYROLL_MONTH: z.coerce.number().int().min(1).max(12).optional(),
  PAYROLL_YEAR: z.coerce.number().int().min(1900).max(9999).optional(),
  PAYROLL_TENANT_ID: z.string().min(1).optional(),
  PAYROLL_DRY_RUN: BooleanFlagSchema.optional(),
});

export type BatchConfig = {
  rosterFile: string;
  outputFile: string | null;
  referenceMonth: number;
  referenceYear: number;
  tenantId: string | null;
  dryRun: boolean;
};

function ensureEnv(env: NodeJS.ProcessEnv, name: string): string {
  const v = env[name];
  if (!v) throw new PayrollConfigError(`Missing required env var: ${name}`);
  return v;
}

/** Month and year default to those of `now`; empty variables count as unset. */
export function loadBatchConfig(env: NodeJS.ProcessEnv = process.env, now: Date = new Date()): BatchConfig {
  ensureEnv(env, "PAYROLL_ROSTER_FILE");

  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ""));
  const parsed = BatchEnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new PayrollConfigError("Invalid payroll batch environment.", zodIssues(parsed.error));
  }

  const e = parsed.data;
  return {
    rosterFile: e.PAYROLL_ROSTER_FILE,
    outputFile: e.PAYROLL_OUTPUT_FILE ?? null,
    referenceMonth: e.PAYROLL_MONTH ?? now.getMonth() + 1,
    referenceYear: e.PAYROLL_YEAR ?? now.getFullYear(),
    tenantId: e.PAYROLL_TENANT_ID ?? null,
    dryRun: e.PAYROLL_DRY_RUN ?? false,
  };
}
