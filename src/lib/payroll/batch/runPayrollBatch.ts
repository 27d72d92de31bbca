// /src/lib/payroll/batch/runPayrollBatch.ts
/**
 * Monthly payroll batch: for every active employee, compute pension
 * contribution, severance pool and income tax on the current salary and
 * persist them as benefit/discount records for the reference month.
 *
 * - Re-runnable: employees that already have records for the month are skipped.
 * - Dry run: computes and logs, persists nothing.
 * - One employee's bad record is reported in `failures`; the rest proceed.
 * - An invalid reference period or a failing store aborts the run.
 */

import { isAfter, isBefore, lastDayOfMonth } from "date-fns";
import { z } from "zod";

import {
  BENEFIT_CATEGORY_BY_TYPE,
  EmployeeSnapshotSchema,
  type BenefitRecord,
  type BenefitType,
  type EmployeeSnapshot,
} from "@/contracts";
import { PayrollConfigError, toBatchError, zodIssues, type BatchError } from "../errors";
import { roundMoney, type Money } from "../money";
import { getPayrollRules, type PayrollRuleSet } from "../payrollTables";
import { calculatePayslip } from "../payslip";
import { resolveCurrentSalary } from "../salaryHistory";
import type { BenefitStore } from "./benefitStore";

export type BatchLogger = Pick<Console, "log" | "warn" | "error">;

export type PayrollBatchParams = {
  /** Raw employee records; each is validated on its own. */
  employees: readonly unknown[];
  referenceMonth: number;
  referenceYear: number;
  tenantId?: string | null;
  dryRun?: boolean;
  /** Defaults to the rule set in force on the reference date. */
  rules?: PayrollRuleSet;
  store: BenefitStore;
  logger?: BatchLogger;
};

export type EmployeePayrollSummary = {
  employeeId: string;
  salary: Money;
  contribution: Money;
  severancePool: Money;
  incomeTax: Money;
  netSalary: Money;
  records: BenefitRecord[];
};

export type SkippedEmployee = {
  employeeId: string;
  reason: "inactive" | "already_processed";
};

export type FailedEmployee = {
  index: number;
  employeeId: string | null;
  error: BatchError;
};

export type PayrollBatchResult = {
  referenceDate: Date;
  dryRun: boolean;
  processed: EmployeePayrollSummary[];
  skipped: SkippedEmployee[];
  failures: FailedEmployee[];
  /** Records persisted (or that would be persisted, on a dry run). */
  records: BenefitRecord[];
};

function rawEmployeeId(raw: unknown): string | null {
  if (typeof raw === "object" && raw !== null && "employeeId" in raw && typeof raw.employeeId === "string") {
    return raw.employeeId;
  }
  return null;
}

function isActiveIn(employee: EmployeeSnapshot, monthStart: Date, monthEnd: Date): boolean {
  if (isAfter(employee.admissionDate, monthEnd)) return false;
  return employee.terminationDate === null || !isBefore(employee.terminationDate, monthStart);
}

export function buildBenefitRecords(
  employee: Pick<EmployeeSnapshot, "employeeId" | "tenantId" | "dependentCount">,
  salary: Money,
  referenceDate: Date,
  rules: PayrollRuleSet,
): { summary: Omit<EmployeePayrollSummary, "records">; records: BenefitRecord[] } {
  const slip = calculatePayslip({ baseSalary: salary, dependentCount: employee.dependentCount }, rules);

  const lines: Array<{ type: BenefitType; value: Money; notes: string }> = [
    {
      type: "INSS",
      value: slip.contribution.amount,
      notes: `Effective rate: ${slip.contribution.effectiveRate}%`,
    },
    {
      type: "FGTS",
      value: slip.severancePool.amount,
      notes: `Rate: ${slip.severancePool.rate}%`,
    },
    {
      type: "IRRF",
      value: slip.incomeTax.tax,
      notes: `Rate: ${slip.incomeTax.marginalRate}% - Dependents: ${employee.dependentCount}`,
    },
  ];

  const records = lines
    .filter((l) => l.value > 0)
    .map(
      (l): BenefitRecord => ({
        employeeId: employee.employeeId,
        tenantId: employee.tenantId,
        type: l.type,
        category: BENEFIT_CATEGORY_BY_TYPE[l.type],
        value: l.value,
        referenceDate,
        recurring: true,
        notes: l.notes,
      }),
    );

  return {
    summary: {
      employeeId: employee.employeeId,
      salary: roundMoney(salary),
      contribution: slip.contribution.amount,
      severancePool: slip.severancePool.amount,
      incomeTax: slip.incomeTax.tax,
      netSalary: slip.netSalary,
    },
    records,
  };
}

const ReferencePeriodSchema = z.object({
  referenceMonth: z.number().int().min(1).max(12),
  referenceYear: z.number().int().min(1900).max(9999),
});

/** Store errors propagate and abort the run; only per-employee errors land in `failures`. */
export async function runPayrollBatch(params: PayrollBatchParams): Promise<PayrollBatchResult> {
  const logger = params.logger ?? console;
  const dryRun = params.dryRun ?? false;

  const period = ReferencePeriodSchema.safeParse({
    referenceMonth: params.referenceMonth,
    referenceYear: params.referenceYear,
  });
  if (!period.success) {
    throw new PayrollConfigError("Invalid payroll reference period.", zodIssues(period.error));
  }
  const { referenceMonth, referenceYear } = period.data;

  const referenceDate = new Date(referenceYear, referenceMonth - 1, 1);
  const monthEnd = lastDayOfMonth(referenceDate);
  const rules = params.rules ?? getPayrollRules(referenceDate);

  const label = `${String(referenceMonth).padStart(2, "0")}/${referenceYear}`;
  logger.log(`Calculating payroll for ${label} (rules ${rules.label})`);
  if (dryRun) logger.warn("DRY RUN - nothing will be saved");

  const result: PayrollBatchResult = {
    referenceDate,
    dryRun,
    processed: [],
    skipped: [],
    failures: [],
    records: [],
  };

  const fail = (index: number, raw: unknown, err: unknown): void => {
    const error = toBatchError(err);
    const employeeId = rawEmployeeId(raw);
    logger.error(`  Failed employee #${index} (${employeeId ?? "unknown"}): ${error.message}`);
    result.failures.push({ index, employeeId, error });
  };

  for (const [index, raw] of params.employees.entries()) {
    const parsed = EmployeeSnapshotSchema.safeParse(raw);
    if (!parsed.success) {
      fail(index, raw, parsed.error);
      continue;
    }
    const employee = parsed.data;

    if (params.tenantId && employee.tenantId !== params.tenantId) continue;

    if (!isActiveIn(employee, referenceDate, monthEnd)) {
      result.skipped.push({ employeeId: employee.employeeId, reason: "inactive" });
      continue;
    }

    if (!dryRun && (await params.store.hasRecords(employee.employeeId, referenceDate))) {
      logger.warn(`  Records already exist for ${employee.employeeId} in ${label}`);
      result.skipped.push({ employeeId: employee.employeeId, reason: "already_processed" });
      continue;
    }

    let built: ReturnType<typeof buildBenefitRecords>;
    try {
      const salary = resolveCurrentSalary(employee.baseSalary, employee.salaryHistory, monthEnd);
      logger.log(`Processing: ${employee.employeeId} - ${salary.toFixed(2)}`);
      built = buildBenefitRecords(employee, salary, referenceDate, rules);
    } catch (err) {
      fail(index, raw, err);
      continue;
    }

    const { summary, records } = built;
    logger.log(`  INSS: ${summary.contribution.toFixed(2)}`);
    logger.log(`  FGTS: ${summary.severancePool.toFixed(2)}`);
    logger.log(`  IRRF: ${summary.incomeTax.toFixed(2)}`);

    if (!dryRun && records.length > 0) {
      await params.store.saveRecords(records);
    }

    result.processed.push({ ...summary, records });
    result.records.push(...records);
  }

  logger.log(
    `Done: ${result.processed.length} processed, ${result.skipped.length} skipped, ${result.failures.length} failed`,
  );

  return result;
}
