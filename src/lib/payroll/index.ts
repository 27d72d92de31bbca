// /src/lib/payroll/index.ts
/**
 * Public exports for the deterministic payroll engine.
 * - Pure calculators take rule sets as parameters
 * - No I/O outside batch/
 */

export * from "./money";
export * from "./errors";
export * from "./payrollTables";
export * from "./brackets";
export * from "./contribution";
export * from "./severancePool";
export * from "./incomeTax";
export * from "./payslip";
export * from "./vacation";
export * from "./thirteenth";
export * from "./timeBank";
export * from "./laborCost";
export * from "./validators";
export * from "./salaryHistory";
export * from "./batch/benefitStore";
export * from "./batch/runPayrollBatch";
export * from "./batch/config";
