/**
 * Monthly payroll batch runner.
 *
 *   PAYROLL_ROSTER_FILE=scripts/roster.example.json npm run payroll:run
 *
 * Env:
 * - PAYROLL_ROSTER_FILE (required): JSON array of employee snapshots
 * - PAYROLL_OUTPUT_FILE: JSON file the benefit records are appended to
 *   (without it, records are only printed)
 * - PAYROLL_MONTH / PAYROLL_YEAR: reference month (defaults to the current one)
 * - PAYROLL_TENANT_ID: only process this tenant's employees
 * - PAYROLL_DRY_RUN=true: compute without saving
 */

import { readFile } from "node:fs/promises";
import { format } from "date-fns";

import { InMemoryBenefitStore, JsonFileBenefitStore, loadBatchConfig, runPayrollBatch } from "../src/lib/payroll";

async function main() {
  const config = loadBatchConfig();

  const roster: unknown = JSON.parse(await readFile(config.rosterFile, "utf8"));
  if (!Array.isArray(roster)) {
    throw new Error(`${config.rosterFile} must contain a JSON array of employees.`);
  }

  const store = config.outputFile ? new JsonFileBenefitStore(config.outputFile) : new InMemoryBenefitStore();

  const result = await runPayrollBatch({
    employees: roster,
    referenceMonth: config.referenceMonth,
    referenceYear: config.referenceYear,
    tenantId: config.tenantId,
    dryRun: config.dryRun,
    store,
  });

  console.log("----");
  console.log(`Reference date: ${format(result.referenceDate, "yyyy-MM-dd")}`);
  for (const r of result.records) {
    console.log(`${r.employeeId}\t${r.type}\t${r.category}\t${r.value.toFixed(2)}`);
  }
  for (const f of result.failures) {
    console.log(`FAILED #${f.index} ${f.employeeId ?? "?"}: ${f.error.message}`);
    for (const issue of f.error.issues ?? []) console.log(`  ${issue.path}: ${issue.message}`);
  }

  if (result.failures.length > 0) process.exitCode = 1;
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
