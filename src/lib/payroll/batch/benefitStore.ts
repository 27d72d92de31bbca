// /src/lib/payroll/batch/benefitStore.ts
/**
 * Persistence port for the payroll batch. The batch only needs to know
 * whether an employee already has records for a reference month, and to save
 * a month's records for one employee at a time.
 */

import { readFile, writeFile } from "node:fs/promises";
import { format } from "date-fns";
import { z } from "zod";

import { BenefitRecordSchema, type BenefitRecord } from "@/contracts/benefits";
import { BenefitStoreError, zodIssues } from "../errors";

export interface BenefitStore {
  hasRecords(employeeId: string, referenceDate: Date): Promise<boolean>;
  saveRecords(records: readonly BenefitRecord[]): Promise<void>;
  listRecords(): Promise<BenefitRecord[]>;
}

function monthKey(employeeId: string, referenceDate: Date): string {
  return `${employeeId}:${format(referenceDate, "yyyy-MM")}`;
}

export class InMemoryBenefitStore implements BenefitStore {
  // Map<employeeId:yyyy-MM, records>
  protected readonly byMonth = new Map<string, BenefitRecord[]>();

  async hasRecords(employeeId: string, referenceDate: Date): Promise<boolean> {
    return (this.byMonth.get(monthKey(employeeId, referenceDate))?.length ?? 0) > 0;
  }

  async saveRecords(records: readonly BenefitRecord[]): Promise<void> {
    for (const r of records) {
      const key = monthKey(r.employeeId, r.referenceDate);
      const existing = this.byMonth.get(key) ?? [];
      this.byMonth.set(key, [...existing, r]);
    }
  }

  async listRecords(): Promise<BenefitRecord[]> {
    return [...this.byMonth.values()].flat();
  }
}

const StoredRecordsSchema = z.array(BenefitRecordSchema);

/**
 * JSON-file store for the command-line runner. Loads the file on first use
 * (a missing file is an empty store) and rewrites it after every save.
 */
export class JsonFileBenefitStore extends InMemoryBenefitStore {
  private loaded = false;

  constructor(private readonly filePath: string) {
    super();
  }

  /** Marked loaded only once the whole file has parsed; a failed load is retried on the next call. */
  private async load(): Promise<void> {
    if (this.loaded) return;

    let text: string;
    try {
      text = await readFile(this.filePath, "utf8");
    } catch (err) {
      if (typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT") {
        this.loaded = true;
        return;
      }
      throw new BenefitStoreError(`Could not read benefit records from ${this.filePath}.`, [], { cause: err });
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      throw new BenefitStoreError(`${this.filePath} is not valid JSON.`, [], { cause: err });
    }

    const parsed = StoredRecordsSchema.safeParse(json);
    if (!parsed.success) {
      throw new BenefitStoreError(
        `${this.filePath} holds records that do not match the expected format.`,
        zodIssues(parsed.error),
      );
    }

    await super.saveRecords(parsed.data);
    this.loaded = true;
  }

  async hasRecords(employeeId: string, referenceDate: Date): Promise<boolean> {
    await this.load();
    return super.hasRecords(employeeId, referenceDate);
  }

  async saveRecords(records: readonly BenefitRecord[]): Promise<void> {
    await this.load();
    await super.saveRecords(records);

    const all = await super.listRecords();
    const serialized = all.map((r) => ({ ...r, referenceDate: format(r.referenceDate, "yyyy-MM-dd") }));
    await writeFile(this.filePath, `${JSON.stringify(serialized, null, 2)}\n`, "utf8");
  }

  async listRecords(): Promise<BenefitRecord[]> {
    await this.load();
    return super.listRecords();
  }
}
