import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";

import type { BenefitRecord } from "@/contracts/benefits";
import { BenefitStoreError } from "../errors";
import { InMemoryBenefitStore, JsonFileBenefitStore } from "./benefitStore";

function record(overrides: Partial<BenefitRecord> = {}): BenefitRecord {
  return {
    employeeId: "emp-1",
    tenantId: null,
    type: "FGTS",
    category: "benefit",
    value: 240,
    referenceDate: new Date(2024, 5, 1),
    recurring: true,
    notes: "Rate: 8%",
    ...overrides,
  };
}

describe("InMemoryBenefitStore", () => {
  it("tracks records per employee and month", async () => {
    const store = new InMemoryBenefitStore();
    await store.saveRecords([record()]);

    expect(await store.hasRecords("emp-1", new Date(2024, 5, 20))).toBe(true);
    expect(await store.hasRecords("emp-1", new Date(2024, 6, 1))).toBe(false);
    expect(await store.hasRecords("emp-2", new Date(2024, 5, 1))).toBe(false);
  });
});

describe("JsonFileBenefitStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "payroll-store-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("treats a missing file as empty", async () => {
    const store = new JsonFileBenefitStore(join(dir, "records.json"));
    expect(await store.listRecords()).toEqual([]);
  });

  it("persists records across instances", async () => {
    const file = join(dir, "records.json");
    const contribution = record({ type: "INSS", category: "discount", value: 258.82 });
    await new JsonFileBenefitStore(file).saveRecords([record(), contribution]);

    const reopened = new JsonFileBenefitStore(file);
    expect(await reopened.hasRecords("emp-1", new Date(2024, 5, 1))).toBe(true);
    expect(await reopened.listRecords()).toEqual([record(), contribution]);

    const stored: unknown = JSON.parse(await readFile(file, "utf8"));
    expect(stored).toEqual([
      { ...record(), referenceDate: "2024-06-01" },
      { ...contribution, referenceDate: "2024-06-01" },
    ]);
  });

  it("appends to records already on disk", async () => {
    const file = join(dir, "records.json");
    await new JsonFileBenefitStore(file).saveRecords([record()]);
    await new JsonFileBenefitStore(file).saveRecords([record({ employeeId: "emp-2" })]);

    expect((await new JsonFileBenefitStore(file).listRecords()).map((r) => r.employeeId)).toEqual(["emp-1", "emp-2"]);
  });

  it("leaves a file it cannot parse untouched", async () => {
    const file = join(dir, "records.json");
    const original = `${JSON.stringify([{ ...record({ employeeId: "emp-0" }), referenceDate: "2024-05-01", extra: 1 }])}\n`;
    await writeFile(file, original, "utf8");

    const store = new JsonFileBenefitStore(file);
    await expect(store.saveRecords([record()])).rejects.toBeInstanceOf(BenefitStoreError);
    await expect(store.hasRecords("emp-1", new Date(2024, 5, 1))).rejects.toBeInstanceOf(BenefitStoreError);

    expect(await readFile(file, "utf8")).toBe(original);
  });

  it("reports the schema issues of a bad file", async () => {
    const file = join(dir, "records.json");
    await writeFile(file, JSON.stringify([{ ...record(), referenceDate: "2024-06-01", value: -1 }]), "utf8");

    try {
      await new JsonFileBenefitStore(file).listRecords();
      throw new Error("expected a store error");
    } catch (err) {
      expect(err).toBeInstanceOf(BenefitStoreError);
      if (err instanceof BenefitStoreError) expect(err.issues.map((i) => i.path)).toEqual(["0.value"]);
    }
  });

  it("rejects a file that is not JSON", async () => {
    const file = join(dir, "records.json");
    await writeFile(file, "not json", "utf8");

    await expect(new JsonFileBenefitStore(file).listRecords()).rejects.toThrow(`${file} is not valid JSON.`);
    expect(await readFile(file, "utf8")).toBe("not json");
  });
});
