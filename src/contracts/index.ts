// /src/contracts/index.ts
/**
 * Contracts - Single Source of Truth
 *
 * Boundary shapes exchanged with the HR system and the payroll batch.
 * Engines import their input types from here; do not redefine them locally.
 */

export * from "./dates";

// Employee snapshot + salary history
export * from "./employee";

// Time clock punches
export * from "./timeClock";

// Leave requests
export * from "./vacation";

// Batch output rows
export * from "./benefits";
