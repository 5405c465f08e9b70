// /src/lib/estimation/index.ts
/**
 * Public exports for the migration time estimators.
 * - No I/O
 * - No HTTP
 */

export * from "./calculators";
export * from "./catalog";
export * from "./config";
export * from "./errors";
export * from "./format";
export * from "./params";
export * from "./runEstimation";
