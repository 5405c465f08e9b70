// /src/contracts/index.ts
/**
 * Contracts - single source of truth for types shared between
 * the calculators, the catalog and the API route.
 */

export * from "./estimation";
export * from "./calculatorIds";
