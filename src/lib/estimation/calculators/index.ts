// /src/lib/estimation/calculators/index.ts
export * from "./postMigration";
export * from "./storageMigration";
