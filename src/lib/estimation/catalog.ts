// /src/lib/estimation/catalog.ts
import { CALCULATOR_IDS, type Calculator, type CalculatorId } from "../../contracts";
import { createPostMigrationTroubleshooting, createStorageMigration } from "./calculators";
import type { EstimationConfig } from "./config";

export type CalculatorCatalog = Readonly<Record<CalculatorId, Calculator>>;

export type CalculatorDescription = {
  id: CalculatorId;
  name: string;
  keys: readonly string[];
};

export function createCalculatorCatalog(
  config: EstimationConfig = { postMigration: {}, storageMigration: {} },
): CalculatorCatalog {
  return {
    post_migration_troubleshooting: createPostMigrationTroubleshooting(config.postMigration),
    storage_migration: createStorageMigration(config.storageMigration),
  };
}

export function describeCalculators(catalog: CalculatorCatalog): CalculatorDescription[] {
  return CALCULATOR_IDS.map((id) => ({
    id,
    name: catalog[id].name(),
    keys: catalog[id].keys(),
  }));
}
