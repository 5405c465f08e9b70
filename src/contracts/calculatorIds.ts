// /src/contracts/calculatorIds.ts
/**
 * Canonical list of calculator IDs.
 *
 * Used by the catalog (lib/estimation/catalog.ts) and the estimate route.
 * Keep in sync with createCalculatorCatalog().
 */

import { z } from "zod";

export const CALCULATOR_IDS = ["post_migration_troubleshooting", "storage_migration"] as const;

export type CalculatorId = typeof CALCULATOR_IDS[number];

/**
 * Zod schema for calculator IDs (for request validation).
 */
export const CalculatorIdSchema = z.enum(CALCULATOR_IDS);

