// /src/lib/estimation/config.ts
import { z } from "zod";

import type { PostMigrationTroubleshootingOptions, StorageMigrationOptions } from "./calculators";

/**
 * Calculator defaults can be tuned per deployment via env vars.
 * Unset (or empty) vars keep the built-in defaults.
 */
export const ESTIMATION_ENV_VARS = {
  troubleshootMinsPerVM: "ESTIMATION_TROUBLESHOOT_MINS_PER_VM",
  engineerCount: "ESTIMATION_POST_MIGRATION_ENGINEERS",
  workHoursPerDay: "ESTIMATION_WORK_HOURS_PER_DAY",
  transferRateMbps: "ESTIMATION_TRANSFER_RATE_MBPS",
} as const;

export type EstimationConfig = {
  postMigration: PostMigrationTroubleshootingOptions;
  storageMigration: StorageMigrationOptions;
};

type Env = Readonly<Record<string, string | undefined>>;

const NumberFromEnvSchema = z.coerce.number().finite();
const IntegerFromEnvSchema = z.coerce.number().int();

function readEnvNumber(env: Env, name: string, schema: z.ZodNumber): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;

  const parsed = schema.safeParse(raw);
  if (!parsed.success) throw new Error(`Invalid env var: ${name}`);
  return parsed.data;
}

export function loadEstimationConfig(env: Env = process.env): EstimationConfig {
  const troubleshootMinsPerVM = readEnvNumber(env, ESTIMATION_ENV_VARS.troubleshootMinsPerVM, NumberFromEnvSchema);
  const engineerCount = readEnvNumber(env, ESTIMATION_ENV_VARS.engineerCount, IntegerFromEnvSchema);
  const workHoursPerDay = readEnvNumber(env, ESTIMATION_ENV_VARS.workHoursPerDay, NumberFromEnvSchema);
  const transferRateMbps = readEnvNumber(env, ESTIMATION_ENV_VARS.transferRateMbps, NumberFromEnvSchema);

  return {
    postMigration: {
      ...(troubleshootMinsPerVM !== undefined ? { troubleshootMinsPerVM } : {}),
      ...(engineerCount !== undefined ? { engineerCount } : {}),
      ...(workHoursPerDay !== undefined ? { workHoursPerDay } : {}),
    },
    storageMigration: {
      ...(transferRateMbps !== undefined ? { transferRateMbps } : {}),
    },
  };
}
