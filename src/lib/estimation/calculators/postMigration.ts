// /src/lib/estimation/calculators/postMigration.ts

import type { Calculator, Estimation, ParamRegistry } from "../../../contracts/estimation";
import { outOfRange } from "../errors";
import { formatQuantity, minutesToMs } from "../format";
import { readNumberParam, requireNumberParam } from "../params";

/** Number of VMs being migrated. Required. */
export const PARAM_VM_COUNT = "vm_count";
/** Per-call override of troubleshooting minutes per VM. */
export const PARAM_TROUBLESHOOT_MINS_PER_VM = "troubleshoot_mins_per_vm";
/** Per-call override of the number of engineers working in parallel. */
export const PARAM_POST_MIGRATION_ENGINEERS = "post_migration_engineers";

export const DEFAULT_TROUBLESHOOT_MINS_PER_VM = 60;
export const DEFAULT_ENGINEER_COUNT = 10;
export const DEFAULT_WORK_HOURS_PER_DAY = 8;

export type PostMigrationTroubleshootingOptions = {
  troubleshootMinsPerVM?: number;
  engineerCount?: number;
  workHoursPerDay?: number;
};

/**
 * Estimates the hands-on time spent fixing VMs after cutover.
 *
 * realTimeMins = vm_count * minsPerVM / engineers
 * workDays     = ceil(realTimeMins / (workHoursPerDay * 60))
 *
 * Precedence for minsPerVM and engineers: params > constructor options > defaults.
 * Non-finite option values count as out of range.
 * Options are not validated here so a misconfigured instance fails on calculate().
 */
export class PostMigrationTroubleshooting implements Calculator {
  private readonly troubleshootMinsPerVM: number;
  private readonly engineerCount: number;
  private readonly workHoursPerDay: number;

  constructor(options: PostMigrationTroubleshootingOptions = {}) {
    this.troubleshootMinsPerVM = options.troubleshootMinsPerVM ?? DEFAULT_TROUBLESHOOT_MINS_PER_VM;
    this.engineerCount = options.engineerCount ?? DEFAULT_ENGINEER_COUNT;
    this.workHoursPerDay = options.workHoursPerDay ?? DEFAULT_WORK_HOURS_PER_DAY;
  }

  name(): string {
    return "Post-Migration Troubleshooting";
  }

  keys(): readonly string[] {
    return [PARAM_VM_COUNT];
  }

  calculate(params: ParamRegistry): Estimation {
    const vmCount = requireNumberParam(params, PARAM_VM_COUNT);
    if (vmCount < 0) throw outOfRange(PARAM_VM_COUNT, "non-negative");

    const minsPerVM = readNumberParam(params, PARAM_TROUBLESHOOT_MINS_PER_VM) ?? this.troubleshootMinsPerVM;
    if (!Number.isFinite(minsPerVM) || minsPerVM < 0) {
      throw outOfRange(PARAM_TROUBLESHOOT_MINS_PER_VM, "non-negative");
    }

    const engineers = readNumberParam(params, PARAM_POST_MIGRATION_ENGINEERS) ?? this.engineerCount;
    if (!Number.isInteger(engineers) || engineers <= 0) {
      throw outOfRange(PARAM_POST_MIGRATION_ENGINEERS, "a positive integer");
    }

    if (!Number.isFinite(this.workHoursPerDay) || this.workHoursPerDay <= 0) {
      throw outOfRange("work_hours_per_day", "positive");
    }

    const totalMins = vmCount * minsPerVM;
    const realTimeMins = totalMins / engineers;
    const workDays = Math.ceil(realTimeMins / (this.workHoursPerDay * 60));

    return {
      durationMs: minutesToMs(realTimeMins),
      reason:
        `${workDays} work days (${formatQuantity(vmCount)} VMs x ${formatQuantity(minsPerVM)} min/VM` +
        ` / ${engineers} engineers = ${formatQuantity(realTimeMins)} min at ${formatQuantity(this.workHoursPerDay)} h/day)`,
    };
  }
}

export function createPostMigrationTroubleshooting(
  options?: PostMigrationTroubleshootingOptions,
): PostMigrationTroubleshooting {
  return new PostMigrationTroubleshooting(options);
}
