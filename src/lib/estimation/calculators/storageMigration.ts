// /src/lib/estimation/calculators/storageMigration.ts

import type { Calculator, Estimation, ParamRegistry } from "../../../contracts/estimation";
import { outOfRange } from "../errors";
import { minutesToMs } from "../format";
import { readNumberParam, requireNumberParam } from "../params";

/** Total disk size across all VMs, in GB. Required. */
export const PARAM_TOTAL_DISK_GB = "total_disk_gb";
/** Per-call override of the sustained transfer rate, in Mbps. */
export const PARAM_TRANSFER_RATE_MBPS = "transfer_rate_mbps";

/**
 * 620 Mbps is ~77.5 MB/s, which reproduces the 110 min / 500 GB baseline.
 */
export const DEFAULT_TRANSFER_RATE_MBPS = 620;

export type StorageMigrationOptions = {
  /** Non-positive or non-finite values are ignored and the default kept. */
  transferRateMbps?: number;
};

/**
 * Estimates the time needed to copy VM disks to the target cluster.
 *
 * minutes = (total_disk_gb * 1024) / (rateMbps / 8) / 60
 */
export class StorageMigration implements Calculator {
  private readonly transferRateMbps: number;

  constructor(options: StorageMigrationOptions = {}) {
    const rate = options.transferRateMbps;
    this.transferRateMbps = rate !== undefined && Number.isFinite(rate) && rate > 0 ? rate : DEFAULT_TRANSFER_RATE_MBPS;
  }

  name(): string {
    return "Storage Migration";
  }

  // transfer_rate_mbps is optional
  keys(): readonly string[] {
    return [PARAM_TOTAL_DISK_GB];
  }

  calculate(params: ParamRegistry): Estimation {
    const totalGB = requireNumberParam(params, PARAM_TOTAL_DISK_GB);
    if (totalGB < 0) throw outOfRange(PARAM_TOTAL_DISK_GB, "non-negative");

    // Type-checked even when the value ends up discarded.
    const override = readNumberParam(params, PARAM_TRANSFER_RATE_MBPS);
    const rateMbps = override !== undefined && override > 0 ? override : this.transferRateMbps;

    const rateMBps = rateMbps / 8;
    const totalMinutes = (totalGB * 1024) / rateMBps / 60;
    const minsPer500GB = (500 * 1024) / rateMBps / 60;

    return {
      durationMs: minutesToMs(totalMinutes),
      reason: `${totalGB.toFixed(2)} GB at ${rateMbps.toFixed(0)} Mbps (${minsPer500GB.toFixed(0)} min/500GB)`,
    };
  }
}

export function createStorageMigration(options?: StorageMigrationOptions): StorageMigration {
  return new StorageMigration(options);
}
