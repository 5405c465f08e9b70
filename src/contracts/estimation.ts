// /src/contracts/estimation.ts
/**
 * Estimation contracts.
 *
 * Every calculator consumes a ParamRegistry and returns an Estimation.
 * Calculators must not keep a reference to the registry after calculate() returns.
 */

/** Values a caller may place in a registry. Only numbers are accepted by the built-in calculators. */
export type ParamValue = string | number | boolean | null;

export interface Param {
  readonly key: string;
  readonly value: ParamValue;
}

/** Keyed by Param.key. Keys a calculator does not read are ignored. */
export type ParamRegistry = Readonly<Record<string, Param>>;

export interface Estimation {
  /** Elapsed real time in milliseconds (not rounded). */
  durationMs: number;
  /** Human-readable justification, safe to show as-is. */
  reason: string;
}

export interface Calculator {
  /** Stable, non-empty display name. */
  name(): string;
  /** Parameter keys without which no meaningful estimate can be produced. */
  keys(): readonly string[];
  /**
   * Pure function of `params` and the calculator's own configuration.
   * Throws EstimationError; never returns a partial result.
   */
  calculate(params: ParamRegistry): Estimation;
}

export type EstimationErrorCode = "MISSING_PARAM" | "INVALID_TYPE" | "OUT_OF_RANGE";
