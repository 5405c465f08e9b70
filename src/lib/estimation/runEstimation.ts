// /src/lib/estimation/runEstimation.ts
import {
  CALCULATOR_IDS,
  type CalculatorId,
  type Estimation,
  type EstimationErrorCode,
  type ParamRegistry,
} from "../../contracts";
import type { CalculatorCatalog } from "./catalog";
import { EstimationError } from "./errors";

export type CalculatorOutcome =
  | { calculatorId: CalculatorId; name: string; ok: true; estimation: Estimation }
  | {
      calculatorId: CalculatorId;
      name: string;
      ok: false;
      error: { code: EstimationErrorCode; key: string; message: string };
    };

export type RunEstimationInput = {
  catalog: CalculatorCatalog;
  params: ParamRegistry;
  /** Defaults to every calculator in the catalog. Duplicates run once. */
  calculatorIds?: readonly CalculatorId[];
};

export type RunEstimationOutput = {
  outcomes: CalculatorOutcome[];
  /** Sum over successful outcomes only. */
  totalDurationMs: number;
  unavailable: CalculatorId[];
};

/**
 * Runs each selected calculator on the same params.
 * A calculator failing is reported in its outcome; what to do about
 * unavailable stages is up to the caller.
 *
 * Errors other than EstimationError are bugs and propagate.
 */
export function runEstimation(input: RunEstimationInput): RunEstimationOutput {
  const ids = Array.from(new Set(input.calculatorIds ?? CALCULATOR_IDS));

  const outcomes = ids.map((calculatorId): CalculatorOutcome => {
    const calculator = input.catalog[calculatorId];
    const name = calculator.name();

    try {
      return { calculatorId, name, ok: true, estimation: calculator.calculate(input.params) };
    } catch (err) {
      if (!(err instanceof EstimationError)) throw err;
      return {
        calculatorId,
        name,
        ok: false,
        error: { code: err.code, key: err.key, message: err.message },
      };
    }
  });

  let totalDurationMs = 0;
  const unavailable: CalculatorId[] = [];

  for (const o of outcomes) {
    if (o.ok) totalDurationMs += o.estimation.durationMs;
    else unavailable.push(o.calculatorId);
  }

  return { outcomes, totalDurationMs, unavailable };
}
