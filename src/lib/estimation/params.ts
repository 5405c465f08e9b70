// /src/lib/estimation/params.ts
import { z } from "zod";

import type { ParamRegistry, ParamValue } from "../../contracts/estimation";
import { invalidType, missingParam } from "./errors";

/**
 * The only place a parameter value is coerced to a number.
 * Calculators must go through readNumberParam / requireNumberParam.
 */
const NumericParamSchema = z.number().finite();

export function buildParams(values: Readonly<Record<string, ParamValue>>): ParamRegistry {
  const out: Record<string, { key: string; value: ParamValue }> = {};
  for (const [key, value] of Object.entries(values)) {
    out[key] = { key, value };
  }
  return out;
}

/**
 * Returns undefined when the key is absent.
 * Throws INVALID_TYPE when present but not a finite number.
 */
export function readNumberParam(params: ParamRegistry, key: string): number | undefined {
  if (!Object.prototype.hasOwnProperty.call(params, key)) return undefined;

  const param = params[key];
  if (param === undefined) return undefined;

  const parsed = NumericParamSchema.safeParse(param.value);
  if (!parsed.success) throw invalidType(key, param.value);

  return parsed.data;
}

export function requireNumberParam(params: ParamRegistry, key: string): number {
  const value = readNumberParam(params, key);
  if (value === undefined) throw missingParam(key);
  return value;
}
