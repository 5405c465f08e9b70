// /src/lib/estimation/errors.ts
import { z } from "zod";
import type { EstimationErrorCode } from "../../contracts/estimation";

export class EstimationError extends Error {
  code: EstimationErrorCode;
  key: string;

  constructor(code: EstimationErrorCode, key: string, message: string) {
    super(message);
    this.name = "EstimationError";
    this.code = code;
    this.key = key;
  }
}

export function missingParam(key: string): EstimationError {
  return new EstimationError("MISSING_PARAM", key, `missing ${key}`);
}

export function invalidType(key: string, value: unknown): EstimationError {
  const shown = value === null ? "null" : typeof value;
  return new EstimationError("INVALID_TYPE", key, `${key} must be a finite number, got ${shown}`);
}

export function outOfRange(key: string, requirement: string): EstimationError {
  return new EstimationError("OUT_OF_RANGE", key, `${key} must be ${requirement}`);
}

export type ClientError = {
  error: string;
  message: string;
  issues?: Array<{ path: string; message: string }>;
};

/**
 * Shape any thrown value into the JSON body the API returns.
 */
export function toClientError(err: unknown): ClientError {
  if (err instanceof z.ZodError) {
    return {
      error: "INVALID_REQUEST",
      message: "Request body did not match the expected format.",
      issues: err.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
    };
  }

  if (err instanceof EstimationError) {
    return {
      error: err.code,
      message: err.message,
      issues: [{ path: err.key, message: err.message }],
    };
  }

  if (err instanceof Error && err.message) {
    return { error: "ESTIMATE_FAILED", message: err.message };
  }

  return { error: "ESTIMATE_FAILED", message: "Unknown error" };
}
