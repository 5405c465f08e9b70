// src/app/api/estimate/route.ts

import { NextResponse } from "next/server";
import { z } from "zod";

import { CalculatorIdSchema } from "../../../contracts/calculatorIds";
import {
  buildParams,
  createCalculatorCatalog,
  describeCalculators,
  formatDuration,
  loadEstimationConfig,
  runEstimation,
  toClientError,
} from "../../../lib/estimation";
import { getRequestIdFromRequest, withRequestId } from "../../../lib/middleware";

export const runtime = "nodejs";

/* ------------------------------------------------------------------ */
/* Request schema */
/* ------------------------------------------------------------------ */

const ParamValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const EstimateRequestSchema = z
  .object({
    params: z.record(ParamValueSchema),
    calculators: z.array(CalculatorIdSchema).min(1).optional(),
  })
  .strict();

/* ------------------------------------------------------------------ */
/* Handlers */
/* ------------------------------------------------------------------ */

export const GET = withRequestId(async (req: Request) => {
  try {
    const catalog = createCalculatorCatalog(loadEstimationConfig());
    return NextResponse.json({ ok: true, calculators: describeCalculators(catalog) });
  } catch (err) {
    console.error("[ESTIMATE] Unexpected error:", { requestId: getRequestIdFromRequest(req), err });
    return NextResponse.json({ ok: false, ...toClientError(err) }, { status: 500 });
  }
});

export const POST = withRequestId(async (req: Request) => {
  const requestId = getRequestIdFromRequest(req);

  let body: unknown;
  try {
    body = await req.json();
  } catch {
    return NextResponse.json(
      { ok: false, error: "INVALID_REQUEST", message: "Request body must be valid JSON." },
      { status: 400 },
    );
  }

  const parsed = EstimateRequestSchema.safeParse(body);
  if (!parsed.success) {
    return NextResponse.json({ ok: false, ...toClientError(parsed.error) }, { status: 400 });
  }

  try {
    const catalog = createCalculatorCatalog(loadEstimationConfig());
    const out = runEstimation({
      catalog,
      params: buildParams(parsed.data.params),
      ...(parsed.data.calculators ? { calculatorIds: parsed.data.calculators } : {}),
    });

    if (out.unavailable.length > 0) {
      console.warn("[ESTIMATE] some calculators failed", {
        requestId,
        unavailable: out.unavailable,
      });
    }

    return NextResponse.json({
      ok: true,
      request_id: requestId,
      results: out.outcomes,
      total_duration_ms: out.totalDurationMs,
      total_duration_label: formatDuration(out.totalDurationMs),
      unavailable: out.unavailable,
    });
  } catch (err) {
    console.error("[ESTIMATE] Unexpected error:", { requestId, err });
    return NextResponse.json({ ok: false, ...toClientError(err) }, { status: 500 });
  }
});
