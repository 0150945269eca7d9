// src/app/api/calculate/route.ts

import { NextResponse } from "next/server";
import { z } from "zod";

import { CaseMetadataSchema } from "@/contracts/household";
import { calculate } from "@/lib/psh/calculator";
import { ConfigError, toClientError } from "@/lib/psh/errors";
import { getActiveRateStore } from "@/lib/psh/activeRateStore";
import { checkSupervisorSignOff } from "@/lib/psh/signOff";
import { validate } from "@/lib/psh/validate";
import { buildWorksheet } from "@/lib/psh/worksheet";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

/* ------------------------------------------------------------------ */
/* Request schema */
/* ------------------------------------------------------------------ */

// `input` is checked by validate() so that every field gets an error code.
const CalculateRequestSchema = z
  .object({
    input: z.unknown(),
    metadata: CaseMetadataSchema.optional(),
  })
  .strict();

/**
 * POST /api/calculate
 * validate() then calculate() against the current rate table snapshot.
 * 400: request or input problems (all fields at once). 500: rate table setup problem.
 */
export async function POST(req: Request) {
  let body: unknown;
  try {
    body = await req.json();
  } catch {
    return NextResponse.json(
      { ok: false, error: "INVALID_JSON", message: "Request body must be JSON." },
      { status: 400 },
    );
  }

  try {
    const parsed = CalculateRequestSchema.parse(body);

    const outcome = validate(parsed.input);
    if (!outcome.ok) {
      return NextResponse.json(
        {
          ok: false,
          error: "VALIDATION_FAILED",
          issues: outcome.errors.map((e) => ({ path: e.field, code: e.code, message: e.message })),
        },
        { status: 400 },
      );
    }

    // one snapshot per request; a concurrent table edit cannot leak into this result
    const table = getActiveRateStore().current();
    const result = calculate(outcome.value, table);
    const metadata = parsed.metadata ?? {};

    return NextResponse.json(
      {
        ok: true,
        result,
        worksheet: buildWorksheet(outcome.value, result, metadata),
        signOff: checkSupervisorSignOff(result, metadata),
      },
      { status: 200 },
    );
  } catch (err) {
    const clientError = toClientError(err);

    if (err instanceof z.ZodError) {
      return NextResponse.json({ ok: false, ...clientError }, { status: 400 });
    }

    if (err instanceof ConfigError) {
      console.error("[CALCULATE] rate table problem:", { code: err.code, message: err.message });
      return NextResponse.json({ ok: false, ...clientError }, { status: 500 });
    }

    console.error("[CALCULATE] Unhandled error:", err);
    return NextResponse.json({ ok: false, ...clientError }, { status: 500 });
  }
}
