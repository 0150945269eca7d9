// src/app/api/rates/route.ts

import { NextResponse } from "next/server";
import { z } from "zod";

import {
  RateEntryUpdateSchema,
  RateTableReplaceSchema,
  parseBedroomKey,
  type BedroomSize,
  type FmrRateTable,
  type RateRecord,
} from "@/contracts/rates";
import { loadServerConfig } from "@/lib/config";
import { getActiveRateStore } from "@/lib/psh/activeRateStore";
import { ConfigError, toClientError } from "@/lib/psh/errors";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";
export const revalidate = 0;

/* ------------------------------------------------------------------ */
/* Utilities */
/* ------------------------------------------------------------------ */

type AuthFailure = { status: 401 | 503; reason: "UNAUTHORIZED" | "ADMIN_TOKEN_NOT_CONFIGURED" };

function checkAdmin(req: Request): AuthFailure | null {
  const expected = loadServerConfig().adminToken;
  if (!expected) {
    console.error("[RATES] Missing PSH_ADMIN_TOKEN env var; rate table writes are disabled");
    return { status: 503, reason: "ADMIN_TOKEN_NOT_CONFIGURED" };
  }
  const supplied = req.headers.get("x-admin-token")?.trim() ?? "";
  if (supplied !== expected) {
    console.warn("[RATES] Rejected write with bad admin token", { hasToken: supplied.length > 0 });
    return { status: 401, reason: "UNAUTHORIZED" };
  }
  return null;
}

function tableBody(table: FmrRateTable) {
  return { ok: true, table };
}

function errorResponse(err: unknown) {
  if (err instanceof SyntaxError) {
    return NextResponse.json(
      { ok: false, error: "INVALID_JSON", message: "Request body must be JSON." },
      { status: 400 },
    );
  }

  const clientError = toClientError(err);

  if (err instanceof z.ZodError || err instanceof ConfigError) {
    // Rejected writes leave the active table untouched.
    return NextResponse.json({ ok: false, ...clientError }, { status: 400 });
  }

  console.error("[RATES] Unhandled error:", err);
  return NextResponse.json({ ok: false, ...clientError }, { status: 500 });
}

function toRateMap(rates: Record<string, RateRecord>): Partial<Record<BedroomSize, RateRecord>> {
  const out: Partial<Record<BedroomSize, RateRecord>> = {};
  for (const [key, value] of Object.entries(rates)) {
    const size = parseBedroomKey(key);
    if (size === null) {
      throw new ConfigError("INVALID_RATE_VALUE", `Unknown bedroom size "${key}" (expected 0-5)`);
    }
    out[size] = value;
  }
  return out;
}

/* ------------------------------------------------------------------ */
/* Handlers */
/* ------------------------------------------------------------------ */

/** GET /api/rates - current snapshot (version, effective date, rates). */
export async function GET() {
  try {
    return NextResponse.json(tableBody(getActiveRateStore().current()), { status: 200 });
  } catch (err) {
    return errorResponse(err);
  }
}

/**
 * PUT /api/rates - replace the whole table.
 * JSON body { rates: { "0": { paymentStandard, fmr }, ... }, effectiveDate? }
 * or a text/csv body (bedrooms,payment_standard,fmr).
 */
export async function PUT(req: Request) {
  const denied = checkAdmin(req);
  if (denied) return NextResponse.json({ ok: false, reason: denied.reason }, { status: denied.status });

  try {
    const store = getActiveRateStore();
    const contentType = req.headers.get("content-type") ?? "";

    if (contentType.includes("text/csv")) {
      const table = store.importCsv(await req.text(), req.headers.get("x-effective-date") ?? undefined);
      console.log("[RATES] table imported from CSV", { version: table.version, effectiveDate: table.effectiveDate });
      return NextResponse.json(tableBody(table), { status: 200 });
    }

    const parsed = RateTableReplaceSchema.parse(await req.json());
    const table = store.replace(toRateMap(parsed.rates), parsed.effectiveDate);
    console.log("[RATES] table replaced", { version: table.version, effectiveDate: table.effectiveDate });
    return NextResponse.json(tableBody(table), { status: 200 });
  } catch (err) {
    return errorResponse(err);
  }
}

/** PATCH /api/rates - edit one bedroom size: { bedroomSize, paymentStandard, fmr }. */
export async function PATCH(req: Request) {
  const denied = checkAdmin(req);
  if (denied) return NextResponse.json({ ok: false, reason: denied.reason }, { status: denied.status });

  try {
    const parsed = RateEntryUpdateSchema.parse(await req.json());
    const table = getActiveRateStore().updateEntry(parsed.bedroomSize, {
      paymentStandard: parsed.paymentStandard,
      fmr: parsed.fmr,
    });
    console.log("[RATES] entry updated", { bedroomSize: parsed.bedroomSize, version: table.version });
    return NextResponse.json(tableBody(table), { status: 200 });
  } catch (err) {
    return errorResponse(err);
  }
}

/** DELETE /api/rates - reset to the bundled default table. */
export async function DELETE(req: Request) {
  const denied = checkAdmin(req);
  if (denied) return NextResponse.json({ ok: false, reason: denied.reason }, { status: denied.status });

  try {
    const table = getActiveRateStore().resetToDefault();
    console.log("[RATES] table reset to defaults", { version: table.version });
    return NextResponse.json(tableBody(table), { status: 200 });
  } catch (err) {
    return errorResponse(err);
  }
}
