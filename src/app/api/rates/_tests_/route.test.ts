// /src/app/api/rates/_tests_/route.test.ts
import { describe, it, expect, vi, beforeEach } from "vitest";

import { resetActiveRateStore } from "@/lib/psh/activeRateStore";
import { DELETE, GET, PATCH, PUT } from "../route";

const ADMIN_TOKEN = "test-secret";

function request(method: string, body: string, headers: Record<string, string> = {}) {
  return new Request("http://localhost/api/rates", {
    method,
    headers: { "content-type": "application/json", "x-admin-token": ADMIN_TOKEN, ...headers },
    body,
  });
}

const fullRates = {
  "0": { paymentStandard: 2800, fmr: 2550 },
  "1": { paymentStandard: 3300, fmr: 3000 },
  "2": { paymentStandard: 4000, fmr: 3650 },
  "3": { paymentStandard: 5100, fmr: 4650 },
  "4": { paymentStandard: 5300, fmr: 4800 },
  "5": { paymentStandard: 5600, fmr: 5100 },
};

beforeEach(() => {
  resetActiveRateStore();
  vi.stubEnv("PSH_ADMIN_TOKEN", ADMIN_TOKEN);
  vi.stubEnv("PSH_RATE_TABLE_JSON", "");
  vi.stubEnv("PSH_RATE_EFFECTIVE_DATE", "");
  vi.spyOn(console, "log").mockImplementation(() => {});
});

describe("/api/rates", () => {
  it("GET returns the default table", async () => {
    const res = await GET();
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.table.version).toBe(1);
    expect(body.table.effectiveDate).toBe("2025-01-01");
    expect(body.table.rates["5"]).toEqual({ paymentStandard: 5500, fmr: 5000 });
  });

  it("refuses writes when no admin token is configured", async () => {
    vi.stubEnv("PSH_ADMIN_TOKEN", "");
    vi.spyOn(console, "error").mockImplementation(() => {});

    const res = await DELETE(request("DELETE", ""));

    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({ ok: false, reason: "ADMIN_TOKEN_NOT_CONFIGURED" });
  });

  it("refuses writes with the wrong token", async () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});

    const res = await PATCH(
      request("PATCH", JSON.stringify({ bedroomSize: 2, paymentStandard: 1, fmr: 1 }), { "x-admin-token": "nope" }),
    );

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ ok: false, reason: "UNAUTHORIZED" });
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect((await (await GET()).json()).table.version).toBe(1);
  });

  it("PATCH edits one bedroom size", async () => {
    const res = await PATCH(request("PATCH", JSON.stringify({ bedroomSize: 2, paymentStandard: 4000, fmr: 3700 })));
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.table.version).toBe(2);
    expect(body.table.rates["2"]).toEqual({ paymentStandard: 4000, fmr: 3700 });
    expect(body.table.rates["3"]).toEqual({ paymentStandard: 5064, fmr: 4604 });
  });

  it("PATCH rejects a bedroom size outside 0-5", async () => {
    const res = await PATCH(request("PATCH", JSON.stringify({ bedroomSize: 9, paymentStandard: 1, fmr: 1 })));

    expect(res.status).toBe(400);
    expect((await res.json()).error).toBe("INVALID_REQUEST");
  });

  it("PUT replaces the whole table from JSON", async () => {
    const res = await PUT(request("PUT", JSON.stringify({ rates: fullRates, effectiveDate: "2026-10-01" })));
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.table.effectiveDate).toBe("2026-10-01");
    expect(body.table.rates).toEqual(fullRates);
  });

  it("PUT keeps the active table when the replacement is incomplete", async () => {
    const { "4": _dropped, ...partial } = fullRates;
    const res = await PUT(request("PUT", JSON.stringify({ rates: partial })));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      ok: false,
      error: "RATE_TABLE_INVALID",
      message: "Rate table setup problem: Rate table has no entry for 4-bedroom units",
      code: "MISSING_RATE",
    });
    expect((await (await GET()).json()).table.version).toBe(1);
  });

  it("PUT rejects rate keys that are not exactly 0-5", async () => {
    const { "0": studio, ...rest } = fullRates;
    const res = await PUT(request("PUT", JSON.stringify({ rates: { ...rest, "": studio } })));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      ok: false,
      error: "RATE_TABLE_INVALID",
      message: 'Rate table setup problem: Unknown bedroom size "" (expected 0-5)',
      code: "INVALID_RATE_VALUE",
    });
  });

  it("PUT rejects a CSV with a repeated bedroom size", async () => {
    const csv = "bedrooms,fmr\n0,2500\n1,3000\n1,3100\n";
    const res = await PUT(request("PUT", csv, { "content-type": "text/csv" }));

    expect(res.status).toBe(400);
    expect((await res.json()).message).toBe(
      "Rate table setup problem: Rate CSV row 4: duplicate row for 1 bedrooms",
    );
  });

  it("PUT accepts a CSV body", async () => {
    const csv = "bedrooms,fmr\n0,2500\n1,3000\n2,3600\n3,4600\n4,4800\n5,5000\n";
    const res = await PUT(request("PUT", csv, { "content-type": "text/csv", "x-effective-date": "2026-10-01" }));
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.table.effectiveDate).toBe("2026-10-01");
    expect(body.table.rates["0"]).toEqual({ paymentStandard: 2750, fmr: 2500 });
  });

  it("PUT rejects a body that is not JSON", async () => {
    const res = await PUT(request("PUT", "{"));

    expect(res.status).toBe(400);
    expect((await res.json()).error).toBe("INVALID_JSON");
  });

  it("DELETE resets to the defaults", async () => {
    await PATCH(request("PATCH", JSON.stringify({ bedroomSize: 0, paymentStandard: 1, fmr: 1 })));

    const res = await DELETE(request("DELETE", ""));
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.table.version).toBe(3);
    expect(body.table.rates["0"]).toEqual({ paymentStandard: 2734, fmr: 2485 });
  });
});
