// /src/app/api/estimate/_tests_/route.test.ts
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";

import { GET, POST } from "../route";

function postRequest(body: string, headers: Record<string, string> = {}): Request {
  return new Request("http://localhost/api/estimate", {
    method: "POST",
    headers: { "Content-Type": "application/json", ...headers },
    body,
  });
}

const storageMs = ((1000 * 1024) / (620 / 8) / 60) * 60_000;

describe("/api/estimate", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it("GET lists the calculators", async () => {
    const res = await GET(new Request("http://localhost/api/estimate"));
    const json = await res.json();

    expect(res.status).toBe(200);
    expect(res.headers.get("X-Request-ID")).toBeTruthy();
    expect(json).toEqual({
      ok: true,
      calculators: [
        { id: "post_migration_troubleshooting", name: "Post-Migration Troubleshooting", keys: ["vm_count"] },
        { id: "storage_migration", name: "Storage Migration", keys: ["total_disk_gb"] },
      ],
    });
  });

  it("POST runs every calculator and echoes the request id", async () => {
    const res = await POST(
      postRequest(JSON.stringify({ params: { vm_count: 10, total_disk_gb: 1000 } }), {
        "X-Request-ID": "req-test-1",
      }),
    );
    const json = await res.json();

    expect(res.status).toBe(200);
    expect(res.headers.get("X-Request-ID")).toBe("req-test-1");
    expect(json.ok).toBe(true);
    expect(json.request_id).toBe("req-test-1");
    expect(json.results[0]).toEqual({
      calculatorId: "post_migration_troubleshooting",
      name: "Post-Migration Troubleshooting",
      ok: true,
      estimation: {
        durationMs: 3_600_000,
        reason: "1 work days (10 VMs x 60 min/VM / 10 engineers = 60 min at 8 h/day)",
      },
    });
    expect(json.results[1].estimation.reason).toBe("1000.00 GB at 620 Mbps (110 min/500GB)");
    expect(json.total_duration_ms).toBeCloseTo(3_600_000 + storageMs, 6);
    expect(json.total_duration_label).toBe("4h 40m");
    expect(json.unavailable).toEqual([]);
  });

  it("POST returns the generated request id in the body and header", async () => {
    const res = await POST(postRequest(JSON.stringify({ params: { total_disk_gb: 0 } })));
    const json = await res.json();

    expect(json.request_id).toBeTruthy();
    expect(json.request_id).toBe(res.headers.get("X-Request-ID"));
  });

  it("POST reports calculators that could not run", async () => {
    const res = await POST(
      postRequest(JSON.stringify({ params: {}, calculators: ["post_migration_troubleshooting"] })),
    );
    const json = await res.json();

    expect(res.status).toBe(200);
    expect(json.unavailable).toEqual(["post_migration_troubleshooting"]);
    expect(json.total_duration_ms).toBe(0);
    expect(json.results[0].error).toEqual({
      code: "MISSING_PARAM",
      key: "vm_count",
      message: "missing vm_count",
    });
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it("POST applies env configuration", async () => {
    vi.stubEnv("ESTIMATION_TRANSFER_RATE_MBPS", "1240");

    const res = await POST(
      postRequest(JSON.stringify({ params: { total_disk_gb: 1000 }, calculators: ["storage_migration"] })),
    );
    const json = await res.json();

    expect(json.results[0].estimation.reason).toBe("1000.00 GB at 1240 Mbps (55 min/500GB)");
  });

  it("POST rejects a body that is not JSON", async () => {
    const res = await POST(postRequest("{not json"));
    const json = await res.json();

    expect(res.status).toBe(400);
    expect(json).toEqual({
      ok: false,
      error: "INVALID_REQUEST",
      message: "Request body must be valid JSON.",
    });
    expect(res.headers.get("X-Request-ID")).toBeTruthy();
  });

  it("POST rejects an unknown calculator id", async () => {
    const res = await POST(postRequest(JSON.stringify({ params: {}, calculators: ["network_cutover"] })));
    const json = await res.json();

    expect(res.status).toBe(400);
    expect(json.error).toBe("INVALID_REQUEST");
    expect(json.issues[0].path).toBe("calculators.0");
  });

  it("POST rejects unknown top-level fields", async () => {
    const res = await POST(postRequest(JSON.stringify({ params: {}, verbose: true })));

    expect(res.status).toBe(400);
  });

  it("POST returns 500 when the configuration is invalid", async () => {
    vi.stubEnv("ESTIMATION_POST_MIGRATION_ENGINEERS", "ten");

    const res = await POST(postRequest(JSON.stringify({ params: { vm_count: 1 } })));
    const json = await res.json();

    expect(res.status).toBe(500);
    expect(json).toEqual({
      ok: false,
      error: "ESTIMATE_FAILED",
      message: "Invalid env var: ESTIMATION_POST_MIGRATION_ENGINEERS",
    });
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it("GET returns 500 when the configuration is invalid", async () => {
    vi.stubEnv("ESTIMATION_POST_MIGRATION_ENGINEERS", "ten");

    const res = await GET(new Request("http://localhost/api/estimate", { headers: { "X-Request-ID": "req-bad-env" } }));
    const json = await res.json();

    expect(res.status).toBe(500);
    expect(res.headers.get("X-Request-ID")).toBe("req-bad-env");
    expect(json).toEqual({
      ok: false,
      error: "ESTIMATE_FAILED",
      message: "Invalid env var: ESTIMATION_POST_MIGRATION_ENGINEERS",
    });
    expect(console.error).toHaveBeenCalledTimes(1);
  });
});
