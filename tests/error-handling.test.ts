/**
 * Error Handling Path Tests
 *
 * Validation failures, secret redaction and metrics access control.
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { isValidSegment, segmentSchema, rawKeySchema, endpointStatusSchema } from "../src/lib/validation.js";
import { redact, errorLog } from "../src/lib/logger.js";
import metricsHandler from "../src/api/metrics.js";
import { recordRequest, getMetrics, resetMetrics } from "../src/lib/metrics.js";
import { createRequest, MockResponse } from "./helpers.js";

beforeEach(() => {
  resetMetrics();
  vi.restoreAllMocks();
});

describe("Validation errors", () => {
  it("should reject unusable path segments", () => {
    expect(isValidSegment("")).toBe(false);
    expect(isValidSegment("a/b")).toBe(false);
    expect(isValidSegment("x".repeat(254))).toBe(false);
    expect(segmentSchema.safeParse("a/b").success).toBe(false);
    expect(segmentSchema.safeParse(undefined).success).toBe(false);
  });

  it("should accept ordinary identifiers", () => {
    expect(isValidSegment("default.pod-a")).toBe(true);
    expect(segmentSchema.safeParse("eth0").success).toBe(true);
  });

  it("should bound raw keys", () => {
    expect(rawKeySchema.safeParse("").success).toBe(false);
    expect(rawKeySchema.safeParse("/".repeat(4097)).success).toBe(false);
    expect(rawKeySchema.safeParse("/calico/v1/Ready").success).toBe(true);
  });

  it("should only accept known endpoint statuses", () => {
    expect(endpointStatusSchema.safeParse({ status: "down" }).success).toBe(true);
    expect(endpointStatusSchema.safeParse({ status: "error" }).success).toBe(true);
    expect(endpointStatusSchema.safeParse({ status: "UP" }).success).toBe(false);
    expect(endpointStatusSchema.safeParse("up").success).toBe(false);
  });
});

describe("Secret redaction", () => {
  it("should redact the store URL and its password", () => {
    expect(redact("connect redis://:test-secret@localhost:6379 failed")).toBe("connect ***REDACTED*** failed");
    expect(redact("auth test-secret rejected")).toBe("auth ***REDACTED*** rejected");
  });

  it("should redact the metrics key", () => {
    expect(redact("key=test-metrics-key")).toBe("key=***REDACTED***");
  });

  it("should redact error messages", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    errorLog("Store failure", new Error("bad password test-secret"));

    const line = JSON.parse(String(spy.mock.calls[0][0]));
    expect(line.level).toBe("error");
    expect(line.error.message).toBe("bad password ***REDACTED***");
  });

  it("should log values that cannot be serialized", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    const loop: Record<string, unknown> = { reason: "test-secret" };
    loop.self = loop;

    expect(() => errorLog("Store failure", loop)).not.toThrow();
    const line = JSON.parse(String(spy.mock.calls[0][0]));
    expect(line.error).toBe("[object Object]");
  });

  it("should redact thrown plain objects", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    errorLog("Store failure", { reason: "auth test-secret rejected" });

    const line = JSON.parse(String(spy.mock.calls[0][0]));
    expect(line.error).toBe('{"reason":"auth ***REDACTED*** rejected"}');
  });
});

describe("Metrics access", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  it("should reject requests without the API key", async () => {
    const res = new MockResponse();
    await metricsHandler(createRequest(), res);

    expect(res.statusCode).toBe(401);
    expect(res.body).toEqual({ error: "Unauthorized" });
  });

  it("should reject a wrong API key", async () => {
    const res = new MockResponse();
    await metricsHandler(createRequest({}, { "x-api-key": "wrong" }), res);

    expect(res.statusCode).toBe(401);
  });

  it("should report totals with the API key", async () => {
    recordRequest("/api/keys/decode", 200, 5);
    recordRequest("/api/keys/decode", 500, 15);

    const res = new MockResponse();
    await metricsHandler(createRequest({}, { "x-api-key": "test-metrics-key" }), res);

    expect(res.statusCode).toBe(200);
    expect(res.body).toMatchObject({
      totals: { requests: 2, errors: 1, errorRate: 50 },
      alerts: { highErrorRate: true, highUnmatchedRate: false, highLatency: false },
    });
  });

  it("should compute latency stats", () => {
    recordRequest("/api/health", 200, 10);
    recordRequest("/api/health", 200, 30);

    expect(getMetrics().requests["/api/health"].latency).toEqual({
      min: 10,
      max: 30,
      avg: 20,
      p50: 10,
      p95: 30,
      p99: 30,
    });
  });
});
