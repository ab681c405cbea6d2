/**
 * Metrics API
 *
 * GET /api/metrics
 *
 * Returns application metrics for monitoring dashboards.
 * Protected with API key authentication.
 */

import { timingSafeEqual } from "crypto";
import { json, error, handleCors, type ApiRequest, type ApiResponse } from "../lib/http.js";
import { getMetrics } from "../lib/metrics.js";
import { logRequest } from "../lib/logger.js";
import { cfg } from "../lib/env.js";

function apiKeyMatches(provided: string | string[] | undefined, expected: string): boolean {
  const providedBuffer = Buffer.from(typeof provided === "string" ? provided : "");
  const expectedBuffer = Buffer.from(expected);
  return providedBuffer.length === expectedBuffer.length && timingSafeEqual(providedBuffer, expectedBuffer);
}

export default async function handler(req: ApiRequest, res: ApiResponse) {
  const start = Date.now();

  if (req.method === "OPTIONS") {
    return handleCors(res, req);
  }

  if (req.method !== "GET") {
    return error(res, 405, "Method not allowed", req);
  }

  if (cfg.metricsApiKey && !apiKeyMatches(req.headers["x-api-key"], cfg.metricsApiKey)) {
    logRequest("GET", "/api/metrics", 401, Date.now() - start);
    return error(res, 401, "Unauthorized", req);
  }

  const metrics = getMetrics();

  const alerts = {
    highErrorRate: metrics.totals.errorRate > 1, // > 1% error rate
    highUnmatchedRate: metrics.decode.unmatchedRate > 50, // most decoded keys unknown to this schema
    highLatency: Object.values(metrics.requests).some(
      (r) => r.latency.p99 > 1000 // p99 > 1 second
    ),
  };

  logRequest("GET", "/api/metrics", 200, Date.now() - start);
  return json(res, 200, { ...metrics, alerts, timestamp: new Date().toISOString() }, req);
}
