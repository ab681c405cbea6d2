/**
 * Health Check Endpoint
 *
 * GET /api/health
 */

import { ping, getValue } from "../lib/kv.js";
import { json, error, handleCors, type ApiRequest, type ApiResponse } from "../lib/http.js";
import { logRequest, errorLog } from "../lib/logger.js";
import { recordRequest } from "../lib/metrics.js";
import { READY_KEY } from "../lib/paths.js";
import type { HealthDTO } from "../types/dto.js";

const ROUTE = "/api/health";

export default async function handler(req: ApiRequest, res: ApiResponse) {
  const start = Date.now();
  const finish = (status: number) => {
    const duration = Date.now() - start;
    logRequest("GET", ROUTE, status, duration);
    recordRequest(ROUTE, status, duration);
  };

  try {
    if (req.method === "OPTIONS") {
      return handleCors(res, req);
    }

    if (req.method !== "GET") {
      return error(res, 405, "Method not allowed", req);
    }

    const health: HealthDTO = {
      ok: true,
      ready: false,
      services: {
        kv: false,
      },
      details: {},
      timestamp: new Date().toISOString(),
    };

    // Read-only PING, then the global ready flag
    try {
      await ping();
      health.services.kv = true;

      const ready = await getValue(READY_KEY);
      health.ready = ready === "true";
      health.details.readyValue = ready;
    } catch (err) {
      errorLog("Health check: KV failed", err);
      health.details.kvError = err instanceof Error ? err.message : "Unknown error";
    }

    health.ok = Object.values(health.services).every((s) => s);

    const status = health.ok ? 200 : 503;
    finish(status);
    return json(res, status, health, req);
  } catch (err) {
    errorLog("Health check failed", err);
    finish(500);
    return json(res, 500, { ok: false, ready: false, services: { kv: false } }, req);
  }
}
