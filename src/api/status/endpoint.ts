/**
 * Endpoint Status API
 *
 * GET /api/status/endpoint?host=&orchestrator=&workload=&endpoint=
 *
 * Reads the status document the agent reported for one endpoint.
 */

import {
  json,
  error,
  handleCors,
  queryParam,
  type ApiRequest,
  type ApiResponse,
} from "../../lib/http.js";
import { readJSON } from "../../lib/kv.js";
import { EndpointId } from "../../lib/endpoint-id.js";
import { identityInterner } from "../../lib/intern.js";
import { endpointQuerySchema, endpointStatusSchema } from "../../lib/validation.js";
import { cfg } from "../../lib/env.js";
import { logRequest, errorLog } from "../../lib/logger.js";
import { recordRequest } from "../../lib/metrics.js";
import type { EndpointStatusDTO } from "../../types/dto.js";

const ROUTE = "/api/status/endpoint";

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

    const parsed = endpointQuerySchema.safeParse({
      host: queryParam(req, "host"),
      orchestrator: queryParam(req, "orchestrator"),
      workload: queryParam(req, "workload"),
      endpoint: queryParam(req, "endpoint"),
    });
    if (!parsed.success) {
      finish(400);
      return error(res, 400, "Invalid query parameters", req, parsed.error.issues);
    }

    // Request input is not pooled: the shared interner never evicts
    const id = EndpointId.from(parsed.data, identityInterner);
    const statusKey = id.pathForStatus();
    const stored = await readJSON(statusKey);

    if (stored.state === "absent") {
      finish(404);
      return error(res, 404, "No status reported", req, { statusKey });
    }

    const doc = stored.state === "ok" ? endpointStatusSchema.safeParse(stored.value) : null;
    if (!doc || !doc.success) {
      errorLog("Malformed endpoint status document", {
        statusKey,
        issues: doc ? doc.error.issues : "unparseable JSON",
      });
      finish(502);
      return error(res, 502, "Malformed status document", req, { statusKey });
    }

    const body: EndpointStatusDTO = {
      endpointId: id.toJSON(),
      statusKey,
      status: doc.data.status,
    };

    finish(200);
    return json(res, 200, body, req, undefined, cfg.cacheTtl);
  } catch (err) {
    errorLog("Endpoint status lookup failed", err);
    finish(500);
    return error(res, 500, "Internal server error", req);
  }
}
