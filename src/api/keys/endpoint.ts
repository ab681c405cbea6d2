/**
 * Endpoint Keys API
 *
 * GET /api/keys/endpoint?host=&orchestrator=&workload=&endpoint=
 */

import {
  json,
  error,
  handleCors,
  queryParam,
  type ApiRequest,
  type ApiResponse,
} from "../../lib/http.js";
import { EndpointId } from "../../lib/endpoint-id.js";
import { identityInterner } from "../../lib/intern.js";
import { toEndpointKeysDTO } from "../../lib/normalize.js";
import { endpointQuerySchema } from "../../lib/validation.js";
import { DECODE_CACHE_SECONDS } from "../../lib/constants.js";
import { logRequest, errorLog } from "../../lib/logger.js";
import { recordRequest } from "../../lib/metrics.js";

const ROUTE = "/api/keys/endpoint";

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

    const body = toEndpointKeysDTO(EndpointId.from(parsed.data, identityInterner));

    finish(200);
    return json(res, 200, body, req, undefined, DECODE_CACHE_SECONDS);
  } catch (err) {
    errorLog("Endpoint key build failed", err);
    finish(500);
    return error(res, 500, "Internal server error", req);
  }
}
