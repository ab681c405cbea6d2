/**
 * Host Keys API
 *
 * GET /api/keys/host?hostname={name}
 */

import { z } from "zod";
import {
  json,
  error,
  handleCors,
  queryParam,
  type ApiRequest,
  type ApiResponse,
} from "../../lib/http.js";
import { toHostKeysDTO } from "../../lib/normalize.js";
import { segmentSchema } from "../../lib/validation.js";
import { DECODE_CACHE_SECONDS } from "../../lib/constants.js";
import { logRequest, errorLog } from "../../lib/logger.js";
import { recordRequest } from "../../lib/metrics.js";

const ROUTE = "/api/keys/host";

const QuerySchema = z.object({
  hostname: segmentSchema,
});

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

    const parsed = QuerySchema.safeParse({ hostname: queryParam(req, "hostname") });
    if (!parsed.success) {
      finish(400);
      return error(res, 400, "Invalid query parameters", req, parsed.error.issues);
    }

    finish(200);
    return json(res, 200, toHostKeysDTO(parsed.data.hostname), req, undefined, DECODE_CACHE_SECONDS);
  } catch (err) {
    errorLog("Host key build failed", err);
    finish(500);
    return error(res, 500, "Internal server error", req);
  }
}
