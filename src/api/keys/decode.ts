/**
 * Key Decode API
 *
 * GET /api/keys/decode?key={path}
 *
 * Classifies a raw store key. An unrecognized key is a normal answer
 * (match: null), not an error.
 */

import { z } from "zod";
import {
  json,
  error,
  handleCors,
  handleNotModified,
  createEtag,
  queryParam,
  type ApiRequest,
  type ApiResponse,
} from "../../lib/http.js";
import { classifyKey } from "../../lib/matchers.js";
import { identityInterner } from "../../lib/intern.js";
import { toKeyMatchDTO } from "../../lib/normalize.js";
import { rawKeySchema } from "../../lib/validation.js";
import { DECODE_CACHE_SECONDS } from "../../lib/constants.js";
import { logRequest, errorLog } from "../../lib/logger.js";
import { recordDecode, recordRequest } from "../../lib/metrics.js";
import type { DecodeResponse } from "../../types/dto.js";

const ROUTE = "/api/keys/decode";

const QuerySchema = z.object({
  key: rawKeySchema,
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

    const parsed = QuerySchema.safeParse({ key: queryParam(req, "key") });
    if (!parsed.success) {
      finish(400);
      return error(res, 400, "Invalid query parameters", req, parsed.error.issues);
    }

    const { key } = parsed.data;
    // Request input is not pooled: the shared interner never evicts
    const match = classifyKey(key, identityInterner);
    recordDecode(match ? match.kind : null);

    const body: DecodeResponse = {
      key,
      match: match ? toKeyMatchDTO(match) : null,
    };

    const etag = createEtag(body);
    if (handleNotModified(req, res, etag, DECODE_CACHE_SECONDS)) {
      finish(304);
      return;
    }

    finish(200);
    return json(res, 200, body, req, etag, DECODE_CACHE_SECONDS);
  } catch (err) {
    errorLog("Key decode failed", err);
    finish(500);
    return error(res, 500, "Internal server error", req);
  }
}
