/**
 * HTTP Response Helpers
 *
 * JSON responses with CORS, caching headers and weak ETags.
 * Handlers are typed against the request/response surface they use, which
 * VercelRequest and VercelResponse satisfy.
 */

import { createHash } from "crypto";
import type { VercelRequest } from "@vercel/node";
import { cfg } from "./env.js";

export type ApiRequest = Pick<VercelRequest, "method" | "query" | "headers">;

export interface ApiResponse {
  status(statusCode: number): ApiResponse;
  setHeader(name: string, value: number | string | readonly string[]): unknown;
  json(body: unknown): ApiResponse;
  end(): unknown;
}

const ALLOWED_METHODS = "GET, OPTIONS";
const ALLOWED_HEADERS = "Content-Type, If-None-Match, X-Api-Key";

/**
 * Get CORS origin header value based on request origin
 * Echoes the origin back when it is in the allowed list
 */
function getCorsOrigin(requestOrigin?: string): string {
  const allowedOrigins = cfg.corsOrigins.split(",").map((o) => o.trim());

  if (requestOrigin && allowedOrigins.includes(requestOrigin)) {
    return requestOrigin;
  }

  if (allowedOrigins.includes("*")) {
    return "*";
  }

  return allowedOrigins[0];
}

function setCorsHeaders(res: ApiResponse, req: ApiRequest): void {
  res.setHeader("Access-Control-Allow-Origin", getCorsOrigin(req.headers.origin));
  res.setHeader("Access-Control-Allow-Methods", ALLOWED_METHODS);
  res.setHeader("Access-Control-Allow-Headers", ALLOWED_HEADERS);
}

function cacheControl(seconds: number): string {
  return `s-maxage=${seconds}, stale-while-revalidate=${seconds * 2}`;
}

/**
 * Weak ETag over the JSON body
 */
export function createEtag(body: unknown): string {
  const hash = createHash("sha1").update(JSON.stringify(body)).digest("hex");
  return `W/"${hash.substring(0, 16)}"`;
}

/**
 * Single string value of a query parameter (first one if repeated)
 */
export function queryParam(req: ApiRequest, name: string): string | undefined {
  const value = req.query[name];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Send JSON response with optional ETag and cache headers
 */
export function json(
  res: ApiResponse,
  status: number,
  body: unknown,
  req: ApiRequest,
  etag?: string,
  cacheSeconds?: number
): ApiResponse {
  res.status(status);
  res.setHeader("Content-Type", "application/json");
  setCorsHeaders(res, req);

  if (etag) {
    res.setHeader("ETag", etag);
  }

  if (cacheSeconds) {
    res.setHeader("Cache-Control", cacheControl(cacheSeconds));
  }

  return res.json(body);
}

/**
 * Send error response
 */
export function error(
  res: ApiResponse,
  status: number,
  message: string,
  req: ApiRequest,
  details?: unknown
): ApiResponse {
  const body: { error: string; details?: unknown } = { error: message };
  if (details !== undefined) {
    body.details = details;
  }
  return json(res, status, body, req);
}

/**
 * Handle CORS preflight OPTIONS requests
 */
export function handleCors(res: ApiResponse, req: ApiRequest): unknown {
  setCorsHeaders(res, req);
  res.setHeader("Access-Control-Max-Age", "86400"); // 24 hours
  return res.status(200).end();
}

/**
 * Check If-None-Match header and send 304 if ETag matches
 * Returns true if 304 was sent, false otherwise
 */
export function handleNotModified(
  req: ApiRequest,
  res: ApiResponse,
  etag: string,
  cacheSeconds: number = cfg.cacheTtl
): boolean {
  if (req.headers["if-none-match"] === etag) {
    res.setHeader("ETag", etag);
    res.setHeader("Cache-Control", cacheControl(cacheSeconds));
    res.status(304).end();
    return true;
  }
  return false;
}
