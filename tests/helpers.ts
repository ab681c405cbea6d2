/**
 * In-process request/response doubles for handler tests
 */

import type { ApiRequest, ApiResponse } from "../src/lib/http.js";

export function createRequest(
  query: Record<string, string | string[]> = {},
  headers: ApiRequest["headers"] = {},
  method = "GET"
): ApiRequest {
  return { method, query, headers };
}

export class MockResponse implements ApiResponse {
  statusCode = 200;
  headers: Record<string, number | string | readonly string[]> = {};
  body: unknown = undefined;
  ended = false;

  status(statusCode: number): this {
    this.statusCode = statusCode;
    return this;
  }

  setHeader(name: string, value: number | string | readonly string[]): this {
    this.headers[name] = value;
    return this;
  }

  json(body: unknown): this {
    this.body = body;
    this.ended = true;
    return this;
  }

  end(): this {
    this.ended = true;
    return this;
  }
}
