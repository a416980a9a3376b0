/**
 * HTTP transport types
 */

import type { Credentials } from "../../types/config.js";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export interface HttpRequestOptions {
  auth?: Credentials;
  body?: unknown;
  /** Omit for an unbounded request */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface HttpResponse {
  status: number;
  body: unknown;
}

/**
 * Minimal HTTP capability the migration core depends on.
 * Connection failures reject with TransportError, expired timeouts with RequestTimeoutError.
 */
export interface HttpClient {
  request(
    method: HttpMethod,
    url: string,
    options?: HttpRequestOptions,
  ): Promise<HttpResponse>;
}
