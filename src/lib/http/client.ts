/**
 * fetch-based HTTP client
 */

import { Agent, fetch as undiciFetch, type Dispatcher } from "undici";
import type { Credentials } from "../../types/config.js";
import { RequestTimeoutError, TransportError } from "../../utils/errors.js";
import { logger, sanitizeUrl } from "../../utils/logger.js";
import type {
  HttpClient,
  HttpMethod,
  HttpRequestOptions,
  HttpResponse,
} from "./types.js";

/**
 * Pre-encoded value for an `Authorization` header
 */
export function basicAuthHeader(credentials: Credentials): string {
  const token = Buffer.from(
    `${credentials.login}:${credentials.password}`,
    "utf-8",
  ).toString("base64");
  return `Basic ${token}`;
}

/**
 * Combine the caller's signal with the request timeout, if any
 */
function requestSignal(
  options: HttpRequestOptions,
  timeout: AbortSignal | undefined,
): AbortSignal | undefined {
  if (!options.signal) return timeout;
  if (!timeout) return options.signal;

  const controller = new AbortController();
  for (const signal of [options.signal, timeout]) {
    signal.addEventListener("abort", () => controller.abort(signal.reason), {
      once: true,
    });
  }
  return controller.signal;
}

export interface FetchInit {
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
  dispatcher?: Dispatcher;
}

export interface FetchResponse {
  status: number;
  text(): Promise<string>;
}

export type FetchFunction = (
  url: string,
  init: FetchInit,
) => Promise<FetchResponse>;

export interface FetchHttpClientOptions {
  fetch?: FetchFunction;
  dispatcher?: Dispatcher;
}

/**
 * Connection pool without undici's own header and body timeouts (300s each).
 * The replication trigger stays open for the whole replication; every other
 * request is bounded by its `timeoutMs` signal.
 */
export function createUnboundedDispatcher(): Dispatcher {
  return new Agent({ headersTimeout: 0, bodyTimeout: 0 });
}

async function readBody(res: FetchResponse): Promise<unknown> {
  const text = await res.text();
  if (text === "") return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export class FetchHttpClient implements HttpClient {
  private readonly fetch: FetchFunction;
  private readonly dispatcher: Dispatcher;

  constructor(options: FetchHttpClientOptions = {}) {
    this.fetch = options.fetch ?? undiciFetch;
    this.dispatcher = options.dispatcher ?? createUnboundedDispatcher();
  }

  async request(
    method: HttpMethod,
    url: string,
    options: HttpRequestOptions = {},
  ): Promise<HttpResponse> {
    const headers: Record<string, string> = { Accept: "application/json" };
    if (options.auth) {
      headers.Authorization = basicAuthHeader(options.auth);
    }
    if (options.body !== undefined) {
      headers["Content-Type"] = "application/json";
    }

    logger.debug("HTTP request", { method, url: sanitizeUrl(url) });

    const timeout =
      options.timeoutMs !== undefined
        ? AbortSignal.timeout(options.timeoutMs)
        : undefined;

    try {
      const res = await this.fetch(url, {
        method,
        headers,
        body:
          options.body !== undefined ? JSON.stringify(options.body) : undefined,
        signal: requestSignal(options, timeout),
        dispatcher: this.dispatcher,
      });
      const body = await readBody(res);
      return { status: res.status, body };
    } catch (error) {
      const transport = { method, url: sanitizeUrl(url) };
      if (options.timeoutMs !== undefined && timeout?.aborted) {
        throw new RequestTimeoutError(
          `${method} ${transport.url} timed out after ${options.timeoutMs}ms`,
          transport,
          options.timeoutMs,
          { cause: error },
        );
      }
      throw new TransportError(
        `${method} ${transport.url} failed: ${error instanceof Error ? error.message : String(error)}`,
        transport,
        { cause: error },
      );
    }
  }
}

/**
 * Factory function for the default HTTP client
 */
export function createHttpClient(): HttpClient {
  return new FetchHttpClient();
}
