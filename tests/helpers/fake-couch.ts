/**
 * In-process stand-in for a document-store HTTP endpoint pair.
 * Routes are matched on method and full URL; unmatched requests answer 404.
 */

import type {
  HttpClient,
  HttpMethod,
  HttpRequestOptions,
  HttpResponse,
} from '../../src/lib/http/types.js';
import { TransportError } from '../../src/utils/errors.js';

export const SOURCE = 'http://source.test:5986';
export const TARGET = 'http://target.test:5984';

export interface RecordedRequest {
  method: HttpMethod;
  url: string;
  options: HttpRequestOptions;
}

export type Responder =
  | HttpResponse
  | ((request: RecordedRequest) => HttpResponse | Promise<HttpResponse>);

interface Route {
  method: HttpMethod;
  url: string;
  responders: Responder[];
}

export function ok(body: unknown): HttpResponse {
  return { status: 200, body };
}

export function status(code: number, body: unknown = null): HttpResponse {
  return { status: code, body };
}

export function info(docCount: number, dataSize: number): HttpResponse {
  return ok({ db_name: 'x', doc_count: docCount, data_size: dataSize });
}

export const notFound: HttpResponse = status(404, {
  error: 'not_found',
  reason: 'Database does not exist.',
});

/**
 * Responder that never answers until the request is aborted
 */
export function hangUntilAborted(request: RecordedRequest): Promise<HttpResponse> {
  return new Promise((_resolve, reject) => {
    const abort = () =>
      reject(
        new TransportError('aborted', {
          method: request.method,
          url: request.url,
        }),
      );
    if (request.options.signal?.aborted) {
      abort();
      return;
    }
    request.options.signal?.addEventListener('abort', abort, { once: true });
  });
}

export class FakeCouch implements HttpClient {
  readonly calls: RecordedRequest[] = [];
  private readonly routes: Route[] = [];

  /**
   * Register responses for a route; they are served in order and the last
   * one repeats
   */
  on(method: HttpMethod, url: string, ...responders: Responder[]): this {
    this.routes.push({ method, url, responders });
    return this;
  }

  async request(
    method: HttpMethod,
    url: string,
    options: HttpRequestOptions = {},
  ): Promise<HttpResponse> {
    const recorded: RecordedRequest = { method, url, options };
    this.calls.push(recorded);

    const route = this.routes.find((r) => r.method === method && r.url === url);
    if (!route) {
      return notFound;
    }
    const responder =
      route.responders.length > 1 ? route.responders.shift() : route.responders[0];
    if (responder === undefined) {
      return notFound;
    }
    return typeof responder === 'function' ? responder(recorded) : responder;
  }

  /**
   * Calls as `METHOD url` strings, in order
   */
  log(): string[] {
    return this.calls.map((call) => `${call.method} ${call.url}`);
  }

  callsTo(method: HttpMethod, url: string): RecordedRequest[] {
    return this.calls.filter((call) => call.method === method && call.url === url);
  }
}

/**
 * Sleep stand-in that resolves on the next microtask
 */
export const instantSleep = async (): Promise<void> => {};
