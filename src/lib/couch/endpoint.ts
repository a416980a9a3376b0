/**
 * Typed access to one document-store endpoint (source or target)
 */

import type { Credentials } from "../../types/config.js";
import { TransportError } from "../../utils/errors.js";
import { sanitizeUrl } from "../../utils/logger.js";
import type { HttpClient, HttpMethod, HttpResponse } from "../http/types.js";
import {
  decodeAllDocs,
  decodeDatabaseInfo,
  decodeDatabaseList,
  decodeDesignDocument,
  decodeReplicationResult,
} from "./schemas.js";
import type {
  DatabaseInfo,
  DatabaseProbe,
  DesignDocument,
  ReplicationJobDocument,
  ReplicationResult,
} from "./types.js";

export const DESIGN_PREFIX = "_design/";

export interface CouchEndpointOptions {
  url: string;
  http: HttpClient;
  credentials?: Credentials;
  /** Applied to every request that does not set its own bound */
  requestTimeoutMs?: number;
}

export function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Escape a document id, keeping the `_design/` separator literal
 */
export function escapeDocId(id: string): string {
  if (id.startsWith(DESIGN_PREFIX)) {
    return DESIGN_PREFIX + encodeURIComponent(id.slice(DESIGN_PREFIX.length));
  }
  return encodeURIComponent(id);
}

export class CouchEndpoint {
  readonly baseUrl: string;
  private readonly http: HttpClient;
  private readonly credentials?: Credentials;
  private readonly requestTimeoutMs?: number;

  constructor(options: CouchEndpointOptions) {
    this.baseUrl = options.url.replace(/\/+$/, "");
    this.http = options.http;
    this.credentials = options.credentials;
    this.requestTimeoutMs = options.requestTimeoutMs;
  }

  /**
   * Absolute URL of a database, with the name escaped
   */
  databaseUrl(database: string): string {
    return `${this.baseUrl}/${encodeURIComponent(database)}`;
  }

  async listDatabases(): Promise<string[]> {
    const res = await this.send("GET", `${this.baseUrl}/_all_dbs`);
    return decodeDatabaseList(res.body);
  }

  async getDatabaseInfo(database: string): Promise<DatabaseInfo> {
    const res = await this.send("GET", this.databaseUrl(database));
    return decodeDatabaseInfo(res.body);
  }

  /**
   * Like getDatabaseInfo, but reports 404 and other statuses as data
   */
  async probeDatabaseInfo(database: string): Promise<DatabaseProbe> {
    const res = await this.http.request("GET", this.databaseUrl(database), {
      auth: this.credentials,
      timeoutMs: this.requestTimeoutMs,
    });
    if (res.status === 404) {
      return { kind: "missing" };
    }
    if (!isSuccess(res.status)) {
      return { kind: "error", status: res.status, body: res.body };
    }
    return { kind: "found", info: decodeDatabaseInfo(res.body) };
  }

  /**
   * Fetch a design document; `undefined` when it does not exist
   */
  async getDesignDocument(
    database: string,
    id: string,
  ): Promise<DesignDocument | undefined> {
    const url = `${this.databaseUrl(database)}/${escapeDocId(id)}`;
    const res = await this.http.request("GET", url, {
      auth: this.credentials,
      timeoutMs: this.requestTimeoutMs,
    });
    if (res.status === 404) {
      return undefined;
    }
    this.ensureSuccess("GET", url, res);
    return decodeDesignDocument(res.body);
  }

  async putDesignDocument(
    database: string,
    document: DesignDocument,
  ): Promise<void> {
    const url = `${this.databaseUrl(database)}/${escapeDocId(document._id)}`;
    await this.send("PUT", url, document);
  }

  /**
   * Ids of all design documents, via a key-range query over `_all_docs`
   */
  async listDesignDocuments(database: string): Promise<string[]> {
    const startkey = encodeURIComponent(JSON.stringify(DESIGN_PREFIX));
    const endkey = encodeURIComponent(JSON.stringify("_design0"));
    const url = `${this.databaseUrl(database)}/_all_docs?startkey=${startkey}&endkey=${endkey}`;
    const res = await this.send("GET", url);
    return decodeAllDocs(res.body).rows.map((row) => row.id);
  }

  /**
   * Read one row of a view, waiting at most `timeoutMs`
   */
  async queryView(
    database: string,
    designDoc: string,
    view: string,
    timeoutMs: number,
  ): Promise<void> {
    const url =
      `${this.databaseUrl(database)}/${escapeDocId(DESIGN_PREFIX + designDoc)}` +
      `/_view/${encodeURIComponent(view)}?limit=1`;
    await this.send("GET", url, undefined, timeoutMs);
  }

  /**
   * Trigger a one-shot replication. Unbounded: the server holds the
   * request open until the replication ends.
   */
  async replicate(
    job: ReplicationJobDocument,
    signal?: AbortSignal,
  ): Promise<ReplicationResult> {
    const res = await this.send(
      "POST",
      `${this.baseUrl}/_replicate`,
      job,
      null,
      signal,
    );
    return decodeReplicationResult(res.body);
  }

  async deleteDatabase(database: string): Promise<void> {
    await this.send("DELETE", this.databaseUrl(database));
  }

  /**
   * `timeoutMs` of null disables the default bound
   */
  private async send(
    method: HttpMethod,
    url: string,
    body?: unknown,
    timeoutMs?: number | null,
    signal?: AbortSignal,
  ): Promise<HttpResponse> {
    const res = await this.http.request(method, url, {
      auth: this.credentials,
      body,
      timeoutMs:
        timeoutMs === null ? undefined : (timeoutMs ?? this.requestTimeoutMs),
      signal,
    });
    this.ensureSuccess(method, url, res);
    return res;
  }

  private ensureSuccess(method: string, url: string, res: HttpResponse): void {
    if (isSuccess(res.status)) return;
    const safeUrl = sanitizeUrl(url);
    throw new TransportError(
      `${method} ${safeUrl} returned HTTP ${res.status}: ${describeBody(res.body)}`,
      { method, url: safeUrl, status: res.status, body: res.body },
    );
  }
}

/**
 * Short human-readable rendering of an error body
 */
export function describeBody(body: unknown): string {
  if (typeof body === "string") return body;
  if (body === null || body === undefined) return "<empty>";
  return JSON.stringify(body);
}
