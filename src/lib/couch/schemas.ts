/**
 * Response schemas for the document-store HTTP surface, compiled with Ajv.
 * Every decode fails closed with DecodeError.
 */

import Ajv, { type SchemaObject, type ValidateFunction } from "ajv";
import { DecodeError } from "../../utils/errors.js";
import type {
  AllDocsResponse,
  DatabaseInfo,
  DesignDocument,
  RawDatabaseInfo,
  RawReplicationResult,
  ReplicationResult,
} from "./types.js";

const ajv = new Ajv({
  strict: false,
  allErrors: true,
});

const databaseListSchema: SchemaObject = {
  type: "array",
  items: { type: "string" },
};

const databaseInfoSchema: SchemaObject = {
  type: "object",
  properties: {
    doc_count: { type: "integer", minimum: 0 },
    data_size: { type: "integer", minimum: 0 },
    sizes: {
      type: "object",
      properties: {
        active: { type: "integer", minimum: 0 },
        external: { type: "integer", minimum: 0 },
      },
    },
  },
  required: ["doc_count"],
};

const replicationResultSchema: SchemaObject = {
  type: "object",
  properties: {
    ok: { type: "boolean" },
    no_changes: { type: "boolean" },
  },
};

const allDocsSchema: SchemaObject = {
  type: "object",
  properties: {
    rows: {
      type: "array",
      items: {
        type: "object",
        properties: { id: { type: "string" } },
        required: ["id"],
      },
    },
  },
  required: ["rows"],
};

const designDocumentSchema: SchemaObject = {
  type: "object",
  properties: {
    _id: { type: "string" },
    _rev: { type: "string" },
    language: { type: "string" },
    views: { type: "object" },
    filters: { type: "object", additionalProperties: { type: "string" } },
  },
  required: ["_id"],
};

const validateDatabaseList = ajv.compile<string[]>(databaseListSchema);
const validateDatabaseInfo = ajv.compile<RawDatabaseInfo>(databaseInfoSchema);
const validateReplicationResult = ajv.compile<RawReplicationResult>(
  replicationResultSchema,
);
const validateAllDocs = ajv.compile<AllDocsResponse>(allDocsSchema);
const validateDesignDocument = ajv.compile<DesignDocument>(designDocumentSchema);

function decode<T>(
  validate: ValidateFunction<T>,
  body: unknown,
  what: string,
): T {
  if (validate(body)) {
    return body;
  }
  throw new DecodeError(`Unexpected ${what} response shape`, {
    errors: (validate.errors ?? []).map(
      (error) => `${error.instancePath || "/"} ${error.message ?? error.keyword}`,
    ),
  });
}

export function decodeDatabaseList(body: unknown): string[] {
  return decode(validateDatabaseList, body, "database list");
}

export function decodeDatabaseInfo(body: unknown): DatabaseInfo {
  const raw = decode(validateDatabaseInfo, body, "database info");
  return {
    docCount: raw.doc_count,
    dataSize: raw.data_size ?? raw.sizes?.external ?? raw.sizes?.active ?? 0,
  };
}

export function decodeReplicationResult(body: unknown): ReplicationResult {
  const raw = decode(validateReplicationResult, body, "replication");
  return { noChanges: raw.no_changes === true };
}

export function decodeAllDocs(body: unknown): AllDocsResponse {
  return decode(validateAllDocs, body, "all_docs");
}

export function decodeDesignDocument(body: unknown): DesignDocument {
  return decode(validateDesignDocument, body, "design document");
}
