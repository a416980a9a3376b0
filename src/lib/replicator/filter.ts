/**
 * Deleted-document filter installed on the source before a filtered replication
 */

import { isDeepStrictEqual } from "util";
import type { CouchEndpoint } from "../couch/endpoint.js";
import type { DesignDocument } from "../couch/types.js";
import { ConflictError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

export const FILTER_DESIGN_DOC_ID = "_design/migrate";
export const FILTER_NAME = "deletedfilter";

/** Value of the `filter` field of a replication job */
export const FILTER_REFERENCE = `${FILTER_DESIGN_DOC_ID.slice("_design/".length)}/${FILTER_NAME}`;

export const FILTER_FUNCTION =
  "function(doc, req) { return !doc._deleted; }";

export function expectedFilterDocument(): DesignDocument {
  return {
    _id: FILTER_DESIGN_DOC_ID,
    language: "javascript",
    filters: { [FILTER_NAME]: FILTER_FUNCTION },
  };
}

/**
 * Create the filter design document if missing. An existing document whose
 * filters differ is never overwritten.
 */
export async function ensureDeletedFilter(
  source: CouchEndpoint,
  database: string,
): Promise<"created" | "present"> {
  const expected = expectedFilterDocument();
  const existing = await source.getDesignDocument(database, FILTER_DESIGN_DOC_ID);

  if (existing === undefined) {
    await source.putDesignDocument(database, expected);
    logger.info("Created replication filter", {
      database,
      id: FILTER_DESIGN_DOC_ID,
    });
    return "created";
  }

  if (!isDeepStrictEqual(existing.filters ?? {}, expected.filters)) {
    throw new ConflictError(
      `Design document ${FILTER_DESIGN_DOC_ID} in "${database}" exists with a different filter definition`,
      { database, expected: expected.filters, found: existing.filters ?? null },
    );
  }

  return "present";
}
