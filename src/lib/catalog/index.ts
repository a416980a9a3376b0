/**
 * Catalog module - enumerates and classifies databases on an endpoint
 */

import type { CouchEndpoint } from "../couch/endpoint.js";
import { UsageError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import type { CatalogListing, DatabaseRecord } from "./types.js";

export * from "./types.js";

export const SYSTEM_PREFIX = "_";
export const SHARD_MARKER = "shards/";

const EPOCH_SUFFIX = /\.\d+$/;

export function isSystemDatabase(name: string): boolean {
  return name.startsWith(SYSTEM_PREFIX);
}

export function isShardPath(name: string): boolean {
  return name.startsWith(SHARD_MARKER);
}

/**
 * Recover the logical database name from a shard path.
 *
 * @example
 * logicalNameFromShard("shards/80000000-ffffffff/movies.1509721710"); // "movies"
 */
export function logicalNameFromShard(shardPath: string): string {
  const segments = shardPath.split("/");
  // A database name may itself contain slashes
  const name = segments.slice(2).join("/");
  return name.replace(EPOCH_SUFFIX, "");
}

function toRecords(names: Iterable<string>): DatabaseRecord[] {
  return Array.from(new Set(names))
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
    .map((name) => ({ name, isSystem: isSystemDatabase(name) }));
}

/**
 * Split a flat `_all_dbs` listing into local-style and clustered-style names
 */
export function classifyDatabases(
  names: readonly string[],
  includeSystem: boolean,
): CatalogListing {
  const local: string[] = [];
  const clustered: string[] = [];

  for (const raw of names) {
    if (isShardPath(raw)) {
      const logical = logicalNameFromShard(raw);
      if (logical !== "") clustered.push(logical);
    } else {
      local.push(raw);
    }
  }

  const keep = (name: string): boolean =>
    includeSystem || !isSystemDatabase(name);

  return {
    local: toRecords(local.filter(keep)),
    clustered: toRecords(clustered.filter(keep)),
  };
}

/**
 * Enumerate the databases of an endpoint. Transport errors propagate unchanged.
 */
export async function enumerate(
  endpoint: CouchEndpoint,
  includeSystem: boolean,
): Promise<CatalogListing> {
  const names = await endpoint.listDatabases();
  const listing = classifyDatabases(names, includeSystem);

  logger.debug("Catalog enumerated", {
    raw: names.length,
    local: listing.local.length,
    clustered: listing.clustered.length,
  });

  return listing;
}

export interface DatabaseSelection {
  databases: readonly string[];
  allDbs: boolean;
  includeSystem: boolean;
}

/**
 * Resolve the databases a command operates on: the explicit names, or with
 * `allDbs` the sorted local-style partition of the endpoint's catalog.
 */
export async function selectDatabases(
  selection: DatabaseSelection,
  endpoint: CouchEndpoint,
): Promise<string[]> {
  if (selection.allDbs && selection.databases.length > 0) {
    throw new UsageError("Pass database names or --all-dbs, not both");
  }
  if (!selection.allDbs) {
    if (selection.databases.length === 0) {
      throw new UsageError("No database given (pass names or --all-dbs)");
    }
    return [...selection.databases];
  }

  const listing = await enumerate(endpoint, selection.includeSystem);
  return listing.local.map((record) => record.name);
}
