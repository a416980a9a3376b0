/**
 * Catalog types
 */

export interface DatabaseRecord {
  name: string;
  isSystem: boolean;
}

/**
 * Databases visible on one endpoint, split by naming style
 */
export interface CatalogListing {
  /** Names without a shard-path marker */
  local: DatabaseRecord[];
  /** Logical names recovered from `shards/<range>/<name>.<epoch>` entries */
  clustered: DatabaseRecord[];
}
