/**
 * Rebuilder module - triggers index recomputation without waiting for it
 */

import { DESIGN_PREFIX } from "../couch/endpoint.js";
import {
  CouchLiftError,
  RequestTimeoutError,
  UsageError,
} from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import type {
  IndexDefinitionRef,
  RebuildOptions,
  RebuildOutcome,
} from "./types.js";

export * from "./types.js";

/**
 * Parse `designDoc/viewName` into an index reference
 */
export function parseViewRef(
  databaseName: string,
  value: string,
): IndexDefinitionRef {
  const trimmed = value.startsWith(DESIGN_PREFIX)
    ? value.slice(DESIGN_PREFIX.length)
    : value;
  const slash = trimmed.indexOf("/");
  if (slash <= 0 || slash === trimmed.length - 1) {
    throw new UsageError(
      `Invalid view "${value}", expected <design-doc>/<view-name>`,
    );
  }
  return {
    databaseName,
    designDocName: trimmed.slice(0, slash),
    oneViewName: trimmed.slice(slash + 1),
  };
}

export class RebuildCoordinator {
  constructor(private readonly options: RebuildOptions) {}

  /**
   * Trigger a rebuild of every design document of each database, or of the
   * explicit views of a single database.
   */
  async rebuild(
    databases: readonly string[],
    explicitViews: readonly string[] = [],
  ): Promise<RebuildOutcome[]> {
    if (explicitViews.length > 0 && databases.length !== 1) {
      throw new UsageError(
        `Explicit views require exactly one database, got ${databases.length}`,
      );
    }

    const outcomes: RebuildOutcome[] = [];
    for (const database of databases) {
      logger.info("Rebuilding indexes", { database });
      if (explicitViews.length > 0) {
        const refs = explicitViews.map((view) => parseViewRef(database, view));
        for (const ref of refs) {
          outcomes.push(await this.trigger(ref));
        }
        continue;
      }

      const ids = await this.options.endpoint.listDesignDocuments(database);
      for (const id of ids) {
        outcomes.push(await this.rebuildDesignDocument(database, id));
      }
    }
    return outcomes;
  }

  /**
   * Read one design document and trigger its first view. A failed read
   * fails this design document only.
   */
  private async rebuildDesignDocument(
    database: string,
    id: string,
  ): Promise<RebuildOutcome> {
    const designDoc = id.slice(DESIGN_PREFIX.length);

    let oneViewName: string | undefined;
    try {
      const doc = await this.options.endpoint.getDesignDocument(database, id);
      [oneViewName] = Object.keys(doc?.views ?? {});
    } catch (error) {
      if (error instanceof CouchLiftError) {
        logger.error("Design document read failed", {
          database,
          designDoc,
          error: error.message,
        });
        return { database, designDoc, status: "failed", reason: error.message };
      }
      throw error;
    }

    if (oneViewName === undefined) {
      logger.info("No views to rebuild", { database, designDoc });
      return { database, designDoc, status: "skipped" };
    }
    return this.trigger({ databaseName: database, designDocName: designDoc, oneViewName });
  }

  private async trigger(ref: IndexDefinitionRef): Promise<RebuildOutcome> {
    const outcome = {
      database: ref.databaseName,
      designDoc: ref.designDocName,
      view: ref.oneViewName,
    };

    try {
      await this.options.endpoint.queryView(
        ref.databaseName,
        ref.designDocName,
        ref.oneViewName,
        this.options.timeoutSeconds * 1000,
      );
      logger.info("Index up to date", outcome);
      return { ...outcome, status: "built" };
    } catch (error) {
      if (error instanceof RequestTimeoutError) {
        logger.info("Index is building in the background", outcome);
        return { ...outcome, status: "building" };
      }
      if (error instanceof CouchLiftError) {
        // Fatal for this design document only
        logger.error("Index rebuild failed", { ...outcome, error: error.message });
        return { ...outcome, status: "failed", reason: error.message };
      }
      throw error;
    }
  }
}
