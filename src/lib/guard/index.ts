/**
 * Guard module - gates deletion of source data on a doc-count parity check
 */

import { DeletionRefusedError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import type {
  DeletionDecision,
  DeletionOutcome,
  GuardOptions,
  ParityCheck,
} from "./types.js";

export * from "./types.js";

export class DeletionGuard {
  constructor(private readonly options: GuardOptions) {}

  /**
   * Compare doc counts of the database on both endpoints
   */
  async checkParity(database: string): Promise<ParityCheck> {
    const source = await this.options.source.getDatabaseInfo(database);
    const target = await this.options.target.getDatabaseInfo(database);
    return {
      database,
      sourceDocCount: source.docCount,
      targetDocCount: target.docCount,
      inParity: target.docCount >= source.docCount,
    };
  }

  /**
   * `force` skips the parity check entirely
   */
  async authorizeDeletion(
    database: string,
    force: boolean,
  ): Promise<DeletionDecision> {
    if (force) {
      return { authorized: true };
    }

    const parity = await this.checkParity(database);
    if (!parity.inParity) {
      return {
        authorized: false,
        reason: `Target has fewer documents than source (${parity.targetDocCount} < ${parity.sourceDocCount}); deletion would be lossy`,
        parity,
      };
    }
    return { authorized: true, parity };
  }

  /**
   * Delete each database from the source only. The first refusal or
   * error stops the remaining deletions.
   */
  async deleteDatabases(
    databases: readonly string[],
    force: boolean,
  ): Promise<DeletionOutcome[]> {
    const outcomes: DeletionOutcome[] = [];

    for (const database of databases) {
      const decision = await this.authorizeDeletion(database, force);
      if (!decision.authorized) {
        throw new DeletionRefusedError(
          `Refusing to delete "${database}": ${decision.reason}`,
          decision.parity,
        );
      }

      await this.options.source.deleteDatabase(database);
      logger.info("Deleted source database", { database, forced: force });

      outcomes.push({
        database,
        forced: force,
        ...(decision.parity ? { parity: decision.parity } : {}),
      });
    }

    return outcomes;
  }
}
