/**
 * Replicator module - triggers one replication per database and supervises
 * it with a concurrently running monitor
 */

import { basicAuthHeader } from "../http/client.js";
import type { ReplicationJobDocument, ReplicationResult } from "../couch/types.js";
import { ReplicationMonitor, type MonitorResult } from "../monitor/index.js";
import type { Credentials, MigrationConfig } from "../../types/config.js";
import { StallError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { ensureDeletedFilter, FILTER_REFERENCE } from "./filter.js";
import type { ReplicationOutcome, ReplicatorDeps } from "./types.js";

export * from "./types.js";
export * from "./filter.js";

/**
 * Build the one-shot replication request. Credentials travel inside the job
 * because the target's replicator, not this process, fetches from the source.
 */
export function buildReplicationJob(
  sourceUrl: string,
  targetUrl: string,
  options: { filterDeleted: boolean; credentials?: Credentials },
): ReplicationJobDocument {
  const headers = options.credentials
    ? { Authorization: basicAuthHeader(options.credentials) }
    : undefined;

  return {
    continuous: false,
    create_target: true,
    source: headers ? { url: sourceUrl, headers } : { url: sourceUrl },
    target: headers ? { url: targetUrl, headers } : { url: targetUrl },
    ...(options.filterDeleted ? { filter: FILTER_REFERENCE } : {}),
  };
}

export class ReplicationOrchestrator {
  private readonly deps: ReplicatorDeps;
  private readonly config: MigrationConfig;

  constructor(deps: ReplicatorDeps) {
    this.deps = deps;
    this.config = deps.config;
  }

  /**
   * Replicate databases one at a time, in the given order. The first failure
   * aborts the remaining databases.
   */
  async replicate(databases: readonly string[]): Promise<ReplicationOutcome[]> {
    const outcomes: ReplicationOutcome[] = [];
    for (const database of databases) {
      outcomes.push(await this.replicateOne(database));
    }
    return outcomes;
  }

  async replicateOne(database: string): Promise<ReplicationOutcome> {
    const startTime = Date.now();
    const { source, target } = this.deps;
    const settings = this.config.replicate;

    logger.info("Starting replication", { database });

    const filter = settings.filterDeleted
      ? await ensureDeletedFilter(source, database)
      : undefined;

    const job = buildReplicationJob(
      source.databaseUrl(database),
      target.databaseUrl(database),
      {
        filterDeleted: settings.filterDeleted,
        credentials: this.config.credentials,
      },
    );

    const monitor = new ReplicationMonitor({
      source,
      target,
      stallTimeoutSeconds: settings.stallTimeoutSeconds,
      pollIntervalMs: settings.pollIntervalMs,
      progress: this.deps.progress?.(database),
      sleep: this.deps.sleep,
    });

    const monitorControl = new AbortController();
    const triggerControl = new AbortController();

    // Start watching before the trigger so the earliest progress is seen
    const watching = monitor.watch(database, monitorControl.signal).then(
      (result: MonitorResult) => {
        if (result.status === "stalled" || result.status === "failed") {
          triggerControl.abort();
        }
        return result;
      },
      (error: unknown) => {
        triggerControl.abort();
        throw error;
      },
    );

    const triggered = target.replicate(job, triggerControl.signal).then(
      (result: ReplicationResult) => {
        if (result.noChanges) monitorControl.abort();
        return result;
      },
      (error: unknown) => {
        monitorControl.abort();
        throw error;
      },
    );

    // Join both before the next database starts
    const [trigger, watch] = await Promise.allSettled([triggered, watching]);

    if (watch.status === "rejected") {
      throw watch.reason;
    }
    const result = watch.value;

    if (result.status === "stalled") {
      throw new StallError(
        `Replication of "${database}" stalled at ${result.progress.observedDocCount}/${result.progress.targetDocCount} documents`,
        { database, ...result.progress },
      );
    }
    if (result.status === "failed") {
      throw result.error;
    }
    if (trigger.status === "rejected") {
      throw trigger.reason;
    }

    const durationMs = Date.now() - startTime;
    const base = {
      database,
      docCount: result.progress.targetDocCount,
      polls: result.progress.polls,
      ...(filter ? { filter } : {}),
      durationMs,
    };

    if (trigger.value.noChanges) {
      logger.info("Already caught up", { database });
      return { ...base, status: "up-to-date" };
    }

    logger.info("Replication complete.", { database, durationMs });
    return { ...base, status: "completed" };
  }
}
