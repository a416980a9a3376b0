/**
 * Monitor module - observes one in-flight replication by polling doc counts.
 *
 * The store emits no completion event, so convergence of the target's doc
 * count onto the source's is the only completion signal. A replication can
 * wedge silently, which is reported as a stall instead of waiting forever.
 */

import { describeBody } from "../couch/endpoint.js";
import type { DatabaseInfo } from "../couch/types.js";
import { sleep as defaultSleep, type Sleep } from "../utils/sleep.js";
import {
  CouchLiftError,
  TransportError,
} from "../../utils/errors.js";
import { logger, sanitizeUrl } from "../../utils/logger.js";
import type {
  MonitorOptions,
  MonitorResult,
  ReplicationProgress,
} from "./types.js";

export * from "./types.js";

const EMPTY_DATABASE: DatabaseInfo = { docCount: 0, dataSize: 0 };

/**
 * Number of unchanged polls that counts as a stall.
 * One poll is one tick; at the default 1000ms cadence ticks equal seconds.
 */
export function stallTicks(
  stallTimeoutSeconds: number,
  pollIntervalMs: number,
): number {
  return Math.max(1, Math.ceil((stallTimeoutSeconds * 1000) / pollIntervalMs));
}

export class ReplicationMonitor {
  private readonly options: MonitorOptions;
  private readonly sleep: Sleep;

  constructor(options: MonitorOptions) {
    this.options = options;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Poll until the target holds as many documents as the source, the doc
   * count stops moving for the stall timeout, or the target errors.
   */
  async watch(database: string, signal?: AbortSignal): Promise<MonitorResult> {
    const { source, progress: sink } = this.options;
    const limit = stallTicks(
      this.options.stallTimeoutSeconds,
      this.options.pollIntervalMs,
    );

    const sourceInfo = await source.getDatabaseInfo(database);
    const progress: ReplicationProgress = {
      targetDocCount: sourceInfo.docCount,
      observedDocCount: 0,
      observedSize: 0,
      stallStreak: 0,
      polls: 0,
    };

    logger.debug("Monitoring replication", {
      database,
      sourceDocCount: sourceInfo.docCount,
      sourceDataSize: sourceInfo.dataSize,
      stallTicks: limit,
    });

    if (sourceInfo.dataSize === 0) {
      return { status: "completed", progress };
    }

    try {
      while (progress.observedDocCount < progress.targetDocCount) {
        if (signal?.aborted) {
          return { status: "cancelled", progress };
        }

        const polled = await this.pollTarget(database);
        progress.polls++;
        if ("error" in polled) {
          return {
            status: "failed",
            reason: polled.reason,
            error: polled.error,
            progress,
          };
        }

        if (polled.docCount === progress.observedDocCount) {
          progress.stallStreak++;
        } else {
          progress.stallStreak = 0;
        }
        progress.observedDocCount = polled.docCount;
        progress.observedSize = polled.dataSize;

        if (progress.stallStreak >= limit) {
          logger.warn("Replication stalled", { database, ...progress });
          return { status: "stalled", progress };
        }

        // The clustered store may report a size above the source's
        sink?.update(
          Math.min(progress.observedSize, sourceInfo.dataSize),
          sourceInfo.dataSize,
        );

        if (progress.observedDocCount >= progress.targetDocCount) break;
        await this.sleep(this.options.pollIntervalMs, signal);
      }
    } finally {
      sink?.stop();
    }

    return { status: "completed", progress };
  }

  private async pollTarget(
    database: string,
  ): Promise<DatabaseInfo | { error: CouchLiftError; reason: string }> {
    const { target } = this.options;
    try {
      const probe = await target.probeDatabaseInfo(database);
      switch (probe.kind) {
        case "found":
          return probe.info;
        case "missing":
          // Replication has not created the target database yet
          return EMPTY_DATABASE;
        case "error": {
          const reason = describeBody(probe.body);
          const url = sanitizeUrl(target.databaseUrl(database));
          return {
            reason,
            error: new TransportError(
              `GET ${url} returned HTTP ${probe.status}: ${reason}`,
              { method: "GET", url, status: probe.status, body: probe.body },
            ),
          };
        }
      }
    } catch (error) {
      if (error instanceof CouchLiftError) {
        return { error, reason: error.message };
      }
      throw error;
    }
  }
}
