/**
 * Progress module - terminal progress bars for replication monitoring
 */

import cliProgress from "cli-progress";
import type { SingleBar } from "cli-progress";
import type { ProgressSink } from "./types.js";

export * from "./types.js";

/**
 * Progress sink rendering a single cli-progress bar on stderr
 */
export class BarProgressSink implements ProgressSink {
  private bar: SingleBar | null = null;

  constructor(private readonly label: string) {}

  update(current: number, max: number): void {
    if (!this.bar) {
      this.bar = new cliProgress.SingleBar(
        {
          format: `${this.label} |{bar}| {percentage}% | {value}/{total} bytes`,
          hideCursor: true,
          stream: process.stderr,
        },
        cliProgress.Presets.shades_classic,
      );
      this.bar.start(max, current);
      return;
    }
    this.bar.setTotal(max);
    this.bar.update(current);
  }

  stop(): void {
    this.bar?.stop();
    this.bar = null;
  }
}

/**
 * Sink factory keyed by database name; quiet runs use no sink
 */
export type ProgressSinkFactory = (database: string) => ProgressSink | undefined;

export function createBarSinkFactory(quiet: boolean): ProgressSinkFactory {
  return (database) => (quiet ? undefined : new BarProgressSink(database));
}
