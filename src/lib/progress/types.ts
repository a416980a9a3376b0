/**
 * Progress sink types
 */

/**
 * Push-only receiver of `(current, max)` updates. No backpressure;
 * implementations may drop updates.
 */
export interface ProgressSink {
  update(current: number, max: number): void;
  stop(): void;
}
