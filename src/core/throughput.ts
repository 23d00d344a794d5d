/**
 * Sliding-window counter of finished tasks
 */
export class ThroughputTracker {
  private readonly timestamps: number[] = [];

  constructor(
    private readonly windowMs: number = 60000,
    private readonly now: () => number = Date.now
  ) {}

  record(): void {
    this.timestamps.push(this.now());
  }

  /** Tasks finished within the last window */
  count(): number {
    const cutoff = this.now() - this.windowMs;
    let expired = 0;
    while (expired < this.timestamps.length && this.timestamps[expired] <= cutoff) {
      expired++;
    }
    this.timestamps.splice(0, expired);
    return this.timestamps.length;
  }
}
