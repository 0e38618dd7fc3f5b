/**
 * Cumulative distraction for the active block, in seconds.
 * Off-target polls add a full interval, on-target polls remove `interval * decayRatio`.
 * Timed samples closer than half an interval to the previous one are dropped; `reset`
 * zeroes the value but keeps the sample clock.
 */
export class DistractionCounter {
  private value = 0;
  private lastSampleAt: number | null = null;

  constructor(private readonly decayRatio: number) {}

  get seconds(): number {
    return this.value;
  }

  /** Returns false when the sample was dropped. */
  onObservation(relevant: boolean, pollIntervalSeconds: number, at?: number): boolean {
    if (at !== undefined) {
      if (this.lastSampleAt !== null && at - this.lastSampleAt < (pollIntervalSeconds * 1000) / 2) return false;
      this.lastSampleAt = at;
    }
    if (relevant) {
      this.value = Math.max(0, this.value - pollIntervalSeconds * this.decayRatio);
    } else {
      this.value += pollIntervalSeconds;
    }
    return true;
  }

  reset(): void {
    this.value = 0;
  }

  get minutes(): number {
    return Math.floor(this.value / 60);
  }
}
