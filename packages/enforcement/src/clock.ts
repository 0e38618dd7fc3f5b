export interface Clock {
  /** Epoch milliseconds. */
  now(): number;
}

export const systemClock: Clock = { now: () => Date.now() };

/** Clock advanced by hand; used by tests and by replay tooling. */
export class ManualClock implements Clock {
  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  advanceSeconds(seconds: number): number {
    this.current += seconds * 1000;
    return this.current;
  }

  set(ms: number): void {
    this.current = ms;
  }
}

export const secondsBetween = (fromMs: number, toMs: number): number => (toMs - fromMs) / 1000;
