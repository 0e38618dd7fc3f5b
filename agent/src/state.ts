import type { Clock } from '@driftguard/enforcement';

// Ephemeral host state: daily snooze allowance and recent assessments

const localDayKey = (ms: number): string => {
  const date = new Date(ms);
  return `${date.getFullYear()}-${date.getMonth() + 1}-${date.getDate()}`;
};

export class SnoozeAllowance {
  private day = '';
  private used = 0;

  constructor(
    private readonly maxPerDay: number,
    private readonly clock: Clock,
  ) {}

  get remaining(): number {
    this.rollOver();
    return Math.max(0, this.maxPerDay - this.used);
  }

  tryConsume(): boolean {
    if (this.remaining === 0) return false;
    this.used += 1;
    return true;
  }

  private rollOver(): void {
    const today = localDayKey(this.clock.now());
    if (today !== this.day) {
      this.day = today;
      this.used = 0;
    }
  }
}

export type AssessmentEntry = {
  timestamp: number;
  title: string;
  intention: string;
  relevant: boolean;
  confidence: number;
  reason: string;
  action: string;
};

export class AssessmentLog {
  private items: AssessmentEntry[] = [];

  constructor(private readonly limit = 50) {}

  record(entry: AssessmentEntry): void {
    this.items.push(entry);
    if (this.items.length > this.limit) this.items.splice(0, this.items.length - this.limit);
  }

  /** Newest first. */
  entries(): AssessmentEntry[] {
    return [...this.items].reverse();
  }

  clear(): void {
    this.items = [];
  }
}
