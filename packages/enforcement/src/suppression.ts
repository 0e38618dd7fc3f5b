/**
 * Exemptions from enforcement for the active block. Expiry is lazy:
 * an entry past its deadline is dropped the next time it is looked up.
 */
export class SuppressionRegistry {
  private perTarget: Map<string, number> = new Map();
  private sessionOverrides: Set<string> = new Set();
  private snoozedTargets: Set<string> = new Set();
  private globalSnoozeUntil: number | null = null;

  approve(targetKey: string, durationSeconds: number, now: number): number {
    const expiresAt = now + durationSeconds * 1000;
    this.perTarget.set(targetKey, expiresAt);
    return expiresAt;
  }

  sessionOverride(targetKey: string): void {
    this.sessionOverrides.add(targetKey);
  }

  hasSessionOverride(targetKey: string): boolean {
    return this.sessionOverrides.has(targetKey);
  }

  expiryFor(targetKey: string, now: number): number | null {
    const expiry = this.perTarget.get(targetKey);
    if (expiry === undefined) return null;
    if (expiry > now) return expiry;
    this.perTarget.delete(targetKey);
    return null;
  }

  isSuppressed(targetKey: string, now: number): boolean {
    return this.sessionOverrides.has(targetKey) || this.expiryFor(targetKey, now) !== null;
  }

  /** One snooze per target per block; returns false once it is spent. */
  snoozeTarget(targetKey: string, durationSeconds: number, now: number): boolean {
    if (this.snoozedTargets.has(targetKey)) return false;
    this.snoozedTargets.add(targetKey);
    this.approve(targetKey, durationSeconds, now);
    return true;
  }

  canSnooze(targetKey: string): boolean {
    return !this.snoozedTargets.has(targetKey);
  }

  snoozeGlobal(durationSeconds: number, now: number): number {
    this.globalSnoozeUntil = now + durationSeconds * 1000;
    return this.globalSnoozeUntil;
  }

  isGloballySnoozed(now: number): boolean {
    if (this.globalSnoozeUntil === null) return false;
    if (this.globalSnoozeUntil > now) return true;
    this.globalSnoozeUntil = null;
    return false;
  }

  /** Drops everything scoped to the block. The global snooze belongs to the day and survives. */
  clearBlockEntries(): void {
    this.perTarget.clear();
    this.sessionOverrides.clear();
    this.snoozedTargets.clear();
  }
}
