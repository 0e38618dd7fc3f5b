import type { EnforcementTuning, ObservationTarget, WorkBlockKind } from '@driftguard/contracts';

export type GraceRequest = {
  targetKey: string;
  displayName: string;
  targetKind: ObservationTarget['kind'];
  reason: string;
  confidence: number;
  isRevisit: boolean;
  isUnplanned: boolean;
  /** null outside a work block. */
  blockKind: WorkBlockKind | null;
};

export type PendingGrace = GraceRequest & {
  startedAt: number;
  dueAt: number;
  durationSeconds: number;
};

export type GraceStart = 'started' | 'coalesced' | 'superseded';

export const graceDurationSeconds = (request: GraceRequest, tuning: EnforcementTuning['grace']): number => {
  if (request.isUnplanned) return tuning.unplannedSeconds;
  if (request.blockKind === 'deepWork' && request.targetKind === 'app') return tuning.deepWorkAppSeconds;
  if (request.isRevisit) return tuning.revisitSeconds;
  return tuning.firstSeconds;
};

/**
 * At most one pending grace period. Idle -> Pending -> Fired | Superseded | Cancelled.
 * Deadlines are data; the owner drains them with `takeDue` on its own clock.
 */
export class GraceScheduler {
  private pending: PendingGrace | null = null;

  constructor(private readonly tuning: EnforcementTuning['grace']) {}

  get current(): Readonly<PendingGrace> | null {
    return this.pending;
  }

  start(request: GraceRequest, now: number): GraceStart {
    if (this.pending && this.pending.targetKey === request.targetKey) {
      return 'coalesced';
    }
    const superseded = this.pending !== null;
    const durationSeconds = graceDurationSeconds(request, this.tuning);
    this.pending = { ...request, startedAt: now, dueAt: now + durationSeconds * 1000, durationSeconds };
    return superseded ? 'superseded' : 'started';
  }

  cancel(): PendingGrace | null {
    const cancelled = this.pending;
    this.pending = null;
    return cancelled;
  }

  /** Cancels a pending grace unless it belongs to `targetKey`. */
  cancelUnless(targetKey: string): PendingGrace | null {
    if (!this.pending || this.pending.targetKey === targetKey) return null;
    return this.cancel();
  }

  takeDue(now: number): PendingGrace | null {
    if (!this.pending || this.pending.dueAt > now) return null;
    return this.cancel();
  }
}
