export type ScheduledEvent<TPayload> = {
  id: number;
  at: number;
  payload: TPayload;
};

/** One-shot deadlines held as data and drained against the owner's clock. */
export class Timeline<TPayload> {
  private events: ScheduledEvent<TPayload>[] = [];
  private nextId = 1;

  schedule(at: number, payload: TPayload): number {
    const id = this.nextId++;
    this.events.push({ id, at, payload });
    return id;
  }

  cancelWhere(predicate: (payload: TPayload) => boolean): number {
    const before = this.events.length;
    this.events = this.events.filter(event => !predicate(event.payload));
    return before - this.events.length;
  }

  takeDue(now: number): ScheduledEvent<TPayload>[] {
    const due = this.events.filter(event => event.at <= now).sort((a, b) => a.at - b.at || a.id - b.id);
    if (due.length > 0) this.events = this.events.filter(event => event.at > now);
    return due;
  }

  clear(): void {
    this.events = [];
  }

  /** Earliest scheduled time, or null when nothing is pending. */
  get nextAt(): number | null {
    return this.events.reduce<number | null>(
      (earliest, event) => (earliest === null || event.at < earliest ? event.at : earliest),
      null,
    );
  }

  get size(): number {
    return this.events.length;
  }
}
