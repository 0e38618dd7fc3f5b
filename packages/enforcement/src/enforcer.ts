import {
  enforcementTogglesSchema,
  enforcementTuningSchema,
  isWorkBlock,
  justificationSchema,
  lifecycleOptionsSchema,
} from '@driftguard/contracts';
import type {
  BlockEnforcement,
  EnforcementCommand,
  EnforcementToggles,
  EnforcementTogglesInput,
  EnforcementTuning,
  EnforcementTuningInput,
  JustificationOutcome,
  LifecycleOptions,
  LifecycleOptionsInput,
  Observation,
  ObservationTarget,
  RelevanceOracle,
  ScheduleGap,
  TimeBlock,
  WorkBlockKind,
} from '@driftguard/contracts';
import { systemClock, secondsBetween } from './clock';
import type { Clock } from './clock';
import { DistractionCounter } from './counter';
import { GraceScheduler } from './grace';
import type { PendingGrace } from './grace';
import { planAcceptance, planRejection, rescoreWithJustification } from './justification';
import type { JustificationVerdict } from './justification';
import { enforcingBlock, reduceLifecycle } from './lifecycle';
import type { LifecycleEvent, LifecyclePhase } from './lifecycle';
import { createLogger } from './logger';
import type { Logger } from './logger';
import { createPresentationStore } from './presentation';
import type { PresentationState, PresentationStore } from './presentation';
import { grayscaleIntensity, reconcileGrayscale } from './reconciler';
import { createRunState, endRun, enterOffTarget, isOffTarget, rearm } from './run-state';
import type { RunState } from './run-state';
import { SuppressionRegistry } from './suppression';
import { evaluateThresholds, recordAction, thresholdTable } from './thresholds';
import type { PolicyAction, ThresholdRule } from './thresholds';
import { Timeline } from './timeline';

export type EnforcerOptions = {
  tuning?: EnforcementTuningInput;
  toggles?: EnforcementTogglesInput;
  lifecycle?: LifecycleOptionsInput;
  clock?: Clock;
  logger?: Logger;
  scorer?: RelevanceOracle | null;
  store?: PresentationStore;
};

export type InboundResult = 'applied' | 'stale' | 'ignored';

export type CommandListener = (command: EnforcementCommand) => void;

export type DeadlineListener = (at: number | null) => void;

type ActiveBlock = TimeBlock & { kind: WorkBlockKind };

type TimelineEvent = { type: 'autoDismissNudge' };

export type EnforcerSnapshot = {
  phase: LifecyclePhase['phase'];
  gap: ScheduleGap;
  blockId: string | null;
  counterSeconds: number;
  offTargetKey: string | null;
  pendingGraceKey: string | null;
  frontmostKey: string | null;
};

const UNPLANNED_INTENTION: Record<Exclude<ScheduleGap, 'off'>, { intention: string; reason: string }> = {
  noPlan: { intention: 'Plan your day', reason: 'Set up your daily plan to start browsing.' },
  unplanned: {
    intention: 'Unscheduled time',
    reason: "This time isn't scheduled. Add a block or take a break.",
  },
};

const minuteOfDay = (ms: number): number => {
  const date = new Date(ms);
  return date.getHours() * 60 + date.getMinutes();
};

export const isDelegatedHost = (hostname: string, delegated: readonly string[]): boolean =>
  delegated.some(host => hostname === host || hostname.endsWith(`.${host}`));

/**
 * Single owner of the distraction state for the active block.
 *
 * Every inbound call first drains due deadlines (grace, auto-dismiss) against the clock,
 * then applies its input, then reconciles the grayscale effect. Nothing here throws across
 * the boundary; anomalies are logged and the call degrades to a no-op.
 *
 * The counter samples at most once per half poll interval, so foreground switches and
 * title changes between polls do not add time. Hosts arm a timer at `nextDeadline()` and
 * call `wake()` so deadlines fire on time between polls.
 */
export class FocusEnforcer {
  private readonly tuning: EnforcementTuning;
  private readonly toggles: EnforcementToggles;
  private readonly lifecycleOptions: LifecycleOptions;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly presentation: PresentationStore;
  private readonly tables: Record<WorkBlockKind, ThresholdRule[]>;
  private readonly listeners: Set<CommandListener> = new Set();
  private readonly deadlineListeners: Set<DeadlineListener> = new Set();

  private scorer: RelevanceOracle | null;
  private distraction: DistractionCounter;
  private runState: RunState = createRunState();
  private readonly suppressions = new SuppressionRegistry();
  private readonly grace: GraceScheduler;
  private readonly timeline = new Timeline<TimelineEvent>();

  private lifecycle: LifecyclePhase = { phase: 'idle' };
  private gap: ScheduleGap = 'off';
  private scheduleBlockId: string | null = null;
  private blockEpoch = 0;
  private frontmost: ObservationTarget | null = null;
  private lastVerdict: Observation | null = null;
  private lastRelevantUrl: string | null = null;
  private extensionConnected = false;
  private unplannedSnoozeAvailable = true;
  private publishedDeadline: number | null = null;

  constructor(options: EnforcerOptions = {}) {
    this.tuning = enforcementTuningSchema.parse(options.tuning ?? {});
    this.toggles = enforcementTogglesSchema.parse(options.toggles ?? {});
    this.lifecycleOptions = lifecycleOptionsSchema.parse(options.lifecycle ?? {});
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger('Enforcer');
    this.scorer = options.scorer ?? null;
    this.presentation = options.store ?? createPresentationStore();
    this.distraction = new DistractionCounter(this.tuning.decayRatio);
    this.grace = new GraceScheduler(this.tuning.grace);
    this.tables = {
      deepWork: thresholdTable('deepWork', this.tuning),
      focusHours: thresholdTable('focusHours', this.tuning),
    };
  }

  get counter(): Readonly<DistractionCounter> {
    return this.distraction;
  }

  get run(): Readonly<RunState> {
    return this.runState;
  }

  get suppression(): SuppressionRegistry {
    return this.suppressions;
  }

  get store(): PresentationStore {
    return this.presentation;
  }

  get state(): EnforcerSnapshot {
    return {
      phase: this.lifecycle.phase,
      gap: this.gap,
      blockId: this.scheduleBlockId,
      counterSeconds: this.distraction.seconds,
      offTargetKey: this.runState.offTargetKey,
      pendingGraceKey: this.grace.current?.targetKey ?? null,
      frontmostKey: this.frontmost?.key ?? null,
    };
  }

  subscribe(listener: CommandListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Notified with the earliest pending deadline whenever it moves. */
  onDeadlineChanged(listener: DeadlineListener): () => void {
    this.deadlineListeners.add(listener);
    return () => {
      this.deadlineListeners.delete(listener);
    };
  }

  /** Earliest pending grace or auto-dismiss deadline, in epoch ms. */
  nextDeadline(): number | null {
    const grace = this.grace.current?.dueAt ?? null;
    const scheduled = this.timeline.nextAt;
    if (grace === null) return scheduled;
    if (scheduled === null) return grace;
    return Math.min(grace, scheduled);
  }

  setScorer(scorer: RelevanceOracle | null): void {
    this.scorer = scorer;
  }

  setExtensionConnected(connected: boolean): void {
    this.extensionConnected = connected;
  }

  setUnplannedSnoozeAvailable(available: boolean): void {
    this.unplannedSnoozeAvailable = available;
  }

  // Inbound: schedule

  currentTimeBlockChanged(block: TimeBlock | null, gap: ScheduleGap = 'off'): InboundResult {
    this.drain();
    const blockId = block?.id ?? null;
    this.gap = block ? 'off' : gap;
    this.lifecycle = reduceLifecycle(this.lifecycle, { type: 'blockChanged', block }, this.lifecycleOptions);
    if (blockId !== this.scheduleBlockId) {
      this.logger.info(`Block changed: ${this.scheduleBlockId ?? 'none'} -> ${blockId ?? 'none'} (${this.lifecycle.phase})`);
      this.scheduleBlockId = blockId;
      this.resetBlockState();
    }
    this.reconcile();
    return 'applied';
  }

  completeRitual(): InboundResult {
    return this.advanceLifecycle({ type: 'ritualCompleted' });
  }

  skipRitual(): InboundResult {
    return this.advanceLifecycle({ type: 'ritualSkipped' });
  }

  finishCelebration(): InboundResult {
    return this.advanceLifecycle({ type: 'celebrationFinished' });
  }

  // Inbound: observation stream

  foregroundChanged(target: ObservationTarget | null): InboundResult {
    this.drain();
    const previousKey = this.frontmost?.key ?? null;
    this.frontmost = target;
    if (previousKey !== (target?.key ?? null)) {
      this.lastVerdict = null;
      const cancelled = target ? this.grace.cancelUnless(target.key) : this.grace.cancel();
      if (cancelled) this.logger.debug(`Grace cancelled for ${cancelled.displayName}`);
    }
    this.reconcile();
    return 'applied';
  }

  observe(observation: Observation): InboundResult {
    this.drain();
    if (this.frontmost && this.frontmost.key !== observation.target.key) {
      this.logger.debug(`Stale verdict for ${observation.target.key}; frontmost is ${this.frontmost.key}`);
      return 'stale';
    }
    this.frontmost = observation.target;
    this.lastVerdict = observation;
    const result = this.evaluate(observation, true);
    this.reconcile();
    return result;
  }

  /** Heartbeat for an unchanged target. `neutral` marks a tick whose content could not be read. */
  pollTick(options: { neutral?: boolean } = {}): InboundResult {
    this.drain();
    let result: InboundResult = 'ignored';
    if (options.neutral && this.frontmost) {
      result = this.evaluate({ target: this.frontmost, relevant: true, confidence: 0, reason: 'unreadable' }, false);
    } else if (this.lastVerdict && this.frontmost && this.lastVerdict.target.key === this.frontmost.key) {
      result = this.evaluate(this.lastVerdict, true);
    }
    this.reconcile();
    return result;
  }

  /** Fires whatever has come due without feeding an observation. */
  wake(): InboundResult {
    this.drain();
    this.reconcile();
    return 'applied';
  }

  /**
   * Our own window came forward. An overlay stays up since the user is interacting with it;
   * otherwise the nudge goes and the last verdict is forgotten. A pending grace keeps running.
   */
  ownAppFocused(): InboundResult {
    this.drain();
    if (this.presentation.getState().overlayVisible) return 'ignored';
    this.dismissNudge();
    this.lastVerdict = null;
    this.reconcile();
    return 'applied';
  }

  // Inbound: user intent

  async userSubmittedJustification(text: string): Promise<JustificationOutcome> {
    this.drain();
    const block = this.activeBlock();
    const target = this.frontmost;
    if (!block || !target) {
      this.logger.warn('Justification without an active block or target; rejecting');
      return 'rejected';
    }
    this.dismissNudge();

    const parsed = justificationSchema.safeParse({ text });
    const epoch = this.blockEpoch;
    const verdict: JustificationVerdict = parsed.success
      ? await rescoreWithJustification(this.scorer, { block, target, text: parsed.data.text }, this.logger)
      : { accepted: false, reason: 'An explanation is required' };

    this.drain();
    if (epoch !== this.blockEpoch || this.frontmost?.key !== target.key) {
      this.logger.debug(`Justification result for ${target.key} arrived after the context changed`);
      return 'stale';
    }

    const now = this.clock.now();
    if (verdict.accepted) {
      const plan = planAcceptance({ block, target }, this.tuning.suppression.deepWorkJustificationSeconds);
      if (plan.grant.type === 'timeBoxed') this.suppressions.approve(target.key, plan.grant.seconds, now);
      else this.suppressions.sessionOverride(target.key);
      this.grace.cancel();
      this.dismissOverlay();
      endRun(this.runState, now);
      for (const command of plan.commands) this.emit(command);
      this.logger.info(`Justification accepted for ${target.displayName} (${plan.grant.type})`);
      this.reconcile();
      return 'accepted';
    }

    this.runState.warnedTargets.add(target.key);
    this.runState.enforcedTargetKey = target.key;
    const commands = planRejection({
      block,
      target,
      reason: verdict.reason,
      distractionMinutes: this.distraction.minutes,
      focusDurationMinutes: this.focusDurationMinutes(block),
      canSnooze: this.suppressions.canSnooze(target.key),
      overlayEnabled: this.toggles[block.kind].blockingOverlay,
    });
    for (const command of commands) this.emit(command);
    this.logger.info(`Justification rejected for ${target.displayName}: ${verdict.reason}`);
    this.reconcile();
    return 'rejected';
  }

  userDismissedNudge(): InboundResult {
    this.timeline.cancelWhere(event => event.type === 'autoDismissNudge');
    this.presentation.getState().report({ nudgeVisible: false });
    this.publishDeadline();
    return 'applied';
  }

  userDismissedIntervention(): InboundResult {
    this.presentation.getState().report({ interventionVisible: false });
    return 'applied';
  }

  reportPresentation(patch: Partial<PresentationState>): void {
    this.presentation.getState().report(patch);
    this.reconcile();
  }

  /** Returns false when no snooze applies or the target's snooze is already spent. */
  userRequestedSnooze(): boolean {
    this.drain();
    const now = this.clock.now();
    const block = this.activeBlock();
    if (block) {
      const key = this.runState.enforcedTargetKey ?? this.runState.offTargetKey ?? this.frontmost?.key;
      if (!key) return false;
      if (!this.suppressions.snoozeTarget(key, this.tuning.suppression.snoozeSeconds, now)) {
        this.logger.info(`Snooze already used for ${key} this block`);
        return false;
      }
      this.logger.info(`Snoozed ${key} for ${this.tuning.suppression.snoozeSeconds}s`);
    } else if (this.unplannedGap()) {
      if (!this.unplannedSnoozeAvailable) return false;
      this.suppressions.snoozeGlobal(this.tuning.suppression.snoozeSeconds, now);
      this.unplannedSnoozeAvailable = false;
      this.logger.info(`Unplanned enforcement snoozed for ${this.tuning.suppression.snoozeSeconds}s`);
    } else {
      return false;
    }
    this.grace.cancel();
    this.dismissNudge();
    this.dismissOverlay();
    if (endRun(this.runState, now)) this.emit({ type: 'setTimerIndicator', distracted: false });
    this.reconcile();
    return true;
  }

  userRequestedBackToWork(): InboundResult {
    this.drain();
    this.grace.cancel();
    this.dismissNudge();
    this.dismissOverlay();
    this.runState.enforcedTargetKey = null;
    if (this.frontmost?.kind === 'tab') {
      this.emit({ type: 'redirectToURL', url: this.lastRelevantUrl ?? this.tuning.fallbackWorkUrl });
    }
    this.reconcile();
    return 'applied';
  }

  // Core evaluation

  private evaluate(observation: Observation, trackUrl: boolean): InboundResult {
    const block = this.activeBlock();
    if (!block) {
      return this.unplannedGap() ? this.evaluateUnplanned(observation) : 'ignored';
    }
    if (observation.relevant) {
      this.onRelevant(block, observation.target, trackUrl);
      return 'applied';
    }
    return this.onOffTarget(block, observation);
  }

  private onRelevant(block: ActiveBlock, target: ObservationTarget, trackUrl: boolean): void {
    const now = this.clock.now();
    if (this.grace.current?.targetKey === target.key) this.grace.cancel();
    this.distraction.onObservation(true, this.tuning.pollIntervalSeconds, now);
    rearm(this.runState, block.kind, this.distraction.seconds, this.tuning.deepWork);
    if (trackUrl && target.kind === 'tab' && target.url) this.lastRelevantUrl = target.url;
    if (endRun(this.runState, now)) {
      this.logger.debug(`Back on target after run; counter ${this.distraction.seconds}s`);
      this.dismissNudge();
      this.dismissOverlay();
      this.emit({ type: 'setTimerIndicator', distracted: false });
    }
  }

  private onOffTarget(block: ActiveBlock, observation: Observation): InboundResult {
    const { target } = observation;
    const now = this.clock.now();
    if (this.suppressions.isSuppressed(target.key, now)) {
      this.logger.debug(`Suppressed: ${target.key}`);
      return 'ignored';
    }

    if (!this.distraction.onObservation(false, this.tuning.pollIntervalSeconds, now)) {
      this.logger.debug(`Sample for ${target.key} within half a poll of the last one; counter unchanged`);
    }
    const { newRun, targetSwitched } = enterOffTarget(this.runState, target, block.kind);
    if (newRun) this.retriggerGrayscale(block, now);

    if (target.kind === 'app') {
      this.startGrace(block, observation, now);
      return 'applied';
    }

    const action = evaluateThresholds(this.tables[block.kind], this.distraction.seconds, this.runState, {
      targetKey: target.key,
      targetKind: target.kind,
      revisit: targetSwitched,
      nudgeVisible: this.presentation.getState().nudgeVisible,
      interventionVisible: this.presentation.getState().interventionVisible,
    });
    if (action) {
      const wasGray = this.runState.grayscaleActiveThisRun;
      recordAction(this.runState, action, target.key);
      this.dispatch(block, action, target, wasGray, now);
    }
    return 'applied';
  }

  private retriggerGrayscale(block: ActiveBlock, now: number): void {
    const run = this.runState;
    if (!run.grayscaleTriggeredThisBlock) return;
    const recovery = run.lastOffTargetEndTime === null ? 0 : secondsBetween(run.lastOffTargetEndTime, now);
    const intensity = grayscaleIntensity(recovery, this.tuning.grayscale);
    if (intensity === null) {
      run.grayscaleTriggeredThisBlock = false;
      this.logger.debug(`Grayscale forgotten after ${recovery}s on target`);
      return;
    }
    run.grayscaleActiveThisRun = true;
    if (this.toggles[block.kind].screenGrayscale) {
      this.emit({ type: 'setGrayscale', active: true, intensity });
    }
  }

  private dispatch(block: ActiveBlock, action: PolicyAction, target: ObservationTarget, wasGray: boolean, now: number): void {
    const toggles: BlockEnforcement = this.toggles[block.kind];
    const delegated =
      block.kind === 'deepWork' &&
      this.extensionConnected &&
      target.kind === 'tab' &&
      isDelegatedHost(target.key, this.tuning.delegatedHosts);
    if (delegated) this.logger.debug(`${action.type} for ${target.key} delegated to the browser extension`);

    switch (action.type) {
      case 'nudge':
      case 'warningNudge':
      case 'persistentNudge': {
        this.emit({ type: 'setTimerIndicator', distracted: true });
        if (delegated || !toggles.nudgeNotifications) return;
        this.emit({
          type: 'showNudge',
          intention: block.title,
          displayName: target.displayName,
          escalated: action.type === 'persistentNudge',
          distractionMinutes: this.distraction.minutes,
          warning: action.type === 'warningNudge',
        });
        this.timeline.cancelWhere(event => event.type === 'autoDismissNudge');
        if (action.type === 'nudge' && block.kind === 'focusHours') {
          this.timeline.schedule(now + this.tuning.nudgeAutoDismissSeconds * 1000, { type: 'autoDismissNudge' });
        }
        return;
      }
      case 'grayscale':
        if (!wasGray && toggles.screenGrayscale) this.emit({ type: 'setGrayscale', active: true, intensity: 1 });
        return;
      case 'redirect': {
        if (!wasGray && toggles.screenGrayscale) this.emit({ type: 'setGrayscale', active: true, intensity: 1 });
        if (delegated || !toggles.autoRedirect) return;
        if (this.lastRelevantUrl) {
          this.logger.info(`Redirecting ${target.key} to ${this.lastRelevantUrl}${action.instant ? ' (instant)' : ''}`);
          this.emit({ type: 'redirectToURL', url: this.lastRelevantUrl });
          return;
        }
        this.logger.info(`Redirecting ${target.key} to the block page`);
        this.emit({ type: 'redirectToBlockPage', reason: `${target.displayName} is not part of ${block.title}` });
        this.distraction.reset();
        return;
      }
      case 'intervention':
        if (delegated || !toggles.interventionExercises) return;
        this.dismissNudge();
        this.logger.info(`Intervention #${action.ordinal} (${action.durationSeconds}s) for ${target.key}`);
        this.emit({
          type: 'showIntervention',
          intention: block.title,
          displayName: target.displayName,
          distractionMinutes: this.distraction.minutes,
          durationSeconds: action.durationSeconds,
        });
        return;
    }
  }

  // Grace path: native apps in work blocks and any app in unplanned time

  private startGrace(block: ActiveBlock | null, observation: Observation, now: number): void {
    const { target } = observation;
    if (this.runState.enforcedTargetKey === target.key) return;
    const gap = this.unplannedGap();
    const result = this.grace.start(
      {
        targetKey: target.key,
        displayName: target.displayName,
        targetKind: target.kind,
        reason: !block && gap ? UNPLANNED_INTENTION[gap].reason : observation.reason,
        confidence: observation.confidence,
        isRevisit: this.runState.warnedTargets.has(target.key),
        isUnplanned: block === null,
        blockKind: block?.kind ?? null,
      },
      now,
    );
    if (result !== 'coalesced') {
      this.logger.debug(`Grace ${result} for ${target.displayName} (${this.grace.current?.durationSeconds ?? 0}s)`);
    }
  }

  private evaluateUnplanned(observation: Observation): InboundResult {
    const { target } = observation;
    const now = this.clock.now();
    if (observation.relevant) {
      if (this.grace.current?.targetKey === target.key) this.grace.cancel();
      if (endRun(this.runState, now)) this.dismissOverlay();
      return 'applied';
    }
    if (this.suppressions.isGloballySnoozed(now) || this.suppressions.isSuppressed(target.key, now)) {
      return 'ignored';
    }
    enterOffTarget(this.runState, target, null);
    this.startGrace(null, observation, now);
    return 'applied';
  }

  private fireGrace(pending: PendingGrace): void {
    if (this.frontmost?.key !== pending.targetKey) {
      this.logger.debug(`Grace for ${pending.displayName} expired after a switch; dropped`);
      return;
    }
    this.logger.info(`Grace expired for ${pending.displayName}`);
    const run = this.runState;
    run.warnedTargets.add(pending.targetKey);
    run.enforcedTargetKey = pending.targetKey;
    if (run.offTargetKey === null) {
      run.offTargetKey = pending.targetKey;
      run.offTargetName = pending.displayName;
      run.offTargetKind = pending.targetKind;
    }

    const block = this.activeBlock();
    const gap = this.unplannedGap();
    if (pending.isUnplanned) {
      if (block || !gap) return;
      this.emit({
        type: 'showOverlay',
        intention: UNPLANNED_INTENTION[gap].intention,
        reason: pending.reason,
        focusDurationMinutes: 0,
        isNoPlan: true,
        displayName: pending.displayName,
        canSnooze: this.unplannedSnoozeAvailable,
      });
      return;
    }
    if (!block) return;

    const toggles = this.toggles[block.kind];
    this.emit({ type: 'setTimerIndicator', distracted: true });
    if (block.kind === 'deepWork' && toggles.blockingOverlay) {
      this.emit({
        type: 'showOverlay',
        intention: block.title,
        reason: pending.reason,
        focusDurationMinutes: this.focusDurationMinutes(block),
        isNoPlan: false,
        displayName: pending.displayName,
        canSnooze: this.suppressions.canSnooze(pending.targetKey),
      });
    } else if (toggles.nudgeNotifications) {
      this.emit({
        type: 'showNudge',
        intention: block.title,
        displayName: pending.displayName,
        escalated: pending.isRevisit,
        distractionMinutes: this.distraction.minutes,
        warning: false,
      });
    }
  }

  // Plumbing

  private drain(): void {
    const now = this.clock.now();
    for (const event of this.timeline.takeDue(now)) {
      if (event.payload.type === 'autoDismissNudge') this.dismissNudge();
    }
    const due = this.grace.takeDue(now);
    if (due) this.fireGrace(due);
  }

  private reconcile(): void {
    const correction = reconcileGrayscale({
      inWorkBlock: this.activeBlock() !== null,
      grayscaleTriggeredThisBlock: this.runState.grayscaleTriggeredThisBlock,
      currentlyOffTarget: isOffTarget(this.runState),
      grayscaleActive: this.presentation.getState().grayscaleActive,
    });
    if (correction) {
      this.logger.debug('Reconciler restoring color');
      this.emit(correction);
    }
    this.publishDeadline();
  }

  private publishDeadline(): void {
    const next = this.nextDeadline();
    if (next === this.publishedDeadline) return;
    this.publishedDeadline = next;
    for (const listener of this.deadlineListeners) {
      try {
        listener(next);
      } catch (error) {
        this.logger.error('Deadline listener failed', error);
      }
    }
  }

  private resetBlockState(): void {
    this.blockEpoch += 1;
    this.distraction.reset();
    this.runState = createRunState();
    this.suppressions.clearBlockEntries();
    this.grace.cancel();
    this.timeline.clear();
    this.lastVerdict = null;
    this.lastRelevantUrl = null;
    this.dismissNudge();
    this.dismissOverlay();
    if (this.presentation.getState().timerDistracted) this.emit({ type: 'setTimerIndicator', distracted: false });
  }

  private advanceLifecycle(event: LifecycleEvent): InboundResult {
    this.drain();
    const before = this.lifecycle.phase;
    this.lifecycle = reduceLifecycle(this.lifecycle, event, this.lifecycleOptions);
    this.reconcile();
    if (before === this.lifecycle.phase) return 'ignored';
    this.logger.info(`Lifecycle ${before} -> ${this.lifecycle.phase}`);
    return 'applied';
  }

  private activeBlock(): ActiveBlock | null {
    const block = enforcingBlock(this.lifecycle);
    return isWorkBlock(block) ? block : null;
  }

  private unplannedGap(): Exclude<ScheduleGap, 'off'> | null {
    if (this.lifecycle.phase !== 'idle' || this.gap === 'off') return null;
    return this.gap;
  }

  private focusDurationMinutes(block: TimeBlock): number {
    return Math.max(0, minuteOfDay(this.clock.now()) - block.startMinute);
  }

  private dismissNudge(): void {
    this.timeline.cancelWhere(event => event.type === 'autoDismissNudge');
    if (this.presentation.getState().nudgeVisible) this.emit({ type: 'dismissNudge' });
  }

  private dismissOverlay(): void {
    if (this.presentation.getState().overlayVisible) this.emit({ type: 'dismissOverlay' });
  }

  private emit(command: EnforcementCommand): void {
    this.presentation.getState().apply(command);
    for (const listener of this.listeners) {
      try {
        listener(command);
      } catch (error) {
        this.logger.error(`Listener failed on ${command.type}`, error);
      }
    }
  }
}
