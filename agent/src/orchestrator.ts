import type { AgentContext, AgentRegistry } from '@driftguard/agent-kit';
import { isWorkBlock, relevanceVerdictSchema } from '@driftguard/contracts';
import type {
  JustificationOutcome,
  ObservationTarget,
  RelevanceRequest,
  RelevanceVerdict,
  ScheduleGap,
  TimeBlock,
} from '@driftguard/contracts';
import { isDelegatedHost } from '@driftguard/enforcement';
import type { Clock, FocusEnforcer, InboundResult, Logger } from '@driftguard/enforcement';
import { classifyApp } from './catalog';
import type { AppCatalog } from './catalog';
import type { AgentSettings } from './settings';
import type { AssessmentLog, SnoozeAllowance } from './state';

export type ForegroundApp = { bundleId: string; name: string };

export type TabInfo = { title: string; url: string };

/** Reads the active tab of a browser. Resolves null when the browser cannot be read. */
export interface TabReader {
  read(bundleId: string): Promise<TabInfo | null>;
}

export type OrchestratorDeps = {
  enforcer: FocusEnforcer;
  registry: AgentRegistry;
  tabs: TabReader;
  catalog: AppCatalog;
  settings: AgentSettings;
  assessments: AssessmentLog;
  snoozes: SnoozeAllowance;
  clock: Clock;
  logger: Logger;
  ctx: AgentContext;
  justificationsEnabled?: boolean;
};

const BLOCK_PAGE_MARKER = 'driftguard-blocked';

export const hostnameOf = (url: string): string => {
  try {
    return new URL(url).hostname;
  } catch {
    return '';
  }
};

/**
 * Turns foreground and tab changes into enforcer observations.
 * Every async hop captures a sequence token; results for a superseded token are dropped.
 */
export class FocusOrchestrator {
  private seq = 0;
  private block: TimeBlock | null = null;
  private gap: ScheduleGap = 'off';
  private foreground: ForegroundApp | null = null;
  private lastTab: TabInfo | null = null;

  constructor(private readonly deps: OrchestratorDeps) {}

  async setSchedule(block: TimeBlock | null, gap: ScheduleGap = 'off'): Promise<void> {
    const changed = (block?.id ?? null) !== (this.block?.id ?? null);
    this.block = block;
    this.gap = gap;
    if (changed) {
      this.seq += 1;
      this.lastTab = null;
      const reset = await this.deps.registry.invoke('relevance', this.contextFor(block), { type: 'reset', payload: null });
      if (!reset.ok) this.deps.logger.warn(`Scorer reset failed: ${reset.error.message}`);
    }
    this.deps.enforcer.currentTimeBlockChanged(block, gap);
    this.deps.enforcer.setUnplannedSnoozeAvailable(this.deps.snoozes.remaining > 0);
  }

  async appActivated(app: ForegroundApp): Promise<void> {
    const token = ++this.seq;
    this.foreground = app;
    this.lastTab = null;
    const { enforcer, catalog, settings, logger } = this.deps;
    const kind = classifyApp(catalog, app.bundleId, settings.distractingBundleIds);
    const target: ObservationTarget = { key: app.bundleId, displayName: app.name, kind: 'app' };

    if (kind === 'own') {
      if (enforcer.ownAppFocused() === 'ignored') logger.debug('Own app activated from the overlay; keeping it');
      else logger.debug('Own app in front; nudge dismissed, grace kept');
      return;
    }
    if (!settings.enabled) {
      enforcer.foregroundChanged(target);
      return;
    }

    const block = this.block;
    if (!isWorkBlock(block)) {
      enforcer.foregroundChanged(target);
      if (this.gap !== 'off') {
        this.apply(token, target, { relevant: false, confidence: 0, reason: '' }, 'Unscheduled time');
      }
      return;
    }

    switch (kind) {
      case 'browser':
        // The browser itself is frontmost until its tab has been read
        enforcer.foregroundChanged(target);
        await this.readTab(token, app);
        return;
      case 'alwaysAllowed':
        enforcer.foregroundChanged(target);
        this.apply(token, target, { relevant: true, confidence: 100, reason: 'Always allowed' }, block.title);
        return;
      case 'distracting':
        enforcer.foregroundChanged(target);
        this.apply(token, target, { relevant: false, confidence: 100, reason: 'Marked as distracting' }, block.title);
        return;
      case 'scored': {
        enforcer.foregroundChanged(target);
        const verdict = await this.score(block, {
          title: app.name,
          intention: block.title,
          description: block.description,
          contentType: 'application',
        });
        this.apply(token, target, verdict, block.title);
        return;
      }
    }
  }

  /** Heartbeat: re-reads the browser tab, or lets the enforcer re-feed the last verdict. */
  async poll(): Promise<void> {
    const app = this.foreground;
    const block = this.block;
    if (app && this.deps.settings.enabled && isWorkBlock(block) && this.deps.catalog.browsers.has(app.bundleId)) {
      await this.readTab(this.seq, app);
      return;
    }
    this.deps.enforcer.pollTick();
  }

  setExtensionConnected(connected: boolean): void {
    this.deps.enforcer.setExtensionConnected(connected);
  }

  /** Spends the daily allowance for unplanned time before forwarding the snooze. */
  requestSnooze(): boolean {
    const { enforcer, snoozes, logger } = this.deps;
    if (!isWorkBlock(this.block)) {
      if (snoozes.remaining === 0) {
        logger.info('No snoozes left today');
        return false;
      }
      const snoozed = enforcer.userRequestedSnooze();
      if (snoozed) snoozes.tryConsume();
      enforcer.setUnplannedSnoozeAvailable(snoozes.remaining > 0);
      return snoozed;
    }
    return enforcer.userRequestedSnooze();
  }

  async submitJustification(text: string): Promise<JustificationOutcome> {
    if (this.deps.justificationsEnabled === false) {
      this.deps.logger.info('Justifications are disabled');
      return 'rejected';
    }
    return this.deps.enforcer.userSubmittedJustification(text);
  }

  async approveTitle(title: string, intention: string): Promise<void> {
    const res = await this.deps.registry.invoke('relevance', this.contextFor(this.block), {
      type: 'approve',
      payload: { title, intention },
    });
    if (!res.ok) this.deps.logger.warn(`Could not approve "${title}": ${res.error.message}`);
  }

  private async readTab(token: number, app: ForegroundApp): Promise<void> {
    const { enforcer, tabs, settings, logger } = this.deps;
    let info: TabInfo | null;
    try {
      info = await tabs.read(app.bundleId);
    } catch (error) {
      logger.warn(`Tab read failed for ${app.bundleId}: ${error instanceof Error ? error.message : String(error)}`);
      info = null;
    }
    if (token !== this.seq) return;

    const host = info ? hostnameOf(info.url) : '';
    if (!info || !host) {
      logger.debug(`Could not read tab info for ${app.bundleId}`);
      enforcer.pollTick({ neutral: true });
      return;
    }
    if (info.url.includes(BLOCK_PAGE_MARKER)) {
      enforcer.pollTick({ neutral: true });
      return;
    }
    if (this.lastTab && this.lastTab.title === info.title && this.lastTab.url === info.url) {
      enforcer.pollTick();
      return;
    }
    this.lastTab = info;

    const block = this.block;
    if (!isWorkBlock(block)) return;
    const target: ObservationTarget = { key: host, displayName: info.title, kind: 'tab', url: info.url };
    enforcer.foregroundChanged(target);

    if (settings.distractingHosts.includes(host)) {
      this.apply(token, target, { relevant: false, confidence: 100, reason: 'Marked as distracting' }, block.title);
      return;
    }
    if (isDelegatedHost(host, settings.tuning.delegatedHosts)) {
      this.apply(token, target, { relevant: false, confidence: 100, reason: 'Social media' }, block.title);
      return;
    }
    const verdict = await this.score(block, {
      title: info.title,
      intention: block.title,
      description: block.description,
      contentType: 'webpage',
    });
    this.apply(token, target, verdict, block.title);
  }

  private async score(block: TimeBlock, request: RelevanceRequest): Promise<RelevanceVerdict> {
    const res = await this.deps.registry.invoke('relevance', this.contextFor(block), { type: 'score', payload: request });
    if (!res.ok) {
      this.deps.logger.warn(`Relevance agent failed (${res.error.code}); assuming relevant`);
      return { relevant: true, confidence: 0, reason: res.error.message };
    }
    const verdict = relevanceVerdictSchema.safeParse(res.data);
    if (!verdict.success) {
      this.deps.logger.warn('Relevance agent returned an unexpected shape; assuming relevant');
      return { relevant: true, confidence: 0, reason: 'Unexpected scorer output' };
    }
    return verdict.data;
  }

  private apply(token: number, target: ObservationTarget, verdict: RelevanceVerdict, intention: string): InboundResult {
    if (token !== this.seq) {
      this.deps.logger.debug(`Dropping verdict for ${target.displayName}; foreground moved on`);
      return 'stale';
    }
    const action = this.deps.enforcer.observe({ target, ...verdict });
    this.deps.assessments.record({
      timestamp: this.deps.clock.now(),
      title: target.displayName,
      intention,
      relevant: verdict.relevant,
      confidence: verdict.confidence,
      reason: verdict.reason,
      action,
    });
    return action;
  }

  private contextFor(block: TimeBlock | null): AgentContext {
    return { ...this.deps.ctx, blockId: block?.id };
  }
}
