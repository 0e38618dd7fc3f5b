import { AgentRegistry } from '@driftguard/agent-kit';
import type { EnforcementCommand, LLMProvider, ScheduleGap, TimeBlock } from '@driftguard/contracts';
import { FocusEnforcer, createLogger, systemClock } from '@driftguard/enforcement';
import type { Clock, Logger, PresentationStore } from '@driftguard/enforcement';
import {
  ENABLE_JUSTIFICATIONS,
  FORCE_DETERMINISTIC_ONLY,
  IS_DEV,
  MAX_SNOOZES_PER_DAY,
  OPENAI_API_KEY,
  SCORER_TIMEOUT_MS,
} from '@driftguard/env';
import { OpenAILLMProvider } from '@driftguard/llm';
import { RelevanceAgent } from './agents';
import { loadAppCatalog } from './catalog';
import { FocusOrchestrator } from './orchestrator';
import type { TabReader } from './orchestrator';
import { RelevanceScorer } from './scorer';
import { loadSettings } from './settings';
import type { AgentSettings } from './settings';
import { AssessmentLog, SnoozeAllowance } from './state';

export type DesktopAgentOptions = {
  tabs: TabReader;
  onCommand: (command: EnforcementCommand) => void;
  settingsPath?: string;
  /** Overrides the OpenAI provider; null forces deterministic scoring. */
  llm?: LLMProvider | null;
  clock?: Clock;
  logger?: Logger;
  pollIntervalMs?: number;
};

export type DesktopAgent = {
  settings: AgentSettings;
  settingsInvalid: boolean;
  enforcer: FocusEnforcer;
  orchestrator: FocusOrchestrator;
  scorer: RelevanceScorer;
  assessments: AssessmentLog;
  store: PresentationStore;
  setSchedule(block: TimeBlock | null, gap?: ScheduleGap): Promise<void>;
  start(): void;
  stop(): void;
};

export const createDesktopAgent = async (options: DesktopAgentOptions): Promise<DesktopAgent> => {
  const scoped = (scope: string): Logger => options.logger ?? createLogger(scope);
  const logger = scoped('DesktopAgent');
  const clock = options.clock ?? systemClock;
  const { settings, invalid } = await loadSettings(logger, options.settingsPath);
  const catalog = loadAppCatalog();

  const llm = options.llm !== undefined ? options.llm : OPENAI_API_KEY ? new OpenAILLMProvider(OPENAI_API_KEY) : null;
  if (!llm) logger.info('No OpenAI key configured; relevance scoring is keyword-only');

  const scorer = new RelevanceScorer({
    llm,
    model: settings.relevanceModel,
    timeoutMs: SCORER_TIMEOUT_MS,
    deterministicOnly: FORCE_DETERMINISTIC_ONLY,
    logger: scoped('Relevance'),
  });
  const registry = new AgentRegistry();
  registry.register(new RelevanceAgent(scorer));

  const enforcer = new FocusEnforcer({
    tuning: settings.tuning,
    toggles: settings.toggles,
    lifecycle: settings.lifecycle,
    clock,
    logger: scoped('Enforcer'),
    // Justifications must not pass on a fail-open verdict
    scorer: { score: request => scorer.scoreStrict(request) },
  });

  const assessments = new AssessmentLog();
  const orchestrator = new FocusOrchestrator({
    enforcer,
    registry,
    tabs: options.tabs,
    catalog,
    settings,
    assessments,
    snoozes: new SnoozeAllowance(MAX_SNOOZES_PER_DAY, clock),
    clock,
    logger: scoped('Orchestrator'),
    ctx: { env: IS_DEV ? 'development' : 'production' },
    justificationsEnabled: ENABLE_JUSTIFICATIONS,
  });

  enforcer.subscribe(command => {
    if (command.type === 'approvePageTitleInScorer') {
      orchestrator.approveTitle(command.title, command.forIntention).catch(error => {
        logger.error('Failed to approve page title', error);
      });
    }
    options.onCommand(command);
  });

  let timer: ReturnType<typeof setInterval> | null = null;
  let wakeTimer: ReturnType<typeof setTimeout> | null = null;

  // One-shot timer at the enforcer's next deadline, so grace and auto-dismiss fire between polls
  const armWake = (at: number | null) => {
    if (wakeTimer) clearTimeout(wakeTimer);
    wakeTimer = null;
    if (!timer || at === null) return;
    wakeTimer = setTimeout(() => {
      wakeTimer = null;
      enforcer.wake();
      armWake(enforcer.nextDeadline());
    }, Math.max(0, at - clock.now()));
  };
  enforcer.onDeadlineChanged(armWake);

  return {
    settings,
    settingsInvalid: invalid,
    enforcer,
    orchestrator,
    scorer,
    assessments,
    store: enforcer.store,
    setSchedule: (block, gap) => orchestrator.setSchedule(block, gap),
    start() {
      if (timer) return;
      timer = setInterval(() => {
        orchestrator.poll().catch(error => logger.error('Poll failed', error));
      }, options.pollIntervalMs ?? settings.tuning.pollIntervalSeconds * 1000);
      armWake(enforcer.nextDeadline());
      logger.info('Desktop agent started');
    },
    stop() {
      if (timer) clearInterval(timer);
      timer = null;
      armWake(null);
      logger.info('Desktop agent stopped');
    },
  };
};

export { RelevanceAgent } from './agents';
export { classifyApp, loadAppCatalog } from './catalog';
export type { AppCatalog, AppClass } from './catalog';
export { FocusOrchestrator, hostnameOf } from './orchestrator';
export type { ForegroundApp, OrchestratorDeps, TabInfo, TabReader } from './orchestrator';
export { RelevanceScorer, cleanTitle, extractJsonObject, hasKeywordOverlap, keywords } from './scorer';
export type { RelevanceScorerOptions } from './scorer';
export { DEFAULT_SETTINGS, agentSettingsSchema, loadSettings, mergeSettings } from './settings';
export type { AgentSettings, LoadedSettings } from './settings';
export { AssessmentLog, SnoozeAllowance } from './state';
export type { AssessmentEntry } from './state';
