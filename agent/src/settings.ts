import { readFile } from 'node:fs/promises';
import deepmerge from 'deepmerge';
import { z } from 'zod';
import {
  enforcementTogglesSchema,
  enforcementTuningSchema,
  lifecycleOptionsSchema,
} from '@driftguard/contracts';
import type { Logger } from '@driftguard/enforcement';
import { RELEVANCE_MODEL, SETTINGS_PATH } from '@driftguard/env';

export const agentSettingsSchema = z.object({
  enabled: z.boolean().default(true),
  relevanceModel: z.string().min(1).default(RELEVANCE_MODEL),
  tuning: enforcementTuningSchema.default({}),
  toggles: enforcementTogglesSchema.default({}),
  lifecycle: lifecycleOptionsSchema.default({}),
  distractingBundleIds: z.array(z.string()).default([]),
  distractingHosts: z.array(z.string()).default([]),
});

export type AgentSettings = z.infer<typeof agentSettingsSchema>;

export type LoadedSettings = {
  settings: AgentSettings;
  /** The file existed but could not be used; defaults are in effect. */
  invalid: boolean;
};

export const DEFAULT_SETTINGS: AgentSettings = agentSettingsSchema.parse({});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isMissingFile = (error: unknown): boolean =>
  isRecord(error) && error['code'] === 'ENOENT';

// Lists in the file replace the defaults instead of extending them
const replaceArrays = (_target: unknown[], source: unknown[]): unknown[] => source;

export const mergeSettings = (patch: Record<string, unknown>) =>
  agentSettingsSchema.safeParse(
    deepmerge<AgentSettings, Record<string, unknown>>(DEFAULT_SETTINGS, patch, { arrayMerge: replaceArrays }),
  );

export const loadSettings = async (logger: Logger, path: string = SETTINGS_PATH): Promise<LoadedSettings> => {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      logger.info(`No settings file at ${path}; using defaults`);
      return { settings: DEFAULT_SETTINGS, invalid: false };
    }
    logger.error(`Failed to read settings from ${path}`, error);
    return { settings: DEFAULT_SETTINGS, invalid: true };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text.replace(/^\uFEFF/, ''));
  } catch (error) {
    logger.error(`Settings file ${path} is not valid JSON`, error);
    return { settings: DEFAULT_SETTINGS, invalid: true };
  }
  if (!isRecord(raw)) {
    logger.error(`Settings file ${path} must contain a JSON object`);
    return { settings: DEFAULT_SETTINGS, invalid: true };
  }

  const parsed = mergeSettings(raw);
  if (!parsed.success) {
    logger.error(`Settings file ${path} failed validation: ${parsed.error.issues.map(issue => issue.path.join('.')).join(', ')}`);
    return { settings: DEFAULT_SETTINGS, invalid: true };
  }
  return { settings: parsed.data, invalid: false };
};
