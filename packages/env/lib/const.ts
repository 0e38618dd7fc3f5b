export const IS_DEV = process.env['DRIFTGUARD_DEV'] === 'true';
export const DEBUG_LOGGING = process.env['DRIFTGUARD_DEBUG'] === 'true';

// Relevance scoring
export const OPENAI_API_KEY = process.env['DRIFTGUARD_OPENAI_API_KEY'] ?? process.env['OPENAI_API_KEY'];
export const RELEVANCE_MODEL = process.env['DRIFTGUARD_RELEVANCE_MODEL'] || 'gpt-4o-mini';
export const SCORER_TIMEOUT_MS = Number(process.env['DRIFTGUARD_SCORER_TIMEOUT_MS'] || 3500);
export const FORCE_DETERMINISTIC_ONLY = process.env['DRIFTGUARD_FORCE_DETERMINISTIC_ONLY'] === 'true';
export const ENABLE_JUSTIFICATIONS = process.env['DRIFTGUARD_ENABLE_JUSTIFICATIONS'] !== 'false';

// Host runtime
export const SETTINGS_PATH = process.env['DRIFTGUARD_SETTINGS_PATH'] || 'driftguard.settings.json';
export const MAX_SNOOZES_PER_DAY = Number(process.env['DRIFTGUARD_MAX_SNOOZES_PER_DAY'] || 1);
