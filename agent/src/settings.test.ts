import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { Logger } from '@driftguard/enforcement';
import { DEFAULT_SETTINGS, loadSettings, mergeSettings } from './settings';

const fakeLogger = () => ({
  debug: vi.fn((_message: string) => undefined),
  info: vi.fn((_message: string) => undefined),
  warn: vi.fn((_message: string) => undefined),
  error: vi.fn((_message: string, _error?: unknown) => undefined),
}) satisfies Logger;

describe('mergeSettings', () => {
  it('fills unspecified values from the defaults', () => {
    const result = mergeSettings({ tuning: { deepWork: { nudgeSeconds: 5 } } });
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.tuning.deepWork).toEqual({ nudgeSeconds: 5, redirectSeconds: 20, interventionSeconds: 300 });
    expect(result.data.toggles).toEqual(DEFAULT_SETTINGS.toggles);
  });

  it('replaces lists instead of appending to them', () => {
    const result = mergeSettings({ tuning: { delegatedHosts: ['video.example.com'] } });
    expect(result.success && result.data.tuning.delegatedHosts).toEqual(['video.example.com']);
  });

  it('rejects values of the wrong type', () => {
    expect(mergeSettings({ enabled: 'yes' }).success).toBe(false);
  });
});

describe('loadSettings', () => {
  let dir: string;
  let logger: ReturnType<typeof fakeLogger>;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'driftguard-settings-'));
    logger = fakeLogger();
  });

  const write = async (contents: string) => {
    const file = join(dir, 'settings.json');
    await writeFile(file, contents, 'utf8');
    return file;
  };

  it('uses the defaults when the file does not exist', async () => {
    const loaded = await loadSettings(logger, join(dir, 'missing.json'));
    expect(loaded).toEqual({ settings: DEFAULT_SETTINGS, invalid: false });
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('reads a file with a byte order mark', async () => {
    const file = await write(`\uFEFF${JSON.stringify({ enabled: false, distractingHosts: ['news.example.com'] })}`);
    const loaded = await loadSettings(logger, file);
    expect(loaded.invalid).toBe(false);
    expect(loaded.settings.enabled).toBe(false);
    expect(loaded.settings.distractingHosts).toEqual(['news.example.com']);
  });

  it('falls back to the defaults on malformed JSON', async () => {
    const loaded = await loadSettings(logger, await write('{ "enabled": '));
    expect(loaded).toEqual({ settings: DEFAULT_SETTINGS, invalid: true });
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('falls back to the defaults when the file is not an object', async () => {
    const loaded = await loadSettings(logger, await write('[1, 2]'));
    expect(loaded.invalid).toBe(true);
  });

  it('names the failing fields', async () => {
    const loaded = await loadSettings(logger, await write(JSON.stringify({ tuning: { decayRatio: 3 } })));
    expect(loaded.invalid).toBe(true);
    expect(logger.error.mock.calls[0]?.[0]).toMatch(/failed validation: tuning\.decayRatio$/);
  });
});
