import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { classifyApp, loadAppCatalog } from './catalog';

describe('app catalog', () => {
  const catalog = loadAppCatalog();

  it('loads the bundled catalog', () => {
    expect(catalog.ownBundleIds.has('com.driftguard.agent')).toBe(true);
    expect(catalog.browsers.get('com.apple.Safari')).toBe('Safari');
    expect(catalog.systemPrefix).toBe('com.apple.');
  });

  it('classifies in priority order', () => {
    expect(classifyApp(catalog, 'com.driftguard.agent', [])).toBe('own');
    expect(classifyApp(catalog, 'com.apple.Safari', [])).toBe('browser');
    expect(classifyApp(catalog, 'com.microsoft.VSCode', ['com.microsoft.VSCode'])).toBe('alwaysAllowed');
    expect(classifyApp(catalog, 'com.apple.finder', [])).toBe('alwaysAllowed');
    expect(classifyApp(catalog, 'com.example.game', ['com.example.game'])).toBe('distracting');
    expect(classifyApp(catalog, 'com.example.game', [])).toBe('scored');
  });

  it('scores system entertainment apps instead of allowing them', () => {
    expect(classifyApp(catalog, 'com.apple.Music', [])).toBe('scored');
    expect(classifyApp(catalog, 'com.apple.TV', ['com.apple.TV'])).toBe('distracting');
  });

  it('rejects a malformed catalog file', () => {
    const dir = mkdtempSync(join(tmpdir(), 'driftguard-catalog-'));
    const file = join(dir, 'apps.json');
    writeFileSync(file, JSON.stringify({ ownBundleIds: 'com.example.self' }));
    expect(() => loadAppCatalog(file)).toThrow();
  });
});
