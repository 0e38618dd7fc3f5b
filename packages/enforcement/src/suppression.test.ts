import { describe, expect, it } from 'vitest';
import { SuppressionRegistry } from './suppression';

describe('SuppressionRegistry', () => {
  it('expires time-boxed approvals lazily', () => {
    const registry = new SuppressionRegistry();
    registry.approve('video.example.com', 180, 1_000);
    expect(registry.isSuppressed('video.example.com', 180_999)).toBe(true);
    expect(registry.expiryFor('video.example.com', 1_000)).toBe(181_000);
    expect(registry.isSuppressed('video.example.com', 181_000)).toBe(false);
    expect(registry.expiryFor('video.example.com', 0)).toBeNull();
  });

  it('keeps session overrides until the block entries are cleared', () => {
    const registry = new SuppressionRegistry();
    registry.sessionOverride('wiki.example.com');
    expect(registry.isSuppressed('wiki.example.com', Number.MAX_SAFE_INTEGER)).toBe(true);
    registry.clearBlockEntries();
    expect(registry.isSuppressed('wiki.example.com', 0)).toBe(false);
  });

  it('allows one snooze per target per block', () => {
    const registry = new SuppressionRegistry();
    expect(registry.snoozeTarget('com.example.game', 300, 0)).toBe(true);
    expect(registry.canSnooze('com.example.game')).toBe(false);
    expect(registry.snoozeTarget('com.example.game', 300, 400_000)).toBe(false);
    registry.clearBlockEntries();
    expect(registry.canSnooze('com.example.game')).toBe(true);
  });

  it('keeps the global snooze across block resets', () => {
    const registry = new SuppressionRegistry();
    registry.snoozeGlobal(300, 0);
    registry.clearBlockEntries();
    expect(registry.isGloballySnoozed(299_999)).toBe(true);
    expect(registry.isGloballySnoozed(300_000)).toBe(false);
  });
});
