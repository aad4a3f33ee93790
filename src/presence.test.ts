import { describe, expect, it } from 'vitest';
import { ActivityType } from 'discord.js';
import { buildPresence, formatPresenceName } from './presence.js';

function storeWith(count: number) {
  return { count: () => count };
}

describe('formatPresenceName', () => {
  it('pluralizes', () => {
    expect(formatPresenceName(0)).toBe('0 tracked accounts');
    expect(formatPresenceName(1)).toBe('1 tracked account');
    expect(formatPresenceName(12)).toBe('12 tracked accounts');
  });
});

describe('buildPresence', () => {
  it('uses the configured activity type', () => {
    expect(buildPresence(storeWith(3), 'listening')).toEqual({
      activity: { name: '3 tracked accounts', type: ActivityType.Listening },
      accountCount: 3,
    });
  });

  it('normalizes case and whitespace', () => {
    expect(buildPresence(storeWith(1), ' Playing ').activity.type).toBe(ActivityType.Playing);
  });

  it('falls back to watching for unknown names', () => {
    expect(buildPresence(storeWith(1), 'streaming').activity.type).toBe(ActivityType.Watching);
    expect(buildPresence(storeWith(1), 'toString').activity.type).toBe(ActivityType.Watching);
  });
});
