import { ActivityType } from 'discord.js';
import type { ActivitiesOptions } from 'discord.js';
import type { TrackedAccountStore } from './store/tracked-accounts.js';

export const ACTIVITY_TYPE_MAP = {
  playing: ActivityType.Playing,
  listening: ActivityType.Listening,
  watching: ActivityType.Watching,
  competing: ActivityType.Competing,
} as const;

export type ActivityTypeName = keyof typeof ACTIVITY_TYPE_MAP;

function isActivityTypeName(value: string): value is ActivityTypeName {
  return Object.hasOwn(ACTIVITY_TYPE_MAP, value);
}

export type PresenceSummary = {
  activity: ActivitiesOptions;
  accountCount: number;
};

export function formatPresenceName(accountCount: number): string {
  return `${accountCount} tracked account${accountCount === 1 ? '' : 's'}`;
}

/**
 * Derive the bot activity from the store. Unknown activity type names fall
 * back to "watching".
 */
export function buildPresence(
  store: Pick<TrackedAccountStore, 'count'>,
  activityType: string,
): PresenceSummary {
  const accountCount = store.count();
  const normalized = activityType.trim().toLowerCase();
  const type = isActivityTypeName(normalized) ? ACTIVITY_TYPE_MAP[normalized] : ActivityType.Watching;
  return {
    activity: { name: formatPresenceName(accountCount), type },
    accountCount,
  };
}
