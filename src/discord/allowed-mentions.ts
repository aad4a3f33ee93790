import type { MessageMentionOptions } from 'discord.js';

/** Suppress every mention in bot replies. */
export const NO_MENTIONS: MessageMentionOptions = { parse: [] };
