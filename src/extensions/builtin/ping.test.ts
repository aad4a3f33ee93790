import { describe, expect, it, vi } from 'vitest';
import { MessageFlags } from 'discord.js';
import type { ChatInputCommandInteraction } from 'discord.js';
import { createPingExtension, formatPing } from './ping.js';
import { ReadinessFlag } from '../../bootstrap/readiness.js';
import { TrackedAccountStore } from '../../store/tracked-accounts.js';

describe('formatPing', () => {
  it('rounds the gateway latency', () => {
    expect(formatPing(41.6)).toBe('Pong! Gateway latency: 42 ms.');
  });

  it('reports a latency that was not measured yet', () => {
    expect(formatPing(-1)).toBe('Pong! Gateway latency has not been measured yet.');
  });
});

describe('ping extension', () => {
  it('replies ephemerally with the latency', async () => {
    const ext = await createPingExtension({
      store: new TrackedAccountStore('/nonexistent/tracked_accounts.db'),
      readiness: new ReadinessFlag(),
      log: { info: vi.fn(), warn: vi.fn(), error: vi.fn() },
      clients: () => [],
      loadedExtensions: () => [],
    });
    const interaction = { client: { ws: { ping: 12 } }, reply: vi.fn(async () => {}) };

    expect(ext.commands.map((c) => c.data.name)).toEqual(['ping']);
    await ext.commands[0]?.execute(interaction as unknown as ChatInputCommandInteraction);
    expect(interaction.reply).toHaveBeenCalledWith({ content: 'Pong! Gateway latency: 12 ms.', flags: MessageFlags.Ephemeral });
  });
});
