import { describe, expect, it, vi } from 'vitest';
import { MessageFlags } from 'discord.js';
import type { ChatInputCommandInteraction } from 'discord.js';
import { routeChatInputCommand } from './interaction-router.js';
import type { ExtensionCommand } from '../extensions/types.js';

function mockLog() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function makeInteraction(commandName: string, state: { replied?: boolean; deferred?: boolean } = {}) {
  return {
    commandName,
    user: { id: 'user-1' },
    replied: state.replied ?? false,
    deferred: state.deferred ?? false,
    reply: vi.fn(async () => {}),
    followUp: vi.fn(async () => {}),
  };
}

// Only the members read by the router and the handlers are mocked.
function asInteraction(fake: ReturnType<typeof makeInteraction>): ChatInputCommandInteraction {
  return fake as unknown as ChatInputCommandInteraction;
}

function registryWith(command: ExtensionCommand | undefined) {
  return {
    resolveCommand: vi.fn(() => command),
    ownerOf: vi.fn(() => (command ? 'tools' : undefined)),
  };
}

describe('routeChatInputCommand', () => {
  it('runs the registered handler', async () => {
    const execute = vi.fn(async () => {});
    const registry = registryWith({ data: { name: 'ping', description: 'ping' }, execute });
    const fake = makeInteraction('ping');

    await routeChatInputCommand(asInteraction(fake), { registry, log: mockLog() });

    expect(registry.resolveCommand).toHaveBeenCalledWith('ping');
    expect(execute).toHaveBeenCalledTimes(1);
    expect(fake.reply).not.toHaveBeenCalled();
  });

  it('replies ephemerally and warns when the handler throws', async () => {
    const log = mockLog();
    const registry = registryWith({
      data: { name: 'ping', description: 'ping' },
      execute: async () => {
        throw new Error('store unavailable');
      },
    });
    const fake = makeInteraction('ping');

    await routeChatInputCommand(asInteraction(fake), { registry, log });

    expect(fake.reply).toHaveBeenCalledWith({ content: 'Something went wrong: store unavailable', flags: MessageFlags.Ephemeral });
    expect(log.warn).toHaveBeenCalledWith(
      { command: 'ping', extension: 'tools', user: 'user-1', err: 'store unavailable' },
      'interaction:command failed',
    );
  });

  it('follows up when the handler already replied', async () => {
    const registry = registryWith({
      data: { name: 'ping', description: 'ping' },
      execute: async () => {
        throw new Error('late failure');
      },
    });
    const fake = makeInteraction('ping', { replied: true });

    await routeChatInputCommand(asInteraction(fake), { registry });

    expect(fake.reply).not.toHaveBeenCalled();
    expect(fake.followUp).toHaveBeenCalledWith({ content: 'Something went wrong: late failure', flags: MessageFlags.Ephemeral });
  });

  it('answers commands whose extension is not loaded', async () => {
    const log = mockLog();
    const fake = makeInteraction('track');

    await routeChatInputCommand(asInteraction(fake), { registry: registryWith(undefined), log });

    expect(fake.reply).toHaveBeenCalledWith({
      content: 'The /track command is not available right now.',
      flags: MessageFlags.Ephemeral,
    });
    expect(log.warn).toHaveBeenCalledWith({ command: 'track' }, 'interaction:no handler registered');
  });
});
