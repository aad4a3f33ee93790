import { MessageFlags, SlashCommandBuilder } from 'discord.js';
import type { ExtensionFactory } from '../types.js';

export type StatusSnapshot = {
  readySince: number | null;
  countsByClient: Map<string, number>;
  clients: string[];
  extensions: string[];
  now: number;
};

export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  if (hours > 0) return `${hours}h ${minutes}m`;
  if (minutes > 0) return `${minutes}m ${seconds}s`;
  return `${seconds}s`;
}

export function renderStatus(snapshot: StatusSnapshot): string {
  const lines: string[] = [];
  lines.push(
    snapshot.readySince === null
      ? '**Status:** starting'
      : `**Status:** operational for ${formatDuration(snapshot.now - snapshot.readySince)}`,
  );

  let total = 0;
  for (const n of snapshot.countsByClient.values()) total += n;
  lines.push(`**Tracked accounts:** ${total}`);

  const configured = new Set(snapshot.clients);
  const names = [...snapshot.clients, ...[...snapshot.countsByClient.keys()].filter((c) => !configured.has(c))];
  for (const name of names) {
    const marker = configured.has(name) ? '' : ' (not configured)';
    lines.push(`- ${name}: ${snapshot.countsByClient.get(name) ?? 0}${marker}`);
  }

  lines.push(`**Extensions:** ${snapshot.extensions.length > 0 ? snapshot.extensions.join(', ') : '(none)'}`);
  return lines.join('\n');
}

export const createStatusExtension: ExtensionFactory = (ctx) => ({
  commands: [
    {
      data: new SlashCommandBuilder()
        .setName('status')
        .setDescription('Show bot readiness, tracked accounts and loaded extensions')
        .toJSON(),
      async execute(interaction) {
        const content = renderStatus({
          readySince: ctx.readiness.since(),
          countsByClient: ctx.store.countByClient(),
          clients: ctx.clients(),
          extensions: ctx.loadedExtensions(),
          now: Date.now(),
        });
        await interaction.reply({ content, flags: MessageFlags.Ephemeral });
      },
    },
  ],
});
