import { MessageFlags, SlashCommandBuilder } from 'discord.js';
import type { ExtensionFactory } from '../types.js';

export function formatPing(gatewayMs: number): string {
  if (gatewayMs < 0) return 'Pong! Gateway latency has not been measured yet.';
  return `Pong! Gateway latency: ${Math.round(gatewayMs)} ms.`;
}

export const createPingExtension: ExtensionFactory = () => ({
  commands: [
    {
      data: new SlashCommandBuilder()
        .setName('ping')
        .setDescription('Check that the bot is responsive')
        .toJSON(),
      async execute(interaction) {
        await interaction.reply({ content: formatPing(interaction.client.ws.ping), flags: MessageFlags.Ephemeral });
      },
    },
  ],
});
