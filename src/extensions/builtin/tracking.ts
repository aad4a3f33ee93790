import { MessageFlags, SlashCommandBuilder } from 'discord.js';
import type { ChatInputCommandInteraction } from 'discord.js';
import type { TrackedAccountStore } from '../../store/tracked-accounts.js';
import type { ExtensionFactory } from '../types.js';

/** Maximum number of accounts rendered by `/track list`. */
export const LIST_LIMIT = 20;

export type TrackAction =
  | { action: 'add'; accountId: string; clientName: string | null }
  | { action: 'remove'; accountId: string }
  | { action: 'list' };

export type TrackDeps = {
  store: Pick<TrackedAccountStore, 'track' | 'untrack' | 'list' | 'get'>;
  /** Configured client names in declared order. */
  clients: string[];
};

export function parseTrackAction(interaction: ChatInputCommandInteraction): TrackAction | null {
  const sub = interaction.options.getSubcommand(true);
  if (sub === 'list') return { action: 'list' };
  const accountId = interaction.options.getString('account_id', true);
  if (sub === 'remove') return { action: 'remove', accountId };
  if (sub === 'add') return { action: 'add', accountId, clientName: interaction.options.getString('client') };
  return null;
}

function renderList(deps: TrackDeps): string {
  const accounts = deps.store.list();
  if (accounts.length === 0) return 'No accounts are tracked.';
  const configured = new Set(deps.clients);
  const lines = [`**Tracked accounts (${accounts.length})**`];
  for (const account of accounts.slice(0, LIST_LIMIT)) {
    const marker = configured.has(account.clientName) ? '' : ' (client not configured)';
    lines.push(`- \`${account.accountId}\`: ${account.clientName}${marker}`);
  }
  if (accounts.length > LIST_LIMIT) lines.push(`...and ${accounts.length - LIST_LIMIT} more`);
  return lines.join('\n');
}

export function handleTrackAction(action: TrackAction, deps: TrackDeps): string {
  if (action.action === 'list') return renderList(deps);

  const accountId = action.accountId.trim();
  if (!accountId) return 'Account ID must not be empty.';

  if (action.action === 'remove') {
    return deps.store.untrack(accountId)
      ? `Stopped tracking \`${accountId}\`.`
      : `\`${accountId}\` is not tracked.`;
  }

  if (deps.clients.length === 0) return 'No clients are configured; set CLIENT_NAMES first.';
  const requested = action.clientName?.trim();
  const clientName = requested || deps.clients[0];
  if (clientName === undefined || !deps.clients.includes(clientName)) {
    return `Unknown client "${requested}". Configured clients: ${deps.clients.join(', ')}`;
  }

  const previous = deps.store.get(accountId);
  if (!deps.store.track(accountId, clientName)) {
    return `\`${accountId}\` is already tracked for **${clientName}**.`;
  }
  return previous
    ? `Moved \`${accountId}\` from **${previous.clientName}** to **${clientName}**.`
    : `Now tracking \`${accountId}\` for **${clientName}**.`;
}

export const createTrackingExtension: ExtensionFactory = (ctx) => ({
  commands: [
    {
      data: new SlashCommandBuilder()
        .setName('track')
        .setDescription('Manage tracked accounts')
        .addSubcommand((sub) =>
          sub
            .setName('add')
            .setDescription('Track an account, or move it to another client')
            .addStringOption((opt) => opt.setName('account_id').setDescription('Account ID').setRequired(true))
            .addStringOption((opt) =>
              opt.setName('client').setDescription('Client name (defaults to the first configured client)'),
            ),
        )
        .addSubcommand((sub) =>
          sub
            .setName('remove')
            .setDescription('Stop tracking an account')
            .addStringOption((opt) => opt.setName('account_id').setDescription('Account ID').setRequired(true)),
        )
        .addSubcommand((sub) => sub.setName('list').setDescription('List tracked accounts'))
        .toJSON(),
      async execute(interaction) {
        const action = parseTrackAction(interaction);
        if (!action) {
          await interaction.reply({ content: 'Unknown subcommand.', flags: MessageFlags.Ephemeral });
          return;
        }
        const content = handleTrackAction(action, { store: ctx.store, clients: ctx.clients() });
        if (action.action !== 'list') {
          ctx.log.info({ user: interaction.user.id, ...action }, `tracking:${action.action}`);
        }
        await interaction.reply({ content, flags: MessageFlags.Ephemeral });
      },
    },
  ],
});
