import { MessageFlags } from 'discord.js';
import type { ChatInputCommandInteraction } from 'discord.js';
import type { LoggerLike } from '../logging/logger-like.js';
import type { ExtensionRegistry } from '../extensions/registry.js';

export type InteractionRouterDeps = {
  registry: Pick<ExtensionRegistry, 'resolveCommand' | 'ownerOf'>;
  log?: LoggerLike;
};

/** The parts of a slash command interaction the router touches. */
export type RoutableInteraction = Pick<
  ChatInputCommandInteraction,
  'commandName' | 'user' | 'replied' | 'deferred' | 'reply' | 'followUp'
>;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Run the registered handler for a slash command. Errors are logged at warn
 * and shown to the invoking user only.
 */
export async function routeChatInputCommand(
  interaction: ChatInputCommandInteraction,
  deps: InteractionRouterDeps,
): Promise<void> {
  const command = deps.registry.resolveCommand(interaction.commandName);
  if (!command) {
    deps.log?.warn({ command: interaction.commandName }, 'interaction:no handler registered');
    await replyEphemeral(interaction, `The /${interaction.commandName} command is not available right now.`);
    return;
  }

  try {
    await command.execute(interaction);
  } catch (err) {
    deps.log?.warn(
      {
        command: interaction.commandName,
        extension: deps.registry.ownerOf(interaction.commandName),
        user: interaction.user.id,
        err: errorMessage(err),
      },
      'interaction:command failed',
    );
    await replyEphemeral(interaction, `Something went wrong: ${errorMessage(err)}`);
  }
}

/** Reply, or follow up when the handler already replied or deferred. */
export async function replyEphemeral(interaction: RoutableInteraction, content: string): Promise<void> {
  if (interaction.replied || interaction.deferred) {
    await interaction.followUp({ content, flags: MessageFlags.Ephemeral });
    return;
  }
  await interaction.reply({ content, flags: MessageFlags.Ephemeral });
}
