import { Client, Events, GatewayIntentBits, Partials } from 'discord.js';
import type { LoggerLike } from '../logging/logger-like.js';
import type { ExtensionRegistry } from '../extensions/registry.js';
import type { TrackedAccountStore } from '../store/tracked-accounts.js';
import { isOwner } from './allowlist.js';
import { dispatchAdminMessage } from './admin-commands.js';
import { routeChatInputCommand } from './interaction-router.js';
import { DiscordTransportClient } from './transport-client.js';
import type { TransportClient } from './transport-client.js';

export type BotParams = {
  token: string;
  /** Prefix of administrative text commands, e.g. "!". */
  prefix: string;
  /** Explicit owners; empty falls back to the application owner. */
  ownerIds: Set<string>;
  registry: ExtensionRegistry;
  store: TrackedAccountStore;
  logFile: string;
  replyTtlSeconds: number;
  log: LoggerLike;
  /** Aborting gives up on the login and disconnects. */
  signal?: AbortSignal;
};

export type StartedBot = {
  transport: TransportClient;
  destroy(): Promise<void>;
};

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Settle with `work`, or reject as soon as `signal` is aborted. A late
 * rejection of `work` after the abort is absorbed.
 */
export function raceAbort<T>(work: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return work;
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new Error('Aborted before the gateway was ready'));
    if (signal.aborted) {
      work.catch(() => undefined);
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

/**
 * Log in and wait for the gateway to report ready. Message and interaction
 * handlers are attached once the client is ready.
 */
export async function startDiscordBot(params: BotParams): Promise<StartedBot> {
  const { log } = params;
  const client = new Client({
    intents: [
      GatewayIntentBits.Guilds,
      GatewayIntentBits.GuildMessages,
      GatewayIntentBits.MessageContent,
      GatewayIntentBits.DirectMessages,
    ],
    partials: [Partials.Channel],
  });

  const ready = new Promise<Client<true>>((resolve) => {
    client.once(Events.ClientReady, resolve);
  });
  let readyClient: Client<true>;
  try {
    readyClient = await raceAbort(
      client.login(params.token).then(() => ready),
      params.signal,
    );
  } catch (err) {
    await client.destroy();
    throw err;
  }
  const transport = new DiscordTransportClient(readyClient);
  log.info({ user: transport.userTag }, 'discord:connected');

  let applicationOwners: Promise<Set<string>> | null = null;
  const checkOwner = async (userId: string): Promise<boolean> => {
    if (params.ownerIds.size > 0) return isOwner(params.ownerIds, new Set(), userId);
    applicationOwners ??= transport.fetchApplicationOwners().catch((err: unknown) => {
      applicationOwners = null;
      log.warn({ err: errorMessage(err) }, 'discord:application owner lookup failed');
      return new Set<string>();
    });
    return isOwner(params.ownerIds, await applicationOwners, userId);
  };

  readyClient.on(Events.MessageCreate, (msg) => {
    if (msg.author.bot) return;
    dispatchAdminMessage(
      {
        content: msg.content,
        authorId: msg.author.id,
        attachments: [...msg.attachments.values()],
        reply: (payload) => msg.reply(payload),
      },
      {
        prefix: params.prefix,
        isOwner: checkOwner,
        registry: params.registry,
        transport,
        store: params.store,
        logFile: params.logFile,
        replyTtlSeconds: params.replyTtlSeconds,
        log,
      },
    ).catch((err: unknown) => {
      log.warn({ messageId: msg.id, err: errorMessage(err) }, 'discord:admin command reply failed');
    });
  });

  readyClient.on(Events.InteractionCreate, (interaction) => {
    if (!interaction.isChatInputCommand()) return;
    routeChatInputCommand(interaction, { registry: params.registry, log }).catch((err: unknown) => {
      log.warn({ command: interaction.commandName, err: errorMessage(err) }, 'discord:interaction reply failed');
    });
  });

  return {
    transport,
    destroy: () => client.destroy(),
  };
}
