import type { ChatInputCommandInteraction, RESTPostAPIChatInputApplicationCommandsJSONBody } from 'discord.js';
import type { LoggerLike } from '../logging/logger-like.js';
import type { ReadinessFlag } from '../bootstrap/readiness.js';
import type { TrackedAccountStore } from '../store/tracked-accounts.js';

export type ExtensionCommand = {
  /** Slash command definition as sent to Discord. */
  data: RESTPostAPIChatInputApplicationCommandsJSONBody;
  execute(interaction: ChatInputCommandInteraction): Promise<void>;
};

export type Extension = {
  commands: ExtensionCommand[];
  /** Runs after the command names were checked for conflicts, before they are registered. */
  setup?(): void | Promise<void>;
  /** Runs on unload, after the commands were deregistered. */
  teardown?(): void | Promise<void>;
};

/**
 * Everything an extension may touch. Handed to the constructor on every load,
 * so a reload always starts from a fresh instance.
 */
export type ExtensionContext = {
  store: TrackedAccountStore;
  readiness: ReadinessFlag;
  log: LoggerLike;
  /** Configured client names in declared order, read from the live environment. */
  clients(): string[];
  /** Names of the extensions loaded right now. */
  loadedExtensions(): string[];
};

export type ExtensionFactory = (ctx: ExtensionContext) => Extension | Promise<Extension>;

/** Named constructors the registry may load, in discovery order. */
export type ExtensionCatalog = ReadonlyMap<string, ExtensionFactory>;
