/**
 * Bootstrap orchestrator
 *
 * Drives the bot from a connected client to a ready one:
 *
 *   INIT → STORE_READY → ENV_CHECK → CONFIG_CHECK → DB_CONSISTENCY
 *        → EXTENSIONS_LOADED → READY
 *
 * with RETRY_WAIT entered from ENV_CHECK and CONFIG_CHECK. The two checks
 * deliberately recover differently:
 *
 * - environment: wait, reload .env, check once more, then continue degraded
 *   even if still incomplete.
 * - configuration: wait, then ask the supervisor for a full process restart,
 *   since the settings file is only read at process start.
 *
 * Store failures are not handled here; they propagate to the supervisor.
 */

import { setTimeout as sleepFor } from 'node:timers/promises';
import type { LoggerLike } from '../logging/logger-like.js';
import { configuredClients } from '../config.js';
import { checkConfiguration, configurationProblems, missingEnvironment } from '../validate.js';
import type { BotSettings } from '../validate.js';
import type { TrackedAccountStore } from '../store/tracked-accounts.js';
import type { ExtensionRegistry, RegistryResult } from '../extensions/registry.js';
import { countLoaded } from '../extensions/registry.js';
import type { TransportClient } from '../discord/transport-client.js';
import { buildPresence } from '../presence.js';
import type { ReadinessFlag } from './readiness.js';

export type BootstrapState =
  | 'INIT'
  | 'STORE_READY'
  | 'ENV_CHECK'
  | 'RETRY_WAIT'
  | 'CONFIG_CHECK'
  | 'DB_CONSISTENCY'
  | 'EXTENSIONS_LOADED'
  | 'READY';

export type BootstrapSummary = {
  storeCreated: boolean;
  /** False when the bot started with required environment variables still missing. */
  environmentComplete: boolean;
  mismatched: number;
  repaired: number;
  extensions: RegistryResult[];
  extensionsLoaded: number;
  extensionsFailed: number;
  syncedCommands: number;
  trackedAccounts: number;
};

export type BootstrapOutcome =
  | { kind: 'ready'; summary: BootstrapSummary }
  | { kind: 'restart'; reason: string };

export type BootstrapDeps = {
  store: Pick<TrackedAccountStore, 'exists' | 'initialize' | 'checkConsistency' | 'repair' | 'count'>;
  registry: Pick<ExtensionRegistry, 'available' | 'loadAll' | 'commands'>;
  transport: Pick<TransportClient, 'userTag' | 'setPresenceActivity' | 'syncCommands'>;
  readiness: ReadinessFlag;
  /** Raw settings mapping, loaded once at process start. */
  settings: Record<string, unknown>;
  /** Live environment; called again after every reload. */
  env: () => NodeJS.ProcessEnv;
  /** Re-read the .env file into the environment before the second env check. */
  reloadEnvironment: () => void;
  retryDelayMs: number;
  log: LoggerLike;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  onTransition?: (from: BootstrapState, to: BootstrapState) => void;
};

async function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  await sleepFor(ms, undefined, { signal });
}

export class BootstrapOrchestrator {
  private current: BootstrapState = 'INIT';
  private readonly history: BootstrapState[] = ['INIT'];
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(private readonly deps: BootstrapDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
  }

  get state(): BootstrapState {
    return this.current;
  }

  /** Every state entered so far, in order, starting with INIT. */
  transitions(): BootstrapState[] {
    return [...this.history];
  }

  /**
   * Run the whole sequence once. Aborting `signal` cancels a pending retry
   * wait and prevents the readiness flag from being raised.
   */
  async run(signal?: AbortSignal): Promise<BootstrapOutcome> {
    const { log } = this.deps;

    const storeCreated = this.prepareStore();
    this.enter('STORE_READY');

    const environmentComplete = await this.checkEnvironment(signal);

    this.enter('CONFIG_CHECK');
    const { settings } = this.deps;
    if (!checkConfiguration(settings)) {
      log.warn(
        { problems: configurationProblems(settings), retryInMs: this.deps.retryDelayMs },
        'boot:settings file incomplete; restarting after backoff',
      );
      this.enter('RETRY_WAIT');
      await this.sleep(this.deps.retryDelayMs, signal);
      return { kind: 'restart', reason: 'settings file incomplete' };
    }

    this.enter('DB_CONSISTENCY');
    const { mismatched, repaired } = this.checkStore(settings);

    const extensions = await this.deps.registry.loadAll(this.deps.registry.available());
    const extensionsLoaded = countLoaded(extensions);
    for (const result of extensions) {
      if (!result.ok) {
        log.warn({ extension: result.name, kind: result.kind, error: result.error }, 'boot:extension failed to load');
      }
    }
    this.enter('EXTENSIONS_LOADED');

    const trackedAccounts = this.publishPresence(settings);
    const syncedCommands = await this.syncCommands();

    signal?.throwIfAborted();
    this.deps.readiness.markReady();
    this.enter('READY');

    const summary: BootstrapSummary = {
      storeCreated,
      environmentComplete,
      mismatched,
      repaired,
      extensions,
      extensionsLoaded,
      extensionsFailed: extensions.length - extensionsLoaded,
      syncedCommands,
      trackedAccounts,
    };
    log.info(
      {
        user: this.deps.transport.userTag,
        extensions: `${extensionsLoaded}/${extensions.length}`,
        syncedCommands,
        trackedAccounts,
      },
      `boot:${this.deps.transport.userTag} is online; synced ${syncedCommands} slash commands`,
    );
    return { kind: 'ready', summary };
  }

  private enter(next: BootstrapState): void {
    const prev = this.current;
    this.current = next;
    this.history.push(next);
    this.deps.log.debug?.({ from: prev, to: next }, 'boot:transition');
    this.deps.onTransition?.(prev, next);
  }

  private prepareStore(): boolean {
    const { store, log } = this.deps;
    if (store.exists()) return false;
    store.initialize();
    log.info({}, 'boot:store created');
    return true;
  }

  private async checkEnvironment(signal?: AbortSignal): Promise<boolean> {
    const { log } = this.deps;
    this.enter('ENV_CHECK');
    let missing = missingEnvironment(this.deps.env());
    if (missing.length === 0) return true;

    log.warn({ missing, retryInMs: this.deps.retryDelayMs }, 'boot:environment incomplete; retrying after backoff');
    this.enter('RETRY_WAIT');
    await this.sleep(this.deps.retryDelayMs, signal);
    this.deps.reloadEnvironment();
    this.enter('ENV_CHECK');

    missing = missingEnvironment(this.deps.env());
    if (missing.length === 0) {
      log.info({}, 'boot:environment complete after retry');
      return true;
    }
    log.warn({ missing }, 'boot:environment still incomplete; continuing degraded');
    return false;
  }

  private checkStore(settings: BotSettings): { mismatched: number; repaired: number } {
    const { store, log } = this.deps;
    const clients = configuredClients(this.deps.env());
    const invalid = store.checkConsistency(new Set(clients));
    if (invalid.length === 0) {
      log.info({ clients }, 'boot:database check passed');
      return { mismatched: 0, repaired: 0 };
    }

    const unknownClients = [...new Set(invalid.map((r) => r.clientName))];
    log.warn(
      { mismatched: invalid.length, unknownClients, clients },
      'boot:database references clients missing from CLIENT_NAMES',
    );

    if (!settings.auto_repair_mismatched_clients) {
      log.warn(
        {},
        'boot:set auto_repair_mismatched_clients to true to fix this automatically, or update the database or CLIENT_NAMES',
      );
      return { mismatched: invalid.length, repaired: 0 };
    }

    const fallback = clients[0];
    if (fallback === undefined) {
      log.warn({}, 'boot:cannot repair database: CLIENT_NAMES lists no clients');
      return { mismatched: invalid.length, repaired: 0 };
    }

    const repaired = store.repair(invalid, fallback);
    log.info(
      { repaired, fallback },
      'boot:reassigned mismatched accounts to the first configured client; re-check their notification settings',
    );
    return { mismatched: invalid.length, repaired };
  }

  private publishPresence(settings: BotSettings): number {
    const { store, transport, log } = this.deps;
    const presence = buildPresence(store, settings.activity_type);
    try {
      transport.setPresenceActivity(presence.activity);
    } catch (err) {
      log.warn({ err: err instanceof Error ? err.message : String(err) }, 'boot:presence update failed');
    }
    return presence.accountCount;
  }

  private async syncCommands(): Promise<number> {
    const { registry, transport, log } = this.deps;
    try {
      return await transport.syncCommands(registry.commands().map((c) => c.data));
    } catch (err) {
      log.warn({ err: err instanceof Error ? err.message : String(err) }, 'boot:slash command sync failed');
      return 0;
    }
  }
}
