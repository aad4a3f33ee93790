/**
 * Service supervisor
 *
 * Owns the process lifetime: starts the status server, logs the bot in,
 * runs bootstrap, then waits for a shutdown signal. Whatever ends the run
 * (signal, fatal error, restart request), the bot connection, the status
 * listener and the store are released before the exit code is returned.
 */

import { spawn } from 'node:child_process';
import dotenv from 'dotenv';
import { configuredClients } from './config.js';
import type { TrackbotConfig } from './config.js';
import type { LoggerLike } from './logging/logger-like.js';
import { ReadinessFlag } from './bootstrap/readiness.js';
import { BootstrapOrchestrator } from './bootstrap/orchestrator.js';
import { ExtensionRegistry } from './extensions/registry.js';
import { BUILTIN_EXTENSIONS } from './extensions/catalog.js';
import type { ExtensionCatalog } from './extensions/types.js';
import { StoreError, TrackedAccountStore } from './store/tracked-accounts.js';
import { startStatusServer } from './status/server.js';
import type { StatusServer, StatusServerOptions } from './status/server.js';
import { startDiscordBot } from './discord/bot.js';
import type { BotParams, StartedBot } from './discord/bot.js';

/** Used for the admin prefix until a valid settings file is in place. */
export const DEFAULT_PREFIX = '!';
export const DEFAULT_REPLY_TTL_SECONDS = 15;

export type SupervisorExit = {
  code: number;
  reason: 'shutdown' | 'restart' | 'fatal';
  /** Start a replacement process before exiting. */
  restart: boolean;
};

export type SupervisorDeps = {
  config: TrackbotConfig;
  /** Raw settings mapping loaded at process start. */
  settings: Record<string, unknown>;
  log: LoggerLike;
  /** Aborted on SIGINT/SIGTERM. */
  signal: AbortSignal;
  catalog?: ExtensionCatalog;
  startedAt?: number;
  env?: () => NodeJS.ProcessEnv;
  reloadEnvironment?: () => void;
  startStatus?: (opts: StatusServerOptions) => Promise<StatusServer>;
  startBot?: (params: BotParams) => Promise<StartedBot>;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

const FATAL: SupervisorExit = { code: 1, reason: 'fatal', restart: false };

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function stringSetting(settings: Record<string, unknown>, key: string, fallback: string): string {
  const value = settings[key];
  return typeof value === 'string' ? value : fallback;
}

function numberSetting(settings: Record<string, unknown>, key: string, fallback: number): number {
  const value = settings[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function waitForAbort(signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}

/** Re-read .env over the current environment. */
export function reloadDotenv(log?: LoggerLike): void {
  const result = dotenv.config({ override: true });
  if (result.error) {
    log?.debug?.({ err: result.error.message }, 'supervisor:.env reload skipped');
  }
}

export async function runSupervisor(deps: SupervisorDeps): Promise<SupervisorExit> {
  const { config, settings, log, signal } = deps;
  const env = deps.env ?? (() => process.env);
  const readiness = new ReadinessFlag();
  const store = TrackedAccountStore.inDataDir(config.dataDir);

  let status: StatusServer;
  try {
    status = await (deps.startStatus ?? startStatusServer)({
      port: config.port,
      host: config.host,
      readiness,
      startedAt: deps.startedAt,
      log,
    });
  } catch (err) {
    log.error({ port: config.port, err: errorMessage(err) }, 'supervisor:status server failed to start');
    store.close();
    return FATAL;
  }

  let bot: StartedBot | null = null;
  try {
    if (!config.token) {
      log.error({}, 'supervisor:BOT_TOKEN is not set; cannot log in');
      return FATAL;
    }

    const registry = new ExtensionRegistry({
      catalog: deps.catalog ?? BUILTIN_EXTENSIONS,
      context: { store, readiness, log, clients: () => configuredClients(env()) },
      log,
    });

    try {
      bot = await (deps.startBot ?? startDiscordBot)({
        token: config.token,
        prefix: stringSetting(settings, 'prefix', DEFAULT_PREFIX),
        ownerIds: config.ownerIds,
        registry,
        store,
        logFile: config.logFile,
        replyTtlSeconds: numberSetting(settings, 'admin_reply_ttl_seconds', DEFAULT_REPLY_TTL_SECONDS),
        log,
        signal,
      });
    } catch (err) {
      if (signal.aborted) {
        log.info({}, 'supervisor:shutting down during login');
        return { code: 0, reason: 'shutdown', restart: false };
      }
      log.error({ err: errorMessage(err) }, 'supervisor:bot login failed');
      return FATAL;
    }

    const orchestrator = new BootstrapOrchestrator({
      store,
      registry,
      transport: bot.transport,
      readiness,
      settings,
      env,
      reloadEnvironment: deps.reloadEnvironment ?? (() => reloadDotenv(log)),
      retryDelayMs: config.retryDelayMs,
      log,
      sleep: deps.sleep,
    });
    const outcome = await orchestrator.run(signal);
    if (outcome.kind === 'restart') {
      log.warn({ reason: outcome.reason }, 'supervisor:restarting process');
      return { code: 0, reason: 'restart', restart: true };
    }

    await waitForAbort(signal);
    log.info({}, 'supervisor:shutting down');
    return { code: 0, reason: 'shutdown', restart: false };
  } catch (err) {
    if (signal.aborted) {
      log.info({}, 'supervisor:shutting down during bootstrap');
      return { code: 0, reason: 'shutdown', restart: false };
    }
    if (err instanceof StoreError) {
      log.error({ filePath: err.filePath, err: err.message }, 'supervisor:store failure');
      return FATAL;
    }
    log.error({ err: errorMessage(err) }, 'supervisor:fatal error');
    return FATAL;
  } finally {
    if (bot) {
      await bot.destroy().catch((err: unknown) => {
        log.warn({ err: errorMessage(err) }, 'supervisor:bot disconnect failed');
      });
    }
    await status.close().catch((err: unknown) => {
      log.warn({ err: errorMessage(err) }, 'supervisor:status server close failed');
    });
    store.close();
  }
}

/**
 * Start a copy of this process with the same runtime flags and arguments.
 * The caller exits right after; the copy keeps the terminal.
 */
export function respawnProcess(log: LoggerLike): void {
  const child = spawn(process.execPath, [...process.execArgv, ...process.argv.slice(1)], {
    stdio: 'inherit',
    detached: true,
  });
  child.unref();
  log.info({ pid: child.pid }, 'supervisor:replacement process started');
}
