import fs from 'node:fs/promises';
import path from 'node:path';
import type { LoggerLike } from './logging/logger-like.js';
import { parseOwnerIds } from './discord/allowlist.js';

export const DEFAULT_PORT = 10_000;
export const DEFAULT_RETRY_DELAY_MS = 30_000;
export const DEFAULT_CONFIG_PATH = path.join('config', 'config.json');
export const DEFAULT_LOG_FILE = 'console.log';
export const DEFAULT_DATA_DIR = 'data';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

type ParseResult = {
  config: TrackbotConfig;
  warnings: string[];
  infos: string[];
};

/**
 * Process-level settings read from the environment once at startup.
 *
 * Bot behaviour (prefix, repair policy, presence) lives in the JSON settings
 * file instead; see `loadBotSettings`.
 */
export type TrackbotConfig = {
  token?: string;
  dataDir: string;
  port: number;
  host: string;
  configPath: string;
  logLevel: LogLevel;
  logFile: string;
  retryDelayMs: number;
  ownerIds: Set<string>;
};

function parseNonNegativeNumber(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultValue: number,
): number {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return defaultValue;
  const n = Number(raw);
  if (!Number.isFinite(n) || n < 0) {
    throw new Error(`${name} must be a non-negative number, got "${raw}"`);
  }
  return n;
}

function parseNonNegativeInt(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultValue: number,
): number {
  const n = parseNonNegativeNumber(env, name, defaultValue);
  if (!Number.isInteger(n)) {
    throw new Error(`${name} must be an integer, got "${n}"`);
  }
  return n;
}

function parsePort(env: NodeJS.ProcessEnv, name: string, defaultValue: number): number {
  const n = parseNonNegativeInt(env, name, defaultValue);
  if (n > 65_535) {
    throw new Error(`${name} must be a valid TCP port (0-65535), got "${n}"`);
  }
  return n;
}

function parseTrimmedString(
  env: NodeJS.ProcessEnv,
  name: string,
): string | undefined {
  const raw = env[name];
  if (raw == null) return undefined;
  const trimmed = raw.trim();
  return trimmed || undefined;
}

/**
 * Split CLIENT_NAMES into client names, keeping declared order and dropping
 * duplicates. Order matters: the first entry is the repair fallback.
 */
export function parseClientNames(raw: string | undefined): string[] {
  const out: string[] = [];
  for (const part of String(raw ?? '').split(',')) {
    const name = part.trim();
    if (!name || out.includes(name)) continue;
    out.push(name);
  }
  return out;
}

/** Configured clients, read from the live environment on every call. */
export function configuredClients(env: NodeJS.ProcessEnv = process.env): string[] {
  return parseClientNames(env.CLIENT_NAMES);
}

export function parseConfig(env: NodeJS.ProcessEnv): ParseResult {
  const warnings: string[] = [];
  const infos: string[] = [];

  // Missing credentials are reported by the bootstrap env check, not here.
  const token = parseTrimmedString(env, 'BOT_TOKEN');

  let dataDir = parseTrimmedString(env, 'DATA_PATH');
  if (!dataDir) {
    dataDir = DEFAULT_DATA_DIR;
    warnings.push(`DATA_PATH is not set: using "${DEFAULT_DATA_DIR}" relative to the working directory`);
  }

  const port = parsePort(env, 'PORT', DEFAULT_PORT);
  const host = parseTrimmedString(env, 'HOST') ?? '0.0.0.0';
  const configPath = parseTrimmedString(env, 'CONFIG_PATH') ?? DEFAULT_CONFIG_PATH;
  const logLevelRaw = parseTrimmedString(env, 'LOG_LEVEL')?.toLowerCase() ?? 'info';
  let logLevel: LogLevel = 'info';
  if (isLogLevel(logLevelRaw)) {
    logLevel = logLevelRaw;
  } else {
    warnings.push(`LOG_LEVEL "${logLevelRaw}" is not a log level: using "info"`);
  }
  const logFile = parseTrimmedString(env, 'LOG_FILE') ?? DEFAULT_LOG_FILE;
  const retryDelayMs = parseNonNegativeInt(env, 'BOOTSTRAP_RETRY_DELAY_MS', DEFAULT_RETRY_DELAY_MS);

  const ownerIdsRaw = env.BOT_OWNER_IDS;
  const ownerIds = parseOwnerIds(ownerIdsRaw);
  if ((ownerIdsRaw ?? '').trim().length > 0 && ownerIds.size === 0) {
    warnings.push('BOT_OWNER_IDS was set but no valid IDs were parsed: falling back to the application owner');
  } else if (ownerIds.size === 0) {
    infos.push('BOT_OWNER_IDS is empty: administrative commands are limited to the application owner');
  }

  return {
    config: {
      token,
      dataDir,
      port,
      host,
      configPath,
      logLevel,
      logFile,
      retryDelayMs,
      ownerIds,
    },
    warnings,
    infos,
  };
}

/**
 * Read the bot settings file as a raw mapping.
 *
 * Never throws: a missing or malformed file yields `{}`, which the bootstrap
 * configuration check then rejects like any other incomplete mapping.
 */
export async function loadBotSettings(filePath: string, log?: LoggerLike): Promise<Record<string, unknown>> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (err) {
    log?.warn({ filePath, err: err instanceof Error ? err.message : String(err) }, 'config:settings file unreadable');
    return {};
  }

  try {
    const parsed: unknown = JSON.parse(raw);
    if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
      log?.warn({ filePath }, 'config:settings file must contain a JSON object');
      return {};
    }
    return { ...parsed };
  } catch (err) {
    log?.warn({ filePath, err: err instanceof Error ? err.message : String(err) }, 'config:settings file is not valid JSON');
    return {};
  }
}
