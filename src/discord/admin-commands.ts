import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { LoggerLike } from '../logging/logger-like.js';
import type { ExtensionRegistry, RegistryErrorKind } from '../extensions/registry.js';
import { STORE_FILE_NAME } from '../store/tracked-accounts.js';
import type { TrackedAccountStore } from '../store/tracked-accounts.js';
import type { TransportClient } from './transport-client.js';
import { NO_MENTIONS } from './allowed-mentions.js';
import { downloadAttachment, findDatabaseAttachment, safeName } from './attachment-download.js';
import type { AttachmentLike, DownloadResult } from './attachment-download.js';

/** The upload confirmation is removed after this long, regardless of settings. */
export const UPLOAD_CONFIRMATION_TTL_MS = 5_000;

// ── Types ─────────────────────────────────────────────────────────────────────

export type ExtensionAction = 'load' | 'unload' | 'reload';

export type AdminCommand =
  | { action: ExtensionAction; extension: string }
  | { action: 'download_data' }
  | { action: 'upload_data' }
  | { action: 'download_log' };

export type AdminErrorKind =
  | RegistryErrorKind
  | 'MissingArgument'
  | 'NoAttachmentFound'
  | 'DownloadFailed'
  | 'StoreFailure'
  | 'LogUnavailable';

export type AdminFile = { attachment: Buffer; name: string };

export type AdminReply = {
  content: string;
  files: AdminFile[];
  /** Delete the reply after this many ms; null keeps it. */
  deleteAfterMs: number | null;
};

export type AdminResult =
  | { ok: true; reply: AdminReply }
  | { ok: false; kind: AdminErrorKind; error: string };

export type AdminCommandDeps = {
  registry: Pick<ExtensionRegistry, ExtensionAction | 'commands'>;
  transport: Pick<TransportClient, 'syncCommands'>;
  store: Pick<TrackedAccountStore, 'exportTo' | 'importFrom'>;
  /** Path of the log file written by the root logger. */
  logFile: string;
  /** Seconds before export replies are deleted. */
  replyTtlSeconds: number;
  /** Parent directory for temporary export copies. Default: os.tmpdir(). */
  tmpDir?: string;
  download?: (attachment: AttachmentLike) => Promise<DownloadResult>;
  log?: LoggerLike;
};

// ── Parser ────────────────────────────────────────────────────────────────────

export function parseAdminCommand(content: string, prefix: string): AdminCommand | null {
  const trimmed = content.trim();
  if (!prefix || !trimmed.startsWith(prefix)) return null;

  const [name = '', ...args] = trimmed.slice(prefix.length).trim().split(/\s+/);
  const action = name.toLowerCase();
  if (action === 'load' || action === 'unload' || action === 'reload') {
    return { action, extension: args.join(' ') };
  }
  if (action === 'download_data' || action === 'upload_data' || action === 'download_log') {
    return { action };
  }
  return null;
}

// ── Handler ───────────────────────────────────────────────────────────────────

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

const PAST_TENSE: Record<ExtensionAction, string> = {
  load: 'Loaded',
  unload: 'Unloaded',
  reload: 'Reloaded',
};

async function runExtensionAction(
  action: ExtensionAction,
  name: string,
  deps: AdminCommandDeps,
): Promise<AdminResult> {
  if (!name) return { ok: false, kind: 'MissingArgument', error: `Usage: ${action} <extension>` };

  const result = await deps.registry[action](name);
  if (!result.ok) return { ok: false, kind: result.kind, error: result.error };

  const verb = PAST_TENSE[action];
  try {
    const synced = await deps.transport.syncCommands(deps.registry.commands().map((c) => c.data));
    return {
      ok: true,
      reply: { content: `${verb} extension "${name}"; synced ${synced} slash commands.`, files: [], deleteAfterMs: null },
    };
  } catch (err) {
    deps.log?.warn({ extension: name, err: errorMessage(err) }, 'admin:slash command sync failed');
    return {
      ok: true,
      reply: {
        content: `${verb} extension "${name}"; slash command sync failed: ${errorMessage(err)}`,
        files: [],
        deleteAfterMs: null,
      },
    };
  }
}

async function exportDatabase(deps: AdminCommandDeps): Promise<AdminResult> {
  const dir = await fs.mkdtemp(path.join(deps.tmpDir ?? os.tmpdir(), 'trackbot-export-'));
  try {
    const copy = await deps.store.exportTo(path.join(dir, STORE_FILE_NAME));
    const data = await fs.readFile(copy);
    return {
      ok: true,
      reply: {
        content: 'Current tracked accounts database:',
        files: [{ attachment: data, name: STORE_FILE_NAME }],
        deleteAfterMs: deps.replyTtlSeconds * 1000,
      },
    };
  } catch (err) {
    return { ok: false, kind: 'StoreFailure', error: errorMessage(err) };
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

async function exportLog(deps: AdminCommandDeps): Promise<AdminResult> {
  const name = path.basename(deps.logFile);
  let data: Buffer;
  try {
    data = await fs.readFile(deps.logFile);
  } catch (err) {
    return { ok: false, kind: 'LogUnavailable', error: `Cannot read log file ${name}: ${errorMessage(err)}` };
  }
  return {
    ok: true,
    reply: { content: 'Current log file:', files: [{ attachment: data, name }], deleteAfterMs: deps.replyTtlSeconds * 1000 },
  };
}

async function importDatabase(attachments: Iterable<AttachmentLike>, deps: AdminCommandDeps): Promise<AdminResult> {
  const attachment = findDatabaseAttachment(attachments);
  if (!attachment) {
    return { ok: false, kind: 'NoAttachmentFound', error: 'Attach a file ending in .db to replace the database.' };
  }

  const download = deps.download ?? downloadAttachment;
  const downloaded = await download(attachment);
  if (!downloaded.ok) return { ok: false, kind: 'DownloadFailed', error: downloaded.error };

  try {
    deps.store.importFrom(downloaded.data);
  } catch (err) {
    return { ok: false, kind: 'StoreFailure', error: errorMessage(err) };
  }
  const name = safeName(attachment);
  deps.log?.info({ file: name, bytes: downloaded.data.length }, 'admin:database imported');
  return {
    ok: true,
    reply: {
      content: `Database replaced with ${name}; the previous file was kept as a backup.`,
      files: [],
      deleteAfterMs: UPLOAD_CONFIRMATION_TTL_MS,
    },
  };
}

export async function handleAdminCommand(
  cmd: AdminCommand,
  attachments: Iterable<AttachmentLike>,
  deps: AdminCommandDeps,
): Promise<AdminResult> {
  switch (cmd.action) {
    case 'load':
    case 'unload':
    case 'reload':
      return runExtensionAction(cmd.action, cmd.extension, deps);
    case 'download_data':
      return exportDatabase(deps);
    case 'download_log':
      return exportLog(deps);
    case 'upload_data':
      return importDatabase(attachments, deps);
  }
}

// ── Message dispatch ──────────────────────────────────────────────────────────

export type AdminMessage = {
  content: string;
  authorId: string;
  attachments: AttachmentLike[];
  reply(payload: {
    content: string;
    files: AdminFile[];
    allowedMentions: typeof NO_MENTIONS;
  }): Promise<{ delete(): Promise<unknown> }>;
};

export type AdminDispatchDeps = AdminCommandDeps & {
  prefix: string;
  isOwner(userId: string): Promise<boolean>;
};

/**
 * Parse, authorize, run and answer one administrative message.
 * Returns false when the message is not an administrative command.
 */
export async function dispatchAdminMessage(msg: AdminMessage, deps: AdminDispatchDeps): Promise<boolean> {
  const cmd = parseAdminCommand(msg.content, deps.prefix);
  if (!cmd) return false;

  if (!(await deps.isOwner(msg.authorId))) {
    deps.log?.warn({ user: msg.authorId, command: cmd.action }, 'admin:ignored command from non-owner');
    return true;
  }

  const result = await handleAdminCommand(cmd, msg.attachments, deps);
  if (!result.ok) {
    deps.log?.warn({ user: msg.authorId, command: cmd.action, kind: result.kind, error: result.error }, 'admin:command failed');
    await msg.reply({ content: result.error, files: [], allowedMentions: NO_MENTIONS });
    return true;
  }

  deps.log?.info({ user: msg.authorId, command: cmd.action }, 'admin:command completed');
  const sent = await msg.reply({ content: result.reply.content, files: result.reply.files, allowedMentions: NO_MENTIONS });
  if (result.reply.deleteAfterMs !== null) {
    scheduleDelete(sent, result.reply.deleteAfterMs, deps.log);
  }
  return true;
}

function scheduleDelete(sent: { delete(): Promise<unknown> }, delayMs: number, log?: LoggerLike): void {
  const timer = setTimeout(() => {
    sent.delete().catch((err: unknown) => {
      log?.debug?.({ err: errorMessage(err) }, 'admin:reply delete failed');
    });
  }, delayMs);
  timer.unref();
}
