/** Allowed Discord CDN hosts (SSRF protection). */
const ALLOWED_HOSTS = new Set(['cdn.discordapp.com', 'media.discordapp.net']);

/** Max bytes for an uploaded database file (Discord's default upload cap). */
export const MAX_DATABASE_BYTES = 25 * 1024 * 1024;

const DOWNLOAD_TIMEOUT_MS = 30_000;

/** Discord attachment shape (subset of discord.js Attachment). */
export type AttachmentLike = {
  url: string;
  name?: string | null;
  size?: number | null;
};

export type DownloadResult = { ok: true; data: Buffer } | { ok: false; error: string };

export type FetchLike = (url: string, init: { signal: AbortSignal; redirect: 'error' }) => Promise<{
  ok: boolean;
  status: number;
  arrayBuffer(): Promise<ArrayBuffer>;
}>;

/** Sanitize an attachment filename for messages (no URLs or control characters). */
export function safeName(attachment: AttachmentLike): string {
  const raw = attachment.name ?? 'unknown';
  return raw.replace(/[\x00-\x1f]/g, '').slice(0, 100).trim() || 'unknown';
}

export function isDatabaseAttachment(attachment: AttachmentLike): boolean {
  return (attachment.name ?? '').toLowerCase().endsWith('.db');
}

/** First attachment whose name ends in `.db`, if any. */
export function findDatabaseAttachment<T extends AttachmentLike>(attachments: Iterable<T>): T | undefined {
  for (const att of attachments) {
    if (isDatabaseAttachment(att)) return att;
  }
  return undefined;
}

/**
 * Download an attachment from the Discord CDN into memory.
 * Returns the bytes on success, or an error string on failure.
 */
export async function downloadAttachment(
  attachment: AttachmentLike,
  fetchImpl: FetchLike = fetch,
): Promise<DownloadResult> {
  const name = safeName(attachment);

  let parsedUrl: URL;
  try {
    parsedUrl = new URL(attachment.url);
  } catch {
    return { ok: false, error: `${name}: invalid URL` };
  }

  if (parsedUrl.protocol !== 'https:' || !ALLOWED_HOSTS.has(parsedUrl.hostname)) {
    return { ok: false, error: `${name}: blocked (non-Discord CDN host)` };
  }

  if (attachment.size != null && attachment.size > MAX_DATABASE_BYTES) {
    const sizeMB = (attachment.size / (1024 * 1024)).toFixed(1);
    return { ok: false, error: `${name}: too large (${sizeMB} MB, max 25 MB)` };
  }

  try {
    const response = await fetchImpl(attachment.url, {
      signal: AbortSignal.timeout(DOWNLOAD_TIMEOUT_MS),
      redirect: 'error',
    });
    if (!response.ok) {
      return { ok: false, error: `${name}: HTTP ${response.status}` };
    }

    const data = Buffer.from(await response.arrayBuffer());
    if (data.length > MAX_DATABASE_BYTES) {
      const sizeMB = (data.length / (1024 * 1024)).toFixed(1);
      return { ok: false, error: `${name}: too large (${sizeMB} MB, max 25 MB)` };
    }
    return { ok: true, data };
  } catch (err: unknown) {
    const errObj = err instanceof Error ? err : null;
    if (errObj?.name === 'TimeoutError' || errObj?.name === 'AbortError') {
      return { ok: false, error: `${name}: download timed out` };
    }
    if (errObj?.name === 'TypeError' && String(errObj.message).includes('redirect')) {
      return { ok: false, error: `${name}: blocked (unexpected redirect)` };
    }
    return { ok: false, error: `${name}: download failed` };
  }
}
