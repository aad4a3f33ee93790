export function parseOwnerIds(raw: string | undefined): Set<string> {
  const out = new Set<string>();
  for (const part of String(raw ?? '').split(/[,\s]+/g)) {
    const v = part.trim();
    if (!v) continue;
    if (/^\d+$/.test(v)) out.add(v);
  }
  return out;
}

/**
 * Owner check for administrative commands. Explicit BOT_OWNER_IDS win; when
 * none are configured, the application owner(s) resolved from Discord are used.
 * Fails closed when both are empty.
 */
export function isOwner(configured: Set<string>, applicationOwners: Set<string>, userId: string): boolean {
  const allow = configured.size > 0 ? configured : applicationOwners;
  if (allow.size === 0) return false;
  return allow.has(userId);
}
