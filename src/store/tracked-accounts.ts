/**
 * Tracked account store
 *
 * SQLite file holding which external account is tracked under which
 * configured client. Every stored client name is expected to appear in
 * CLIENT_NAMES; rows that don't are "mismatched" and are what the bootstrap
 * consistency check reports and `repair()` rewrites.
 *
 * Table:
 * - tracked_accounts: account_id -> client_name
 */

import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';

export const STORE_FILE_NAME = 'tracked_accounts.db';

/** SQLite files start with this 16-byte header. */
const SQLITE_HEADER = 'SQLite format 3\u0000';

export type TrackedAccount = {
  accountId: string;
  clientName: string;
};

type TrackedAccountRow = {
  account_id: string;
  client_name: string;
};

function rowToAccount(row: TrackedAccountRow): TrackedAccount {
  return { accountId: row.account_id, clientName: row.client_name };
}

/** Raised when the store file cannot be opened or written. Fatal to the process. */
export class StoreError extends Error {
  constructor(message: string, readonly filePath: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreError';
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Throws unless `file` is an intact SQLite database holding the tracked_accounts table. */
function verifyUpload(file: string): void {
  const db = new Database(file, { fileMustExist: true });
  try {
    const integrity: unknown = db.pragma('quick_check', { simple: true });
    if (integrity !== 'ok') {
      throw new Error(`integrity check failed: ${String(integrity)}`);
    }
    const table = db
      .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'tracked_accounts'")
      .get();
    if (!table) {
      throw new Error('no tracked_accounts table');
    }
  } finally {
    db.close();
  }
}

export class TrackedAccountStore {
  private db: Database.Database | null = null;

  constructor(readonly filePath: string) {}

  /** Resolve the store file inside a data directory. */
  static inDataDir(dataDir: string): TrackedAccountStore {
    return new TrackedAccountStore(path.join(dataDir, STORE_FILE_NAME));
  }

  exists(): boolean {
    return fs.existsSync(this.filePath);
  }

  /**
   * Create the store file and schema. Safe to call on an existing store:
   * `CREATE TABLE IF NOT EXISTS` leaves existing rows untouched.
   */
  initialize(): void {
    const db = this.connection();
    try {
      db.exec(`
        CREATE TABLE IF NOT EXISTS tracked_accounts (
          account_id TEXT PRIMARY KEY,
          client_name TEXT NOT NULL,
          created_at INTEGER NOT NULL DEFAULT (unixepoch())
        );
        CREATE INDEX IF NOT EXISTS idx_tracked_accounts_client ON tracked_accounts(client_name);
      `);
    } catch (err) {
      throw new StoreError(`Cannot initialize store at ${this.filePath}: ${errorMessage(err)}`, this.filePath, { cause: err });
    }
  }

  /** Records whose client is not among `configuredClients`. Read-only. */
  checkConsistency(configuredClients: ReadonlySet<string>): TrackedAccount[] {
    return this.list().filter((account) => !configuredClients.has(account.clientName));
  }

  /**
   * Point every listed record at `fallbackClient`. All updates run in one
   * transaction, so a crash leaves either the old or the new client on each row.
   * Returns the number of rows changed.
   */
  repair(invalid: readonly TrackedAccount[], fallbackClient: string): number {
    const db = this.connection();
    const update = db.prepare<[string, string, string]>(
      'UPDATE tracked_accounts SET client_name = ? WHERE account_id = ? AND client_name != ?',
    );
    const apply = db.transaction((rows: readonly TrackedAccount[]) => {
      let changed = 0;
      for (const row of rows) {
        changed += update.run(fallbackClient, row.accountId, fallbackClient).changes;
      }
      return changed;
    });
    try {
      return apply(invalid);
    } catch (err) {
      throw new StoreError(`Failed to repair tracked accounts: ${errorMessage(err)}`, this.filePath, { cause: err });
    }
  }

  list(): TrackedAccount[] {
    const rows = this.connection()
      .prepare<[], TrackedAccountRow>('SELECT account_id, client_name FROM tracked_accounts ORDER BY created_at, rowid')
      .all();
    return rows.map(rowToAccount);
  }

  get(accountId: string): TrackedAccount | undefined {
    const row = this.connection()
      .prepare<[string], TrackedAccountRow>('SELECT account_id, client_name FROM tracked_accounts WHERE account_id = ?')
      .get(accountId);
    return row ? rowToAccount(row) : undefined;
  }

  count(): number {
    const row = this.connection()
      .prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM tracked_accounts')
      .get();
    return row?.total ?? 0;
  }

  /** Account totals per client name, including clients that are no longer configured. */
  countByClient(): Map<string, number> {
    const rows = this.connection()
      .prepare<[], { client_name: string; total: number }>(
        'SELECT client_name, COUNT(*) AS total FROM tracked_accounts GROUP BY client_name ORDER BY client_name',
      )
      .all();
    return new Map(rows.map((r) => [r.client_name, r.total]));
  }

  /** Insert or move an account. Returns false when it was already tracked by that client. */
  track(accountId: string, clientName: string): boolean {
    const result = this.connection()
      .prepare<[string, string]>(`
        INSERT INTO tracked_accounts (account_id, client_name) VALUES (?, ?)
        ON CONFLICT(account_id) DO UPDATE SET client_name = excluded.client_name
        WHERE client_name != excluded.client_name
      `)
      .run(accountId, clientName);
    return result.changes > 0;
  }

  untrack(accountId: string): boolean {
    const result = this.connection()
      .prepare<[string]>('DELETE FROM tracked_accounts WHERE account_id = ?')
      .run(accountId);
    return result.changes > 0;
  }

  /**
   * Write a consistent copy of the database to `destination` and return its path.
   * Uses SQLite's online backup, so the copy is safe while the bot keeps running.
   */
  async exportTo(destination: string): Promise<string> {
    try {
      await this.connection().backup(destination);
      return destination;
    } catch (err) {
      throw new StoreError(`Failed to export store: ${errorMessage(err)}`, this.filePath, { cause: err });
    }
  }

  /**
   * Replace the store file with `data`. The upload is written beside the store
   * and must pass an integrity check and carry the tracked_accounts table before
   * it is renamed into place. The current connection is closed first and
   * reopened on next use; the previous file is kept as `<file>.bak`.
   */
  importFrom(data: Buffer): void {
    if (data.subarray(0, SQLITE_HEADER.length).toString('latin1') !== SQLITE_HEADER) {
      throw new StoreError('Uploaded file is not an SQLite database', this.filePath);
    }
    const tmpPath = `${this.filePath}.upload`;
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(tmpPath, data);
      verifyUpload(tmpPath);
    } catch (err) {
      fs.rmSync(tmpPath, { force: true });
      throw new StoreError(`Uploaded file is not a usable store: ${errorMessage(err)}`, this.filePath, { cause: err });
    }

    this.close();
    try {
      if (fs.existsSync(this.filePath)) {
        fs.copyFileSync(this.filePath, `${this.filePath}.bak`);
      }
      fs.renameSync(tmpPath, this.filePath);
    } catch (err) {
      fs.rmSync(tmpPath, { force: true });
      throw new StoreError(`Failed to import store: ${errorMessage(err)}`, this.filePath, { cause: err });
    }
    this.initialize();
  }

  close(): void {
    if (!this.db) return;
    this.db.close();
    this.db = null;
  }

  private connection(): Database.Database {
    if (this.db) return this.db;
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      const db = new Database(this.filePath);
      db.pragma('journal_mode = WAL');
      this.db = db;
      return db;
    } catch (err) {
      throw new StoreError(`Cannot open store at ${this.filePath}: ${errorMessage(err)}`, this.filePath, { cause: err });
    }
  }
}
