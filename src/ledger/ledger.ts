/**
 * Ledger — durable cumulative playtime per (identity, activity).
 *
 * Each identity owns a namespace row; each activity played under it owns one
 * entry whose value is a signed varint count of nanoseconds. Every merge runs
 * in its own SQLite transaction, so a failed merge leaves nothing behind.
 */
import * as fs from 'fs';
import * as path from 'path';
import Database from 'better-sqlite3';
import {
  LedgerClosedError,
  LedgerDecodeError,
  LedgerError,
  LedgerTransactionError,
  StoreOpenError,
} from './errors.js';
import { decodeVarint, encodeVarint } from './varint.js';

type Db = InstanceType<typeof Database>;

export type LedgerTotals = Map<string, bigint>;

export type LedgerQueryResult =
  | { kind: 'history'; totals: LedgerTotals }
  | { kind: 'no-history' };

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS namespaces (
    identity   TEXT PRIMARY KEY,
    created_at INTEGER NOT NULL
  );
  CREATE TABLE IF NOT EXISTS entries (
    identity TEXT NOT NULL REFERENCES namespaces(identity),
    activity TEXT NOT NULL,
    value    BLOB NOT NULL,
    PRIMARY KEY (identity, activity)
  ) WITHOUT ROWID;
`;

export class Ledger {
  readonly storePath: string;
  private db: Db | null;
  private readonly mergeTx: (identity: string, activity: string, elapsed: bigint) => bigint;
  private readonly queryTx: (identity: string) => LedgerQueryResult;

  private constructor(db: Db, storePath: string) {
    this.db = db;
    this.storePath = storePath;

    const ensureNamespace = db.prepare('INSERT OR IGNORE INTO namespaces (identity, created_at) VALUES (?, ?)');
    const hasNamespace = db.prepare('SELECT 1 FROM namespaces WHERE identity = ?');
    const readEntry = db.prepare('SELECT value FROM entries WHERE identity = ? AND activity = ?');
    const readNamespace = db.prepare('SELECT activity, value FROM entries WHERE identity = ? ORDER BY activity');
    const writeEntry = db.prepare(`
      INSERT INTO entries (identity, activity, value) VALUES (?, ?, ?)
      ON CONFLICT (identity, activity) DO UPDATE SET value = excluded.value
    `);

    this.mergeTx = db.transaction((identity: string, activity: string, elapsed: bigint): bigint => {
      ensureNamespace.run(identity, Date.now());
      const row = readEntry.get(identity, activity) as { value: Buffer } | undefined;
      const current = row ? decodeAt(row.value, identity, activity) : 0n;
      const total = current + elapsed;
      writeEntry.run(identity, activity, encodeVarint(total));
      return total;
    });

    const readAll = db.transaction((identity: string): LedgerQueryResult => {
      if (!hasNamespace.get(identity)) {
        return { kind: 'no-history' };
      }
      const rows = readNamespace.all(identity) as { activity: string; value: Buffer }[];
      const totals: LedgerTotals = new Map();
      for (const row of rows) {
        totals.set(row.activity, decodeAt(row.value, identity, row.activity));
      }
      return { kind: 'history', totals };
    });
    // deferred: never takes the write lock
    this.queryTx = readAll.deferred;
  }

  /**
   * Open (or create) the store at `storePath`. Any failure is fatal for the
   * caller and comes back as a StoreOpenError.
   */
  static open(storePath: string): Ledger {
    let db: Db | undefined;
    try {
      if (storePath !== ':memory:') {
        fs.mkdirSync(path.dirname(path.resolve(storePath)), { recursive: true });
      }
      db = new Database(storePath);
      db.pragma('journal_mode = WAL');
      db.pragma('synchronous = FULL');
      db.pragma('foreign_keys = ON');
      db.exec(SCHEMA);
      return new Ledger(db, storePath);
    } catch (error) {
      db?.close();
      throw new StoreOpenError(storePath, error);
    }
  }

  get isOpen(): boolean {
    return this.db !== null;
  }

  /**
   * Add `elapsedNs` to the stored total for (identity, activity) and return
   * the new total. Creates the namespace and entry on first use.
   */
  merge(identity: string, activity: string, elapsedNs: bigint): bigint {
    this.ensureOpen();
    if (elapsedNs < 0n) {
      throw new RangeError(`Elapsed time must not be negative (got ${elapsedNs}ns)`);
    }
    return this.run('merge', () => this.mergeTx(identity, activity, elapsedNs));
  }

  /**
   * All totals recorded for `identity`. An identity that never merged anything
   * yields `{ kind: 'no-history' }`, never an empty map.
   */
  query(identity: string): LedgerQueryResult {
    this.ensureOpen();
    return this.run('query', () => this.queryTx(identity));
  }

  /** Checkpoint the WAL and release the file. Safe to call twice. */
  close(): void {
    if (!this.db) return;
    const db = this.db;
    this.db = null;
    try {
      db.pragma('wal_checkpoint(TRUNCATE)');
    } finally {
      db.close();
    }
    console.log(`[Ledger] Closed ${this.storePath}`);
  }

  private ensureOpen(): void {
    if (!this.db) throw new LedgerClosedError();
  }

  private run<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof LedgerError) throw error;
      throw new LedgerTransactionError(operation, error);
    }
  }
}

function decodeAt(value: Buffer, identity: string, activity: string): bigint {
  try {
    return decodeVarint(value);
  } catch (error) {
    if (error instanceof LedgerDecodeError) throw error.at(identity, activity);
    throw error;
  }
}
