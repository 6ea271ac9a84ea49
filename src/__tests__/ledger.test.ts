import * as fs from 'fs';
import * as path from 'path';
import Database from 'better-sqlite3';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Ledger } from '../ledger/ledger.js';
import {
  LedgerClosedError,
  LedgerDecodeError,
  LedgerTransactionError,
  StoreOpenError,
} from '../ledger/errors.js';
import { SECOND, makeTempDir, removeDir, thrown } from './helpers.js';

const INT64_MAX = (1n << 63n) - 1n;

describe('Ledger', () => {
  let dir: string;
  let storePath: string;
  let ledger: Ledger;

  beforeEach(() => {
    dir = makeTempDir();
    storePath = path.join(dir, 'playtime.db');
    ledger = Ledger.open(storePath);
  });

  afterEach(() => {
    ledger.close();
    removeDir(dir);
  });

  it('reports no history for an identity that never played', () => {
    expect(ledger.query('user-1')).toEqual({ kind: 'no-history' });
  });

  it('creates the entry on first merge', () => {
    expect(ledger.merge('user-1', 'Chess', 5n * SECOND)).toBe(5n * SECOND);
    expect(ledger.query('user-1')).toEqual({
      kind: 'history',
      totals: new Map([['Chess', 5n * SECOND]]),
    });
  });

  it('adds merges for the same activity together', () => {
    ledger.merge('user-1', 'Chess', 3n * SECOND);
    expect(ledger.merge('user-1', 'Chess', 4n * SECOND)).toBe(7n * SECOND);
  });

  it('keeps activities and identities apart', () => {
    ledger.merge('user-1', 'Chess', 1n * SECOND);
    ledger.merge('user-1', 'Go', 2n * SECOND);
    ledger.merge('user-2', 'Chess', 10n * SECOND);

    expect(ledger.query('user-1')).toEqual({
      kind: 'history',
      totals: new Map([['Chess', 1n * SECOND], ['Go', 2n * SECOND]]),
    });
    expect(ledger.query('user-2')).toEqual({
      kind: 'history',
      totals: new Map([['Chess', 10n * SECOND]]),
    });
  });

  it('accepts a zero-length merge and reports it as history', () => {
    ledger.merge('user-1', 'Chess', 0n);
    expect(ledger.query('user-1')).toEqual({ kind: 'history', totals: new Map([['Chess', 0n]]) });
  });

  it('rejects negative elapsed time', () => {
    expect(() => ledger.merge('user-1', 'Chess', -1n)).toThrow(RangeError);
    expect(ledger.query('user-1')).toEqual({ kind: 'no-history' });
  });

  it('persists totals across reopen', () => {
    ledger.merge('user-1', 'Chess', 42n * SECOND);
    ledger.close();

    ledger = Ledger.open(storePath);
    expect(ledger.query('user-1')).toEqual({
      kind: 'history',
      totals: new Map([['Chess', 42n * SECOND]]),
    });
  });

  it('stores the value as a bare varint', () => {
    ledger.merge('user-1', 'Chess', 64n);

    const raw = new Database(storePath, { readonly: true });
    const row = raw.prepare('SELECT value FROM entries WHERE identity = ? AND activity = ?').get('user-1', 'Chess');
    raw.close();

    expect(row).toEqual({ value: Buffer.from([0x80, 0x01]) });
  });

  describe('corrupt values', () => {
    beforeEach(() => {
      const raw = new Database(storePath);
      raw.prepare('INSERT INTO namespaces (identity, created_at) VALUES (?, ?)').run('user-1', 0);
      raw.prepare('INSERT INTO entries (identity, activity, value) VALUES (?, ?, ?)').run('user-1', 'Chess', Buffer.from([0x80]));
      raw.close();
    });

    it('fails the merge with a decode error instead of treating it as zero', () => {
      const error = thrown(() => ledger.merge('user-1', 'Chess', SECOND), LedgerDecodeError);
      expect(error.kind).toBe('decode');
      expect(error.identity).toBe('user-1');
      expect(error.activity).toBe('Chess');
      expect(error.message).toBe('Corrupt ledger value for user-1/Chess: truncated varint');
    });

    it('leaves the stored bytes untouched after the failed merge', () => {
      expect(() => ledger.merge('user-1', 'Chess', SECOND)).toThrow(LedgerDecodeError);

      const raw = new Database(storePath, { readonly: true });
      const row = raw.prepare('SELECT value FROM entries WHERE identity = ?').get('user-1');
      raw.close();
      expect(row).toEqual({ value: Buffer.from([0x80]) });
    });

    it('fails the query with a decode error', () => {
      expect(() => ledger.query('user-1')).toThrow(LedgerDecodeError);
    });

    it('still merges other activities of the same identity', () => {
      expect(ledger.merge('user-1', 'Go', SECOND)).toBe(SECOND);
    });
  });

  it('rolls back the whole merge when the new total cannot be stored', () => {
    ledger.merge('user-1', 'Chess', INT64_MAX);

    const error = thrown(() => ledger.merge('user-1', 'Chess', 1n), LedgerTransactionError);
    expect(error.kind).toBe('transaction');
    expect(error.cause).toBeInstanceOf(RangeError);
    expect(ledger.query('user-1')).toEqual({ kind: 'history', totals: new Map([['Chess', INT64_MAX]]) });
  });

  it('does not leave a namespace behind when the first merge fails', () => {
    expect(() => ledger.merge('user-2', 'Chess', INT64_MAX + 1n)).toThrow(LedgerTransactionError);
    expect(ledger.query('user-2')).toEqual({ kind: 'no-history' });
  });

  it('refuses work after close', () => {
    ledger.close();
    expect(ledger.isOpen).toBe(false);
    expect(() => ledger.merge('user-1', 'Chess', SECOND)).toThrow(LedgerClosedError);
    expect(() => ledger.query('user-1')).toThrow(LedgerClosedError);
    expect(() => ledger.close()).not.toThrow();
  });

  it('surfaces an unusable store path as a store-open error', () => {
    const blocker = path.join(dir, 'not-a-directory');
    fs.writeFileSync(blocker, '');
    const badPath = path.join(blocker, 'playtime.db');

    const error = thrown(() => Ledger.open(badPath), StoreOpenError);
    expect(error.kind).toBe('store-open');
    expect(error.storePath).toBe(badPath);
  });

  it('creates missing parent directories', () => {
    const nested = path.join(dir, 'a', 'b', 'playtime.db');
    const other = Ledger.open(nested);
    other.close();
    expect(fs.existsSync(nested)).toBe(true);
  });
});
