import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { vi } from 'vitest';
import type { Clock, TrackerLogger } from '../tracker/types.js';

export const SECOND = 1_000_000_000n;

export interface ManualClock {
  clock: Clock;
  advance(ns: bigint): void;
}

export function manualClock(start = 1_000n * SECOND): ManualClock {
  let now = start;
  return {
    clock: () => now,
    advance(ns: bigint) {
      now += ns;
    },
  };
}

export function silentLogger(): TrackerLogger & {
  log: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
} {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'playtime-test-'));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Run `fn` and return what it threw, failing unless it is a `type`. */
export function thrown<T>(fn: () => unknown, type: new (...args: never[]) => T): T {
  try {
    fn();
  } catch (error) {
    if (error instanceof type) return error;
    throw error;
  }
  throw new Error(`Expected ${type.name} to be thrown`);
}
