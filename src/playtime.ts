import { Ledger } from './ledger/ledger.js';
import { SessionTracker, type SessionTrackerOptions } from './tracker/session-tracker.js';
import type { SnapshotResult } from './tracker/types.js';

export interface PlaytimeOptions extends SessionTrackerOptions {
  /** 0 disables the periodic checkpoint. */
  snapshotIntervalMs?: number;
  shutdownGraceMs?: number;
}

/** Everything the bot needs at run time, created once by `openPlaytime`. */
export interface PlaytimeContext {
  ledger: Ledger;
  tracker: SessionTracker;
  startedAt: number;
  commandsAnswered: number;
  shutdownGraceMs: number;
  snapshotTimer: NodeJS.Timeout | null;
}

export const DEFAULT_SHUTDOWN_GRACE_MS = 5000;

/**
 * Attach the durable store and start tracking. Throws StoreOpenError if the
 * store cannot be opened.
 */
export function openPlaytime(storePath: string, options: PlaytimeOptions = {}): PlaytimeContext {
  const ledger = Ledger.open(storePath);
  const tracker = new SessionTracker(ledger, options);
  tracker.start();

  let snapshotTimer: NodeJS.Timeout | null = null;
  const interval = options.snapshotIntervalMs ?? 0;
  if (interval > 0) {
    snapshotTimer = setInterval(() => {
      tracker.snapshot();
    }, interval);
    snapshotTimer.unref();
  }

  console.log(`[Playtime] Ledger open at ${storePath}`);

  return {
    ledger,
    tracker,
    startedAt: Date.now(),
    commandsAnswered: 0,
    shutdownGraceMs: options.shutdownGraceMs ?? DEFAULT_SHUTDOWN_GRACE_MS,
    snapshotTimer,
  };
}

/**
 * Checkpoint live sessions and release the store. The tracker's final
 * snapshot always runs before the ledger is closed.
 */
export async function closePlaytime(ctx: PlaytimeContext): Promise<SnapshotResult> {
  if (ctx.snapshotTimer) {
    clearInterval(ctx.snapshotTimer);
    ctx.snapshotTimer = null;
  }

  try {
    return await ctx.tracker.shutdown(ctx.shutdownGraceMs);
  } finally {
    ctx.ledger.close();
  }
}
