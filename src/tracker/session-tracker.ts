/**
 * Session Tracker — owns the live sessions and turns start/end signals into
 * ledger merges.
 *
 * The live map is only ever touched synchronously from tracker methods, so
 * the tracker is its single owner. Ending detaches the session right away and
 * hands a value copy to a background unit; those units are what fan out, and
 * they never see the map.
 *
 * Ledger totals do not include the time of a session that is still open.
 * Callers that want "played so far" add `now - startedAt` from
 * `getLiveSession()` themselves.
 */
import { setImmediate as nextTick, setTimeout as sleep } from 'timers/promises';
import type { LedgerQueryResult } from '../ledger/ledger.js';
import { EndQueue } from './end-queue.js';
import {
  systemClock,
  type Clock,
  type ClosedSession,
  type Session,
  type SnapshotResult,
  type TrackerLogger,
} from './types.js';

/** The part of the ledger the tracker needs. */
export interface PlaytimeLedger {
  merge(identity: string, activity: string, elapsedNs: bigint): bigint;
  query(identity: string): LedgerQueryResult;
}

export interface SessionTrackerOptions {
  clock?: Clock;
  /** Upper bound on concurrently running end-processing units. */
  maxInFlightMerges?: number;
  logger?: TrackerLogger;
}

export const DEFAULT_MAX_IN_FLIGHT_MERGES = 8;

export class SessionTracker {
  private readonly live = new Map<string, Session>();
  private readonly queue = new EndQueue<ClosedSession>();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly clock: Clock;
  private readonly maxInFlight: number;
  private readonly logger: TrackerLogger;

  private consumer: Promise<void> | null = null;
  // enqueued but not yet merged (or failed)
  private outstanding = 0;
  private idleWaiters: Array<() => void> = [];
  private shutdownResult: Promise<SnapshotResult> | null = null;

  constructor(
    private readonly ledger: PlaytimeLedger,
    options: SessionTrackerOptions = {},
  ) {
    this.clock = options.clock ?? systemClock;
    this.maxInFlight = Math.max(1, options.maxInFlightMerges ?? DEFAULT_MAX_IN_FLIGHT_MERGES);
    this.logger = options.logger ?? console;
  }

  get liveSessionCount(): number {
    return this.live.size;
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  get isShuttingDown(): boolean {
    return this.shutdownResult !== null;
  }

  /** Start the background consumer of end requests. Idempotent. */
  start(): void {
    if (this.consumer) return;
    this.consumer = this.processEndRequests();
  }

  /**
   * Open a session for `identity`. A repeated start for the same activity is
   * ignored; a start for a different activity first ends the current one so
   * its time is kept.
   */
  startSession(identity: string, activity: string): void {
    if (this.isShuttingDown) {
      this.logger.warn(`[Tracker] Shutting down, not starting ${identity} on ${activity}`);
      return;
    }

    const current = this.live.get(identity);
    if (current) {
      if (current.activity === activity) return;
      this.requestEnd(identity);
    }

    this.live.set(identity, { identity, activity, startedAt: this.clock() });
    this.logger.log(`[Tracker] Starting to count for ${identity} on ${activity}`);
  }

  /**
   * Detach the live session for `identity` and queue it for merging. Never
   * blocks on the ledger. During shutdown the session is left in place for
   * the final snapshot.
   */
  requestEnd(identity: string): void {
    if (this.isShuttingDown) return;

    const session = this.live.get(identity);
    if (!session) return;

    this.live.delete(identity);
    this.outstanding++;
    this.queue.push({ ...session, endedAt: this.clock() });
  }

  /**
   * Consume end requests one at a time, spawning a merge unit for each.
   * Resolves once the queue has been closed and emptied.
   */
  async processEndRequests(): Promise<void> {
    for (;;) {
      const closed = await this.queue.next();
      if (!closed) break;

      while (this.inFlight.size >= this.maxInFlight) {
        await Promise.race(this.inFlight);
      }

      const unit = this.finishSession(closed).finally(() => {
        this.inFlight.delete(unit);
        this.outstanding--;
        this.notifyIfIdle();
      });
      this.inFlight.add(unit);
    }
  }

  /**
   * Merge every live session's elapsed time and restart its clock. A session
   * whose merge fails keeps its start time so the time is retried later.
   */
  snapshot(): SnapshotResult {
    const result: SnapshotResult = { merged: 0, failed: 0 };

    for (const session of this.live.values()) {
      const now = this.clock();
      try {
        this.ledger.merge(session.identity, session.activity, now - session.startedAt);
        session.startedAt = now;
        result.merged++;
      } catch (error) {
        result.failed++;
        this.logger.error(
          `[Tracker] Snapshot failed for ${session.identity} on ${session.activity}:`,
          error,
        );
      }
    }

    this.logger.log(`[Tracker] Snapshot done (${result.merged} saved, ${result.failed} failed)`);
    return result;
  }

  /** Ledger totals for `identity`; errors propagate to the caller. */
  getTotal(identity: string): LedgerQueryResult {
    return this.ledger.query(identity);
  }

  getLiveSession(identity: string): Session | undefined {
    const session = this.live.get(identity);
    return session ? { ...session } : undefined;
  }

  /** Resolves once every queued end request has been merged or has failed. */
  whenIdle(): Promise<void> {
    if (this.outstanding === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Stop accepting signals, give pending merges up to `graceMs` to finish,
   * then snapshot the sessions that are still live. Only the first call does
   * the work; later calls share its result.
   */
  shutdown(graceMs: number): Promise<SnapshotResult> {
    if (!this.shutdownResult) {
      this.shutdownResult = this.drainAndSnapshot(graceMs);
    }
    return this.shutdownResult;
  }

  private async drainAndSnapshot(graceMs: number): Promise<SnapshotResult> {
    this.queue.close();
    this.start();

    const consumer = this.consumer ?? Promise.resolve();
    const timer = new AbortController();
    const drained = await Promise.race([
      Promise.all([consumer, this.whenIdle()]).then(() => true),
      sleep(graceMs, false, { signal: timer.signal }),
    ]);
    timer.abort();

    if (!drained) {
      this.logger.warn(
        `[Tracker] ${this.outstanding} end request(s) still pending after ${graceMs}ms grace period`,
      );
    }

    return this.snapshot();
  }

  private async finishSession(closed: ClosedSession): Promise<void> {
    // keep the ledger write off the caller's tick
    await nextTick();

    const elapsed = closed.endedAt - closed.startedAt;
    try {
      this.ledger.merge(closed.identity, closed.activity, elapsed);
      this.logger.log(`[Tracker] Saved ${closed.identity} on ${closed.activity}`);
    } catch (error) {
      this.logger.error(
        `[Tracker] Failed to save playtime for ${closed.identity} on ${closed.activity}:`,
        error,
      );
    }
  }

  private notifyIfIdle(): void {
    if (this.outstanding !== 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
