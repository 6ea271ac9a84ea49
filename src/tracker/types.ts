/** Monotonic clock reading in nanoseconds. */
export type Clock = () => bigint;

export const systemClock: Clock = () => process.hrtime.bigint();

/** An open stretch of time during which `identity` is playing `activity`. */
export interface Session {
  identity: string;
  activity: string;
  startedAt: bigint;
}

/** A session detached from the live set, waiting to be merged into the ledger. */
export interface ClosedSession extends Session {
  endedAt: bigint;
}

export interface SnapshotResult {
  merged: number;
  failed: number;
}

export type TrackerLogger = Pick<Console, 'log' | 'warn' | 'error'>;
