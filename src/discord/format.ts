const NS_PER_SECOND = 1_000_000_000n;

/** `HH:MM:SS`, hours padded to two digits but never truncated. */
export function formatDuration(nanoseconds: bigint): string {
  const totalSeconds = nanoseconds > 0n ? nanoseconds / NS_PER_SECOND : 0n;
  const hours = totalSeconds / 3600n;
  const minutes = (totalSeconds / 60n) % 60n;
  const seconds = totalSeconds % 60n;
  return [hours, minutes, seconds].map((part) => part.toString().padStart(2, '0')).join(':');
}

export function msToNs(ms: number): bigint {
  return BigInt(Math.max(0, Math.round(ms))) * 1_000_000n;
}
