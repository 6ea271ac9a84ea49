import { ActivityType } from 'discord.js';
import type { SessionTracker } from '../../tracker/session-tracker.js';

/** The slice of a discord.js Presence the handler reads. */
export interface PresenceLike {
  userId: string;
  user?: { bot: boolean } | null;
  activities: ReadonlyArray<{ type: ActivityType; name: string }>;
}

type SessionSignals = Pick<SessionTracker, 'startSession' | 'requestEnd'>;

/** Name of the game being played, if any. */
export function playingActivity(presence: PresenceLike): string | null {
  const activity = presence.activities.find((a) => a.type === ActivityType.Playing);
  return activity ? activity.name : null;
}

/**
 * Translate a presence into a tracker signal: playing starts (or switches)
 * a session, anything else ends it.
 */
export function handlePresenceUpdate(tracker: SessionSignals, presence: PresenceLike | null): void {
  if (!presence || presence.user?.bot) return;

  const game = playingActivity(presence);
  if (game) {
    tracker.startSession(presence.userId, game);
  } else {
    tracker.requestEnd(presence.userId);
  }
}
