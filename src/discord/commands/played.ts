import { ChatInputCommandInteraction } from 'discord.js';
import type { LedgerTotals } from '../../ledger/ledger.js';
import type { PlaytimeContext } from '../../playtime.js';
import type { SessionTracker } from '../../tracker/session-tracker.js';
import { systemClock, type Clock } from '../../tracker/types.js';
import { formatDuration } from '../format.js';

type PlaytimeReader = Pick<SessionTracker, 'getTotal' | 'getLiveSession'>;

/**
 * Ledger totals for `identity` plus the time of the session still open, which
 * the ledger does not know about yet.
 */
export function buildPlayedReply(
  tracker: PlaytimeReader,
  identity: string,
  subject: string,
  clock: Clock = systemClock,
): string {
  const result = tracker.getTotal(identity);
  const live = tracker.getLiveSession(identity);

  const totals: LedgerTotals = result.kind === 'history' ? new Map(result.totals) : new Map();
  if (live) {
    const open = clock() - live.startedAt;
    totals.set(live.activity, (totals.get(live.activity) ?? 0n) + open);
  }

  if (totals.size === 0) {
    return result.kind === 'no-history'
      ? `Seems ${subject} never played anything while I was watching.`
      : `Seems ${subject} played nothing worth counting yet.`;
  }

  const lines = [`As far as I'm aware, ${subject} played:`];
  for (const [activity, played] of totals) {
    const suffix = live?.activity === activity ? ' (playing now)' : '';
    lines.push(`\`${activity}\` ${formatDuration(played)}${suffix}`);
  }
  return lines.join('\n');
}

export async function handlePlayed(
  interaction: ChatInputCommandInteraction,
  ctx: PlaytimeContext,
): Promise<void> {
  const target = interaction.options.getUser('user') ?? interaction.user;
  const subject = target.id === interaction.user.id ? 'you' : `**${target.username}**`;

  await interaction.reply({ content: buildPlayedReply(ctx.tracker, target.id, subject) });
}
