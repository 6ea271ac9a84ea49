import { ChatInputCommandInteraction } from 'discord.js';
import type { PlaytimeContext } from '../../playtime.js';
import { formatDuration, msToNs } from '../format.js';

export interface BotStats {
  memoryBytes: number;
  users: number;
  guilds: number;
  uptimeMs: number;
  liveSessions: number;
  mergesInFlight: number;
  commandsAnswered: number;
}

export function buildStatsReply(stats: BotStats): string {
  return [
    '**Bot statistics**',
    `\`Memory used\` ${(stats.memoryBytes / 1_000_000).toFixed(2)} Mb`,
    `\`Users in touch\` ${stats.users} in ${stats.guilds} servers`,
    `\`Uptime\` ${formatDuration(msToNs(stats.uptimeMs))}`,
    `\`Live sessions\` ${stats.liveSessions}`,
    `\`Merges in flight\` ${stats.mergesInFlight}`,
    `\`Commands answered\` ${stats.commandsAnswered}`,
  ].join('\n');
}

export async function handleStats(
  interaction: ChatInputCommandInteraction,
  ctx: PlaytimeContext,
): Promise<void> {
  const guilds = interaction.client.guilds.cache;
  const users = guilds.reduce((sum, guild) => sum + guild.memberCount, 0);

  const content = buildStatsReply({
    memoryBytes: process.memoryUsage().heapUsed,
    users,
    guilds: guilds.size,
    uptimeMs: Date.now() - ctx.startedAt,
    liveSessions: ctx.tracker.liveSessionCount,
    mergesInFlight: ctx.tracker.inFlightCount,
    commandsAnswered: ctx.commandsAnswered,
  });

  await interaction.reply({ content, ephemeral: true });
}
