import {
  Client,
  GatewayIntentBits,
  Events,
  ActivityType,
} from 'discord.js';
import type { PlaytimeContext } from '../playtime.js';
import { handleInteraction } from './handlers/interaction.handler.js';
import { handlePresenceUpdate } from './handlers/presence.handler.js';

export function createDiscordBot(ctx: PlaytimeContext): Client {
  const client = new Client({
    intents: [
      GatewayIntentBits.Guilds,
      GatewayIntentBits.GuildMembers,
      GatewayIntentBits.GuildPresences,
    ],
  });

  client.once(Events.ClientReady, (readyClient) => {
    console.log(`Discord bot ready as @${readyClient.user.tag}`);
    readyClient.user.setActivity('playtime', { type: ActivityType.Watching });

    // Start counting for everyone already playing
    let seeded = 0;
    for (const guild of readyClient.guilds.cache.values()) {
      for (const presence of guild.presences.cache.values()) {
        handlePresenceUpdate(ctx.tracker, presence);
        seeded++;
      }
    }
    console.log(`[Discord] Checked ${seeded} presences, ${ctx.tracker.liveSessionCount} playing`);
  });

  client.on(Events.PresenceUpdate, (_oldPresence, newPresence) => {
    try {
      handlePresenceUpdate(ctx.tracker, newPresence);
    } catch (error) {
      console.error('[Discord] Presence error:', error);
    }
  });

  // Slash command handling
  client.on(Events.InteractionCreate, async (interaction) => {
    try {
      await handleInteraction(interaction, ctx);
    } catch (error) {
      console.error('[Discord] Interaction error:', error);
    }
  });

  return client;
}
