import { Interaction } from 'discord.js';
import type { PlaytimeContext } from '../../playtime.js';
import { handlePlayed } from '../commands/played.js';
import { handleStats } from '../commands/stats.js';
import { handleCommands } from '../commands/commands.js';

export async function handleInteraction(interaction: Interaction, ctx: PlaytimeContext): Promise<void> {
  if (!interaction.isChatInputCommand()) return;

  const command = interaction;
  ctx.commandsAnswered++;

  try {
    switch (command.commandName) {
      case 'played':
        await handlePlayed(command, ctx);
        break;
      case 'stats':
        await handleStats(command, ctx);
        break;
      case 'commands':
        await handleCommands(command);
        break;
      default:
        await command.reply({ content: `Unknown command: ${command.commandName}`, ephemeral: true });
    }
  } catch (error) {
    console.error(`[Discord] Command error (/${command.commandName}):`, error);
    const errorMsg = `Error: ${error instanceof Error ? error.message : String(error)}`;

    try {
      if (command.deferred || command.replied) {
        await command.followUp({ content: errorMsg, ephemeral: true });
      } else {
        await command.reply({ content: errorMsg, ephemeral: true });
      }
    } catch (replyError) {
      // Interaction expired or already handled
      console.error('[Discord] Could not report command error:', replyError);
    }
  }
}
