import {
  REST,
  Routes,
  SlashCommandBuilder,
} from 'discord.js';
import type { Config } from '../../config.js';

export const commands = [
  new SlashCommandBuilder()
    .setName('played')
    .setDescription('Show time played per game')
    .addUserOption(option =>
      option.setName('user')
        .setDescription('Whose playtime to show (defaults to you)')
        .setRequired(false)
    ),

  new SlashCommandBuilder()
    .setName('stats')
    .setDescription('Show bot statistics'),

  new SlashCommandBuilder()
    .setName('commands')
    .setDescription('List all available commands'),
];

export async function registerCommands(config: Config): Promise<void> {
  const rest = new REST({ version: '10' }).setToken(config.DISCORD_BOT_TOKEN);

  const commandData = commands.map(cmd => cmd.toJSON());

  try {
    if (config.DISCORD_GUILD_ID) {
      // Guild-scoped: instant update
      await rest.put(
        Routes.applicationGuildCommands(config.DISCORD_APPLICATION_ID, config.DISCORD_GUILD_ID),
        { body: commandData },
      );
      console.log(`[Discord] Registered ${commandData.length} guild commands`);
    } else {
      // Global: may take up to an hour to propagate
      await rest.put(
        Routes.applicationCommands(config.DISCORD_APPLICATION_ID),
        { body: commandData },
      );
      console.log(`[Discord] Registered ${commandData.length} global commands`);
    }
  } catch (error) {
    console.error('[Discord] Failed to register commands:', error);
    throw error;
  }
}
