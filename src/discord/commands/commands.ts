import { ChatInputCommandInteraction } from 'discord.js';

export const COMMAND_LIST = [
  { name: '/played [user]', description: 'Show how long you (or someone else) played each game' },
  { name: '/stats', description: 'Show bot statistics' },
  { name: '/commands', description: 'Show this list' },
];

export async function handleCommands(interaction: ChatInputCommandInteraction): Promise<void> {
  const lines = COMMAND_LIST.map(cmd => `\`${cmd.name}\` — ${cmd.description}`);

  await interaction.reply({
    content: `**Available Commands**\n\n${lines.join('\n')}\n\nPlaytime is counted while your Discord status shows a game.`,
    ephemeral: true,
  });
}
