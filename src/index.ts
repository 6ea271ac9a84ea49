import { loadConfig } from './config.js';
import { createDiscordBot } from './discord/discord-bot.js';
import { registerCommands } from './discord/commands/register.js';
import { closePlaytime, openPlaytime } from './playtime.js';

async function main() {
  const config = loadConfig();
  console.log('Starting playtime bot...');

  // Fatal if the store cannot be opened
  const ctx = openPlaytime(config.PLAYTIME_DB_PATH, {
    snapshotIntervalMs: config.PLAYTIME_SNAPSHOT_INTERVAL_MS,
    maxInFlightMerges: config.PLAYTIME_MAX_INFLIGHT_MERGES,
    shutdownGraceMs: config.PLAYTIME_SHUTDOWN_GRACE_MS,
  });

  await registerCommands(config);

  const client = createDiscordBot(ctx);

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`\nCaught ${signal}, shutting down...`);

    let exitCode = 0;
    try {
      // Save time for everyone still playing before the store goes away
      await closePlaytime(ctx);
    } catch (error) {
      console.error('[Playtime] Failed to close cleanly:', error);
      exitCode = 1;
    }

    await client.destroy();
    process.exit(exitCode);
  };

  process.on('SIGINT', (signal) => { void shutdown(signal); });
  process.on('SIGTERM', (signal) => { void shutdown(signal); });

  await client.login(config.DISCORD_BOT_TOKEN);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
