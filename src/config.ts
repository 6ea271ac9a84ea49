import { config as loadEnv } from 'dotenv';
import { z } from 'zod';
import * as os from 'os';
import * as path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const defaultEnvPath = path.resolve(__dirname, '..', '.env');
const defaultDbPath = path.join(os.homedir(), '.playtime', 'playtime.db');

const integer = (fallback: string, min: number) =>
  z
    .string()
    .default(fallback)
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().min(min));

export const envSchema = z.object({
  DISCORD_BOT_TOKEN: z.string().min(1, 'Discord bot token is required'),
  DISCORD_APPLICATION_ID: z.string().min(1, 'Discord application ID is required'),
  DISCORD_GUILD_ID: z.string().optional(),
  PLAYTIME_DB_PATH: z.string().min(1).default(defaultDbPath),
  PLAYTIME_SNAPSHOT_INTERVAL_MS: integer('300000', 0),
  PLAYTIME_MAX_INFLIGHT_MERGES: integer('8', 1),
  PLAYTIME_SHUTDOWN_GRACE_MS: integer('5000', 0),
});

export type Config = z.infer<typeof envSchema>;

export type ConfigResult =
  | { success: true; data: Config }
  | { success: false; message: string };

export function parseConfig(env: NodeJS.ProcessEnv): ConfigResult {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    return { success: false, message: parsed.error.message };
  }
  return { success: true, data: parsed.data };
}

/** Load `.env`, validate it, and exit the process if it is invalid. */
export function loadConfig(): Config {
  loadEnv({ path: process.env.PLAYTIME_ENV_PATH || defaultEnvPath });

  const parsed = parseConfig(process.env);
  if (!parsed.success) {
    console.error('Invalid configuration:');
    console.error(parsed.message);
    process.exit(1);
  }
  return parsed.data;
}
