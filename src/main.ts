/**
 * VidChoose bot: weighted random YouTube posting and scheduled channel purges for Discord.
 */

import path from "path";
import { config as loadEnv } from "dotenv";

loadEnv({ path: path.join(process.cwd(), ".env") });

const hasToken = Boolean(process.env.DISCORD_TOKEN?.trim());
if (!hasToken) {
  console.error("[Bot] Missing environment variables. Check the .env file in the project root.");
  console.error("  - DISCORD_TOKEN is not defined or is empty.");
  console.error("  - Run 'npm start' in the project folder (where .env is located). Current path:", process.cwd());
  process.exit(1);
}

import { Client, Events, GatewayIntentBits } from "discord.js";
import { BotConfig } from "./botConfig.js";
import { CommandHandler, DEFAULT_COMMAND_PREFIX, registerCommands } from "./commands.js";
import { JsonStore, SqliteKeyValueStore } from "./dataStore.js";
import { logError } from "./errors.js";
import { DiscordGateway, parseOwnerIds } from "./gateway.js";
import { defaultLanguage, getRuntimeLanguage } from "./locale.js";
import { VideoPoster } from "./poster.js";
import { PurgeManager } from "./purge.js";
import { TaskScheduler } from "./scheduler.js";
import { startBackgroundTasks } from "./startup.js";
import { VideoCatalog } from "./videoCatalog.js";
import { YouTubeClient } from "./youtube.js";

const dataFile = process.env.DATA_FILE?.trim() || path.join("data", "bot.sqlite");
const language = defaultLanguage();

const store = new SqliteKeyValueStore(path.resolve(process.cwd(), dataFile));
const config = new BotConfig(new JsonStore(store));
const youtube = new YouTubeClient({
  store,
  getApiKey: async () =>
    (await config.getYouTubeApiKeyOverride()) ?? (process.env.YOUTUBE_API_KEY?.trim() || undefined),
});
const catalog = new VideoCatalog(config, youtube);
const scheduler = new TaskScheduler();

const client = new Client({
  intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildMessages, GatewayIntentBits.MessageContent],
});
const gateway = new DiscordGateway(client, parseOwnerIds(process.env.BOT_OWNER_IDS));

const poster = new VideoPoster({ config, gateway, scheduler });
const purge = new PurgeManager({
  config,
  gateway,
  scheduler,
  getLocale: (guildId) => getRuntimeLanguage(config, guildId, language),
});

const handler = new CommandHandler({
  config,
  gateway,
  catalog,
  poster,
  purge,
  defaultPrefix: process.env.COMMAND_PREFIX?.trim() || DEFAULT_COMMAND_PREFIX,
  defaultLanguage: language,
  debug: process.env.DEBUG_COMMANDS === "true",
});
registerCommands(client, handler);

client.once(Events.ClientReady, (ready) => {
  console.log(`[Bot] Logged in as ${ready.user.tag} in ${ready.guilds.cache.size} guild(s)`);
  void startBackgroundTasks(poster, purge);
});

let shuttingDown = false;
async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`[Bot] ${signal} received, shutting down`);
  scheduler.cancelAll();
  await client.destroy();
  store.close();
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal)
      .catch((err: unknown) => {
        logError("Bot", "shutting down", err);
      })
      .finally(() => process.exit(0));
  });
}

(async () => {
  await client.login(process.env.DISCORD_TOKEN);
})().catch((err: unknown) => {
  logError("Bot", "logging in", err);
  process.exit(1);
});
