import test from "node:test";
import assert from "node:assert/strict";
import {
  CommandHandler,
  chunkLines,
  normalizeVidChooseSubcommand,
  parseCommand,
  parseToggle,
  validateCommandPrefix,
} from "./commands.js";
import { VideoPoster } from "./poster.js";
import { PurgeManager } from "./purge.js";
import { TaskScheduler } from "./scheduler.js";
import {
  FakeGateway,
  FakeYouTube,
  ManualClock,
  createConfig,
  seededRandom,
  sequenceRandom,
} from "./testHelpers.js";
import { VideoCatalog } from "./videoCatalog.js";

const GUILD = "guild-1";
const ALPHA = `UC${"a".repeat(22)}`;
const NOW = Date.parse("2026-08-01T00:00:00.000Z");

function setup() {
  const { config } = createConfig();
  const gateway = new FakeGateway();
  const youtube = new FakeYouTube();
  youtube.addChannel(ALPHA, "Alpha", ["alphavid001", "alphavid002"]);
  const catalog = new VideoCatalog(config, youtube, () => NOW);
  const scheduler = new TaskScheduler();
  const clock = new ManualClock();
  clock.now = NOW;
  const poster = new VideoPoster({
    config,
    gateway,
    scheduler,
    random: sequenceRandom(0),
    now: clock.clock,
    sleep: clock.sleep,
  });
  const purge = new PurgeManager({
    config,
    gateway,
    scheduler,
    getLocale: async () => "en",
    now: clock.clock,
    sleep: clock.sleep,
  });
  const handler = new CommandHandler({
    config,
    gateway,
    catalog,
    poster,
    purge,
    defaultPrefix: "!",
    defaultLanguage: "en",
    random: seededRandom(3),
  });

  /** Run one message and return the replies it produced. */
  const send = async (content: string, userId = "user-1"): Promise<string[]> => {
    const replies: string[] = [];
    await handler.handle({
      guildId: GUILD,
      channelId: "900",
      userId,
      content,
      reply: async (text) => {
        replies.push(text);
      },
    });
    return replies;
  };

  return { config, gateway, scheduler, handler, send };
}

test("parseCommand matches names and aliases after the prefix", () => {
  assert.deepEqual(parseCommand("!vc list", "!"), { cmd: "vidchoose", args: ["list"] });
  assert.deepEqual(parseCommand("!PING", "!"), { cmd: "ping", args: [] });
  assert.deepEqual(parseCommand("?!h extra", "?!"), { cmd: "help", args: ["extra"] });
  assert.deepEqual(parseCommand("!sp   <#1>", "!"), { cmd: "stoppurge", args: ["<#1>"] });
  assert.equal(parseCommand("?ping", "!"), null);
  assert.equal(parseCommand("!", "!"), null);
  assert.equal(parseCommand("!dance", "!"), null);
});

test("validateCommandPrefix enforces length, spaces, reserved and special characters", () => {
  assert.deepEqual(validateCommandPrefix("!"), { ok: true });
  assert.deepEqual(validateCommandPrefix("a!"), { ok: true });
  assert.deepEqual(validateCommandPrefix(""), { ok: false, error: "prefixInvalidLength" });
  assert.deepEqual(validateCommandPrefix("!!!!"), { ok: false, error: "prefixInvalidLength" });
  assert.deepEqual(validateCommandPrefix("! "), { ok: false, error: "prefixInvalidSpaces" });
  assert.deepEqual(validateCommandPrefix("#"), { ok: false, error: "prefixInvalidReserved" });
  assert.deepEqual(validateCommandPrefix("ab"), { ok: false, error: "prefixInvalidSpecial" });
});

test("subcommand aliases and toggles", () => {
  assert.equal(normalizeVidChooseSubcommand("ac"), "addchannel");
  assert.equal(normalizeVidChooseSubcommand("TW"), "testweights");
  assert.equal(normalizeVidChooseSubcommand("?"), "help");
  assert.equal(normalizeVidChooseSubcommand("zzz"), undefined);
  assert.equal(parseToggle("ON"), true);
  assert.equal(parseToggle("no"), false);
  assert.equal(parseToggle("maybe"), undefined);
});

test("chunkLines splits replies at line boundaries", () => {
  const lines = ["a".repeat(10), "b".repeat(10), "c".repeat(10)];
  assert.deepEqual(chunkLines(lines, 25), [`${"a".repeat(10)}\n${"b".repeat(10)}`, "c".repeat(10)]);
  assert.deepEqual(chunkLines([]), []);
});

test("messages without the prefix are ignored", async () => {
  const { handler } = setup();
  const replies: string[] = [];
  const handled = await handler.handle({
    guildId: GUILD,
    channelId: "900",
    userId: "user-1",
    content: "just chatting",
    reply: async (text) => {
      replies.push(text);
    },
  });
  assert.equal(handled, false);
  assert.deepEqual(replies, []);
});

test("ping and vidchoose help", async () => {
  const { send } = setup();
  assert.deepEqual(await send("!ping"), ["🏓 Pong!"]);
  assert.equal((await send("!vc"))[0]?.split("\n")[0], "**VidChoose commands**");
  assert.deepEqual(await send("!vc bogus"), ["Unknown subcommand. Use `!vidchoose help`."]);
});

test("adding a channel, listing and reweighting it", async () => {
  const { send } = setup();
  assert.deepEqual(await send(`!vc addchannel ${ALPHA} 2`), [
    `✅ Added channel **Alpha** with 2 videos (weight 2, ID \`${ALPHA}\`).`,
  ]);
  assert.deepEqual(await send(`!vc addchannel ${ALPHA} -1`), ["❌ Weight must be a number of 0 or more."]);
  assert.deepEqual(await send("!vc addchannel @nobody"), ["❌ Channel not found."]);
  assert.deepEqual(await send("!vc list"), ["**Video channels:**\n• Channel: **Alpha** – weight 2 | videos 2"]);
  assert.deepEqual(await send("!vc weight alpha 5"), ["✅ Set weight for **Alpha** to **5**."]);
  assert.deepEqual(await send("!vc weight 5"), ["Usage: `!vc weight <id|name> <weight>`"]);
  assert.deepEqual(await send("!vc remove Alpha"), ["✅ Removed **Alpha**."]);
  assert.deepEqual(await send("!vc list"), ["No channels added yet."]);
});

test("status reports the guild's settings", async () => {
  const { gateway, send } = setup();
  gateway.addTextChannel("800", "videos");
  assert.deepEqual(await send("!vc setchannel #videos"), ["✅ Videos will be posted in <#800>."]);
  assert.deepEqual(await send("!vc setchannel <#801>"), ["❌ Text channel not found."]);
  assert.deepEqual(await send("!vc setinterval 0"), ["❌ Interval must be at least 1 minute."]);
  assert.deepEqual(await send("!vc shorts on"), [
    "✅ YouTube Shorts are now **enabled** and will be included in video selection.",
  ]);

  assert.deepEqual(await send("!vc status"), [
    [
      "**VidChoose status**",
      "Posting channel: <#800>",
      "Post interval: 30 min",
      "Auto posting: enabled",
      "History: 5 channels, 10 videos",
      "YouTube Shorts: enabled",
      "Total channels: 0 | total videos: 0",
    ].join("\n"),
  ]);
});

test("force posts right away and explains a missing post channel", async () => {
  const { gateway, send } = setup();
  await send(`!vc addchannel ${ALPHA}`);
  assert.deepEqual(await send("!vc force"), ["❌ No posting channel set. Use `!vc setchannel`."]);

  gateway.addTextChannel("800", "videos");
  await send("!vc setchannel <#800>");
  assert.deepEqual(await send("!vc force"), ["✅ Video posted!"]);
  assert.equal(gateway.sent[0]?.content, "https://www.youtube.com/watch?v=alphavid001");

  gateway.sendError = new Error("socket hang up");
  assert.deepEqual(await send("!vc force"), ["❌ Something went wrong while running that command."]);
});

test("testweights checks the trial count and reports shares", async () => {
  const { send } = setup();
  assert.deepEqual(await send("!vc testweights"), ["No channels configured."]);
  assert.deepEqual(await send("!vc testweights 5"), ["❌ Trials must be between 10 and 1000."]);
  await send(`!vc addchannel ${ALPHA} 2`);
  assert.deepEqual(await send("!vc testweights"), [
    "**Weight test results** (100 trials)\n• **Alpha**: 100.0% (weight 2)",
  ]);
});

test("an admin role restricts configuration but not read-only subcommands", async () => {
  const { config, gateway, send } = setup();
  await config.setAdminRoleId(GUILD, "300");

  assert.deepEqual(await send("!vc setinterval 10"), ["❌ You need the admin role to use this command."]);
  assert.equal((await send("!vc list")).length, 1);

  gateway.memberRoles.set("user-1", new Set(["300"]));
  assert.deepEqual(await send("!vc setinterval 10"), ["✅ Post interval set to 10 minutes."]);
  assert.equal((await config.getSettings(GUILD)).postIntervalMinutes, 10);
});

test("setapi is limited to bot owners", async () => {
  const { config, gateway, send } = setup();
  assert.deepEqual(await send("!vc setapi test-key"), ["❌ Only the bot owner can use this command."]);

  gateway.owners.add("owner-1");
  assert.deepEqual(await send("!vc setapi test-key", "owner-1"), ["✅ YouTube API key set."]);
  assert.equal(await config.getYouTubeApiKeyOverride(), "test-key");
  await send("!vc setapi clear", "owner-1");
  assert.equal(await config.getYouTubeApiKeyOverride(), undefined);
});

test("purgeconfig and stoppurge manage channel schedules", async () => {
  const { gateway, scheduler, send } = setup();
  gateway.owners.add("owner-1");
  gateway.addTextChannel("700", "vent");
  gateway.addTextChannel("701", "locked", false);

  assert.deepEqual(await send("!pc <#700> 30"), ["❌ Only the bot owner can use this command."]);
  assert.deepEqual(await send("!pc", "owner-1"), ["No channels have auto-purge configured."]);
  assert.deepEqual(await send("!pc <#700> 0", "owner-1"), ["❌ Interval must be at least 1 minute."]);
  assert.deepEqual(await send("!pc <#701> 30", "owner-1"), [
    "❌ I need Manage Messages and Read Message History in <#701>.",
  ]);
  assert.deepEqual(await send("!pc <#700> 30 countdown", "owner-1"), [
    "✅ Auto-purge set for <#700> every 30 minutes, with a countdown.",
  ]);
  assert.deepEqual(await send("!pc", "owner-1"), [
    "**Auto-purge channels:**\n• <#700>: every 30 min, with countdown",
  ]);

  assert.deepEqual(await send("!sp <#700>", "owner-1"), ["✅ Auto-purge stopped for <#700>."]);
  assert.equal(scheduler.size, 0);
  assert.deepEqual(await send("!sp 123456789012345678", "owner-1"), [
    "Auto-purge was not configured for <#123456789012345678>.",
  ]);
});

test("set prefix changes how the guild's commands are recognized", async () => {
  const { send } = setup();
  assert.deepEqual(await send("!set prefix abc"), ["❌ Invalid prefix. At least one character must be special."]);
  assert.deepEqual(await send("!set prefix ?"), ["✅ Command prefix set to `?`"]);
  assert.deepEqual(await send("!ping"), []);
  assert.deepEqual(await send("?ping"), ["🏓 Pong!"]);
  assert.deepEqual(await send("?set prefix"), ["Current prefix: `?`"]);
});

test("set language answers in the new language", async () => {
  const { send } = setup();
  assert.deepEqual(await send("!set language xx"), ["❌ Invalid language. Use: `pt` or `en`"]);
  assert.deepEqual(await send("!set language pt"), ["✅ Idioma do bot definido para: **pt**"]);
  assert.deepEqual(await send("!vc list"), ["Nenhum canal adicionado ainda."]);
});

test("set adminrole shows, sets and clears the role", async () => {
  const { gateway, send } = setup();
  gateway.roles.set("300", { id: "300", name: "Mods" });

  assert.deepEqual(await send("!set adminrole"), ["No admin role configured. Everyone can configure the bot."]);
  assert.deepEqual(await send("!set adminrole <@&999>"), ["❌ Role not found."]);
  assert.deepEqual(await send("!set adminrole <@&300>"), ["✅ Admin role set: **Mods**"]);
  assert.deepEqual(await send("!set adminrole clear"), ["❌ You need the admin role to use this command."]);

  gateway.managers.add("user-1");
  assert.deepEqual(await send("!set adminrole"), ["Current admin role: <@&300>"]);
  assert.deepEqual(await send("!set adminrole clear"), [
    "✅ Admin role requirement removed. Everyone can configure the bot.",
  ]);
});
