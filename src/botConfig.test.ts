import test from "node:test";
import assert from "node:assert/strict";
import { parseChannelCatalog, parsePurgeChannelConfig } from "./botConfig.js";
import { createConfig } from "./testHelpers.js";
import { DEFAULT_GUILD_SETTINGS, guildKey } from "./types.js";

const GUILD = "guild-1";

test("a fresh guild gets the default settings", async () => {
  const { config } = createConfig();
  assert.deepEqual(await config.getSettings(GUILD), DEFAULT_GUILD_SETTINGS);
});

test("settings setters round-trip", async () => {
  const { config } = createConfig();
  await config.setPostChannel(GUILD, "100");
  await config.setPostInterval(GUILD, 45);
  await config.setHistorySizes(GUILD, 3, 7);
  await config.setEnabled(GUILD, false);
  await config.setShortsEnabled(GUILD, true);
  await config.setLastPostTime(GUILD, 1234);

  assert.deepEqual(await config.getSettings(GUILD), {
    postChannelId: "100",
    postIntervalMinutes: 45,
    enabled: false,
    shortsEnabled: true,
    channelHistorySize: 3,
    videoHistorySize: 7,
    lastPostTime: 1234,
  });
  assert.deepEqual(await config.getSettings("guild-2"), DEFAULT_GUILD_SETTINGS);
});

test("stored values of the wrong shape fall back to defaults", async () => {
  const { store, config } = createConfig();
  await store.set([
    { key: guildKey(GUILD, "post_interval"), value: "0" },
    { key: guildKey(GUILD, "enabled"), value: '"yes"' },
    { key: guildKey(GUILD, "video_history"), value: "not json" },
  ]);
  const settings = await config.getSettings(GUILD);
  assert.equal(settings.postIntervalMinutes, 30);
  assert.equal(settings.enabled, true);
  assert.equal(settings.videoHistorySize, 10);
});

test("the plain-minutes purge entry is read as a schedule without countdown", async () => {
  const { store, config } = createConfig();
  await store.set({
    key: guildKey(GUILD, "purge_channels"),
    value: JSON.stringify({ "200": 15, "201": { intervalMinutes: 5, countdown: true }, "202": 0 }),
  });
  assert.deepEqual(await config.getPurgeChannels(GUILD), {
    "200": { intervalMinutes: 15, countdown: false },
    "201": { intervalMinutes: 5, countdown: true },
  });
  assert.equal(parsePurgeChannelConfig("15"), null);
});

test("purge schedules and countdown messages are stored per channel", async () => {
  const { config } = createConfig();
  await config.setPurgeChannel(GUILD, "200", { intervalMinutes: 30, countdown: false });
  await config.setPurgeChannel(GUILD, "201", { intervalMinutes: 60, countdown: true });
  await config.setCountdownMessageId(GUILD, "201", "msg-1");

  assert.equal(await config.removePurgeChannel(GUILD, "200"), true);
  assert.equal(await config.removePurgeChannel(GUILD, "200"), false);
  assert.deepEqual(await config.getPurgeChannels(GUILD), {
    "201": { intervalMinutes: 60, countdown: true },
  });

  assert.equal(await config.getCountdownMessageId(GUILD, "201"), "msg-1");
  await config.setCountdownMessageId(GUILD, "201", null);
  assert.equal(await config.getCountdownMessageId(GUILD, "201"), undefined);
});

test("recordHistory keeps the newest entries within the limits", async () => {
  const { config } = createConfig();
  const limits = { channels: 2, videos: 2 };
  await config.recordHistory(GUILD, "UC1", "v1", limits);
  await config.recordHistory(GUILD, "UC2", "v2", limits);
  const last = await config.recordHistory(GUILD, "UC3", "v3", limits);

  assert.deepEqual(last, { channels: ["UC3", "UC2"], videos: ["v3", "v2"] });
  assert.deepEqual(await config.getHistory(GUILD), last);

  await config.clearHistory(GUILD);
  assert.deepEqual(await config.getHistory(GUILD), { channels: [], videos: [] });
});

test("selections recorded at the same time are all kept", async () => {
  const { config } = createConfig();
  const limits = { channels: 5, videos: 5 };
  await Promise.all([
    config.recordHistory(GUILD, "UC1", "v1", limits),
    config.recordHistory(GUILD, "UC2", "v2", limits),
  ]);
  assert.deepEqual(await config.getHistory(GUILD), {
    channels: ["UC2", "UC1"],
    videos: ["v2", "v1"],
  });
});

test("optional preferences can be set and cleared", async () => {
  const { config } = createConfig();
  await config.setAdminRoleId(GUILD, "300");
  await config.setLanguage(GUILD, "pt");
  await config.setCommandPrefix(GUILD, "?");
  await config.setYouTubeApiKeyOverride("test-key");

  assert.equal(await config.getAdminRoleId(GUILD), "300");
  assert.equal(await config.getLanguage(GUILD), "pt");
  assert.equal(await config.getCommandPrefix(GUILD), "?");
  assert.equal(await config.getYouTubeApiKeyOverride(), "test-key");

  await config.setAdminRoleId(GUILD, null);
  await config.setYouTubeApiKeyOverride(null);
  assert.equal(await config.getAdminRoleId(GUILD), undefined);
  assert.equal(await config.getYouTubeApiKeyOverride(), undefined);
});

test("channel entries are parsed leniently", () => {
  const catalog = parseChannelCatalog({
    UC1: { name: "One", weight: -2, videoIds: ["a", 3] },
    UC2: "garbage",
  });
  assert.deepEqual(catalog, {
    UC1: {
      id: "UC1",
      name: "One",
      weight: 0,
      videoIds: ["a"],
      isSingle: false,
      lastUpdated: "1970-01-01T00:00:00.000Z",
    },
  });
});
