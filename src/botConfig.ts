/**
 * Stored configuration: process-wide settings and everything scoped to a guild.
 * Guild values live under `guild:<guildId>:<name>` as JSON.
 */

import {
  JsonStore,
  isRecord,
  parseBoolean,
  parseNumber,
  parseRecord,
  parseString,
  parseStringArray,
  type Parser,
  type Transaction,
} from "./dataStore.js";
import { pushRecent, type HistoryLimits } from "./history.js";
import {
  DEFAULT_GUILD_SETTINGS,
  YOUTUBE_API_KEY_KEY,
  guildKey,
  type ChannelCatalog,
  type ChannelEntry,
  type GuildKey,
  type GuildSettings,
  type PurgeChannelConfig,
  type RecencyHistory,
  type VideoMap,
  type VideoEntry,
} from "./types.js";

function parseChannelEntry(raw: unknown, key: string): ChannelEntry | null {
  if (!isRecord(raw)) return null;
  const weight = parseNumber(raw.weight, 1);
  return {
    id: parseString(raw.id) ?? key,
    name: parseString(raw.name) ?? key,
    weight: weight >= 0 ? weight : 0,
    videoIds: parseStringArray(raw.videoIds),
    isSingle: parseBoolean(raw.isSingle, false),
    lastUpdated: parseString(raw.lastUpdated) ?? new Date(0).toISOString(),
  };
}

function parseVideoEntry(raw: unknown, key: string): VideoEntry | null {
  if (!isRecord(raw)) return null;
  const entry: VideoEntry = {
    id: parseString(raw.id) ?? key,
    channelId: parseString(raw.channelId) ?? "",
    addedBy: parseString(raw.addedBy) ?? "",
  };
  const title = parseString(raw.title);
  if (title) entry.title = title;
  if (raw.isSingle === true) entry.isSingle = true;
  return entry;
}

/** Accepts the current object form and the older plain-minutes form. */
export function parsePurgeChannelConfig(raw: unknown): PurgeChannelConfig | null {
  if (typeof raw === "number") {
    return raw >= 1 ? { intervalMinutes: Math.floor(raw), countdown: false } : null;
  }
  if (!isRecord(raw)) return null;
  const intervalMinutes = parseNumber(raw.intervalMinutes, 0);
  if (intervalMinutes < 1) return null;
  return { intervalMinutes: Math.floor(intervalMinutes), countdown: parseBoolean(raw.countdown, false) };
}

export const parseChannelCatalog: Parser<ChannelCatalog> = (raw) => parseRecord(raw, parseChannelEntry);
export const parseVideoMap: Parser<VideoMap> = (raw) => parseRecord(raw, parseVideoEntry);
const parsePurgeChannels: Parser<Record<string, PurgeChannelConfig>> = (raw) =>
  parseRecord(raw, parsePurgeChannelConfig);
const parseCountdownMessages: Parser<Record<string, string>> = (raw) =>
  parseRecord(raw, (value) => parseString(value) ?? null);
const parseOptionalString: Parser<string | undefined> = parseString;

function positiveInt(raw: unknown, fallback: number): number {
  const value = parseNumber(raw, fallback);
  return value >= 1 ? Math.floor(value) : fallback;
}

export class BotConfig {
  constructor(readonly json: JsonStore) {}

  private read<T>(guildId: string, key: GuildKey, parse: Parser<T>): Promise<T> {
    return this.json.read(guildKey(guildId, key), parse);
  }

  private write(guildId: string, key: GuildKey, value: unknown): Promise<void> {
    return this.json.write(guildKey(guildId, key), value);
  }

  // Process-wide

  async getYouTubeApiKeyOverride(): Promise<string | undefined> {
    return this.json.read(YOUTUBE_API_KEY_KEY, parseOptionalString);
  }

  async setYouTubeApiKeyOverride(apiKey: string | null): Promise<void> {
    if (apiKey) await this.json.write(YOUTUBE_API_KEY_KEY, apiKey);
    else await this.json.delete(YOUTUBE_API_KEY_KEY);
  }

  // Posting settings

  async getSettings(guildId: string): Promise<GuildSettings> {
    const d = DEFAULT_GUILD_SETTINGS;
    const [postChannel, interval, enabled, shorts, channelHistory, videoHistory, lastPost] =
      await Promise.all([
        this.read(guildId, "post_channel", parseOptionalString),
        this.read(guildId, "post_interval", (raw) => positiveInt(raw, d.postIntervalMinutes)),
        this.read(guildId, "enabled", (raw) => parseBoolean(raw, d.enabled)),
        this.read(guildId, "shorts_enabled", (raw) => parseBoolean(raw, d.shortsEnabled)),
        this.read(guildId, "channel_history", (raw) => positiveInt(raw, d.channelHistorySize)),
        this.read(guildId, "video_history", (raw) => positiveInt(raw, d.videoHistorySize)),
        this.read(guildId, "last_post_time", (raw) => parseNumber(raw, d.lastPostTime)),
      ]);
    return {
      postChannelId: postChannel ?? null,
      postIntervalMinutes: interval,
      enabled,
      shortsEnabled: shorts,
      channelHistorySize: channelHistory,
      videoHistorySize: videoHistory,
      lastPostTime: lastPost,
    };
  }

  setPostChannel(guildId: string, channelId: string): Promise<void> {
    return this.write(guildId, "post_channel", channelId);
  }

  setPostInterval(guildId: string, minutes: number): Promise<void> {
    return this.write(guildId, "post_interval", minutes);
  }

  async setHistorySizes(guildId: string, channels: number, videos: number): Promise<void> {
    await Promise.all([
      this.write(guildId, "channel_history", channels),
      this.write(guildId, "video_history", videos),
    ]);
  }

  setEnabled(guildId: string, enabled: boolean): Promise<void> {
    return this.write(guildId, "enabled", enabled);
  }

  setShortsEnabled(guildId: string, enabled: boolean): Promise<void> {
    return this.write(guildId, "shorts_enabled", enabled);
  }

  setLastPostTime(guildId: string, timestamp: number): Promise<void> {
    return this.write(guildId, "last_post_time", timestamp);
  }

  // Catalog

  getChannels(guildId: string): Promise<ChannelCatalog> {
    return this.read(guildId, "channels", parseChannelCatalog);
  }

  transactChannels<R>(
    guildId: string,
    fn: (current: ChannelCatalog) => Transaction<ChannelCatalog, R>
  ): Promise<R> {
    return this.json.transact(guildKey(guildId, "channels"), parseChannelCatalog, fn);
  }

  getVideos(guildId: string): Promise<VideoMap> {
    return this.read(guildId, "videos", parseVideoMap);
  }

  transactVideos<R>(
    guildId: string,
    fn: (current: VideoMap) => Transaction<VideoMap, R>
  ): Promise<R> {
    return this.json.transact(guildKey(guildId, "videos"), parseVideoMap, fn);
  }

  // Recency history

  async getHistory(guildId: string): Promise<RecencyHistory> {
    const [channels, videos] = await Promise.all([
      this.read(guildId, "last_channels", parseStringArray),
      this.read(guildId, "last_videos", parseStringArray),
    ]);
    return { channels, videos };
  }

  /** Each buffer is updated under its own key lock, so selections recorded together all land. */
  async recordHistory(
    guildId: string,
    channelId: string,
    videoId: string,
    limits: HistoryLimits
  ): Promise<RecencyHistory> {
    const [channels, videos] = await Promise.all([
      this.json.update(guildKey(guildId, "last_channels"), parseStringArray, (buffer) =>
        pushRecent(buffer, channelId, limits.channels)
      ),
      this.json.update(guildKey(guildId, "last_videos"), parseStringArray, (buffer) =>
        pushRecent(buffer, videoId, limits.videos)
      ),
    ]);
    return { channels, videos };
  }

  async clearHistory(guildId: string): Promise<void> {
    const clear = (): string[] => [];
    await Promise.all([
      this.json.update(guildKey(guildId, "last_channels"), parseStringArray, clear),
      this.json.update(guildKey(guildId, "last_videos"), parseStringArray, clear),
    ]);
  }

  // Purge schedule

  getPurgeChannels(guildId: string): Promise<Record<string, PurgeChannelConfig>> {
    return this.read(guildId, "purge_channels", parsePurgeChannels);
  }

  async setPurgeChannel(guildId: string, channelId: string, config: PurgeChannelConfig): Promise<void> {
    await this.json.update(guildKey(guildId, "purge_channels"), parsePurgeChannels, (current) => ({
      ...current,
      [channelId]: config,
    }));
  }

  /** Returns false when the channel had no purge schedule. */
  removePurgeChannel(guildId: string, channelId: string): Promise<boolean> {
    return this.json.transact(guildKey(guildId, "purge_channels"), parsePurgeChannels, (current) => {
      if (!(channelId in current)) return { result: false };
      const next = { ...current };
      delete next[channelId];
      return { value: next, result: true };
    });
  }

  async getCountdownMessageId(guildId: string, channelId: string): Promise<string | undefined> {
    const messages = await this.read(guildId, "countdown_messages", parseCountdownMessages);
    return messages[channelId];
  }

  async setCountdownMessageId(guildId: string, channelId: string, messageId: string | null): Promise<void> {
    await this.json.update(guildKey(guildId, "countdown_messages"), parseCountdownMessages, (current) => {
      const next = { ...current };
      if (messageId) next[channelId] = messageId;
      else delete next[channelId];
      return next;
    });
  }

  // Guild preferences

  getLanguage(guildId: string): Promise<string | undefined> {
    return this.read(guildId, "language", parseOptionalString);
  }

  setLanguage(guildId: string, language: string): Promise<void> {
    return this.write(guildId, "language", language);
  }

  getCommandPrefix(guildId: string): Promise<string | undefined> {
    return this.read(guildId, "command_prefix", parseOptionalString);
  }

  setCommandPrefix(guildId: string, prefix: string): Promise<void> {
    return this.write(guildId, "command_prefix", prefix);
  }

  getAdminRoleId(guildId: string): Promise<string | undefined> {
    return this.read(guildId, "admin_role", parseOptionalString);
  }

  async setAdminRoleId(guildId: string, roleId: string | null): Promise<void> {
    if (roleId) await this.write(guildId, "admin_role", roleId);
    else await this.json.delete(guildKey(guildId, "admin_role"));
  }
}
