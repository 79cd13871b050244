/**
 * Types and constants shared by the video poster and the purge scheduler.
 */

export interface ChannelEntry {
  /** YouTube channel ID, or `single_<videoId>` for a single-video entry */
  id: string;
  /** Channel title (or a shortened video title for single videos) */
  name: string;
  weight: number;
  videoIds: string[];
  isSingle: boolean;
  /** ISO timestamp of the last video list refresh */
  lastUpdated: string;
}

export interface VideoEntry {
  id: string;
  /** Owning YouTube channel. Informational only, may be stale. */
  channelId: string;
  title?: string;
  /** Discord user ID of whoever added it */
  addedBy: string;
  isSingle?: boolean;
}

export type ChannelCatalog = Record<string, ChannelEntry>;
export type VideoMap = Record<string, VideoEntry>;

export interface GuildSettings {
  postChannelId: string | null;
  postIntervalMinutes: number;
  enabled: boolean;
  shortsEnabled: boolean;
  channelHistorySize: number;
  videoHistorySize: number;
  /** Epoch ms of the last automatic post, 0 when never posted */
  lastPostTime: number;
}

export interface RecencyHistory {
  channels: string[];
  videos: string[];
}

export interface PurgeChannelConfig {
  intervalMinutes: number;
  countdown: boolean;
}

export const DEFAULT_GUILD_SETTINGS: GuildSettings = {
  postChannelId: null,
  postIntervalMinutes: 30,
  enabled: true,
  shortsEnabled: false,
  channelHistorySize: 5,
  videoHistorySize: 10,
  lastPostTime: 0,
};

export const GUILD_KEYS = [
  "channels",
  "videos",
  "last_channels",
  "last_videos",
  "post_channel",
  "post_interval",
  "channel_history",
  "video_history",
  "last_post_time",
  "enabled",
  "shorts_enabled",
  "purge_channels",
  "countdown_messages",
  "language",
  "command_prefix",
  "admin_role",
] as const;

export type GuildKey = (typeof GUILD_KEYS)[number];

export function guildKey(guildId: string, key: GuildKey): string {
  return `guild:${guildId}:${key}`;
}

export const SINGLE_VIDEO_PREFIX = "single_";
export const YOUTUBE_API_KEY_KEY = "config:youtubeApiKey";
export const YT_QUOTA_BLOCKED_UNTIL_KEY = "youtube:quotaBlockedUntil";
export const POST_LOOP_TASK_ID = "post-loop";

export function purgeTaskId(channelId: string): string {
  return `purge:${channelId}`;
}

export function singleVideoChannelId(videoId: string): string {
  return `${SINGLE_VIDEO_PREFIX}${videoId}`;
}

export function videoUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}
