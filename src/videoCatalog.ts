import type { BotConfig } from "./botConfig.js";
import { extractVideoId, resolveChannelInput } from "./channelResolver.js";
import {
  SINGLE_VIDEO_PREFIX,
  singleVideoChannelId,
  type ChannelCatalog,
  type ChannelEntry,
  type VideoMap,
  type VideoEntry,
} from "./types.js";
import {
  MAX_CHANNEL_VIDEOS,
  type YouTubeApi,
  type YouTubeFailure,
  type YouTubeVideoInfo,
} from "./youtube.js";

const SINGLE_NAME_MAX = 50;

export type CatalogFailure = YouTubeFailure | "unrecognized" | "no_videos";

export type CatalogResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: CatalogFailure };

export interface AddedVideo {
  entry: ChannelEntry;
  info: YouTubeVideoInfo;
}

export interface WeightChange {
  kind: "channel" | "video";
  name: string;
  weight: number;
}

export interface RemovedEntry {
  kind: "channel" | "video";
  id: string;
  name: string;
  /** Video entries dropped together with the channel */
  videosRemoved: number;
}

export interface RefreshSummary {
  updated: number;
  failed: number;
}

/** A finite weight of zero or more, or null. Zero keeps the entry but never draws it. */
export function parseWeight(raw: string | undefined): number | null {
  if (raw === undefined || raw.trim() === "") return null;
  const value = Number(raw.replace(",", "."));
  return Number.isFinite(value) && value >= 0 ? value : null;
}

export function singleVideoName(title: string): string {
  const short = title.length > SINGLE_NAME_MAX ? `${title.slice(0, SINGLE_NAME_MAX)}...` : title;
  return `Single: ${short}`;
}

function findByName(channels: ChannelCatalog, name: string): ChannelEntry | undefined {
  const wanted = name.toLowerCase();
  return Object.values(channels).find((entry) => entry.name.toLowerCase() === wanted);
}

/**
 * The per-guild catalog of channels and single videos. All writes go through per-key
 * transactions on the config store.
 */
export class VideoCatalog {
  constructor(
    private readonly config: BotConfig,
    private readonly youtube: YouTubeApi,
    private readonly now: () => number = Date.now
  ) {}

  private timestamp(): string {
    return new Date(this.now()).toISOString();
  }

  async list(guildId: string): Promise<ChannelEntry[]> {
    return Object.values(await this.config.getChannels(guildId));
  }

  /**
   * Resolve `input` to a channel, fetch up to 100 uploads (shorts dropped unless the guild
   * includes them) and store it. Adding a channel that is already in the catalog replaces it.
   */
  async addChannel(
    guildId: string,
    input: string,
    weight: number,
    addedBy: string
  ): Promise<CatalogResult<ChannelEntry>> {
    const resolved = await resolveChannelInput(input, this.youtube);
    if (!resolved.ok) return { ok: false, reason: resolved.reason };

    const info = await this.youtube.getChannelInfo(resolved.value);
    if (!info.ok) return info;

    const { shortsEnabled } = await this.config.getSettings(guildId);
    const uploads = await this.youtube.getUploadedVideoIds(info.value.uploadsPlaylistId, {
      maxResults: MAX_CHANNEL_VIDEOS,
      includeShorts: shortsEnabled,
    });
    if (!uploads.ok) return uploads;
    if (uploads.value.length === 0) return { ok: false, reason: "no_videos" };

    const entry: ChannelEntry = {
      id: info.value.id,
      name: info.value.name,
      weight,
      videoIds: uploads.value,
      isSingle: false,
      lastUpdated: this.timestamp(),
    };

    await this.config.transactChannels(guildId, (channels) => ({
      value: { ...channels, [entry.id]: entry },
      result: undefined,
    }));
    await this.config.transactVideos(guildId, (videos) => {
      const next: VideoMap = { ...videos };
      for (const id of entry.videoIds) {
        next[id] ??= { id, channelId: entry.id, addedBy };
      }
      return { value: next, result: undefined };
    });
    return { ok: true, value: entry };
  }

  /** Store one video as its own `single_<id>` entry so it can carry a weight. */
  async addVideo(
    guildId: string,
    input: string,
    weight: number,
    addedBy: string
  ): Promise<CatalogResult<AddedVideo>> {
    const videoId = extractVideoId(input);
    if (!videoId) return { ok: false, reason: "unrecognized" };

    const info = await this.youtube.getVideoInfo(videoId);
    if (!info.ok) return info;

    const video: VideoEntry = {
      id: videoId,
      channelId: info.value.channelId,
      title: info.value.title,
      addedBy,
      isSingle: true,
    };
    const entry: ChannelEntry = {
      id: singleVideoChannelId(videoId),
      name: singleVideoName(info.value.title),
      weight,
      videoIds: [videoId],
      isSingle: true,
      lastUpdated: this.timestamp(),
    };

    await this.config.transactVideos(guildId, (videos) => ({
      value: { ...videos, [videoId]: video },
      result: undefined,
    }));
    await this.config.transactChannels(guildId, (channels) => ({
      value: { ...channels, [entry.id]: entry },
      result: undefined,
    }));
    return { ok: true, value: { entry, info: info.value } };
  }

  /**
   * Set the weight of the entry matching `identifier`: a catalog key first, then a single
   * video's ID, then a case-insensitive name. Null when nothing matches.
   */
  async setWeight(guildId: string, identifier: string, weight: number): Promise<WeightChange | null> {
    const videos = await this.config.getVideos(guildId);
    return this.config.transactChannels<WeightChange | null>(guildId, (channels) => {
      const direct = channels[identifier];
      const single = identifier in videos ? channels[singleVideoChannelId(identifier)] : undefined;
      const target = direct ?? single ?? findByName(channels, identifier);
      if (!target) return { result: null };

      const change: WeightChange = {
        kind: target.isSingle ? "video" : "channel",
        name: target === single ? (videos[identifier]?.title ?? target.name) : target.name,
        weight,
      };
      return {
        value: { ...channels, [target.id]: { ...target, weight } },
        result: change,
      };
    });
  }

  /**
   * Remove a channel or a video. `identifier` is tried as a catalog key, then as a stored
   * video ID, then as a channel name, and finally as anything the channel resolver accepts.
   */
  async remove(guildId: string, identifier: string): Promise<RemovedEntry | null> {
    const trimmed = identifier.trim();
    const channels = await this.config.getChannels(guildId);

    if (channels[trimmed]) return this.removeChannel(guildId, trimmed);

    const videos = await this.config.getVideos(guildId);
    const videoId = extractVideoId(trimmed);
    if (videoId && (videos[videoId] || channels[singleVideoChannelId(videoId)])) {
      return this.removeVideo(guildId, videoId);
    }

    const byName = findByName(channels, trimmed);
    if (byName) return this.removeChannel(guildId, byName.id);

    const resolved = await resolveChannelInput(trimmed, this.youtube);
    if (resolved.ok && channels[resolved.value]) return this.removeChannel(guildId, resolved.value);
    return null;
  }

  private async removeChannel(guildId: string, channelId: string): Promise<RemovedEntry | null> {
    const removed = await this.config.transactChannels<ChannelEntry | null>(guildId, (channels) => {
      const entry = channels[channelId];
      if (!entry) return { result: null };
      const next = { ...channels };
      delete next[channelId];
      return { value: next, result: entry };
    });
    if (!removed) return null;

    const singleIds = new Set(removed.isSingle ? removed.videoIds : []);
    const videosRemoved = await this.config.transactVideos(guildId, (videos) => {
      const next: VideoMap = {};
      let dropped = 0;
      for (const [id, video] of Object.entries(videos)) {
        // Single videos keep their own entry even when their uploader's channel goes.
        const owned = removed.isSingle
          ? singleIds.has(id) && video.isSingle === true
          : video.channelId === channelId && video.isSingle !== true;
        if (owned) dropped++;
        else next[id] = video;
      }
      return { value: next, result: dropped };
    });

    return {
      kind: removed.isSingle ? "video" : "channel",
      id: channelId,
      name: removed.name,
      videosRemoved,
    };
  }

  /**
   * Drop a video everywhere: its stored entry, its single-video entry and its slot in the
   * owning channel's list. A later `update` of that channel brings it back.
   */
  private async removeVideo(guildId: string, videoId: string): Promise<RemovedEntry> {
    const video = await this.config.transactVideos<VideoEntry | undefined>(guildId, (videos) => {
      const existing = videos[videoId];
      if (!existing) return { result: undefined };
      const next = { ...videos };
      delete next[videoId];
      return { value: next, result: existing };
    });

    await this.config.transactChannels(guildId, (channels) => {
      const next: ChannelCatalog = {};
      for (const [id, entry] of Object.entries(channels)) {
        if (id === singleVideoChannelId(videoId)) continue;
        next[id] = entry.videoIds.includes(videoId)
          ? { ...entry, videoIds: entry.videoIds.filter((v) => v !== videoId) }
          : entry;
      }
      return { value: next, result: undefined };
    });

    return { kind: "video", id: videoId, name: video?.title ?? videoId, videosRemoved: 0 };
  }

  /**
   * Re-fetch the uploads of one channel (when `channelId` names a stored channel) or of every
   * channel. Single-video entries are left alone. Null when the catalog is empty.
   */
  async refresh(guildId: string, channelId?: string): Promise<RefreshSummary | null> {
    const channels = await this.config.getChannels(guildId);
    const ids = Object.keys(channels);
    if (ids.length === 0) return null;

    const targets = channelId && channels[channelId] ? [channelId] : ids;
    const { shortsEnabled } = await this.config.getSettings(guildId);
    const summary: RefreshSummary = { updated: 0, failed: 0 };

    for (const id of targets) {
      if (id.startsWith(SINGLE_VIDEO_PREFIX) || channels[id]?.isSingle) continue;

      const info = await this.youtube.getChannelInfo(id);
      if (!info.ok) {
        summary.failed++;
        continue;
      }
      const uploads = await this.youtube.getUploadedVideoIds(info.value.uploadsPlaylistId, {
        maxResults: MAX_CHANNEL_VIDEOS,
        includeShorts: shortsEnabled,
      });
      if (!uploads.ok) {
        summary.failed++;
        continue;
      }

      const stored = await this.config.transactChannels<boolean>(guildId, (current) => {
        const entry = current[id];
        if (!entry) return { result: false };
        return {
          value: {
            ...current,
            [id]: {
              ...entry,
              name: info.value.name,
              videoIds: uploads.value,
              lastUpdated: this.timestamp(),
            },
          },
          result: true,
        };
      });
      if (stored) summary.updated++;
    }
    return summary;
  }
}
