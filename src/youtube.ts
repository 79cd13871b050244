/**
 * YouTube Data API v3 access. Every call returns an explicit result so callers can tell
 * "nothing there" apart from a missing key, an exhausted quota or a transport failure.
 */

import type { KeyValueStore } from "./dataStore.js";
import { logError } from "./errors.js";
import { YT_QUOTA_BLOCKED_UNTIL_KEY } from "./types.js";

const API_BASE = "https://www.googleapis.com/youtube/v3";
const PAGE_SIZE = 50;
export const MAX_CHANNEL_VIDEOS = 100;
export const SHORT_MAX_SECONDS = 60;

export type YouTubeFailure =
  | "missing_key"
  | "quota_exceeded"
  | "not_found"
  | "http_error"
  | "network_error";

export type YouTubeResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: YouTubeFailure; status?: number };

export interface YouTubeChannelInfo {
  id: string;
  name: string;
  uploadsPlaylistId: string;
}

export interface YouTubeVideoInfo {
  id: string;
  title: string;
  channelId: string;
  channelTitle: string;
  /** null when the API returned no parseable duration */
  durationSeconds: number | null;
}

export interface UploadsOptions {
  maxResults?: number;
  includeShorts?: boolean;
}

export interface YouTubeApi {
  findChannelIdByHandle(handle: string): Promise<YouTubeResult<string>>;
  searchChannelId(query: string): Promise<YouTubeResult<string>>;
  getChannelInfo(channelId: string): Promise<YouTubeResult<YouTubeChannelInfo>>;
  getUploadedVideoIds(playlistId: string, options?: UploadsOptions): Promise<YouTubeResult<string[]>>;
  getVideoInfo(videoId: string): Promise<YouTubeResult<YouTubeVideoInfo>>;
}

export interface YouTubeClientOptions {
  store: KeyValueStore;
  getApiKey: () => Promise<string | undefined>;
  fetch?: typeof fetch;
  now?: () => number;
}

interface ChannelsResponse {
  items?: Array<{
    id?: string;
    snippet?: { title?: string };
    contentDetails?: { relatedPlaylists?: { uploads?: string } };
  }>;
}

interface SearchResponse {
  items?: Array<{
    id?: { channelId?: string };
    snippet?: { channelId?: string };
  }>;
}

interface PlaylistItemsResponse {
  items?: Array<{ contentDetails?: { videoId?: string } }>;
  nextPageToken?: string;
}

interface VideosResponse {
  items?: Array<{
    id?: string;
    snippet?: { title?: string; channelId?: string; channelTitle?: string };
    contentDetails?: { duration?: string };
  }>;
}

/** Seconds in an ISO-8601 duration such as `PT1M30S` or `P1DT2H`; null when it does not parse. */
export function parseIsoDuration(iso: string): number | null {
  const m = iso.trim().match(/^P(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?)?$/);
  if (!m) return null;
  const [, days, hours, minutes, seconds] = m;
  return (
    Number(days ?? 0) * 86400 +
    Number(hours ?? 0) * 3600 +
    Number(minutes ?? 0) * 60 +
    Number(seconds ?? 0)
  );
}

/** Shorts run at most a minute. Zero-length items (upcoming streams, premieres) are not shorts. */
export function isShort(durationSeconds: number): boolean {
  return durationSeconds > 0 && durationSeconds <= SHORT_MAX_SECONDS;
}

export class YouTubeClient implements YouTubeApi {
  private readonly store: KeyValueStore;
  private readonly getApiKey: () => Promise<string | undefined>;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;

  constructor(options: YouTubeClientOptions) {
    this.store = options.store;
    this.getApiKey = options.getApiKey;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? Date.now;
  }

  async findChannelIdByHandle(handle: string): Promise<YouTubeResult<string>> {
    const res = await this.request<ChannelsResponse>("channels", {
      part: "id",
      forHandle: handle.replace(/^@/, ""),
    });
    if (!res.ok) return res;
    const id = res.value.items?.[0]?.id;
    return id ? { ok: true, value: id } : { ok: false, reason: "not_found" };
  }

  async searchChannelId(query: string): Promise<YouTubeResult<string>> {
    const res = await this.request<SearchResponse>("search", {
      part: "snippet",
      type: "channel",
      q: query,
      maxResults: "1",
    });
    if (!res.ok) return res;
    const first = res.value.items?.[0];
    const id = first?.snippet?.channelId ?? first?.id?.channelId;
    return id ? { ok: true, value: id } : { ok: false, reason: "not_found" };
  }

  async getChannelInfo(channelId: string): Promise<YouTubeResult<YouTubeChannelInfo>> {
    const res = await this.request<ChannelsResponse>("channels", {
      part: "snippet,contentDetails",
      id: channelId,
    });
    if (!res.ok) return res;
    const item = res.value.items?.[0];
    const uploadsPlaylistId = item?.contentDetails?.relatedPlaylists?.uploads;
    if (!item?.id || !uploadsPlaylistId) return { ok: false, reason: "not_found" };
    return {
      ok: true,
      value: { id: item.id, name: item.snippet?.title ?? item.id, uploadsPlaylistId },
    };
  }

  /**
   * Video IDs of an uploads playlist, newest first, following page tokens until `maxResults`
   * IDs are collected. A failed first page is returned as a failure; a failure on a later page
   * ends the walk with what was collected so far.
   */
  async getUploadedVideoIds(
    playlistId: string,
    options: UploadsOptions = {}
  ): Promise<YouTubeResult<string[]>> {
    const maxResults = options.maxResults ?? MAX_CHANNEL_VIDEOS;
    const includeShorts = options.includeShorts ?? true;
    const ids: string[] = [];
    let pageToken: string | undefined;
    let pages = 0;

    do {
      const params: Record<string, string> = {
        part: "contentDetails",
        playlistId,
        maxResults: String(PAGE_SIZE),
      };
      if (pageToken) params.pageToken = pageToken;

      const page = await this.request<PlaylistItemsResponse>("playlistItems", params);
      pages++;
      if (!page.ok) {
        if (pages === 1) return page;
        break;
      }

      let pageIds = (page.value.items ?? [])
        .map((item) => item.contentDetails?.videoId)
        .filter((id): id is string => Boolean(id));
      if (!includeShorts) pageIds = await this.dropShorts(pageIds);

      ids.push(...pageIds);
      pageToken = page.value.nextPageToken;
    } while (pageToken && ids.length < maxResults);

    return { ok: true, value: ids.slice(0, maxResults) };
  }

  async getVideoInfo(videoId: string): Promise<YouTubeResult<YouTubeVideoInfo>> {
    const res = await this.request<VideosResponse>("videos", {
      part: "snippet,contentDetails",
      id: videoId,
    });
    if (!res.ok) return res;
    const item = res.value.items?.[0];
    if (!item?.id) return { ok: false, reason: "not_found" };
    const duration = item.contentDetails?.duration;
    return {
      ok: true,
      value: {
        id: item.id,
        title: item.snippet?.title ?? item.id,
        channelId: item.snippet?.channelId ?? "",
        channelTitle: item.snippet?.channelTitle ?? "Unknown",
        durationSeconds: duration ? parseIsoDuration(duration) : null,
      },
    };
  }

  /** Remove shorts from `ids`. Videos whose duration cannot be read are kept. */
  private async dropShorts(ids: string[]): Promise<string[]> {
    if (ids.length === 0) return ids;
    const res = await this.request<VideosResponse>("videos", {
      part: "contentDetails",
      id: ids.join(","),
    });
    if (!res.ok) return ids;

    const durations = new Map<string, number>();
    for (const item of res.value.items ?? []) {
      const seconds = item.contentDetails?.duration
        ? parseIsoDuration(item.contentDetails.duration)
        : null;
      if (item.id && seconds !== null) durations.set(item.id, seconds);
    }
    return ids.filter((id) => {
      const seconds = durations.get(id);
      return seconds === undefined || !isShort(seconds);
    });
  }

  async isQuotaBlocked(): Promise<boolean> {
    const raw = await this.store.get(YT_QUOTA_BLOCKED_UNTIL_KEY);
    if (!raw) return false;
    const until = Number(raw);
    if (!Number.isFinite(until) || this.now() >= until) {
      await this.store.delete(YT_QUOTA_BLOCKED_UNTIL_KEY);
      return false;
    }
    return true;
  }

  private async blockQuotaUntilNextUtcDay(): Promise<void> {
    const next = new Date(this.now());
    next.setUTCDate(next.getUTCDate() + 1);
    next.setUTCHours(0, 0, 0, 0);
    await this.store.set({ key: YT_QUOTA_BLOCKED_UNTIL_KEY, value: String(next.getTime()) });
  }

  private async request<T>(
    endpoint: string,
    params: Record<string, string>
  ): Promise<YouTubeResult<T>> {
    const apiKey = await this.getApiKey();
    if (!apiKey) return { ok: false, reason: "missing_key" };
    if (await this.isQuotaBlocked()) return { ok: false, reason: "quota_exceeded" };

    const query = new URLSearchParams({ ...params, key: apiKey });
    try {
      const res = await this.fetchImpl(`${API_BASE}/${endpoint}?${query.toString()}`);
      if (!res.ok) return await this.handleErrorResponse(endpoint, res);
      return { ok: true, value: (await res.json()) as T };
    } catch (err) {
      logError("YouTube", `calling ${endpoint}`, err);
      return { ok: false, reason: "network_error" };
    }
  }

  private async handleErrorResponse(endpoint: string, res: Response): Promise<YouTubeResult<never>> {
    const body = await res.text();
    if (body.includes("quotaExceeded")) {
      if (!(await this.isQuotaBlocked())) {
        console.error("[YouTube] Quota exceeded. Blocking API calls until next UTC day.");
      }
      await this.blockQuotaUntilNextUtcDay();
      return { ok: false, reason: "quota_exceeded", status: res.status };
    }
    if (res.status === 404) return { ok: false, reason: "not_found", status: 404 };
    console.error(`[YouTube] API error ${res.status} on ${endpoint}:`, body.slice(0, 500));
    return { ok: false, reason: "http_error", status: res.status };
  }
}
