/**
 * In-process stand-ins shared by the tests: chat gateway, YouTube API, clock and random source.
 */

import { DiscordAPIError, RESTJSONErrorCodes } from "discord.js";
import { BotConfig } from "./botConfig.js";
import { JsonStore, MemoryKeyValueStore } from "./dataStore.js";
import type { ChannelRef, ChatGateway } from "./gateway.js";
import type { Sleep } from "./scheduler.js";
import type {
  UploadsOptions,
  YouTubeApi,
  YouTubeChannelInfo,
  YouTubeResult,
  YouTubeVideoInfo,
} from "./youtube.js";

export function createConfig(): { store: MemoryKeyValueStore; config: BotConfig } {
  const store = new MemoryKeyValueStore();
  return { store, config: new BotConfig(new JsonStore(store)) };
}

/** Deterministic [0, 1) generator (mulberry32). */
export function seededRandom(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let x = a;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

/** Returns the given values in order, then repeats the last one. */
export function sequenceRandom(...values: number[]): () => number {
  let i = 0;
  return () => values[Math.min(i++, values.length - 1)] ?? 0;
}

export function abortError(): Error {
  const err = new Error("The operation was aborted");
  err.name = "AbortError";
  return err;
}

export function discordError(code: number, status = 403): DiscordAPIError {
  return new DiscordAPIError({ code, message: "Test error" }, code, status, "POST", "/test", {});
}

export const missingPermissions = () => discordError(RESTJSONErrorCodes.MissingPermissions);

/** Let every pending promise callback run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

interface PendingSleep {
  ms: number;
  resolve: () => void;
}

/**
 * A clock whose sleeps only finish when the test advances it. Aborting the signal rejects the
 * sleep the way the real one does.
 */
export class ManualClock {
  now = 0;
  readonly requested: number[] = [];
  private readonly pending: PendingSleep[] = [];

  readonly sleep: Sleep = (ms, signal) =>
    new Promise<void>((resolve, reject) => {
      if (signal.aborted) {
        reject(abortError());
        return;
      }
      this.requested.push(ms);
      const entry: PendingSleep = {
        ms,
        resolve: () => {
          signal.removeEventListener("abort", onAbort);
          resolve();
        },
      };
      const onAbort = () => {
        const index = this.pending.indexOf(entry);
        if (index >= 0) this.pending.splice(index, 1);
        reject(abortError());
      };
      signal.addEventListener("abort", onAbort, { once: true });
      this.pending.push(entry);
    });

  readonly clock = (): number => this.now;

  get sleeping(): number {
    return this.pending.length;
  }

  /** Finish the oldest pending sleep, moving the clock forward by its length. */
  async advance(): Promise<void> {
    await flush();
    const next = this.pending.shift();
    if (!next) throw new Error("No pending sleep to advance");
    this.now += next.ms;
    next.resolve();
    await flush();
  }
}

export interface SentMessage {
  id: string;
  channelId: string;
  content: string;
}

export class FakeGateway implements ChatGateway {
  guilds: string[] = ["guild-1"];
  readonly sent: SentMessage[] = [];
  readonly edits: Array<{ channelId: string; messageId: string; content: string }> = [];
  readonly deleted: Array<{ channelId: string; messageId: string }> = [];
  readonly pinned: Array<{ channelId: string; messageId: string }> = [];
  readonly purged: string[] = [];

  /** Channels the bot can manage messages in. */
  readonly manageable = new Set<string>();
  /** Channels that no longer exist: sends return null. */
  readonly missing = new Set<string>();
  readonly textChannels = new Map<string, ChannelRef>();
  readonly roles = new Map<string, ChannelRef>();
  readonly memberRoles = new Map<string, Set<string>>();
  readonly managers = new Set<string>();
  readonly owners = new Set<string>();

  sendError: unknown = null;
  purgeError: unknown = null;
  /** Errors thrown by sends to one channel only. */
  readonly channelSendErrors = new Map<string, unknown>();
  /** How many upcoming `guildIds` calls throw. */
  guildListFailures = 0;
  /** While set, sends wait for it before going out. */
  sendGate: Promise<void> | null = null;
  private nextId = 1;

  guildIds(): string[] {
    if (this.guildListFailures > 0) {
      this.guildListFailures--;
      throw new Error("Guild cache unavailable");
    }
    return [...this.guilds];
  }

  addTextChannel(id: string, name: string, manageable = true): void {
    this.textChannels.set(id, { id, name });
    if (manageable) this.manageable.add(id);
  }

  async sendMessage(channelId: string, content: string): Promise<string | null> {
    if (this.sendGate) await this.sendGate;
    if (this.sendError) throw this.sendError;
    if (this.channelSendErrors.has(channelId)) throw this.channelSendErrors.get(channelId);
    if (this.missing.has(channelId)) return null;
    const id = `msg-${this.nextId++}`;
    this.sent.push({ id, channelId, content });
    return id;
  }

  async editMessage(channelId: string, messageId: string, content: string): Promise<void> {
    this.edits.push({ channelId, messageId, content });
  }

  async deleteMessage(channelId: string, messageId: string): Promise<void> {
    this.deleted.push({ channelId, messageId });
  }

  async pinMessage(channelId: string, messageId: string): Promise<void> {
    this.pinned.push({ channelId, messageId });
  }

  async canManageMessages(channelId: string): Promise<boolean> {
    return this.manageable.has(channelId);
  }

  async purgeChannel(channelId: string): Promise<number> {
    if (this.purgeError) throw this.purgeError;
    this.purged.push(channelId);
    return 0;
  }

  async resolveTextChannel(_guildId: string, input: string): Promise<ChannelRef | null> {
    const trimmed = input.trim();
    const id = trimmed.match(/^<#(\d+)>$/)?.[1] ?? trimmed;
    const byId = this.textChannels.get(id);
    if (byId) return byId;
    const name = trimmed.replace(/^#/, "").toLowerCase();
    return [...this.textChannels.values()].find((c) => c.name.toLowerCase() === name) ?? null;
  }

  async resolveRole(_guildId: string, input: string): Promise<ChannelRef | null> {
    const trimmed = input.trim();
    const id = trimmed.match(/^<@&(\d+)>$/)?.[1] ?? trimmed;
    const byId = this.roles.get(id);
    if (byId) return byId;
    const name = trimmed.replace(/^@/, "").toLowerCase();
    return [...this.roles.values()].find((r) => r.name.toLowerCase() === name) ?? null;
  }

  async memberHasRole(_guildId: string, userId: string, roleId: string): Promise<boolean> {
    return this.memberRoles.get(userId)?.has(roleId) ?? false;
  }

  async isGuildManager(_guildId: string, userId: string): Promise<boolean> {
    return this.managers.has(userId);
  }

  async isBotOwner(userId: string): Promise<boolean> {
    return this.owners.has(userId);
  }
}

export interface FakeChannel {
  info: YouTubeChannelInfo;
  handle?: string;
  uploads: string[];
  shorts?: string[];
}

/** YouTube API answering from in-memory channels and videos. */
export class FakeYouTube implements YouTubeApi {
  readonly channels = new Map<string, FakeChannel>();
  readonly videos = new Map<string, YouTubeVideoInfo>();
  failure: YouTubeResult<never> | null = null;
  readonly calls: string[] = [];

  addChannel(id: string, name: string, uploads: string[], extra: Partial<FakeChannel> = {}): void {
    this.channels.set(id, {
      info: { id, name, uploadsPlaylistId: `UU${id.slice(2)}` },
      uploads,
      ...extra,
    });
  }

  async findChannelIdByHandle(handle: string): Promise<YouTubeResult<string>> {
    this.calls.push(`handle:${handle}`);
    if (this.failure) return this.failure;
    const wanted = handle.replace(/^@/, "").toLowerCase();
    const match = [...this.channels.values()].find((c) => c.handle?.toLowerCase() === wanted);
    return match ? { ok: true, value: match.info.id } : { ok: false, reason: "not_found" };
  }

  async searchChannelId(query: string): Promise<YouTubeResult<string>> {
    this.calls.push(`search:${query}`);
    if (this.failure) return this.failure;
    const wanted = query.toLowerCase();
    const match = [...this.channels.values()].find((c) => c.info.name.toLowerCase() === wanted);
    return match ? { ok: true, value: match.info.id } : { ok: false, reason: "not_found" };
  }

  async getChannelInfo(channelId: string): Promise<YouTubeResult<YouTubeChannelInfo>> {
    this.calls.push(`channel:${channelId}`);
    if (this.failure) return this.failure;
    const channel = this.channels.get(channelId);
    return channel ? { ok: true, value: channel.info } : { ok: false, reason: "not_found" };
  }

  async getUploadedVideoIds(
    playlistId: string,
    options: UploadsOptions = {}
  ): Promise<YouTubeResult<string[]>> {
    this.calls.push(`uploads:${playlistId}`);
    if (this.failure) return this.failure;
    const channel = [...this.channels.values()].find((c) => c.info.uploadsPlaylistId === playlistId);
    if (!channel) return { ok: false, reason: "not_found" };
    const shorts = new Set(channel.shorts ?? []);
    const ids = options.includeShorts === false ? channel.uploads.filter((id) => !shorts.has(id)) : channel.uploads;
    return { ok: true, value: ids.slice(0, options.maxResults ?? ids.length) };
  }

  async getVideoInfo(videoId: string): Promise<YouTubeResult<YouTubeVideoInfo>> {
    this.calls.push(`video:${videoId}`);
    if (this.failure) return this.failure;
    const video = this.videos.get(videoId);
    return video ? { ok: true, value: video } : { ok: false, reason: "not_found" };
  }
}
