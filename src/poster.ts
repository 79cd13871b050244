/**
 * Automatic video posting. One scheduler task ticks every minute and walks every guild in turn;
 * a guild gets a post when it is enabled, has a post channel and its interval has elapsed.
 */

import type { BotConfig } from "./botConfig.js";
import { isAbortError, sleep as defaultSleep, type Sleep, type TaskHandle, type TaskScheduler } from "./scheduler.js";
import { isPermissionError, logError } from "./errors.js";
import type { ChatGateway } from "./gateway.js";
import { selectVideo, type RandomSource } from "./selection.js";
import { POST_LOOP_TASK_ID, videoUrl, type GuildSettings } from "./types.js";

export const POST_TICK_MS = 60 * 1000;

export type SkipReason =
  | "disabled"
  | "no_post_channel"
  | "not_due"
  | "no_candidates"
  | "channel_unavailable";

export type PostOutcome =
  | { status: "posted"; postChannelId: string; channelId: string; videoId: string }
  | { status: "skipped"; reason: SkipReason };

export interface VideoPosterOptions {
  config: BotConfig;
  gateway: ChatGateway;
  scheduler: TaskScheduler;
  random?: RandomSource;
  now?: () => number;
  sleep?: Sleep;
  tickMs?: number;
}

function skipped(reason: SkipReason): PostOutcome {
  return { status: "skipped", reason };
}

export class VideoPoster {
  private readonly config: BotConfig;
  private readonly gateway: ChatGateway;
  private readonly scheduler: TaskScheduler;
  private readonly random: RandomSource;
  private readonly now: () => number;
  private readonly sleep: Sleep;
  private readonly tickMs: number;

  constructor(options: VideoPosterOptions) {
    this.config = options.config;
    this.gateway = options.gateway;
    this.scheduler = options.scheduler;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.tickMs = options.tickMs ?? POST_TICK_MS;
  }

  start(): TaskHandle {
    return this.scheduler.start(POST_LOOP_TASK_ID, (signal) => this.loop(signal));
  }

  stop(): boolean {
    return this.scheduler.cancel(POST_LOOP_TASK_ID);
  }

  private async loop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.runCycle();
      } catch (err) {
        logError("VidChoose", "running the post cycle", err);
      }
      await this.sleep(this.tickMs, signal);
    }
  }

  /** Check every guild once, in order. A failing guild is logged and does not stop the rest. */
  async runCycle(): Promise<Map<string, PostOutcome>> {
    const outcomes = new Map<string, PostOutcome>();
    for (const guildId of this.gateway.guildIds()) {
      try {
        outcomes.set(guildId, await this.maybePost(guildId));
      } catch (err) {
        if (isAbortError(err)) throw err;
        logError("VidChoose", `posting in guild ${guildId}`, err);
      }
    }
    return outcomes;
  }

  async maybePost(guildId: string): Promise<PostOutcome> {
    const settings = await this.config.getSettings(guildId);
    if (!settings.enabled) return skipped("disabled");
    if (!settings.postChannelId) return skipped("no_post_channel");

    const now = this.now();
    if (now - settings.lastPostTime < settings.postIntervalMinutes * 60 * 1000) {
      return skipped("not_due");
    }

    const outcome = await this.post(guildId, settings.postChannelId, settings);
    if (outcome.status === "posted") await this.config.setLastPostTime(guildId, now);
    return outcome;
  }

  /** Post right away, whatever `enabled` and the interval say. The schedule is left as it was. */
  async forcePost(guildId: string): Promise<PostOutcome> {
    const settings = await this.config.getSettings(guildId);
    if (!settings.postChannelId) return skipped("no_post_channel");
    return this.post(guildId, settings.postChannelId, settings);
  }

  private async post(guildId: string, postChannelId: string, settings: GuildSettings): Promise<PostOutcome> {
    const [channels, history] = await Promise.all([
      this.config.getChannels(guildId),
      this.config.getHistory(guildId),
    ]);
    const pick = selectVideo(channels, history.videos, this.random);
    if (!pick) return skipped("no_candidates");

    let messageId: string | null;
    try {
      messageId = await this.gateway.sendMessage(postChannelId, videoUrl(pick.videoId));
    } catch (err) {
      if (!isPermissionError(err)) throw err;
      messageId = null;
    }
    if (!messageId) return skipped("channel_unavailable");

    await this.config.recordHistory(guildId, pick.channel.id, pick.videoId, {
      channels: settings.channelHistorySize,
      videos: settings.videoHistorySize,
    });
    return { status: "posted", postChannelId, channelId: pick.channel.id, videoId: pick.videoId };
  }
}
