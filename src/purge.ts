/**
 * Scheduled channel purging. Each configured channel runs its own scheduler task that waits
 * for the interval (optionally showing a pinned countdown) and then deletes every message.
 */

import type { BotConfig } from "./botConfig.js";
import { isPermissionError, isUnknownResourceError, logError } from "./errors.js";
import type { ChatGateway } from "./gateway.js";
import { t, type Locale } from "./i18n/index.js";
import { isAbortError, sleep as defaultSleep, type Sleep, type TaskHandle, type TaskScheduler } from "./scheduler.js";
import { purgeTaskId, type PurgeChannelConfig } from "./types.js";

export const PURGE_RETRY_DELAY_MS = 60 * 1000;
export const COUNTDOWN_UPDATE_MS = 60 * 1000;

export type PurgeCycleResult = "purged" | "permission_lost" | "retry";

export interface PurgeManagerOptions {
  config: BotConfig;
  gateway: ChatGateway;
  scheduler: TaskScheduler;
  getLocale: (guildId: string) => Promise<Locale>;
  now?: () => number;
  sleep?: Sleep;
}

/** `1h 05m`, `12m`, or `<1m` for the last minute. Rounded up to whole minutes. */
export function formatRemaining(ms: number): string {
  if (ms < 60 * 1000) return "<1m";
  const totalMinutes = Math.ceil(ms / (60 * 1000));
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  if (hours === 0) return `${minutes}m`;
  return `${hours}h ${String(minutes).padStart(2, "0")}m`;
}

export class PurgeManager {
  private readonly config: BotConfig;
  private readonly gateway: ChatGateway;
  private readonly scheduler: TaskScheduler;
  private readonly getLocale: (guildId: string) => Promise<Locale>;
  private readonly now: () => number;
  private readonly sleep: Sleep;

  constructor(options: PurgeManagerOptions) {
    this.config = options.config;
    this.gateway = options.gateway;
    this.scheduler = options.scheduler;
    this.getLocale = options.getLocale;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /** Store the schedule and (re)start the channel's task. */
  async configure(guildId: string, channelId: string, config: PurgeChannelConfig): Promise<TaskHandle> {
    await this.config.setPurgeChannel(guildId, channelId, config);
    return this.startTask(guildId, channelId, config);
  }

  /**
   * Cancel the task and forget the schedule. False when neither existed. The task is allowed to
   * unwind first so a countdown it was still posting is removed as well.
   */
  async stop(guildId: string, channelId: string): Promise<boolean> {
    const running = this.scheduler.get(purgeTaskId(channelId));
    const wasRunning = this.scheduler.cancel(purgeTaskId(channelId));
    if (running) await running.done;
    const wasStored = await this.config.removePurgeChannel(guildId, channelId);

    const countdownId = await this.config.getCountdownMessageId(guildId, channelId);
    if (countdownId) {
      await this.cosmetic(channelId, "removing the countdown", () =>
        this.gateway.deleteMessage(channelId, countdownId)
      );
      await this.config.setCountdownMessageId(guildId, channelId, null);
    }
    return wasRunning || wasStored;
  }

  isScheduled(channelId: string): boolean {
    return this.scheduler.has(purgeTaskId(channelId));
  }

  /** Start a task for every stored schedule whose channel the bot can still manage. */
  async restore(): Promise<number> {
    let started = 0;
    for (const guildId of this.gateway.guildIds()) {
      try {
        const channels = await this.config.getPurgeChannels(guildId);
        for (const [channelId, config] of Object.entries(channels)) {
          if (!(await this.gateway.canManageMessages(channelId))) {
            console.log(`[Purge] Not restoring ${channelId}: channel missing or Manage Messages not granted`);
            continue;
          }
          this.startTask(guildId, channelId, config);
          started++;
        }
      } catch (err) {
        logError("Purge", `restoring schedules for guild ${guildId}`, err);
      }
    }
    if (started > 0) console.log(`[Purge] Restored ${started} purge schedule(s)`);
    return started;
  }

  private startTask(guildId: string, channelId: string, config: PurgeChannelConfig): TaskHandle {
    return this.scheduler.start(purgeTaskId(channelId), (signal) =>
      this.run(guildId, channelId, config, signal)
    );
  }

  private async run(
    guildId: string,
    channelId: string,
    config: PurgeChannelConfig,
    signal: AbortSignal
  ): Promise<void> {
    for (;;) {
      const result = await this.runCycle(guildId, channelId, config, signal);
      if (result === "permission_lost") {
        console.log(`[Purge] Stopping purge of ${channelId}: Manage Messages no longer granted`);
        return;
      }
      if (result === "retry") await this.sleep(PURGE_RETRY_DELAY_MS, signal);
    }
  }

  /** One wait-then-purge cycle. Cancellation propagates; everything else becomes a result. */
  async runCycle(
    guildId: string,
    channelId: string,
    config: PurgeChannelConfig,
    signal: AbortSignal
  ): Promise<PurgeCycleResult> {
    const intervalMs = config.intervalMinutes * 60 * 1000;
    try {
      if (config.countdown) await this.countdown(guildId, channelId, intervalMs, signal);
      else await this.sleep(intervalMs, signal);

      if (!(await this.gateway.canManageMessages(channelId))) return "permission_lost";
      await this.gateway.purgeChannel(channelId, signal);
      if (config.countdown) await this.config.setCountdownMessageId(guildId, channelId, null);
      return "purged";
    } catch (err) {
      if (isAbortError(err) && signal.aborted) throw err;
      if (isPermissionError(err)) return "permission_lost";
      logError("Purge", `purging channel ${channelId}`, err);
      return "retry";
    }
  }

  /**
   * Replace any countdown left from an earlier cycle with a fresh pinned one, then edit it once
   * a minute until the interval is over.
   */
  private async countdown(
    guildId: string,
    channelId: string,
    intervalMs: number,
    signal: AbortSignal
  ): Promise<void> {
    const locale = await this.getLocale(guildId);
    const endsAt = this.now() + intervalMs;
    const render = (remaining: number) =>
      t(locale, "purgeCountdown", { time: formatRemaining(remaining) });

    const stale = await this.config.getCountdownMessageId(guildId, channelId);
    if (stale) {
      await this.cosmetic(channelId, "deleting the previous countdown", () =>
        this.gateway.deleteMessage(channelId, stale)
      );
      await this.config.setCountdownMessageId(guildId, channelId, null);
    }

    const messageId = await this.cosmetic(channelId, "sending the countdown", () =>
      this.gateway.sendMessage(channelId, render(intervalMs))
    );
    if (messageId) {
      await this.config.setCountdownMessageId(guildId, channelId, messageId);
      await this.cosmetic(channelId, "pinning the countdown", () =>
        this.gateway.pinMessage(channelId, messageId)
      );
    }

    for (;;) {
      const remaining = endsAt - this.now();
      if (remaining <= 0) return;
      await this.sleep(Math.min(COUNTDOWN_UPDATE_MS, remaining), signal);
      const left = endsAt - this.now();
      if (left <= 0) return;
      if (messageId) {
        await this.cosmetic(channelId, "updating the countdown", () =>
          this.gateway.editMessage(channelId, messageId, render(left))
        );
      }
    }
  }

  /** Countdown upkeep never affects the purge: missing permissions or messages are skipped. */
  private async cosmetic<T>(channelId: string, what: string, op: () => Promise<T>): Promise<T | null> {
    try {
      return await op();
    } catch (err) {
      if (!isPermissionError(err) && !isUnknownResourceError(err)) {
        logError("Purge", `${what} in ${channelId}`, err);
      }
      return null;
    }
  }
}
