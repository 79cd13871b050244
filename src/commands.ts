/**
 * Prefix message commands: `vidchoose`, `purgeconfig`, `stoppurge`, `set`, `help`, `ping`.
 */

import { Events, type Client, type Message } from "discord.js";
import type { BotConfig } from "./botConfig.js";
import { logError } from "./errors.js";
import type { ChatGateway } from "./gateway.js";
import { parseLocale, t, type Locale, type TranslationKey } from "./i18n/index.js";
import { getRuntimeLanguage } from "./locale.js";
import { hasPermission, type PermissionLevel } from "./permissions.js";
import type { PostOutcome, VideoPoster } from "./poster.js";
import type { PurgeManager } from "./purge.js";
import { simulateSelection, type RandomSource } from "./selection.js";
import { parseWeight, type CatalogFailure, type VideoCatalog } from "./videoCatalog.js";

export const DEFAULT_COMMAND_PREFIX = "!";
const MAX_REPLY_LENGTH = 1900;
const DEFAULT_TRIALS = 100;
const MIN_TRIALS = 10;
const MAX_TRIALS = 1000;

export type BotCommand = "vidchoose" | "purgeconfig" | "stoppurge" | "set" | "help" | "ping";

const BOT_COMMANDS: readonly BotCommand[] = ["vidchoose", "purgeconfig", "stoppurge", "set", "help", "ping"];

const COMMAND_ALIASES: Record<BotCommand, string[]> = {
  vidchoose: ["vidchoose", "vc"],
  purgeconfig: ["purgeconfig", "pc"],
  stoppurge: ["stoppurge", "sp"],
  set: ["set", "s"],
  help: ["help", "h"],
  ping: ["ping", "p"],
};

type VidChooseSubcommand =
  | "setapi"
  | "addchannel"
  | "addvideo"
  | "weight"
  | "setchannel"
  | "setinterval"
  | "sethistory"
  | "list"
  | "remove"
  | "force"
  | "enable"
  | "disable"
  | "shorts"
  | "status"
  | "testweights"
  | "clearhistory"
  | "update"
  | "help";

const VIDCHOOSE_PERMISSIONS: Record<VidChooseSubcommand, PermissionLevel> = {
  setapi: "owner",
  addchannel: "admin",
  addvideo: "admin",
  weight: "admin",
  setchannel: "admin",
  setinterval: "admin",
  sethistory: "admin",
  list: "everyone",
  remove: "admin",
  force: "admin",
  enable: "admin",
  disable: "admin",
  shorts: "admin",
  status: "everyone",
  testweights: "everyone",
  clearhistory: "admin",
  update: "admin",
  help: "everyone",
};

export interface CommandServices {
  config: BotConfig;
  gateway: ChatGateway;
  catalog: VideoCatalog;
  poster: VideoPoster;
  purge: PurgeManager;
  defaultPrefix?: string;
  defaultLanguage?: Locale;
  debug?: boolean;
  random?: RandomSource;
}

/** What the handler needs from a chat message. */
export interface IncomingMessage {
  guildId: string;
  channelId: string;
  userId: string;
  content: string;
  reply(content: string): Promise<void>;
}

interface CommandContext {
  guildId: string;
  channelId: string;
  userId: string;
  locale: Locale;
  prefix: string;
  reply(content: string): Promise<void>;
}

export interface ParsedCommand {
  cmd: BotCommand;
  args: string[];
}

export function parseCommand(input: string, prefix: string): ParsedCommand | null {
  if (!input.startsWith(prefix)) return null;
  const raw = input.slice(prefix.length).trim();
  if (!raw) return null;
  const [keyword = "", ...rest] = raw.split(/\s+/);
  const lower = keyword.toLowerCase();

  const cmd = BOT_COMMANDS.find((name) => COMMAND_ALIASES[name].includes(lower));
  return cmd ? { cmd, args: rest } : null;
}

export function validateCommandPrefix(prefix: string): { ok: true } | { ok: false; error: TranslationKey } {
  if (!prefix || prefix.length > 3) return { ok: false, error: "prefixInvalidLength" };
  if (/\s/.test(prefix)) return { ok: false, error: "prefixInvalidSpaces" };
  if (prefix.includes("#") || prefix.includes("@")) return { ok: false, error: "prefixInvalidReserved" };
  if (!/[^a-zA-Z0-9]/.test(prefix)) return { ok: false, error: "prefixInvalidSpecial" };
  return { ok: true };
}

export function isHelpToken(v: string | undefined): boolean {
  if (!v) return false;
  return v === "help" || v === "h" || v === "?";
}

export function normalizeVidChooseSubcommand(sub: string | undefined): VidChooseSubcommand | undefined {
  if (!sub) return undefined;
  const s = sub.toLowerCase();
  if (isHelpToken(s)) return "help";
  if (["setapi", "api"].includes(s)) return "setapi";
  if (["addchannel", "addch", "ac"].includes(s)) return "addchannel";
  if (["addvideo", "addvid", "av"].includes(s)) return "addvideo";
  if (["weight", "w"].includes(s)) return "weight";
  if (["setchannel", "channel", "sc"].includes(s)) return "setchannel";
  if (["setinterval", "interval", "si"].includes(s)) return "setinterval";
  if (["sethistory", "history", "sh"].includes(s)) return "sethistory";
  if (["list", "l", "ls"].includes(s)) return "list";
  if (["remove", "rm", "del", "-"].includes(s)) return "remove";
  if (["force", "f", "post"].includes(s)) return "force";
  if (["enable", "on"].includes(s)) return "enable";
  if (["disable", "off"].includes(s)) return "disable";
  if (["shorts", "short"].includes(s)) return "shorts";
  if (["status", "info", "i"].includes(s)) return "status";
  if (["testweights", "test", "tw"].includes(s)) return "testweights";
  if (["clearhistory", "clear", "clh"].includes(s)) return "clearhistory";
  if (["update", "refresh", "u"].includes(s)) return "update";
  return undefined;
}

function normalizeSetSubcommand(sub: string | undefined): "adminrole" | "language" | "prefix" | undefined {
  if (!sub) return undefined;
  const s = sub.toLowerCase();
  if (["adminrole", "admin", "ar", "admr"].includes(s)) return "adminrole";
  if (["language", "lang", "lg"].includes(s)) return "language";
  if (["prefix", "pfx", "p"].includes(s)) return "prefix";
  return undefined;
}

/** `on`/`off` style switches; undefined when the word is neither. */
export function parseToggle(raw: string | undefined): boolean | undefined {
  const v = raw?.toLowerCase();
  if (v === undefined) return undefined;
  if (["on", "true", "yes", "1", "enable", "enabled"].includes(v)) return true;
  if (["off", "false", "no", "0", "disable", "disabled"].includes(v)) return false;
  return undefined;
}

function parsePositiveInt(raw: string | undefined): number | null {
  if (!raw || !/^\d+$/.test(raw)) return null;
  const n = Number(raw);
  return n >= 1 ? n : null;
}

function channelIdFromMention(raw: string | undefined): string | null {
  const m = raw?.trim().match(/^(?:<#(\d+)>|(\d{15,25}))$/);
  return m?.[1] ?? m?.[2] ?? null;
}

/** Join lines into replies that stay under Discord's message length limit. */
export function chunkLines(lines: string[], maxLength = MAX_REPLY_LENGTH): string[] {
  const chunks: string[] = [];
  let current = "";
  for (const line of lines) {
    const candidate = current ? `${current}\n${line}` : line;
    if (candidate.length > maxLength && current) {
      chunks.push(current);
      current = line;
    } else {
      current = candidate;
    }
  }
  if (current) chunks.push(current);
  return chunks;
}

function catalogFailureKey(reason: CatalogFailure, target: "channel" | "video"): TranslationKey {
  switch (reason) {
    case "unrecognized":
      return target === "channel" ? "vcChannelUnrecognized" : "vcVideoUnrecognized";
    case "not_found":
      return target === "channel" ? "vcChannelNotFound" : "vcVideoNotFound";
    case "no_videos":
      return "vcNoVideos";
    case "missing_key":
    case "quota_exceeded":
    case "http_error":
    case "network_error":
      return "ytUnavailable";
  }
}

function postOutcomeKey(outcome: PostOutcome): TranslationKey {
  if (outcome.status === "posted") return "vcPosted";
  switch (outcome.reason) {
    case "no_post_channel":
      return "vcNoPostChannel";
    case "channel_unavailable":
      return "vcPostChannelUnavailable";
    case "no_candidates":
    case "disabled":
    case "not_due":
      return "vcNoCandidates";
  }
}

export class CommandHandler {
  private readonly prefixCache = new Map<string, string>();
  private readonly defaultPrefix: string;

  constructor(private readonly services: CommandServices) {
    const configured = services.defaultPrefix?.trim();
    this.defaultPrefix =
      configured && validateCommandPrefix(configured).ok ? configured : DEFAULT_COMMAND_PREFIX;
  }

  async getCommandPrefix(guildId: string): Promise<string> {
    const cached = this.prefixCache.get(guildId);
    if (cached) return cached;
    const raw = (await this.services.config.getCommandPrefix(guildId))?.trim();
    const prefix = raw && validateCommandPrefix(raw).ok ? raw : this.defaultPrefix;
    this.prefixCache.set(guildId, prefix);
    return prefix;
  }

  /** Run the command in `message`, if it is one. Returns whether it was handled. */
  async handle(message: IncomingMessage): Promise<boolean> {
    const content = message.content.trim();
    const prefix = await this.getCommandPrefix(message.guildId);
    const parsed = parseCommand(content, prefix);
    if (!parsed) return false;

    if (this.services.debug) {
      console.log(
        `[Command] Guild: ${message.guildId}, Channel: ${message.channelId}, User: ${message.userId}, Raw: "${content}"`
      );
    }

    const locale = await getRuntimeLanguage(
      this.services.config,
      message.guildId,
      this.services.defaultLanguage
    );
    const ctx: CommandContext = {
      guildId: message.guildId,
      channelId: message.channelId,
      userId: message.userId,
      locale,
      prefix,
      reply: (text) => message.reply(text),
    };

    try {
      switch (parsed.cmd) {
        case "ping":
          await ctx.reply(t(locale, "pong"));
          break;
        case "help":
          await ctx.reply(this.globalHelpText(ctx));
          break;
        case "set":
          await this.handleSet(ctx, parsed.args);
          break;
        case "vidchoose":
          await this.handleVidChoose(ctx, parsed.args);
          break;
        case "purgeconfig":
          await this.handlePurgeConfig(ctx, parsed.args);
          break;
        case "stoppurge":
          await this.handleStopPurge(ctx, parsed.args);
          break;
      }
    } catch (err) {
      logError("Command", `running ${parsed.cmd}`, err);
      await ctx.reply(t(locale, "cmdFailed")).catch((replyErr: unknown) => {
        logError("Command", "replying with the failure notice", replyErr);
      });
    }
    return true;
  }

  private text(ctx: CommandContext, key: TranslationKey, params: Record<string, string | number> = {}): string {
    return t(ctx.locale, key, { p: ctx.prefix, ...params });
  }

  private async say(ctx: CommandContext, key: TranslationKey, params?: Record<string, string | number>): Promise<void> {
    await ctx.reply(this.text(ctx, key, params));
  }

  private async sayLines(ctx: CommandContext, lines: string[]): Promise<void> {
    for (const chunk of chunkLines(lines)) await ctx.reply(chunk);
  }

  private allowed(ctx: CommandContext, level: PermissionLevel): Promise<boolean> {
    const { config, gateway } = this.services;
    return hasPermission(level, config, gateway, ctx.guildId, ctx.userId);
  }

  private async requirePermission(ctx: CommandContext, level: PermissionLevel): Promise<boolean> {
    if (await this.allowed(ctx, level)) return true;
    await this.say(ctx, level === "owner" ? "cmdOwnerOnly" : "cmdNoPermission");
    return false;
  }

  private globalHelpText(ctx: CommandContext): string {
    return [
      this.text(ctx, "cmdHelpGlobalTitle"),
      this.text(ctx, "cmdHelpPing"),
      this.text(ctx, "cmdHelpHelp"),
      this.text(ctx, "cmdHelpVidChoose"),
      this.text(ctx, "cmdHelpPurgeConfig"),
      this.text(ctx, "cmdHelpStopPurge"),
      this.text(ctx, "cmdHelpSet"),
    ].join("\n");
  }

  private vidChooseHelpText(ctx: CommandContext): string {
    const keys: TranslationKey[] = [
      "cmdHelpVcTitle",
      "cmdHelpVcAddChannel",
      "cmdHelpVcAddVideo",
      "cmdHelpVcWeight",
      "cmdHelpVcSetChannel",
      "cmdHelpVcSetInterval",
      "cmdHelpVcSetHistory",
      "cmdHelpVcList",
      "cmdHelpVcRemove",
      "cmdHelpVcForce",
      "cmdHelpVcEnable",
      "cmdHelpVcShorts",
      "cmdHelpVcStatus",
      "cmdHelpVcTestWeights",
      "cmdHelpVcClearHistory",
      "cmdHelpVcUpdate",
      "cmdHelpVcSetApi",
    ];
    return keys.map((key) => this.text(ctx, key)).join("\n");
  }

  // vidchoose

  private async handleVidChoose(ctx: CommandContext, args: string[]): Promise<void> {
    const [subRaw, ...rest] = args;
    const sub = normalizeVidChooseSubcommand(subRaw);

    if (!sub || sub === "help") {
      if (subRaw && !sub) await this.say(ctx, "cmdUnknownSubcommand", { command: "vidchoose" });
      else await ctx.reply(this.vidChooseHelpText(ctx));
      return;
    }

    if (!(await this.requirePermission(ctx, VIDCHOOSE_PERMISSIONS[sub]))) return;

    const { config, catalog, poster } = this.services;
    const { guildId } = ctx;

    if (sub === "setapi") {
      const key = rest[0];
      if (!key) {
        await this.say(ctx, "vcApiKeyUsage");
        return;
      }
      if (key.toLowerCase() === "clear") {
        await config.setYouTubeApiKeyOverride(null);
        await this.say(ctx, "vcApiKeyCleared");
        return;
      }
      await config.setYouTubeApiKeyOverride(key);
      await this.say(ctx, "vcApiKeySet");
      return;
    }

    if (sub === "addchannel" || sub === "addvideo") {
      const [input, weightRaw] = rest;
      if (!input) {
        await this.say(ctx, sub === "addchannel" ? "vcAddChannelUsage" : "vcAddVideoUsage");
        return;
      }
      const weight = weightRaw === undefined ? 1 : parseWeight(weightRaw);
      if (weight === null) {
        await this.say(ctx, "vcInvalidWeight");
        return;
      }

      if (sub === "addchannel") {
        const added = await catalog.addChannel(guildId, input, weight, ctx.userId);
        if (!added.ok) {
          await this.say(ctx, catalogFailureKey(added.reason, "channel"));
          return;
        }
        await this.say(ctx, "vcChannelAdded", {
          name: added.value.name,
          count: added.value.videoIds.length,
          weight,
          id: added.value.id,
        });
        return;
      }

      const added = await catalog.addVideo(guildId, input, weight, ctx.userId);
      if (!added.ok) {
        await this.say(ctx, catalogFailureKey(added.reason, "video"));
        return;
      }
      await this.say(ctx, "vcVideoAdded", {
        title: added.value.info.title,
        channel: added.value.info.channelTitle,
        weight,
      });
      return;
    }

    if (sub === "weight") {
      const weightRaw = rest.length >= 2 ? rest[rest.length - 1] : undefined;
      const identifier = rest.slice(0, -1).join(" ");
      if (!weightRaw || !identifier) {
        await this.say(ctx, "vcWeightUsage");
        return;
      }
      const weight = parseWeight(weightRaw);
      if (weight === null) {
        await this.say(ctx, "vcInvalidWeight");
        return;
      }
      const change = await catalog.setWeight(guildId, identifier, weight);
      if (!change) {
        await this.say(ctx, "vcEntryNotFound");
        return;
      }
      await this.say(ctx, "vcWeightSet", { name: change.name, weight: change.weight });
      return;
    }

    if (sub === "setchannel") {
      const input = rest.join(" ");
      if (!input) {
        await this.say(ctx, "vcSetChannelUsage");
        return;
      }
      const channel = await this.services.gateway.resolveTextChannel(guildId, input);
      if (!channel) {
        await this.say(ctx, "vcTextChannelNotFound");
        return;
      }
      await config.setPostChannel(guildId, channel.id);
      await this.say(ctx, "vcPostChannelSet", { channel: channel.id });
      return;
    }

    if (sub === "setinterval") {
      const minutes = parsePositiveInt(rest[0]);
      if (minutes === null) {
        await this.say(ctx, "vcIntervalInvalid");
        return;
      }
      await config.setPostInterval(guildId, minutes);
      await this.say(ctx, "vcIntervalSet", { minutes });
      return;
    }

    if (sub === "sethistory") {
      const channels = parsePositiveInt(rest[0]);
      const videos = parsePositiveInt(rest[1]);
      if (channels === null || videos === null) {
        await this.say(ctx, "vcHistoryInvalid");
        return;
      }
      await config.setHistorySizes(guildId, channels, videos);
      await this.say(ctx, "vcHistorySet", { channels, videos });
      return;
    }

    if (sub === "list") {
      const entries = await catalog.list(guildId);
      if (entries.length === 0) {
        await this.say(ctx, "vcListEmpty");
        return;
      }
      const lines = [this.text(ctx, "vcListHeader")];
      for (const entry of entries) {
        lines.push(
          this.text(ctx, entry.isSingle ? "vcListVideo" : "vcListChannel", {
            name: entry.name,
            weight: entry.weight,
            count: entry.videoIds.length,
          })
        );
      }
      await this.sayLines(ctx, lines);
      return;
    }

    if (sub === "remove") {
      const identifier = rest.join(" ");
      if (!identifier) {
        await this.say(ctx, "vcRemoveUsage");
        return;
      }
      const removed = await catalog.remove(guildId, identifier);
      if (!removed) {
        await this.say(ctx, "vcEntryNotFound");
        return;
      }
      await this.say(ctx, "vcRemoved", { name: removed.name });
      return;
    }

    if (sub === "force") {
      const outcome = await poster.forcePost(guildId);
      await this.say(ctx, postOutcomeKey(outcome));
      return;
    }

    if (sub === "enable" || sub === "disable") {
      await config.setEnabled(guildId, sub === "enable");
      await this.say(ctx, sub === "enable" ? "vcEnabled" : "vcDisabled");
      return;
    }

    if (sub === "shorts") {
      const enabled = parseToggle(rest[0]);
      if (enabled === undefined) {
        const { shortsEnabled } = await config.getSettings(guildId);
        await this.say(ctx, "vcShortsStatus", {
          state: this.text(ctx, shortsEnabled ? "stateEnabled" : "stateDisabled"),
        });
        return;
      }
      await config.setShortsEnabled(guildId, enabled);
      await this.say(ctx, enabled ? "vcShortsOn" : "vcShortsOff");
      return;
    }

    if (sub === "status") {
      await this.sayLines(ctx, await this.statusLines(ctx));
      return;
    }

    if (sub === "testweights") {
      const trials = rest[0] === undefined ? DEFAULT_TRIALS : parsePositiveInt(rest[0]);
      if (trials === null || trials < MIN_TRIALS || trials > MAX_TRIALS) {
        await this.say(ctx, "vcTrialsInvalid");
        return;
      }
      const channels = await config.getChannels(guildId);
      if (Object.keys(channels).length === 0) {
        await this.say(ctx, "vcNoChannels");
        return;
      }
      const counts = simulateSelection(channels, trials, this.services.random);
      const lines = [this.text(ctx, "vcTestHeader", { trials })];
      for (const [id, count] of counts) {
        const entry = channels[id];
        lines.push(
          this.text(ctx, "vcTestLine", {
            name: (entry?.name ?? id).slice(0, 50),
            percent: ((count / trials) * 100).toFixed(1),
            weight: entry?.weight ?? 0,
          })
        );
      }
      await this.sayLines(ctx, lines);
      return;
    }

    if (sub === "clearhistory") {
      await config.clearHistory(guildId);
      await this.say(ctx, "vcHistoryCleared");
      return;
    }

    if (sub === "update") {
      const summary = await catalog.refresh(guildId, rest[0]);
      if (!summary) {
        await this.say(ctx, "vcNothingToUpdate");
        return;
      }
      await this.say(ctx, "vcUpdated", { updated: summary.updated, failed: summary.failed });
      return;
    }
  }

  private async statusLines(ctx: CommandContext): Promise<string[]> {
    const { config } = this.services;
    const [settings, channels, videos] = await Promise.all([
      config.getSettings(ctx.guildId),
      config.getChannels(ctx.guildId),
      config.getVideos(ctx.guildId),
    ]);
    const state = (on: boolean) => this.text(ctx, on ? "stateEnabled" : "stateDisabled");

    const lines = [
      this.text(ctx, "vcStatusTitle"),
      this.text(ctx, "vcStatusPostChannel", {
        value: settings.postChannelId ? `<#${settings.postChannelId}>` : this.text(ctx, "notSet"),
      }),
      this.text(ctx, "vcStatusInterval", { minutes: settings.postIntervalMinutes }),
      this.text(ctx, "vcStatusAuto", { state: state(settings.enabled) }),
      this.text(ctx, "vcStatusHistory", {
        channels: settings.channelHistorySize,
        videos: settings.videoHistorySize,
      }),
      this.text(ctx, "vcStatusShorts", { state: state(settings.shortsEnabled) }),
      this.text(ctx, "vcStatusTotals", {
        channels: Object.keys(channels).length,
        videos: Object.keys(videos).length,
      }),
    ];
    if (settings.lastPostTime > 0) {
      const next = Math.floor((settings.lastPostTime + settings.postIntervalMinutes * 60 * 1000) / 1000);
      lines.push(this.text(ctx, "vcStatusNextPost", { time: `<t:${next}:f>` }));
    }
    return lines;
  }

  // purge

  private async handlePurgeConfig(ctx: CommandContext, args: string[]): Promise<void> {
    if (!(await this.requirePermission(ctx, "owner"))) return;
    const { config, gateway, purge } = this.services;

    if (args.length === 0) {
      const channels = await config.getPurgeChannels(ctx.guildId);
      const entries = Object.entries(channels);
      if (entries.length === 0) {
        await this.say(ctx, "pcListEmpty");
        return;
      }
      const lines = [this.text(ctx, "pcListHeader")];
      for (const [channelId, cfg] of entries) {
        lines.push(
          this.text(ctx, cfg.countdown ? "pcListLineCountdown" : "pcListLine", {
            channel: channelId,
            minutes: cfg.intervalMinutes,
          })
        );
      }
      await this.sayLines(ctx, lines);
      return;
    }

    if (isHelpToken(args[0]?.toLowerCase())) {
      await this.say(ctx, "pcUsage");
      return;
    }

    const [channelRaw = "", minutesRaw, countdownRaw] = args;
    const channel = await gateway.resolveTextChannel(ctx.guildId, channelRaw);
    if (!channel) {
      await this.say(ctx, "vcTextChannelNotFound");
      return;
    }
    const minutes = parsePositiveInt(minutesRaw);
    if (minutes === null) {
      await this.say(ctx, minutesRaw === undefined ? "pcUsage" : "pcIntervalInvalid");
      return;
    }
    const countdown =
      countdownRaw !== undefined && (countdownRaw.toLowerCase() === "countdown" || parseToggle(countdownRaw) === true);

    if (!(await gateway.canManageMessages(channel.id))) {
      await this.say(ctx, "pcMissingPermission", { channel: channel.id });
      return;
    }

    await purge.configure(ctx.guildId, channel.id, { intervalMinutes: minutes, countdown });
    await this.say(ctx, countdown ? "pcConfiguredCountdown" : "pcConfigured", {
      channel: channel.id,
      minutes,
    });
  }

  private async handleStopPurge(ctx: CommandContext, args: string[]): Promise<void> {
    if (!(await this.requirePermission(ctx, "owner"))) return;
    const input = args.join(" ");
    if (!input || isHelpToken(input.toLowerCase())) {
      await this.say(ctx, "spUsage");
      return;
    }

    // A deleted channel can no longer be resolved; a raw mention or ID still stops its schedule.
    const resolved = await this.services.gateway.resolveTextChannel(ctx.guildId, input);
    const channelId = resolved?.id ?? channelIdFromMention(input);
    if (!channelId) {
      await this.say(ctx, "vcTextChannelNotFound");
      return;
    }

    const stopped = await this.services.purge.stop(ctx.guildId, channelId);
    await this.say(ctx, stopped ? "spStopped" : "spNotConfigured", { channel: channelId });
  }

  // set

  private async handleSet(ctx: CommandContext, args: string[]): Promise<void> {
    const [subRaw, ...rest] = args;
    const sub = normalizeSetSubcommand(subRaw);
    const val = rest.join(" ").trim();

    if (!sub || isHelpToken(subRaw?.toLowerCase())) {
      await ctx.reply(
        [
          this.text(ctx, "cmdHelpSetTitle"),
          this.text(ctx, "cmdHelpSetAdminRole"),
          this.text(ctx, "cmdHelpSetLanguage"),
          this.text(ctx, "cmdHelpSetPrefix"),
        ].join("\n")
      );
      return;
    }

    if (!(await this.requirePermission(ctx, "admin"))) return;
    const { config, gateway } = this.services;

    if (sub === "adminrole") {
      const current = await config.getAdminRoleId(ctx.guildId);
      if (!val) {
        if (current) await this.say(ctx, "adminRoleCurrent", { role: current });
        else await this.say(ctx, "adminRoleNone");
        return;
      }
      if (val.toLowerCase() === "clear") {
        await config.setAdminRoleId(ctx.guildId, null);
        await this.say(ctx, "adminRoleCleared");
        return;
      }
      const role = await gateway.resolveRole(ctx.guildId, val);
      if (!role) {
        await this.say(ctx, "setRoleNotFound");
        return;
      }
      await config.setAdminRoleId(ctx.guildId, role.id);
      await this.say(ctx, "adminRoleSet", { role: role.name });
      return;
    }

    if (sub === "language") {
      if (!val) {
        await this.say(ctx, "languageCurrent", { language: ctx.locale });
        return;
      }
      const language = parseLocale(val);
      if (!language) {
        await this.say(ctx, "languageInvalid");
        return;
      }
      await config.setLanguage(ctx.guildId, language);
      await ctx.reply(t(language, "languageSet", { language }));
      return;
    }

    if (sub === "prefix") {
      if (!val) {
        await this.say(ctx, "prefixCurrent", { prefix: ctx.prefix });
        return;
      }
      const validation = validateCommandPrefix(val);
      if (!validation.ok) {
        await this.say(ctx, validation.error);
        return;
      }
      await config.setCommandPrefix(ctx.guildId, val);
      this.prefixCache.set(ctx.guildId, val);
      await ctx.reply(t(ctx.locale, "prefixSet", { p: val, prefix: val }));
      return;
    }
  }
}

export function registerCommands(client: Client, handler: CommandHandler): void {
  client.on(Events.MessageCreate, (message: Message) => {
    if (message.author.bot || !message.inGuild()) return;
    void handler
      .handle({
        guildId: message.guildId,
        channelId: message.channelId,
        userId: message.author.id,
        content: message.content,
        reply: async (content) => {
          await message.reply({ content, allowedMentions: { parse: [], repliedUser: false } });
        },
      })
      .catch((err: unknown) => {
        logError("Command", "handling a message", err);
      });
  });
}
