/**
 * Chat platform access. Features talk to `ChatGateway`; `DiscordGateway` implements it on
 * discord.js and tests use an in-memory fake.
 */

import {
  ChannelType,
  DiscordAPIError,
  PermissionFlagsBits,
  RESTJSONErrorCodes,
  Team,
  User,
  type Client,
  type NewsChannel,
  type TextChannel,
} from "discord.js";
import { isPermissionError } from "./errors.js";

const BULK_DELETE_MAX_AGE_MS = 14 * 24 * 60 * 60 * 1000;
// Messages this close to the bulk-delete cutoff are deleted one by one.
const BULK_DELETE_MARGIN_MS = 60 * 1000;
const FETCH_BATCH = 100;

export interface ChannelRef {
  id: string;
  name: string;
}

export interface ChatGateway {
  guildIds(): string[];
  /** Message ID, or null when the channel is gone or not a text channel. */
  sendMessage(channelId: string, content: string): Promise<string | null>;
  editMessage(channelId: string, messageId: string, content: string): Promise<void>;
  deleteMessage(channelId: string, messageId: string): Promise<void>;
  pinMessage(channelId: string, messageId: string): Promise<void>;
  /** Whether the bot can read history and delete others' messages in `channelId`. */
  canManageMessages(channelId: string): Promise<boolean>;
  /** Delete every message in the channel, pinned ones included. Returns how many were deleted. */
  purgeChannel(channelId: string, signal?: AbortSignal): Promise<number>;

  resolveTextChannel(guildId: string, input: string): Promise<ChannelRef | null>;
  resolveRole(guildId: string, input: string): Promise<ChannelRef | null>;
  memberHasRole(guildId: string, userId: string, roleId: string): Promise<boolean>;
  /** Guild owner or a member with Manage Server. */
  isGuildManager(guildId: string, userId: string): Promise<boolean>;
  isBotOwner(userId: string): Promise<boolean>;
}

type GuildTextChannel = TextChannel | NewsChannel;

function isMissingResource(err: unknown): boolean {
  return (
    err instanceof DiscordAPIError &&
    (err.code === RESTJSONErrorCodes.UnknownChannel ||
      err.code === RESTJSONErrorCodes.UnknownGuild ||
      err.code === RESTJSONErrorCodes.UnknownMember ||
      err.code === RESTJSONErrorCodes.UnknownRole)
  );
}

export function parseOwnerIds(raw: string | undefined): Set<string> {
  return new Set(
    (raw ?? "")
      .split(",")
      .map((id) => id.trim())
      .filter((id) => /^\d+$/.test(id))
  );
}

function mentionId(input: string, pattern: RegExp): string | null {
  const trimmed = input.trim();
  const m = trimmed.match(pattern);
  if (m?.[1]) return m[1];
  return /^\d{15,25}$/.test(trimmed) ? trimmed : null;
}

export class DiscordGateway implements ChatGateway {
  private ownerIds: Set<string> | null = null;

  constructor(
    private readonly client: Client,
    private readonly extraOwnerIds: ReadonlySet<string> = new Set()
  ) {}

  guildIds(): string[] {
    return [...this.client.guilds.cache.keys()];
  }

  private async textChannel(channelId: string): Promise<GuildTextChannel | null> {
    let channel = this.client.channels.cache.get(channelId) ?? null;
    if (!channel) {
      try {
        channel = await this.client.channels.fetch(channelId);
      } catch (err) {
        if (isMissingResource(err) || isPermissionError(err)) return null;
        throw err;
      }
    }
    if (channel?.type === ChannelType.GuildText || channel?.type === ChannelType.GuildAnnouncement) {
      return channel;
    }
    return null;
  }

  private async requireTextChannel(channelId: string): Promise<GuildTextChannel> {
    const channel = await this.textChannel(channelId);
    if (!channel) throw new Error(`Channel ${channelId} is not an available text channel`);
    return channel;
  }

  async sendMessage(channelId: string, content: string): Promise<string | null> {
    const channel = await this.textChannel(channelId);
    if (!channel) return null;
    const message = await channel.send({ content, allowedMentions: { parse: [] } });
    return message.id;
  }

  async editMessage(channelId: string, messageId: string, content: string): Promise<void> {
    const channel = await this.requireTextChannel(channelId);
    await channel.messages.edit(messageId, { content });
  }

  async deleteMessage(channelId: string, messageId: string): Promise<void> {
    const channel = await this.requireTextChannel(channelId);
    await channel.messages.delete(messageId);
  }

  async pinMessage(channelId: string, messageId: string): Promise<void> {
    const channel = await this.requireTextChannel(channelId);
    await channel.messages.pin(messageId);
  }

  async canManageMessages(channelId: string): Promise<boolean> {
    const channel = await this.textChannel(channelId);
    const me = channel?.guild.members.me;
    if (!channel || !me) return false;
    return channel
      .permissionsFor(me)
      .has([
        PermissionFlagsBits.ViewChannel,
        PermissionFlagsBits.ReadMessageHistory,
        PermissionFlagsBits.ManageMessages,
      ]);
  }

  async purgeChannel(channelId: string, signal?: AbortSignal): Promise<number> {
    const channel = await this.requireTextChannel(channelId);
    let deleted = 0;

    for (;;) {
      signal?.throwIfAborted();
      const batch = await channel.messages.fetch({ limit: FETCH_BATCH });
      if (batch.size === 0) break;

      const cutoff = Date.now() - BULK_DELETE_MAX_AGE_MS + BULK_DELETE_MARGIN_MS;
      const recent = batch.filter((m) => m.createdTimestamp > cutoff);
      const old = batch.filter((m) => m.createdTimestamp <= cutoff);

      let pass = 0;
      if (recent.size > 0) {
        const removed = await channel.bulkDelete(recent, true);
        pass += removed.size;
      }
      for (const message of old.values()) {
        signal?.throwIfAborted();
        await message.delete();
        pass++;
      }

      deleted += pass;
      // Nothing left that this pass could remove; stop instead of refetching the same batch.
      if (pass === 0) break;
    }
    return deleted;
  }

  async resolveTextChannel(guildId: string, input: string): Promise<ChannelRef | null> {
    const guild = this.client.guilds.cache.get(guildId);
    if (!guild) return null;

    const id = mentionId(input, /^<#(\d+)>$/);
    if (id) {
      const channel = await this.textChannel(id);
      return channel && channel.guildId === guildId ? { id: channel.id, name: channel.name } : null;
    }

    const name = input.trim().replace(/^#/, "").toLowerCase();
    const byName = guild.channels.cache.find(
      (c) =>
        (c.type === ChannelType.GuildText || c.type === ChannelType.GuildAnnouncement) &&
        c.name.toLowerCase() === name
    );
    return byName ? { id: byName.id, name: byName.name } : null;
  }

  async resolveRole(guildId: string, input: string): Promise<ChannelRef | null> {
    const guild = this.client.guilds.cache.get(guildId);
    if (!guild) return null;

    const id = mentionId(input, /^<@&(\d+)>$/);
    if (id) {
      const role = guild.roles.cache.get(id) ?? (await guild.roles.fetch(id));
      return role ? { id: role.id, name: role.name } : null;
    }

    const name = input.trim().replace(/^@/, "").toLowerCase();
    const byName = guild.roles.cache.find((r) => r.name.toLowerCase() === name);
    return byName ? { id: byName.id, name: byName.name } : null;
  }

  async memberHasRole(guildId: string, userId: string, roleId: string): Promise<boolean> {
    const guild = this.client.guilds.cache.get(guildId);
    if (!guild) return false;
    try {
      const member = await guild.members.fetch(userId);
      return member.roles.cache.has(roleId);
    } catch (err) {
      if (isMissingResource(err)) return false;
      throw err;
    }
  }

  async isGuildManager(guildId: string, userId: string): Promise<boolean> {
    const guild = this.client.guilds.cache.get(guildId);
    if (!guild) return false;
    if (guild.ownerId === userId) return true;
    try {
      const member = await guild.members.fetch(userId);
      return member.permissions.has(PermissionFlagsBits.ManageGuild);
    } catch (err) {
      if (isMissingResource(err)) return false;
      throw err;
    }
  }

  /** `BOT_OWNER_IDS` plus the application owner, or every member of the owning team. */
  async isBotOwner(userId: string): Promise<boolean> {
    if (this.extraOwnerIds.has(userId)) return true;
    if (!this.ownerIds) this.ownerIds = await this.fetchApplicationOwners();
    return this.ownerIds.has(userId);
  }

  private async fetchApplicationOwners(): Promise<Set<string>> {
    const application = this.client.application;
    if (!application) return new Set();
    const { owner } = await application.fetch();
    if (owner instanceof User) return new Set([owner.id]);
    if (owner instanceof Team) return new Set(owner.members.map((member) => member.id));
    return new Set();
  }
}
