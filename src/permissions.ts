/**
 * Permission system for bot administration.
 * If no admin role is configured, everyone can use admin commands.
 * If an admin role is set, only members with that role, the guild owner, members with
 * Manage Server and bot owners can.
 */

import type { BotConfig } from "./botConfig.js";
import { logError } from "./errors.js";
import type { ChatGateway } from "./gateway.js";

export type PermissionLevel = "everyone" | "admin" | "owner";

export async function hasAdminPermission(
    config: BotConfig,
    gateway: ChatGateway,
    guildId: string,
    userId: string
): Promise<boolean> {
    const adminRoleId = await config.getAdminRoleId(guildId);

    // If no admin role is configured, everyone has admin permissions
    if (!adminRoleId) {
        return true;
    }

    try {
        if (await gateway.isBotOwner(userId)) return true;
        if (await gateway.isGuildManager(guildId, userId)) return true;
        return await gateway.memberHasRole(guildId, userId, adminRoleId);
    } catch (err) {
        logError("Permissions", "checking member roles", err);
        return false;
    }
}

export async function isBotOwner(gateway: ChatGateway, userId: string): Promise<boolean> {
    try {
        return await gateway.isBotOwner(userId);
    } catch (err) {
        logError("Permissions", "fetching the bot owners", err);
        return false;
    }
}

export async function hasPermission(
    level: PermissionLevel,
    config: BotConfig,
    gateway: ChatGateway,
    guildId: string,
    userId: string
): Promise<boolean> {
    switch (level) {
        case "everyone":
            return true;
        case "admin":
            return hasAdminPermission(config, gateway, guildId, userId);
        case "owner":
            return isBotOwner(gateway, userId);
    }
}
