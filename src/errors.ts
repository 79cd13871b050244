import { DiscordAPIError, RESTJSONErrorCodes } from "discord.js";

const PERMISSION_ERROR_CODES = new Set<number | string>([
  RESTJSONErrorCodes.MissingAccess,
  RESTJSONErrorCodes.MissingPermissions,
]);

/** Discord refused the action because the bot lacks access or a permission in that channel. */
export function isPermissionError(err: unknown): boolean {
  return err instanceof DiscordAPIError && PERMISSION_ERROR_CODES.has(err.code);
}

export function logError(scope: string, what: string, err: unknown): void {
  if (err instanceof DiscordAPIError) {
    console.error(`[${scope}] DiscordAPIError ${what}:`, err.code, err.message);
  } else if (err instanceof Error) {
    console.error(`[${scope}] Error ${what}:`, err.message);
  } else {
    console.error(`[${scope}] Unknown error ${what}:`, err);
  }
}

const UNKNOWN_RESOURCE_CODES = new Set<number | string>([
  RESTJSONErrorCodes.UnknownChannel,
  RESTJSONErrorCodes.UnknownMessage,
]);

/** The channel or message was already gone. */
export function isUnknownResourceError(err: unknown): boolean {
  return err instanceof DiscordAPIError && UNKNOWN_RESOURCE_CODES.has(err.code);
}
