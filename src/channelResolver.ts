/**
 * Turns whatever a user typed (channel URL, handle, ID, video link) into YouTube IDs.
 */

import type { YouTubeApi, YouTubeResult } from "./youtube.js";

export type ChannelLookup = Pick<YouTubeApi, "findChannelIdByHandle" | "searchChannelId">;

export type ChannelResolution = YouTubeResult<string> | { ok: false; reason: "unrecognized" };

const CHANNEL_ID = /^UC[a-zA-Z0-9_-]{22}$/;
const CHANNEL_URL = /youtube\.com\/channel\/([a-zA-Z0-9_-]+)/i;
const HANDLE_URL = /youtube\.com\/@([a-zA-Z0-9._-]+)/i;
const CUSTOM_URL = /youtube\.com\/(?:c|user)\/([a-zA-Z0-9_-]+)/i;
const BARE_HANDLE = /^@([a-zA-Z0-9._-]+)$/;
const BARE_TOKEN = /^[a-zA-Z0-9_-]+$/;

const VIDEO_URL_PATTERNS = [
  /youtube\.com\/watch\?(?:.*&)?v=([a-zA-Z0-9_-]{11})/i,
  /youtu\.be\/([a-zA-Z0-9_-]{11})/i,
  /youtube\.com\/embed\/([a-zA-Z0-9_-]{11})/i,
  /youtube\.com\/v\/([a-zA-Z0-9_-]{11})/i,
  /youtube\.com\/shorts\/([a-zA-Z0-9_-]{11})/i,
];
const BARE_VIDEO_ID = /^[a-zA-Z0-9_-]{11}$/;

export function isYouTubeChannelId(input: string): boolean {
  return CHANNEL_ID.test(input.trim());
}

export async function resolveChannelInput(
  rawInput: string,
  lookup: ChannelLookup
): Promise<ChannelResolution> {
  const input = rawInput.trim().replace(/^<|>$/g, "");
  if (!input) return { ok: false, reason: "unrecognized" };

  if (CHANNEL_ID.test(input)) return { ok: true, value: input };

  const channelUrl = input.match(CHANNEL_URL);
  if (channelUrl?.[1]) return { ok: true, value: channelUrl[1] };

  const handleUrl = input.match(HANDLE_URL);
  if (handleUrl?.[1]) return lookup.findChannelIdByHandle(handleUrl[1]);

  const customUrl = input.match(CUSTOM_URL);
  if (customUrl?.[1]) return lookup.searchChannelId(customUrl[1]);

  const handle = input.match(BARE_HANDLE);
  if (handle?.[1]) return lookup.findChannelIdByHandle(handle[1]);

  if (BARE_TOKEN.test(input)) return lookup.searchChannelId(input);

  return { ok: false, reason: "unrecognized" };
}

/** Channel ID for `rawInput`, or null when it cannot be recognized or looked up. */
export async function extractChannelId(
  rawInput: string,
  lookup: ChannelLookup
): Promise<string | null> {
  const resolved = await resolveChannelInput(rawInput, lookup);
  return resolved.ok ? resolved.value : null;
}

export function extractVideoId(rawInput: string): string | null {
  const input = rawInput.trim().replace(/^<|>$/g, "");
  for (const pattern of VIDEO_URL_PATTERNS) {
    const m = input.match(pattern);
    if (m?.[1]) return m[1];
  }
  return BARE_VIDEO_ID.test(input) ? input : null;
}
