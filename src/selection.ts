/**
 * Weighted channel selection and recency-aware video picking.
 */

import type { ChannelCatalog, ChannelEntry } from "./types.js";

/** Uniform random number in [0, 1). */
export type RandomSource = () => number;

export interface VideoPick {
  channel: ChannelEntry;
  videoId: string;
}

export function isEligible(entry: ChannelEntry): boolean {
  return Number.isFinite(entry.weight) && entry.weight > 0 && entry.videoIds.length > 0;
}

/** Channels that can be drawn, in catalog order. */
export function eligibleChannels(catalog: ChannelCatalog): ChannelEntry[] {
  return Object.values(catalog).filter(isEligible);
}

function randomIndex(length: number, random: RandomSource): number {
  return Math.min(length - 1, Math.floor(random() * length));
}

export function pickWeightedChannel(
  catalog: ChannelCatalog,
  random: RandomSource = Math.random
): ChannelEntry | null {
  const candidates = eligibleChannels(catalog);
  if (candidates.length === 0) return null;

  const total = candidates.reduce((sum, entry) => sum + entry.weight, 0);
  if (!(total > 0)) {
    return candidates[randomIndex(candidates.length, random)] ?? null;
  }

  const target = random() * total;
  let cumulative = 0;
  for (const entry of candidates) {
    cumulative += entry.weight;
    if (cumulative >= target) return entry;
  }
  // Rounding can leave the last partial sum a hair below the draw.
  return candidates[candidates.length - 1] ?? null;
}

export function pickVideo(
  channel: ChannelEntry,
  recentVideos: readonly string[],
  random: RandomSource = Math.random
): string | null {
  if (channel.videoIds.length === 0) return null;
  const recent = new Set(recentVideos);
  const fresh = channel.videoIds.filter((id) => !recent.has(id));
  const pool = fresh.length > 0 ? fresh : channel.videoIds;
  return pool[randomIndex(pool.length, random)] ?? null;
}

export function selectVideo(
  catalog: ChannelCatalog,
  recentVideos: readonly string[],
  random: RandomSource = Math.random
): VideoPick | null {
  const channel = pickWeightedChannel(catalog, random);
  if (!channel) return null;
  const videoId = pickVideo(channel, recentVideos, random);
  if (!videoId) return null;
  return { channel, videoId };
}

/** Count how often each catalog entry wins over `trials` draws. Ineligible entries stay at 0. */
export function simulateSelection(
  catalog: ChannelCatalog,
  trials: number,
  random: RandomSource = Math.random
): Map<string, number> {
  const counts = new Map<string, number>(Object.keys(catalog).map((id) => [id, 0]));
  for (let i = 0; i < trials; i++) {
    const picked = pickWeightedChannel(catalog, random);
    if (picked) counts.set(picked.id, (counts.get(picked.id) ?? 0) + 1);
  }
  return counts;
}
