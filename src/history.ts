export interface HistoryLimits {
  channels: number;
  videos: number;
}

/** Prepend `id` and keep at most `maxLength` entries, most recent first. */
export function pushRecent(buffer: readonly string[], id: string, maxLength: number): string[] {
  return [id, ...buffer].slice(0, Math.max(0, maxLength));
}
