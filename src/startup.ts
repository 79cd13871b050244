import { logError } from "./errors.js";
import type { VideoPoster } from "./poster.js";
import type { PurgeManager } from "./purge.js";

/**
 * Start the post loop and bring back stored purge schedules. Neither depends on the other, and
 * the returned promise never rejects.
 */
export async function startBackgroundTasks(poster: VideoPoster, purge: PurgeManager): Promise<void> {
  poster.start();
  try {
    await purge.restore();
  } catch (err) {
    logError("Bot", "restoring purge schedules", err);
  }
}
