/**
 * Background warm-up of the API memo cache.
 *
 * Loads the default player list (the same request an empty search box makes),
 * the season list, and the stats of the most active players, so the common
 * first clicks resolve from cache. Runs once on start and then on a fixed
 * interval; once a run has completed, later runs refresh the cached entries
 * instead of reading them back. Stopping flips a flag that is checked between requests; a request
 * already in flight is left to finish.
 */

import { getPlayer, getPlayers, getYears } from "@/lib/api";
import {
  PREFETCH_INTERVAL_MS,
  PREFETCH_PLAYER_COUNT,
  SEARCH_RESULT_LIMIT,
} from "@/lib/config";

export interface PrefetchOptions {
  intervalMs?: number;
  count?: number;
}

export function startPrefetch({
  intervalMs = PREFETCH_INTERVAL_MS,
  count = PREFETCH_PLAYER_COUNT,
}: PrefetchOptions = {}): () => void {
  let stopped = false;
  let running = false;
  let warmed = false;

  const warm = async () => {
    if (running || stopped) return;
    running = true;
    const options = { refresh: warmed };
    try {
      await getYears(options);
      if (stopped) return;

      const { players } = await getPlayers("", SEARCH_RESULT_LIMIT, undefined, options);
      for (const player of players.slice(0, count)) {
        if (stopped) return;
        await getPlayer(player.name, undefined, options);
      }
      warmed = true;
    } catch (err) {
      console.warn("Prefetch of popular players failed:", err);
    } finally {
      running = false;
    }
  };

  void warm();
  const timer = setInterval(() => {
    void warm();
  }, intervalMs);

  return () => {
    stopped = true;
    clearInterval(timer);
  };
}
