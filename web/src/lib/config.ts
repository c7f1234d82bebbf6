/**
 * Runtime configuration, read from Vite env variables at build time
 */

export function parsePositiveInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  return Number.isInteger(value) && value > 0 ? value : fallback;
}

/** Origin of the shot service; empty string means same origin */
export const API_ORIGIN = (import.meta.env.VITE_API_URL ?? "").replace(/\/+$/, "");
export const API_BASE = `${API_ORIGIN}/api`;

export const SEARCH_DEBOUNCE_MS = 200;
export const SEARCH_RESULT_LIMIT = 100;
export const SHOT_LOG_LIMIT = 2500;
export const DEFAULT_PREDICTION_YEAR = 2024;

export const PREFETCH_ENABLED = import.meta.env.VITE_PREFETCH_ENABLED !== "false";
export const PREFETCH_INTERVAL_MS = parsePositiveInt(
  import.meta.env.VITE_PREFETCH_INTERVAL_MS,
  5 * 60 * 1000
);
export const PREFETCH_PLAYER_COUNT = 8;
