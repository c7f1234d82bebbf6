/**
 * Client for the shot prediction / statistics service
 *
 * Every call is memoized per endpoint by its request parameters for the
 * lifetime of the page. Failed calls are evicted, so retrying re-fetches.
 */

import { API_BASE, SEARCH_RESULT_LIMIT, SHOT_LOG_LIMIT } from "@/lib/config";
import { MemoCache, cacheKey } from "@/lib/memoCache";
import type {
  CompareResponse,
  GridRequest,
  GridResponse,
  PlayerStats,
  PlayersResponse,
  PredictionResponse,
  RawCompareResponse,
  RawPlayerStats,
  ShotRequest,
  ShotsResponse,
  YearsResponse,
} from "@/types/api";

export class ApiError extends Error {
  readonly operation: string;
  readonly status: number | null;

  constructor(
    message: string,
    operation: string,
    status: number | null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ApiError";
    this.operation = operation;
    this.status = status;
  }
}

async function requestJson<T>(
  operation: string,
  path: string,
  init?: RequestInit
): Promise<T> {
  let response: Response;
  try {
    response = await fetch(`${API_BASE}${path}`, init);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ApiError(`${operation} failed: ${reason}`, operation, null, {
      cause: err,
    });
  }

  if (!response.ok) {
    throw new ApiError(
      `HTTP ${response.status}: ${operation} failed`,
      operation,
      response.status
    );
  }

  try {
    const body: T = await response.json();
    return body;
  } catch (err) {
    throw new ApiError(`${operation} failed: invalid JSON`, operation, response.status, {
      cause: err,
    });
  }
}

function postJson<T>(operation: string, path: string, body: unknown): Promise<T> {
  return requestJson<T>(operation, path, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
}

function sortedYears(years?: readonly number[]): number[] | undefined {
  if (!years || years.length === 0) return undefined;
  return [...new Set(years)].sort((a, b) => a - b);
}

/**
 * Fills in the nulls the service returns for empty aggregates
 */
export function normalizePlayerStats(
  raw: RawPlayerStats,
  fallbackName: string
): PlayerStats {
  return {
    player_name: raw.player_name ?? fallbackName,
    total_shots: raw.total_shots ?? 0,
    made_shots: raw.made_shots ?? 0,
    fg_pct: raw.fg_pct ?? 0,
    avg_distance: raw.avg_distance ?? 0,
    shot_types: raw.shot_types ?? [],
    seasons: raw.seasons ?? [],
    zones: raw.zones ?? [],
    actions: raw.actions ?? [],
  };
}

// ============================================================================
// Caches
// ============================================================================

const shotCache = new MemoCache<PredictionResponse>();
const gridCache = new MemoCache<GridResponse>();
const playersCache = new MemoCache<PlayersResponse>();
const yearsCache = new MemoCache<YearsResponse>();
const playerCache = new MemoCache<PlayerStats>();
const shotsCache = new MemoCache<ShotsResponse>();
const compareCache = new MemoCache<CompareResponse>();

const allCaches = [
  shotCache,
  gridCache,
  playersCache,
  yearsCache,
  playerCache,
  shotsCache,
  compareCache,
];

export function clearApiCache(): void {
  allCaches.forEach((cache) => cache.clear());
}

export interface LoadOptions {
  /** Fetch again even when cached; the cached value serves until it resolves */
  refresh?: boolean;
}

function load<T>(
  cache: MemoCache<T>,
  key: string,
  fetcher: () => Promise<T>,
  { refresh = false }: LoadOptions
): Promise<T> {
  return refresh ? cache.refresh(key, fetcher) : cache.get(key, fetcher);
}

// ============================================================================
// Endpoints
// ============================================================================

export function predictShot(req: ShotRequest): Promise<PredictionResponse> {
  return shotCache.get(cacheKey({ ...req }), () =>
    postJson<PredictionResponse>("predict_shot", "/predict_shot", req)
  );
}

export function predictGrid(req: GridRequest): Promise<GridResponse> {
  return gridCache.get(cacheKey({ ...req }), () =>
    postJson<GridResponse>("predict_grid", "/predict_grid", req)
  );
}

export function getPlayers(
  search: string,
  limit: number = SEARCH_RESULT_LIMIT,
  minShots?: number,
  options: LoadOptions = {}
): Promise<PlayersResponse> {
  const key = cacheKey({ search, limit, minShots });
  return load(playersCache, key, () => {
    const params = new URLSearchParams({ search });
    if (minShots !== undefined) {
      params.set("min_shots", String(minShots));
    }
    params.set("limit", String(limit));
    return requestJson<PlayersResponse>("players", `/players?${params}`);
  }, options);
}

export function getYears(options: LoadOptions = {}): Promise<YearsResponse> {
  return load(yearsCache, "years", () => requestJson<YearsResponse>("years", "/years"), options);
}

export function getPlayer(
  name: string,
  years?: readonly number[],
  options: LoadOptions = {}
): Promise<PlayerStats> {
  const yearList = sortedYears(years);
  return load(playerCache, cacheKey({ name, years: yearList }), async () => {
    const query = yearList
      ? `?${new URLSearchParams({ years: yearList.join(",") })}`
      : "";
    const raw = await requestJson<RawPlayerStats>(
      "player",
      `/player/${encodeURIComponent(name)}${query}`
    );
    return normalizePlayerStats(raw, name);
  }, options);
}

export function getPlayerShots(
  name: string,
  years?: readonly number[],
  limit: number = SHOT_LOG_LIMIT
): Promise<ShotsResponse> {
  const yearList = sortedYears(years);
  return shotsCache.get(cacheKey({ name, years: yearList, limit }), () => {
    const params = new URLSearchParams();
    if (yearList) {
      params.set("years", yearList.join(","));
    }
    params.set("limit", String(limit));
    return requestJson<ShotsResponse>(
      "player_shots",
      `/player/${encodeURIComponent(name)}/shots?${params}`
    );
  });
}

export function comparePlayers(
  player1: string,
  player2: string,
  years?: readonly number[]
): Promise<CompareResponse> {
  const yearList = sortedYears(years);
  return compareCache.get(cacheKey({ player1, player2, years: yearList }), async () => {
    const raw = await postJson<RawCompareResponse>("compare", "/compare", {
      player1,
      player2,
      years: yearList,
    });
    return {
      player1: normalizePlayerStats(raw.player1, player1),
      player2: normalizePlayerStats(raw.player2, player2),
    };
  });
}
