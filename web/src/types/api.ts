/**
 * TypeScript interfaces matching the JSON contracts of the shot service
 * Field casing follows the wire format: shot features are upper-case,
 * aggregates are snake_case
 */

// ============================================================================
// Predictions (POST /api/predict_shot, POST /api/predict_grid)
// ============================================================================

export type ShotTypeLabel = "2PT Field Goal" | "3PT Field Goal";

export interface ShotRequest {
  LOC_X: number;
  LOC_Y: number;
  SHOT_DISTANCE?: number;
  YEAR?: number;
  SHOT_TYPE?: string;
  ACTION_TYPE?: string;
  player_name?: string;
}

export interface PredictionResponse {
  probability_make: number;
}

export interface GridRequest {
  x_min?: number;
  x_max?: number;
  y_min?: number;
  y_max?: number;
  x_steps?: number;
  y_steps?: number;
  YEAR?: number;
  SHOT_TYPE?: string;
  ACTION_TYPE?: string;
}

export interface GridPoint {
  LOC_X: number;
  LOC_Y: number;
  SHOT_DISTANCE?: number;
  YEAR?: number;
  SHOT_TYPE?: string;
  ACTION_TYPE?: string;
}

export interface GridResponse {
  grid: GridPoint[];
  probabilities: number[]; // x-outer, y-inner
}

// ============================================================================
// Players & years (GET /api/players, GET /api/years)
// ============================================================================

export interface Player {
  name: string;
  total_shots: number;
  fg_pct: number;
}

export interface PlayersResponse {
  players: Player[];
}

export interface YearsResponse {
  years: number[];
}

// ============================================================================
// Player stats (GET /api/player/{name}, POST /api/compare)
// ============================================================================

export interface ShotTypeBreakdown {
  shot_type: string;
  attempts: number;
  made: number;
  fg_pct: number;
}

export interface SeasonBreakdown {
  year: number;
  attempts: number;
  made: number;
  fg_pct: number;
}

export interface ZoneBreakdown {
  zone: string;
  attempts: number;
  made: number;
  fg_pct: number;
}

export interface ActionBreakdown {
  action_type: string;
  attempts: number;
  made: number;
  fg_pct: number;
}

export interface PlayerStats {
  player_name: string;
  total_shots: number;
  made_shots: number;
  fg_pct: number;
  avg_distance: number;
  shot_types: ShotTypeBreakdown[];
  seasons: SeasonBreakdown[];
  zones: ZoneBreakdown[];
  actions: ActionBreakdown[];
}

/**
 * Stats as the service sends them: aggregates over an empty shot set come
 * back as null rather than 0 / []
 */
export interface RawPlayerStats {
  player_name: string | null;
  total_shots: number | null;
  made_shots: number | null;
  fg_pct: number | null;
  avg_distance: number | null;
  shot_types: ShotTypeBreakdown[] | null;
  seasons: SeasonBreakdown[] | null;
  zones: ZoneBreakdown[] | null;
  actions: ActionBreakdown[] | null;
}

export interface CompareRequest {
  player1: string;
  player2: string;
  years?: number[];
}

export interface RawCompareResponse {
  player1: RawPlayerStats;
  player2: RawPlayerStats;
}

export interface CompareResponse {
  player1: PlayerStats;
  player2: PlayerStats;
}

// ============================================================================
// Shot log (GET /api/player/{name}/shots)
// ============================================================================

export interface Shot {
  LOC_X: number;
  LOC_Y: number;
  SHOT_MADE_FLAG: 0 | 1;
  SHOT_DISTANCE: number;
  SHOT_TYPE: string;
  ACTION_TYPE: string;
  YEAR: number;
}

export interface ShotsResponse {
  shots: Shot[];
  total: number;
}
