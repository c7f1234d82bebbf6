import type { PlayerStats, RawPlayerStats } from "@/types/api";

/** Stats as the service returns them for a player who took shots in `years` */
export function makeStats(
  name: string,
  years: number[],
  overrides: Partial<PlayerStats> = {}
): RawPlayerStats {
  return {
    player_name: name,
    total_shots: 1000,
    made_shots: 450,
    fg_pct: 0.45,
    avg_distance: 12.3,
    shot_types: [
      { shot_type: "2PT Field Goal", attempts: 700, made: 350, fg_pct: 0.5 },
      { shot_type: "3PT Field Goal", attempts: 300, made: 100, fg_pct: 0.3333 },
    ],
    seasons: years.map((year) => ({ year, attempts: 100, made: 45, fg_pct: 0.45 })),
    zones: [
      { zone: "Paint (0-5ft)", attempts: 400, made: 240, fg_pct: 0.6 },
      { zone: "3PT (22+ft)", attempts: 300, made: 100, fg_pct: 0.3333 },
    ],
    actions: [
      { action_type: "Jump Shot", attempts: 500, made: 200, fg_pct: 0.4 },
      { action_type: "Layup Shot", attempts: 300, made: 180, fg_pct: 0.6 },
    ],
    ...overrides,
  };
}
