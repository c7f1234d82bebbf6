import type { PlayerStats } from "@/types/api";

/**
 * Seasons present in both lists, ascending and without duplicates
 */
export function intersectSeasons(
  first: readonly number[],
  second: readonly number[]
): number[] {
  const firstSet = new Set(first);
  return [...new Set(second)]
    .filter((year) => firstSet.has(year))
    .sort((a, b) => a - b);
}

export function seasonYears(stats: Pick<PlayerStats, "seasons">): number[] {
  return stats.seasons.map((s) => s.year).sort((a, b) => a - b);
}

export function toggleYear(selected: readonly number[], year: number): number[] {
  return selected.includes(year)
    ? selected.filter((y) => y !== year)
    : [...selected, year];
}
