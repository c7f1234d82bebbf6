import { useState } from "react";
import { BarChart } from "@/components/BarChart";
import { PlayerSearch } from "@/components/PlayerSearch";
import { YearFilter } from "@/components/YearFilter";
import { Card, CardContent, CardHeader, CardTitle } from "@/components/ui/card";
import { useApiData } from "@/hooks/useApiData";
import { comparePlayers, getPlayer } from "@/lib/api";
import { formatDelta, formatPct } from "@/lib/format";
import { cacheKey } from "@/lib/memoCache";
import { intersectSeasons, seasonYears, toggleYear } from "@/lib/seasons";
import type { Player, PlayerStats } from "@/types/api";

interface CompareRowProps {
  label: string;
  left: number;
  right: number;
  isPercentage?: boolean;
  format: (value: number) => string;
}

function CompareRow({ label, left, right, isPercentage = false, format }: CompareRowProps) {
  const winner = left > right ? "left" : right > left ? "right" : null;

  return (
    <div className="grid grid-cols-[1fr_auto_1fr] items-center gap-4 border-b border-slate-700 py-2" data-testid="compare-row">
      <div
        data-testid="compare-left"
        data-winner={winner === "left"}
        className={`text-right text-lg ${winner === "left" ? "font-bold text-orange-400" : ""}`}
      >
        {format(left)}
      </div>
      <div className="text-center">
        <div className="text-xs uppercase text-slate-400">{label}</div>
        <div className="text-xs text-slate-500" data-testid="compare-delta">
          {formatDelta(left - right, isPercentage)}
        </div>
      </div>
      <div
        data-testid="compare-right"
        data-winner={winner === "right"}
        className={`text-lg ${winner === "right" ? "font-bold text-cyan-400" : ""}`}
      >
        {format(right)}
      </div>
    </div>
  );
}

function formatCount(value: number): string {
  return value.toLocaleString("en-US");
}

function formatFeet(value: number): string {
  return `${value.toFixed(1)} ft`;
}

function ComparisonResult({ left, right }: { left: PlayerStats; right: PlayerStats }) {
  return (
    <Card data-testid="comparison">
      <CardContent>
        <div className="mb-2 grid grid-cols-[1fr_auto_1fr] gap-4 font-bold">
          <div className="text-right text-orange-400">{left.player_name}</div>
          <div className="text-slate-400">STAT</div>
          <div className="text-cyan-400">{right.player_name}</div>
        </div>

        <CompareRow label="Total Shots" left={left.total_shots} right={right.total_shots} format={formatCount} />
        <CompareRow label="Made Shots" left={left.made_shots} right={right.made_shots} format={formatCount} />
        <CompareRow label="FG%" left={left.fg_pct} right={right.fg_pct} isPercentage format={formatPct} />
        <CompareRow label="Avg Distance" left={left.avg_distance} right={right.avg_distance} format={formatFeet} />

        <div className="mt-4 grid gap-4 md:grid-cols-2">
          <BarChart
            title={`${left.player_name} - Zone FG%`}
            data={left.zones.map((z) => ({ label: z.zone, value: z.fg_pct, maxValue: 1 }))}
          />
          <BarChart
            title={`${right.player_name} - Zone FG%`}
            variant="blue"
            alignRight
            data={right.zones.map((z) => ({ label: z.zone, value: z.fg_pct, maxValue: 1 }))}
          />
          <BarChart
            title={`${left.player_name} - Shot Types`}
            data={left.shot_types.map((s) => ({ label: s.shot_type, value: s.fg_pct, maxValue: 1 }))}
          />
          <BarChart
            title={`${right.player_name} - Shot Types`}
            variant="blue"
            alignRight
            data={right.shot_types.map((s) => ({ label: s.shot_type, value: s.fg_pct, maxValue: 1 }))}
          />
        </div>
      </CardContent>
    </Card>
  );
}

export function CompareView() {
  const [player1, setPlayer1] = useState<Player | null>(null);
  const [player2, setPlayer2] = useState<Player | null>(null);
  const [selectedYears, setSelectedYears] = useState<number[]>([]);

  const name1 = player1?.name ?? null;
  const name2 = player2?.name ?? null;

  const career1 = useApiData(name1 && cacheKey({ player: name1 }), () =>
    getPlayer(name1 ?? "")
  );
  const career2 = useApiData(name2 && cacheKey({ player: name2 }), () =>
    getPlayer(name2 ?? "")
  );

  const years1 = career1.data ? seasonYears(career1.data) : null;
  const years2 = career2.data ? seasonYears(career2.data) : null;
  const commonYears = years1 && years2 ? intersectSeasons(years1, years2) : [];
  // Selections from a previous pair that are no longer shared are ignored
  const activeYears = selectedYears.filter((y) => commonYears.includes(y));
  const noOverlap = years1 !== null && years2 !== null && commonYears.length === 0;

  const comparison = useApiData(
    name1 && name2 && !noOverlap
      ? cacheKey({ player1: name1, player2: name2, years: activeYears })
      : null,
    () =>
      comparePlayers(name1 ?? "", name2 ?? "", activeYears).catch((err: unknown) => {
        console.error("Comparison failed:", err);
        throw err;
      })
  );

  return (
    <div className="space-y-4">
      <div className="grid items-start gap-4 md:grid-cols-[1fr_auto_1fr]">
        <Card>
          <CardHeader>
            <CardTitle className="text-orange-400">{player1?.name ?? "Player 1"}</CardTitle>
          </CardHeader>
          <CardContent>
            <PlayerSearch
              onSelect={setPlayer1}
              selectedPlayer={player1}
              placeholder="Search first player..."
            />
          </CardContent>
        </Card>

        <div className="self-center text-center text-2xl font-bold text-slate-500">VS</div>

        <Card>
          <CardHeader>
            <CardTitle className="text-cyan-400">{player2?.name ?? "Player 2"}</CardTitle>
          </CardHeader>
          <CardContent>
            <PlayerSearch
              onSelect={setPlayer2}
              selectedPlayer={player2}
              placeholder="Search second player..."
            />
          </CardContent>
        </Card>
      </div>

      {commonYears.length > 0 && (
        <YearFilter
          years={commonYears}
          selected={activeYears}
          onToggle={(year) => setSelectedYears(toggleYear(activeYears, year))}
          onClear={() => setSelectedYears([])}
        />
      )}

      {noOverlap && (
        <p className="rounded border border-amber-700 p-3 text-amber-300">
          These players have no overlapping seasons in the dataset.
        </p>
      )}

      {comparison.error && (
        <p role="alert" className="text-red-400">
          Unable to load comparison right now. Please try again.
        </p>
      )}

      {comparison.loading && <p role="status">Comparing...</p>}

      {comparison.data && !comparison.loading && !noOverlap && (
        <ComparisonResult left={comparison.data.player1} right={comparison.data.player2} />
      )}

      {(!player1 || !player2) && (
        <div className="py-12 text-center text-slate-400">
          <div className="text-lg font-semibold">Select two players to compare</div>
          <p>Choose players from the panels above</p>
        </div>
      )}
    </div>
  );
}
