import { useState } from "react";
import { BarChart } from "@/components/BarChart";
import { ShotChart } from "@/components/ShotChart";
import { YearFilter } from "@/components/YearFilter";
import { Card } from "@/components/ui/card";
import { useApiData } from "@/hooks/useApiData";
import { getPlayer, getPlayerShots } from "@/lib/api";
import { formatPct, shortActionLabel } from "@/lib/format";
import { cacheKey } from "@/lib/memoCache";
import { seasonYears, toggleYear } from "@/lib/seasons";

type StatsTab = "chart" | "zones" | "seasons";

const TABS: { id: StatsTab; label: string }[] = [
  { id: "chart", label: "Shot Chart" },
  { id: "zones", label: "Zone Analysis" },
  { id: "seasons", label: "By Season" },
];

interface PlayerStatsProps {
  playerName: string;
}

function StatCard({ label, value }: { label: string; value: string }) {
  return (
    <Card className="p-3 text-center" data-testid="stat-card">
      <div className="text-xs uppercase text-slate-400">{label}</div>
      <div className="text-2xl font-bold">{value}</div>
    </Card>
  );
}

function RetryButton({ onClick }: { onClick: () => void }) {
  return (
    <button
      type="button"
      onClick={onClick}
      className="mt-2 rounded bg-slate-700 px-3 py-1 text-sm text-white hover:bg-slate-600"
    >
      Try again
    </button>
  );
}

function logLoadFailure(err: unknown): never {
  console.error("Failed to load player data:", err);
  throw err;
}

export function PlayerStats({ playerName }: PlayerStatsProps) {
  const [selectedYears, setSelectedYears] = useState<number[]>([]);
  const [tab, setTab] = useState<StatsTab>("chart");

  // Unfiltered stats supply the season list for the filter
  const career = useApiData(cacheKey({ player: playerName }), () =>
    getPlayer(playerName).catch(logLoadFailure)
  );
  const filtered = useApiData(cacheKey({ player: playerName, years: selectedYears }), () =>
    getPlayer(playerName, selectedYears).catch(logLoadFailure)
  );
  const shots = useApiData(cacheKey({ shots: playerName, years: selectedYears }), () =>
    getPlayerShots(playerName, selectedYears)
  );

  const years = career.data ? seasonYears(career.data) : [];
  // Holds the last stats that loaded, even after a failed season request
  const stats = filtered.data;
  const loadFailed = career.error !== null || filtered.error !== null;

  const retry = () => {
    if (career.error) career.refetch();
    if (filtered.error) filtered.refetch();
  };

  if (!stats) {
    if (loadFailed) {
      return (
        <Card className="border-red-800 p-4">
          <h2 className="text-lg font-bold text-red-400">Failed to load player data</h2>
          <p className="text-slate-400">Unable to load stats for {playerName}</p>
          <RetryButton onClick={retry} />
        </Card>
      );
    }
    return <p role="status">Loading player stats...</p>;
  }

  return (
    <div className="space-y-4">
      <h1 className="text-3xl font-bold">{stats.player_name}</h1>

      <YearFilter
        years={years}
        selected={selectedYears}
        onToggle={(year) => setSelectedYears((prev) => toggleYear(prev, year))}
        onClear={() => setSelectedYears([])}
      />

      {loadFailed && (
        <div
          role="alert"
          className="flex items-center justify-between rounded border border-red-800 bg-red-950 p-3 text-sm text-red-300"
        >
          <span>Failed to load player data</span>
          <RetryButton onClick={retry} />
        </div>
      )}

      <div className="grid grid-cols-2 gap-3 md:grid-cols-4">
        <StatCard label="Total Shots" value={stats.total_shots.toLocaleString("en-US")} />
        <StatCard label="Made" value={stats.made_shots.toLocaleString("en-US")} />
        <StatCard label="FG%" value={formatPct(stats.fg_pct)} />
        <StatCard label="Avg Distance" value={`${stats.avg_distance.toFixed(1)} ft`} />
      </div>

      <div className="flex gap-2" role="tablist">
        {TABS.map((t) => (
          <button
            key={t.id}
            type="button"
            role="tab"
            aria-selected={tab === t.id}
            onClick={() => setTab(t.id)}
            className={`rounded px-4 py-1 text-sm ${
              tab === t.id ? "bg-orange-500 text-white" : "bg-slate-700"
            }`}
          >
            {t.label}
          </button>
        ))}
      </div>

      {tab === "chart" && (
        <Card className="p-4" role="tabpanel">
          {shots.error && <p className="text-red-400">Unable to load shot log.</p>}
          {!shots.error && !shots.data && <p role="status">Loading shots...</p>}
          {shots.data && <ShotChart shots={shots.data.shots} />}
        </Card>
      )}

      {tab === "zones" && (
        <div className="grid gap-4 md:grid-cols-2" role="tabpanel">
          <BarChart
            title="FG% by Zone"
            data={stats.zones.map((z) => ({ label: z.zone, value: z.fg_pct, maxValue: 1 }))}
          />
          <BarChart
            title="FG% by Action"
            variant="blue"
            data={stats.actions.map((a) => ({
              label: shortActionLabel(a.action_type),
              value: a.fg_pct,
              maxValue: 1,
            }))}
          />
          <BarChart
            title="Attempts by Shot Type"
            formatValue={(v) => v.toLocaleString("en-US")}
            data={stats.shot_types.map((s) => ({ label: s.shot_type, value: s.attempts }))}
          />
        </div>
      )}

      {tab === "seasons" && (
        <div className="grid gap-4 md:grid-cols-2" role="tabpanel">
          <BarChart
            title="FG% by Season"
            data={stats.seasons.map((s) => ({ label: String(s.year), value: s.fg_pct, maxValue: 1 }))}
          />
          <BarChart
            title="Attempts by Season"
            variant="blue"
            formatValue={(v) => v.toLocaleString("en-US")}
            data={stats.seasons.map((s) => ({ label: String(s.year), value: s.attempts }))}
          />
        </div>
      )}
    </div>
  );
}
