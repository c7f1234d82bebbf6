import { useState } from "react";
import { usePlayerSearch } from "@/hooks/usePlayerSearch";
import { formatPct } from "@/lib/format";
import type { Player } from "@/types/api";

interface PlayerSearchProps {
  onSelect: (player: Player) => void;
  selectedPlayer?: Player | null;
  placeholder?: string;
  debounceMs?: number;
}

export function PlayerSearch({
  onSelect,
  selectedPlayer,
  placeholder = "Search players...",
  debounceMs,
}: PlayerSearchProps) {
  const [query, setQuery] = useState("");
  const { players, loading, error } = usePlayerSearch(query, { debounceMs });

  return (
    <div>
      <input
        type="search"
        aria-label="Search players"
        className="w-full rounded border border-slate-600 bg-slate-900 px-3 py-2 text-sm"
        placeholder={placeholder}
        value={query}
        onChange={(e) => setQuery(e.target.value)}
        autoComplete="off"
      />

      {loading ? (
        <div className="flex items-center justify-center py-6" role="status">
          <div className="h-6 w-6 animate-spin rounded-full border-b-2 border-orange-500"></div>
          <span className="ml-3 text-sm text-slate-400">Searching...</span>
        </div>
      ) : (
        <ul className="mt-2 max-h-80 overflow-y-auto" aria-label="Players">
          {error && (
            <li className="rounded border border-red-800 bg-red-950 p-3 text-sm text-red-300">
              {error}
            </li>
          )}
          {!error && players.length === 0 && (
            <li className="p-3 text-center text-sm text-slate-400">No players found</li>
          )}
          {players.map((player) => {
            const isSelected = selectedPlayer?.name === player.name;
            return (
              <li key={player.name}>
                <button
                  type="button"
                  aria-pressed={isSelected}
                  onClick={() => onSelect(player)}
                  className={`flex w-full items-center justify-between rounded px-3 py-2 text-left text-sm hover:bg-slate-700 ${
                    isSelected ? "bg-slate-700 ring-1 ring-orange-500" : ""
                  }`}
                >
                  <span className="font-medium">{player.name}</span>
                  <span className="flex gap-2 text-xs text-slate-400">
                    <span>{player.total_shots.toLocaleString("en-US")} shots</span>
                    <span>{formatPct(player.fg_pct)}</span>
                  </span>
                </button>
              </li>
            );
          })}
        </ul>
      )}
    </div>
  );
}
