import { useEffect, useState } from "react";
import { getPlayers } from "@/lib/api";
import { SEARCH_DEBOUNCE_MS, SEARCH_RESULT_LIMIT } from "@/lib/config";
import { RequestGeneration } from "@/lib/requestGeneration";
import { useDebounce } from "@/hooks/useDebounce";
import type { Player } from "@/types/api";

interface PlayerSearchOptions {
  debounceMs?: number;
  limit?: number;
}

/**
 * Debounced player search. Only the response to the most recently issued
 * query is applied; earlier ones are dropped when they resolve late.
 */
export function usePlayerSearch(
  query: string,
  { debounceMs = SEARCH_DEBOUNCE_MS, limit = SEARCH_RESULT_LIMIT }: PlayerSearchOptions = {}
) {
  const debouncedQuery = useDebounce(query, debounceMs);
  const [generation] = useState(() => new RequestGeneration());
  const [players, setPlayers] = useState<Player[]>([]);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    const token = generation.next();
    setLoading(true);
    setError(null);

    getPlayers(debouncedQuery.trim(), limit)
      .then((res) => {
        if (!generation.isCurrent(token)) return;
        setPlayers(res.players);
        setLoading(false);
      })
      .catch((err: unknown) => {
        if (!generation.isCurrent(token)) return;
        console.error("Failed to fetch players:", err);
        setError("Unable to load players.");
        setPlayers([]);
        setLoading(false);
      });
  }, [debouncedQuery, limit, generation]);

  useEffect(() => () => generation.invalidate(), [generation]);

  return { players, loading, error, debouncedQuery };
}
