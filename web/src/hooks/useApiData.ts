import { useCallback, useEffect, useState } from "react";

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Generic hook for loading data through the API client
 * Handles loading states, errors, and null keys. A failed load keeps the
 * data from the last successful one.
 *
 * @param key - Identity of the request; the loader re-runs whenever it
 *   changes. Null skips loading and resets to the idle state.
 * @param load - Produces the data for the current key
 * @returns data (or null), loading state, error (or null) and a refetch
 */
export function useApiData<T>(key: string | null, load: () => Promise<T>) {
  const [data, setData] = useState<T | null>(null);
  const [loading, setLoading] = useState<boolean>(false);
  const [error, setError] = useState<Error | null>(null);
  const [attempt, setAttempt] = useState(0);

  useEffect(() => {
    let cancelled = false;

    if (!key) {
      // eslint-disable-next-line react-hooks/set-state-in-effect
      setData(null);
      setLoading(false);
      setError(null);
      return;
    }

    setLoading(true);
    setError(null);

    load()
      .then((result) => {
        if (cancelled) return;
        setData(result);
        setLoading(false);
      })
      .catch((err: unknown) => {
        if (cancelled) return;
        // The last good data stays in place next to the error
        setError(toError(err));
        setLoading(false);
      });

    return () => {
      cancelled = true;
    };
    // `load` is expected to be a fresh closure on every render; `key` is its identity
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [key, attempt]);

  const refetch = useCallback(() => setAttempt((n) => n + 1), []);

  return { data, loading, error, refetch };
}
