import { useEffect, useState } from "react";

/**
 * Returns `value` once it has stopped changing for `delay` ms
 * Intermediate values are dropped, not queued
 */
export function useDebounce<T>(value: T, delay: number): T {
  const [debouncedValue, setDebouncedValue] = useState(value);

  useEffect(() => {
    const timer = setTimeout(() => setDebouncedValue(value), delay);
    return () => clearTimeout(timer);
  }, [value, delay]);

  return debouncedValue;
}
