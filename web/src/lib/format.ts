/**
 * Display formatting shared by the stats and prediction views
 */

/** 0.4567 -> "45.7%" */
export function formatPct(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

/**
 * Signed difference for comparison rows; percentages are shown in points
 * 0.05 (pct) -> "+5.0", 120 -> "+120", 0 -> "0"
 */
export function formatDelta(delta: number, isPercentage = false): string {
  const shown = isPercentage ? Number((delta * 100).toFixed(1)) : delta;
  if (shown === 0) return "0";
  const text = isPercentage ? shown.toFixed(1) : shown.toLocaleString("en-US");
  return shown > 0 ? `+${text}` : text;
}

/** "Jump Shot" -> "Jump", "Fadeaway" -> "Fadeaway" */
export function shortActionLabel(action: string): string {
  return action.replace(" Shot", "");
}

export interface ProbabilityBand {
  color: string;
  verdict: string;
}

export function probabilityBand(p: number): ProbabilityBand {
  let color = "#00ff88";
  if (p < 0.3) color = "#ff3366";
  else if (p < 0.45) color = "#ff9500";
  else if (p < 0.55) color = "#eab308";

  let verdict = "Good shot — high percentage";
  if (p < 0.35) verdict = "Difficult shot — low percentage";
  else if (p < 0.45) verdict = "Below average — contested range";
  else if (p < 0.55) verdict = "Average — decent look";

  return { color, verdict };
}
