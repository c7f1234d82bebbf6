import type { Shot } from "@/types/api";

interface ShotDotProps {
  shot: Shot;
  scale: number;
  active: boolean;
  onSelect: () => void;
}

/**
 * A single made/missed shot on the court, clickable and keyboard focusable
 */
export function ShotDot({ shot, scale, active, onSelect }: ShotDotProps) {
  const made = shot.SHOT_MADE_FLAG === 1;
  const fill = made ? "#22c55e" : "#ef4444";

  return (
    <circle
      data-testid="shot-dot"
      data-made={made}
      cx={shot.LOC_X * scale}
      cy={shot.LOC_Y * scale}
      r={active ? 7 : 4.4}
      fill={fill}
      fillOpacity={made ? 0.85 : 0.6}
      stroke={active ? "#fff" : "none"}
      strokeWidth={2}
      role="button"
      tabIndex={0}
      aria-label={`${made ? "Made" : "Missed"} ${shot.ACTION_TYPE}, ${shot.SHOT_DISTANCE.toFixed(1)} ft`}
      style={{ cursor: "pointer" }}
      onClick={onSelect}
      onKeyDown={(e) => {
        if (e.key === "Enter" || e.key === " ") {
          e.preventDefault();
          onSelect();
        }
      }}
    />
  );
}
