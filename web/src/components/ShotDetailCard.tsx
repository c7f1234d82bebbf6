import { distanceZone } from "@/lib/courtGeometry";
import type { Shot } from "@/types/api";

interface ShotDetailCardProps {
  shot: Shot;
}

/**
 * Details for a single shot from the log, shown in the shot chart popover
 */
export function ShotDetailCard({ shot }: ShotDetailCardProps) {
  const made = shot.SHOT_MADE_FLAG === 1;

  return (
    <div className="w-64 p-4" data-testid="shot-detail">
      <h3 className={`mb-3 text-lg font-bold ${made ? "text-green-400" : "text-red-400"}`}>
        {made ? "✓ Made" : "✗ Missed"}
      </h3>
      <dl className="grid grid-cols-2 gap-y-1 text-sm">
        <dt className="text-slate-400">Type</dt>
        <dd>{shot.SHOT_TYPE}</dd>
        <dt className="text-slate-400">Action</dt>
        <dd>{shot.ACTION_TYPE}</dd>
        <dt className="text-slate-400">Distance</dt>
        <dd>{shot.SHOT_DISTANCE.toFixed(1)} ft</dd>
        <dt className="text-slate-400">Zone</dt>
        <dd>{distanceZone(shot.SHOT_DISTANCE)}</dd>
        <dt className="text-slate-400">Season</dt>
        <dd>{shot.YEAR}</dd>
        <dt className="text-slate-400">Location</dt>
        <dd>
          ({shot.LOC_X.toFixed(1)}, {shot.LOC_Y.toFixed(1)})
        </dd>
      </dl>
    </div>
  );
}
