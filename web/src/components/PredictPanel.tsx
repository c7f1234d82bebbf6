import { useState, type MouseEvent } from "react";
import { PlayerSearch } from "@/components/PlayerSearch";
import { Card, CardContent } from "@/components/ui/card";
import { useApiData } from "@/hooks/useApiData";
import { getYears, predictShot } from "@/lib/api";
import { DEFAULT_PREDICTION_YEAR } from "@/lib/config";
import {
  ARC_MEET_Y,
  CLOSE_RANGE_DISTANCE,
  CORNER_THREE_X,
  COURT_VIEW_BOX,
  COURT_X_MAX,
  COURT_X_MIN,
  COURT_Y_MAX,
  COURT_Y_MIN,
  DEFAULT_ACTION,
  RIM_Y,
  SVG_SCALE,
  THREE_POINT_RADIUS,
  actionsForZone,
  clampCourtPosition,
  classifyShot,
  distanceZone,
  svgClickToFeet,
  type CourtPosition,
} from "@/lib/courtGeometry";
import { probabilityBand, shortActionLabel } from "@/lib/format";
import { RequestGeneration } from "@/lib/requestGeneration";
import type { Player } from "@/types/api";

const S = SVG_SCALE;
const BASELINE_Y = -4 * S;
const PAINT_LENGTH = 19;
const PAINT_END_Y = BASELINE_Y + PAINT_LENGTH * S;
const FT_CIRCLE_RADIUS = 6 * S;
const RESTRICTED_RADIUS = 4 * S;
const RIM_SVG_Y = RIM_Y * S;

const ZONE_TAGS = {
  three: "3PT",
  close: "Close Range",
  mid: "Mid Range",
} as const;

interface PredictPanelProps {
  initialPosition?: CourtPosition;
}

export function PredictPanel({ initialPosition = { x: 0, y: 15 } }: PredictPanelProps) {
  const [position, setPosition] = useState<CourtPosition>(() =>
    clampCourtPosition(initialPosition)
  );
  const [action, setAction] = useState<string>(DEFAULT_ACTION);
  const [year, setYear] = useState<number>(DEFAULT_PREDICTION_YEAR);
  const [selectedPlayer, setSelectedPlayer] = useState<Player | null>(null);
  const [probability, setProbability] = useState<number | null>(null);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [generation] = useState(() => new RequestGeneration());

  const { data: yearsData } = useApiData("years", getYears);
  const yearOptions =
    yearsData && yearsData.years.length > 0 ? yearsData.years : [DEFAULT_PREDICTION_YEAR];

  const shot = classifyShot(position.x, position.y);
  const availableActions = actionsForZone(shot.zone);
  // A stale pick from another zone falls back to the default action
  const activeAction = availableActions.includes(action) ? action : DEFAULT_ACTION;

  const moveTo = (next: CourtPosition) => {
    setPosition(clampCourtPosition(next));
    setProbability(null);
    generation.invalidate();
    setLoading(false);
  };

  const handleCourtClick = (e: MouseEvent<SVGSVGElement>) => {
    const feet = svgClickToFeet(e.clientX, e.clientY, e.currentTarget.getBoundingClientRect());
    if (feet) moveTo(feet);
  };

  const handlePredict = async () => {
    const token = generation.next();
    setLoading(true);
    setError(null);
    try {
      const result = await predictShot({
        LOC_X: position.x,
        LOC_Y: position.y,
        YEAR: year,
        SHOT_TYPE: shot.shotType,
        ACTION_TYPE: activeAction,
        player_name: selectedPlayer?.name,
      });
      if (!generation.isCurrent(token)) return;
      setProbability(result.probability_make);
    } catch (err) {
      if (!generation.isCurrent(token)) return;
      console.error("Shot prediction failed:", err);
      setError("Prediction failed. Please try again.");
    } finally {
      if (generation.isCurrent(token)) setLoading(false);
    }
  };

  const markerColor = shot.isThreePointer ? "#00d4ff" : "#ff6b2c";

  return (
    <div className="grid gap-4 lg:grid-cols-2">
      <Card>
        <CardContent>
          <div className="mb-2 flex items-center justify-between">
            <h2 className="text-lg font-semibold">Click to select shot location</h2>
            <span data-testid="shot-badge" className="rounded bg-slate-700 px-2 py-1 text-xs">
              {shot.isThreePointer ? "3PT" : "2PT"} • {shot.distance.toFixed(1)} ft
            </span>
          </div>

          <svg
            data-testid="predict-court"
            viewBox={`${COURT_VIEW_BOX.x} ${COURT_VIEW_BOX.y} ${COURT_VIEW_BOX.width} ${COURT_VIEW_BOX.height}`}
            className="w-full cursor-crosshair"
            onClick={handleCourtClick}
          >
            <rect
              x={COURT_VIEW_BOX.x}
              y={COURT_VIEW_BOX.y}
              width={COURT_VIEW_BOX.width}
              height={COURT_VIEW_BOX.height}
              fill="#1e293b"
            />

            <g stroke="#475569" strokeWidth={2} fill="none">
              <line x1={-250} y1={BASELINE_Y} x2={250} y2={BASELINE_Y} />
              <line x1={-250} y1={BASELINE_Y} x2={-250} y2={420} />
              <line x1={250} y1={BASELINE_Y} x2={250} y2={420} />

              {/* Paint: 16 ft outer lane, 12 ft inner */}
              <rect x={-80} y={BASELINE_Y} width={160} height={PAINT_LENGTH * S} />
              <rect x={-60} y={BASELINE_Y} width={120} height={PAINT_LENGTH * S} />

              <path d={`M ${-FT_CIRCLE_RADIUS} ${PAINT_END_Y} A ${FT_CIRCLE_RADIUS} ${FT_CIRCLE_RADIUS} 0 0 0 ${FT_CIRCLE_RADIUS} ${PAINT_END_Y}`} />
              <path
                d={`M ${-FT_CIRCLE_RADIUS} ${PAINT_END_Y} A ${FT_CIRCLE_RADIUS} ${FT_CIRCLE_RADIUS} 0 0 1 ${FT_CIRCLE_RADIUS} ${PAINT_END_Y}`}
                strokeDasharray="8,8"
              />
              <path d={`M ${-RESTRICTED_RADIUS} ${RIM_SVG_Y} A ${RESTRICTED_RADIUS} ${RESTRICTED_RADIUS} 0 0 0 ${RESTRICTED_RADIUS} ${RIM_SVG_Y}`} />

              {/* 3-point line: straight corners, then the arc */}
              <path d={`M ${-CORNER_THREE_X * S} ${BASELINE_Y} L ${-CORNER_THREE_X * S} ${ARC_MEET_Y * S}`} />
              <path d={`M ${CORNER_THREE_X * S} ${BASELINE_Y} L ${CORNER_THREE_X * S} ${ARC_MEET_Y * S}`} />
              <path
                d={`M ${-CORNER_THREE_X * S} ${ARC_MEET_Y * S} A ${THREE_POINT_RADIUS * S} ${THREE_POINT_RADIUS * S} 0 0 0 ${CORNER_THREE_X * S} ${ARC_MEET_Y * S}`}
              />
            </g>

            <rect x={-30} y={RIM_SVG_Y - 18} width={60} height={5} fill="#64748b" rx={2} />
            <circle cx={0} cy={RIM_SVG_Y} r={10} fill="#ff6b2c" fillOpacity={0.6} stroke="#ff6b2c" strokeWidth={3} />

            <g data-testid="shot-marker" transform={`translate(${position.x * S}, ${position.y * S})`}>
              <circle r={12} fill={markerColor} stroke="#fff" strokeWidth={3} />
              <line x1={-18} y1={0} x2={18} y2={0} stroke="rgba(255,255,255,0.4)" strokeWidth={1} />
              <line x1={0} y1={-18} x2={0} y2={18} stroke="rgba(255,255,255,0.4)" strokeWidth={1} />
            </g>
          </svg>

          <div className="mt-4 grid grid-cols-2 gap-4">
            <label className="flex flex-col text-sm">
              X position (ft)
              <input
                type="number"
                className="mt-1 rounded border border-slate-600 bg-slate-900 px-2 py-1"
                value={position.x.toFixed(1)}
                step="0.5"
                min={COURT_X_MIN}
                max={COURT_X_MAX}
                onChange={(e) => moveTo({ ...position, x: parseFloat(e.target.value) })}
              />
            </label>
            <label className="flex flex-col text-sm">
              Y position (ft)
              <input
                type="number"
                className="mt-1 rounded border border-slate-600 bg-slate-900 px-2 py-1"
                value={position.y.toFixed(1)}
                step="0.5"
                min={COURT_Y_MIN}
                max={COURT_Y_MAX}
                onChange={(e) => moveTo({ ...position, y: parseFloat(e.target.value) })}
              />
            </label>
          </div>
        </CardContent>
      </Card>

      <Card>
        <CardContent className="space-y-4">
          <div>
            <div className="text-xs uppercase text-slate-400">Shot type (auto)</div>
            <div data-testid="shot-type" className="text-lg font-semibold">
              {shot.shotType}
            </div>
            <div className="text-xs text-slate-400">
              Based on {shot.distance.toFixed(1)} ft from rim • Stats bucket:{" "}
              <span data-testid="distance-zone">{distanceZone(shot.distance)}</span>
            </div>
          </div>

          <div>
            <div className="mb-2 flex items-center gap-2 text-xs uppercase text-slate-400">
              Action type
              <span data-testid="zone-tag" className="rounded bg-slate-700 px-2 py-0.5 normal-case">
                {ZONE_TAGS[shot.zone]}
              </span>
            </div>
            <div className="grid grid-cols-2 gap-2" role="group" aria-label="Action type">
              {availableActions.map((a) => (
                <button
                  key={a}
                  type="button"
                  aria-pressed={activeAction === a}
                  onClick={() => setAction(a)}
                  className={`rounded border px-2 py-1 text-sm ${
                    activeAction === a ? "border-orange-500 bg-orange-500/20" : "border-slate-600"
                  }`}
                >
                  {shortActionLabel(a)}
                </button>
              ))}
            </div>
            {shot.isThreePointer && (
              <p className="mt-2 text-xs text-slate-500">
                * Dunks & layups not available beyond 3-point line
              </p>
            )}
            {shot.zone === "mid" && (
              <p className="mt-2 text-xs text-slate-500">
                * Dunks, layups & tips require close range (&lt;{CLOSE_RANGE_DISTANCE}ft)
              </p>
            )}
          </div>

          <label className="flex flex-col text-sm">
            Season
            <select
              className="mt-1 rounded border border-slate-600 bg-slate-900 px-2 py-1"
              value={year}
              onChange={(e) => setYear(Number(e.target.value))}
            >
              {yearOptions.map((y) => (
                <option key={y} value={y}>
                  {y}
                </option>
              ))}
            </select>
          </label>

          <div>
            <div className="mb-1 flex items-center justify-between text-xs uppercase text-slate-400">
              <span>
                Profile: <span data-testid="profile-name">{selectedPlayer ? selectedPlayer.name : "Global model"}</span>
              </span>
              {selectedPlayer && (
                <button type="button" className="normal-case underline" onClick={() => setSelectedPlayer(null)}>
                  Reset
                </button>
              )}
            </div>
            <PlayerSearch
              onSelect={setSelectedPlayer}
              selectedPlayer={selectedPlayer}
              placeholder="Type a name to personalize the model"
            />
          </div>

          <button
            type="button"
            className="w-full rounded bg-orange-500 px-4 py-2 font-semibold text-white disabled:opacity-60"
            onClick={() => void handlePredict()}
            disabled={loading}
          >
            {loading ? "Calculating..." : "Calculate Probability"}
          </button>

          {error && (
            <div className="rounded border border-red-800 bg-red-950 p-3 text-sm text-red-300">{error}</div>
          )}

          {probability !== null && <ProbabilityResult probability={probability} />}
        </CardContent>
      </Card>
    </div>
  );
}

function ProbabilityResult({ probability }: { probability: number }) {
  const band = probabilityBand(probability);
  return (
    <div data-testid="prediction-result" className="rounded border border-slate-700 p-4 text-center">
      <div className="text-xs uppercase text-slate-400">Make Probability</div>
      <div className="text-4xl font-bold" style={{ color: band.color }}>
        {(probability * 100).toFixed(1)}%
      </div>
      <div className="mt-2 h-2 rounded bg-slate-800">
        <div className="h-2 rounded" style={{ width: `${probability * 100}%`, background: band.color }} />
      </div>
      <div className="mt-2 text-sm text-slate-300">{band.verdict}</div>
    </div>
  );
}
