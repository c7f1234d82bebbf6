import { useMemo, useState } from "react";
import { ShotDetailCard } from "@/components/ShotDetailCard";
import { ShotDot } from "@/components/ShotDot";
import { Popover, PopoverAnchor, PopoverContent } from "@/components/ui/popover";
import { DEFAULT_BIN_OPTIONS, binShots, type BinOptions } from "@/lib/heatmap";
import { formatPct } from "@/lib/format";
import type { Shot } from "@/types/api";

// NBA half court in feet, baseline at y = 0
const COURT = {
  width: 50,
  viewLength: 47,
  rimFromBaseline: 5.25,
  rimRadius: 0.75,
  backboardFromBaseline: 4,
  paintWidth: 16,
  paintLength: 19,
  ftCircleRadius: 6,
  restrictedRadius: 4,
  threePointRadius: 23.75,
  cornerX: 22,
};

const S = 10;
const VIEW = {
  x: (-COURT.width / 2) * S,
  y: 0,
  width: COURT.width * S,
  height: COURT.viewLength * S,
};

const ARC_MEET_Y =
  COURT.rimFromBaseline + Math.sqrt(COURT.threePointRadius ** 2 - COURT.cornerX ** 2);

type ChartMode = "dots" | "bins";

interface ShotChartProps {
  shots: Shot[];
  binOptions?: BinOptions;
}

/** Red (cold) to green (hot) for binned FG% */
function fgToColor(fg: number): string {
  const clamped = Math.max(0, Math.min(1, fg));
  const r = Math.round(255 * (1 - clamped));
  const g = Math.round(255 * clamped);
  return `rgba(${r},${g},120,0.8)`;
}

export function ShotChart({ shots, binOptions = DEFAULT_BIN_OPTIONS }: ShotChartProps) {
  const [mode, setMode] = useState<ChartMode>("dots");
  const [selected, setSelected] = useState<Shot | null>(null);

  const bins = useMemo(
    () => (mode === "bins" ? binShots(shots, binOptions) : []),
    [mode, shots, binOptions]
  );
  const maxAttempts = bins.reduce((max, b) => Math.max(max, b.attempts), 0);
  const xStep = (binOptions.xRange[1] - binOptions.xRange[0]) / binOptions.xBins;
  const yStep = (binOptions.yRange[1] - binOptions.yRange[0]) / binOptions.yBins;

  // A selection from a previous shot log is dropped
  const selectedShot = selected && shots.includes(selected) ? selected : undefined;
  const rimY = COURT.rimFromBaseline * S;

  return (
    <div>
      <div className="mb-2 flex gap-2" role="group" aria-label="Chart mode">
        <button
          type="button"
          aria-pressed={mode === "dots"}
          className={`rounded px-3 py-1 text-xs ${mode === "dots" ? "bg-orange-500 text-white" : "bg-slate-700"}`}
          onClick={() => setMode("dots")}
        >
          Shots
        </button>
        <button
          type="button"
          aria-pressed={mode === "bins"}
          className={`rounded px-3 py-1 text-xs ${mode === "bins" ? "bg-orange-500 text-white" : "bg-slate-700"}`}
          onClick={() => {
            setMode("bins");
            setSelected(null);
          }}
        >
          Heatmap
        </button>
        <span className="ml-auto text-xs text-slate-400">{shots.length.toLocaleString("en-US")} shots</span>
      </div>

      <Popover
        open={selectedShot !== undefined}
        onOpenChange={(open) => {
          if (!open) setSelected(null);
        }}
      >
        <div className="relative">
          <svg
            data-testid="shot-chart"
            viewBox={`${VIEW.x} ${VIEW.y} ${VIEW.width} ${VIEW.height}`}
            preserveAspectRatio="xMidYMid meet"
            className="w-full rounded"
          >
            <rect x={VIEW.x} y={VIEW.y} width={VIEW.width} height={VIEW.height} fill="#11131c" />

            <g stroke="#2f3545" strokeWidth={2} fill="none">
              <line x1={VIEW.x} y1={0} x2={-VIEW.x} y2={0} />
              <line x1={VIEW.x} y1={0} x2={VIEW.x} y2={VIEW.height} />
              <line x1={-VIEW.x} y1={0} x2={-VIEW.x} y2={VIEW.height} />
              <rect
                x={(-COURT.paintWidth / 2) * S}
                y={0}
                width={COURT.paintWidth * S}
                height={COURT.paintLength * S}
              />
              <rect x={-6 * S} y={0} width={12 * S} height={COURT.paintLength * S} />
              <path
                d={`M ${-COURT.ftCircleRadius * S} ${COURT.paintLength * S} A ${COURT.ftCircleRadius * S} ${COURT.ftCircleRadius * S} 0 0 0 ${COURT.ftCircleRadius * S} ${COURT.paintLength * S}`}
              />
              <path
                d={`M ${-COURT.restrictedRadius * S} ${rimY} A ${COURT.restrictedRadius * S} ${COURT.restrictedRadius * S} 0 0 0 ${COURT.restrictedRadius * S} ${rimY}`}
              />
              <line x1={-COURT.cornerX * S} y1={0} x2={-COURT.cornerX * S} y2={ARC_MEET_Y * S} />
              <line x1={COURT.cornerX * S} y1={0} x2={COURT.cornerX * S} y2={ARC_MEET_Y * S} />
              <path
                d={`M ${-COURT.cornerX * S} ${ARC_MEET_Y * S} A ${COURT.threePointRadius * S} ${COURT.threePointRadius * S} 0 0 0 ${COURT.cornerX * S} ${ARC_MEET_Y * S}`}
              />
            </g>

            <rect x={-3 * S} y={COURT.backboardFromBaseline * S - 3} width={6 * S} height={5} fill="#6b7280" rx={1} />
            <circle
              cx={0}
              cy={rimY}
              r={COURT.rimRadius * S + 2}
              fill="rgba(255, 107, 44, 0.4)"
              stroke="#ff6b2c"
              strokeWidth={3}
            />

            {mode === "bins"
              ? bins.map((b) => {
                  const scale = 0.4 + 0.6 * (b.attempts / maxAttempts);
                  return (
                    <rect
                      key={`${b.xBin}:${b.yBin}`}
                      data-testid="shot-bin"
                      x={(binOptions.xRange[0] + b.xBin * xStep) * S}
                      y={(binOptions.yRange[0] + b.yBin * yStep) * S}
                      width={xStep * S}
                      height={yStep * S}
                      fill={fgToColor(b.fgPct)}
                      fillOpacity={0.85 * scale}
                    >
                      <title>{`${b.attempts} attempts, ${formatPct(b.fgPct)}`}</title>
                    </rect>
                  );
                })
              : shots.map((shot, idx) => (
                  <ShotDot
                    key={idx}
                    shot={shot}
                    scale={S}
                    active={selectedShot === shot}
                    onSelect={() => setSelected(shot)}
                  />
                ))}
          </svg>

          {selectedShot && (
            <PopoverAnchor asChild>
              <div
                aria-hidden="true"
                style={{
                  position: "absolute",
                  left: `${((selectedShot.LOC_X * S - VIEW.x) / VIEW.width) * 100}%`,
                  top: `${((selectedShot.LOC_Y * S - VIEW.y) / VIEW.height) * 100}%`,
                  width: 1,
                  height: 1,
                }}
              />
            </PopoverAnchor>
          )}
        </div>

        <PopoverContent side="right">
          {selectedShot && <ShotDetailCard shot={selectedShot} />}
        </PopoverContent>
      </Popover>

      <div className="mt-2 flex gap-4 text-xs text-slate-400">
        {mode === "bins" ? (
          <>
            <span>Red: lower FG%</span>
            <span>Green: higher FG%</span>
          </>
        ) : (
          <>
            <span className="text-green-400">● Made</span>
            <span className="text-red-400">● Missed</span>
          </>
        )}
      </div>
    </div>
  );
}
