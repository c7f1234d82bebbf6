import { useMemo, useState } from "react";
import { HeatmapPreview } from "@/components/HeatmapPreview";
import { Card, CardContent, CardHeader, CardTitle } from "@/components/ui/card";
import { predictGrid } from "@/lib/api";
import { DEFAULT_PREDICTION_YEAR } from "@/lib/config";
import { gridToMatrix } from "@/lib/heatmap";
import type { GridRequest } from "@/types/api";

export const DEFAULT_GRID_REQUEST: Required<GridRequest> = {
  x_min: -25,
  x_max: 25,
  y_min: 0,
  y_max: 42,
  x_steps: 50,
  y_steps: 42,
  YEAR: DEFAULT_PREDICTION_YEAR,
  SHOT_TYPE: "3PT Field Goal",
  ACTION_TYPE: "Jump Shot",
};

type NumericField = "x_min" | "x_max" | "x_steps" | "y_min" | "y_max" | "y_steps" | "YEAR";
type TextField = "SHOT_TYPE" | "ACTION_TYPE";

const NUMERIC_FIELDS: NumericField[] = ["x_min", "x_max", "x_steps", "y_min", "y_max", "y_steps", "YEAR"];
const TEXT_FIELDS: TextField[] = ["SHOT_TYPE", "ACTION_TYPE"];

// Step counts size the grid, so they must be whole and positive
const STEP_FIELDS: ReadonlySet<NumericField> = new Set<NumericField>(["x_steps", "y_steps"]);

function isValidFieldValue(field: NumericField, value: number): boolean {
  if (!Number.isFinite(value)) return false;
  return !STEP_FIELDS.has(field) || (Number.isInteger(value) && value >= 1);
}

interface GridResult {
  probabilities: number[];
  xSteps: number;
  ySteps: number;
}

export function HeatmapPanel() {
  const [request, setRequest] = useState<Required<GridRequest>>(DEFAULT_GRID_REQUEST);
  const [result, setResult] = useState<GridResult | null>(null);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);

  const matrix = useMemo(
    () => (result ? gridToMatrix(result.probabilities, result.xSteps, result.ySteps) : []),
    [result]
  );

  const handleGenerate = async () => {
    setLoading(true);
    setError(null);
    try {
      const res = await predictGrid(request);
      setResult({
        probabilities: res.probabilities,
        xSteps: request.x_steps,
        ySteps: request.y_steps,
      });
    } catch (err) {
      console.error("Grid prediction failed:", err);
      setError("Unable to generate heatmap. Please try again.");
    } finally {
      setLoading(false);
    }
  };

  return (
    <Card>
      <CardHeader>
        <CardTitle>Expected FG% Heatmap</CardTitle>
      </CardHeader>
      <CardContent>
        <div className="grid grid-cols-3 gap-3">
          {NUMERIC_FIELDS.map((field) => (
            <label key={field} className="flex flex-col text-xs">
              {field}
              <input
                type="number"
                className="mt-1 rounded border border-slate-600 bg-slate-900 px-2 py-1 text-sm"
                min={STEP_FIELDS.has(field) ? 1 : undefined}
                step={STEP_FIELDS.has(field) ? 1 : undefined}
                value={request[field]}
                onChange={(e) => {
                  const value = parseFloat(e.target.value);
                  if (isValidFieldValue(field, value)) setRequest({ ...request, [field]: value });
                }}
              />
            </label>
          ))}
          {TEXT_FIELDS.map((field) => (
            <label key={field} className="flex flex-col text-xs">
              {field}
              <input
                type="text"
                className="mt-1 rounded border border-slate-600 bg-slate-900 px-2 py-1 text-sm"
                value={request[field]}
                onChange={(e) => setRequest({ ...request, [field]: e.target.value })}
              />
            </label>
          ))}
        </div>

        <button
          type="button"
          className="my-4 rounded bg-orange-500 px-4 py-2 font-semibold text-white disabled:opacity-60"
          onClick={() => void handleGenerate()}
          disabled={loading}
        >
          {loading ? "Generating..." : "Generate Heatmap"}
        </button>

        {error && (
          <div className="mb-4 rounded border border-red-800 bg-red-950 p-3 text-sm text-red-300">{error}</div>
        )}

        <HeatmapPreview matrix={matrix} />
      </CardContent>
    </Card>
  );
}
