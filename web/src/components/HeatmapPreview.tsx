import { probabilityColor } from "@/lib/heatmap";

interface HeatmapPreviewProps {
  matrix: number[][];
  cellSize?: number;
}

export function HeatmapPreview({ matrix, cellSize = 6 }: HeatmapPreviewProps) {
  if (matrix.length === 0) {
    return <div className="p-6 text-center text-sm text-slate-500">Heatmap will appear here</div>;
  }

  const cols = matrix[0].length;

  return (
    <div
      data-testid="heatmap-grid"
      style={{
        display: "grid",
        width: cols * cellSize,
        gridTemplateColumns: `repeat(${cols}, ${cellSize}px)`,
      }}
    >
      {matrix.flatMap((row, yi) =>
        row.map((value, xi) => (
          <div
            key={`${yi}-${xi}`}
            data-testid="heatmap-cell"
            style={{ width: cellSize, height: cellSize, background: probabilityColor(value) }}
            title={Number.isNaN(value) ? "No prediction" : `P(make): ${(value * 100).toFixed(1)}%`}
          />
        ))
      )}
    </div>
  );
}
