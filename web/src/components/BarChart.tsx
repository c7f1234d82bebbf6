import { formatPct } from "@/lib/format";

export interface BarChartDatum {
  label: string;
  value: number;
  maxValue?: number;
}

interface BarChartProps {
  data: BarChartDatum[];
  title?: string;
  variant?: "orange" | "blue";
  formatValue?: (value: number) => string;
  alignRight?: boolean;
}

const FILL_COLORS = {
  orange: "#ff6b2c",
  blue: "#00d4ff",
};

export function BarChart({
  data,
  title,
  variant = "orange",
  formatValue = formatPct,
  alignRight = false,
}: BarChartProps) {
  // Bars scale to the largest explicit max (or value); the floor avoids /0
  const maxVal = Math.max(...data.map((d) => d.maxValue ?? d.value), 0.01);

  return (
    <figure className="rounded-lg border border-slate-700 p-3">
      {title && <figcaption className="mb-2 text-sm font-semibold text-slate-300">{title}</figcaption>}
      {data.length === 0 && <p className="text-sm text-slate-500">No data</p>}
      <div className="space-y-1">
        {data.map((item) => (
          <div
            key={item.label}
            data-testid="bar-row"
            className={`flex items-center gap-2 ${alignRight ? "flex-row-reverse" : ""}`}
          >
            <span className="w-28 truncate text-xs text-slate-400" title={item.label}>
              {item.label}
            </span>
            <div className="relative h-5 flex-1 rounded bg-slate-800">
              <div
                data-testid="bar-fill"
                className={`h-5 rounded ${alignRight ? "ml-auto" : ""}`}
                style={{
                  width: `${(item.value / maxVal) * 100}%`,
                  background: FILL_COLORS[variant],
                }}
              />
              <span className="absolute inset-y-0 right-2 flex items-center text-xs font-semibold">
                {formatValue(item.value)}
              </span>
            </div>
          </div>
        ))}
      </div>
    </figure>
  );
}
