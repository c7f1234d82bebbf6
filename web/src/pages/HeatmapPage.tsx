import { HeatmapPanel } from "@/components/HeatmapPanel";

export default function HeatmapPage() {
  return (
    <div>
      <h1 className="mb-4 text-3xl font-bold">Expected FG% Heatmap</h1>
      <HeatmapPanel />
    </div>
  );
}
