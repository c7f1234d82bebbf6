import { PredictPanel } from "@/components/PredictPanel";

export default function PredictPage() {
  return (
    <div>
      <h1 className="mb-4 text-3xl font-bold">Shot Predictor</h1>
      <PredictPanel />
    </div>
  );
}
