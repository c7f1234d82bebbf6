import { Link } from "react-router-dom";
import { Card, CardContent, CardHeader, CardTitle } from "@/components/ui/card";

const TOOLS = [
  {
    to: "/predict",
    title: "Shot make probability",
    body: "Click anywhere on the court, pick a shot and action type, and get a make probability from the model. Optionally personalize it to a single player.",
  },
  {
    to: "/heatmap",
    title: "Expected FG% heatmap",
    body: "Sweep the model over a grid of court positions for one season, shot type and action.",
  },
  {
    to: "/players",
    title: "Player deep dives",
    body: "Browse a player's shot chart, zone and action splits, and season trends. Filter by season.",
  },
  {
    to: "/compare",
    title: "Head-to-head",
    body: "Compare two players across the seasons they both played.",
  },
];

export default function HomePage() {
  return (
    <div className="space-y-8">
      <section className="py-6">
        <div className="text-xs uppercase tracking-widest text-orange-400">Data + Hoops</div>
        <h1 className="mb-3 text-4xl font-bold">NBA shot analysis and prediction</h1>
        <p className="max-w-2xl text-slate-300">
          Explore historical NBA shot logs, forecast make probabilities anywhere on the floor, and
          compare shooters across eras.
        </p>
        <div className="mt-4 flex gap-3">
          <Link to="/players" className="rounded bg-orange-500 px-4 py-2 font-semibold text-white">
            Analyze players
          </Link>
          <Link to="/predict" className="rounded border border-slate-600 px-4 py-2">
            Predict a shot
          </Link>
        </div>
      </section>

      <section className="grid gap-4 md:grid-cols-2">
        {TOOLS.map((tool) => (
          <Link key={tool.to} to={tool.to} className="block">
            <Card className="h-full hover:border-orange-500">
              <CardHeader>
                <CardTitle>{tool.title}</CardTitle>
              </CardHeader>
              <CardContent className="text-sm text-slate-400">{tool.body}</CardContent>
            </Card>
          </Link>
        ))}
      </section>
    </div>
  );
}
