import { Link, useParams } from "react-router-dom";
import { PlayerStats } from "@/components/PlayerStats";

export default function PlayerPage() {
  const { playerName } = useParams<{ playerName: string }>();

  if (!playerName) {
    return <p>No player selected</p>;
  }

  return (
    <div className="space-y-4">
      <Link to="/players" className="text-sm text-slate-400 hover:text-orange-400">
        ← All players
      </Link>
      {/* Keyed so season filters reset between players */}
      <PlayerStats key={playerName} playerName={playerName} />
    </div>
  );
}
