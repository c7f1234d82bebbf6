import { useNavigate } from "react-router-dom";
import { PlayerSearch } from "@/components/PlayerSearch";
import { Card, CardContent } from "@/components/ui/card";

export function playerPath(name: string): string {
  return `/players/${encodeURIComponent(name)}`;
}

export default function PlayersPage() {
  const navigate = useNavigate();

  return (
    <div className="max-w-xl">
      <h1 className="mb-4 text-3xl font-bold">Players</h1>
      <Card>
        <CardContent>
          <PlayerSearch
            selectedPlayer={null}
            onSelect={(player) => navigate(playerPath(player.name))}
          />
        </CardContent>
      </Card>
    </div>
  );
}
