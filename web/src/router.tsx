import { createHashRouter } from "react-router-dom";
import { Layout } from "@/components/Layout";
import HomePage from "@/pages/HomePage";
import PredictPage from "@/pages/PredictPage";
import HeatmapPage from "@/pages/HeatmapPage";
import PlayersPage from "@/pages/PlayersPage";
import PlayerPage from "@/pages/PlayerPage";
import ComparePage from "@/pages/ComparePage";

export const routes = [
  {
    element: <Layout />,
    children: [
      {
        path: "/",
        element: <HomePage />,
      },
      {
        path: "/predict",
        element: <PredictPage />,
      },
      {
        path: "/heatmap",
        element: <HeatmapPage />,
      },
      {
        path: "/players",
        element: <PlayersPage />,
      },
      {
        path: "/players/:playerName",
        element: <PlayerPage />,
      },
      {
        path: "/compare",
        element: <ComparePage />,
      },
    ],
  },
];

export const router = createHashRouter(routes);
