import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { fireEvent, render, screen, waitFor } from "@testing-library/react";
import userEvent from "@testing-library/user-event";
import { PredictPanel } from "./PredictPanel";
import { clearApiCache } from "@/lib/api";
import { jsonResponse, requestUrl } from "@/test/test-utils";

interface StubOptions {
  probability?: number;
  predictStatus?: number;
}

function stubServices({ probability = 0.62, predictStatus = 200 }: StubOptions = {}) {
  const fetchMock = vi.fn((input: RequestInfo | URL, _init?: RequestInit) => {
    const url = requestUrl(input);
    if (url === "/api/years") {
      return Promise.resolve(jsonResponse({ years: [2023, 2024] }));
    }
    if (url.startsWith("/api/players")) {
      return Promise.resolve(
        jsonResponse({ players: [{ name: "Player One", total_shots: 500, fg_pct: 0.5 }] })
      );
    }
    if (url === "/api/predict_shot") {
      return Promise.resolve(jsonResponse({ probability_make: probability }, predictStatus));
    }
    return Promise.resolve(jsonResponse({ detail: "Not found" }, 404));
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function predictBodies(fetchMock: ReturnType<typeof stubServices>): string[] {
  return fetchMock.mock.calls
    .filter(([input]) => requestUrl(input) === "/api/predict_shot")
    .map(([, init]) => (typeof init?.body === "string" ? init.body : ""));
}

describe("PredictPanel", () => {
  beforeEach(() => {
    clearApiCache();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("classifies the starting spot", () => {
    stubServices();
    render(<PredictPanel initialPosition={{ x: 0, y: 5 }} />);

    expect(screen.getByTestId("shot-badge")).toHaveTextContent("2PT • 4.0 ft");
    expect(screen.getByTestId("shot-type")).toHaveTextContent("2PT Field Goal");
    expect(screen.getByTestId("zone-tag")).toHaveTextContent("Close Range");
    expect(screen.getByTestId("distance-zone")).toHaveTextContent("Paint (0-5ft)");
    expect(screen.getByTestId("profile-name")).toHaveTextContent("Global model");
  });

  it("predicts a close-range layup for the selected season", async () => {
    const fetchMock = stubServices({ probability: 0.62 });
    const user = userEvent.setup();
    render(<PredictPanel initialPosition={{ x: 0, y: 5 }} />);

    await user.click(screen.getByRole("button", { name: "Layup" }));
    await user.click(screen.getByRole("button", { name: "Calculate Probability" }));

    const result = await screen.findByTestId("prediction-result");
    expect(result).toHaveTextContent("62.0%");
    expect(result).toHaveTextContent("Good shot — high percentage");
    expect(predictBodies(fetchMock)).toEqual([
      '{"LOC_X":0,"LOC_Y":5,"YEAR":2024,"SHOT_TYPE":"2PT Field Goal","ACTION_TYPE":"Layup Shot"}',
    ]);
  });

  it("includes the personalized player in the request", async () => {
    const fetchMock = stubServices({ probability: 0.3 });
    const user = userEvent.setup();
    render(<PredictPanel initialPosition={{ x: 0, y: 25 }} />);

    await user.click(await screen.findByRole("button", { name: /Player One/ }));
    expect(screen.getByTestId("profile-name")).toHaveTextContent("Player One");

    await user.click(screen.getByRole("button", { name: "Calculate Probability" }));

    expect(await screen.findByTestId("prediction-result")).toHaveTextContent(
      "Difficult shot — low percentage"
    );
    expect(predictBodies(fetchMock)).toEqual([
      '{"LOC_X":0,"LOC_Y":25,"YEAR":2024,"SHOT_TYPE":"3PT Field Goal","ACTION_TYPE":"Jump Shot","player_name":"Player One"}',
    ]);
  });

  it("only offers jumpers beyond the arc", () => {
    stubServices();
    render(<PredictPanel initialPosition={{ x: 0, y: 30 }} />);

    expect(screen.getByTestId("shot-badge")).toHaveTextContent("3PT • 29.0 ft");
    expect(screen.queryByRole("button", { name: "Layup" })).not.toBeInTheDocument();
    expect(screen.getByRole("button", { name: "Jump" })).toHaveAttribute("aria-pressed", "true");
  });

  it("clears the result and resets an unavailable action when the spot moves", async () => {
    stubServices();
    const user = userEvent.setup();
    render(<PredictPanel initialPosition={{ x: 0, y: 5 }} />);

    await user.click(screen.getByRole("button", { name: "Layup" }));
    await user.click(screen.getByRole("button", { name: "Calculate Probability" }));
    await screen.findByTestId("prediction-result");

    fireEvent.change(screen.getByLabelText("X position (ft)"), { target: { value: "10" } });

    expect(screen.queryByTestId("prediction-result")).not.toBeInTheDocument();
    expect(screen.getByTestId("zone-tag")).toHaveTextContent("Mid Range");
    expect(screen.getByRole("button", { name: "Jump" })).toHaveAttribute("aria-pressed", "true");
  });

  it("clamps typed coordinates to the court", () => {
    stubServices();
    render(<PredictPanel />);

    fireEvent.change(screen.getByLabelText("X position (ft)"), { target: { value: "40" } });

    expect(screen.getByLabelText("X position (ft)")).toHaveValue(25);
  });

  it("moves the marker to a clicked spot", () => {
    stubServices();
    render(<PredictPanel />);
    expect(screen.getByTestId("shot-badge")).toHaveTextContent("2PT • 14.0 ft");

    const court = screen.getByTestId("predict-court");
    vi.spyOn(court, "getBoundingClientRect").mockReturnValue({
      x: 0,
      y: 0,
      left: 0,
      top: 0,
      right: 500,
      bottom: 470,
      width: 500,
      height: 470,
      toJSON: () => ({}),
    });
    fireEvent.click(court, { clientX: 250, clientY: 100 });

    expect(screen.getByTestId("shot-badge")).toHaveTextContent("2PT • 4.0 ft");
  });

  it("shows an error when the prediction fails", async () => {
    const consoleSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    stubServices({ predictStatus: 500 });
    const user = userEvent.setup();
    render(<PredictPanel />);

    await user.click(screen.getByRole("button", { name: "Calculate Probability" }));

    expect(await screen.findByText("Prediction failed. Please try again.")).toBeInTheDocument();
    expect(consoleSpy).toHaveBeenCalledWith("Shot prediction failed:", expect.any(Error));
    expect(screen.queryByTestId("prediction-result")).not.toBeInTheDocument();
  });

  it("lists the service's seasons", async () => {
    stubServices();
    render(<PredictPanel />);

    await waitFor(() => {
      expect(screen.getAllByRole("option").map((o) => o.textContent)).toEqual(["2023", "2024"]);
    });
    expect(screen.getByLabelText("Season")).toHaveValue("2024");
  });
});
