import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { fireEvent, render, screen } from "@testing-library/react";
import userEvent from "@testing-library/user-event";
import { HeatmapPanel } from "./HeatmapPanel";
import { HeatmapPreview } from "./HeatmapPreview";
import { clearApiCache } from "@/lib/api";
import { jsonResponse } from "@/test/test-utils";

describe("HeatmapPreview", () => {
  it("shows a placeholder before a grid is generated", () => {
    render(<HeatmapPreview matrix={[]} />);
    expect(screen.getByText("Heatmap will appear here")).toBeInTheDocument();
  });

  it("renders one cell per value, row by row", () => {
    render(<HeatmapPreview matrix={[[0.5, Number.NaN]]} />);

    const cells = screen.getAllByTestId("heatmap-cell");
    expect(cells.map((c) => c.getAttribute("title"))).toEqual(["P(make): 50.0%", "No prediction"]);
  });
});

describe("HeatmapPanel", () => {
  beforeEach(() => {
    clearApiCache();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("requests a grid and renders the reshaped result", async () => {
    const fetchMock = vi.fn((_input: RequestInfo | URL, _init?: RequestInit) =>
      Promise.resolve(jsonResponse({ grid: [], probabilities: [0.1, 0.2, 0.3, 0.4] }))
    );
    vi.stubGlobal("fetch", fetchMock);
    const user = userEvent.setup();
    render(<HeatmapPanel />);

    fireEvent.change(screen.getByLabelText("x_steps"), { target: { value: "2" } });
    fireEvent.change(screen.getByLabelText("y_steps"), { target: { value: "2" } });
    await user.click(screen.getByRole("button", { name: "Generate Heatmap" }));

    await screen.findByTestId("heatmap-grid");
    expect(screen.getAllByTestId("heatmap-cell").map((c) => c.getAttribute("title"))).toEqual([
      "P(make): 10.0%",
      "P(make): 30.0%",
      "P(make): 20.0%",
      "P(make): 40.0%",
    ]);

    const body = fetchMock.mock.calls[0]?.[1]?.body;
    expect(typeof body === "string" ? JSON.parse(body) : null).toEqual({
      x_min: -25,
      x_max: 25,
      y_min: 0,
      y_max: 42,
      x_steps: 2,
      y_steps: 2,
      YEAR: 2024,
      SHOT_TYPE: "3PT Field Goal",
      ACTION_TYPE: "Jump Shot",
    });
  });

  it("only accepts whole, positive step counts", () => {
    render(<HeatmapPanel />);
    const xSteps = screen.getByLabelText("x_steps");

    fireEvent.change(xSteps, { target: { value: "0" } });
    expect(xSteps).toHaveValue(50);
    fireEvent.change(xSteps, { target: { value: "-3" } });
    expect(xSteps).toHaveValue(50);
    fireEvent.change(xSteps, { target: { value: "2.5" } });
    expect(xSteps).toHaveValue(50);

    fireEvent.change(xSteps, { target: { value: "12" } });
    expect(xSteps).toHaveValue(12);
    // Other numeric fields still take negatives and fractions
    fireEvent.change(screen.getByLabelText("x_min"), { target: { value: "-12.5" } });
    expect(screen.getByLabelText("x_min")).toHaveValue(-12.5);
  });

  it("shows an error when the grid request fails", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    vi.stubGlobal("fetch", vi.fn(() => Promise.resolve(jsonResponse({ detail: "Not found" }, 404))));
    const user = userEvent.setup();
    render(<HeatmapPanel />);

    await user.click(screen.getByRole("button", { name: "Generate Heatmap" }));

    expect(
      await screen.findByText("Unable to generate heatmap. Please try again.")
    ).toBeInTheDocument();
    expect(screen.getByText("Heatmap will appear here")).toBeInTheDocument();
  });
});
