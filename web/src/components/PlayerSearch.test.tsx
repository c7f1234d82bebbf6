import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { render, screen, waitFor } from "@testing-library/react";
import userEvent from "@testing-library/user-event";
import { PlayerSearch } from "./PlayerSearch";
import { clearApiCache } from "@/lib/api";
import { jsonResponse, requestUrl } from "@/test/test-utils";
import type { Player } from "@/types/api";

const players: Player[] = [
  { name: "Player One", total_shots: 1200, fg_pct: 0.481 },
  { name: "Player Two", total_shots: 800, fg_pct: 0.45 },
];

/** Answers player searches with a case-insensitive substring match */
function stubPlayerSearch(list: Player[]) {
  const fetchMock = vi.fn((input: RequestInfo | URL) => {
    const url = new URL(requestUrl(input), "http://localhost");
    const search = (url.searchParams.get("search") ?? "").toLowerCase();
    return Promise.resolve(
      jsonResponse({ players: list.filter((p) => p.name.toLowerCase().includes(search)) })
    );
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

describe("PlayerSearch", () => {
  beforeEach(() => {
    clearApiCache();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("shows the default list with volume and FG%", async () => {
    stubPlayerSearch(players);
    render(<PlayerSearch onSelect={() => {}} debounceMs={0} />);

    expect(screen.getByRole("status")).toHaveTextContent("Searching...");
    expect(await screen.findByText("Player One")).toBeInTheDocument();
    expect(screen.getByText("1,200 shots")).toBeInTheDocument();
    expect(screen.getByText("48.1%")).toBeInTheDocument();
  });

  it("calls onSelect with the clicked player", async () => {
    stubPlayerSearch(players);
    const onSelect = vi.fn();
    const user = userEvent.setup();
    render(<PlayerSearch onSelect={onSelect} debounceMs={0} />);

    await user.click(await screen.findByRole("button", { name: /Player Two/ }));

    expect(onSelect).toHaveBeenCalledWith(players[1]);
  });

  it("highlights the selected player", async () => {
    stubPlayerSearch(players);
    render(<PlayerSearch onSelect={() => {}} selectedPlayer={players[0]} debounceMs={0} />);

    const selected = await screen.findByRole("button", { name: /Player One/ });
    expect(selected).toHaveAttribute("aria-pressed", "true");
    expect(screen.getByRole("button", { name: /Player Two/ })).toHaveAttribute("aria-pressed", "false");
  });

  it("filters as the user types", async () => {
    stubPlayerSearch(players);
    const user = userEvent.setup();
    render(<PlayerSearch onSelect={() => {}} debounceMs={0} />);
    await screen.findByText("Player One");

    await user.type(screen.getByLabelText("Search players"), "two");

    await waitFor(() => {
      expect(screen.queryByText("Player One")).not.toBeInTheDocument();
    });
    expect(screen.getByText("Player Two")).toBeInTheDocument();
  });

  it("shows an empty state", async () => {
    stubPlayerSearch([]);
    render(<PlayerSearch onSelect={() => {}} debounceMs={0} />);

    expect(await screen.findByText("No players found")).toBeInTheDocument();
  });

  it("shows an error when the search fails", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    vi.stubGlobal("fetch", vi.fn(() => Promise.resolve(jsonResponse({ detail: "down" }, 500))));
    render(<PlayerSearch onSelect={() => {}} debounceMs={0} />);

    expect(await screen.findByText("Unable to load players.")).toBeInTheDocument();
    expect(screen.queryByText("No players found")).not.toBeInTheDocument();
  });
});
