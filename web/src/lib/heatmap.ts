/**
 * Helpers for expected-FG% grids and binned shot charts
 */

import type { Shot } from "@/types/api";

const RAMP = ["#2c2c54", "#3a5fcd", "#12d8c4", "#f2d57c", "#f58518"];
export const EMPTY_CELL_COLOR = "#0b0c10";

/**
 * Reshape a flat grid prediction into rows of y, columns of x
 *
 * The service walks x in the outer loop and y in the inner one, so the value
 * for (xi, yi) sits at `xi * ySteps + yi`.
 */
export function gridToMatrix(
  probabilities: readonly number[],
  xSteps: number,
  ySteps: number
): number[][] {
  if (xSteps <= 0 || ySteps <= 0) return [];

  const matrix: number[][] = [];
  for (let yi = 0; yi < ySteps; yi++) {
    const row: number[] = [];
    for (let xi = 0; xi < xSteps; xi++) {
      const value = probabilities[xi * ySteps + yi];
      row.push(value === undefined ? Number.NaN : value);
    }
    matrix.push(row);
  }
  return matrix;
}

function hexToRgb(hex: string): [number, number, number] {
  return [
    parseInt(hex.substring(1, 3), 16),
    parseInt(hex.substring(3, 5), 16),
    parseInt(hex.substring(5, 7), 16),
  ];
}

/**
 * Linear interpolation across the colour ramp; value is clamped to [0, 1]
 */
export function probabilityColor(value: number): string {
  if (Number.isNaN(value)) return EMPTY_CELL_COLOR;

  const v = Math.min(1, Math.max(0, value));
  const scaled = v * (RAMP.length - 1);
  const idx = Math.floor(scaled);
  const t = scaled - idx;
  const [r1, g1, b1] = hexToRgb(RAMP[idx]);
  const [r2, g2, b2] = hexToRgb(RAMP[Math.min(RAMP.length - 1, idx + 1)]);

  const r = Math.round(r1 + (r2 - r1) * t);
  const g = Math.round(g1 + (g2 - g1) * t);
  const b = Math.round(b1 + (b2 - b1) * t);
  return `rgb(${r},${g},${b})`;
}

export interface ShotBin {
  xBin: number;
  yBin: number;
  attempts: number;
  made: number;
  fgPct: number;
}

export interface BinOptions {
  xRange: [number, number];
  yRange: [number, number];
  xBins: number;
  yBins: number;
}

export const DEFAULT_BIN_OPTIONS: BinOptions = {
  xRange: [-25, 25],
  yRange: [0, 47],
  xBins: 25,
  yBins: 24,
};

/**
 * Bucket shots into a regular grid. Shots outside the range are dropped; a
 * shot exactly on the upper edge goes in the last bin.
 */
export function binShots(
  shots: readonly Shot[],
  options: BinOptions = DEFAULT_BIN_OPTIONS
): ShotBin[] {
  const { xRange, yRange, xBins, yBins } = options;
  const xStep = (xRange[1] - xRange[0]) / xBins;
  const yStep = (yRange[1] - yRange[0]) / yBins;
  const counts = new Map<string, ShotBin>();

  for (const shot of shots) {
    if (
      shot.LOC_X < xRange[0] ||
      shot.LOC_X > xRange[1] ||
      shot.LOC_Y < yRange[0] ||
      shot.LOC_Y > yRange[1]
    ) {
      continue;
    }

    const xBin = Math.min(xBins - 1, Math.floor((shot.LOC_X - xRange[0]) / xStep));
    const yBin = Math.min(yBins - 1, Math.floor((shot.LOC_Y - yRange[0]) / yStep));
    const key = `${xBin}:${yBin}`;
    const bin = counts.get(key) ?? { xBin, yBin, attempts: 0, made: 0, fgPct: 0 };
    bin.attempts += 1;
    bin.made += shot.SHOT_MADE_FLAG;
    counts.set(key, bin);
  }

  return [...counts.values()].map((bin) => ({
    ...bin,
    fgPct: bin.made / bin.attempts,
  }));
}
