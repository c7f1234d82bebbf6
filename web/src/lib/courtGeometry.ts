/**
 * Half-court geometry for the prediction court
 *
 * Coordinates are in feet with x across the court (0 = center line of the
 * basket) and y away from the baseline. The rim sits at (0, RIM_Y).
 */

import type { ShotTypeLabel } from "@/types/api";

export const RIM_Y = 1;
export const THREE_POINT_RADIUS = 23.75;
export const CORNER_THREE_X = 22;
export const CLOSE_RANGE_DISTANCE = 8;

export const COURT_X_MIN = -25;
export const COURT_X_MAX = 25;
export const COURT_Y_MIN = 0;
export const COURT_Y_MAX = 42;

/** SVG units per foot */
export const SVG_SCALE = 10;

export const COURT_VIEW_BOX = {
  x: -250,
  y: -50,
  width: 500,
  height: 470,
} as const;

/** y where the 3PT arc meets the straight corner lines (~9.95 ft) */
export const ARC_MEET_Y =
  RIM_Y + Math.sqrt(THREE_POINT_RADIUS ** 2 - CORNER_THREE_X ** 2);

export const CLOSE_RANGE_ACTIONS = [
  "Layup Shot",
  "Dunk Shot",
  "Driving Layup Shot",
  "Tip Shot",
  "Finger Roll",
] as const;

export const MID_RANGE_ACTIONS = [
  "Jump Shot",
  "Hook Shot",
  "Fadeaway",
  "Floating Jump Shot",
  "Pullup Jump Shot",
] as const;

export const THREE_PT_ACTIONS = [
  "Jump Shot",
  "Fadeaway",
  "Pullup Jump Shot",
  "Step Back Jump Shot",
  "Running Jump Shot",
] as const;

export const DEFAULT_ACTION = "Jump Shot";

export type ShotZone = "three" | "close" | "mid";

export interface CourtPosition {
  x: number;
  y: number;
}

export interface ShotClassification {
  distance: number;
  isThreePointer: boolean;
  isCloseRange: boolean;
  zone: ShotZone;
  shotType: ShotTypeLabel;
}

export function distanceFromRim(x: number, y: number): number {
  return Math.hypot(x, y - RIM_Y);
}

export function isCornerThree(x: number, y: number): boolean {
  return Math.abs(x) >= CORNER_THREE_X && y < ARC_MEET_Y;
}

export function isArcThree(x: number, y: number): boolean {
  return distanceFromRim(x, y) > THREE_POINT_RADIUS;
}

export function classifyShot(x: number, y: number): ShotClassification {
  const distance = distanceFromRim(x, y);
  const isThreePointer = isCornerThree(x, y) || isArcThree(x, y);
  const isCloseRange = distance <= CLOSE_RANGE_DISTANCE;

  let zone: ShotZone = "mid";
  if (isThreePointer) zone = "three";
  else if (isCloseRange) zone = "close";

  return {
    distance,
    isThreePointer,
    isCloseRange,
    zone,
    shotType: isThreePointer ? "3PT Field Goal" : "2PT Field Goal",
  };
}

export function actionsForZone(zone: ShotZone): readonly string[] {
  switch (zone) {
    case "three":
      return THREE_PT_ACTIONS;
    case "close":
      return [...CLOSE_RANGE_ACTIONS, ...MID_RANGE_ACTIONS];
    case "mid":
      return MID_RANGE_ACTIONS;
  }
}

function clamp(value: number, min: number, max: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(min, Math.min(max, value));
}

export function clampCourtPosition({ x, y }: CourtPosition): CourtPosition {
  return {
    x: clamp(x, COURT_X_MIN, COURT_X_MAX),
    y: clamp(y, COURT_Y_MIN, COURT_Y_MAX),
  };
}

export interface ClientRect {
  left: number;
  top: number;
  width: number;
  height: number;
}

/**
 * Convert a click on the rendered court SVG into clamped court feet
 * Returns null when the SVG has no layout size (e.g. not yet mounted)
 */
export function svgClickToFeet(
  clientX: number,
  clientY: number,
  rect: ClientRect
): CourtPosition | null {
  if (rect.width <= 0 || rect.height <= 0) {
    return null;
  }

  const svgX =
    ((clientX - rect.left) / rect.width) * COURT_VIEW_BOX.width + COURT_VIEW_BOX.x;
  const svgY =
    ((clientY - rect.top) / rect.height) * COURT_VIEW_BOX.height + COURT_VIEW_BOX.y;

  return clampCourtPosition({ x: svgX / SVG_SCALE, y: svgY / SVG_SCALE });
}

/**
 * Distance bucket used by the stats service for zone breakdowns
 * Upper bounds are inclusive; the service buckets purely on distance, so a
 * corner three (22 ft) lands in "Long 2"
 */
export function distanceZone(distance: number): string {
  if (distance <= 5) return "Paint (0-5ft)";
  if (distance <= 10) return "Short (5-10ft)";
  if (distance <= 15) return "Mid (10-15ft)";
  if (distance <= 22) return "Long 2 (15-22ft)";
  return "3PT (22+ft)";
}
