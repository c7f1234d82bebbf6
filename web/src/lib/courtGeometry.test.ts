import { describe, it, expect } from "vitest";
import {
  ARC_MEET_Y,
  actionsForZone,
  clampCourtPosition,
  classifyShot,
  distanceFromRim,
  distanceZone,
  isCornerThree,
  svgClickToFeet,
} from "./courtGeometry";

describe("court geometry", () => {
  describe("distanceFromRim", () => {
    it("is zero at the rim", () => {
      expect(distanceFromRim(0, 1)).toBe(0);
    });

    it("measures from the rim, not the baseline", () => {
      expect(distanceFromRim(3, 5)).toBe(5);
    });
  });

  it("meets the corner lines just under 10 ft from the baseline", () => {
    expect(ARC_MEET_Y).toBeCloseTo(9.948, 3);
  });

  describe("classifyShot", () => {
    it("treats a shot 4 ft from the rim as close range", () => {
      const shot = classifyShot(0, 5);
      expect(shot.distance).toBe(4);
      expect(shot.zone).toBe("close");
      expect(shot.isCloseRange).toBe(true);
      expect(shot.shotType).toBe("2PT Field Goal");
    });

    it("treats an elbow jumper as mid range", () => {
      const shot = classifyShot(0, 20);
      expect(shot.distance).toBe(19);
      expect(shot.zone).toBe("mid");
      expect(shot.isThreePointer).toBe(false);
    });

    it("counts a shot beyond the arc as a three", () => {
      const shot = classifyShot(0, 25);
      expect(shot.zone).toBe("three");
      expect(shot.shotType).toBe("3PT Field Goal");
    });

    it("counts a corner shot inside the arc radius as a three", () => {
      expect(distanceFromRim(22.5, 3)).toBeLessThan(23.75);
      expect(isCornerThree(22.5, 3)).toBe(true);
      expect(classifyShot(22.5, 3).zone).toBe("three");
    });

    it("keeps a wing shot just inside the corner line as a two", () => {
      const shot = classifyShot(21.9, 9);
      expect(shot.isThreePointer).toBe(false);
      expect(shot.zone).toBe("mid");
    });

    it("stops treating the corner line as a three above the arc junction", () => {
      expect(isCornerThree(22, 9.9)).toBe(true);
      expect(isCornerThree(22, 10)).toBe(false);
    });
  });

  describe("actionsForZone", () => {
    it("offers layups and jumpers at close range", () => {
      const actions = actionsForZone("close");
      expect(actions).toHaveLength(10);
      expect(actions).toContain("Layup Shot");
      expect(actions).toContain("Jump Shot");
    });

    it("drops close-range actions beyond the arc", () => {
      const actions = actionsForZone("three");
      expect(actions).not.toContain("Dunk Shot");
      expect(actions).not.toContain("Hook Shot");
      expect(actions).toContain("Step Back Jump Shot");
    });
  });

  describe("clampCourtPosition", () => {
    it("clamps to the court bounds", () => {
      expect(clampCourtPosition({ x: 30, y: -5 })).toEqual({ x: 25, y: 0 });
      expect(clampCourtPosition({ x: -40, y: 50 })).toEqual({ x: -25, y: 42 });
    });

    it("replaces non-numeric input with 0", () => {
      expect(clampCourtPosition({ x: Number.NaN, y: 12 })).toEqual({ x: 0, y: 12 });
    });
  });

  describe("svgClickToFeet", () => {
    const rect = { left: 0, top: 0, width: 500, height: 470 };

    function expectFeet(actual: { x: number; y: number } | null, x: number, y: number) {
      expect(actual).not.toBeNull();
      expect(actual?.x).toBeCloseTo(x, 6);
      expect(actual?.y).toBeCloseTo(y, 6);
    }

    it("maps the rendered court back to feet", () => {
      expectFeet(svgClickToFeet(250, 50, rect), 0, 0);
      expectFeet(svgClickToFeet(250, 100, rect), 0, 5);
      expectFeet(svgClickToFeet(500, 470, rect), 25, 42);
    });

    it("accounts for the element's offset and scaling", () => {
      const scaled = { left: 100, top: 20, width: 250, height: 235 };
      expectFeet(svgClickToFeet(225, 80, scaled), 0, 7);
    });

    it("clamps clicks behind the baseline", () => {
      expectFeet(svgClickToFeet(0, 0, rect), -25, 0);
    });

    it("returns null when the court has no size", () => {
      expect(svgClickToFeet(10, 10, { left: 0, top: 0, width: 0, height: 0 })).toBeNull();
    });
  });

  describe("distanceZone", () => {
    it("uses inclusive upper bounds", () => {
      expect(distanceZone(0)).toBe("Paint (0-5ft)");
      expect(distanceZone(5)).toBe("Paint (0-5ft)");
      expect(distanceZone(5.1)).toBe("Short (5-10ft)");
      expect(distanceZone(15)).toBe("Mid (10-15ft)");
      expect(distanceZone(22)).toBe("Long 2 (15-22ft)");
      expect(distanceZone(22.1)).toBe("3PT (22+ft)");
    });
  });
});
