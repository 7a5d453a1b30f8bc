import { describe, expect, it } from "vitest";

import type { Bounds } from "../../geometry/bounds.js";
import { dropdownDirectives, submenuDirectives, type GrowDirection, type PlacementDirectives } from "../directives.js";
import {
  clampHorizontal,
  initialTop,
  resolveHorizontalPlacement,
  resolveVerticalPlacement,
} from "../placement.js";

const SCREEN: Bounds = { left: 0, top: 0, right: 800, bottom: 600 };

function hotspot(left: number, top: number, width: number, height: number): Bounds {
  return { left, top, right: left + width, bottom: top + height };
}

describe("resolveHorizontalPlacement", () => {
  it("keeps the first position that fits", () => {
    const result = resolveHorizontalPlacement({
      hotspot: hotspot(100, 200, 50, 20),
      screen: SCREEN,
      left: 100,
      width: 120,
      directives: dropdownDirectives("right"),
      growDirection: "right",
    });

    expect(result).toEqual({ left: 100, growDirection: "right", matched: "top-left-to-bottom-left" });
  });

  it("flips a dropdown to grow left near the right edge", () => {
    const result = resolveHorizontalPlacement({
      hotspot: hotspot(780, 10, 10, 10),
      screen: SCREEN,
      left: 780,
      width: 100,
      directives: dropdownDirectives("right"),
      growDirection: "right",
    });

    expect(result).toEqual({ left: 690, growDirection: "left", matched: "top-right-to-bottom-right" });
  });

  it("cascades a submenu to the left when the right side is full", () => {
    const result = resolveHorizontalPlacement({
      hotspot: hotspot(650, 40, 100, 20),
      screen: SCREEN,
      left: 650,
      width: 100,
      directives: submenuDirectives("right"),
      growDirection: "right",
    });

    expect(result).toEqual({ left: 550, growDirection: "left", matched: "top-right-to-top-left" });
  });

  it("switches back to growing right when a left-growing submenu hits the left edge", () => {
    const result = resolveHorizontalPlacement({
      hotspot: hotspot(20, 40, 100, 20),
      screen: SCREEN,
      left: 20,
      width: 100,
      directives: submenuDirectives("left"),
      growDirection: "left",
    });

    expect(result).toEqual({ left: 120, growDirection: "right", matched: "top-left-to-top-right" });
  });

  it("never fit-tests grow direction directives", () => {
    const result = resolveHorizontalPlacement({
      hotspot: hotspot(100, 0, 10, 10),
      screen: SCREEN,
      left: 100,
      width: 50,
      directives: ["toggle-grow-direction", "toggle-grow-direction", "toggle-grow-direction", "flush-right"],
      growDirection: "right",
    });

    expect(result).toEqual({ left: 750, growDirection: "left", matched: "flush-right" });
  });

  it("accepts the current position at fit-in-bounds even when it overflows", () => {
    const result = resolveHorizontalPlacement({
      hotspot: hotspot(100, 0, 10, 10),
      screen: SCREEN,
      left: 100,
      width: 900,
      directives: dropdownDirectives("right"),
      growDirection: "right",
    });

    expect(result).toEqual({ left: 0, growDirection: "left", matched: "fit-in-bounds" });
  });

  it("leaves the last applied position when nothing fits and there is no terminal directive", () => {
    const result = resolveHorizontalPlacement({
      hotspot: hotspot(700, 0, 50, 10),
      screen: SCREEN,
      left: 0,
      width: 200,
      directives: ["top-left-to-bottom-left", "align-left-edge-near-right"],
      growDirection: "right",
    });

    expect(result).toEqual({ left: 750, growDirection: "right", matched: null });
  });

  it("places bottom-to-bottom directives beside the hotspot", () => {
    const spot = hotspot(300, 100, 50, 20);
    const base = { hotspot: spot, screen: SCREEN, left: 300, width: 120, growDirection: "right" as const };

    expect(resolveHorizontalPlacement({ ...base, directives: ["bottom-left-to-bottom-right"] })).toEqual({
      left: 350,
      growDirection: "right",
      matched: "bottom-left-to-bottom-right",
    });
    expect(resolveHorizontalPlacement({ ...base, directives: ["bottom-right-to-bottom-left"] })).toEqual({
      left: 180,
      growDirection: "right",
      matched: "bottom-right-to-bottom-left",
    });
  });

  it("places edge alignment directives just outside the hotspot", () => {
    const spot = hotspot(300, 100, 50, 20);
    const base = { hotspot: spot, screen: SCREEN, left: 300, width: 120, growDirection: "left" as const };

    expect(resolveHorizontalPlacement({ ...base, directives: ["align-right-edge-near-left"] })).toEqual({
      left: 180,
      growDirection: "left",
      matched: "align-right-edge-near-left",
    });
    expect(resolveHorizontalPlacement({ ...base, directives: ["align-left-edge-near-right"] })).toEqual({
      left: 350,
      growDirection: "left",
      matched: "align-left-edge-near-right",
    });
  });

  it("falls through an edge alignment that leaves the screen", () => {
    const result = resolveHorizontalPlacement({
      hotspot: hotspot(40, 100, 50, 20),
      screen: SCREEN,
      left: 40,
      width: 120,
      directives: ["align-right-edge-near-left", "switch-grow-right", "align-left-edge-near-right"],
      growDirection: "left",
    });

    expect(result).toEqual({ left: 90, growDirection: "right", matched: "align-left-edge-near-right" });
  });

  it("keeps every panel no wider than the screen on screen after clamping", () => {
    const presets: Array<(direction: GrowDirection) => PlacementDirectives> = [dropdownDirectives, submenuDirectives];

    for (const preset of presets) {
      for (const direction of ["left", "right"] as const) {
        for (let left = 0; left <= 780; left += 60) {
          for (const hotspotWidth of [0, 20, 150]) {
            for (const width of [10, 120, 400, 799, 800]) {
              const spot = hotspot(left, 100, Math.min(hotspotWidth, 800 - left), 20);
              const placed = resolveHorizontalPlacement({
                hotspot: spot,
                screen: SCREEN,
                left: spot.left,
                width,
                directives: preset(direction),
                growDirection: direction,
              });
              const finalLeft = clampHorizontal(placed.left, width, SCREEN);

              expect(finalLeft).toBeGreaterThanOrEqual(SCREEN.left);
              expect(finalLeft + width).toBeLessThanOrEqual(SCREEN.right);
            }
          }
        }
      }
    }
  });
});

describe("clampHorizontal", () => {
  it("pins the right edge, then the left edge", () => {
    expect(clampHorizontal(750, 100, SCREEN)).toBe(700);
    expect(clampHorizontal(-20, 100, SCREEN)).toBe(0);
    expect(clampHorizontal(-20, 900, SCREEN)).toBe(0);
    expect(clampHorizontal(300, 100, SCREEN)).toBe(300);
  });
});

describe("initialTop", () => {
  const spot = hotspot(100, 200, 50, 20);

  it("drops dropdowns below the hotspot", () => {
    expect(initialTop(dropdownDirectives("right"), spot)).toBe(220);
  });

  it("aligns submenus with the top of the invoking entry", () => {
    expect(initialTop(submenuDirectives("left"), spot)).toBe(200);
  });

  it("starts bottom-to-bottom directives below the hotspot", () => {
    expect(initialTop(["switch-grow-left", "bottom-left-to-bottom-right"], spot)).toBe(220);
    expect(initialTop(["bottom-right-to-bottom-left", "fit-in-bounds"], spot)).toBe(220);
  });

  it("starts below the hotspot for edge alignment and flush directives", () => {
    expect(initialTop(["align-right-edge-near-left"], spot)).toBe(220);
    expect(initialTop(["flush-left"], spot)).toBe(220);
    expect(initialTop([], spot)).toBe(220);
  });
});

describe("resolveVerticalPlacement", () => {
  it("keeps panels that fit where they are", () => {
    expect(resolveVerticalPlacement({ top: 100, height: 200, screen: SCREEN })).toEqual({
      mode: "fixed",
      top: 100,
      height: 200,
      shift: 0,
    });
  });

  it("shifts a panel hanging off the bottom up by the overflow", () => {
    expect(resolveVerticalPlacement({ top: 500, height: 200, screen: SCREEN })).toEqual({
      mode: "fixed",
      top: 400,
      height: 200,
      shift: 100,
    });
  });

  it("does not scroll a panel exactly as tall as the screen", () => {
    expect(resolveVerticalPlacement({ top: 30, height: 600, screen: SCREEN })).toEqual({
      mode: "fixed",
      top: 0,
      height: 600,
      shift: 30,
    });
  });

  it("switches taller panels into scroll mode at full screen height", () => {
    expect(resolveVerticalPlacement({ top: 30, height: 601, screen: SCREEN })).toEqual({
      mode: "scroll",
      top: 0,
      height: 600,
    });
  });
});
