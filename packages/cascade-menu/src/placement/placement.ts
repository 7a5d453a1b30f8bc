import { boundsHeight, type Bounds } from "../geometry/bounds.js";
import {
  isGrowDirectionDirective,
  type GrowDirection,
  type PlacementDirective,
  type PlacementDirectives,
  type PositionDirective,
} from "./directives.js";

export type HorizontalPlacementInput = {
  hotspot: Bounds;
  screen: Bounds;
  /** Left edge of the panel before any directive runs. */
  left: number;
  width: number;
  directives: PlacementDirectives;
  growDirection: GrowDirection;
};

export type HorizontalPlacement = {
  left: number;
  growDirection: GrowDirection;
  /** The directive whose result fit on screen, or null when none did. */
  matched: PositionDirective | null;
};

export type VerticalPlacementInput = {
  top: number;
  height: number;
  screen: Bounds;
};

export type VerticalPlacement =
  | { mode: "fixed"; top: number; height: number; shift: number }
  | { mode: "scroll"; top: number; height: number };

function applyGrowDirective(directive: PlacementDirective, current: GrowDirection): GrowDirection {
  switch (directive) {
    case "switch-grow-left":
      return "left";
    case "switch-grow-right":
      return "right";
    case "toggle-grow-direction":
      return current === "left" ? "right" : "left";
    default:
      return current;
  }
}

function applyPositionDirective(
  directive: PositionDirective,
  left: number,
  width: number,
  hotspot: Bounds,
  screen: Bounds,
): number {
  switch (directive) {
    case "top-left-to-bottom-left":
      return hotspot.left;
    case "top-right-to-bottom-right":
      return hotspot.right - width;
    case "top-left-to-top-right":
    case "bottom-left-to-bottom-right":
    case "align-left-edge-near-right":
      return hotspot.right;
    case "top-right-to-top-left":
    case "bottom-right-to-bottom-left":
    case "align-right-edge-near-left":
      return hotspot.left - width;
    case "flush-left":
      return screen.left;
    case "flush-right":
      return screen.right - width;
    case "fit-in-bounds":
      return left;
  }
}

export function fitsHorizontally(left: number, width: number, screen: Bounds): boolean {
  return left >= screen.left && left + width <= screen.right;
}

/**
 * Runs the directive list in order and stops at the first position that keeps the
 * panel horizontally on screen. Grow-direction directives update the returned
 * direction and are never fit-tested. When nothing fits, the last applied position
 * stands.
 */
export function resolveHorizontalPlacement(input: HorizontalPlacementInput): HorizontalPlacement {
  let left = input.left;
  let growDirection = input.growDirection;

  for (const directive of input.directives) {
    if (isGrowDirectionDirective(directive)) {
      growDirection = applyGrowDirective(directive, growDirection);
      continue;
    }

    left = applyPositionDirective(directive, left, input.width, input.hotspot, input.screen);
    if (directive === "fit-in-bounds" || fitsHorizontally(left, input.width, input.screen)) {
      return { left, growDirection, matched: directive };
    }
  }

  return { left, growDirection, matched: null };
}

/**
 * Pins the right edge to the screen when the panel overflows it, then pins the left
 * edge when the panel starts off the left side.
 */
export function clampHorizontal(left: number, width: number, screen: Bounds): number {
  let clamped = left;
  if (clamped + width > screen.right) clamped = screen.right - width;
  if (clamped < screen.left) clamped = screen.left;
  return clamped;
}

/**
 * Top edge a panel starts from, chosen by the first position-affecting directive.
 * Only the top-to-top pair starts level with the hotspot; everything else starts
 * below it.
 */
export function initialTop(directives: PlacementDirectives, hotspot: Bounds): number {
  const first = directives.find((directive) => !isGrowDirectionDirective(directive));
  switch (first) {
    case "top-left-to-top-right":
    case "top-right-to-top-left":
      return hotspot.top;
    default:
      return hotspot.bottom;
  }
}

/**
 * Panels taller than the screen switch to scroll mode and take the full screen
 * height; otherwise a panel hanging off the bottom is shifted up by the overflow.
 */
export function resolveVerticalPlacement(input: VerticalPlacementInput): VerticalPlacement {
  const screenHeight = boundsHeight(input.screen);
  if (input.height > screenHeight) {
    return { mode: "scroll", top: input.screen.top, height: screenHeight };
  }

  const overflow = input.top + input.height - input.screen.bottom;
  if (overflow > 0) {
    return { mode: "fixed", top: input.top - overflow, height: input.height, shift: overflow };
  }
  return { mode: "fixed", top: input.top, height: input.height, shift: 0 };
}
