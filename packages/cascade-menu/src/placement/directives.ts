export type GrowDirection = "left" | "right";

/**
 * Directives that only change the session's grow direction. They never move the
 * panel and are never fit-tested.
 */
export type GrowDirectionDirective = "switch-grow-left" | "switch-grow-right" | "toggle-grow-direction";

/**
 * Directives that move the panel horizontally. Corner names read "panel corner to
 * hotspot corner"; vertical placement is resolved separately.
 */
export type PositionDirective =
  | "top-left-to-bottom-left"
  | "top-right-to-bottom-right"
  | "top-left-to-top-right"
  | "top-right-to-top-left"
  | "bottom-left-to-bottom-right"
  | "bottom-right-to-bottom-left"
  | "align-right-edge-near-left"
  | "align-left-edge-near-right"
  | "flush-left"
  | "flush-right"
  /** Accepts wherever the panel currently is. Anything after it is never reached. */
  | "fit-in-bounds";

export type PlacementDirective = GrowDirectionDirective | PositionDirective;

export type PlacementDirectives = readonly PlacementDirective[];

export function isGrowDirectionDirective(directive: PlacementDirective): directive is GrowDirectionDirective {
  return (
    directive === "switch-grow-left" || directive === "switch-grow-right" || directive === "toggle-grow-direction"
  );
}

const DROPDOWN_GROWING_RIGHT: PlacementDirectives = Object.freeze([
  "top-left-to-bottom-left",
  "switch-grow-left",
  "top-right-to-bottom-right",
  "flush-right",
  "switch-grow-left",
  "flush-left",
  "fit-in-bounds",
] as const);

const DROPDOWN_GROWING_LEFT: PlacementDirectives = Object.freeze([
  "top-right-to-bottom-right",
  "switch-grow-right",
  "top-left-to-bottom-left",
  "flush-left",
  "fit-in-bounds",
] as const);

const SUBMENU_GROWING_RIGHT: PlacementDirectives = Object.freeze([
  "top-left-to-top-right",
  "switch-grow-left",
  "top-right-to-top-left",
  "flush-right",
  "flush-left",
  "fit-in-bounds",
] as const);

const SUBMENU_GROWING_LEFT: PlacementDirectives = Object.freeze([
  "top-right-to-top-left",
  "switch-grow-right",
  "top-left-to-top-right",
  "flush-left",
  "fit-in-bounds",
] as const);

/**
 * Placement attempts for a menu dropped below its invoker (or opened at a point).
 */
export function dropdownDirectives(direction: GrowDirection): PlacementDirectives {
  return direction === "left" ? DROPDOWN_GROWING_LEFT : DROPDOWN_GROWING_RIGHT;
}

/**
 * Placement attempts for a submenu cascading sideways from its parent entry.
 */
export function submenuDirectives(direction: GrowDirection): PlacementDirectives {
  return direction === "left" ? SUBMENU_GROWING_LEFT : SUBMENU_GROWING_RIGHT;
}
