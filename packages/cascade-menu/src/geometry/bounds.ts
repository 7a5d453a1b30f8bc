export type Point = { x: number; y: number };

export type Size = { width: number; height: number };

/**
 * Axis-aligned rectangle described by its edges. Screen space has its origin at
 * the top-left corner and `y` grows downward.
 */
export type Bounds = { left: number; top: number; right: number; bottom: number };

/**
 * Rectangle relative to a parent widget's top-left corner.
 */
export type Frame = { x: number; y: number; width: number; height: number };

/**
 * Anything a menu can be opened around: a raw pointer position, an invoking
 * element's rectangle, or its edges.
 */
export type HotspotInput = Point | Frame | Bounds;

export function boundsWidth(bounds: Bounds): number {
  return bounds.right - bounds.left;
}

export function boundsHeight(bounds: Bounds): number {
  return bounds.bottom - bounds.top;
}

export function boundsFromPoint(point: Point): Bounds {
  return { left: point.x, top: point.y, right: point.x, bottom: point.y };
}

function boundsFromFrame(frame: Frame): Bounds {
  return {
    left: frame.x,
    top: frame.y,
    right: frame.x + frame.width,
    bottom: frame.y + frame.height,
  };
}

export function toHotspotBounds(input: HotspotInput): Bounds {
  if ("left" in input) return { left: input.left, top: input.top, right: input.right, bottom: input.bottom };
  if ("width" in input) return boundsFromFrame(input);
  return boundsFromPoint(input);
}

export function isFiniteBounds(bounds: Bounds): boolean {
  return (
    Number.isFinite(bounds.left) &&
    Number.isFinite(bounds.top) &&
    Number.isFinite(bounds.right) &&
    Number.isFinite(bounds.bottom)
  );
}
