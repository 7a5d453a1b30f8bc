import { boundsHeight, boundsWidth, type Bounds, type Frame, type Size } from "./bounds.js";

/**
 * Converts between screen space and the modal surface's local space.
 *
 * Panels are children of the surface, so their frames are surface-local while
 * placement runs against screen edges. The surface may be offset from the screen
 * origin and uniformly scaled (e.g. a canvas rendered at a device pixel ratio).
 */
export class SurfaceSpace {
  readonly scaleX: number;
  readonly scaleY: number;

  constructor(
    readonly screen: Bounds,
    localSize: Size,
  ) {
    this.scaleX = localSize.width > 0 ? boundsWidth(screen) / localSize.width : 1;
    this.scaleY = localSize.height > 0 ? boundsHeight(screen) / localSize.height : 1;
  }

  static of(surface: { getScreenBounds(): Bounds; getFrame(): Frame }): SurfaceSpace {
    const frame = surface.getFrame();
    return new SurfaceSpace(surface.getScreenBounds(), { width: frame.width, height: frame.height });
  }

  toLocalFrame(bounds: Bounds): Frame {
    return {
      x: (bounds.left - this.screen.left) / this.scaleX,
      y: (bounds.top - this.screen.top) / this.scaleY,
      width: boundsWidth(bounds) / this.scaleX,
      height: boundsHeight(bounds) / this.scaleY,
    };
  }

  toScreenWidth(localWidth: number): number {
    return localWidth * this.scaleX;
  }

  toScreenHeight(localHeight: number): number {
    return localHeight * this.scaleY;
  }
}
