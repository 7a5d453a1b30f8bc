import type { Frame, Size } from "../geometry/bounds.js";

export interface ScrollbarThumb {
  size: number;
  offset: number;
}

export function maxScrollOffset(contentSize: number, viewportSize: number): number {
  return Math.max(0, Math.max(0, contentSize) - Math.max(0, viewportSize));
}

/**
 * Converts a normalized scroll position (0 = top) into a pixel offset.
 */
export function normalizedToOffset(position: number, contentSize: number, viewportSize: number): number {
  const clamped = Number.isFinite(position) ? Math.min(1, Math.max(0, position)) : 0;
  return clamped * maxScrollOffset(contentSize, viewportSize);
}

export function offsetToNormalized(offset: number, contentSize: number, viewportSize: number): number {
  const max = maxScrollOffset(contentSize, viewportSize);
  if (max === 0) return 0;
  return Math.min(1, Math.max(0, offset / max));
}

export function computeScrollbarThumb(options: {
  scrollPos: number;
  viewportSize: number;
  contentSize: number;
  trackSize: number;
  minThumbSize?: number;
}): ScrollbarThumb {
  const minThumbSize = options.minThumbSize ?? 24;
  const trackSize = Math.max(0, options.trackSize);
  const viewportSize = Math.max(0, options.viewportSize);
  const contentSize = Math.max(0, options.contentSize);
  const maxScroll = maxScrollOffset(contentSize, viewportSize);
  const scrollPos = Math.min(Math.max(0, options.scrollPos), maxScroll);

  if (trackSize === 0) return { size: 0, offset: 0 };
  if (contentSize === 0 || maxScroll === 0) return { size: trackSize, offset: 0 };

  const rawThumbSize = (viewportSize / contentSize) * trackSize;
  const thumbSize = Math.min(trackSize, Math.max(minThumbSize, rawThumbSize));
  const thumbTravel = Math.max(0, trackSize - thumbSize);
  const offset = thumbTravel === 0 ? 0 : (scrollPos / maxScroll) * thumbTravel;

  return { size: thumbSize, offset };
}

export interface ScrollViewLayout {
  /** Pixels of content hidden above the viewport. */
  offset: number;
  viewport: Frame;
  content: Frame;
  scrollbar: Frame;
  /** Relative to the scrollbar. */
  thumb: Frame;
}

/**
 * Frames of a vertical scroll view filling `outer`, with the scrollbar on the right
 * edge and the content shifted up by the scroll offset.
 */
export function computeScrollViewLayout(options: {
  outer: Size;
  scrollbarWidth: number;
  contentHeight: number;
  position: number;
}): ScrollViewLayout {
  const { outer, scrollbarWidth, contentHeight } = options;
  const viewportWidth = Math.max(0, outer.width - scrollbarWidth);
  const offset = normalizedToOffset(options.position, contentHeight, outer.height);
  const thumb = computeScrollbarThumb({
    scrollPos: offset,
    viewportSize: outer.height,
    contentSize: contentHeight,
    trackSize: outer.height,
  });

  return {
    offset,
    viewport: { x: 0, y: 0, width: viewportWidth, height: outer.height },
    // Avoid -0 for an unscrolled view.
    content: { x: 0, y: offset > 0 ? -offset : 0, width: viewportWidth, height: contentHeight },
    scrollbar: { x: viewportWidth, y: 0, width: scrollbarWidth, height: outer.height },
    thumb: { x: 0, y: thumb.offset, width: scrollbarWidth, height: thumb.size },
  };
}

/**
 * Scroll position (normalized, 0 = top) that brings an entry to the middle of the
 * viewport, or `null` when the entry's center is already within the first screenful.
 */
export function computeCenteredScrollPosition(options: {
  entryTop: number;
  entryHeight: number;
  contentHeight: number;
  viewportHeight: number;
}): number | null {
  const center = options.entryTop + options.entryHeight / 2;
  if (center <= options.viewportHeight) return null;

  const max = maxScrollOffset(options.contentHeight, options.viewportHeight);
  if (max === 0) return null;

  const target = center - options.viewportHeight / 2;
  return Math.min(1, Math.max(0, target / max));
}
