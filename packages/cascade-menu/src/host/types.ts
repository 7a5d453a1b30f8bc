import type { Bounds, Frame, Size } from "../geometry/bounds.js";
import type { Rgba } from "../style/color.js";

/**
 * Reference to an image the host can draw. Only the intrinsic size matters for
 * layout; `src` is whatever the backend needs to locate the pixels.
 */
export type MenuImage = {
  readonly width: number;
  readonly height: number;
  readonly src?: string;
};

export type FontSpec = {
  family: string;
  sizePx: number;
  weight?: string | number;
};

export type HostTextAlign = "start" | "center" | "end";

export type ControlState = "normal" | "highlighted" | "pressed" | "disabled";

export type ControlStateColors = Record<ControlState, Rgba>;

export type MenuHostEventType = "pointer-enter" | "pointer-down" | "click" | "scroll";

/**
 * Pointer input reported by the host. `targetId` is the id of the widget the
 * pointer interacted with directly (never one of its ancestors).
 */
export type MenuHostEvent = {
  type: MenuHostEventType;
  targetId: string;
};

export type MenuHostEventSink = (event: MenuHostEvent) => void;

export interface MenuWidget {
  readonly id: string;
  readonly isDestroyed: boolean;
  /** Position and size relative to the parent widget. */
  setFrame(frame: Frame): void;
  getFrame(): Frame;
  getScreenBounds(): Bounds;
  setColor(color: Rgba): void;
  /** Moves the widget (and its subtree) under another parent, keeping its local frame. */
  setParent(parent: MenuWidget): void;
  /** Draws this widget above all of its siblings. */
  bringToFront(): void;
  /** Draws this widget directly below `sibling`. */
  placeBehind(sibling: MenuWidget): void;
  /** Destroys the widget and all of its descendants. */
  destroy(): void;
}

export interface MenuLabel extends MenuWidget {
  /** Natural size of the rendered text; available without a layout pass. */
  getPreferredSize(): Size;
}

export interface MenuControl extends MenuWidget {
  setInteractable(interactable: boolean): void;
  isInteractable(): boolean;
  setStateColors(colors: ControlStateColors): void;
  setState(state: ControlState): void;
  getState(): ControlState;
}

export interface MenuScrollView {
  /** Clipping region; scroll events are reported with this widget's id. */
  readonly viewport: MenuWidget;
  /** Scrolled container holding the entries. */
  readonly content: MenuWidget;
  readonly scrollbar: MenuWidget;
  /** 0 shows the top of the content, 1 the bottom. */
  setNormalizedPosition(position: number): void;
  getNormalizedPosition(): number;
  /** Re-reads the content/viewport sizes after the caller changed their frames. */
  refresh(): void;
}

export type SurfaceOptions = {
  color: Rgba;
  visible: boolean;
  sink: MenuHostEventSink;
};

export type PanelOptions = {
  color: Rgba;
  image?: MenuImage | null;
};

export type LabelOptions = {
  text: string;
  font: FontSpec;
  color: Rgba;
  align: HostTextAlign;
};

export type ControlOptions = {
  color: Rgba;
  image?: MenuImage | null;
};

export type ScrollViewOptions = {
  scrollbarWidth: number;
  sensitivity: number;
  trackColor: Rgba;
  thumbColor: Rgba;
  trackImage?: MenuImage | null;
};

/**
 * Retained-mode UI backend the menu engine renders through.
 */
export interface MenuHost {
  /**
   * Creates the full-screen modal surface. Every pointer event for the surface or any
   * widget below it is reported to `options.sink`.
   */
  createSurface(options: SurfaceOptions): MenuWidget;
  createPanel(parent: MenuWidget, options: PanelOptions): MenuWidget;
  createLabel(parent: MenuWidget, options: LabelOptions): MenuLabel;
  createImage(parent: MenuWidget, image: MenuImage): MenuWidget;
  createControl(parent: MenuWidget, options: ControlOptions): MenuControl;
  createScrollView(parent: MenuWidget, options: ScrollViewOptions): MenuScrollView;
}
