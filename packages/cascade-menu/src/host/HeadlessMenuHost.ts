import type { Bounds, Frame, Size } from "../geometry/bounds.js";
import { computeScrollViewLayout, normalizedToOffset, offsetToNormalized } from "../placement/scrollMath.js";
import { WHITE, type Rgba } from "../style/color.js";
import type {
  ControlOptions,
  ControlState,
  ControlStateColors,
  FontSpec,
  HostTextAlign,
  LabelOptions,
  MenuControl,
  MenuHost,
  MenuHostEventSink,
  MenuHostEventType,
  MenuImage,
  MenuLabel,
  MenuScrollView,
  MenuWidget,
  PanelOptions,
  ScrollViewOptions,
  SurfaceOptions,
} from "./types.js";

export type HeadlessWidgetKind =
  | "surface"
  | "panel"
  | "label"
  | "image"
  | "control"
  | "scroll-viewport"
  | "scroll-content"
  | "scrollbar"
  | "scroll-thumb";

export type TextMeasurer = (text: string, font: FontSpec) => Size;

export type HeadlessMenuHostOptions = {
  /** Screen rectangle covered by every surface. Defaults to 800x600 at the origin. */
  screen?: Bounds;
  /** Screen pixels per surface-local unit. */
  scale?: number;
  measureText?: TextMeasurer;
};

/**
 * Rough proportional-font estimate; tests usually inject an exact measurer.
 */
export const estimateTextSize: TextMeasurer = (text, font) => ({
  width: text.length * font.sizePx * 0.5,
  height: Math.ceil(font.sizePx * 1.25),
});

const EMPTY_FRAME: Frame = { x: 0, y: 0, width: 0, height: 0 };

export class HeadlessWidget implements MenuWidget {
  readonly children: HeadlessWidget[] = [];
  color: Rgba;
  image: MenuImage | null = null;

  private frame: Frame = EMPTY_FRAME;
  private destroyedFlag = false;

  constructor(
    protected readonly host: HeadlessMenuHost,
    readonly id: string,
    readonly kind: HeadlessWidgetKind,
    public parent: HeadlessWidget | null,
    color: Rgba = WHITE,
  ) {
    this.color = color;
    parent?.children.push(this);
  }

  get isDestroyed(): boolean {
    return this.destroyedFlag;
  }

  setFrame(frame: Frame): void {
    this.frame = { x: frame.x, y: frame.y, width: frame.width, height: frame.height };
  }

  getFrame(): Frame {
    return { ...this.frame };
  }

  getScreenBounds(): Bounds {
    let x = this.frame.x;
    let y = this.frame.y;
    for (let node = this.parent; node && !(node instanceof HeadlessSurface); node = node.parent) {
      x += node.frame.x;
      y += node.frame.y;
    }

    const surface = owningSurface(this);
    if (!surface) {
      return { left: x, top: y, right: x + this.frame.width, bottom: y + this.frame.height };
    }

    const left = surface.screen.left + x * surface.scale;
    const top = surface.screen.top + y * surface.scale;
    return {
      left,
      top,
      right: left + this.frame.width * surface.scale,
      bottom: top + this.frame.height * surface.scale,
    };
  }

  setColor(color: Rgba): void {
    this.color = color;
  }

  setParent(parent: MenuWidget): void {
    const next = this.host.resolve(parent);
    this.detach();
    this.parent = next;
    next.children.push(this);
  }

  bringToFront(): void {
    const siblings = this.parent?.children;
    if (!siblings) return;
    const index = siblings.indexOf(this);
    if (index === -1) return;
    siblings.splice(index, 1);
    siblings.push(this);
  }

  placeBehind(sibling: MenuWidget): void {
    const target = this.host.resolve(sibling);
    const siblings = this.parent?.children;
    if (!siblings || target.parent !== this.parent) {
      throw new Error(`Widget ${this.id} and ${target.id} are not siblings`);
    }
    if (target === this) return;
    siblings.splice(siblings.indexOf(this), 1);
    siblings.splice(siblings.indexOf(target), 0, this);
  }

  destroy(): void {
    if (this.destroyedFlag) return;
    this.detach();
    this.markDestroyed();
  }

  /** Index among the parent's children; higher draws on top. */
  get siblingIndex(): number {
    return this.parent ? this.parent.children.indexOf(this) : 0;
  }

  *descendants(): Generator<HeadlessWidget> {
    for (const child of this.children) {
      yield child;
      yield* child.descendants();
    }
  }

  private detach(): void {
    const siblings = this.parent?.children;
    if (!siblings) return;
    const index = siblings.indexOf(this);
    if (index !== -1) siblings.splice(index, 1);
  }

  private markDestroyed(): void {
    this.destroyedFlag = true;
    this.host.forget(this);
    for (const child of this.children) child.markDestroyed();
  }
}

function owningSurface(widget: HeadlessWidget): HeadlessSurface | null {
  for (let node: HeadlessWidget | null = widget; node; node = node.parent) {
    if (node instanceof HeadlessSurface) return node;
  }
  return null;
}

export class HeadlessSurface extends HeadlessWidget {
  constructor(
    host: HeadlessMenuHost,
    id: string,
    readonly screen: Bounds,
    readonly scale: number,
    readonly sink: MenuHostEventSink,
    readonly visible: boolean,
    color: Rgba,
  ) {
    super(host, id, "surface", null, color);
    this.setFrame({
      x: 0,
      y: 0,
      width: (screen.right - screen.left) / scale,
      height: (screen.bottom - screen.top) / scale,
    });
  }

  override getScreenBounds(): Bounds {
    return { ...this.screen };
  }
}

export class HeadlessLabel extends HeadlessWidget implements MenuLabel {
  readonly text: string;
  readonly font: FontSpec;
  readonly align: HostTextAlign;

  constructor(host: HeadlessMenuHost, id: string, parent: HeadlessWidget, options: LabelOptions) {
    super(host, id, "label", parent, options.color);
    this.text = options.text;
    this.font = options.font;
    this.align = options.align;
  }

  getPreferredSize(): Size {
    return this.host.measureText(this.text, this.font);
  }
}

export class HeadlessControl extends HeadlessWidget implements MenuControl {
  private interactable = true;
  private state: ControlState = "normal";
  private stateColors: ControlStateColors;

  constructor(host: HeadlessMenuHost, id: string, parent: HeadlessWidget, options: ControlOptions) {
    super(host, id, "control", parent, options.color);
    this.image = options.image ?? null;
    this.stateColors = {
      normal: options.color,
      highlighted: options.color,
      pressed: options.color,
      disabled: options.color,
    };
  }

  setInteractable(interactable: boolean): void {
    this.interactable = interactable;
    this.applyState(interactable ? "normal" : "disabled");
  }

  isInteractable(): boolean {
    return this.interactable;
  }

  setStateColors(colors: ControlStateColors): void {
    this.stateColors = { ...colors };
    this.applyState(this.state);
  }

  setState(state: ControlState): void {
    if (!this.interactable) return;
    this.applyState(state);
  }

  getState(): ControlState {
    return this.state;
  }

  /** Label texts of the widgets inside this control, in creation order. */
  get texts(): string[] {
    const texts: string[] = [];
    for (const widget of this.descendants()) {
      if (widget instanceof HeadlessLabel) texts.push(widget.text);
    }
    return texts;
  }

  private applyState(state: ControlState): void {
    this.state = state;
    this.color = this.stateColors[state];
  }
}

export class HeadlessScrollView implements MenuScrollView {
  readonly viewport: HeadlessWidget;
  readonly content: HeadlessWidget;
  readonly scrollbar: HeadlessWidget;
  readonly thumb: HeadlessWidget;
  readonly sensitivity: number;

  private position = 0;

  constructor(
    host: HeadlessMenuHost,
    private readonly parent: HeadlessWidget,
    private readonly options: ScrollViewOptions,
  ) {
    this.viewport = new HeadlessWidget(host, host.nextId(), "scroll-viewport", parent);
    this.content = new HeadlessWidget(host, host.nextId(), "scroll-content", this.viewport);
    this.scrollbar = new HeadlessWidget(host, host.nextId(), "scrollbar", parent, options.trackColor);
    this.scrollbar.image = options.trackImage ?? null;
    this.thumb = new HeadlessWidget(host, host.nextId(), "scroll-thumb", this.scrollbar, options.thumbColor);
    this.sensitivity = options.sensitivity;
    this.refresh();
  }

  setNormalizedPosition(position: number): void {
    this.position = Number.isFinite(position) ? Math.min(1, Math.max(0, position)) : 0;
    this.refresh();
  }

  getNormalizedPosition(): number {
    return this.position;
  }

  /** Scrolls by whole wheel notches, each worth `sensitivity` pixels. */
  scrollByNotches(notches: number): void {
    const viewportHeight = this.viewport.getFrame().height;
    const contentHeight = this.content.getFrame().height;
    const offset = normalizedToOffset(this.position, contentHeight, viewportHeight) + notches * this.sensitivity;
    this.setNormalizedPosition(offsetToNormalized(offset, contentHeight, viewportHeight));
  }

  refresh(): void {
    const outer = this.parent.getFrame();
    const layout = computeScrollViewLayout({
      outer,
      scrollbarWidth: this.options.scrollbarWidth,
      contentHeight: this.content.getFrame().height,
      position: this.position,
    });

    this.viewport.setFrame(layout.viewport);
    this.scrollbar.setFrame(layout.scrollbar);
    this.content.setFrame(layout.content);
    this.thumb.setFrame(layout.thumb);
  }
}

/**
 * In-memory retained widget tree implementing {@link MenuHost}.
 *
 * Layout and session logic run against it unchanged, which makes it usable for
 * tests and for computing menu geometry without rendering. Input is simulated
 * through {@link pointerEnter}, {@link pointerDown}, {@link click} and the scroll
 * helpers, which report events exactly like a rendering backend would.
 */
export class HeadlessMenuHost implements MenuHost {
  readonly screen: Bounds;
  readonly scale: number;
  readonly surfaces: HeadlessSurface[] = [];

  private readonly widgets = new Map<string, HeadlessWidget>();
  private readonly scrollViews = new Map<string, HeadlessScrollView>();
  private readonly measure: TextMeasurer;
  private idCounter = 0;

  constructor(options: HeadlessMenuHostOptions = {}) {
    this.screen = options.screen ?? { left: 0, top: 0, right: 800, bottom: 600 };
    this.scale = options.scale ?? 1;
    if (!(this.scale > 0)) {
      throw new Error(`scale must be a positive number, got ${this.scale}`);
    }
    this.measure = options.measureText ?? estimateTextSize;
  }

  nextId(): string {
    this.idCounter += 1;
    return `w${this.idCounter}`;
  }

  measureText(text: string, font: FontSpec): Size {
    return this.measure(text, font);
  }

  createSurface(options: SurfaceOptions): HeadlessSurface {
    const surface = new HeadlessSurface(
      this,
      this.nextId(),
      this.screen,
      this.scale,
      options.sink,
      options.visible,
      options.visible ? options.color : { ...options.color, a: 0 },
    );
    this.surfaces.push(surface);
    return this.track(surface);
  }

  createPanel(parent: MenuWidget, options: PanelOptions): HeadlessWidget {
    const panel = new HeadlessWidget(this, this.nextId(), "panel", this.resolve(parent), options.color);
    panel.image = options.image ?? null;
    return this.track(panel);
  }

  createLabel(parent: MenuWidget, options: LabelOptions): HeadlessLabel {
    return this.track(new HeadlessLabel(this, this.nextId(), this.resolve(parent), options));
  }

  createImage(parent: MenuWidget, image: MenuImage): HeadlessWidget {
    const widget = new HeadlessWidget(this, this.nextId(), "image", this.resolve(parent));
    widget.image = image;
    widget.setFrame({ x: 0, y: 0, width: image.width, height: image.height });
    return this.track(widget);
  }

  createControl(parent: MenuWidget, options: ControlOptions): HeadlessControl {
    return this.track(new HeadlessControl(this, this.nextId(), this.resolve(parent), options));
  }

  createScrollView(parent: MenuWidget, options: ScrollViewOptions): HeadlessScrollView {
    const view = new HeadlessScrollView(this, this.resolve(parent), options);
    this.track(view.viewport);
    this.track(view.content);
    this.track(view.scrollbar);
    this.track(view.thumb);
    this.scrollViews.set(view.viewport.id, view);
    return view;
  }

  resolve(widget: MenuWidget): HeadlessWidget {
    const resolved = this.widgets.get(widget.id);
    if (!resolved || resolved !== widget) {
      throw new Error(`Widget ${widget.id} does not belong to this host or was destroyed`);
    }
    return resolved;
  }

  forget(widget: HeadlessWidget): void {
    this.widgets.delete(widget.id);
    this.scrollViews.delete(widget.id);
  }

  get liveSurfaces(): HeadlessSurface[] {
    return this.surfaces.filter((surface) => !surface.isDestroyed);
  }

  get liveWidgetCount(): number {
    return this.widgets.size;
  }

  /** First live label showing exactly `text`. */
  findLabel(text: string): HeadlessLabel | undefined {
    for (const widget of this.widgets.values()) {
      if (widget instanceof HeadlessLabel && widget.text === text) return widget;
    }
    return undefined;
  }

  /** The interactive entry whose main label shows `text`. */
  findControl(text: string): HeadlessControl | undefined {
    for (const widget of this.widgets.values()) {
      if (widget instanceof HeadlessControl && widget.texts[0] === text) return widget;
    }
    return undefined;
  }

  pointerEnter(widget: MenuWidget): void {
    this.deliver(widget, "pointer-enter");
  }

  pointerDown(widget: MenuWidget): void {
    this.deliver(widget, "pointer-down");
  }

  /** A full click: pointer-down followed by click on the same widget. */
  click(widget: MenuWidget): void {
    this.deliver(widget, "pointer-down");
    this.deliver(widget, "click");
  }

  scrollTo(view: MenuScrollView, position: number): void {
    view.setNormalizedPosition(position);
    this.deliver(view.viewport, "scroll");
  }

  wheel(view: MenuScrollView, notches: number): void {
    const headless = this.scrollViews.get(view.viewport.id);
    if (!headless) return;
    headless.scrollByNotches(notches);
    this.deliver(view.viewport, "scroll");
  }

  private deliver(widget: MenuWidget, type: MenuHostEventType): void {
    const target = this.widgets.get(widget.id);
    if (!target) return;

    const surface = owningSurface(target);
    if (!surface) return;

    surface.sink({ type, targetId: target.id });
  }

  private track<T extends HeadlessWidget>(widget: T): T {
    this.widgets.set(widget.id, widget);
    return widget;
  }
}

