import {
  computeScrollViewLayout,
  estimateTextSize,
  normalizedToOffset,
  offsetToNormalized,
  toCssColor,
  type Bounds,
  type ControlOptions,
  type ControlState,
  type ControlStateColors,
  type FontSpec,
  type Frame,
  type LabelOptions,
  type MenuControl,
  type MenuHost,
  type MenuHostEventSink,
  type MenuHostEventType,
  type MenuImage,
  type MenuLabel,
  type MenuScrollView,
  type MenuWidget,
  type PanelOptions,
  type Rgba,
  type ScrollViewOptions,
  type Size,
  type SurfaceOptions,
  type TextMeasurer,
} from "@cascade-menus/core";

export type DomMenuHostOptions = {
  document?: Document;
  /** Element the overlay is appended to. Defaults to `document.body`. */
  container?: HTMLElement;
  measureText?: TextMeasurer;
  /** Screen rectangle the overlay covers. Defaults to the window's inner size. */
  viewport?: () => Bounds;
  testId?: string;
};

const px = (value: number): string => `${value}px`;

export function toCssFont(font: FontSpec): string {
  return `${font.weight ?? "normal"} ${font.sizePx}px ${font.family}`;
}

/**
 * Measures text with a 2D canvas context. Falls back to a size estimate where canvas
 * is unavailable (e.g. jsdom without the `canvas` package).
 */
export function createCanvasTextMeasurer(doc: Document): TextMeasurer {
  let ctx: CanvasRenderingContext2D | null | undefined;
  return (text, font) => {
    if (ctx === undefined) ctx = doc.createElement("canvas").getContext("2d");
    if (!ctx) return estimateTextSize(text, font);
    ctx.font = toCssFont(font);
    return { width: Math.ceil(ctx.measureText(text).width), height: Math.ceil(font.sizePx * 1.25) };
  };
}

function applyImage(element: HTMLElement, image: MenuImage | null | undefined): void {
  if (!image?.src) {
    element.style.backgroundImage = "";
    return;
  }
  element.style.backgroundImage = `url(${JSON.stringify(image.src)})`;
  element.style.backgroundSize = "100% 100%";
}

export class DomWidget implements MenuWidget {
  readonly children: DomWidget[] = [];

  private frame: Frame = { x: 0, y: 0, width: 0, height: 0 };
  private destroyedFlag = false;

  constructor(
    protected readonly host: DomMenuHost,
    readonly id: string,
    readonly element: HTMLElement,
    public parent: DomWidget | null,
  ) {
    element.dataset.menuWidgetId = id;
    element.style.boxSizing = "border-box";
    if (parent) {
      element.style.position = "absolute";
      parent.children.push(this);
      parent.element.appendChild(element);
    }
  }

  get isDestroyed(): boolean {
    return this.destroyedFlag;
  }

  setFrame(frame: Frame): void {
    this.frame = { x: frame.x, y: frame.y, width: frame.width, height: frame.height };
    const style = this.element.style;
    style.left = px(frame.x);
    style.top = px(frame.y);
    style.width = px(frame.width);
    style.height = px(frame.height);
  }

  getFrame(): Frame {
    return { ...this.frame };
  }

  getScreenBounds(): Bounds {
    let left = this.frame.x;
    let top = this.frame.y;
    let surface: DomSurface | null = null;
    for (let node = this.parent; node; node = node.parent) {
      if (node instanceof DomSurface) {
        surface = node;
        break;
      }
      left += node.frame.x;
      top += node.frame.y;
    }
    if (surface) {
      left += surface.screen.left;
      top += surface.screen.top;
    }
    return { left, top, right: left + this.frame.width, bottom: top + this.frame.height };
  }

  setColor(color: Rgba): void {
    this.element.style.backgroundColor = toCssColor(color);
  }

  setParent(parent: MenuWidget): void {
    const next = this.host.resolve(parent);
    this.detach();
    this.parent = next;
    next.children.push(this);
    next.element.appendChild(this.element);
  }

  bringToFront(): void {
    const parent = this.parent;
    if (!parent) return;
    const index = parent.children.indexOf(this);
    if (index === -1) return;
    parent.children.splice(index, 1);
    parent.children.push(this);
    parent.element.appendChild(this.element);
  }

  placeBehind(sibling: MenuWidget): void {
    const target = this.host.resolve(sibling);
    const parent = this.parent;
    if (!parent || target.parent !== parent) {
      throw new Error(`Widget ${this.id} and ${target.id} are not siblings`);
    }
    if (target === this) return;
    parent.children.splice(parent.children.indexOf(this), 1);
    parent.children.splice(parent.children.indexOf(target), 0, this);
    parent.element.insertBefore(this.element, target.element);
  }

  destroy(): void {
    if (this.destroyedFlag) return;
    this.detach();
    this.element.remove();
    this.markDestroyed();
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

/**
 * Full-window overlay; pointer events that land on it directly (outside every
 * panel) are reported with the surface's id.
 */
export class DomSurface extends DomWidget {
  constructor(
    host: DomMenuHost,
    id: string,
    element: HTMLElement,
    readonly screen: Bounds,
    readonly sink: MenuHostEventSink,
  ) {
    super(host, id, element, null);
    super.setFrame({ x: 0, y: 0, width: screen.right - screen.left, height: screen.bottom - screen.top });
    const style = element.style;
    style.position = "fixed";
    style.left = px(screen.left);
    style.top = px(screen.top);
    style.overflow = "hidden";
  }

  /** The overlay always covers the screen rectangle it was created for. */
  override setFrame(): void {}

  override getScreenBounds(): Bounds {
    return { ...this.screen };
  }
}

export class DomLabel extends DomWidget implements MenuLabel {
  readonly text: string;

  constructor(host: DomMenuHost, id: string, element: HTMLElement, parent: DomWidget, private readonly options: LabelOptions) {
    super(host, id, element, parent);
    this.text = options.text;
    element.textContent = options.text;
    const style = element.style;
    style.font = toCssFont(options.font);
    style.whiteSpace = "nowrap";
    style.textAlign = options.align;
    style.pointerEvents = "none";
    this.setColor(options.color);
  }

  override setColor(color: Rgba): void {
    this.element.style.color = toCssColor(color);
  }

  getPreferredSize(): Size {
    return this.host.measureText(this.text, this.options.font);
  }
}

export class DomControl extends DomWidget implements MenuControl {
  private interactable = true;
  private state: ControlState = "normal";
  private stateColors: ControlStateColors;

  constructor(host: DomMenuHost, id: string, element: HTMLElement, parent: DomWidget, options: ControlOptions) {
    super(host, id, element, parent);
    applyImage(element, options.image);
    this.stateColors = {
      normal: options.color,
      highlighted: options.color,
      pressed: options.color,
      disabled: options.color,
    };
    this.applyState("normal");

    element.addEventListener("pointerenter", () => host.deliver(this, "pointer-enter"));
    element.addEventListener("pointerdown", () => host.deliver(this, "pointer-down"));
    element.addEventListener("click", () => host.deliver(this, "click"));
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

  private applyState(state: ControlState): void {
    this.state = state;
    this.element.dataset.state = state;
    this.setColor(this.stateColors[state]);
  }
}

export class DomScrollView implements MenuScrollView {
  readonly viewport: DomWidget;
  readonly content: DomWidget;
  readonly scrollbar: DomWidget;
  readonly thumb: DomWidget;

  private position = 0;

  constructor(
    host: DomMenuHost,
    private readonly parent: DomWidget,
    private readonly options: ScrollViewOptions,
  ) {
    this.viewport = host.adopt(new DomWidget(host, host.nextId(), host.createElement("div"), parent));
    this.viewport.element.style.overflow = "hidden";
    this.content = host.adopt(new DomWidget(host, host.nextId(), host.createElement("div"), this.viewport));
    this.scrollbar = host.adopt(new DomWidget(host, host.nextId(), host.createElement("div"), parent));
    this.scrollbar.setColor(options.trackColor);
    applyImage(this.scrollbar.element, options.trackImage);
    this.thumb = host.adopt(new DomWidget(host, host.nextId(), host.createElement("div"), this.scrollbar));
    this.thumb.setColor(options.thumbColor);

    this.viewport.element.addEventListener(
      "wheel",
      (event) => {
        event.preventDefault();
        if (event.deltaY === 0) return;
        this.scrollByNotches(Math.sign(event.deltaY));
        host.deliver(this.viewport, "scroll");
      },
      { passive: false },
    );
    this.refresh();
  }

  setNormalizedPosition(position: number): void {
    this.position = Number.isFinite(position) ? Math.min(1, Math.max(0, position)) : 0;
    this.refresh();
  }

  getNormalizedPosition(): number {
    return this.position;
  }

  scrollByNotches(notches: number): void {
    const viewportHeight = this.viewport.getFrame().height;
    const contentHeight = this.content.getFrame().height;
    const offset = normalizedToOffset(this.position, contentHeight, viewportHeight) + notches * this.options.sensitivity;
    this.setNormalizedPosition(offsetToNormalized(offset, contentHeight, viewportHeight));
  }

  refresh(): void {
    const layout = computeScrollViewLayout({
      outer: this.parent.getFrame(),
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
 * Renders menus as absolutely positioned elements inside a fixed overlay.
 *
 * The overlay covers the viewport and swallows the native context menu. Entry
 * elements report `pointerenter`, `pointerdown` and `click`; scroll views report
 * wheel scrolling as `scroll`.
 */
export class DomMenuHost implements MenuHost {
  private readonly doc: Document;
  private readonly container: HTMLElement | null;
  private readonly measure: TextMeasurer;
  private readonly viewport: () => Bounds;
  private readonly testId: string;
  private readonly widgets = new Map<string, DomWidget>();
  private idCounter = 0;

  constructor(options: DomMenuHostOptions = {}) {
    const doc = options.document ?? (typeof document === "undefined" ? null : document);
    if (!doc) throw new Error("DomMenuHost requires a DOM document");

    this.doc = doc;
    this.container = options.container ?? null;
    this.measure = options.measureText ?? createCanvasTextMeasurer(doc);
    this.viewport = options.viewport ?? (() => this.windowBounds());
    this.testId = options.testId ?? "cascade-menu";
  }

  nextId(): string {
    this.idCounter += 1;
    return `cm-${this.idCounter}`;
  }

  measureText(text: string, font: FontSpec): Size {
    return this.measure(text, font);
  }

  createElement(tag: "div" | "span"): HTMLElement {
    return this.doc.createElement(tag);
  }

  createSurface(options: SurfaceOptions): DomSurface {
    const overlay = this.createElement("div");
    overlay.className = "cascade-menu-overlay";
    overlay.dataset.testid = this.testId;
    overlay.style.zIndex = "2147483647";
    overlay.style.backgroundColor = toCssColor(options.visible ? options.color : { ...options.color, a: 0 });
    overlay.addEventListener("contextmenu", (event) => event.preventDefault());

    const surface = new DomSurface(this, this.nextId(), overlay, this.viewport(), options.sink);
    const reportDirect = (type: MenuHostEventType) => (event: Event) => {
      if (event.target === overlay) this.deliver(surface, type);
    };
    overlay.addEventListener("pointerdown", reportDirect("pointer-down"));
    overlay.addEventListener("click", reportDirect("click"));

    (this.container ?? this.doc.body).appendChild(overlay);
    return this.adopt(surface);
  }

  createPanel(parent: MenuWidget, options: PanelOptions): DomWidget {
    const panel = new DomWidget(this, this.nextId(), this.createElement("div"), this.resolve(parent));
    panel.element.className = "cascade-menu__panel";
    panel.setColor(options.color);
    applyImage(panel.element, options.image);
    return this.adopt(panel);
  }

  createLabel(parent: MenuWidget, options: LabelOptions): DomLabel {
    return this.adopt(new DomLabel(this, this.nextId(), this.createElement("span"), this.resolve(parent), options));
  }

  createImage(parent: MenuWidget, image: MenuImage): DomWidget {
    const widget = new DomWidget(this, this.nextId(), this.createElement("span"), this.resolve(parent));
    widget.element.style.pointerEvents = "none";
    applyImage(widget.element, image);
    widget.setFrame({ x: 0, y: 0, width: image.width, height: image.height });
    return this.adopt(widget);
  }

  createControl(parent: MenuWidget, options: ControlOptions): DomControl {
    const control = new DomControl(this, this.nextId(), this.createElement("div"), this.resolve(parent), options);
    control.element.className = "cascade-menu__entry";
    return this.adopt(control);
  }

  createScrollView(parent: MenuWidget, options: ScrollViewOptions): DomScrollView {
    return new DomScrollView(this, this.resolve(parent), options);
  }

  /** The element rendering `widget`. */
  elementOf(widget: MenuWidget): HTMLElement {
    return this.resolve(widget).element;
  }

  resolve(widget: MenuWidget): DomWidget {
    const resolved = this.widgets.get(widget.id);
    if (!resolved || resolved !== widget) {
      throw new Error(`Widget ${widget.id} does not belong to this host or was destroyed`);
    }
    return resolved;
  }

  adopt<T extends DomWidget>(widget: T): T {
    this.widgets.set(widget.id, widget);
    return widget;
  }

  forget(widget: DomWidget): void {
    this.widgets.delete(widget.id);
  }

  deliver(widget: DomWidget, type: MenuHostEventType): void {
    if (widget.isDestroyed) return;
    for (let node: DomWidget | null = widget; node; node = node.parent) {
      if (node instanceof DomSurface) {
        node.sink({ type, targetId: widget.id });
        return;
      }
    }
  }

  private windowBounds(): Bounds {
    const win = this.doc.defaultView;
    const width = win?.innerWidth ?? this.doc.documentElement.clientWidth;
    const height = win?.innerHeight ?? this.doc.documentElement.clientHeight;
    return { left: 0, top: 0, right: width, bottom: height };
  }
}
