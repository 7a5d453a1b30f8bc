import { MenuSessionDestroyedError, MenuSessionError } from "../errors.js";
import type { MenuSpawnerEvents } from "../events/MenuEvents.js";
import { ListenerSet } from "../events/ListenerSet.js";
import { toHotspotBounds, type Bounds, type HotspotInput } from "../geometry/bounds.js";
import { SurfaceSpace } from "../geometry/SurfaceSpace.js";
import type { MenuHost, MenuWidget } from "../host/types.js";
import { buildPanel, type BuiltPanel } from "../layout/LayoutBuilder.js";
import type { MenuLogger } from "../logging/logger.js";
import { MenuFlags, MenuNode } from "../model/MenuNode.js";
import { dropdownDirectives, submenuDirectives, type GrowDirection, type PlacementDirectives } from "../placement/directives.js";
import {
  clampHorizontal,
  initialTop,
  resolveHorizontalPlacement,
  resolveVerticalPlacement,
} from "../placement/placement.js";
import { computeCenteredScrollPosition } from "../placement/scrollMath.js";
import { EntryRouter, type EntryRegistration, type MenuSessionController } from "../router/EntryRouter.js";
import type { StyleConfig } from "../style/StyleConfig.js";
import { PanelRecord } from "./PanelRecord.js";

export type MenuSessionInit = {
  host: MenuHost;
  style: StyleConfig;
  logger: MenuLogger;
  events: MenuSpawnerEvents;
  growDirection: GrowDirection;
};

export type PanelOpenOptions = {
  /** Placement attempts; defaults to the dropdown or submenu preset for the current grow direction. */
  directives?: PlacementDirectives;
  /** Overrides the style's `showTitles` for this panel. */
  showTitle?: boolean;
};

const noop = (): void => {};

/**
 * One open menu: the modal surface plus the stack of open panels.
 *
 * Index 0 of the stack is the root panel. Once destroyed, a session stays
 * destroyed; pops become no-ops and pushes throw.
 */
export class MenuSession implements MenuSessionController {
  readonly surface: MenuWidget;
  readonly style: StyleConfig;

  private readonly host: MenuHost;
  private readonly logger: MenuLogger;
  private readonly events: MenuSpawnerEvents;
  private readonly router: EntryRouter;
  private readonly ended: ListenerSet<[session: MenuSession]>;
  private readonly goBackNode: MenuNode;
  private readonly stack: PanelRecord[] = [];
  private grow: GrowDirection;
  private destroyedFlag = false;

  constructor(init: MenuSessionInit) {
    this.host = init.host;
    this.style = init.style;
    this.logger = init.logger;
    this.events = init.events;
    this.grow = init.growDirection;
    this.ended = new ListenerSet("onEnded", init.logger);
    this.goBackNode = MenuNode.goBack(init.style.goBackLabel, noop, { icon: init.style.goBackIcon });

    this.router = new EntryRouter(this, {
      logger: init.logger,
      closeOn: init.style.closeOn,
      onActionSelected: (node) => this.events.actionSelected.emit(node),
    });
    this.surface = init.host.createSurface({
      color: init.style.modalColor,
      visible: init.style.modalVisible,
      sink: (event) => this.router.dispatch(event),
    });
    this.router.registerSurface(this.surface);
    this.events.surfaceCreated.emit(this.surface);
  }

  get isDestroyed(): boolean {
    return this.destroyedFlag;
  }

  get growDirection(): GrowDirection {
    return this.grow;
  }

  /** Open panels, root first. */
  get panels(): readonly PanelRecord[] {
    return [...this.stack];
  }

  get depth(): number {
    return this.stack.length;
  }

  get top(): PanelRecord | null {
    return this.stack[this.stack.length - 1] ?? null;
  }

  /** Widget id dispatch table of the session's router. */
  registrations(): ReadonlyMap<string, EntryRegistration> {
    return this.router.registrations();
  }

  onEnded(listener: (session: MenuSession) => void): () => void {
    return this.ended.subscribe(listener);
  }

  openRoot(root: MenuNode, hotspot: HotspotInput, options: PanelOpenOptions = {}): PanelRecord {
    this.assertActive("open the root menu");
    if (this.stack.length > 0) {
      throw new MenuSessionError("The root panel of this session is already open");
    }
    if (root.kind !== "menu" || !root.children) {
      throw new MenuSessionError(`"${root.label}" is not a menu`);
    }

    return this.openPanel({
      owner: root,
      entries: root.children,
      parent: null,
      hotspot: toHotspotBounds(hotspot),
      directives: options.directives ?? dropdownDirectives(this.grow),
      showTitle: options.showTitle,
    });
  }

  /**
   * Opens `node` as a submenu of `parent`, anchored to `hotspot` (usually the
   * invoking entry's screen bounds). Panels deeper than `parent` are closed first.
   */
  pushSubmenu(parent: PanelRecord, node: MenuNode, hotspot: HotspotInput, options: PanelOpenOptions = {}): PanelRecord {
    this.assertActive("push a submenu");
    if (!this.stack.includes(parent)) {
      throw new MenuSessionError(`Panel "${parent.ownerNode.label}" is not open in this session`);
    }
    if (node.kind !== "menu" || !node.children) {
      throw new MenuSessionError(`"${node.label}" is not a submenu`);
    }

    this.popToDepth(parent.depth + 1);

    let anchor = toHotspotBounds(hotspot);
    if (parent.hasScrollActive) {
      const gutter = SurfaceSpace.of(this.surface).toScreenWidth(this.style.scrollbarWidth + this.style.outerPadding.right);
      anchor = { ...anchor, right: anchor.right + gutter };
    }

    const record = this.openPanel({
      owner: node,
      entries: this.style.useGoBack ? [this.goBackNode, ...node.children] : node.children,
      parent,
      hotspot: anchor,
      directives: options.directives ?? submenuDirectives(this.grow),
      showTitle: options.showTitle,
    });
    this.events.submenuOpened.emit(this, record);
    return record;
  }

  /**
   * Closes the deepest panel. Closing the last panel destroys the session.
   */
  popTop(): PanelRecord | null {
    if (this.destroyedFlag) return null;
    const record = this.stack.pop();
    if (!record) return null;

    this.router.unregisterPanel(record);
    record.dispose();
    if (this.stack.length === 0) this.destroy();
    return record;
  }

  /**
   * Closes panels until `target` (a panel, or the menu node a panel renders) is the
   * deepest one. With `checkFirst`, nothing is closed when the target is not open;
   * without it, panels are closed until the target is found or the stack runs out.
   */
  popTo(target: PanelRecord | MenuNode, checkFirst = true): boolean {
    if (this.destroyedFlag) return false;

    const matches = (record: PanelRecord): boolean =>
      target instanceof PanelRecord ? record === target : record.ownerNode === target;

    if (checkFirst && !this.stack.some(matches)) return false;

    for (let top = this.top; top; top = this.top) {
      if (matches(top)) return true;
      this.popTop();
    }
    return false;
  }

  /** Closes panels until at most `depth` remain. */
  popToDepth(depth: number): void {
    while (!this.destroyedFlag && this.stack.length > Math.max(0, depth)) {
      this.popTop();
    }
  }

  destroy(): void {
    if (this.destroyedFlag) return;
    this.destroyedFlag = true;
    this.logger.debug({ depth: this.stack.length }, "menu_session_destroyed");

    this.ended.emit(this);
    this.events.sessionEnded.emit(this);

    const records = this.stack.splice(0);
    if (!this.surface.isDestroyed) this.surface.destroy();
    for (const record of records.reverse()) record.dispose();
    this.router.clear();
    this.ended.clear();
  }

  private assertActive(operation: string): void {
    if (this.destroyedFlag) throw new MenuSessionDestroyedError(operation);
  }

  private openPanel(request: {
    owner: MenuNode;
    entries: readonly MenuNode[];
    parent: PanelRecord | null;
    hotspot: Bounds;
    directives: PlacementDirectives;
    showTitle: boolean | undefined;
  }): PanelRecord {
    const built = buildPanel({
      host: this.host,
      style: this.style,
      logger: this.logger,
      parent: this.surface,
      owner: request.owner,
      entries: request.entries,
      showTitle: request.showTitle,
    });

    const record = new PanelRecord({
      ownerNode: request.owner,
      parent: request.parent,
      depth: this.stack.length,
      body: built.body,
      shadow: built.shadow,
      rows: built.rows,
      entries: built.entries,
      shadowOffset: this.style.shadowOffset,
    });

    this.place(record, built, request.hotspot, request.directives);
    this.router.registerPanel(record);

    const previous = this.top;
    this.stack.push(record);
    record.body.bringToFront();
    record.layoutShadow(previous ? previous.body : record.body);
    return record;
  }

  private place(record: PanelRecord, built: BuiltPanel, hotspot: Bounds, directives: PlacementDirectives): void {
    const space = SurfaceSpace.of(this.surface);
    const screen = this.surface.getScreenBounds();
    const height = space.toScreenHeight(built.height);

    const vertical = resolveVerticalPlacement({
      top: initialTop(directives, hotspot),
      height,
      screen,
    });
    const gutter = vertical.mode === "scroll" ? space.toScreenWidth(this.style.scrollbarWidth) : 0;
    const width = space.toScreenWidth(built.width) + gutter;

    const horizontal = resolveHorizontalPlacement({
      hotspot,
      screen,
      left: hotspot.left,
      width,
      directives,
      growDirection: this.grow,
    });
    this.grow = horizontal.growDirection;
    const left = clampHorizontal(horizontal.left, width, screen);

    record.body.setFrame(
      space.toLocalFrame({ left, top: vertical.top, right: left + width, bottom: vertical.top + vertical.height }),
    );

    if (vertical.mode === "scroll") this.enableScroll(record, built);
  }

  private enableScroll(record: PanelRecord, built: BuiltPanel): void {
    const style = this.style;
    const view = this.host.createScrollView(record.body, {
      scrollbarWidth: style.scrollbarWidth,
      sensitivity: style.scrollSensitivity,
      trackColor: style.scrollbarTrackColor,
      thumbColor: style.scrollbarThumbColor,
      trackImage: style.scrollbarImage,
    });

    view.content.setFrame({ x: 0, y: 0, width: built.width, height: built.height });
    built.title?.setParent(view.content);
    for (const row of built.rows) row.widget.setParent(view.content);
    view.refresh();

    record.hasScrollActive = true;
    record.scrollView = view;

    const owner = record.ownerNode;
    if (!owner.hasFlag(MenuFlags.CenterScrollOnSelected)) return;

    const [selected, ...others] = (owner.children ?? []).filter((child) => child.hasFlag(MenuFlags.Selected));
    if (!selected || others.length > 0) return;

    const row = built.rows.find((candidate) => candidate.node === selected);
    if (!row) return;

    const position = computeCenteredScrollPosition({
      entryTop: row.frame.y,
      entryHeight: row.frame.height,
      contentHeight: built.height,
      viewportHeight: record.body.getFrame().height,
    });
    if (position !== null) view.setNormalizedPosition(position);
  }
}
