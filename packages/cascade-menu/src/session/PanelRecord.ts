import type { MenuControl, MenuScrollView, MenuWidget } from "../host/types.js";
import type { BuiltEntry, BuiltRow } from "../layout/LayoutBuilder.js";
import type { MenuNode } from "../model/MenuNode.js";

export type PanelRecordInit = {
  ownerNode: MenuNode;
  parent: PanelRecord | null;
  depth: number;
  body: MenuWidget;
  shadow: MenuWidget;
  rows: readonly BuiltRow[];
  entries: readonly BuiltEntry[];
  shadowOffset: { x: number; y: number };
};

/**
 * One open panel of a session: the menu node it renders plus the widgets that
 * realize it.
 */
export class PanelRecord {
  readonly ownerNode: MenuNode;
  readonly parent: PanelRecord | null;
  /** Index on the session stack; 0 is the root panel. */
  readonly depth: number;
  readonly body: MenuWidget;
  readonly shadow: MenuWidget;
  readonly rows: readonly BuiltRow[];
  readonly entries: readonly BuiltEntry[];
  /** Interactive control for each action, submenu and go-back entry, keyed by node identity. */
  readonly entryWidgetByNode = new Map<MenuNode, MenuControl>();

  hasScrollActive = false;
  scrollView: MenuScrollView | null = null;

  private readonly shadowOffset: { x: number; y: number };
  private disposed = false;

  constructor(init: PanelRecordInit) {
    this.ownerNode = init.ownerNode;
    this.parent = init.parent;
    this.depth = init.depth;
    this.body = init.body;
    this.shadow = init.shadow;
    this.rows = init.rows;
    this.entries = init.entries;
    this.shadowOffset = init.shadowOffset;
    for (const entry of init.entries) this.entryWidgetByNode.set(entry.node, entry.control);
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Moves the shadow to the body's frame plus the configured offset and draws it
   * directly below `behind`.
   */
  layoutShadow(behind: MenuWidget): void {
    const frame = this.body.getFrame();
    this.shadow.setFrame({
      x: frame.x + this.shadowOffset.x,
      y: frame.y + this.shadowOffset.y,
      width: frame.width,
      height: frame.height,
    });
    this.shadow.placeBehind(behind);
  }

  /** Destroys the panel's widgets. Safe to call after the surface already took them down. */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.entryWidgetByNode.clear();
    this.scrollView = null;
    if (!this.shadow.isDestroyed) this.shadow.destroy();
    if (!this.body.isDestroyed) this.body.destroy();
  }
}
