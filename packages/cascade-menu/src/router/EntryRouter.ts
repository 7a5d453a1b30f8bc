import type { HotspotInput } from "../geometry/bounds.js";
import type { MenuControl, MenuHostEvent, MenuWidget } from "../host/types.js";
import type { InteractiveKind } from "../layout/LayoutBuilder.js";
import type { MenuLogger } from "../logging/logger.js";
import type { MenuNode } from "../model/MenuNode.js";
import type { PanelRecord } from "../session/PanelRecord.js";
import type { CloseMethod } from "../style/StyleConfig.js";

/**
 * The slice of a session the router drives.
 */
export interface MenuSessionController {
  readonly isDestroyed: boolean;
  popTo(target: PanelRecord | MenuNode, checkFirst?: boolean): boolean;
  popTop(): PanelRecord | null;
  pushSubmenu(parent: PanelRecord, node: MenuNode, hotspot: HotspotInput): PanelRecord;
  destroy(): void;
}

export type EntryRegistration =
  | { kind: "entry"; entryKind: InteractiveKind; node: MenuNode; panel: PanelRecord; control: MenuControl }
  | { kind: "surface" }
  | { kind: "scroll"; panel: PanelRecord };

type EntryTarget = Extract<EntryRegistration, { kind: "entry" }>;

export type EntryRouterOptions = {
  logger: MenuLogger;
  closeOn: CloseMethod;
  onActionSelected: (node: MenuNode | null) => void;
};

/**
 * Dispatch table from widget ids to what the widget means for the session.
 *
 * Hosts report raw pointer events against widget ids; the router turns them into
 * stack operations on the owning session.
 */
export class EntryRouter {
  private readonly table = new Map<string, EntryRegistration>();

  constructor(
    private readonly session: MenuSessionController,
    private readonly options: EntryRouterOptions,
  ) {}

  registerSurface(surface: MenuWidget): void {
    this.table.set(surface.id, { kind: "surface" });
  }

  registerPanel(panel: PanelRecord): void {
    for (const entry of panel.entries) {
      this.table.set(entry.control.id, {
        kind: "entry",
        entryKind: entry.kind,
        node: entry.node,
        panel,
        control: entry.control,
      });
    }
    if (panel.scrollView) {
      this.table.set(panel.scrollView.viewport.id, { kind: "scroll", panel });
    }
  }

  unregisterPanel(panel: PanelRecord): void {
    for (const [id, registration] of this.table) {
      if (registration.kind !== "surface" && registration.panel === panel) this.table.delete(id);
    }
  }

  registrations(): ReadonlyMap<string, EntryRegistration> {
    return this.table;
  }

  clear(): void {
    this.table.clear();
  }

  dispatch(event: MenuHostEvent): void {
    const { logger } = this.options;
    if (this.session.isDestroyed) {
      logger.debug({ event, reason: "session_destroyed" }, "menu_event_ignored");
      return;
    }

    const registration = this.table.get(event.targetId);
    if (!registration) {
      logger.debug({ event, reason: "unknown_target" }, "menu_event_ignored");
      return;
    }

    switch (registration.kind) {
      case "surface":
        if (event.type === this.options.closeOn) {
          this.options.onActionSelected(null);
          this.session.destroy();
        }
        return;
      case "scroll":
        if (event.type === "scroll") this.session.popTo(registration.panel, true);
        return;
      case "entry":
        this.dispatchEntry(registration, event);
        return;
    }
  }

  private dispatchEntry(target: EntryTarget, event: MenuHostEvent): void {
    switch (event.type) {
      case "pointer-enter":
        this.resetHighlight(target);
        if (target.entryKind === "menu") this.openSubmenu(target);
        else this.session.popTo(target.panel, false);
        return;
      case "pointer-down":
        if (target.control.isInteractable()) target.control.setState("pressed");
        return;
      case "click":
        this.click(target, event);
        return;
      case "scroll":
        return;
    }
  }

  private click(target: EntryTarget, event: MenuHostEvent): void {
    if (!target.control.isInteractable()) {
      this.options.logger.debug({ event, reason: "entry_disabled" }, "menu_event_ignored");
      return;
    }

    switch (target.entryKind) {
      case "action":
        this.runSelectHandler(target.node);
        this.options.onActionSelected(target.node);
        this.session.destroy();
        return;
      case "go-back":
        this.runSelectHandler(target.node);
        if (target.panel.parent) this.session.popTo(target.panel.parent, true);
        this.session.popTop();
        return;
      case "menu":
        target.control.setState("highlighted");
        this.openSubmenu(target);
        return;
    }
  }

  private openSubmenu(target: EntryTarget): void {
    if (!target.control.isInteractable()) {
      this.session.popTo(target.panel, false);
      return;
    }
    if (this.session.popTo(target.node)) return;

    this.session.popTo(target.panel, false);
    this.session.pushSubmenu(target.panel, target.node, target.control.getScreenBounds());
  }

  private resetHighlight(target: EntryTarget): void {
    for (const entry of target.panel.entries) {
      if (!entry.control.isInteractable()) continue;
      entry.control.setState(entry.control === target.control ? "highlighted" : "normal");
    }
  }

  private runSelectHandler(node: MenuNode): void {
    const handler = node.onSelect;
    if (!handler) return;

    const { logger } = this.options;
    try {
      void Promise.resolve(handler()).catch((err: unknown) => {
        logger.error({ err, label: node.label }, "menu_action_failed");
      });
    } catch (err) {
      logger.error({ err, label: node.label }, "menu_action_failed");
    }
  }
}
