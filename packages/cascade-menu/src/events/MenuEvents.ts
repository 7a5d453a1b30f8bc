import type { MenuWidget } from "../host/types.js";
import type { MenuLogger } from "../logging/logger.js";
import type { MenuNode } from "../model/MenuNode.js";
import type { MenuSession } from "../session/MenuSession.js";
import type { PanelRecord } from "../session/PanelRecord.js";
import { ListenerSet } from "./ListenerSet.js";

export type MenuSpawnerEvents = {
  readonly sessionStarted: ListenerSet<[session: MenuSession]>;
  readonly sessionEnded: ListenerSet<[session: MenuSession]>;
  /** Fires with the chosen action, or `null` when the user dismissed the menu. */
  readonly actionSelected: ListenerSet<[node: MenuNode | null]>;
  readonly submenuOpened: ListenerSet<[session: MenuSession, panel: PanelRecord]>;
  readonly surfaceCreated: ListenerSet<[surface: MenuWidget]>;
};

export function createSpawnerEvents(logger: MenuLogger): MenuSpawnerEvents {
  return {
    sessionStarted: new ListenerSet("sessionStarted", logger),
    sessionEnded: new ListenerSet("sessionEnded", logger),
    actionSelected: new ListenerSet("actionSelected", logger),
    submenuOpened: new ListenerSet("submenuOpened", logger),
    surfaceCreated: new ListenerSet("surfaceCreated", logger),
  };
}
