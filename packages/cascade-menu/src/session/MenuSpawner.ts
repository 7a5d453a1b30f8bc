import { MenuSessionError } from "../errors.js";
import { createSpawnerEvents, type MenuSpawnerEvents } from "../events/MenuEvents.js";
import { isFiniteBounds, toHotspotBounds, type HotspotInput } from "../geometry/bounds.js";
import type { MenuHost } from "../host/types.js";
import { createLogger, type MenuLogger } from "../logging/logger.js";
import { assertMenuTree } from "../model/MenuNode.js";
import type { GrowDirection, PlacementDirectives } from "../placement/directives.js";
import { resolveStyleConfig, type StyleConfig, type StyleConfigInput } from "../style/StyleConfig.js";
import { MenuSession } from "./MenuSession.js";

export type MenuSpawnerOptions = {
  host: MenuHost;
  style?: StyleConfigInput;
  logger?: MenuLogger;
  /** Initial grow direction of every session. Defaults to `"right"`. */
  growDirection?: GrowDirection;
};

export type OpenMenuOptions = {
  /** Layered over the spawner's style for this session only. */
  style?: StyleConfigInput;
  showTitle?: boolean;
  growDirection?: GrowDirection;
  /** Placement attempts for the root panel. */
  directives?: PlacementDirectives;
};

/**
 * Entry point for opening menus on one host.
 *
 * ```ts
 * const spawner = new MenuSpawner({ host, style: { submenuArrow: arrow } });
 * spawner.events.actionSelected.subscribe((node) => console.log(node?.label));
 * const session = spawner.open(menu, button.getBoundingClientRect());
 * ```
 */
export class MenuSpawner {
  readonly host: MenuHost;
  readonly style: StyleConfig;
  readonly events: MenuSpawnerEvents;
  readonly logger: MenuLogger;

  private readonly styleInput: StyleConfigInput;
  private readonly growDirection: GrowDirection;

  constructor(options: MenuSpawnerOptions) {
    this.host = options.host;
    this.logger = options.logger ?? createLogger();
    this.styleInput = options.style ?? {};
    this.style = resolveStyleConfig(this.styleInput);
    this.events = createSpawnerEvents(this.logger);
    this.growDirection = options.growDirection ?? "right";
  }

  open(root: unknown, hotspot: HotspotInput, options: OpenMenuOptions = {}): MenuSession {
    assertMenuTree(root);

    const bounds = toHotspotBounds(hotspot);
    if (!isFiniteBounds(bounds)) {
      throw new MenuSessionError("Menu hotspot coordinates must be finite numbers");
    }

    const style = options.style ? resolveStyleConfig(this.styleInput, options.style) : this.style;
    const session = new MenuSession({
      host: this.host,
      style,
      logger: this.logger,
      events: this.events,
      growDirection: options.growDirection ?? this.growDirection,
    });

    try {
      session.openRoot(root, bounds, { directives: options.directives, showTitle: options.showTitle });
    } catch (err) {
      session.destroy();
      throw err;
    }

    this.events.sessionStarted.emit(session);
    return session;
  }
}
