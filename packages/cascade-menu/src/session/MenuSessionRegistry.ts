import type { HotspotInput } from "../geometry/bounds.js";
import type { MenuSession } from "./MenuSession.js";
import type { MenuSpawner, OpenMenuOptions } from "./MenuSpawner.js";

/**
 * Keeps at most one live session, for apps that show a single menu at a time.
 */
export class MenuSessionRegistry {
  private current: MenuSession | null = null;
  private release: (() => void) | null = null;

  get active(): MenuSession | null {
    return this.current && !this.current.isDestroyed ? this.current : null;
  }

  /**
   * Destroys the previously tracked session (if still live) and tracks `session`.
   */
  track(session: MenuSession): void {
    if (this.current === session) return;
    this.closeActive();
    if (session.isDestroyed) return;

    this.current = session;
    this.release = session.onEnded((ended) => {
      if (this.current !== ended) return;
      this.current = null;
      this.release = null;
    });
  }

  /** Closes the active session first, then opens and tracks a new one. */
  open(spawner: MenuSpawner, root: unknown, hotspot: HotspotInput, options?: OpenMenuOptions): MenuSession {
    this.closeActive();
    const session = spawner.open(root, hotspot, options);
    this.track(session);
    return session;
  }

  closeActive(): void {
    const previous = this.current;
    this.release?.();
    this.current = null;
    this.release = null;
    previous?.destroy();
  }
}
