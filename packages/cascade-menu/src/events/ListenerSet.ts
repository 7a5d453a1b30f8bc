import type { MenuLogger } from "../logging/logger.js";

export type Listener<Args extends unknown[]> = (...args: Args) => void;

/**
 * Ordered set of notification listeners.
 *
 * A throwing listener is logged and skipped; the remaining listeners still run.
 */
export class ListenerSet<Args extends unknown[]> {
  private readonly listeners = new Set<Listener<Args>>();

  constructor(
    private readonly name: string,
    private readonly logger: MenuLogger,
  ) {}

  subscribe(listener: Listener<Args>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get size(): number {
    return this.listeners.size;
  }

  emit(...args: Args): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(...args);
      } catch (err) {
        this.logger.warn({ err, event: this.name }, "menu_listener_failed");
      }
    }
  }

  clear(): void {
    this.listeners.clear();
  }
}
