import type { ZodIssue } from "zod";

/**
 * Invalid style configuration or a style asset that a build needs but was not configured.
 */
export class MenuConfigError extends Error {
  readonly issues: readonly ZodIssue[];

  constructor(message: string, opts: { issues?: readonly ZodIssue[] } = {}) {
    super(message);
    this.name = "MenuConfigError";
    this.issues = opts.issues ?? [];
  }
}

/**
 * A menu tree that violates the node invariants. `path` lists the labels from the
 * root down to the offending entry.
 */
export class MenuTreeError extends Error {
  readonly path: readonly string[];

  constructor(message: string, opts: { path: readonly string[] }) {
    super(message);
    this.name = "MenuTreeError";
    this.path = opts.path;
  }
}

export class MenuSessionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MenuSessionError";
  }
}

export class MenuSessionDestroyedError extends MenuSessionError {
  constructor(operation: string) {
    super(`Cannot ${operation}: the menu session was already destroyed`);
    this.name = "MenuSessionDestroyedError";
  }
}
