import { MenuTreeError } from "../errors.js";
import type { MenuImage } from "../host/types.js";
import { WHITE, type Rgba } from "../style/color.js";
import type { TextAlignment } from "../style/StyleConfig.js";

export type MenuNodeKind = "menu" | "action" | "separator" | "go-back";

export const MenuFlags = {
  None: 0,
  Selected: 1 << 1,
  Disabled: 1 << 2,
  /** Use the node's own color for its plate (wins over Selected). */
  Colored: 1 << 3,
  /** For scrollable menus with exactly one selected child, scroll that child into the middle. */
  CenterScrollOnSelected: 1 << 4,
} as const;

export type MenuFlagBits = number;

export type MenuSelectHandler = () => void | Promise<void>;

export type MenuEntryOptions = {
  icon?: MenuImage | null;
  shortcut?: string | null;
  color?: Rgba;
  alignment?: TextAlignment;
  flags?: MenuFlagBits;
};

type MenuNodeInit = {
  kind: MenuNodeKind;
  label: string;
  children: readonly MenuNode[] | null;
  onSelect: MenuSelectHandler | null;
  options: MenuEntryOptions;
};

/**
 * One entry of a menu tree.
 *
 * Nodes are immutable once built and are compared by identity, so the same tree
 * can be opened any number of times.
 */
export class MenuNode {
  readonly kind: MenuNodeKind;
  readonly label: string;
  /** Non-null only for `menu` nodes. */
  readonly children: readonly MenuNode[] | null;
  /** Non-null only for `action` and `go-back` nodes. */
  readonly onSelect: MenuSelectHandler | null;
  readonly icon: MenuImage | null;
  readonly shortcut: string | null;
  readonly color: Rgba;
  readonly alignment: TextAlignment;
  readonly flags: MenuFlagBits;

  private constructor(init: MenuNodeInit) {
    this.kind = init.kind;
    this.label = init.label;
    this.children = init.children;
    this.onSelect = init.onSelect;
    this.icon = init.options.icon ?? null;
    this.shortcut = init.options.shortcut ?? null;
    this.color = init.options.color ?? WHITE;
    this.alignment = init.options.alignment ?? "default";
    this.flags = init.options.flags ?? MenuFlags.None;
  }

  /** Creates a submenu holding a frozen copy of `children`. */
  static menu(label: string, children: readonly MenuNode[] = [], options: MenuEntryOptions = {}): MenuNode {
    return new MenuNode({ kind: "menu", label, children: Object.freeze([...children]), onSelect: null, options });
  }

  static action(label: string, onSelect: MenuSelectHandler, options: MenuEntryOptions = {}): MenuNode {
    return new MenuNode({ kind: "action", label, children: null, onSelect, options });
  }

  static goBack(label: string, onSelect: MenuSelectHandler, options: MenuEntryOptions = {}): MenuNode {
    return new MenuNode({ kind: "go-back", label, children: null, onSelect, options });
  }

  static separator(): MenuNode {
    return new MenuNode({ kind: "separator", label: "", children: null, onSelect: null, options: {} });
  }

  hasFlag(flag: MenuFlagBits): boolean {
    return (this.flags & flag) !== 0;
  }

  get isInteractive(): boolean {
    return this.kind === "action" || this.kind === "menu" || this.kind === "go-back";
  }
}

function describe(node: MenuNode): string {
  return node.label === "" ? `<${node.kind}>` : node.label;
}

/**
 * Throws a {@link MenuTreeError} when `root` is not a well-formed menu tree.
 */
export function assertMenuTree(root: unknown): asserts root is MenuNode {
  if (!(root instanceof MenuNode)) {
    throw new MenuTreeError("Menu root must be a MenuNode", { path: [] });
  }
  if (root.kind !== "menu") {
    throw new MenuTreeError(`Menu root must be a menu node, got "${root.kind}"`, { path: [describe(root)] });
  }

  const visiting = new Set<MenuNode>();

  const visit = (node: MenuNode, path: string[]): void => {
    const here = [...path, describe(node)];

    if (node.kind === "menu") {
      if (!Array.isArray(node.children)) {
        throw new MenuTreeError("Menu node has no children list", { path: here });
      }
      if (node.onSelect !== null) {
        throw new MenuTreeError("Menu node must not carry an onSelect handler", { path: here });
      }
      if (visiting.has(node)) {
        throw new MenuTreeError("Menu tree contains a cycle", { path: here });
      }
      visiting.add(node);
      for (const child of node.children) {
        if (!(child instanceof MenuNode)) {
          throw new MenuTreeError("Menu children must be MenuNode instances", { path: here });
        }
        visit(child, here);
      }
      visiting.delete(node);
      return;
    }

    if (node.children !== null) {
      throw new MenuTreeError(`A ${node.kind} node must not have children`, { path: here });
    }

    const needsHandler = node.kind === "action" || node.kind === "go-back";
    if (needsHandler && typeof node.onSelect !== "function") {
      throw new MenuTreeError(`A ${node.kind} node requires an onSelect handler`, { path: here });
    }
    if (!needsHandler && node.onSelect !== null) {
      throw new MenuTreeError(`A ${node.kind} node must not carry an onSelect handler`, { path: here });
    }
  };

  visit(root, []);
}
