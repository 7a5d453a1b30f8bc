import type { MenuImage } from "../host/types.js";
import type { Rgba } from "../style/color.js";
import type { TextAlignment } from "../style/StyleConfig.js";
import { MenuFlags, MenuNode, type MenuFlagBits, type MenuSelectHandler } from "./MenuNode.js";

export type AddActionOptions = {
  icon?: MenuImage | null;
  /** Sets the Colored flag. */
  color?: Rgba;
  shortcut?: string | null;
  selected?: boolean;
  disabled?: boolean;
  alignment?: TextAlignment;
  flags?: MenuFlagBits;
};

/** A menu still accepting entries. It becomes a node when it is popped or the root is read. */
type OpenMenu = {
  label: string;
  flags: MenuFlagBits;
  children: MenuNode[];
};

function toNode(open: OpenMenu, trailing: MenuNode | null = null): MenuNode {
  const children = trailing ? [...open.children, trailing] : open.children;
  return MenuNode.menu(open.label, children, { flags: open.flags });
}

function actionFlags(options: AddActionOptions): MenuFlagBits {
  let flags = options.flags ?? MenuFlags.None;
  if (options.color) flags |= MenuFlags.Colored;
  if (options.selected) flags |= MenuFlags.Selected;
  if (options.disabled) flags |= MenuFlags.Disabled;
  return flags;
}

/**
 * Fluent builder for menu trees.
 *
 * ```ts
 * const menu = new MenuTreeBuilder("Edit")
 *   .addAction("Undo", undo, { shortcut: "Ctrl+Z" })
 *   .addSeparator()
 *   .pushSubmenu("Paste Special")
 *   .addAction("Values Only", pasteValues)
 *   .popMenu()
 *   .root;
 * ```
 */
export class MenuTreeBuilder {
  private readonly stack: OpenMenu[];
  private built: MenuNode | null = null;

  constructor(title = "", flags: MenuFlagBits = MenuFlags.None) {
    this.stack = [{ label: title, flags, children: [] }];
  }

  /**
   * The tree as built so far, with any submenus still open closed over their current
   * entries. Reading it again without adding anything returns the same node.
   */
  get root(): MenuNode {
    if (!this.built) {
      let node: MenuNode | null = null;
      for (let i = this.stack.length - 1; i >= 0; i -= 1) {
        const open = this.stack[i];
        if (open) node = toNode(open, node);
      }
      this.built = node;
    }
    if (!this.built) throw new Error("MenuTreeBuilder stack is empty");
    return this.built;
  }

  /** A snapshot of the menu entries are currently appended to. */
  get current(): MenuNode {
    return this.stack.length === 1 ? this.root : toNode(this.top());
  }

  get depth(): number {
    return this.stack.length;
  }

  pushSubmenu(label: string, flags: MenuFlagBits = MenuFlags.None): this {
    this.built = null;
    this.stack.push({ label, flags, children: [] });
    return this;
  }

  /** Returns to the parent menu. The root is never popped. */
  popMenu(): this {
    const open = this.stack.length > 1 ? this.stack.pop() : undefined;
    if (open) {
      this.built = null;
      this.top().children.push(toNode(open));
    }
    return this;
  }

  addSeparator(): this {
    this.append(MenuNode.separator());
    return this;
  }

  addAction(label: string, onSelect: MenuSelectHandler, options: AddActionOptions = {}): this {
    this.append(
      MenuNode.action(label, onSelect, {
        icon: options.icon ?? null,
        shortcut: options.shortcut ?? null,
        color: options.color,
        alignment: options.alignment,
        flags: actionFlags(options),
      }),
    );
    return this;
  }

  addGoBack(label: string, onSelect: MenuSelectHandler, options: Pick<AddActionOptions, "icon" | "alignment"> = {}): this {
    this.append(MenuNode.goBack(label, onSelect, { icon: options.icon ?? null, alignment: options.alignment }));
    return this;
  }

  private top(): OpenMenu {
    const open = this.stack[this.stack.length - 1];
    if (!open) throw new Error("MenuTreeBuilder stack is empty");
    return open;
  }

  private append(node: MenuNode): void {
    this.built = null;
    this.top().children.push(node);
  }
}
