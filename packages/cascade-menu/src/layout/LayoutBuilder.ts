import { MenuConfigError } from "../errors.js";
import type { Frame, Size } from "../geometry/bounds.js";
import type { ControlStateColors, MenuControl, MenuHost, MenuImage, MenuLabel, MenuWidget } from "../host/types.js";
import type { MenuLogger } from "../logging/logger.js";
import { MenuFlags, type MenuNode } from "../model/MenuNode.js";
import { multiplyColor, type Rgba } from "../style/color.js";
import { resolveTextAlign, type StyleConfig } from "../style/StyleConfig.js";
import { computeColumns, entryContentHeight, stackRows, type ColumnLayout, type EntryMetrics, type RowMetrics } from "./columns.js";

export type InteractiveKind = "action" | "menu" | "go-back";

export type BuiltEntry = {
  node: MenuNode;
  kind: InteractiveKind;
  control: MenuControl;
};

export type BuiltRow = {
  node: MenuNode;
  /** The entry control, or the separator plate. */
  widget: MenuWidget;
  frame: Frame;
};

export type BuiltPanel = {
  body: MenuWidget;
  shadow: MenuWidget;
  title: MenuLabel | null;
  rows: BuiltRow[];
  entries: BuiltEntry[];
  columns: ColumnLayout;
  /** Natural size in surface-local units, before any scroll gutter. */
  width: number;
  height: number;
};

export type BuildPanelOptions = {
  host: MenuHost;
  style: StyleConfig;
  logger: MenuLogger;
  /** Widget the body and shadow are created under (the modal surface). */
  parent: MenuWidget;
  owner: MenuNode;
  /** Rows to realize; usually `owner.children`, possibly with a go-back entry in front. */
  entries: readonly MenuNode[];
  /** Overrides `style.showTitles` for this panel. */
  showTitle?: boolean;
};

type EntryParts = {
  kind: InteractiveKind;
  node: MenuNode;
  control: MenuControl;
  label: MenuLabel;
  icon: MenuWidget | null;
  shortcut: MenuLabel | null;
  arrow: MenuWidget | null;
  metrics: EntryMetrics;
};

type SeparatorParts = {
  kind: "separator";
  node: MenuNode;
  plate: MenuWidget;
};

type RowParts = EntryParts | SeparatorParts;

function imageSize(image: MenuImage): Size {
  return { width: image.width, height: image.height };
}

export function entryBaseColor(node: MenuNode, style: Pick<StyleConfig, "unselectedColor" | "selectedColor">): Rgba {
  if (node.hasFlag(MenuFlags.Colored)) return node.color;
  if (node.hasFlag(MenuFlags.Selected)) return style.selectedColor;
  return style.unselectedColor;
}

export function entryStateColors(
  base: Rgba,
  style: Pick<StyleConfig, "highlightTint" | "pressedTint" | "disabledTint">,
): ControlStateColors {
  return {
    normal: base,
    highlighted: multiplyColor(style.highlightTint, base),
    pressed: multiplyColor(style.pressedTint, base),
    disabled: multiplyColor(style.disabledTint, base),
  };
}

function requireSubmenuArrow(options: BuildPanelOptions): MenuImage | null {
  const needsArrow = options.entries.some((node) => node.kind === "menu");
  if (!needsArrow) return null;
  if (!options.style.submenuArrow) {
    throw new MenuConfigError(
      `Menu "${options.owner.label}" contains submenus but no submenuArrow image is configured`,
    );
  }
  return options.style.submenuArrow;
}

function centeredY(contentTop: number, contentHeight: number, height: number): number {
  return contentTop + (contentHeight - height) / 2;
}

/**
 * Realizes one menu level as a body panel (plus its shadow) holding one control
 * per interactive entry and one plate per separator.
 *
 * The body is left at the surface origin with its natural size; the session
 * positions it.
 */
export function buildPanel(options: BuildPanelOptions): BuiltPanel {
  const { host, style, logger } = options;
  const arrowImage = requireSubmenuArrow(options);

  const shadow = host.createPanel(options.parent, { color: style.shadowColor, image: style.shadowImage });
  const body = host.createPanel(options.parent, { color: style.panelColor, image: style.panelImage });

  const showTitle = (options.showTitle ?? style.showTitles) && options.owner.label !== "";
  let title: MenuLabel | null = null;
  let titleSize: Size = { width: 0, height: 0 };
  if (showTitle) {
    title = host.createLabel(body, {
      text: options.owner.label,
      font: style.titleFont,
      color: style.titleColor,
      align: "center",
    });
    titleSize = title.getPreferredSize();
  }
  const titlePadding = style.titlePadding;
  const titleHeight = title ? titleSize.height + titlePadding.top + titlePadding.bottom : 0;
  const titleWidth = title ? Math.ceil(titleSize.width) + titlePadding.left + titlePadding.right : 0;

  const parts: RowParts[] = [];
  for (const node of options.entries) {
    const kind: string = node.kind;
    if (node.kind === "separator") {
      parts.push({
        kind: "separator",
        node,
        plate: host.createPanel(body, { color: style.separatorColor, image: style.separatorImage }),
      });
    } else if (node.kind === "action" || node.kind === "menu" || node.kind === "go-back") {
      const control = host.createControl(body, { color: style.unselectedColor, image: style.entryImage });
      const label = host.createLabel(control, {
        text: node.label,
        font: style.entryFont,
        color: style.entryTextColor,
        align: resolveTextAlign(style, node.alignment),
      });
      const icon = node.icon ? host.createImage(control, node.icon) : null;
      const shortcut = node.shortcut
        ? host.createLabel(control, {
            text: node.shortcut,
            font: style.shortcutFont,
            color: style.shortcutColor,
            align: "end",
          })
        : null;
      const arrow = node.kind === "menu" && arrowImage ? host.createImage(control, arrowImage) : null;

      parts.push({
        kind: node.kind,
        node,
        control,
        label,
        icon,
        shortcut,
        arrow,
        metrics: {
          kind: "entry",
          label: label.getPreferredSize(),
          icon: node.icon ? imageSize(node.icon) : null,
          shortcut: shortcut ? shortcut.getPreferredSize() : null,
          arrow: arrow && arrowImage ? imageSize(arrowImage) : null,
        },
      });
    } else {
      logger.warn({ kind, label: options.owner.label }, "menu_entry_kind_unsupported");
    }
  }

  const metrics = parts.map((part): RowMetrics => (part.kind === "separator" ? { kind: "separator" } : part.metrics));
  const columns = computeColumns(metrics, style, titleWidth);
  const stacked = stackRows(metrics, columns, style, titleHeight);

  title?.setFrame({
    x: style.outerPadding.left + titlePadding.left,
    y: style.outerPadding.top + titlePadding.top,
    width: Math.max(0, columns.entryWidth - titlePadding.left - titlePadding.right),
    height: titleSize.height,
  });

  const rows: BuiltRow[] = [];
  const entries: BuiltEntry[] = [];

  parts.forEach((part, index) => {
    const frame = stacked.frames[index] ?? { x: 0, y: 0, width: 0, height: 0 };

    if (part.kind === "separator") {
      part.plate.setFrame(frame);
      rows.push({ node: part.node, widget: part.plate, frame });
      return;
    }

    part.control.setFrame(frame);
    layoutEntryParts(part, columns, style);

    const base = entryBaseColor(part.node, style);
    part.control.setStateColors(entryStateColors(base, style));
    if (part.node.hasFlag(MenuFlags.Disabled)) part.control.setInteractable(false);

    rows.push({ node: part.node, widget: part.control, frame });
    entries.push({ node: part.node, kind: part.kind, control: part.control });
  });

  body.setFrame({ x: 0, y: 0, width: columns.panelWidth, height: stacked.panelHeight });

  return {
    body,
    shadow,
    title,
    rows,
    entries,
    columns,
    width: columns.panelWidth,
    height: stacked.panelHeight,
  };
}

function layoutEntryParts(part: EntryParts, columns: ColumnLayout, style: StyleConfig): void {
  const top = style.entryPadding.top;
  const contentHeight = entryContentHeight(part.metrics, style);

  part.label.setFrame({ x: columns.labelX, y: top, width: columns.labelWidth, height: contentHeight });

  const icon = part.metrics.icon;
  if (part.icon && icon) {
    part.icon.setFrame({
      x: columns.iconX,
      y: centeredY(top, contentHeight, icon.height),
      width: icon.width,
      height: icon.height,
    });
  }

  if (part.shortcut) {
    part.shortcut.setFrame({ x: columns.shortcutX, y: top, width: columns.shortcutColumn, height: contentHeight });
  }

  const arrow = part.metrics.arrow;
  if (part.arrow && arrow) {
    part.arrow.setFrame({
      x: columns.arrowX,
      y: centeredY(top, contentHeight, arrow.height),
      width: arrow.width,
      height: arrow.height,
    });
  }
}
