import type { Frame, Size } from "../geometry/bounds.js";
import type { StyleConfig } from "../style/StyleConfig.js";

export type EntryMetrics = {
  kind: "entry";
  label: Size;
  icon: Size | null;
  shortcut: Size | null;
  arrow: Size | null;
};

export type SeparatorMetrics = { kind: "separator" };

export type RowMetrics = EntryMetrics | SeparatorMetrics;

type ColumnStyle = Pick<
  StyleConfig,
  | "entryPadding"
  | "outerPadding"
  | "iconTextGap"
  | "textArrowGap"
  | "textShortcutGap"
  | "minEntryWidth"
  | "minSeparatorWidth"
  | "separatorPadding"
>;

/**
 * Horizontal layout shared by every entry of one panel. All x offsets are
 * relative to the entry plate's left edge.
 */
export type ColumnLayout = {
  iconColumn: number;
  labelColumn: number;
  shortcutColumn: number;
  arrowColumn: number;
  iconX: number;
  labelX: number;
  /** Label width after any slack from minimum widths went to the label column. */
  labelWidth: number;
  shortcutX: number;
  arrowX: number;
  entryWidth: number;
  panelWidth: number;
};

function maxOf(values: Iterable<number>): number {
  let max = 0;
  for (const value of values) {
    if (value > max) max = value;
  }
  return max;
}

function* entries(rows: readonly RowMetrics[]): Generator<EntryMetrics> {
  for (const row of rows) {
    if (row.kind === "entry") yield row;
  }
}

/**
 * Computes the uniform column layout of a panel.
 *
 * `minContentWidth` is the narrowest entry width the caller needs (e.g. a title).
 * Icons and labels start at the same x on every row; shortcuts and arrows are
 * anchored to the right edge so that extra width goes to the label column.
 */
export function computeColumns(rows: readonly RowMetrics[], style: ColumnStyle, minContentWidth = 0): ColumnLayout {
  const iconColumn = maxOf([...entries(rows)].map((row) => row.icon?.width ?? 0));
  const rawLabel = maxOf([...entries(rows)].map((row) => row.label.width));
  const labelColumn = Math.ceil(rawLabel) + 1;
  const shortcutColumn = Math.ceil(maxOf([...entries(rows)].map((row) => row.shortcut?.width ?? 0)));
  const arrowColumn = maxOf([...entries(rows)].map((row) => row.arrow?.width ?? 0));

  const hasIcons = iconColumn > 0;
  const hasShortcuts = shortcutColumn > 0;
  const hasArrows = arrowColumn > 0;
  const hasSeparators = rows.some((row) => row.kind === "separator");

  const padding = style.entryPadding;
  const natural =
    padding.left +
    iconColumn +
    (hasIcons ? style.iconTextGap : 0) +
    labelColumn +
    (hasShortcuts ? style.textShortcutGap + shortcutColumn : 0) +
    (hasArrows ? style.textArrowGap + arrowColumn : 0) +
    padding.right;

  const separatorMinimum = hasSeparators
    ? style.minSeparatorWidth + style.separatorPadding.left + style.separatorPadding.right
    : 0;
  const entryWidth = Math.max(natural, style.minEntryWidth, minContentWidth, separatorMinimum);

  const iconX = padding.left;
  const labelX = iconX + iconColumn + (hasIcons ? style.iconTextGap : 0);
  const arrowX = entryWidth - padding.right - arrowColumn;
  const shortcutRight = hasArrows ? arrowX - style.textArrowGap : entryWidth - padding.right;
  const shortcutX = shortcutRight - shortcutColumn;

  let labelRight: number;
  if (hasShortcuts) labelRight = shortcutX - style.textShortcutGap;
  else if (hasArrows) labelRight = arrowX - style.textArrowGap;
  else labelRight = entryWidth - padding.right;

  return {
    iconColumn,
    labelColumn,
    shortcutColumn,
    arrowColumn,
    iconX,
    labelX,
    labelWidth: Math.max(labelColumn, labelRight - labelX),
    shortcutX,
    arrowX,
    entryWidth,
    panelWidth: entryWidth + style.outerPadding.left + style.outerPadding.right,
  };
}

type RowStyle = Pick<
  StyleConfig,
  "entryPadding" | "outerPadding" | "minEntryHeight" | "childrenSpacing" | "separatorHeight" | "separatorPadding"
>;

export function entryContentHeight(metrics: EntryMetrics, style: Pick<StyleConfig, "minEntryHeight">): number {
  return Math.max(
    metrics.label.height,
    metrics.shortcut?.height ?? 0,
    metrics.icon?.height ?? 0,
    metrics.arrow?.height ?? 0,
    style.minEntryHeight,
  );
}

export type StackedRows = {
  /** Frame of each row relative to the panel; separators get their inset plate frame. */
  frames: Frame[];
  panelHeight: number;
};

/**
 * Stacks rows top to bottom below an optional title block.
 */
export function stackRows(
  rows: readonly RowMetrics[],
  columns: Pick<ColumnLayout, "entryWidth">,
  style: RowStyle,
  titleHeight = 0,
): StackedRows {
  const outer = style.outerPadding;
  const frames: Frame[] = [];
  let y = outer.top + titleHeight;

  rows.forEach((row, index) => {
    if (index > 0) y += style.childrenSpacing;

    if (row.kind === "separator") {
      const pad = style.separatorPadding;
      frames.push({
        x: outer.left + pad.left,
        y: y + pad.top,
        width: Math.max(0, columns.entryWidth - pad.left - pad.right),
        height: style.separatorHeight,
      });
      y += pad.top + style.separatorHeight + pad.bottom;
      return;
    }

    const height = entryContentHeight(row, style) + style.entryPadding.top + style.entryPadding.bottom;
    frames.push({ x: outer.left, y, width: columns.entryWidth, height });
    y += height;
  });

  return { frames, panelHeight: y + outer.bottom };
}
