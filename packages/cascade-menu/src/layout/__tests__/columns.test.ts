import { describe, expect, it } from "vitest";

import { DEFAULT_STYLE_CONFIG, resolveStyleConfig } from "../../style/StyleConfig.js";
import { computeColumns, stackRows, type RowMetrics } from "../columns.js";

function entry(labelWidth: number, extra: { icon?: number; shortcut?: number; arrow?: number; height?: number } = {}): RowMetrics {
  return {
    kind: "entry",
    label: { width: labelWidth, height: extra.height ?? 14 },
    icon: extra.icon ? { width: extra.icon, height: 12 } : null,
    shortcut: extra.shortcut ? { width: extra.shortcut, height: 12 } : null,
    arrow: extra.arrow ? { width: extra.arrow, height: 8 } : null,
  };
}

describe("computeColumns", () => {
  it("sizes the icon and label columns from the widest entry", () => {
    const rows = [entry(30, { icon: 10 }), entry(15, { icon: 20 }), entry(50)];
    const columns = computeColumns(rows, DEFAULT_STYLE_CONFIG);

    expect(columns.iconColumn).toBe(20);
    expect(columns.labelColumn).toBe(51);
    expect(columns.iconX).toBe(6);
    expect(columns.labelX).toBe(31);
    expect(columns.entryWidth).toBe(88);
    expect(columns.panelWidth).toBe(96);
  });

  it("rounds fractional label widths up", () => {
    expect(computeColumns([entry(49.2)], DEFAULT_STYLE_CONFIG).labelColumn).toBe(51);
  });

  it("anchors shortcut and arrow columns to the right and gives slack to the label", () => {
    const style = resolveStyleConfig({ minEntryWidth: 150 });
    const columns = computeColumns([entry(40, { shortcut: 20, arrow: 8 }), entry(10)], style);

    expect(columns.entryWidth).toBe(150);
    expect(columns.arrowX).toBe(136);
    expect(columns.shortcutX).toBe(111);
    expect(columns.labelX).toBe(6);
    expect(columns.labelWidth).toBe(89);
    expect(columns.panelWidth).toBe(158);
  });

  it("widens to the caller's minimum content width", () => {
    expect(computeColumns([entry(24)], DEFAULT_STYLE_CONFIG, 40).entryWidth).toBe(40);
  });

  it("reserves the minimum separator width", () => {
    const style = resolveStyleConfig({ minSeparatorWidth: 60 });
    expect(computeColumns([entry(6), { kind: "separator" }], style).entryWidth).toBe(68);
  });
});

describe("stackRows", () => {
  it("stacks entries and separators below the title block", () => {
    const rows = [entry(20), { kind: "separator" } as const, entry(20, { height: 30 })];
    const stacked = stackRows(rows, { entryWidth: 100 }, DEFAULT_STYLE_CONFIG, 10);

    expect(stacked.frames).toEqual([
      { x: 4, y: 14, width: 100, height: 24 },
      { x: 8, y: 44, width: 92, height: 1 },
      { x: 4, y: 51, width: 100, height: 34 },
    ]);
    expect(stacked.panelHeight).toBe(89);
  });

  it("keeps only the outer padding for an empty menu", () => {
    expect(stackRows([], { entryWidth: 10 }, DEFAULT_STYLE_CONFIG).panelHeight).toBe(8);
  });
});
