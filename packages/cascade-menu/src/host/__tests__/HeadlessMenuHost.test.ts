import { describe, expect, it, vi } from "vitest";

import { rgba, WHITE } from "../../style/color.js";
import type { MenuHostEvent } from "../types.js";
import { estimateTextSize, HeadlessMenuHost } from "../HeadlessMenuHost.js";

const CLEAR = rgba(0, 0, 0, 0);
const FONT = { family: "sans-serif", sizePx: 12 };

describe("HeadlessMenuHost", () => {
  it("maps nested frames through the surface scale", () => {
    const host = new HeadlessMenuHost({ screen: { left: 10, top: 20, right: 810, bottom: 620 }, scale: 2 });
    const surface = host.createSurface({ color: CLEAR, visible: false, sink: vi.fn() });
    const panel = host.createPanel(surface, { color: WHITE });
    panel.setFrame({ x: 5, y: 5, width: 50, height: 20 });
    const label = host.createLabel(panel, { text: "Hi", font: FONT, color: WHITE, align: "start" });
    label.setFrame({ x: 2, y: 3, width: 10, height: 10 });

    expect(surface.getFrame()).toEqual({ x: 0, y: 0, width: 400, height: 300 });
    expect(label.getScreenBounds()).toEqual({ left: 24, top: 36, right: 44, bottom: 56 });
  });

  it("rejects a non-positive scale", () => {
    expect(() => new HeadlessMenuHost({ scale: 0 })).toThrow("scale must be a positive number, got 0");
  });

  it("hides the surface color unless it is visible", () => {
    const host = new HeadlessMenuHost();
    const tint = rgba(0, 0, 0, 0.4);
    expect(host.createSurface({ color: tint, visible: false, sink: vi.fn() }).color.a).toBe(0);
    expect(host.createSurface({ color: tint, visible: true, sink: vi.fn() }).color.a).toBe(0.4);
  });

  it("orders siblings for drawing", () => {
    const host = new HeadlessMenuHost();
    const surface = host.createSurface({ color: CLEAR, visible: false, sink: vi.fn() });
    const a = host.createPanel(surface, { color: WHITE });
    const b = host.createPanel(surface, { color: WHITE });
    const c = host.createPanel(surface, { color: WHITE });

    a.bringToFront();
    expect(surface.children.map((child) => child.id)).toEqual([b.id, c.id, a.id]);

    c.placeBehind(b);
    expect(surface.children.map((child) => child.id)).toEqual([c.id, b.id, a.id]);

    const nested = host.createPanel(a, { color: WHITE });
    expect(() => nested.placeBehind(b)).toThrow(`Widget ${nested.id} and ${b.id} are not siblings`);
  });

  it("forgets a destroyed subtree", () => {
    const host = new HeadlessMenuHost();
    const surface = host.createSurface({ color: CLEAR, visible: false, sink: vi.fn() });
    const panel = host.createPanel(surface, { color: WHITE });
    host.createLabel(panel, { text: "Gone", font: FONT, color: WHITE, align: "start" });
    expect(host.liveWidgetCount).toBe(3);

    panel.destroy();

    expect(host.liveWidgetCount).toBe(1);
    expect(host.findLabel("Gone")).toBeUndefined();
    expect(surface.children).toHaveLength(0);
    expect(() => host.createLabel(panel, { text: "x", font: FONT, color: WHITE, align: "start" })).toThrow(
      `Widget ${panel.id} does not belong to this host or was destroyed`,
    );
  });

  it("keeps widgets of another host out", () => {
    const host = new HeadlessMenuHost();
    const foreign = new HeadlessMenuHost().createSurface({ color: CLEAR, visible: false, sink: vi.fn() });
    expect(() => host.createPanel(foreign, { color: WHITE })).toThrow("does not belong to this host");
  });

  it("tracks control state colors", () => {
    const host = new HeadlessMenuHost();
    const surface = host.createSurface({ color: CLEAR, visible: false, sink: vi.fn() });
    const control = host.createControl(surface, { color: WHITE });
    const colors = {
      normal: rgba(1, 1, 1),
      highlighted: rgba(0, 0, 1),
      pressed: rgba(0, 1, 0),
      disabled: rgba(0.5, 0.5, 0.5),
    };
    control.setStateColors(colors);

    control.setState("highlighted");
    expect(control.color).toEqual(colors.highlighted);

    control.setInteractable(false);
    control.setState("pressed");
    expect(control.getState()).toBe("disabled");
    expect(control.color).toEqual(colors.disabled);
  });

  it("routes simulated input to the owning surface", () => {
    const host = new HeadlessMenuHost();
    const events: MenuHostEvent[] = [];
    const surface = host.createSurface({ color: CLEAR, visible: false, sink: (event) => events.push(event) });
    const control = host.createControl(surface, { color: WHITE });

    host.pointerEnter(control);
    host.click(control);
    control.destroy();
    host.click(control);

    expect(events).toEqual([
      { type: "pointer-enter", targetId: control.id },
      { type: "pointer-down", targetId: control.id },
      { type: "click", targetId: control.id },
    ]);
  });

  it("lays out a scroll view and scrolls by position or notches", () => {
    const host = new HeadlessMenuHost();
    const events: MenuHostEvent[] = [];
    const surface = host.createSurface({ color: CLEAR, visible: false, sink: (event) => events.push(event) });
    const panel = host.createPanel(surface, { color: WHITE });
    panel.setFrame({ x: 0, y: 0, width: 100, height: 50 });
    const view = host.createScrollView(panel, {
      scrollbarWidth: 10,
      sensitivity: 20,
      trackColor: WHITE,
      thumbColor: WHITE,
    });
    view.content.setFrame({ x: 0, y: 0, width: 100, height: 150 });
    view.refresh();

    expect(view.viewport.getFrame()).toEqual({ x: 0, y: 0, width: 90, height: 50 });
    expect(view.scrollbar.getFrame()).toEqual({ x: 90, y: 0, width: 10, height: 50 });
    expect(view.content.getFrame()).toEqual({ x: 0, y: 0, width: 90, height: 150 });

    host.scrollTo(view, 0.5);
    expect(view.content.getFrame().y).toBe(-50);
    // 24px minimum thumb over a 26px travel
    expect(view.thumb.getFrame()).toEqual({ x: 0, y: 13, width: 10, height: 24 });

    host.wheel(view, 1);
    expect(view.getNormalizedPosition()).toBeCloseTo(0.7);

    host.scrollTo(view, Number.NaN);
    expect(view.getNormalizedPosition()).toBe(0);
    expect(events).toEqual([
      { type: "scroll", targetId: view.viewport.id },
      { type: "scroll", targetId: view.viewport.id },
      { type: "scroll", targetId: view.viewport.id },
    ]);
  });

  it("estimates text size from the font size", () => {
    expect(estimateTextSize("abcd", FONT)).toEqual({ width: 24, height: 15 });
  });
});
