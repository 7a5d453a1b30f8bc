/**
 * Straight (non-premultiplied) RGBA color with every channel in [0, 1].
 */
export type Rgba = { r: number; g: number; b: number; a: number };

export const WHITE: Rgba = Object.freeze({ r: 1, g: 1, b: 1, a: 1 });

function clampUnit(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function rgba(r: number, g: number, b: number, a = 1): Rgba {
  return { r: clampUnit(r), g: clampUnit(g), b: clampUnit(b), a: clampUnit(a) };
}

/**
 * Channel-wise product, used to derive highlighted/pressed/disabled state colors
 * from an entry's base color.
 */
export function multiplyColor(tint: Rgba, base: Rgba): Rgba {
  return rgba(tint.r * base.r, tint.g * base.g, tint.b * base.b, tint.a * base.a);
}

export function toCssColor(color: Rgba): string {
  const r = Math.round(clampUnit(color.r) * 255);
  const g = Math.round(clampUnit(color.g) * 255);
  const b = Math.round(clampUnit(color.b) * 255);
  const a = Math.round(clampUnit(color.a) * 1000) / 1000;
  return `rgba(${r}, ${g}, ${b}, ${a})`;
}
