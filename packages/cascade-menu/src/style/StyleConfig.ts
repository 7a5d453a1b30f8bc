import { z } from "zod";

import { MenuConfigError } from "../errors.js";
import type { HostTextAlign } from "../host/types.js";

const UnitSchema = z.number().min(0).max(1);

const RgbaSchema = z
  .object({
    r: UnitSchema,
    g: UnitSchema,
    b: UnitSchema,
    a: UnitSchema.default(1),
  })
  .strict();

const LengthSchema = z.number().finite().nonnegative();

const PaddingSchema = z
  .object({
    top: LengthSchema.default(0),
    left: LengthSchema.default(0),
    right: LengthSchema.default(0),
    bottom: LengthSchema.default(0),
  })
  .strict();

const ImageSchema = z
  .object({
    width: LengthSchema,
    height: LengthSchema,
    src: z.string().min(1).optional(),
  })
  .strict();

const FontSchema = z
  .object({
    family: z.string().min(1).default("sans-serif"),
    sizePx: z.number().finite().positive().default(14),
    weight: z.union([z.string().min(1), z.number().int().positive()]).optional(),
  })
  .strict();

const OffsetSchema = z
  .object({
    x: z.number().finite(),
    y: z.number().finite(),
  })
  .strict();

export const TextAlignmentSchema = z.enum(["left", "middle", "right", "default"]);
export type TextAlignment = z.infer<typeof TextAlignmentSchema>;

export const CloseMethodSchema = z.enum(["pointer-down", "click"]);
export type CloseMethod = z.infer<typeof CloseMethodSchema>;

export const StyleConfigSchema = z
  .object({
    /** Scrim drawn by the modal surface behind all panels. */
    modalColor: RgbaSchema.default({ r: 0, g: 0, b: 0, a: 0 }),
    modalVisible: z.boolean().default(false),
    /** Which surface event closes the session when the user clicks outside every panel. */
    closeOn: CloseMethodSchema.default("pointer-down"),

    showTitles: z.boolean().default(false),
    titleFont: FontSchema.default({ sizePx: 14, weight: "bold" }),
    titleColor: RgbaSchema.default({ r: 0, g: 0, b: 0, a: 1 }),
    titlePadding: PaddingSchema.default({ top: 4, left: 8, right: 8, bottom: 4 }),

    panelColor: RgbaSchema.default({ r: 1, g: 1, b: 1, a: 1 }),
    panelImage: ImageSchema.nullable().default(null),
    outerPadding: PaddingSchema.default({ top: 4, left: 4, right: 4, bottom: 4 }),

    entryImage: ImageSchema.nullable().default(null),
    entryFont: FontSchema.default({}),
    entryTextColor: RgbaSchema.default({ r: 0, g: 0, b: 0, a: 1 }),
    shortcutFont: FontSchema.default({ sizePx: 12 }),
    shortcutColor: RgbaSchema.default({ r: 0.4, g: 0.4, b: 0.4, a: 1 }),
    entryPadding: PaddingSchema.default({ top: 2, left: 6, right: 6, bottom: 2 }),
    minEntryWidth: LengthSchema.default(0),
    minEntryHeight: LengthSchema.default(20),
    childrenSpacing: LengthSchema.default(3),
    iconTextGap: LengthSchema.default(5),
    textArrowGap: LengthSchema.default(5),
    textShortcutGap: LengthSchema.default(16),

    unselectedColor: RgbaSchema.default({ r: 1, g: 1, b: 1, a: 1 }),
    selectedColor: RgbaSchema.default({ r: 0.8, g: 1, b: 0.8, a: 1 }),
    highlightTint: RgbaSchema.default({ r: 0.9, g: 0.9, b: 0.9, a: 1 }),
    pressedTint: RgbaSchema.default({ r: 0.78, g: 0.78, b: 0.78, a: 1 }),
    disabledTint: RgbaSchema.default({ r: 0.78, g: 0.78, b: 0.78, a: 0.5 }),

    /** Arrow drawn on submenu entries. Required as soon as a menu contains a submenu. */
    submenuArrow: ImageSchema.nullable().default(null),

    separatorImage: ImageSchema.nullable().default(null),
    separatorColor: RgbaSchema.default({ r: 0.8, g: 0.8, b: 0.8, a: 1 }),
    separatorHeight: LengthSchema.default(1),
    separatorPadding: PaddingSchema.default({ top: 3, left: 4, right: 4, bottom: 3 }),
    minSeparatorWidth: LengthSchema.default(10),

    shadowImage: ImageSchema.nullable().default(null),
    shadowColor: RgbaSchema.default({ r: 0, g: 0, b: 0, a: 0.35 }),
    shadowOffset: OffsetSchema.default({ x: 3, y: 3 }),

    scrollbarWidth: LengthSchema.default(14),
    scrollbarImage: ImageSchema.nullable().default(null),
    scrollbarTrackColor: RgbaSchema.default({ r: 0.93, g: 0.93, b: 0.93, a: 1 }),
    scrollbarThumbColor: RgbaSchema.default({ r: 0.6, g: 0.6, b: 0.6, a: 1 }),
    scrollSensitivity: z.number().finite().positive().default(50),

    defaultTextAlignment: TextAlignmentSchema.exclude(["default"]).default("left"),

    /** Inject a go-back entry at the top of every submenu. */
    useGoBack: z.boolean().default(true),
    goBackLabel: z.string().default("Go Back"),
    goBackIcon: ImageSchema.nullable().default(null),
  })
  .strict();

export type StyleConfig = z.output<typeof StyleConfigSchema>;
export type StyleConfigInput = z.input<typeof StyleConfigSchema>;
export type Padding = StyleConfig["outerPadding"];

function formatIssues(issues: readonly z.ZodIssue[]): string {
  return issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}

/**
 * Validates and fills defaults for a style configuration.
 *
 * Layers are merged shallowly left to right, so a later layer replaces whole
 * nested objects (e.g. an `entryPadding` override replaces every side).
 */
export function resolveStyleConfig(...layers: Array<StyleConfigInput | undefined>): StyleConfig {
  const merged: StyleConfigInput = {};
  for (const layer of layers) {
    if (layer) Object.assign(merged, layer);
  }

  const parsed = StyleConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new MenuConfigError(`Invalid menu style configuration: ${formatIssues(parsed.error.issues)}`, {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

export const DEFAULT_STYLE_CONFIG: StyleConfig = resolveStyleConfig();

export function resolveTextAlign(style: Pick<StyleConfig, "defaultTextAlignment">, alignment: TextAlignment): HostTextAlign {
  switch (alignment) {
    case "left":
      return "start";
    case "middle":
      return "center";
    case "right":
      return "end";
    case "default":
      return resolveTextAlign(style, style.defaultTextAlignment);
  }
}
