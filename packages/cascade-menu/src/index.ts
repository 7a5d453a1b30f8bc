export { MenuConfigError, MenuSessionDestroyedError, MenuSessionError, MenuTreeError } from "./errors.js";

export { ListenerSet, type Listener } from "./events/ListenerSet.js";
export { createSpawnerEvents, type MenuSpawnerEvents } from "./events/MenuEvents.js";

export {
  boundsFromPoint,
  boundsHeight,
  boundsWidth,
  isFiniteBounds,
  toHotspotBounds,
  type Bounds,
  type Frame,
  type HotspotInput,
  type Point,
  type Size,
} from "./geometry/bounds.js";
export { SurfaceSpace } from "./geometry/SurfaceSpace.js";

export {
  estimateTextSize,
  HeadlessControl,
  HeadlessLabel,
  HeadlessMenuHost,
  HeadlessScrollView,
  HeadlessSurface,
  HeadlessWidget,
  type HeadlessMenuHostOptions,
  type HeadlessWidgetKind,
  type TextMeasurer,
} from "./host/HeadlessMenuHost.js";
export type {
  ControlOptions,
  ControlState,
  ControlStateColors,
  FontSpec,
  HostTextAlign,
  LabelOptions,
  MenuControl,
  MenuHost,
  MenuHostEvent,
  MenuHostEventSink,
  MenuHostEventType,
  MenuImage,
  MenuLabel,
  MenuScrollView,
  MenuWidget,
  PanelOptions,
  ScrollViewOptions,
  SurfaceOptions,
} from "./host/types.js";

export {
  computeColumns,
  entryContentHeight,
  stackRows,
  type ColumnLayout,
  type EntryMetrics,
  type RowMetrics,
  type SeparatorMetrics,
  type StackedRows,
} from "./layout/columns.js";
export {
  buildPanel,
  entryBaseColor,
  entryStateColors,
  type BuildPanelOptions,
  type BuiltEntry,
  type BuiltPanel,
  type BuiltRow,
  type InteractiveKind,
} from "./layout/LayoutBuilder.js";

export { createLogger, type CreateLoggerOptions, type MenuLogger } from "./logging/logger.js";

export {
  assertMenuTree,
  MenuFlags,
  MenuNode,
  type MenuEntryOptions,
  type MenuFlagBits,
  type MenuNodeKind,
  type MenuSelectHandler,
} from "./model/MenuNode.js";
export { MenuTreeBuilder, type AddActionOptions } from "./model/MenuTreeBuilder.js";

export {
  dropdownDirectives,
  isGrowDirectionDirective,
  submenuDirectives,
  type GrowDirection,
  type GrowDirectionDirective,
  type PlacementDirective,
  type PlacementDirectives,
  type PositionDirective,
} from "./placement/directives.js";
export {
  clampHorizontal,
  fitsHorizontally,
  initialTop,
  resolveHorizontalPlacement,
  resolveVerticalPlacement,
  type HorizontalPlacement,
  type HorizontalPlacementInput,
  type VerticalPlacement,
  type VerticalPlacementInput,
} from "./placement/placement.js";
export {
  computeCenteredScrollPosition,
  computeScrollbarThumb,
  computeScrollViewLayout,
  maxScrollOffset,
  normalizedToOffset,
  offsetToNormalized,
  type ScrollbarThumb,
  type ScrollViewLayout,
} from "./placement/scrollMath.js";

export { EntryRouter, type EntryRegistration, type EntryRouterOptions, type MenuSessionController } from "./router/EntryRouter.js";

export { MenuSession, type MenuSessionInit, type PanelOpenOptions } from "./session/MenuSession.js";
export { MenuSessionRegistry } from "./session/MenuSessionRegistry.js";
export { MenuSpawner, type MenuSpawnerOptions, type OpenMenuOptions } from "./session/MenuSpawner.js";
export { PanelRecord, type PanelRecordInit } from "./session/PanelRecord.js";

export { multiplyColor, rgba, toCssColor, WHITE, type Rgba } from "./style/color.js";
export {
  CloseMethodSchema,
  DEFAULT_STYLE_CONFIG,
  resolveStyleConfig,
  resolveTextAlign,
  StyleConfigSchema,
  TextAlignmentSchema,
  type CloseMethod,
  type Padding,
  type StyleConfig,
  type StyleConfigInput,
  type TextAlignment,
} from "./style/StyleConfig.js";
