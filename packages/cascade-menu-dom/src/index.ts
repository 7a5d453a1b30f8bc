export {
  createCanvasTextMeasurer,
  DomControl,
  DomLabel,
  DomMenuHost,
  DomScrollView,
  DomSurface,
  DomWidget,
  toCssFont,
  type DomMenuHostOptions,
} from "./DomMenuHost.js";
