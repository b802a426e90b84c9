/**
 * Layout utilities for SVG charts.
 *
 * @module
 *
 * **layout** -- ChartLayout (title band, margins, label areas) and the
 * bound ChartLayoutBuilder.
 *
 * **centering** -- Fit value ranges to a plotting area's aspect ratio.
 *
 * **DrawingArea** -- Pixel areas over a retained SVG scene.
 *
 * **ChartBuilder** -- Cartesian coordinate system with axes and series.
 *
 * **text** -- Fonts, text styles, text metrics.
 *
 * **SvgSceneView** -- React renderer for scenes.
 */

export { ChartLayout, ChartLayoutBuilder, TITLE_PADDING_CAP } from "./core/layout";
export { centeringRanges } from "./core/centering";
export { DrawingArea } from "./core/DrawingArea";
export { ChartBuilder, ChartContext } from "./core/ChartBuilder";
export type { AxesOptions, LabelAreaPosition } from "./core/ChartBuilder";
export { Viewport } from "./core/Viewport";
export {
  DEFAULT_TICKS,
  DEFAULT_TICK_STYLE,
  formatTick,
  normalizeTicks,
  tickValues,
} from "./core/axesTicks";
export type { TickStyle, TickVisibility } from "./core/axesTicks";
export {
  estimateTextSize,
  estimatedTextMetrics,
  font,
  textStyleFromFont,
  withAnchor,
} from "./core/text";
export type {
  FontDesc,
  FontStyle,
  HPos,
  TextAnchor,
  TextBox,
  TextMetrics,
  TextStyle,
  VPos,
} from "./core/text";
export { DrawingAreaError, FontError, LayoutConfigError } from "./core/errors";
export type {
  Drawable,
  FillStyle,
  LineDrawable,
  PointDrawable,
  PolylineDrawable,
  RectDrawable,
  SceneOutput,
  StrokeStyle,
  TextDrawable,
} from "./core/drawables";
export type { Domain, Margin, Point, Side, Size } from "./core/types";
export { SvgSceneView, renderSceneToSvgMarkup } from "./view/SvgSceneView";
