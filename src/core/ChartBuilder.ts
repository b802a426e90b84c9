// src/core/ChartBuilder.ts

// ------------------------------------------------------------
// ChartBuilder: builds a 2D cartesian coordinate system on an area
//
//   +------------------------------------------+
//   |                 margin.top               |
//   |      +------ label.top -------+          |
//   |  m.l | l.l |  plotting area   | l.r | m.r|
//   |      +----- label.bottom -----+          |
//   |                margin.bottom             |
//   +------------------------------------------+
//
// plotWidth  = width  - (m.left + m.right + l.left + l.right)
// plotHeight = height - (m.top + m.bottom + l.top + l.bottom)
// ------------------------------------------------------------

import {
  DEFAULT_TICK_STYLE,
  drawXTicks,
  drawYTicks,
  normalizeTicks,
  type TickStyle,
  type TickVisibility,
} from "./axesTicks";
import type { DrawingArea } from "./DrawingArea";
import type { FillStyle, StrokeStyle } from "./drawables";
import { DrawingAreaError, LayoutConfigError, assertPixelSize } from "./errors";
import { Viewport } from "./Viewport";
import type { Domain, Margin, Point, Side } from "./types";

export type LabelAreaPosition = Side;

export type AxesOptions = {
  ticks?: number;
  tickVisibility?: TickVisibility;
  style?: Partial<TickStyle>;
};

function zeroMargin(): Margin {
  return { top: 0, right: 0, bottom: 0, left: 0 };
}

function assertDomain(name: string, domain: Domain): void {
  if (!Number.isFinite(domain[0]) || !Number.isFinite(domain[1])) {
    throw new DrawingAreaError(`${name} must be finite, got [${domain[0]}, ${domain[1]}]`);
  }
}

export class ChartBuilder {
  private readonly area: DrawingArea;
  private readonly marginSize: Margin;
  private readonly labelAreaSize: Margin;

  private constructor(area: DrawingArea) {
    this.area = area;
    this.marginSize = zeroMargin();
    this.labelAreaSize = zeroMargin();
  }

  static on(area: DrawingArea): ChartBuilder {
    return new ChartBuilder(area);
  }

  marginTop(size: number): this {
    this.marginSize.top = assertPixelSize("margin.top", size);
    return this;
  }

  marginBottom(size: number): this {
    this.marginSize.bottom = assertPixelSize("margin.bottom", size);
    return this;
  }

  marginLeft(size: number): this {
    this.marginSize.left = assertPixelSize("margin.left", size);
    return this;
  }

  marginRight(size: number): this {
    this.marginSize.right = assertPixelSize("margin.right", size);
    return this;
  }

  margin(size: number): this {
    return this.marginTop(size).marginBottom(size).marginLeft(size).marginRight(size);
  }

  setLabelAreaSize(position: LabelAreaPosition, size: number): this {
    this.labelAreaSize[position] = assertPixelSize(`labelAreaSize.${position}`, size);
    return this;
  }

  buildCartesian2d(xDomain: Domain, yDomain: Domain): ChartContext {
    assertDomain("x range", xDomain);
    assertDomain("y range", yDomain);

    const { width, height } = this.area.getDimInPixel();
    const m = this.marginSize;
    const l = this.labelAreaSize;

    // 1) margins
    const innerWidth = width - m.left - m.right;
    const innerHeight = height - m.top - m.bottom;
    if (innerWidth < 0 || innerHeight < 0) {
      throw new LayoutConfigError(
        `margins (top ${m.top}, bottom ${m.bottom}, left ${m.left}, right ${m.right}) ` +
          `do not fit in ${width}x${height}`,
      );
    }

    // 2) label areas
    const plotWidth = innerWidth - l.left - l.right;
    const plotHeight = innerHeight - l.top - l.bottom;
    if (plotWidth < 0 || plotHeight < 0) {
      throw new LayoutConfigError(
        `label areas (top ${l.top}, bottom ${l.bottom}, left ${l.left}, right ${l.right}) ` +
          `do not fit in ${innerWidth}x${innerHeight}`,
      );
    }

    // 3) carve the plotting area and the four label bands
    const plotOffset: Point = { x: m.left + l.left, y: m.top + l.top };
    const plotting = this.area.shrink(plotOffset, { width: plotWidth, height: plotHeight });

    const labelAreas: Record<LabelAreaPosition, DrawingArea | null> = {
      top: null,
      right: null,
      bottom: null,
      left: null,
    };
    if (l.top > 0) {
      labelAreas.top = this.area.shrink({ x: plotOffset.x, y: m.top }, { width: plotWidth, height: l.top });
    }
    if (l.bottom > 0) {
      labelAreas.bottom = this.area.shrink(
        { x: plotOffset.x, y: plotOffset.y + plotHeight },
        { width: plotWidth, height: l.bottom },
      );
    }
    if (l.left > 0) {
      labelAreas.left = this.area.shrink({ x: m.left, y: plotOffset.y }, { width: l.left, height: plotHeight });
    }
    if (l.right > 0) {
      labelAreas.right = this.area.shrink(
        { x: plotOffset.x + plotWidth, y: plotOffset.y },
        { width: l.right, height: plotHeight },
      );
    }

    const viewport = new Viewport(plotWidth, plotHeight, xDomain, yDomain);
    return new ChartContext(plotting, labelAreas, viewport);
  }
}

// ------------------------------------------------------------
// ChartContext: the built coordinate system
// ------------------------------------------------------------
export class ChartContext {
  private readonly plotting: DrawingArea;
  private readonly labelAreas: Record<LabelAreaPosition, DrawingArea | null>;
  private readonly viewport: Viewport;

  constructor(
    plotting: DrawingArea,
    labelAreas: Record<LabelAreaPosition, DrawingArea | null>,
    viewport: Viewport,
  ) {
    this.plotting = plotting;
    this.labelAreas = labelAreas;
    this.viewport = viewport;
  }

  plottingArea(): DrawingArea {
    return this.plotting;
  }

  labelArea(position: LabelAreaPosition): DrawingArea | null {
    return this.labelAreas[position];
  }

  getViewport(): Viewport {
    return this.viewport;
  }

  getXDomain(): Domain {
    return this.viewport.getXDomain();
  }

  getYDomain(): Domain {
    return this.viewport.getYDomain();
  }

  // Series in value space -> polyline in the plotting area
  drawLineSeries(points: Point[], stroke?: StrokeStyle): void {
    const pixels = points.map((p) => this.viewport.valueToPixelMapping(p));
    this.plotting.drawPolyline(pixels, stroke);
  }

  drawPoints(points: Point[], r: number, fill?: FillStyle): void {
    let i = 0;
    while (i < points.length) {
      this.plotting.drawPoint(this.viewport.valueToPixelMapping(points[i]), r, fill);
      i += 1;
    }
  }

  // Axis line, ticks and tick labels in every non-empty label area
  drawAxes(options: AxesOptions = {}): void {
    const ticks = normalizeTicks(options.ticks);
    const style: TickStyle = { ...DEFAULT_TICK_STYLE, ...options.style };

    let visibility = options.tickVisibility;
    if (visibility === undefined) {
      visibility = { showTickLines: true, showTickLabels: true };
    }

    const vp = this.viewport;
    const top = this.labelAreas.top;
    const bottom = this.labelAreas.bottom;
    const left = this.labelAreas.left;
    const right = this.labelAreas.right;

    if (bottom) {
      drawXTicks({ area: bottom, side: "bottom", vp, ticks, style, visibility });
    }
    if (top) {
      drawXTicks({ area: top, side: "top", vp, ticks, style, visibility });
    }
    if (left) {
      drawYTicks({ area: left, side: "left", vp, ticks, style, visibility });
    }
    if (right) {
      drawYTicks({ area: right, side: "right", vp, ticks, style, visibility });
    }
  }
}
