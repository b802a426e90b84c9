// src/core/axesTicks.ts

// ------------------------------------------------------------
// Draws axis lines, tick marks and tick labels into label areas
//
// - label areas share one axis with the plotting area:
//   top / bottom areas have the plotting area's x origin and width,
//   left / right areas have its y origin and height,
//   so a Viewport pixel can be used inside them as-is
// - only draws; no state, no layout decisions
// ------------------------------------------------------------

import type { DrawingArea } from "./DrawingArea";
import { font, textStyleFromFont, withAnchor, type TextStyle } from "./text";
import type { Viewport } from "./Viewport";
import type { Domain } from "./types";

export const DEFAULT_TICKS = 5;

// Tick label format: change here for integers / units
export function formatTick(value: number): string {
  return value.toFixed(2);
}

export type TickStyle = {
  tickLen: number;
  fontSize: number;
  fontFamily: string;
  color: string;
};

export const DEFAULT_TICK_STYLE: TickStyle = {
  tickLen: 6,
  fontSize: 11,
  fontFamily: "sans-serif",
  color: "currentColor",
};

// Tick lines and tick labels are toggled separately
export type TickVisibility = {
  showTickLines: boolean;
  showTickLabels: boolean;
};

// ------------------------------------------------------------
// normalizeTicks: default and lower bound for the division count
// - undefined -> 5
// - < 1 -> 1
// ------------------------------------------------------------
export function normalizeTicks(ticks?: number): number {
  let safeTicks = ticks;
  if (safeTicks === undefined || !Number.isFinite(safeTicks)) {
    safeTicks = DEFAULT_TICKS;
  }
  safeTicks = Math.floor(safeTicks);
  if (safeTicks < 1) {
    safeTicks = 1;
  }
  return safeTicks;
}

// ticks + 1 evenly spaced values from domain[0] to domain[1]
export function tickValues(domain: Domain, ticks: number): number[] {
  const min = domain[0];
  const range = domain[1] - domain[0];

  const values: number[] = [];
  let i = 0;
  while (i <= ticks) {
    const t = i / ticks; // 0..1
    values.push(min + t * range);
    i += 1;
  }
  return values;
}

function labelStyle(style: TickStyle): TextStyle {
  const base = textStyleFromFont(font(style.fontFamily, style.fontSize));
  return { ...base, color: style.color };
}

// ------------------------------------------------------------
// drawXTicks: axis along the top or bottom edge of the plotting area
// - bottom: axis at y = 0 of the area, ticks grow downward
// - top: axis at y = area height, ticks grow upward
// ------------------------------------------------------------
export function drawXTicks(args: {
  area: DrawingArea;
  side: "top" | "bottom";
  vp: Viewport;
  ticks: number;
  style: TickStyle;
  visibility: TickVisibility;
}): void {
  const { area, side, vp, ticks, style, visibility } = args;
  const { width, height } = area.getDimInPixel();
  const stroke = { color: style.color, width: 1 };

  const axisY = side === "bottom" ? 0 : height;
  const dir = side === "bottom" ? 1 : -1;
  area.drawLine({ x: 0, y: axisY }, { x: width, y: axisY }, stroke);

  if (!visibility.showTickLines && !visibility.showTickLabels) {
    return;
  }

  const text = withAnchor(labelStyle(style), "center", side === "bottom" ? "top" : "bottom");

  for (const value of tickValues(vp.getXDomain(), ticks)) {
    const xPixel = vp.xValueToXPixel(value);

    if (visibility.showTickLines) {
      area.drawLine({ x: xPixel, y: axisY }, { x: xPixel, y: axisY + dir * style.tickLen }, stroke);
    }
    if (visibility.showTickLabels) {
      area.drawText(formatTick(value), text, { x: xPixel, y: axisY + dir * (style.tickLen + 2) });
    }
  }
}

// ------------------------------------------------------------
// drawYTicks: axis along the left or right edge of the plotting area
// - left: axis at x = area width, ticks grow leftward, labels right-aligned
// - right: axis at x = 0, ticks grow rightward, labels left-aligned
// ------------------------------------------------------------
export function drawYTicks(args: {
  area: DrawingArea;
  side: "left" | "right";
  vp: Viewport;
  ticks: number;
  style: TickStyle;
  visibility: TickVisibility;
}): void {
  const { area, side, vp, ticks, style, visibility } = args;
  const { width, height } = area.getDimInPixel();
  const stroke = { color: style.color, width: 1 };

  const axisX = side === "left" ? width : 0;
  const dir = side === "left" ? -1 : 1;
  area.drawLine({ x: axisX, y: 0 }, { x: axisX, y: height }, stroke);

  if (!visibility.showTickLines && !visibility.showTickLabels) {
    return;
  }

  const text = withAnchor(labelStyle(style), side === "left" ? "right" : "left", "center");

  for (const value of tickValues(vp.getYDomain(), ticks)) {
    const yPixel = vp.yValueToYPixel(value);

    if (visibility.showTickLines) {
      area.drawLine({ x: axisX, y: yPixel }, { x: axisX + dir * style.tickLen, y: yPixel }, stroke);
    }
    if (visibility.showTickLabels) {
      area.drawText(formatTick(value), text, { x: axisX + dir * (style.tickLen + 2), y: yPixel });
    }
  }
}
