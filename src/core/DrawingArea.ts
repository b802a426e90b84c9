/* DrawingArea.ts */

// ------------------------------------------------------------
// DrawingArea: a rectangular view onto a shared scene
//   - the root area owns nothing but the scene's size; sub-areas made by
//     split / shrink share the same drawables list
//   - every draw call takes coordinates RELATIVE to this area and stores
//     them in root pixels, so the renderer never needs a translate(...)
//   - single writer: callers must not draw into overlapping areas from
//     two places at once
// ------------------------------------------------------------

import type { Drawable, FillStyle, SceneOutput, StrokeStyle, TextDrawable } from "./drawables";
import { DrawingAreaError, LayoutConfigError, assertPixelSize } from "./errors";
import type { TextStyle } from "./text";
import type { Point, Size } from "./types";

// Characters that XML 1.0 (and therefore SVG) cannot carry
const NON_ENCODABLE = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/;

// Shared by the root area and all of its sub-areas
type Scene = {
  width: number;
  height: number;
  drawables: Drawable[];
  nextId: number;
};

export class DrawingArea {
  private readonly scene: Scene;
  private readonly origin: Point;   // absolute (root pixels)
  private readonly width: number;
  private readonly height: number;

  private constructor(scene: Scene, origin: Point, width: number, height: number) {
    this.scene = scene;
    this.origin = origin;
    this.width = width;
    this.height = height;
  }

  // Root area over a fresh, empty scene
  static create(width: number, height: number): DrawingArea {
    assertPixelSize("width", width);
    assertPixelSize("height", height);
    const scene: Scene = { width, height, drawables: [], nextId: 0 };
    return new DrawingArea(scene, { x: 0, y: 0 }, width, height);
  }

  // =========================================================
  // geometry
  // =========================================================
  getDimInPixel(): Size {
    return { width: this.width, height: this.height };
  }

  getOrigin(): Point {
    return { x: this.origin.x, y: this.origin.y };
  }

  // Cut along the row y: [top (height y), bottom (the rest)]
  splitVertically(y: number): [DrawingArea, DrawingArea] {
    const cut = clampInt(y, this.height);
    const top = new DrawingArea(this.scene, this.origin, this.width, cut);
    const bottom = new DrawingArea(
      this.scene,
      { x: this.origin.x, y: this.origin.y + cut },
      this.width,
      this.height - cut,
    );
    return [top, bottom];
  }

  // Cut along the column x: [left (width x), right (the rest)]
  splitHorizontally(x: number): [DrawingArea, DrawingArea] {
    const cut = clampInt(x, this.width);
    const left = new DrawingArea(this.scene, this.origin, cut, this.height);
    const right = new DrawingArea(
      this.scene,
      { x: this.origin.x + cut, y: this.origin.y },
      this.width - cut,
      this.height,
    );
    return [left, right];
  }

  // Sub-area at offset (relative) with the given size
  shrink(offset: Point, size: Size): DrawingArea {
    assertPixelSize("offset.x", offset.x);
    assertPixelSize("offset.y", offset.y);
    assertPixelSize("size.width", size.width);
    assertPixelSize("size.height", size.height);

    if (offset.x + size.width > this.width || offset.y + size.height > this.height) {
      throw new LayoutConfigError(
        `sub-area ${size.width}x${size.height} at (${offset.x},${offset.y}) ` +
          `does not fit in ${this.width}x${this.height}`,
      );
    }

    return new DrawingArea(
      this.scene,
      { x: this.origin.x + offset.x, y: this.origin.y + offset.y },
      size.width,
      size.height,
    );
  }

  // =========================================================
  // drawing
  // =========================================================
  fill(color: string): void {
    this.push({
      kind: "rect",
      id: this.nextId("rect"),
      origin: this.getOrigin(),
      width: this.width,
      height: this.height,
      fill: { color },
    });
  }

  drawLine(a: Point, b: Point, stroke?: StrokeStyle): void {
    this.push({
      kind: "line",
      id: this.nextId("line"),
      a: this.toAbsolute(a),
      b: this.toAbsolute(b),
      stroke,
    });
  }

  drawPolyline(points: Point[], stroke?: StrokeStyle): void {
    const absolute: Point[] = [];
    let i = 0;
    while (i < points.length) {
      absolute.push(this.toAbsolute(points[i]));
      i += 1;
    }

    this.push({
      kind: "polyline",
      id: this.nextId("polyline"),
      points: absolute,
      stroke,
    });
  }

  drawPoint(center: Point, r: number, fill?: FillStyle): void {
    if (!Number.isFinite(r) || r < 0) {
      throw new DrawingAreaError(`invalid point radius ${r}`);
    }
    this.push({
      kind: "point",
      id: this.nextId("point"),
      center: this.toAbsolute(center),
      r,
      fill,
    });
  }

  drawText(text: string, style: TextStyle, pos: Point): void {
    if (NON_ENCODABLE.test(text)) {
      throw new DrawingAreaError(`text ${JSON.stringify(text)} contains characters SVG cannot encode`);
    }

    const drawable: TextDrawable = {
      kind: "text",
      id: this.nextId("text"),
      pos: this.toAbsolute(pos),
      text,
      fontFamily: style.font.family,
      fontSize: style.font.size,
      fontStyle: style.font.style,
      fill: { color: style.color },
      textAnchor: style.anchor.h === "left" ? "start" : style.anchor.h === "center" ? "middle" : "end",
      dominantBaseline:
        style.anchor.v === "top" ? "hanging" : style.anchor.v === "center" ? "middle" : "text-after-edge",
    };
    this.push(drawable);
  }

  // Snapshot of the whole root scene (not only this area)
  toSceneOutput(): SceneOutput {
    return {
      width: this.scene.width,
      height: this.scene.height,
      drawables: this.scene.drawables.slice(),
    };
  }

  // =========================================================
  // internals
  // =========================================================
  private toAbsolute(p: Point): Point {
    if (!Number.isFinite(p.x) || !Number.isFinite(p.y)) {
      throw new DrawingAreaError(`non-finite coordinate (${p.x}, ${p.y})`);
    }
    return { x: this.origin.x + p.x, y: this.origin.y + p.y };
  }

  private nextId(kind: Drawable["kind"]): string {
    const id = `${kind}-${this.scene.nextId}`;
    this.scene.nextId += 1;
    return id;
  }

  private push(d: Drawable): void {
    this.scene.drawables.push(d);
  }
}

// clamp a split position into [0, limit]
function clampInt(value: number, limit: number): number {
  if (!Number.isFinite(value)) {
    throw new LayoutConfigError(`split position must be finite, got ${value}`);
  }
  const v = Math.trunc(value);
  if (v < 0) {
    return 0;
  }
  if (v > limit) {
    return limit;
  }
  return v;
}
