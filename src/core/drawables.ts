/* drawables.ts */
//   - Drawable data format (rect/line/polyline/point/text)
//   - Renderer-agnostic: nothing here depends on React / SVG / Canvas
//
//   - DrawingArea appends drawables in ROOT pixel coordinates
//   - SvgSceneView turns them into real SVG elements

import type { Point } from "./types";

// Stroke style (all optional)
export type StrokeStyle = {
  width?: number;
  dash?: number[];
  color?: string;
};

// Fill style (optional)
export type FillStyle = {
  color?: string;
};

// Filled rectangle (background fill of an area)
export type RectDrawable = {
  kind: "rect";
  id: string;
  origin: Point;   // top-left corner
  width: number;
  height: number;
  fill: FillStyle;
};

// Line segment
export type LineDrawable = {
  kind: "line";    // tag used by the renderer's switch (d.kind)
  id: string;      // unique within a scene
  a: Vec2;         // end points (pixels)
  b: Vec2;
  stroke?: StrokeStyle;
};

// Polyline (sampled series)
export type PolylineDrawable = {
  kind: "polyline";
  id: string;
  points: Vec2[];
  stroke?: StrokeStyle;
};

// Point (drawn as a circle)
export type PointDrawable = {
  kind: "point";
  id: string;
  center: Vec2;
  r: number;
  fill?: FillStyle;
  stroke?: StrokeStyle;
};

// Text
export type TextDrawable = {
  kind: "text";
  id: string;
  pos: Vec2;       // anchor point

  text: string;

  fontFamily: string;
  fontSize: number;
  fontStyle?: "normal" | "italic" | "bold";
  fill?: FillStyle;
  textAnchor: "start" | "middle" | "end";                         // horizontal anchor
  dominantBaseline: "hanging" | "middle" | "text-after-edge";     // vertical anchor
};

// Kept as an alias so drawables read like the rest of the geometry code
export type Vec2 = Point;

// union type: a Drawable is exactly one of these
export type Drawable =
  | RectDrawable
  | LineDrawable
  | PolylineDrawable
  | PointDrawable
  | TextDrawable;

export type SceneOutput = {
  width: number;
  height: number;
  drawables: Drawable[];
};
