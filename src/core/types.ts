/* types.ts */
//   - Shared geometry types for the layout core and the renderer

export type Point = { x: number; y: number };

// Pixel size of an area (width, height)
export type Size = { width: number; height: number };

// Four-sided band sizes: used for both outer margins and label areas
export type Margin = {
  top: number;
  right: number;
  bottom: number;
  left: number;
};

// One side of the plotting area
export type Side = keyof Margin;

// Value-space range [start, end] mapped onto one pixel axis
export type Domain = [number, number];
