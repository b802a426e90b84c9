// src/core/errors.ts

// ------------------------------------------------------------
// Error kinds surfaced by the layout core
// - FontError: text metrics could not be computed
// - DrawingAreaError: the scene refused a draw / coordinate system
// - LayoutConfigError: caller misconfiguration (bands larger than the area,
//   pixel sizes outside the non-negative integer domain)
// ------------------------------------------------------------

export class FontError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FontError";
  }
}

export class DrawingAreaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DrawingAreaError";
  }
}

export class LayoutConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LayoutConfigError";
  }
}

// ------------------------------------------------------------
// assertPixelSize: pixel sizes are non-negative integers
// ------------------------------------------------------------
export function assertPixelSize(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new LayoutConfigError(`${name} must be a non-negative integer, got ${value}`);
  }
  return value;
}
