// src/core/centering.ts

// ------------------------------------------------------------
// centeringRanges: fit value ranges to a pixel aspect ratio
//
// - minimum: [xDomain, yDomain] that must stay visible
// - destination: [width, height] of the plotting area (px)
// - returns ranges with the destination's aspect ratio, each axis at least
//   as wide as in `minimum`, each axis centered where `minimum` was
//
// Which axis grows?  compare sx/sy with dx/dy by cross-multiplying
//   sx * dy < sy * dx -> x is too narrow: x -> sy * dx / dy
//   otherwise         -> y is too narrow (or exact): y -> sx * dy / dx
// ------------------------------------------------------------

import type { Domain } from "./types";

export function centeringRanges(
  minimum: [Domain, Domain],
  destination: [number, number],
): [Domain, Domain] {
  const [xMin, yMin] = minimum;
  const sx = xMin[1] - xMin[0];
  const sy = yMin[1] - yMin[0];
  const dx = destination[0];
  const dy = destination[1];

  if (sx * dy < sy * dx) {
    const radius = ((sy * dx) / dy) * 0.5;
    const center = (xMin[0] + xMin[1]) * 0.5;
    return [
      [center - radius, radius + center],
      [yMin[0], yMin[1]],
    ];
  }

  const radius = ((sx * dy) / dx) * 0.5;
  const center = (yMin[1] + yMin[0]) * 0.5;
  return [
    [xMin[0], xMin[1]],
    [center - radius, radius + center],
  ];
}
