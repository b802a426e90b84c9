/* Viewport.ts */

// Value coordinates -> plotting-area pixels
// - x grows right over [0, innerWidth]
// - y is flipped: domain start sits on the bottom row (innerHeight)
// - an empty domain (d0 === d1) puts every value on pixel 0
import type { Domain, Point } from "./types";

// share of the way from d0 to d1 (0 at d0, 1 at d1)
function fraction(value: number, domain: Domain): number | null {
  const span = domain[1] - domain[0];
  if (span === 0) {
    return null;
  }
  return (value - domain[0]) / span;
}

export class Viewport {
  private readonly innerWidth: number;
  private readonly innerHeight: number;
  private readonly xDomain: Domain;
  private readonly yDomain: Domain;

  constructor(innerWidth: number, innerHeight: number, xDomain: Domain, yDomain: Domain) {
    this.innerWidth = innerWidth;
    this.innerHeight = innerHeight;
    this.xDomain = [xDomain[0], xDomain[1]];
    this.yDomain = [yDomain[0], yDomain[1]];
  }

  getInnerWidth(): number {
    return this.innerWidth;
  }

  getInnerHeight(): number {
    return this.innerHeight;
  }

  getXDomain(): Domain {
    return [this.xDomain[0], this.xDomain[1]];
  }

  getYDomain(): Domain {
    return [this.yDomain[0], this.yDomain[1]];
  }

  xValueToXPixel(xValue: number): number {
    const t = fraction(xValue, this.xDomain);
    return t === null ? 0 : t * this.innerWidth;
  }

  yValueToYPixel(yValue: number): number {
    const t = fraction(yValue, this.yDomain);
    return t === null ? 0 : this.innerHeight * (1 - t);
  }

  valueToPixelMapping(p: Point): Point {
    return { x: this.xValueToXPixel(p.x), y: this.yValueToYPixel(p.y) };
  }
}
