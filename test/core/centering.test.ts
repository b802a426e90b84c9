import { describe, expect, it } from "vitest";
import { centeringRanges } from "../../src/core/centering";
import { ChartLayout } from "../../src/core/layout";
import { DrawingArea } from "../../src/core/DrawingArea";
import { font } from "../../src/core/text";
import type { Domain } from "../../src/core/types";

const span = (d: Domain): number => d[1] - d[0];
const center = (d: Domain): number => (d[0] + d[1]) / 2;

describe("centeringRanges", () => {
  it("grows y when the destination is wider than the minimum", () => {
    // sx*dy = 400*720 = 288000 >= sy*dx = 200*1280 = 256000
    const [x, y] = centeringRanges(
      [
        [-200, 200],
        [-100, 100],
      ],
      [1280, 720],
    );
    expect(x).toEqual([-200, 200]);
    expect(y).toEqual([-112.5, 112.5]);
  });

  it("grows x around its center when x is the tight axis", () => {
    const [x, y] = centeringRanges(
      [
        [0, 10],
        [0, 10],
      ],
      [200, 100],
    );
    expect(x).toEqual([-5, 15]);
    expect(y).toEqual([0, 10]);
  });

  it("returns the minimum when the aspect ratio already matches", () => {
    const [x, y] = centeringRanges(
      [
        [0, 4],
        [0, 2],
      ],
      [2, 1],
    );
    expect(x).toEqual([0, 4]);
    expect(y).toEqual([0, 2]);
  });

  it("keeps centers, matches the aspect ratio and never shrinks", () => {
    const minima: [Domain, Domain][] = [
      [
        [-200, 200],
        [-100, 100],
      ],
      [
        [0, 1],
        [100, 1000],
      ],
      [
        [-3.5, 7.25],
        [2, 2.5],
      ],
      [
        [10, 11],
        [-50, 50],
      ],
    ];
    const destinations: [number, number][] = [
      [1280, 720],
      [100, 100],
      [37, 512],
      [640, 3],
    ];

    for (const minimum of minima) {
      for (const destination of destinations) {
        const [x, y] = centeringRanges(minimum, destination);
        const label = JSON.stringify({ minimum, destination });

        const inner = span(x) / span(y);
        const outer = destination[0] / destination[1];
        expect(Math.abs(inner - outer) / outer, label).toBeLessThan(1e-8);

        expect(Math.abs(center(x) - center(minimum[0])), label).toBeLessThan(1e-8);
        expect(Math.abs(center(y) - center(minimum[1])), label).toBeLessThan(1e-8);

        expect(span(x), label).toBeGreaterThanOrEqual(span(minimum[0]) - 1e-9);
        expect(span(y), label).toBeGreaterThanOrEqual(span(minimum[1]) - 1e-9);
      }
    }
  });

  it("fits ranges to the plot area of a bound layout", () => {
    const root = DrawingArea.create(1280, 720);
    const builder = new ChartLayout()
      .caption("Graph Title", font("sans-serif", 40))
      .margin(4)
      .xLabelAreaSize(40)
      .yLabelAreaSize(40)
      .bind(root);

    // title band 47px: main area 1280 x 673, minus 48 x 48 of bands
    const { width, height } = builder.estimatePlotAreaSize();
    expect({ width, height }).toEqual({ width: 1232, height: 625 });

    const [x, y] = centeringRanges(
      [
        [-200, 200],
        [-100, 100],
      ],
      [width, height],
    );
    const inner = span(x) / span(y);
    expect(Math.abs(inner - width / height)).toBeLessThan(1e-8);

    const chart = builder.buildCartesian2d(x, y);
    expect(chart.plottingArea().getDimInPixel()).toEqual({ width, height });
  });
});
