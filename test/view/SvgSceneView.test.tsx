import { describe, expect, it } from "vitest";
import { ChartLayout } from "../../src/core/layout";
import { DrawingArea } from "../../src/core/DrawingArea";
import { font, textStyleFromFont, withAnchor } from "../../src/core/text";
import { renderSceneToSvgMarkup } from "../../src/view/SvgSceneView";

describe("renderSceneToSvgMarkup", () => {
  it("renders a standalone svg element", () => {
    const root = DrawingArea.create(120, 40);
    const markup = renderSceneToSvgMarkup(root.toSceneOutput());

    expect(
      markup.startsWith('<svg xmlns="http://www.w3.org/2000/svg" width="120" height="40" viewBox="0 0 120 40">'),
    ).toBe(true);
    expect(markup.endsWith("</svg>")).toBe(true);
  });

  it("renders each drawable kind", () => {
    const root = DrawingArea.create(120, 40);
    root.fill("#fff");
    root.drawLine({ x: 0, y: 1 }, { x: 10, y: 1 }, { color: "red", width: 2, dash: [4, 2] });
    root.drawPolyline(
      [
        { x: 0, y: 0 },
        { x: 10, y: 5 },
      ],
      { color: "blue" },
    );
    root.drawPoint({ x: 3, y: 4 }, 2, { color: "green" });
    root.drawText("a < b", withAnchor(textStyleFromFont(font("sans-serif", 12)), "center", "top"), { x: 60, y: 5 });

    const markup = renderSceneToSvgMarkup(root.toSceneOutput());

    expect(markup).toContain('<rect x="0" y="0" width="120" height="40" fill="#fff"');
    expect(markup).toContain('<line x1="0" y1="1" x2="10" y2="1" stroke="red" stroke-width="2" stroke-dasharray="4 2"');
    expect(markup).toContain('<polyline points="0,0 10,5" fill="none" stroke="blue" stroke-width="1"');
    expect(markup).toContain('<circle cx="3" cy="4" r="2" fill="green"');
    expect(markup).toContain(
      '<text x="60" y="5" font-family="sans-serif" font-size="12" fill="currentColor" text-anchor="middle" dominant-baseline="hanging">a &lt; b</text>',
    );
  });

  it("sets a background when asked", () => {
    const markup = renderSceneToSvgMarkup(DrawingArea.create(10, 10).toSceneOutput(), "white");
    expect(markup).toContain('style="background:white"');
  });

  it("renders a bound chart with its caption and axes", () => {
    const layout = new ChartLayout()
      .caption("Growth", font("sans-serif", 20))
      .margin(4)
      .xLabelAreaSize(30)
      .yLabelAreaSize(40);
    const size = layout.desiredImageSize({ width: 200, height: 100 });
    const root = DrawingArea.create(size.width, size.height);

    const chart = layout.bind(root).buildCartesian2d([0, 10], [0, 1]);
    chart.drawAxes({ ticks: 2 });
    chart.drawLineSeries([
      { x: 0, y: 0 },
      { x: 10, y: 1 },
    ]);

    const markup = renderSceneToSvgMarkup(root.toSceneOutput());
    expect(markup.match(/<text /g)).toHaveLength(1 + 3 + 3);
    expect(markup).toContain(">Growth</text>");
    expect(markup).toContain(">10.00</text>");
  });
});
