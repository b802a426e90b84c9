import { describe, expect, it } from "vitest";
import { FontError } from "../../src/core/errors";
import {
  estimateTextSize,
  estimatedTextMetrics,
  font,
  textStyleFromFont,
  withAnchor,
} from "../../src/core/text";

describe("estimatedTextMetrics", () => {
  it("measures lowercase text at x-height", () => {
    // 3 regular glyphs * 0.56 * 10 = 16.8 -> 17; x-height 0.52 * 10 -> 5
    expect(estimatedTextMetrics.layoutBox("ace", font("sans-serif", 10))).toEqual({
      x0: 0,
      y0: -5,
      x1: 17,
      y1: 0,
    });
  });

  it("adds ascender and descender", () => {
    expect(estimateTextSize("Graph Title", font("sans-serif", 40))).toEqual({ width: 199, height: 37 });
  });

  it("gives an empty box for empty text", () => {
    expect(estimatedTextMetrics.layoutBox("", font("serif", 12))).toEqual({ x0: 0, y0: 0, x1: 0, y1: 0 });
    expect(estimateTextSize("   ", font("serif", 12)).height).toBe(0);
  });

  it("uses a fixed advance for monospace", () => {
    expect(estimatedTextMetrics.layoutBox("Wm", font("monospace", 10))).toEqual({
      x0: 0,
      y0: -7,
      x1: 12,
      y1: 0,
    });
  });

  it("widens bold text", () => {
    // 16.8 * 1.1 = 18.48 -> 18
    expect(estimateTextSize("ace", font("sans-serif", 10, "bold")).width).toBe(18);
  });

  it("resolves family aliases case-insensitively", () => {
    const viaAlias = estimatedTextMetrics.layoutBox("Axis", font(" Arial ", 14));
    const direct = estimatedTextMetrics.layoutBox("Axis", font("sans-serif", 14));
    expect(viaAlias).toEqual(direct);
  });

  it("rejects unknown families, bad sizes and control characters", () => {
    expect(() => estimatedTextMetrics.layoutBox("x", font("Comic Serif", 12))).toThrow(
      'unknown font family "Comic Serif"',
    );
    expect(() => estimatedTextMetrics.layoutBox("x", font("serif", 0))).toThrow(FontError);
    expect(() => estimatedTextMetrics.layoutBox("a\nb", font("serif", 12))).toThrow(
      'no glyph for U+000A in "serif"',
    );
  });

  it("rejects provider boxes with non-finite edges", () => {
    const unbounded = { layoutBox: () => ({ x0: 0, y0: -10, x1: Number.POSITIVE_INFINITY, y1: 0 }) };
    expect(() => estimateTextSize("wide", font("serif", 12), unbounded)).toThrow(
      'non-finite layout box for "wide" in "serif"',
    );
  });
});

describe("text styles", () => {
  it("derives a left/top style from a font", () => {
    const style = textStyleFromFont(font("serif", 18));
    expect(style).toEqual({
      font: { family: "serif", size: 18, style: "normal" },
      color: "currentColor",
      anchor: { h: "left", v: "top" },
    });
  });

  it("re-anchors without touching the original", () => {
    const style = textStyleFromFont(font("serif", 18));
    const centered = withAnchor(style, "center", "bottom");
    expect(centered.anchor).toEqual({ h: "center", v: "bottom" });
    expect(style.anchor).toEqual({ h: "left", v: "top" });
  });
});
