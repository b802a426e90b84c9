// src/core/text.ts

// ------------------------------------------------------------
// Fonts, text styles and text metrics
// - FontDesc / TextStyle: what DrawingArea.drawText needs
// - TextMetrics: "how big is this text in pixels" (layout box)
// - estimatedTextMetrics: no DOM measurement, per-glyph-class estimate
//   driven by fontMetrics.json (same idea as the 0.6em approximation)
// ------------------------------------------------------------

import fontMetricsJson from "./fontMetrics.json";
import { FontError } from "./errors";
import type { Size } from "./types";

export type FontStyle = "normal" | "italic" | "bold";

export type FontDesc = {
  family: string;
  size: number;     // px
  style: FontStyle;
};

export type HPos = "left" | "center" | "right";
export type VPos = "top" | "center" | "bottom";

export type TextAnchor = { h: HPos; v: VPos };

export type TextStyle = {
  font: FontDesc;
  color: string;
  anchor: TextAnchor;
};

// Layout box relative to the text origin (baseline at y = 0, y grows downward)
export type TextBox = {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
};

export interface TextMetrics {
  // May throw FontError (unknown font, glyph without metrics)
  layoutBox(text: string, font: FontDesc): TextBox;
}

export function font(family: string, size: number, style: FontStyle = "normal"): FontDesc {
  return { family, size, style };
}

export function textStyleFromFont(fontDesc: FontDesc): TextStyle {
  return {
    font: { ...fontDesc },
    color: "currentColor",
    anchor: { h: "left", v: "top" },
  };
}

export function withAnchor(style: TextStyle, h: HPos, v: VPos): TextStyle {
  return { ...style, anchor: { h, v } };
}

// ------------------------------------------------------------
// Metrics table (fontMetrics.json)
// - ascender / xHeight / descender: fraction of the font size
// - advance: horizontal advance per glyph class, fraction of the font size
// ------------------------------------------------------------
type AdvanceClass = "space" | "narrow" | "regular" | "upper" | "wide";

type FamilyMetrics = {
  ascender: number;
  xHeight: number;
  descender: number;
  advance: Record<AdvanceClass, number>;
};

type FontMetricsTable = {
  families: Record<string, FamilyMetrics>;
  aliases: Record<string, string>;
  ascenderChars: string;
  descenderChars: string;
  narrowChars: string;
  wideChars: string;
};

const table: FontMetricsTable = fontMetricsJson;

function resolveFamily(family: string): FamilyMetrics {
  const key = family.trim().toLowerCase();
  const aliased = table.aliases[key] ?? key;
  const metrics = table.families[aliased];
  if (metrics === undefined) {
    throw new FontError(`unknown font family "${family}"`);
  }
  return metrics;
}

function isLowerLatin(ch: string): boolean {
  return ch >= "a" && ch <= "z";
}

function isUpperLatin(ch: string): boolean {
  return ch >= "A" && ch <= "Z";
}

function advanceClassOf(ch: string): AdvanceClass {
  if (ch === " ") {
    return "space";
  }
  if (table.narrowChars.includes(ch)) {
    return "narrow";
  }
  if (table.wideChars.includes(ch)) {
    return "wide";
  }
  if (isUpperLatin(ch)) {
    return "upper";
  }
  return "regular";
}

// How far above the baseline the glyph reaches (fraction of size)
function topOf(ch: string, m: FamilyMetrics): number {
  if (ch === " ") {
    return 0;
  }
  if (isLowerLatin(ch) && !table.ascenderChars.includes(ch)) {
    return m.xHeight;
  }
  return m.ascender;
}

function bottomOf(ch: string, m: FamilyMetrics): number {
  if (table.descenderChars.includes(ch)) {
    return m.descender;
  }
  return 0;
}

export const estimatedTextMetrics: TextMetrics = {
  layoutBox(text: string, fontDesc: FontDesc): TextBox {
    if (!Number.isFinite(fontDesc.size) || fontDesc.size <= 0) {
      throw new FontError(`invalid font size ${fontDesc.size}`);
    }
    const m = resolveFamily(fontDesc.family);

    let advance = 0;
    let top = 0;
    let bottom = 0;

    for (const ch of text) {
      const code = ch.codePointAt(0) ?? 0;
      if (code < 0x20 || code === 0x7f) {
        const hex = code.toString(16).toUpperCase().padStart(4, "0");
        throw new FontError(`no glyph for U+${hex} in "${fontDesc.family}"`);
      }

      advance += m.advance[advanceClassOf(ch)];
      top = Math.max(top, topOf(ch, m));
      bottom = Math.max(bottom, bottomOf(ch, m));
    }

    // bold glyphs are wider
    if (fontDesc.style === "bold") {
      advance *= 1.1;
    }

    const size = fontDesc.size;
    return {
      x0: 0,
      y0: 0 - Math.round(top * size),
      x1: Math.round(advance * size),
      y1: Math.round(bottom * size),
    };
  },
};

// ------------------------------------------------------------
// estimateTextSize: integer (width, height) of the layout box
// - a provider box with NaN/Infinity edges is a FontError
// ------------------------------------------------------------
export function estimateTextSize(
  text: string,
  fontDesc: FontDesc,
  metrics: TextMetrics = estimatedTextMetrics,
): Size {
  const box = metrics.layoutBox(text, fontDesc);
  if (
    !Number.isFinite(box.x0) ||
    !Number.isFinite(box.y0) ||
    !Number.isFinite(box.x1) ||
    !Number.isFinite(box.y1)
  ) {
    throw new FontError(`non-finite layout box for "${text}" in "${fontDesc.family}"`);
  }
  return {
    width: Math.max(0, Math.trunc(box.x1 - box.x0)),
    height: Math.max(0, Math.trunc(box.y1 - box.y0)),
  };
}
