// src/core/layout.ts
// ------------------------------------------------------------
// Chart layout before and after it is bound to a drawing area.
//
// ChartLayout: title band + margins + label areas, all in pixels.
//   It answers "how big must the image be so the plotting area is W x H?"
//   without touching any pixels.
// ChartLayoutBuilder: a ChartLayout bound to a concrete root area. The
//   title is already painted; what remains is the main area.
//
// Invariant: for an area of desiredImageSize(plot), both
// estimatePlotAreaSize() and the built chart's plotting area are `plot`.
// ------------------------------------------------------------

import { ChartBuilder, type ChartContext } from "./ChartBuilder";
import type { DrawingArea } from "./DrawingArea";
import { LayoutConfigError, assertPixelSize } from "./errors";
import {
  estimateTextSize,
  estimatedTextMetrics,
  textStyleFromFont,
  withAnchor,
  type FontDesc,
  type TextMetrics,
  type TextStyle,
} from "./text";
import type { Domain, Margin, Size } from "./types";

// Upper bound of the padding above and below the caption text (px)
export const TITLE_PADDING_CAP = 5;

type TitleContent = {
  text: string;
  style: TextStyle;
  verticalPadding: number;
};

function zeroMargin(): Margin {
  return { top: 0, right: 0, bottom: 0, left: 0 };
}

function copyMargin(m: Margin): Margin {
  return { top: m.top, right: m.right, bottom: m.bottom, left: m.left };
}

export class ChartLayout {
  private titleHeight: number;
  private titleContent: TitleContent | null;
  private marginSize: Margin;
  private labelAreaSize: Margin;

  constructor() {
    this.titleHeight = 0;
    this.titleContent = null;
    this.marginSize = zeroMargin();
    this.labelAreaSize = zeroMargin();
  }

  // =========================================================
  // label areas
  // =========================================================
  setAllLabelAreaSize(top: number, bottom: number, left: number, right: number): this {
    this.labelAreaSize = {
      top: assertPixelSize("labelAreaSize.top", top),
      right: assertPixelSize("labelAreaSize.right", right),
      bottom: assertPixelSize("labelAreaSize.bottom", bottom),
      left: assertPixelSize("labelAreaSize.left", left),
    };
    return this;
  }

  // x labels live below the plot
  xLabelAreaSize(size: number): this {
    this.labelAreaSize.bottom = assertPixelSize("labelAreaSize.bottom", size);
    return this;
  }

  // y labels live left of the plot
  yLabelAreaSize(size: number): this {
    this.labelAreaSize.left = assertPixelSize("labelAreaSize.left", size);
    return this;
  }

  topXLabelAreaSize(size: number): this {
    this.labelAreaSize.top = assertPixelSize("labelAreaSize.top", size);
    return this;
  }

  rightYLabelAreaSize(size: number): this {
    this.labelAreaSize.right = assertPixelSize("labelAreaSize.right", size);
    return this;
  }

  // =========================================================
  // margins
  // =========================================================
  setAllMargin(top: number, bottom: number, left: number, right: number): this {
    this.marginSize = {
      top: assertPixelSize("margin.top", top),
      right: assertPixelSize("margin.right", right),
      bottom: assertPixelSize("margin.bottom", bottom),
      left: assertPixelSize("margin.left", left),
    };
    return this;
  }

  margin(size: number): this {
    return this.setAllMargin(size, size, size, size);
  }

  marginTop(size: number): this {
    this.marginSize.top = assertPixelSize("margin.top", size);
    return this;
  }

  marginBottom(size: number): this {
    this.marginSize.bottom = assertPixelSize("margin.bottom", size);
    return this;
  }

  marginLeft(size: number): this {
    this.marginSize.left = assertPixelSize("margin.left", size);
    return this;
  }

  marginRight(size: number): this {
    this.marginSize.right = assertPixelSize("margin.right", size);
    return this;
  }

  // =========================================================
  // caption
  // =========================================================

  // Removes the caption and its band
  noCaption(): this {
    this.titleHeight = 0;
    this.titleContent = null;
    return this;
  }

  /**
   * Sets the caption and sizes the title band from the text's layout box.
   *
   * Band height is `h + 2 * padding` with `padding = min(floor(h / 2), 5)`.
   * Text with no height (empty or blank) leaves no band, same as
   * {@link ChartLayout.noCaption}.
   * Throws FontError when the metrics provider cannot measure the text.
   */
  caption(text: string, fontDesc: FontDesc, metrics: TextMetrics = estimatedTextMetrics): this {
    const textHeight = estimateTextSize(text, fontDesc, metrics).height;
    if (textHeight === 0) {
      return this.noCaption();
    }
    const verticalPadding = Math.min(Math.floor(textHeight / 2), TITLE_PADDING_CAP);

    this.titleHeight = verticalPadding * 2 + textHeight;
    this.titleContent = {
      text,
      style: textStyleFromFont(fontDesc),
      verticalPadding,
    };
    return this;
  }

  /**
   * Replaces the caption text without updating the layout.
   *
   * The band keeps the height measured for the previous text. Call
   * {@link ChartLayout.caption} again to re-measure. Without a caption this
   * does nothing.
   */
  replaceCaption(text: string): this {
    const current = this.titleContent;
    if (current !== null) {
      this.titleContent = { ...current, text };
    }
    return this;
  }

  // =========================================================
  // sizes
  // =========================================================

  // Pixels taken by everything except the plotting area
  additionalSizes(): Size {
    const m = this.marginSize;
    const l = this.labelAreaSize;
    const width = m.left + m.right + l.left + l.right;
    const height = this.titleHeight + m.top + m.bottom + l.top + l.bottom;
    return { width, height };
  }

  /** Size of a root area whose plotting area will be exactly `plotSize`. */
  desiredImageSize(plotSize: Size): Size {
    assertPixelSize("plotSize.width", plotSize.width);
    assertPixelSize("plotSize.height", plotSize.height);

    const additional = this.additionalSizes();
    return {
      width: plotSize.width + additional.width,
      height: plotSize.height + additional.height,
    };
  }

  /**
   * Root-area height for a given width, so that the plotting area has
   * `aspectRatio` = plot height / plot width.
   *
   * When `imageWidth` leaves no room for a plotting area the result is
   * `additionalSizes().height`.
   */
  desiredImageHeightFromWidth(imageWidth: number, aspectRatio: number): number {
    assertPixelSize("imageWidth", imageWidth);
    if (!Number.isFinite(aspectRatio) || aspectRatio < 0) {
      throw new LayoutConfigError(`aspectRatio must be finite and >= 0, got ${aspectRatio}`);
    }

    const additional = this.additionalSizes();
    if (imageWidth < additional.width) {
      return additional.height;
    }
    return Math.floor((imageWidth - additional.width) * aspectRatio) + additional.height;
  }

  // =========================================================
  // read-only views
  // =========================================================
  getTitleHeight(): number {
    return this.titleHeight;
  }

  getMargin(): Margin {
    return copyMargin(this.marginSize);
  }

  getLabelAreaSize(): Margin {
    return copyMargin(this.labelAreaSize);
  }

  getCaptionText(): string | null {
    return this.titleContent === null ? null : this.titleContent.text;
  }

  getCaptionPadding(): number | null {
    return this.titleContent === null ? null : this.titleContent.verticalPadding;
  }

  clone(): ChartLayout {
    const copy = new ChartLayout();
    copy.titleHeight = this.titleHeight;
    if (this.titleContent !== null) {
      const style = this.titleContent.style;
      copy.titleContent = {
        text: this.titleContent.text,
        style: { font: { ...style.font }, color: style.color, anchor: { ...style.anchor } },
        verticalPadding: this.titleContent.verticalPadding,
      };
    }
    copy.marginSize = copyMargin(this.marginSize);
    copy.labelAreaSize = copyMargin(this.labelAreaSize);
    return copy;
  }

  // Diagnostics: caption text only, not its style
  toJSON(): { titleHeight: number; caption: string | null; margin: Margin; labelAreaSize: Margin } {
    return {
      titleHeight: this.titleHeight,
      caption: this.getCaptionText(),
      margin: this.getMargin(),
      labelAreaSize: this.getLabelAreaSize(),
    };
  }

  // =========================================================
  // bind
  // =========================================================

  /**
   * Binds a snapshot of this layout to `rootArea`.
   *
   * The title band is cut off the top and the caption is drawn into it,
   * centered horizontally and hanging from `verticalPadding`. Throws
   * DrawingAreaError when the caption cannot be drawn.
   */
  bind(rootArea: DrawingArea): ChartLayoutBuilder {
    let mainArea = rootArea;

    if (this.titleHeight > 0) {
      const [titleArea, rest] = rootArea.splitVertically(this.titleHeight);
      const content = this.titleContent;
      if (content !== null) {
        const dim = titleArea.getDimInPixel();
        const xCenter = Math.floor(dim.width / 2);
        const style = withAnchor(content.style, "center", "top");
        titleArea.drawText(content.text, style, { x: xCenter, y: content.verticalPadding });
      }
      mainArea = rest;
    }

    return new ChartLayoutBuilder(this.clone(), mainArea);
  }
}

// ------------------------------------------------------------
// ChartLayoutBuilder: layout bound to a root area
// - mainArea is a view; the scene belongs to whoever created the root
// ------------------------------------------------------------
export class ChartLayoutBuilder {
  private readonly layout: ChartLayout;
  private readonly mainArea: DrawingArea;

  constructor(layout: ChartLayout, mainArea: DrawingArea) {
    this.layout = layout;
    this.mainArea = mainArea;
  }

  getMainArea(): DrawingArea {
    return this.mainArea;
  }

  getLayout(): ChartLayout {
    return this.layout.clone();
  }

  /**
   * Size of the plotting area in pixels.
   *
   * Use it to pick value ranges (see `centeringRanges`) before calling
   * {@link ChartLayoutBuilder.buildCartesian2d}. Throws LayoutConfigError
   * when the reserved bands do not fit in the main area.
   */
  estimatePlotAreaSize(): Size {
    const m = this.layout.getMargin();
    const l = this.layout.getLabelAreaSize();

    // main area already excludes the title band
    const { width, height } = this.mainArea.getDimInPixel();
    const reservedWidth = m.left + m.right + l.left + l.right;
    const reservedHeight = m.top + m.bottom + l.top + l.bottom;

    if (width < reservedWidth || height < reservedHeight) {
      throw new LayoutConfigError(
        `main area ${width}x${height} is smaller than the reserved bands ` +
          `${reservedWidth}x${reservedHeight} (layout ${JSON.stringify(this.layout)})`,
      );
    }

    return { width: width - reservedWidth, height: height - reservedHeight };
  }

  buildCartesian2d(xDomain: Domain, yDomain: Domain): ChartContext {
    const m = this.layout.getMargin();
    const l = this.layout.getLabelAreaSize();

    return ChartBuilder.on(this.mainArea)
      .marginTop(m.top)
      .marginBottom(m.bottom)
      .marginLeft(m.left)
      .marginRight(m.right)
      .setLabelAreaSize("top", l.top)
      .setLabelAreaSize("bottom", l.bottom)
      .setLabelAreaSize("left", l.left)
      .setLabelAreaSize("right", l.right)
      .buildCartesian2d(xDomain, yDomain);
  }
}
