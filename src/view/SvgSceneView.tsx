// src/view/SvgSceneView.tsx

// ------------------------------------------------------------
// SvgSceneView (View/Renderer)
// Job: turn scene.drawables into real SVG elements
//   (rect/line/polyline/circle/text)
//
// - no layout math here; drawables are already in root pixels
// - renderSceneToSvgMarkup: static <svg> string (server side, files)
// ------------------------------------------------------------

import React from "react";
import { renderToStaticMarkup } from "react-dom/server";

import type { Drawable, SceneOutput, TextDrawable } from "../core/drawables";

type Props = {
  scene: SceneOutput;
  background?: string;
};

// ------------------------------------------------------------
// class component: props only, no state
// ------------------------------------------------------------
export class SvgSceneView extends React.Component<Props> {

  // exhaustiveness check: a new Drawable kind without a branch below
  // fails to compile here
  private assertNever(x: never): never {
    throw new Error("Unhandled drawable kind: " + String(x));
  }

  private renderText(d: TextDrawable) {
    const fill = d.fill && d.fill.color ? d.fill.color : "currentColor";

    let fontWeight: string | undefined = undefined;
    let fontStyle: string | undefined = undefined;
    if (d.fontStyle === "bold") {
      fontWeight = "bold";
    }
    if (d.fontStyle === "italic") {
      fontStyle = "italic";
    }

    return (
      <text
        key={d.id}
        x={d.pos.x}
        y={d.pos.y}
        fontFamily={d.fontFamily}
        fontSize={d.fontSize}
        fontWeight={fontWeight}
        fontStyle={fontStyle}
        fill={fill}
        textAnchor={d.textAnchor}
        dominantBaseline={d.dominantBaseline}
      >
        {d.text}
      </text>
    );
  }

  private renderDrawable(d: Drawable): React.ReactNode {
    switch (d.kind) {
      case "rect": {
        const fill = d.fill.color ? d.fill.color : "none";
        return (
          <rect key={d.id} x={d.origin.x} y={d.origin.y} width={d.width} height={d.height} fill={fill} />
        );
      }

      case "line": {
        const stroke = d.stroke && d.stroke.color ? d.stroke.color : "currentColor";
        const w = d.stroke && d.stroke.width ? d.stroke.width : 1;
        const dash = d.stroke && d.stroke.dash ? d.stroke.dash : undefined;

        return (
          <line
            key={d.id}
            x1={d.a.x}
            y1={d.a.y}
            x2={d.b.x}
            y2={d.b.y}
            stroke={stroke}
            strokeWidth={w}
            strokeDasharray={dash ? dash.join(" ") : undefined}
          />
        );
      }

      case "polyline": {
        const stroke = d.stroke && d.stroke.color ? d.stroke.color : "currentColor";
        const w = d.stroke && d.stroke.width ? d.stroke.width : 1;
        const pts = d.points.map((p) => `${p.x},${p.y}`).join(" ");

        return <polyline key={d.id} points={pts} fill="none" stroke={stroke} strokeWidth={w} />;
      }

      case "point": {
        const fill = d.fill && d.fill.color ? d.fill.color : "currentColor";
        const stroke = d.stroke && d.stroke.color ? d.stroke.color : undefined;
        const sw = d.stroke && d.stroke.width ? d.stroke.width : undefined;

        return (
          <circle key={d.id} cx={d.center.x} cy={d.center.y} r={d.r} fill={fill} stroke={stroke} strokeWidth={sw} />
        );
      }

      case "text":
        return this.renderText(d);

      default:
        return this.assertNever(d);
    }
  }

  render() {
    const scene = this.props.scene;

    const nodes: React.ReactNode[] = [];
    let i = 0;
    while (i < scene.drawables.length) {
      nodes.push(this.renderDrawable(scene.drawables[i]));
      i += 1;
    }

    return (
      <svg
        xmlns="http://www.w3.org/2000/svg"
        width={scene.width}
        height={scene.height}
        viewBox={`0 0 ${scene.width} ${scene.height}`}
        style={this.props.background ? { background: this.props.background } : undefined}
      >
        {nodes}
      </svg>
    );
  }
}

// Standalone SVG document for a scene
export function renderSceneToSvgMarkup(scene: SceneOutput, background?: string): string {
  return renderToStaticMarkup(<SvgSceneView scene={scene} background={background} />);
}
