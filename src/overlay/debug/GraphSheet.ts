import { Point, SchematicLabel } from "../../kicad/types";
import { ConnectivityGraph } from "../../graph/ConnectivityGraph";
import { COLORS, GraphSheet, SHEET, STYLES, SheetPolygon } from "./types";

function arrowHead(from: Point, tip: Point, color: string): SheetPolygon {
  const angle = Math.atan2(tip.y - from.y, tip.x - from.x);
  const spread = (STYLES.arrowAngle * Math.PI) / 180;
  return {
    points: [
      tip,
      { x: tip.x - STYLES.arrowLength * Math.cos(angle - spread), y: tip.y - STYLES.arrowLength * Math.sin(angle - spread) },
      { x: tip.x - STYLES.arrowLength * Math.cos(angle + spread), y: tip.y - STYLES.arrowLength * Math.sin(angle + spread) },
    ],
    color,
  };
}

/**
 * Lays out the raw graph for inspection: every segment as an A→B arrow
 * labelled with its uuid, every node as a dot labelled with its id, schematic
 * text in grey, and a legend along the bottom edge.
 *
 * Schematic coordinates map directly onto the sheet (both grow downward),
 * offset by the margin.
 */
export function layoutGraphSheet(graph: ConnectivityGraph, labels: SchematicLabel[] = []): GraphSheet {
  const sheet: GraphSheet = { width: SHEET.width, height: SHEET.height, lines: [], polygons: [], circles: [], texts: [] };
  const map = (p: Point): Point => ({ x: p.x + SHEET.margin, y: p.y + SHEET.margin });

  for (const seg of graph.segments.values()) {
    const a = map(graph.getNode(seg.nodeAtEndA));
    const b = map(graph.getNode(seg.nodeAtEndB));
    sheet.lines.push({ from: a, to: b, color: COLORS.wire, width: STYLES.lineWidth });
    sheet.polygons.push(arrowHead(a, b, COLORS.arrow));
    sheet.texts.push({
      at: { x: (a.x + b.x) / 2, y: (a.y + b.y) / 2 - STYLES.labelOffset },
      text: seg.uuid,
      size: STYLES.wireFontSize,
      color: COLORS.wireLabel,
      anchor: "middle",
    });
  }

  for (const [id, node] of graph.nodes) {
    const c = map(node);
    sheet.circles.push({
      center: c,
      radius: STYLES.pinRadius,
      fill: COLORS.node,
      stroke: COLORS.nodeOutline,
      strokeWidth: STYLES.lineWidth,
    });
    sheet.texts.push({ at: { x: c.x, y: c.y - STYLES.labelOffset }, text: id, size: STYLES.fontSize, color: COLORS.text, anchor: "middle" });
  }

  for (const label of labels) {
    sheet.texts.push({ at: map(label.at), text: label.text, size: STYLES.labelFontSize, color: COLORS.schematicLabel, anchor: "start" });
  }

  // Legend
  const legendY = SHEET.height - 0.4;
  const nodeX = SHEET.margin + 0.15;
  sheet.circles.push({
    center: { x: nodeX, y: legendY },
    radius: STYLES.pinRadius,
    fill: COLORS.node,
    stroke: COLORS.nodeOutline,
    strokeWidth: STYLES.lineWidth,
  });
  sheet.texts.push({ at: { x: nodeX + 0.2, y: legendY }, text: "= Node (identified by label)", size: STYLES.fontSize, color: COLORS.text, anchor: "start" });

  const wireStart = { x: SHEET.margin + 3.5, y: legendY };
  const wireEnd = { x: wireStart.x + 0.5, y: legendY };
  sheet.lines.push({ from: wireStart, to: wireEnd, color: COLORS.wire, width: STYLES.lineWidth });
  sheet.polygons.push(arrowHead(wireStart, wireEnd, COLORS.arrow));
  sheet.texts.push({
    at: { x: wireEnd.x + 0.2, y: legendY },
    text: "= Wire (arrow points from End A to End B)",
    size: STYLES.fontSize,
    color: COLORS.text,
    anchor: "start",
  });

  return sheet;
}
