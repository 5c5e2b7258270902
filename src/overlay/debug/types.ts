import { Point } from "../../kicad/types";

// Letter landscape, inches
export const SHEET = {
  width: 11,
  height: 8.5,
  margin: 0.5,
};

export const COLORS = {
  wire: "black",
  arrow: "blue",
  wireLabel: "blue",
  node: "red",
  nodeOutline: "darkred",
  text: "black",
  schematicLabel: "gray",
};

// Inches
export const STYLES = {
  pinRadius: 0.033,
  fontSize: 0.05,
  wireFontSize: 0.05 / 3,
  labelFontSize: 0.04,
  arrowLength: 0.067,
  arrowAngle: 25,
  lineWidth: 0.02,
  labelOffset: 0.075,
};

export interface SheetLine {
  from: Point;
  to: Point;
  color: string;
  width: number;
}

export interface SheetPolygon {
  points: Point[];
  color: string;
}

export interface SheetCircle {
  center: Point;
  radius: number;
  fill: string;
  stroke: string;
  strokeWidth: number;
}

export interface SheetText {
  at: Point;
  text: string;
  size: number;
  color: string;
  anchor: "middle" | "start";
}

/**
 * Drawing primitives of the graph debug sheet, in inches from the sheet's
 * top-left corner. Rendered to PNG and PDF by separate backends.
 */
export interface GraphSheet {
  width: number;
  height: number;
  lines: SheetLine[];
  polygons: SheetPolygon[];
  circles: SheetCircle[];
  texts: SheetText[];
}
