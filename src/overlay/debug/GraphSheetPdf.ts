import * as fs from "fs";
import PDFDocument from "pdfkit";
import { GraphSheet } from "./types";

const POINTS_PER_INCH = 72;

/**
 * The part of a pdfkit document the sheet is drawn with.
 */
export interface SheetCanvas {
  lineWidth(width: number): this;
  strokeColor(color: string): this;
  moveTo(x: number, y: number): this;
  lineTo(x: number, y: number): this;
  stroke(): this;
  polygon(...points: Array<[number, number]>): this;
  fill(color: string): this;
  circle(x: number, y: number, radius: number): this;
  fillAndStroke(fill: string, stroke: string): this;
  fontSize(size: number): this;
  fillColor(color: string): this;
  widthOfString(text: string): number;
  text(text: string, x: number, y: number, options: { lineBreak: boolean }): this;
}

/**
 * Draws a debug sheet onto the current page of a PDF document.
 */
export function drawGraphSheet(doc: SheetCanvas, sheet: GraphSheet): void {
  const pt = (inches: number) => inches * POINTS_PER_INCH;

  for (const line of sheet.lines) {
    doc
      .lineWidth(pt(line.width))
      .strokeColor(line.color)
      .moveTo(pt(line.from.x), pt(line.from.y))
      .lineTo(pt(line.to.x), pt(line.to.y))
      .stroke();
  }

  for (const polygon of sheet.polygons) {
    const points: Array<[number, number]> = polygon.points.map((p) => [pt(p.x), pt(p.y)]);
    doc.polygon(...points).fill(polygon.color);
  }

  for (const circle of sheet.circles) {
    doc
      .lineWidth(pt(circle.strokeWidth))
      .circle(pt(circle.center.x), pt(circle.center.y), pt(circle.radius))
      .fillAndStroke(circle.fill, circle.stroke);
  }

  for (const text of sheet.texts) {
    const size = pt(text.size);
    doc.fontSize(size).fillColor(text.color);
    const width = doc.widthOfString(text.text);
    const x = text.anchor === "middle" ? pt(text.at.x) - width / 2 : pt(text.at.x);
    doc.text(text.text, x, pt(text.at.y) - size / 2, { lineBreak: false });
  }
}

/**
 * Writes the sheet as a single landscape letter page.
 */
export async function writeGraphPdf(sheet: GraphSheet, outputPath: string, title = "Schematic graph"): Promise<void> {
  const doc = new PDFDocument({
    size: [sheet.width * POINTS_PER_INCH, sheet.height * POINTS_PER_INCH],
    margin: 0,
    autoFirstPage: false,
    info: {
      Title: title,
      CreationDate: new Date(),
    },
  });

  const stream = fs.createWriteStream(outputPath);
  doc.pipe(stream);
  doc.addPage();
  drawGraphSheet(doc, sheet);
  doc.end();

  await new Promise<void>((resolve, reject) => {
    stream.on("finish", () => resolve());
    stream.on("error", reject);
  });
}
