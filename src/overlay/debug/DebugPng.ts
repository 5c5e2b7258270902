import sharp from "sharp";
import { escapeXml, fmt } from "../SvgOverlay";
import { GraphSheet } from "./types";

export const DEFAULT_DPI = 300;

/**
 * Pixel-space SVG of a debug sheet. `dpi` sets pixels per inch.
 */
export function sheetToSvg(sheet: GraphSheet, dpi: number = DEFAULT_DPI): string {
  const px = (inches: number) => fmt(inches * dpi);
  const width = Math.round(sheet.width * dpi);
  const height = Math.round(sheet.height * dpi);
  const out: string[] = [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    `<rect x="0" y="0" width="${width}" height="${height}" fill="white"/>`,
  ];

  for (const line of sheet.lines) {
    out.push(
      `<line x1="${px(line.from.x)}" y1="${px(line.from.y)}" x2="${px(line.to.x)}" y2="${px(line.to.y)}" ` +
        `stroke="${line.color}" stroke-width="${px(line.width)}"/>`
    );
  }
  for (const polygon of sheet.polygons) {
    const points = polygon.points.map((p) => `${px(p.x)},${px(p.y)}`).join(" ");
    out.push(`<polygon points="${points}" fill="${polygon.color}"/>`);
  }
  for (const circle of sheet.circles) {
    out.push(
      `<circle cx="${px(circle.center.x)}" cy="${px(circle.center.y)}" r="${px(circle.radius)}" ` +
        `fill="${circle.fill}" stroke="${circle.stroke}" stroke-width="${px(circle.strokeWidth)}"/>`
    );
  }
  for (const text of sheet.texts) {
    out.push(
      `<text x="${px(text.at.x)}" y="${px(text.at.y)}" font-family="Arial, DejaVu Sans, sans-serif" ` +
        `font-size="${px(text.size)}" fill="${text.color}" text-anchor="${text.anchor}" ` +
        `dominant-baseline="middle">${escapeXml(text.text)}</text>`
    );
  }

  out.push("</svg>");
  return out.join("\n");
}

/**
 * Rasterizes the sheet to a PNG carrying the matching DPI metadata.
 */
export async function writeDebugPng(sheet: GraphSheet, outputPath: string, dpi: number = DEFAULT_DPI): Promise<void> {
  const svg = sheetToSvg(sheet, dpi);
  await sharp(Buffer.from(svg), { density: 72 }).withMetadata({ density: dpi }).png().toFile(outputPath);
}
