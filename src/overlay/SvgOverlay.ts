import { Point, RawWire } from "../kicad/types";
import { ConnectivityGraph } from "../graph/ConnectivityGraph";
import { RequestedConnection } from "../connections/types";
import { BundlePoints, DRAW_SCALE } from "./BundleGeometry";
import { PointChain, normalizeAngle } from "./PathChain";

export interface OverlayOptions {
  /** Consecutive chain points at least this far apart (mm) get a centre label. */
  minSegmentLengthForLabelMm: number;
  /** Width of the rectangle hiding each schematic wire (mm). */
  wireMaskWidthMm: number;
  wireMaskColor: string;
  /** Width of the coloured core of each drawn connection (mm). */
  strokeWidthMm: number;
  labelFontSizeMm: number;
  /** Draw bundle circles and entry dots. */
  debugMarkers: boolean;
  drawScale: number;
}

export const DEFAULT_OVERLAY_OPTIONS: OverlayOptions = {
  minSegmentLengthForLabelMm: 30,
  wireMaskWidthMm: 1,
  wireMaskColor: "#F5F4EF",
  strokeWidthMm: 0.3,
  labelFontSizeMm: 0.2,
  debugMarkers: false,
  drawScale: DRAW_SCALE,
};

export interface LabelStyle {
  textColor: string;
  backgroundColor: string;
  outline: string;
  fontSize: number;
  fontFamily: string;
  fontWeight: string;
}

const DEFAULT_LABEL_STYLE: LabelStyle = {
  textColor: "black",
  backgroundColor: "white",
  outline: "black",
  fontSize: 0.2,
  fontFamily: "Arial, Helvetica, sans-serif",
  fontWeight: "normal",
};

export function fmt(n: number): string {
  const s = n.toFixed(3);
  return s === "-0.000" ? "0.000" : s;
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/**
 * Text in a box, centred on a draw-space point and turned to follow the wire.
 * Text that would read upside down is turned a half-turn.
 */
export function labelSvg(x: number, y: number, angle: number, text: string, style: Partial<LabelStyle> = {}): string {
  const s: LabelStyle = { ...DEFAULT_LABEL_STYLE, ...style };
  const content = text.trim() ? text : "?";

  let rotation = normalizeAngle(angle);
  if (rotation > 90 && rotation < 270) {
    rotation = normalizeAngle(rotation + 180);
  }

  // Sized from the displayed text, not its XML-escaped form.
  const width = (content.length * s.fontSize * 1.2 + 0.3 * 2) * 1.75;
  const height = s.fontSize * 4;
  const stroke = s.backgroundColor === "black" ? s.backgroundColor : s.outline;
  const strokeWidth = s.backgroundColor === "white" ? 0.05 : 0.2;

  return [
    `<g transform="translate(${fmt(x)},${fmt(-y)}) rotate(${fmt(-rotation)})">`,
    `  <rect x="${fmt(-width / 2)}" y="${fmt(-height / 2)}" width="${fmt(width)}" height="${fmt(height)}" ` +
      `fill="${s.backgroundColor}" stroke="${stroke}" stroke-width="${strokeWidth}"/>`,
    `  <text x="0" y="0" text-anchor="middle" style="fill:${s.textColor};dominant-baseline:middle;` +
      `font-weight:${s.fontWeight};font-family:${s.fontFamily};font-size:${s.fontSize}mm">${escapeXml(content)}</text>`,
    `</g>`,
  ].join("\n");
}

/**
 * Rectangle laid along a raw wire (canonical units in, mm out), slightly
 * longer than the wire so its round caps are covered too.
 */
export function wireMaskSvg(wire: RawWire, widthMm: number, color: string, drawScale: number = DRAW_SCALE): string {
  const ax = wire.a.x * drawScale;
  const ay = wire.a.y * drawScale;
  const bx = wire.b.x * drawScale;
  const by = wire.b.y * drawScale;

  const dx = bx - ax;
  const dy = by - ay;
  const angle = Math.atan2(dy, dx);
  const halfLength = (Math.hypot(dx, dy) + widthMm) / 2;
  const halfWidth = widthMm / 2;
  const cx = (ax + bx) / 2;
  const cy = (ay + by) / 2;
  const cos = Math.cos(angle);
  const sin = Math.sin(angle);

  const corners: Array<[number, number]> = [
    [-halfLength, -halfWidth],
    [halfLength, -halfWidth],
    [halfLength, halfWidth],
    [-halfLength, halfWidth],
  ];
  const points = corners
    .map(([px, py]) => `${fmt(cx + px * cos - py * sin)},${fmt(cy + px * sin + py * cos)}`)
    .join(" ");

  return `<polygon points="${points}" fill="${color}" stroke="none" />`;
}

function toSvg(p: Point): Point {
  return { x: p.x, y: p.y === 0 ? 0 : -p.y };
}

/**
 * Path data for a chain: straight along each wire, cubic turns inside each
 * node that leave and arrive along the wire tangents.
 */
export function chainPathData(chain: PointChain): string {
  if (chain.length === 0) return "";
  const first = toSvg(chain[0]);
  const parts = [`M ${fmt(first.x)} ${fmt(first.y)}`];

  for (let i = 1; i < chain.length; i++) {
    const prev = chain[i - 1];
    const cur = chain[i];
    const p = toSvg(cur);
    const q = toSvg(prev);
    const reach = Math.hypot(p.x - q.x, p.y - q.y) / 2;

    if (i % 2 === 1 || reach === 0) {
      parts.push(`L ${fmt(p.x)} ${fmt(p.y)}`);
      continue;
    }

    const t0 = (prev.tangent * Math.PI) / 180;
    const t1 = (cur.tangent * Math.PI) / 180;
    const c1 = { x: q.x + Math.cos(t0) * reach, y: q.y - Math.sin(t0) * reach };
    const c2 = { x: p.x - Math.cos(t1) * reach, y: p.y + Math.sin(t1) * reach };
    parts.push(`C ${fmt(c1.x)} ${fmt(c1.y)} ${fmt(c2.x)} ${fmt(c2.y)} ${fmt(p.x)} ${fmt(p.y)}`);
  }

  return parts.join(" ");
}

/** Outline stroke under a base-colour stroke. */
export function styledPathSvg(chain: PointChain, connection: RequestedConnection, strokeWidthMm: number): string {
  const d = chainPathData(chain);
  const { baseColor, outlineColor } = connection.display.style;
  return [
    `<g id="${escapeXml(connection.name)}">`,
    `  <path d="${d}" fill="none" stroke="${outlineColor}" stroke-width="${fmt(strokeWidthMm * 1.5)}"/>`,
    `  <path d="${d}" fill="none" stroke="${baseColor}" stroke-width="${fmt(strokeWidthMm)}"/>`,
    `</g>`,
  ].join("\n");
}

export interface ChainToDraw {
  connection: RequestedConnection;
  chain: PointChain;
}

export interface OverlayInput {
  graph: ConnectivityGraph;
  bundles: BundlePoints;
  chains: ChainToDraw[];
  /** Raw wires in canonical units. */
  wires: RawWire[];
}

/**
 * SVG fragments of the overlay, bottom layer first: optional debug markers,
 * wire masks, then each connection with its labels.
 */
export function renderOverlayGroups(input: OverlayInput, options: OverlayOptions = DEFAULT_OVERLAY_OPTIONS): string[] {
  const groups: string[] = [];
  const scale = options.drawScale;

  if (options.debugMarkers) {
    for (const [nodeId, radius] of input.bundles.radii) {
      const node = input.graph.getNode(nodeId);
      groups.push(
        `<circle cx="${fmt(node.x * scale)}" cy="${fmt(node.y * scale)}" r="${fmt(radius)}" fill="gray" opacity="0.5" />`
      );
    }
    for (const { chain } of input.chains) {
      for (const p of chain) {
        groups.push(`<circle cx="${fmt(p.x)}" cy="${fmt(-p.y)}" r="0.8" fill="red" />`);
      }
    }
  }

  for (const wire of input.wires) {
    groups.push(wireMaskSvg(wire, options.wireMaskWidthMm, options.wireMaskColor, scale));
  }

  for (const { connection, chain } of input.chains) {
    if (chain.length === 0) continue;
    groups.push(styledPathSvg(chain, connection, options.strokeWidthMm));

    const ends: Array<[number, string]> = [
      [0, connection.display.labelAtA],
      [chain.length - 1, connection.display.labelAtB],
    ];
    for (const [index, text] of ends) {
      const p = chain[index];
      groups.push(
        labelSvg(p.x, p.y, p.tangent, text, {
          textColor: "white",
          backgroundColor: "black",
          outline: "black",
          fontSize: options.labelFontSizeMm,
        })
      );
    }

    for (let i = 0; i < chain.length - 1; i++) {
      const a = chain[i];
      const b = chain[i + 1];
      if (Math.hypot(b.x - a.x, b.y - a.y) < options.minSegmentLengthForLabelMm) continue;
      groups.push(
        labelSvg((a.x + b.x) / 2, (a.y + b.y) / 2, a.tangent, connection.display.centerLabel, {
          fontSize: options.labelFontSizeMm,
        })
      );
    }
  }

  return groups;
}
