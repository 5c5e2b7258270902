import { FrameMismatchError, SvgFrame } from "../errors";

function attribute(tag: string, name: string): string | null {
  const match = tag.match(new RegExp(`(?:^|\\s)${name}\\s*=\\s*["']([^"']+)["']`));
  return match ? match[1] : null;
}

/**
 * viewBox, width and height of the root `<svg>` element (null when absent).
 */
export function extractSvgFrame(svg: string): SvgFrame {
  const tag = svg.match(/<svg\b[^>]*>/);
  if (!tag) return { viewBox: null, width: null, height: null };
  return {
    viewBox: attribute(tag[0], "viewBox"),
    width: attribute(tag[0], "width"),
    height: attribute(tag[0], "height"),
  };
}

export function sameFrame(a: SvgFrame, b: SvgFrame): boolean {
  return a.viewBox === b.viewBox && a.width === b.width && a.height === b.height;
}

export function startMarker(groupPrefix: string): string {
  return `<g id="${groupPrefix}-contents-start">`;
}

export function endMarker(groupPrefix: string): string {
  return `<g id="${groupPrefix}-contents-end"/>`;
}

/**
 * Standalone overlay document in the same coordinate frame as the schematic
 * render, content wrapped between the start/end marker groups.
 */
export function buildOverlayDocument(groups: string[], frame: SvgFrame, groupPrefix: string): string {
  let opening = '<svg xmlns="http://www.w3.org/2000/svg" stroke-linecap="round" stroke-linejoin="round"';
  if (frame.viewBox) opening += ` viewBox="${frame.viewBox}"`;
  if (frame.width) opening += ` width="${frame.width}"`;
  if (frame.height) opening += ` height="${frame.height}"`;
  opening += ">\n";

  return (
    opening +
    `  ${startMarker(groupPrefix)}\n` +
    groups.join("\n") +
    "\n  </g>\n" +
    `  ${endMarker(groupPrefix)}\n` +
    "</svg>\n"
  );
}

/**
 * Adds empty marker groups just before `</svg>`, unless already present.
 */
export function insertMarkerGroups(svg: string, groupPrefix: string): string {
  if (svg.includes(startMarker(groupPrefix))) return svg;

  const end = svg.match(/<\/svg>\s*$/);
  if (!end || end.index === undefined) {
    throw new Error("Could not find closing </svg> tag");
  }
  const groups = `  ${startMarker(groupPrefix)}\n  </g>\n  ${endMarker(groupPrefix)}\n`;
  return svg.slice(0, end.index) + groups + svg.slice(end.index);
}

function markedRange(svg: string, groupPrefix: string, label: string): [number, number] {
  const start = svg.indexOf(startMarker(groupPrefix));
  const endTag = endMarker(groupPrefix);
  const end = start === -1 ? -1 : svg.indexOf(endTag, start);
  if (start === -1 || end === -1) {
    throw new Error(`${label} has no ${groupPrefix} marker groups`);
  }
  return [start, end + endTag.length];
}

/**
 * Copies the marked overlay group into the base render. Running it again
 * replaces the previously injected overlay.
 *
 * @throws FrameMismatchError when the two documents use different frames
 */
export function composeOverlay(baseSvg: string, overlaySvg: string, groupPrefix: string): string {
  const baseFrame = extractSvgFrame(baseSvg);
  const overlayFrame = extractSvgFrame(overlaySvg);
  if (!sameFrame(baseFrame, overlayFrame)) {
    throw new FrameMismatchError(baseFrame, overlayFrame);
  }

  const target = insertMarkerGroups(baseSvg, groupPrefix);
  const [srcStart, srcEnd] = markedRange(overlaySvg, groupPrefix, "Overlay");
  const [dstStart, dstEnd] = markedRange(target, groupPrefix, "Schematic render");

  return target.slice(0, dstStart) + overlaySvg.slice(srcStart, srcEnd) + target.slice(dstEnd);
}
