import { ConnectionError } from "../errors";
import { ConnectivityGraph } from "../graph/ConnectivityGraph";
import { ResolvedPath } from "../graph/PathResolver";
import { BundlePoints, DRAW_SCALE } from "./BundleGeometry";

export interface ChainPoint {
  x: number;
  y: number;
  /** Direction of travel in degrees, draw space, within [0, 360). */
  tangent: number;
}

export type PointChain = ChainPoint[];

export function normalizeAngle(degrees: number): number {
  const wrapped = ((degrees % 360) + 360) % 360;
  // 359.9999999999 + tiny can wrap to exactly 360
  return wrapped === 360 || wrapped === 0 ? 0 : wrapped;
}

/**
 * Tangent of a segment from end A to end B, negated once because draw space
 * flips the vertical axis.
 */
export function segmentTangent(graph: ConnectivityGraph, segmentUuid: string, drawScale: number = DRAW_SCALE): number {
  const seg = graph.getSegment(segmentUuid);
  const a = graph.getNode(seg.nodeAtEndA);
  const b = graph.getNode(seg.nodeAtEndB);
  const dx = (b.x - a.x) * drawScale;
  const dy = (b.y - a.y) * drawScale;
  return normalizeAngle(-(Math.atan2(dy, dx) * 180) / Math.PI);
}

/**
 * Entry and exit bundle points of every segment of the path, in travel order.
 * A missing bundle point means bundles were computed over a different path
 * set; that fails the connection rather than drawing a broken line.
 */
export function assembleChain(
  path: ResolvedPath,
  graph: ConnectivityGraph,
  bundles: BundlePoints,
  drawScale: number = DRAW_SCALE
): PointChain {
  const chain: PointChain = [];
  const name = path.connectionName;

  const lookup = (nodeId: string, segment: string) => {
    const p = bundles.get(nodeId, segment, name);
    if (!p) {
      throw new ConnectionError("MISSING_BUNDLE_POINT", name, `no bundle point at ${nodeId}/${segment}`);
    }
    return p;
  };

  for (const step of path.steps) {
    const seg = graph.getSegment(step.segment);
    const tangentAB = segmentTangent(graph, step.segment, drawScale);

    const [entry, exit, tangent] =
      step.direction === "a_to_b"
        ? [seg.nodeAtEndA, seg.nodeAtEndB, tangentAB]
        : [seg.nodeAtEndB, seg.nodeAtEndA, normalizeAngle(tangentAB + 180)];

    const p1 = lookup(entry, step.segment);
    const p2 = lookup(exit, step.segment);
    chain.push({ x: p1.x, y: p1.y, tangent }, { x: p2.x, y: p2.y, tangent });
  }

  return chain;
}
