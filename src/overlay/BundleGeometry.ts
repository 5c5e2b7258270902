import { Diagnostic, Point } from "../kicad/types";
import { ConnectivityGraph, compareIds } from "../graph/ConnectivityGraph";
import { RoutedConnection } from "../graph/PathResolver";

/** Millimetres per inch: the overlay is drawn in the schematic SVG's mm space. */
export const DRAW_SCALE = 25.4;

export interface BundleOptions {
  /** Distance between neighbouring lines in a bundle, in inches. */
  segmentSpacingInches: number;
  /** Canonical unit → draw unit factor. */
  drawScale: number;
}

export const DEFAULT_BUNDLE_OPTIONS: BundleOptions = {
  segmentSpacingInches: 0.05,
  drawScale: DRAW_SCALE,
};

const RADIUS_EPSILON = 1e-9;

/** Draw space has its vertical axis flipped relative to the schematic. */
export function flipY(y: number): number {
  return y === 0 ? 0 : -y;
}

/**
 * Where each connection enters or leaves each node, keyed by
 * node → segment → connection. Points are in draw space.
 */
export class BundlePoints {
  private readonly points = new Map<string, Map<string, Map<string, Point>>>();
  /** Perimeter radius per node that carries at least one connection. */
  readonly radii = new Map<string, number>();

  set(nodeId: string, segment: string, connection: string, p: Point): void {
    let bySegment = this.points.get(nodeId);
    if (!bySegment) {
      bySegment = new Map();
      this.points.set(nodeId, bySegment);
    }
    let byConnection = bySegment.get(segment);
    if (!byConnection) {
      byConnection = new Map();
      bySegment.set(segment, byConnection);
    }
    byConnection.set(connection, p);
  }

  get(nodeId: string, segment: string, connection: string): Point | undefined {
    return this.points.get(nodeId)?.get(segment)?.get(connection);
  }

  get size(): number {
    let count = 0;
    for (const bySegment of this.points.values()) {
      for (const byConnection of bySegment.values()) count += byConnection.size;
    }
    return count;
  }

  toJSON(): Record<string, Record<string, Record<string, Point>>> {
    const out: Record<string, Record<string, Record<string, Point>>> = {};
    for (const [nodeId, bySegment] of this.points) {
      out[nodeId] = {};
      for (const [segment, byConnection] of bySegment) {
        out[nodeId][segment] = Object.fromEntries(byConnection);
      }
    }
    return out;
  }
}

/**
 * Sub-linear growth keeps small bundles tight without letting big ones sprawl.
 */
export function bundleRadius(componentCount: number, spacing: number): number {
  return Math.pow(componentCount, 0.7) * spacing;
}

/**
 * Angular offset (degrees) that places the line `index` (1-based) of `count`
 * on the perimeter at the matching perpendicular distance from the segment
 * axis. Collapses to 0 when the offset does not fit on the circle.
 */
export function angularOffset(index: number, count: number, spacing: number, radius: number): number {
  const offset = (index - count / 2 - 0.5) * spacing;
  if (radius < RADIUS_EPSILON) return 0;
  const ratio = offset / radius;
  if (ratio < -1 || ratio > 1) return 0;
  return (Math.asin(ratio) * 180) / Math.PI;
}

export interface BundleResult {
  bundles: BundlePoints;
  diagnostics: Diagnostic[];
}

/**
 * Lays out every connection passing through each node around that node's
 * perimeter. Needs every path up front: a node's radius depends on how many
 * distinct components pass through it.
 */
export function computeBundlePoints(
  graph: ConnectivityGraph,
  routed: RoutedConnection[],
  options: BundleOptions = DEFAULT_BUNDLE_OPTIONS
): BundleResult {
  const bundles = new BundlePoints();
  const diagnostics: Diagnostic[] = [];
  const spacing = options.segmentSpacingInches * options.drawScale;

  const usersBySegment = new Map<string, string[]>();
  const componentOf = new Map<string, string>();
  for (const { connection, path } of routed) {
    componentOf.set(connection.name, connection.groupKey ?? connection.name);
    for (const step of new Set(path.steps.map((s) => s.segment))) {
      const users = usersBySegment.get(step) ?? [];
      users.push(connection.name);
      usersBySegment.set(step, users);
    }
  }
  for (const users of usersBySegment.values()) users.sort(compareIds);

  let idleNodes = 0;
  for (const [nodeId, node] of graph.nodes) {
    const touching = [...new Set(graph.neighbors(nodeId).map((e) => e.segment))];

    const components = new Set<string>();
    for (const seg of touching) {
      for (const name of usersBySegment.get(seg) ?? []) {
        components.add(componentOf.get(name) ?? name);
      }
    }
    if (components.size === 0) {
      idleNodes++;
      continue;
    }

    const radius = bundleRadius(components.size, spacing);
    bundles.radii.set(nodeId, radius);

    const cx = node.x * options.drawScale;
    const cy = node.y * options.drawScale;

    for (const segUuid of touching) {
      const users = usersBySegment.get(segUuid);
      if (!users || users.length === 0) continue;

      const seg = graph.getSegment(segUuid);
      const atEndA = seg.nodeAtEndA === nodeId;
      const far = graph.getNode(atEndA ? seg.nodeAtEndB : seg.nodeAtEndA);
      const dx = (far.x - node.x) * options.drawScale;
      const dy = (far.y - node.y) * options.drawScale;
      const segAngle = (Math.atan2(dy, dx) * 180) / Math.PI;

      // Seen from the B end the bundle is mirrored; reversing keeps each line
      // on the same side of the wire along its whole length.
      const ordered = atEndA ? users : [...users].reverse();

      ordered.forEach((name, i) => {
        const angle = ((segAngle + angularOffset(i + 1, ordered.length, spacing, radius)) * Math.PI) / 180;
        bundles.set(nodeId, segUuid, name, {
          x: cx + radius * Math.cos(angle),
          y: flipY(cy + radius * Math.sin(angle)),
        });
      });
    }
  }

  if (idleNodes > 0) {
    diagnostics.push({ stage: "bundle", message: `${idleNodes} node(s) carry no connection; skipped` });
  }
  if (routed.length > 0 && bundles.size === 0) {
    diagnostics.push({ stage: "bundle", message: "No bundle points produced; every routed connection has an empty path" });
  }

  return { bundles, diagnostics };
}
