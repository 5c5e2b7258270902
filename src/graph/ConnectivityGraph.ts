import { AbsolutePins, Diagnostic, PinCopies, Point, RawWire } from "../kicad/types";
import { OUTPUT_PRECISION, roundTo } from "../kicad/CoordinateCompiler";

/** Spatial resolution (inches) that decides whether two points are connected. */
export const NODE_TOLERANCE = 0.01;

export const JUNCTION_PREFIX = "wirejunction-";

export type GraphNode = Point;

export interface Segment {
  uuid: string;
  nodeAtEndA: string;
  nodeAtEndB: string;
}

export type Direction = "a_to_b" | "b_to_a";

export interface Adjacency {
  segment: string;
  direction: Direction;
  next: string;
}

export interface SerializedGraph {
  nodes: Record<string, GraphNode>;
  segments: Record<string, { node_at_end_a: string; node_at_end_b: string }>;
  aliases?: Record<string, string>;
}

/**
 * Read-only connectivity graph. Node ids are `refdes.pin` for pins and
 * `wirejunction-N` for wire ends that meet no pin; junction numbers are only
 * meaningful within the build that produced them.
 */
export class ConnectivityGraph {
  private adjacencyCache: Map<string, Adjacency[]> | null = null;

  constructor(
    readonly nodes: ReadonlyMap<string, GraphNode>,
    readonly segments: ReadonlyMap<string, Segment>,
    readonly aliases: ReadonlyMap<string, string> = new Map()
  ) {}

  /**
   * Canonical node id for a pin id, following aliases. Null when unknown.
   */
  resolveNodeId(id: string): string | null {
    if (this.nodes.has(id)) return id;
    const alias = this.aliases.get(id);
    return alias !== undefined && this.nodes.has(alias) ? alias : null;
  }

  getNode(id: string): GraphNode {
    const node = this.nodes.get(id);
    if (!node) throw new Error(`Unknown graph node ${id}`);
    return node;
  }

  getSegment(uuid: string): Segment {
    const segment = this.segments.get(uuid);
    if (!segment) throw new Error(`Unknown graph segment ${uuid}`);
    return segment;
  }

  /**
   * Segments touching `nodeId`, ordered by ascending segment uuid. A segment
   * whose two ends share a node is listed once per end.
   */
  neighbors(nodeId: string): Adjacency[] {
    if (!this.adjacencyCache) {
      const cache = new Map<string, Adjacency[]>();
      const add = (node: string, entry: Adjacency) => {
        const list = cache.get(node) ?? [];
        list.push(entry);
        cache.set(node, list);
      };
      for (const seg of this.segments.values()) {
        add(seg.nodeAtEndA, { segment: seg.uuid, direction: "a_to_b", next: seg.nodeAtEndB });
        add(seg.nodeAtEndB, { segment: seg.uuid, direction: "b_to_a", next: seg.nodeAtEndA });
      }
      for (const list of cache.values()) {
        list.sort((p, q) => compareIds(p.segment, q.segment) || compareIds(p.direction, q.direction));
      }
      this.adjacencyCache = cache;
    }
    return this.adjacencyCache.get(nodeId) ?? [];
  }

  get pinNodeCount(): number {
    let count = 0;
    for (const id of this.nodes.keys()) {
      if (!id.startsWith(JUNCTION_PREFIX)) count++;
    }
    return count;
  }

  get junctionNodeCount(): number {
    return this.nodes.size - this.pinNodeCount;
  }

  toJSON(): SerializedGraph {
    const out: SerializedGraph = {
      nodes: Object.fromEntries(this.nodes),
      segments: Object.fromEntries(
        [...this.segments.values()].map((s) => [s.uuid, { node_at_end_a: s.nodeAtEndA, node_at_end_b: s.nodeAtEndB }])
      ),
    };
    if (this.aliases.size > 0) {
      out.aliases = Object.fromEntries(this.aliases);
    }
    return out;
  }
}

/** Plain code-unit ordering, independent of locale. */
export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function locationKey(p: Point, tolerance: number = NODE_TOLERANCE): string {
  return `${Math.round(p.x / tolerance)},${Math.round(p.y / tolerance)}`;
}

export interface GraphBuildResult {
  graph: ConnectivityGraph;
  diagnostics: Diagnostic[];
}

/**
 * Builds a graph from absolute pins and wires (both in canonical units).
 * One builder owns one junction counter; create a new builder per build.
 */
export class GraphBuilder {
  private junctionCounter = 0;
  private readonly nodes = new Map<string, GraphNode>();
  private readonly segments = new Map<string, Segment>();
  private readonly aliases = new Map<string, string>();
  private readonly locationToNode = new Map<string, string>();
  private readonly diagnostics: Diagnostic[] = [];

  constructor(private readonly tolerance: number = NODE_TOLERANCE) {}

  build(pins: AbsolutePins, wires: RawWire[], pinCopies: PinCopies = new Map()): GraphBuildResult {
    // Pins first, so a pin owns its location over any wire end
    for (const [refdes, byName] of pins) {
      for (const [pinName, p] of byName) {
        this.addPin(`${refdes}.${pinName}`, p);
      }
    }
    for (const [id, locations] of pinCopies) {
      for (const p of locations) {
        this.addPinCopy(id, p);
      }
    }

    for (const wire of wires) {
      if (this.segments.has(wire.uuid)) {
        this.diagnostics.push({ stage: "graph", message: `Duplicate wire uuid ${wire.uuid}; keeping the first` });
        continue;
      }
      this.segments.set(wire.uuid, {
        uuid: wire.uuid,
        nodeAtEndA: this.nodeAt(wire.a),
        nodeAtEndB: this.nodeAt(wire.b),
      });
    }

    return {
      graph: new ConnectivityGraph(this.nodes, this.segments, this.aliases),
      diagnostics: this.diagnostics,
    };
  }

  private addPin(id: string, p: Point): void {
    const key = locationKey(p, this.tolerance);
    const existing = this.locationToNode.get(key);
    if (existing !== undefined) {
      // Pins touching directly are connected; keep one node for the spot.
      this.aliases.set(id, existing);
      this.diagnostics.push({ stage: "graph", message: `Pin ${id} coincides with ${existing}; treating them as one node` });
      return;
    }
    this.nodes.set(id, { x: roundTo(p.x, OUTPUT_PRECISION), y: roundTo(p.y, OUTPUT_PRECISION) });
    this.locationToNode.set(key, id);
  }

  /** Another location of an existing pin: wire ends there join the pin's node. */
  private addPinCopy(id: string, p: Point): void {
    const nodeId = this.nodes.has(id) ? id : this.aliases.get(id);
    if (nodeId === undefined) return;

    const key = locationKey(p, this.tolerance);
    const existing = this.locationToNode.get(key);
    if (existing === undefined) {
      this.locationToNode.set(key, nodeId);
    } else if (existing !== nodeId) {
      this.diagnostics.push({
        stage: "graph",
        message: `Pin ${id} at (${p.x}, ${p.y}) coincides with ${existing}; wires there join ${existing}`,
      });
    }
  }

  private nodeAt(p: Point): string {
    const key = locationKey(p, this.tolerance);
    const existing = this.locationToNode.get(key);
    if (existing !== undefined) return existing;

    const id = `${JUNCTION_PREFIX}${this.junctionCounter++}`;
    this.nodes.set(id, { x: roundTo(p.x, OUTPUT_PRECISION), y: roundTo(p.y, OUTPUT_PRECISION) });
    this.locationToNode.set(key, id);
    return id;
  }
}

export function buildGraph(
  pins: AbsolutePins,
  wires: RawWire[],
  tolerance: number = NODE_TOLERANCE,
  pinCopies: PinCopies = new Map()
): GraphBuildResult {
  return new GraphBuilder(tolerance).build(pins, wires, pinCopies);
}
