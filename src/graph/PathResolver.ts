import { ConnectionError } from "../errors";
import { RequestedConnection, endpointNodeId } from "../connections/types";
import { ConnectivityGraph, Direction } from "./ConnectivityGraph";

export interface PathStep {
  segment: string;
  direction: Direction;
}

export interface ResolvedPath {
  connectionName: string;
  fromNode: string;
  toNode: string;
  steps: PathStep[];
}

/**
 * Minimum-hop route between two nodes (breadth-first). Candidate segments at
 * each node are tried in ascending uuid order, so among equally short routes
 * the same one is chosen on every run. Wire length is not considered.
 *
 * @param connectionName used to label errors
 */
export function resolvePath(
  graph: ConnectivityGraph,
  fromNodeId: string,
  toNodeId: string,
  connectionName = `${fromNodeId} → ${toNodeId}`
): PathStep[] {
  const from = graph.resolveNodeId(fromNodeId);
  const to = graph.resolveNodeId(toNodeId);
  if (from === null) {
    throw new ConnectionError("MISSING_ENDPOINT", connectionName, `from node '${fromNodeId}' not found in graph`);
  }
  if (to === null) {
    throw new ConnectionError("MISSING_ENDPOINT", connectionName, `to node '${toNodeId}' not found in graph`);
  }

  const queue: Array<{ node: string; path: PathStep[] }> = [{ node: from, path: [] }];
  const visited = new Set<string>([from]);

  for (let head = 0; head < queue.length; head++) {
    const { node, path } = queue[head];
    if (node === to) return path;

    for (const edge of graph.neighbors(node)) {
      if (visited.has(edge.next)) continue;
      visited.add(edge.next);
      queue.push({ node: edge.next, path: [...path, { segment: edge.segment, direction: edge.direction }] });
    }
  }

  throw new ConnectionError("NO_PATH", connectionName, `no path found: ${fromNodeId} → ${toNodeId}`);
}

export interface RoutedConnection {
  connection: RequestedConnection;
  path: ResolvedPath;
}

export interface ResolutionResult {
  routed: RoutedConnection[];
  errors: ConnectionError[];
}

/**
 * Resolves each connection on its own; one bad connection does not stop the
 * rest.
 */
export function resolveConnections(graph: ConnectivityGraph, connections: RequestedConnection[]): ResolutionResult {
  const routed: RoutedConnection[] = [];
  const errors: ConnectionError[] = [];

  for (const connection of connections) {
    const fromNode = endpointNodeId(connection.from);
    const toNode = endpointNodeId(connection.to);
    try {
      const steps = resolvePath(graph, fromNode, toNode, connection.name);
      routed.push({ connection, path: { connectionName: connection.name, fromNode, toNode, steps } });
    } catch (err) {
      if (!(err instanceof ConnectionError)) throw err;
      errors.push(err);
    }
  }

  return { routed, errors };
}

/** Node ids visited by a path, starting at `start`. */
export function pathNodes(graph: ConnectivityGraph, start: string, steps: PathStep[]): string[] {
  const nodes = [start];
  for (const step of steps) {
    const seg = graph.getSegment(step.segment);
    nodes.push(step.direction === "a_to_b" ? seg.nodeAtEndB : seg.nodeAtEndA);
  }
  return nodes;
}
