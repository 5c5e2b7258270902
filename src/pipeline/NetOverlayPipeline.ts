import { AbsolutePins, Diagnostic, ParsedSchematic, PinCopies, RawWire, SchematicLabel } from "../kicad/types";
import { compilePinLocations, normalizePinCopies, normalizePins, normalizePoint, normalizeWires } from "../kicad/CoordinateCompiler";
import { ConnectivityGraph, NODE_TOLERANCE, buildGraph } from "../graph/ConnectivityGraph";
import { ResolvedPath, pathNodes, resolveConnections } from "../graph/PathResolver";
import { RequestedConnection } from "../connections/types";
import { ConnectionError, ConnectionListError } from "../errors";
import { BundleOptions, BundlePoints, DEFAULT_BUNDLE_OPTIONS, computeBundlePoints } from "../overlay/BundleGeometry";
import { PointChain, assembleChain } from "../overlay/PathChain";
import { ChainToDraw, DEFAULT_OVERLAY_OPTIONS, OverlayOptions, renderOverlayGroups } from "../overlay/SvgOverlay";

export interface Extraction {
  parsed: ParsedSchematic;
  /** Canonical units (inches) from here on. */
  pins: AbsolutePins;
  wires: RawWire[];
  labels: SchematicLabel[];
  graph: ConnectivityGraph;
  diagnostics: Diagnostic[];
}

/**
 * parse output → absolute pins → normalized coordinates → graph.
 * The graph is rebuilt on every call; junction ids are not stable across runs.
 */
export function extractGraph(parsed: ParsedSchematic): Extraction {
  const diagnostics: Diagnostic[] = [...parsed.diagnostics];

  for (const feature of parsed.unsupported) {
    const where = feature.at ? ` at (${feature.at.x}, ${feature.at.y})` : "";
    diagnostics.push({ stage: "parse", message: `Unsupported ${feature.kind}${where}: ${feature.detail}` });
  }

  const copies: PinCopies = new Map();
  const absolute = compilePinLocations(parsed.pinTemplates, parsed.instances, diagnostics, copies);
  const pins = normalizePins(absolute);
  const wires = normalizeWires(parsed.wires);
  const labels = parsed.labels.map((l) => ({ ...l, at: normalizePoint(l.at) }));

  const { graph, diagnostics: graphDiagnostics } = buildGraph(pins, wires, NODE_TOLERANCE, normalizePinCopies(copies));
  diagnostics.push(...graphDiagnostics);

  return { parsed, pins, wires, labels, graph, diagnostics };
}

export interface PipelineOptions {
  bundle: BundleOptions;
  overlay: OverlayOptions;
}

export const DEFAULT_PIPELINE_OPTIONS: PipelineOptions = {
  bundle: DEFAULT_BUNDLE_OPTIONS,
  overlay: DEFAULT_OVERLAY_OPTIONS,
};

export interface ConnectionOutcome {
  connection: RequestedConnection;
  path: ResolvedPath | null;
  chain: PointChain | null;
  error: ConnectionError | null;
}

export interface OverlayRun {
  extraction: Extraction;
  outcomes: ConnectionOutcome[];
  bundles: BundlePoints;
  /** Overlay SVG fragments, ready for `buildOverlayDocument`. */
  groups: string[];
  errors: ConnectionError[];
  diagnostics: Diagnostic[];
  /** False when any connection failed. */
  success: boolean;
}

/**
 * Routes and draws every requested connection over an extracted graph.
 * Connection failures are collected, not thrown.
 *
 * @throws ConnectionListError when two connections share a name
 */
export function runOverlay(
  extraction: Extraction,
  connections: RequestedConnection[],
  options: PipelineOptions = DEFAULT_PIPELINE_OPTIONS
): OverlayRun {
  const { graph } = extraction;
  const diagnostics: Diagnostic[] = [];

  const seen = new Set<string>();
  connections.forEach((connection, index) => {
    if (seen.has(connection.name)) {
      throw new ConnectionListError("connections", `entry #${index}: duplicate connection name "${connection.name}"`);
    }
    seen.add(connection.name);
  });

  const { routed, errors } = resolveConnections(graph, connections);

  const { bundles, diagnostics: bundleDiagnostics } = computeBundlePoints(graph, routed, options.bundle);
  diagnostics.push(...bundleDiagnostics);

  const outcomes = new Map<string, ConnectionOutcome>();
  for (const connection of connections) {
    outcomes.set(connection.name, { connection, path: null, chain: null, error: null });
  }
  for (const error of errors) {
    const outcome = outcomes.get(error.connectionName);
    if (outcome) outcome.error = error;
  }

  const toDraw: ChainToDraw[] = [];
  for (const { connection, path } of routed) {
    const outcome = outcomes.get(connection.name);
    if (!outcome) continue;
    outcome.path = path;
    try {
      const chain = assembleChain(path, graph, bundles, options.bundle.drawScale);
      outcome.chain = chain;
      if (chain.length === 0) {
        diagnostics.push({ stage: "chain", message: `Empty chain for ${connection.name}; both ends are the same node` });
        continue;
      }
      toDraw.push({ connection, chain });
    } catch (err) {
      if (!(err instanceof ConnectionError)) throw err;
      outcome.error = err;
      errors.push(err);
    }
  }

  const groups = renderOverlayGroups({ graph, bundles, chains: toDraw, wires: extraction.wires }, options.overlay);

  return {
    extraction,
    outcomes: [...outcomes.values()],
    bundles,
    groups,
    errors,
    diagnostics,
    success: errors.length === 0,
  };
}

export interface PathReportEntry {
  connection: string;
  from: string;
  to: string;
  status: "ok" | "error";
  error?: string;
  nodes?: string[];
  segments?: Array<{ segment: string; direction: string }>;
  chain?: PointChain;
}

/** JSON-friendly per-connection summary of a run. */
export function pathReport(run: OverlayRun): PathReportEntry[] {
  return run.outcomes.map(({ connection, path, chain, error }) => {
    const entry: PathReportEntry = {
      connection: connection.name,
      from: `${connection.from.refdes}.${connection.from.connector}`,
      to: `${connection.to.refdes}.${connection.to.connector}`,
      status: error ? "error" : "ok",
    };
    if (error) entry.error = error.message;
    if (path) {
      const start = run.extraction.graph.resolveNodeId(path.fromNode) ?? path.fromNode;
      entry.nodes = pathNodes(run.extraction.graph, start, path.steps);
      entry.segments = path.steps.map((s) => ({ segment: s.segment, direction: s.direction }));
    }
    if (chain) entry.chain = chain;
    return entry;
  });
}
