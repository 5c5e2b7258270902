export * from "./errors";
export * from "./kicad/types";
export { SExpressionParser } from "./kicad/SExpressionParser";
export type { SExpr } from "./kicad/SExpressionParser";
export { loadSchematic, parseSchematic } from "./kicad/SchematicParser";
export {
  KICAD_UNIT_SCALE,
  OUTPUT_PRECISION,
  compilePinLocations,
  normalizePinCopies,
  normalizePins,
  normalizePoint,
  normalizeWires,
} from "./kicad/CoordinateCompiler";
export { NODE_TOLERANCE, ConnectivityGraph, GraphBuilder, buildGraph } from "./graph/ConnectivityGraph";
export type { Segment, Direction, SerializedGraph } from "./graph/ConnectivityGraph";
export { resolvePath, resolveConnections } from "./graph/PathResolver";
export type { PathStep, ResolvedPath } from "./graph/PathResolver";
export * from "./connections/types";
export { loadConnections, parseConnections } from "./connections/ConnectionList";
export { DRAW_SCALE, BundlePoints, computeBundlePoints } from "./overlay/BundleGeometry";
export type { BundleOptions } from "./overlay/BundleGeometry";
export { assembleChain } from "./overlay/PathChain";
export type { ChainPoint, PointChain } from "./overlay/PathChain";
export { DEFAULT_OVERLAY_OPTIONS, renderOverlayGroups } from "./overlay/SvgOverlay";
export type { OverlayOptions } from "./overlay/SvgOverlay";
export { buildOverlayDocument, composeOverlay, extractSvgFrame, insertMarkerGroups } from "./overlay/SvgDocument";
export { layoutGraphSheet } from "./overlay/debug/GraphSheet";
export { writeDebugPng } from "./overlay/debug/DebugPng";
export { writeGraphPdf } from "./overlay/debug/GraphSheetPdf";
export * from "./pipeline/NetOverlayPipeline";
