import * as fs from "fs";
import { SExpressionParser, SExpr } from "./SExpressionParser";
import {
  Diagnostic,
  LabelKind,
  ParsedSchematic,
  PinTemplate,
  PinTemplates,
  PlacedInstance,
  Point,
  RawWire,
  SchematicLabel,
  UnsupportedFeature,
} from "./types";
import { SchematicNotFoundError } from "../errors";

const S = SExpressionParser;

const LABEL_KINDS: LabelKind[] = ["text", "label", "global_label", "hierarchical_label"];

/**
 * Read a schematic from disk. A missing file is fatal and reported before any
 * parsing happens.
 */
export function loadSchematic(filePath: string): ParsedSchematic {
  if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
    throw new SchematicNotFoundError(filePath);
  }
  return parseSchematic(fs.readFileSync(filePath, "utf-8"));
}

/**
 * Recover pin geometry, placements, wires and labels from `.kicad_sch` text.
 *
 * Each scanner looks for one kind of element and ignores everything else, so
 * sections we do not understand never break extraction. Documents without a
 * `lib_symbols` section or without placed symbols produce empty collections.
 */
export function parseSchematic(content: string): ParsedSchematic {
  const root = findRoot(S.parse(content));
  const diagnostics: Diagnostic[] = [];

  const pinTemplates = scanLibSymbols(root, diagnostics);
  const instances = scanInstances(root, diagnostics);
  const wires = scanWires(root, diagnostics);
  const labels = scanLabels(root);
  const unsupported = scanUnsupported(root, instances, wires);

  return { pinTemplates, instances, wires, labels, unsupported, diagnostics };
}

function findRoot(ast: SExpr[]): SExpr[] {
  for (const item of ast) {
    if (S.isList(item, "kicad_sch")) return item;
  }
  // Not a wrapped document (e.g. a fragment); scan the top level directly.
  return ["", ...ast];
}

function readAt(expr: SExpr): { at: Point; angle: number } | null {
  const at = S.child(expr, "at");
  if (!at) return null;
  const x = S.number(at, 1);
  const y = S.number(at, 2);
  if (x === null || y === null) return null;
  return { at: { x, y }, angle: S.number(at, 3) ?? 0 };
}

/**
 * Pin offsets per library symbol. Pins inside unit sub-symbols
 * (`"<name>_<unit>_<style>"`) are attributed to their top-level symbol.
 */
export function scanLibSymbols(root: SExpr[], diagnostics: Diagnostic[] = []): PinTemplates {
  const templates: PinTemplates = new Map();
  const lib = S.child(root, "lib_symbols");
  if (!lib) return templates;

  for (const symbol of S.children(lib, "symbol")) {
    const libId = S.atom(symbol, 1);
    if (!libId) continue;

    const pins = templates.get(libId) ?? new Map<string, PinTemplate>();
    templates.set(libId, pins);

    collectPins(symbol, 0, libId, pins, diagnostics);
  }

  return templates;
}

function collectPins(
  symbol: SExpr[],
  unit: number,
  libId: string,
  pins: Map<string, PinTemplate>,
  diagnostics: Diagnostic[]
): void {
  for (const item of symbol.slice(2)) {
    if (S.isList(item, "symbol")) {
      const unitName = S.atom(item, 1) ?? "";
      const match = unitName.match(/_(\d+)_(\d+)$/);
      collectPins(item, match ? parseInt(match[1], 10) : unit, libId, pins, diagnostics);
    } else if (S.isList(item, "pin")) {
      const position = readAt(item);
      const name = pinName(item);
      if (!position || name === null) {
        diagnostics.push({ stage: "parse", message: `Skipping pin without position or name in symbol "${libId}"` });
        continue;
      }
      if (pins.has(name)) {
        diagnostics.push({ stage: "parse", message: `Symbol "${libId}" defines pin "${name}" more than once; using the last definition` });
      }
      pins.set(name, { at: position.at, unit });
    }
  }
}

/**
 * KiCad writes "~" for pins without a name; those are addressed by number.
 */
function pinName(pin: SExpr[]): string | null {
  const nameExpr = S.child(pin, "name");
  const name = nameExpr ? S.atom(nameExpr, 1) : null;
  if (name && name !== "~") return name;

  const numberExpr = S.child(pin, "number");
  const number = numberExpr ? S.atom(numberExpr, 1) : null;
  return number || name;
}

/**
 * Placed symbols: top-level `symbol` elements carrying a `lib_id`, a position
 * and a Reference property.
 */
export function scanInstances(root: SExpr[], diagnostics: Diagnostic[] = []): PlacedInstance[] {
  const instances: PlacedInstance[] = [];

  for (const symbol of S.children(root, "symbol")) {
    const libIdExpr = S.child(symbol, "lib_id");
    if (!libIdExpr) continue;
    const libName = S.child(symbol, "lib_name");
    const libId = S.atom(libName ?? libIdExpr, 1);

    const refdes = S.property(symbol, "Reference");
    const position = readAt(symbol);
    if (!libId || !refdes || !position) {
      diagnostics.push({
        stage: "parse",
        message: `Skipping placed symbol ${refdes ?? libId ?? "(unnamed)"}: missing lib_id, position or Reference`,
      });
      continue;
    }

    const unitExpr = S.child(symbol, "unit");
    const mirrorExpr = S.child(symbol, "mirror");
    const mirror = mirrorExpr ? S.atom(mirrorExpr, 1) : null;

    instances.push({
      refdes,
      libId,
      at: position.at,
      rotation: position.angle,
      unit: unitExpr ? S.number(unitExpr, 1) ?? 1 : 1,
      ...(mirror === "x" || mirror === "y" ? { mirror } : {}),
    });
  }

  return instances;
}

/**
 * Two-point wire primitives in document order.
 */
export function scanWires(root: SExpr[], diagnostics: Diagnostic[] = []): RawWire[] {
  const wires: RawWire[] = [];

  for (const wire of S.children(root, "wire")) {
    const uuidExpr = S.child(wire, "uuid");
    const uuid = uuidExpr ? S.atom(uuidExpr, 1) : null;
    const points = readPoints(wire);

    if (!uuid) {
      diagnostics.push({ stage: "parse", message: "Skipping wire without uuid" });
      continue;
    }
    if (points.length !== 2) {
      diagnostics.push({
        stage: "parse",
        message: `Skipping wire ${uuid}: expected 2 points, found ${points.length}; it is not masked under the overlay`,
      });
      continue;
    }

    wires.push({ uuid, a: points[0], b: points[1] });
  }

  return wires;
}

function samePoint(p: Point, q: Point): boolean {
  return Math.abs(p.x - q.x) < 0.005 && Math.abs(p.y - q.y) < 0.005;
}

function readPoints(expr: SExpr): Point[] {
  const pts = S.child(expr, "pts");
  if (!pts) return [];
  const points: Point[] = [];
  for (const xy of S.children(pts, "xy")) {
    const x = S.number(xy, 1);
    const y = S.number(xy, 2);
    if (x !== null && y !== null) points.push({ x, y });
  }
  return points;
}

export function scanLabels(root: SExpr[]): SchematicLabel[] {
  const labels: SchematicLabel[] = [];
  for (const kind of LABEL_KINDS) {
    for (const expr of S.children(root, kind)) {
      const text = S.atom(expr, 1);
      const position = readAt(expr);
      if (text === null || !position) continue;
      labels.push({ kind, text, at: position.at, angle: position.angle });
    }
  }
  return labels;
}

/**
 * Constructs outside the supported subset: hierarchical sheets (multi-page),
 * buses, junction dots where three or more wire ends meet (possible
 * multi-circuit splices) and mirrored symbols.
 */
export function scanUnsupported(root: SExpr[], instances: PlacedInstance[], wires: RawWire[] = []): UnsupportedFeature[] {
  const found: UnsupportedFeature[] = [];

  for (const sheet of S.children(root, "sheet")) {
    const name = S.property(sheet, "Sheetname") ?? S.property(sheet, "Sheet name");
    found.push({ kind: "sheet", at: readAt(sheet)?.at ?? null, detail: `hierarchical sheet ${name ?? "(unnamed)"} is not followed` });
  }
  for (const bus of S.children(root, "bus")) {
    found.push({ kind: "bus", at: readPoints(bus)[0] ?? null, detail: "bus wiring is ignored" });
  }
  for (const entry of S.children(root, "bus_entry")) {
    found.push({ kind: "bus_entry", at: readAt(entry)?.at ?? null, detail: "bus entry is ignored" });
  }
  for (const junction of S.children(root, "junction")) {
    const at = readAt(junction)?.at;
    if (!at) continue;
    const ends = wires.filter((w) => samePoint(w.a, at)).length + wires.filter((w) => samePoint(w.b, at)).length;
    if (ends < 3) continue;
    found.push({
      kind: "junction",
      at,
      detail: `${ends} wire ends meet here and are treated as one circuit`,
    });
  }
  for (const instance of instances) {
    if (instance.mirror) {
      found.push({ kind: "mirror", at: instance.at, detail: `${instance.refdes} is mirrored; pin positions ignore the mirror` });
    }
  }

  return found;
}
