import { AbsolutePins, Diagnostic, PinCopies, PinTemplates, PlacedInstance, Point, RawWire } from "./types";

/** KiCad v6+ schematics are in millimetres; the graph works in inches. */
export const KICAD_UNIT_SCALE = 1 / 25.4;

/** Decimal places kept after unit conversion. */
export const OUTPUT_PRECISION = 5;

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  const rounded = Math.round(value * factor) / factor;
  // Avoid -0 leaking into serialized output
  return rounded === 0 ? 0 : rounded;
}

export function rotatePoint(p: Point, angleDegrees: number): Point {
  const rad = (angleDegrees * Math.PI) / 180;
  const cos = Math.cos(rad);
  const sin = Math.sin(rad);
  return {
    x: p.x * cos - p.y * sin,
    y: p.x * sin + p.y * cos,
  };
}

/**
 * Absolute position of every pin of every placed symbol, in document units.
 *
 * The pin offset is rotated first and the vertical axis is flipped only when
 * translating by the instance origin: symbol definitions use Y-up while
 * placements use Y-down.
 *
 * A shared pin drawn on several units of one part keeps the location of the
 * first unit placed; the locations on later units go to `copies`.
 */
export function compilePinLocations(
  templates: PinTemplates,
  instances: PlacedInstance[],
  diagnostics: Diagnostic[] = [],
  copies: PinCopies = new Map()
): AbsolutePins {
  const pins: AbsolutePins = new Map();

  for (const instance of instances) {
    const symbolPins = templates.get(instance.libId);
    if (!symbolPins) {
      diagnostics.push({
        stage: "compile",
        message: `No pin data found for lib_id "${instance.libId}" (used by ${instance.refdes})`,
      });
      continue;
    }

    // Units of a multi-unit part share a refdes; their pins merge into one map.
    const target = pins.get(instance.refdes) ?? new Map<string, Point>();
    pins.set(instance.refdes, target);

    for (const [name, template] of symbolPins) {
      if (template.unit !== 0 && template.unit !== instance.unit) continue;

      const rotated = rotatePoint(template.at, instance.rotation);
      const location = { x: instance.at.x + rotated.x, y: instance.at.y - rotated.y };

      const placed = target.get(name);
      if (!placed) {
        target.set(name, location);
        continue;
      }
      if (samePoint(placed, location)) continue;

      const id = `${instance.refdes}.${name}`;
      const known = copies.get(id) ?? [];
      if (known.some((p) => samePoint(p, location))) continue;
      known.push(location);
      copies.set(id, known);
      diagnostics.push({
        stage: "compile",
        message:
          `Pin ${id} is drawn on more than one unit; wires at (${fmtMm(location.x)}, ${fmtMm(location.y)}) ` +
          `join it at (${fmtMm(placed.x)}, ${fmtMm(placed.y)})`,
      });
    }
  }

  return pins;
}

function samePoint(p: Point, q: Point): boolean {
  return Math.abs(p.x - q.x) < 1e-6 && Math.abs(p.y - q.y) < 1e-6;
}

function fmtMm(value: number): string {
  return String(roundTo(value, 4));
}

/**
 * Snap to 0.1 document units, convert, then round away conversion noise.
 */
export function normalizeCoordinate(value: number, scaleFactor: number = KICAD_UNIT_SCALE): number {
  const snapped = Math.round(value * 10) / 10;
  return roundTo(snapped * scaleFactor, OUTPUT_PRECISION);
}

export function normalizePoint(p: Point, scaleFactor: number = KICAD_UNIT_SCALE): Point {
  return {
    x: normalizeCoordinate(p.x, scaleFactor),
    y: normalizeCoordinate(p.y, scaleFactor),
  };
}

export function normalizeWire(wire: RawWire, scaleFactor: number = KICAD_UNIT_SCALE): RawWire {
  return {
    uuid: wire.uuid,
    a: normalizePoint(wire.a, scaleFactor),
    b: normalizePoint(wire.b, scaleFactor),
  };
}

export function normalizeWires(wires: RawWire[], scaleFactor: number = KICAD_UNIT_SCALE): RawWire[] {
  return wires.map((w) => normalizeWire(w, scaleFactor));
}

export function normalizePins(pins: AbsolutePins, scaleFactor: number = KICAD_UNIT_SCALE): AbsolutePins {
  const out: AbsolutePins = new Map();
  for (const [refdes, byName] of pins) {
    const scaled = new Map<string, Point>();
    for (const [name, p] of byName) {
      scaled.set(name, normalizePoint(p, scaleFactor));
    }
    out.set(refdes, scaled);
  }
  return out;
}

export function normalizePinCopies(copies: PinCopies, scaleFactor: number = KICAD_UNIT_SCALE): PinCopies {
  const out: PinCopies = new Map();
  for (const [id, points] of copies) {
    out.set(id, points.map((p) => normalizePoint(p, scaleFactor)));
  }
  return out;
}
