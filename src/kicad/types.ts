/**
 * The one coordinate-bearing value type. Everything that carries a location
 * names its `Point` fields explicitly so unit transforms cannot miss one.
 */
export interface Point {
  x: number;
  y: number;
}

export interface PinTemplate {
  /** Offset from the symbol origin, before rotation. */
  at: Point;
  /** Unit the pin is drawn in; 0 means shared by every unit. */
  unit: number;
}

/** libId → pinName → template. */
export type PinTemplates = Map<string, Map<string, PinTemplate>>;

export interface PlacedInstance {
  refdes: string;
  /** Key into `lib_symbols`: the instance's `lib_name` if present, else its `lib_id`. */
  libId: string;
  at: Point;
  rotation: number;
  unit: number;
  mirror?: "x" | "y";
}

export interface RawWire {
  uuid: string;
  a: Point;
  b: Point;
}

export type LabelKind = "text" | "label" | "global_label" | "hierarchical_label";

export interface SchematicLabel {
  kind: LabelKind;
  text: string;
  at: Point;
  angle: number;
}

export type UnsupportedFeatureKind = "sheet" | "bus" | "bus_entry" | "junction" | "mirror";

/**
 * A construct the overlay deliberately does not model. It is surfaced to the
 * user and never turned into connectivity.
 */
export interface UnsupportedFeature {
  kind: UnsupportedFeatureKind;
  at: Point | null;
  detail: string;
}

export type Stage = "parse" | "compile" | "graph" | "resolve" | "bundle" | "chain" | "render";

export interface Diagnostic {
  stage: Stage;
  message: string;
}

export interface ParsedSchematic {
  pinTemplates: PinTemplates;
  instances: PlacedInstance[];
  wires: RawWire[];
  labels: SchematicLabel[];
  unsupported: UnsupportedFeature[];
  diagnostics: Diagnostic[];
}

/** refdes → pinName → absolute location. */
export type AbsolutePins = Map<string, Map<string, Point>>;

/**
 * Further locations of a shared pin (unit 0) drawn on more than one unit,
 * keyed by `refdes.pin`. They are the same electrical pin as the location in
 * `AbsolutePins`.
 */
export type PinCopies = Map<string, Point[]>;
