/**
 * Fatal errors abort the whole run. `ConnectionError` only fails the
 * connection it names; the run carries on with the others.
 */

export class SchematicNotFoundError extends Error {
  constructor(public filePath: string) {
    super(`Schematic not found. Check that a .kicad_sch exists at: ${filePath}`);
    this.name = "SchematicNotFoundError";
  }
}

export class RenderOutputMissingError extends Error {
  constructor(public filePath: string) {
    super(`Expected schematic SVG export at ${filePath}, but it does not exist`);
    this.name = "RenderOutputMissingError";
  }
}

export interface SvgFrame {
  viewBox: string | null;
  width: string | null;
  height: string | null;
}

export class FrameMismatchError extends Error {
  constructor(public base: SvgFrame, public overlay: SvgFrame) {
    super(
      `Overlay coordinate frame (viewBox=${overlay.viewBox}, width=${overlay.width}, height=${overlay.height}) ` +
        `does not match the schematic render (viewBox=${base.viewBox}, width=${base.width}, height=${base.height})`
    );
    this.name = "FrameMismatchError";
  }
}

export class ConfigError extends Error {
  constructor(public source: string, message: string) {
    super(`${source}: ${message}`);
    this.name = "ConfigError";
  }
}

export class ConnectionListError extends Error {
  constructor(public source: string, message: string) {
    super(`${source}: ${message}`);
    this.name = "ConnectionListError";
  }
}

export type ConnectionErrorCode = "MISSING_ENDPOINT" | "NO_PATH" | "MISSING_BUNDLE_POINT";

export class ConnectionError extends Error {
  constructor(
    public code: ConnectionErrorCode,
    public connectionName: string,
    detail: string
  ) {
    super(`${code}: ${connectionName}: ${detail}`);
    this.name = "ConnectionError";
  }
}
