import * as path from "path";
import * as fs from "fs";
import * as yaml from "js-yaml";
import { ConfigError } from "../errors";
import { DEFAULT_BUNDLE_OPTIONS } from "../overlay/BundleGeometry";
import { DEFAULT_OVERLAY_OPTIONS } from "../overlay/SvgOverlay";
import { PipelineOptions } from "../pipeline/NetOverlayPipeline";

export const SETTINGS_FILE = "net-overlay.yml";

const MAC_KICAD_CLI = "/Applications/KiCad/KiCad.app/Contents/MacOS/kicad-cli";

export interface OverlaySettings {
  /** Prefix of output file names and of the injected SVG group ids. */
  artifactId: string;
  segmentSpacingInches: number;
  minSegmentLengthForLabelMm: number;
  wireMaskWidthMm: number;
  strokeWidthMm: number;
  labelFontSizeMm: number;
  debugMarkers: boolean;
  debugDpi: number;
}

export const DEFAULT_SETTINGS: OverlaySettings = {
  artifactId: "net_overlay",
  segmentSpacingInches: DEFAULT_BUNDLE_OPTIONS.segmentSpacingInches,
  minSegmentLengthForLabelMm: DEFAULT_OVERLAY_OPTIONS.minSegmentLengthForLabelMm,
  wireMaskWidthMm: DEFAULT_OVERLAY_OPTIONS.wireMaskWidthMm,
  strokeWidthMm: DEFAULT_OVERLAY_OPTIONS.strokeWidthMm,
  labelFontSizeMm: DEFAULT_OVERLAY_OPTIONS.labelFontSizeMm,
  debugMarkers: false,
  debugDpi: 300,
};

export interface Config {
  projectRoot: string;
  kicadCliPath: string;
  settingsFile: string | null;
  settings: OverlaySettings;
}

let configCache: Config | null = null;

export function getConfig(): Config {
  if (configCache) return configCache;

  const cwd = process.env.INIT_CWD || process.cwd();

  // 1. Env var (set by --root), 2. cwd
  const projectRoot = process.env.NET_OVERLAY_ROOT ? path.resolve(cwd, process.env.NET_OVERLAY_ROOT) : cwd;

  let kicadCliPath = "kicad-cli";
  if (process.env.KICAD_CLI) {
    kicadCliPath = process.env.KICAD_CLI;
  } else if (fs.existsSync(MAC_KICAD_CLI)) {
    kicadCliPath = MAC_KICAD_CLI;
  }

  const candidate = path.join(projectRoot, SETTINGS_FILE);
  const settingsFile = fs.existsSync(candidate) ? candidate : null;

  configCache = {
    projectRoot,
    kicadCliPath,
    settingsFile,
    settings: settingsFile ? loadSettings(settingsFile) : { ...DEFAULT_SETTINGS },
  };

  return configCache;
}

/** Forgets the cached config; the next `getConfig()` reads the environment again. */
export function resetConfig(): void {
  configCache = null;
}

export function loadSettings(filePath: string): OverlaySettings {
  let doc: unknown;
  try {
    doc = yaml.load(fs.readFileSync(filePath, "utf-8"));
  } catch (e) {
    throw new ConfigError(filePath, `could not be parsed: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseSettings(doc, filePath);
}

/**
 * Overlays known keys of a settings document on the defaults. Unknown keys
 * are rejected so typos do not pass silently.
 */
export function parseSettings(doc: unknown, source = SETTINGS_FILE): OverlaySettings {
  const settings: OverlaySettings = { ...DEFAULT_SETTINGS };
  if (doc === undefined || doc === null) return settings;
  if (typeof doc !== "object" || Array.isArray(doc)) {
    throw new ConfigError(source, "expected a mapping of settings");
  }

  for (const [key, value] of Object.entries(doc)) {
    switch (key) {
      case "artifactId":
        if (typeof value !== "string" || !/^[\w.-]+$/.test(value)) {
          throw new ConfigError(source, `"artifactId" must be a non-empty name of letters, digits, "_", "-" or "."`);
        }
        settings.artifactId = value;
        break;
      case "debugMarkers":
        if (typeof value !== "boolean") throw new ConfigError(source, `"debugMarkers" must be true or false`);
        settings.debugMarkers = value;
        break;
      case "segmentSpacingInches":
      case "minSegmentLengthForLabelMm":
      case "wireMaskWidthMm":
      case "strokeWidthMm":
      case "labelFontSizeMm":
      case "debugDpi":
        if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
          throw new ConfigError(source, `"${key}" must be a positive number`);
        }
        settings[key] = value;
        break;
      default:
        throw new ConfigError(source, `unknown setting "${key}"`);
    }
  }

  return settings;
}

export function pipelineOptions(settings: OverlaySettings): PipelineOptions {
  return {
    bundle: { ...DEFAULT_BUNDLE_OPTIONS, segmentSpacingInches: settings.segmentSpacingInches },
    overlay: {
      ...DEFAULT_OVERLAY_OPTIONS,
      minSegmentLengthForLabelMm: settings.minSegmentLengthForLabelMm,
      wireMaskWidthMm: settings.wireMaskWidthMm,
      strokeWidthMm: settings.strokeWidthMm,
      labelFontSizeMm: settings.labelFontSizeMm,
      debugMarkers: settings.debugMarkers,
    },
  };
}
