import { describe, it, expect, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { DEFAULT_SETTINGS, loadSettings, parseSettings, pipelineOptions } from "../cli/config";
import { ConfigError } from "../errors";

describe("Settings", () => {
    let tmpDir: string | null = null;

    afterEach(() => {
        if (tmpDir) fs.rmSync(tmpDir, { recursive: true, force: true });
        tmpDir = null;
    });

    it("falls back to defaults for an empty document", () => {
        expect(parseSettings(null)).toEqual(DEFAULT_SETTINGS);
        expect(DEFAULT_SETTINGS.artifactId).toBe("net_overlay");
        expect(DEFAULT_SETTINGS.segmentSpacingInches).toBe(0.05);
    });

    it("overlays known keys on the defaults", () => {
        const settings = parseSettings({ artifactId: "blockdiagram-chmap-1", strokeWidthMm: 0.5, debugMarkers: true });
        expect(settings).toEqual({ ...DEFAULT_SETTINGS, artifactId: "blockdiagram-chmap-1", strokeWidthMm: 0.5, debugMarkers: true });
    });

    it("rejects unknown keys and bad values", () => {
        expect(() => parseSettings({ spacing: 1 })).toThrow('net-overlay.yml: unknown setting "spacing"');
        expect(() => parseSettings({ wireMaskWidthMm: -1 })).toThrow('"wireMaskWidthMm" must be a positive number');
        expect(() => parseSettings({ debugMarkers: "yes" })).toThrow(ConfigError);
        expect(() => parseSettings({ artifactId: "../escape" })).toThrow(ConfigError);
        expect(() => parseSettings([1, 2])).toThrow("expected a mapping of settings");
    });

    it("reads settings from YAML", () => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "net-overlay-"));
        const file = path.join(tmpDir, "net-overlay.yml");
        fs.writeFileSync(file, "segmentSpacingInches: 0.1\nlabelFontSizeMm: 0.3\n");
        const settings = loadSettings(file);
        expect(settings.segmentSpacingInches).toBe(0.1);
        expect(settings.labelFontSizeMm).toBe(0.3);

        const options = pipelineOptions(settings);
        expect(options.bundle).toEqual({ segmentSpacingInches: 0.1, drawScale: 25.4 });
        expect(options.overlay.labelFontSizeMm).toBe(0.3);
        expect(options.overlay.wireMaskColor).toBe("#F5F4EF");
    });

    it("reports YAML syntax errors as configuration errors", () => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "net-overlay-"));
        const file = path.join(tmpDir, "net-overlay.yml");
        fs.writeFileSync(file, "artifactId: [unclosed\n");
        expect(() => loadSettings(file)).toThrow(ConfigError);
    });
});
