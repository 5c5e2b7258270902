import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { resetConfig } from "../cli/config";
import { positionals, readOption, resolveSchematic } from "../cli/utils";
import { exportSchematicSvg } from "../cli/kicadCli";
import { cmdGraph } from "../cli/commands/graph";
import { cmdOverlay } from "../cli/commands/overlay";
import { RenderOutputMissingError } from "../errors";
import type { SerializedGraph } from "../graph/ConnectivityGraph";
import type { PathReportEntry } from "../pipeline/NetOverlayPipeline";

const ASSETS = path.join(__dirname, "assets");

const RENDER =
    '<svg xmlns="http://www.w3.org/2000/svg" width="297mm" height="210mm" viewBox="0 0 297 210">\n</svg>\n';

// Stand-in for kicad-cli: `sch export svg --output <dir> <schematic>`
const GOOD_CLI = `#!/bin/sh
name=$(basename "$6" .kicad_sch)
printf '%s\\n' '${RENDER.split("\n")[0]}' '</svg>' > "$5/$name.svg"
`;
const UNCLOSED_CLI = `#!/bin/sh
name=$(basename "$6" .kicad_sch)
printf '%s\\n' '${RENDER.split("\n")[0]}' > "$5/$name.svg"
`;
const FAILING_CLI = `#!/bin/sh
echo "export failed" >&2
exit 3
`;

class ProcessExit extends Error {
    constructor(readonly code: unknown) {
        super(`process.exit(${String(code)})`);
    }
}

describe("CLI", () => {
    const savedEnv = { root: process.env.NET_OVERLAY_ROOT, cli: process.env.KICAD_CLI };
    let root = "";

    function writeCli(name: string, script: string): string {
        const file = path.join(root, name);
        fs.writeFileSync(file, script);
        fs.chmodSync(file, 0o755);
        return file;
    }

    function useCli(script: string): void {
        process.env.KICAD_CLI = writeCli("kicad-cli-stub.sh", script);
        resetConfig();
    }

    function outFile(...parts: string[]): string {
        return path.join(root, "net_overlay", ...parts);
    }

    beforeEach(() => {
        root = fs.mkdtempSync(path.join(os.tmpdir(), "net-overlay-cli-"));
        fs.copyFileSync(path.join(ASSETS, "two_connectors.kicad_sch"), path.join(root, "two_connectors.kicad_sch"));
        fs.copyFileSync(path.join(ASSETS, "connections.yml"), path.join(root, "connections.yml"));
        fs.writeFileSync(path.join(root, "_autosave-two_connectors.kicad_sch"), "");
        fs.writeFileSync(path.join(root, "net-overlay.yml"), "debugDpi: 30\n");

        process.env.NET_OVERLAY_ROOT = root;
        useCli(GOOD_CLI);

        vi.spyOn(console, "log").mockImplementation(() => {});
        vi.spyOn(console, "warn").mockImplementation(() => {});
        vi.spyOn(console, "error").mockImplementation(() => {});
        vi.spyOn(process, "exit").mockImplementation((code) => {
            throw new ProcessExit(code);
        });
    });

    afterEach(() => {
        vi.restoreAllMocks();
        fs.rmSync(root, { recursive: true, force: true });
        if (savedEnv.root === undefined) delete process.env.NET_OVERLAY_ROOT;
        else process.env.NET_OVERLAY_ROOT = savedEnv.root;
        if (savedEnv.cli === undefined) delete process.env.KICAD_CLI;
        else process.env.KICAD_CLI = savedEnv.cli;
        resetConfig();
    });

    describe("arguments", () => {
        it("separates positionals from options and their values", () => {
            const args = ["board", "--connections", "list.yml", "--no-export", "--out", "build"];
            expect(positionals(args, ["--connections", "--out"])).toEqual(["board"]);
            expect(readOption(args, "--connections")).toBe("list.yml");
            expect(readOption(args, "--out")).toBe("build");
            expect(readOption(args, "--pdf")).toBeNull();
        });

        it("exits when an option has no value", () => {
            expect(() => readOption(["--out", "--pdf"], "--out")).toThrow(ProcessExit);
            expect(process.exit).toHaveBeenCalledWith(1);
        });
    });

    describe("schematic selection", () => {
        it("picks the only schematic in the root, ignoring autosaves", async () => {
            expect(await resolveSchematic()).toBe(path.join(root, "two_connectors.kicad_sch"));
        });

        it("adds the extension to a named schematic", async () => {
            expect(await resolveSchematic("two_connectors")).toBe(path.join(root, "two_connectors.kicad_sch"));
        });

        it("exits when the root has no schematics", async () => {
            fs.rmSync(path.join(root, "two_connectors.kicad_sch"));
            await expect(resolveSchematic()).rejects.toMatchObject({ code: 1 });
        });
    });

    describe("kicad-cli export", () => {
        it("returns the fresh render", () => {
            const exportDir = path.join(root, "export");
            const svgPath = exportSchematicSvg(process.env.KICAD_CLI ?? "", path.join(root, "two_connectors.kicad_sch"), exportDir);
            expect(svgPath).toBe(path.join(exportDir, "two_connectors.svg"));
            expect(fs.readFileSync(svgPath, "utf-8")).toBe(RENDER);
        });

        it("fails instead of reusing an earlier render when kicad-cli fails", () => {
            const exportDir = path.join(root, "export");
            const stale = path.join(exportDir, "two_connectors.svg");
            fs.mkdirSync(exportDir, { recursive: true });
            fs.writeFileSync(stale, "<svg>STALE</svg>");

            const failing = writeCli("failing-cli.sh", FAILING_CLI);
            expect(() => exportSchematicSvg(failing, path.join(root, "two_connectors.kicad_sch"), exportDir)).toThrow(
                RenderOutputMissingError
            );
            expect(fs.existsSync(stale)).toBe(false);
            expect(console.error).toHaveBeenCalledWith("  ❌ kicad-cli export failed:\nexport failed");
        });
    });

    describe("graph", () => {
        it("writes the graph and its debug view under the artifact directory", async () => {
            await cmdGraph(["two_connectors.kicad_sch"]);

            const graph: SerializedGraph = JSON.parse(fs.readFileSync(outFile("net_overlay-graph.json"), "utf-8"));
            expect(Object.keys(graph.nodes)).toEqual(["A.out1", "A.out2", "B.in1", "B.2", "wirejunction-0"]);
            expect(Object.keys(graph.segments)).toEqual(["w-top", "w-bottom-1", "w-bottom-2"]);
            expect(fs.readFileSync(outFile("net_overlay-schematic-visualization.png")).subarray(1, 4).toString("latin1")).toBe(
                "PNG"
            );
            expect(fs.existsSync(outFile("net_overlay-schematic-visualization.pdf"))).toBe(false);
        });

        it("honours --out and --pdf", async () => {
            await cmdGraph(["two_connectors", "--out", "build", "--pdf"]);
            const pdf = path.join(root, "build", "net_overlay-schematic-visualization.pdf");
            expect(fs.readFileSync(pdf).subarray(0, 5).toString("latin1")).toBe("%PDF-");
        });
    });

    describe("overlay", () => {
        it("composites the connections onto the render", async () => {
            await cmdOverlay(["two_connectors", "--connections", "connections.yml"]);

            expect(process.exit).not.toHaveBeenCalled();
            const composed = fs.readFileSync(outFile("net_overlay-kicad-direct-export", "two_connectors.svg"), "utf-8");
            expect(composed.startsWith(RENDER.split("\n")[0])).toBe(true);
            expect(composed).toContain('<g id="ch1">');
            expect(composed).toContain('<g id="ch2">');
            expect(fs.existsSync(outFile("overlay_svgs", "net_overlay-net-overlay.svg"))).toBe(true);

            const report: PathReportEntry[] = JSON.parse(fs.readFileSync(outFile("net_overlay-paths.json"), "utf-8"));
            expect(report.map((r) => r.status)).toEqual(["ok", "ok"]);
        });

        it("writes the run and exits 1 when a connection cannot be drawn", async () => {
            fs.writeFileSync(
                path.join(root, "bad.yml"),
                [
                    "connections:",
                    "  - name: good",
                    "    from: { refdes: A, connector: out1 }",
                    "    to: { refdes: B, connector: in1 }",
                    "  - name: bad",
                    "    from: { refdes: A, connector: out1 }",
                    '    to: { refdes: B, connector: "9" }',
                    "",
                ].join("\n")
            );

            await expect(cmdOverlay(["two_connectors", "--connections", "bad.yml"])).rejects.toMatchObject({ code: 1 });

            const report: PathReportEntry[] = JSON.parse(fs.readFileSync(outFile("net_overlay-paths.json"), "utf-8"));
            expect(report[1]).toEqual({
                connection: "bad",
                from: "A.out1",
                to: "B.9",
                status: "error",
                error: "MISSING_ENDPOINT: bad: to node 'B.9' not found in graph",
            });
        });

        it("writes nothing when the render cannot be composed", async () => {
            useCli(UNCLOSED_CLI);

            await expect(cmdOverlay(["two_connectors", "--connections", "connections.yml"])).rejects.toMatchObject({ code: 1 });

            expect(console.error).toHaveBeenCalledWith("❌  Could not compose overlay: Could not find closing </svg> tag");
            expect(fs.existsSync(outFile("overlay_svgs"))).toBe(false);
            expect(fs.existsSync(outFile("net_overlay-graph.json"))).toBe(false);
            expect(fs.existsSync(outFile("net_overlay-paths.json"))).toBe(false);
        });

        it("exits when kicad-cli fails", async () => {
            useCli(FAILING_CLI);

            await expect(cmdOverlay(["two_connectors", "--connections", "connections.yml"])).rejects.toMatchObject({ code: 1 });
            expect(fs.existsSync(outFile("net_overlay-paths.json"))).toBe(false);
        });

        it("needs an existing render with --no-export", async () => {
            await expect(cmdOverlay(["two_connectors", "--connections", "connections.yml", "--no-export"])).rejects.toMatchObject({
                code: 1,
            });
            expect(fs.existsSync(outFile("overlay_svgs"))).toBe(false);
        });

        it("requires --connections", async () => {
            await expect(cmdOverlay(["two_connectors"])).rejects.toMatchObject({ code: 1 });
            expect(console.error).toHaveBeenCalledWith("❌  Missing --connections <file>.");
        });
    });
});
