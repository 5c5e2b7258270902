import * as path from "path";
import * as fs from "fs";
import { getConfig, pipelineOptions } from "../config";
import { die, positionals, printDiagnostics, readOption, resolveSchematic, writeJson } from "../utils";
import { exportSchematicSvg, renderedSvgPath } from "../kicadCli";
import { extractOrDie, outputDirFor } from "./graph";
import { loadConnections } from "../../connections/ConnectionList";
import { pathReport, runOverlay } from "../../pipeline/NetOverlayPipeline";
import { buildOverlayDocument, composeOverlay, extractSvgFrame } from "../../overlay/SvgDocument";
import { layoutGraphSheet } from "../../overlay/debug/GraphSheet";
import { writeDebugPng } from "../../overlay/debug/DebugPng";
import { RequestedConnection } from "../../connections/types";
import { ConnectionListError, FrameMismatchError, RenderOutputMissingError } from "../../errors";

function loadConnectionsOrDie(filePath: string): RequestedConnection[] {
  try {
    return loadConnections(filePath);
  } catch (err) {
    if (err instanceof ConnectionListError) die(err.message);
    throw err;
  }
}

function baseRenderOrDie(reuse: boolean, kicadCliPath: string, schematicPath: string, exportDir: string): string {
  try {
    if (reuse) {
      const existing = renderedSvgPath(exportDir, schematicPath);
      if (!fs.existsSync(existing)) throw new RenderOutputMissingError(existing);
      return existing;
    }
    console.log(`  → Rendering schematic with kicad-cli...`);
    return exportSchematicSvg(kicadCliPath, schematicPath, exportDir);
  } catch (err) {
    if (err instanceof RenderOutputMissingError) die(err.message);
    throw err;
  }
}

function composeOrDie(baseSvg: string, overlaySvg: string, groupPrefix: string): string {
  try {
    return composeOverlay(baseSvg, overlaySvg, groupPrefix);
  } catch (err) {
    if (err instanceof FrameMismatchError) die(err.message);
    if (err instanceof Error) die(`Could not compose overlay: ${err.message}`);
    throw err;
  }
}

/**
 * overlay: Route the requested connections through the schematic and draw
 * them on top of its kicad-cli SVG render.
 */
export async function cmdOverlay(args: string[]): Promise<void> {
  const { kicadCliPath, settings } = getConfig();
  const id = settings.artifactId;
  const groupPrefix = `${id}-net-overlay`;

  const connectionsFile = readOption(args, "--connections");
  if (!connectionsFile) {
    die("Missing --connections <file>.");
  }

  const [entry] = positionals(args, ["--connections", "--out"]);
  const schematicPath = await resolveSchematic(entry);
  const outDir = outputDirFor(args);
  const exportDir = path.join(outDir, `${id}-kicad-direct-export`);

  console.log(`\n🧵  Drawing net overlay for ${path.basename(schematicPath)}...`);

  const extraction = extractOrDie(schematicPath);

  const connections = loadConnectionsOrDie(path.resolve(getConfig().projectRoot, connectionsFile));
  console.log(`  → ${connections.length} connection(s) requested`);

  const run = runOverlay(extraction, connections, pipelineOptions(settings));
  printDiagnostics([...extraction.diagnostics, ...run.diagnostics]);

  const baseSvgPath = baseRenderOrDie(args.includes("--no-export"), kicadCliPath, schematicPath, exportDir);
  const baseSvg = fs.readFileSync(baseSvgPath, "utf-8");
  const overlaySvg = buildOverlayDocument(run.groups, extractSvgFrame(baseSvg), groupPrefix);
  const composed = composeOrDie(baseSvg, overlaySvg, groupPrefix);

  // Composition succeeded; write everything.
  const overlayPath = path.join(outDir, "overlay_svgs", `${groupPrefix}.svg`);
  fs.mkdirSync(path.dirname(overlayPath), { recursive: true });
  fs.writeFileSync(overlayPath, overlaySvg, "utf-8");
  fs.writeFileSync(baseSvgPath, composed, "utf-8");
  writeJson(path.join(outDir, `${id}-graph.json`), extraction.graph.toJSON());
  writeJson(path.join(outDir, `${id}-paths.json`), pathReport(run));
  await writeDebugPng(
    layoutGraphSheet(extraction.graph, extraction.labels),
    path.join(outDir, `${id}-schematic-visualization.png`),
    settings.debugDpi
  );

  console.log(`  → Overlay: ${overlayPath}`);
  console.log(`  → Composited render: ${baseSvgPath}`);

  for (const outcome of run.outcomes) {
    if (outcome.error) {
      console.error(`  ❌ ${outcome.error.message}`);
    } else {
      console.log(`    ✅ ${outcome.connection.name}: ${outcome.path ? outcome.path.steps.length : 0} segment(s)`);
    }
  }

  if (!run.success) {
    console.log(`\n❌  ${run.errors.length} connection(s) could not be drawn.\n`);
    process.exit(1);
  }
  console.log(`\n✨  Net overlay complete!\n`);
}
