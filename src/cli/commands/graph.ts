import * as path from "path";
import * as fs from "fs";
import { getConfig } from "../config";
import { die, positionals, printDiagnostics, readOption, resolveSchematic, writeJson } from "../utils";
import { loadSchematic } from "../../kicad/SchematicParser";
import { Extraction, extractGraph } from "../../pipeline/NetOverlayPipeline";
import { layoutGraphSheet } from "../../overlay/debug/GraphSheet";
import { writeDebugPng } from "../../overlay/debug/DebugPng";
import { writeGraphPdf } from "../../overlay/debug/GraphSheetPdf";
import { SchematicNotFoundError } from "../../errors";

export function outputDirFor(args: string[]): string {
  const { projectRoot, settings } = getConfig();
  const out = readOption(args, "--out");
  return out ? path.resolve(projectRoot, out) : path.join(projectRoot, settings.artifactId);
}

export function extractOrDie(schematicPath: string): Extraction {
  try {
    return extractGraph(loadSchematic(schematicPath));
  } catch (err) {
    if (err instanceof SchematicNotFoundError) die(err.message);
    throw err;
  }
}

/**
 * graph: Extract the connectivity graph of a schematic and write it as JSON,
 * together with a raster debug view (and optionally a PDF sheet).
 */
export async function cmdGraph(args: string[]): Promise<void> {
  const { settings } = getConfig();
  const [entry] = positionals(args, ["--out"]);
  const schematicPath = await resolveSchematic(entry);
  const outDir = outputDirFor(args);
  const id = settings.artifactId;

  console.log(`\n🔍  Extracting graph from ${path.basename(schematicPath)}...`);

  const extraction = extractOrDie(schematicPath);
  printDiagnostics(extraction.diagnostics);

  const { graph } = extraction;
  console.log(`  → ${graph.nodes.size} nodes (${graph.pinNodeCount} pins, ${graph.junctionNodeCount} junctions), ${graph.segments.size} segments`);

  fs.mkdirSync(outDir, { recursive: true });

  const graphPath = path.join(outDir, `${id}-graph.json`);
  writeJson(graphPath, graph.toJSON());
  console.log(`  → Graph: ${graphPath}`);

  const sheet = layoutGraphSheet(graph, extraction.labels);
  const pngPath = path.join(outDir, `${id}-schematic-visualization.png`);
  await writeDebugPng(sheet, pngPath, settings.debugDpi);
  console.log(`  → Debug view: ${pngPath}`);

  if (args.includes("--pdf")) {
    const pdfPath = path.join(outDir, `${id}-schematic-visualization.pdf`);
    await writeGraphPdf(sheet, pdfPath, `${path.basename(schematicPath)} graph`);
    console.log(`  → Debug sheet: ${pdfPath}`);
  }

  console.log(`\n✨  Graph extraction complete!\n`);
}
