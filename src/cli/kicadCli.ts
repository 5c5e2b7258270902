import * as path from "path";
import * as fs from "fs";
import { execSync } from "child_process";
import { RenderOutputMissingError } from "../errors";

/**
 * Path kicad-cli writes the render of `schematicPath` to: one SVG per sheet,
 * named after the schematic file.
 */
export function renderedSvgPath(exportDir: string, schematicPath: string): string {
  return path.join(exportDir, `${path.basename(schematicPath, ".kicad_sch")}.svg`);
}

/**
 * Renders the schematic to SVG with `kicad-cli sch export svg`. A render left
 * by an earlier run is removed first, so only this run's output is returned.
 *
 * @returns path of the rendered root sheet
 * @throws RenderOutputMissingError when kicad-cli fails or produced no file for it
 */
export function exportSchematicSvg(kicadCliPath: string, schematicPath: string, exportDir: string): string {
  fs.mkdirSync(exportDir, { recursive: true });
  const svgPath = renderedSvgPath(exportDir, schematicPath);
  fs.rmSync(svgPath, { force: true });

  try {
    execSync(`"${kicadCliPath}" sch export svg --output "${exportDir}" "${schematicPath}"`, { stdio: "pipe" });
  } catch (err) {
    const stderr = err instanceof Error && "stderr" in err && err.stderr ? String(err.stderr).trim() : "";
    console.error(`  ❌ kicad-cli export failed${stderr ? `:\n${stderr}` : "."}`);
    throw new RenderOutputMissingError(svgPath);
  }

  if (!fs.existsSync(svgPath)) {
    throw new RenderOutputMissingError(svgPath);
  }
  return svgPath;
}
