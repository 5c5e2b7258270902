import * as fs from "fs";
import * as path from "path";
import * as readline from "readline";
import { getConfig } from "./config";
import { Diagnostic } from "../kicad/types";

export function die(msg: string): never {
  console.error(`❌  ${msg}`);
  process.exit(1);
}

export function prompt(question: string): Promise<string> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

/**
 * Value following `--name` in an argument list, or null.
 */
export function readOption(args: string[], name: string): string | null {
  const idx = args.indexOf(name);
  if (idx === -1) return null;
  const value = args[idx + 1];
  if (value === undefined || value.startsWith("--")) {
    die(`Option ${name} expects a value.`);
  }
  return value;
}

/**
 * Positional arguments, skipping flags and the values of the named options.
 */
export function positionals(args: string[], optionsWithValues: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (optionsWithValues.includes(args[i])) {
      i++;
    } else if (!args[i].startsWith("--")) {
      out.push(args[i]);
    }
  }
  return out;
}

/**
 * `.kicad_sch` files directly in the project root, autosaves excluded.
 */
export function listSchematics(): string[] {
  const { projectRoot } = getConfig();
  if (!fs.existsSync(projectRoot)) {
    return [];
  }
  return fs
    .readdirSync(projectRoot)
    .filter((f) => f.endsWith(".kicad_sch") && !f.startsWith("_autosave"))
    .sort();
}

/**
 * Resolve a schematic entry: either a path (extension optional) or an
 * interactive selection. A named file that does not exist is returned as is;
 * loading it reports the missing document.
 */
export async function resolveSchematic(entry?: string): Promise<string> {
  const { projectRoot } = getConfig();

  if (entry) {
    const resolved = path.resolve(projectRoot, entry);
    if (!fs.existsSync(resolved) && fs.existsSync(`${resolved}.kicad_sch`)) {
      return `${resolved}.kicad_sch`;
    }
    return resolved;
  }

  const schematics = listSchematics();
  if (schematics.length === 0) {
    die(`No .kicad_sch files found in ${projectRoot}.`);
  }
  if (schematics.length === 1) {
    return path.join(projectRoot, schematics[0]);
  }

  console.log("\n✨  Available Schematics\n" + "─".repeat(30));
  schematics.forEach((name, i) => {
    console.log(`  ${i + 1}. ${name}`);
  });
  console.log("─".repeat(30));

  const selection = await prompt(`Select a schematic (1-${schematics.length}): `);
  const idx = parseInt(selection, 10) - 1;
  if (isNaN(idx) || idx < 0 || idx >= schematics.length) {
    die("Invalid selection.");
  }

  return path.join(projectRoot, schematics[idx]);
}

export function printDiagnostics(diagnostics: Diagnostic[]): void {
  for (const d of diagnostics) {
    console.warn(`  ⚠️  [${d.stage}] ${d.message}`);
  }
}

export function writeJson(filePath: string, value: unknown): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(value, null, 2) + "\n", "utf-8");
}
