#!/usr/bin/env node

/**
 * KiCad net overlay CLI
 */

import { cmdGraph } from "./commands/graph";
import { cmdOverlay } from "./commands/overlay";
import { getConfig } from "./config";
import { die } from "./utils";
import { ConfigError } from "../errors";

// Parse args for --root early to configure environment
for (let i = 0; i < process.argv.length; i++) {
  if (process.argv[i] === "--root" && process.argv[i + 1]) {
    process.env.NET_OVERLAY_ROOT = process.argv[i + 1];
    break;
  }
}

function printHelp(): void {
  console.log(`
KiCad net overlay CLI

Usage:
  net-overlay <command> [options]

Commands:
  graph [schematic] [--pdf]      Extract the connectivity graph as JSON with a debug view
  overlay [schematic] --connections <file> [--no-export]
                                 Draw the listed connections over the schematic render
  help                           Show this message

Options:
  --root <dir>                   Project root (default: current directory)
  --out <dir>                    Output directory (default: <root>/<artifactId>)

Schematic Selection:
  If no schematic is given, an interactive list of the .kicad_sch files
  in the project root is shown.

Examples:
  net-overlay graph my_board.kicad_sch --pdf
  net-overlay overlay my_board --connections channels.yml
  net-overlay overlay my_board --connections channels.yml --no-export
`);
}

/** Drops `--root <dir>`, which was consumed above. */
function stripRoot(args: string[]): string[] {
  const idx = args.indexOf("--root");
  return idx === -1 ? args : [...args.slice(0, idx), ...args.slice(idx + 2)];
}

async function main(): Promise<void> {
  const args = stripRoot(process.argv.slice(2));
  const command = args[0];
  const commandArgs = args.slice(1);

  if (command === "graph" || command === "overlay") {
    try {
      getConfig();
    } catch (err) {
      if (err instanceof ConfigError) die(err.message);
      throw err;
    }
  }

  switch (command) {
    case "graph":
      return cmdGraph(commandArgs);
    case "overlay":
      return cmdOverlay(commandArgs);
    case "--help":
    case "-h":
    case "help":
      printHelp();
      break;
    default:
      if (command) {
        console.error(`Unknown command: ${command}\n`);
      }
      printHelp();
      process.exit(command ? 1 : 0);
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
