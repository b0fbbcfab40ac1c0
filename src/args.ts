/**
 * Command-line argument parsing.
 */

import { DEFAULT_OUTPUT_DIR } from "./engine/runner.ts";
import { DEFAULT_CONFIGMAP } from "./output/serialize.ts";

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface ParsedArgs {
  command: string;
  opts: {
    outputDir: string;
    seed: number | undefined;
    configMapName: string;
    namespace: string;
    plots: boolean;
    json: boolean;
    verbose: boolean;
    help: boolean;
  };
  positionalArgs: string[];
}

function parseSeed(raw: string | undefined): number {
  if (raw === undefined || !/^-?\d+$/.test(raw)) {
    throw new UsageError(`--seed expects an integer, got "${raw ?? ""}"`);
  }
  const seed = Number(raw);
  // the generator keeps a signed 32-bit state
  if ((seed | 0) !== seed) {
    throw new UsageError(
      `--seed out of range: ${raw} (expected ${-(2 ** 31)}..${2 ** 31 - 1})`,
    );
  }
  return seed;
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value === "") {
    throw new UsageError(`${flag} requires a value`);
  }
  return value;
}

export function parseArgs(args: string[]): ParsedArgs {
  const command = args[0] ?? "";
  let outputDir = DEFAULT_OUTPUT_DIR;
  let seed: number | undefined;
  let configMapName = DEFAULT_CONFIGMAP.name;
  let namespace = DEFAULT_CONFIGMAP.namespace;
  let plots = true;
  let json = false;
  let verbose = false;
  let help = false;
  const positionalArgs: string[] = [];

  let i = 1;
  while (i < args.length) {
    const arg = args[i];
    switch (arg) {
      case "--output-dir":
      case "-o":
        outputDir = requireValue(arg, args[++i]);
        break;
      case "--seed":
        seed = parseSeed(args[++i]);
        break;
      case "--configmap-name":
        configMapName = requireValue(arg, args[++i]);
        break;
      case "--namespace":
        namespace = requireValue(arg, args[++i]);
        break;
      case "--no-plots":
        plots = false;
        break;
      case "--json":
        json = true;
        break;
      case "--verbose":
      case "-v":
        verbose = true;
        break;
      case "--help":
      case "-h":
        help = true;
        break;
      default: {
        if (arg.startsWith("-")) {
          throw new UsageError(`Unknown option: ${arg}`);
        }
        positionalArgs.push(arg);
      }
    }
    i++;
  }

  return {
    command,
    positionalArgs,
    opts: {
      outputDir,
      seed,
      configMapName,
      namespace,
      plots,
      json,
      verbose,
      help,
    },
  };
}
