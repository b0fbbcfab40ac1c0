/**
 * scenario-gen — synthetic load schedules for load-testing demo services.
 */

import { parseArgs, UsageError } from "./args.ts";
import { generateCommand } from "./commands/generate.ts";
import { presetsCommand } from "./commands/presets.ts";

function usage(): void {
  console.log(`
scenario-gen - Synthetic concurrent-user schedules for load tests

USAGE:
  scenario-gen generate <preset> [options]
  scenario-gen presets [--json]

COMMANDS:
  generate          Generate a preset and write <preset>.json, <preset>.yaml
                    and a diagnostic chart
  presets           List built-in presets

GENERATE OPTIONS:
  -o, --output-dir  Output directory (default: output)
  --seed            PRNG seed for reproducibility
  --configmap-name  ConfigMap metadata.name (default: test-scenario)
  --namespace       ConfigMap metadata.namespace (default: microservices-demo)
  --no-plots        Skip the HTML chart
  --json            Output a JSON summary to stdout
  -v, --verbose     Log generation details to stderr

EXAMPLES:
  scenario-gen presets
  scenario-gen generate 7days --seed 42
  scenario-gen generate 1h_spike -o out --namespace loadtest --no-plots
`);
}

async function main(): Promise<number> {
  const raw = process.argv.slice(2);

  if (raw.length === 0 || raw[0] === "--help" || raw[0] === "-h") {
    usage();
    return 0;
  }

  const parsed = parseArgs(raw);
  if (parsed.opts.help) {
    usage();
    return 0;
  }

  switch (parsed.command) {
    case "presets":
    case "list":
      return presetsCommand(parsed.opts.json);

    case "generate": {
      const preset = parsed.positionalArgs[0];
      if (!preset) {
        console.error(
          "Error: generate requires a preset name (see 'scenario-gen presets')",
        );
        return 1;
      }
      return await generateCommand({ preset, ...parsed.opts });
    }

    default:
      console.error(`Unknown command: ${parsed.command}`);
      usage();
      return 1;
  }
}

main().then(
  (code) => process.exit(code),
  (e: unknown) => {
    if (e instanceof UsageError) {
      console.error(`Error: ${e.message}`);
    } else {
      console.error(`Fatal: ${e instanceof Error ? e.message : e}`);
    }
    process.exit(1);
  },
);
