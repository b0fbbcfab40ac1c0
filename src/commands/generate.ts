/**
 * `generate` command — writes the schedule, ConfigMap and chart for a preset.
 */

import { ScenarioError } from "../engine/errors.ts";
import { type RunPresetResult, runPreset } from "../engine/runner.ts";
import { savePlots } from "../dashboard/render.ts";
import { summarize } from "../metrics/stats.ts";

export interface GenerateCommandOptions {
  preset: string;
  outputDir: string;
  seed?: number;
  configMapName: string;
  namespace: string;
  plots: boolean;
  json: boolean;
  verbose: boolean;
}

export async function generateCommand(
  opts: GenerateCommandOptions,
): Promise<number> {
  let result: RunPresetResult;
  try {
    result = await runPreset({
      preset: opts.preset,
      outputDir: opts.outputDir,
      seed: opts.seed,
      configMap: { name: opts.configMapName, namespace: opts.namespace },
      plot: opts.plots ? savePlots : undefined,
      verbose: opts.verbose,
    });
  } catch (e) {
    if (e instanceof ScenarioError) {
      console.error(`Error: ${e.message}`);
      return 1;
    }
    throw e;
  }

  const summary = summarize(result.values);

  if (opts.json) {
    console.log(JSON.stringify(
      {
        preset: result.preset,
        seed: result.seed,
        jsonPath: result.jsonPath,
        yamlPath: result.yamlPath,
        plotPaths: result.plotPaths,
        summary,
      },
      null,
      2,
    ));
    return 0;
  }

  const written = [result.jsonPath, result.yamlPath, ...result.plotPaths];
  console.log(
    `${result.preset}: ${summary.minutes} minutes, wrote ${written.join(", ")}`,
  );
  console.log(`  seed   ${result.seed}`);
  console.log(
    `  users  min ${fmt(summary.min)}  mean ${fmt(summary.mean)}  p50 ${
      fmt(summary.p50)
    }  p95 ${fmt(summary.p95)}  max ${fmt(summary.max)}`,
  );
  if (opts.seed === undefined) {
    console.log(`  rerun with --seed ${result.seed} to reproduce`);
  }
  return 0;
}

function fmt(n: number): string {
  return n.toFixed(1);
}
