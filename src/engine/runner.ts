/**
 * Run orchestration for one preset: generate, serialize, write, plot.
 *
 * Output naming is part of the contract with the deployment scripts:
 * `{outputDir}/{preset}.json` then `{outputDir}/{preset}.yaml`, then
 * whatever the plotting collaborator writes.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import {
  type ConfigMapOptions,
  DEFAULT_CONFIGMAP,
  formatScenarioJson,
  type ScenarioEntry,
  toConfigMapYaml,
  toScenarioJson,
  validateConfigMapOptions,
} from "../output/serialize.ts";
import { getPreset, PRESETS, type PresetRegistry } from "./presets.ts";
import { randomSeed } from "./rng.ts";
import { generate } from "./scenario.ts";

export type PlotFn = (
  values: readonly number[],
  outputDir: string,
  name: string,
  seed?: number,
) => Promise<string[]>;

export interface RunPresetOptions {
  preset: string;
  outputDir?: string;
  seed?: number;
  configMap?: Partial<ConfigMapOptions>;
  /** Diagnostic plotting collaborator. Skipped when absent. */
  plot?: PlotFn;
  registry?: PresetRegistry;
  verbose?: boolean;
}

export interface RunPresetResult {
  preset: string;
  seed: number;
  values: number[];
  entries: ScenarioEntry[];
  jsonPath: string;
  yamlPath: string;
  plotPaths: string[];
}

export const DEFAULT_OUTPUT_DIR = "output";

export async function runPreset(
  opts: RunPresetOptions,
): Promise<RunPresetResult> {
  const registry = opts.registry ?? PRESETS;
  const outputDir = opts.outputDir ?? DEFAULT_OUTPUT_DIR;
  const configMap = {
    name: opts.configMap?.name ?? DEFAULT_CONFIGMAP.name,
    namespace: opts.configMap?.namespace ?? DEFAULT_CONFIGMAP.namespace,
  };
  const seed = opts.seed ?? randomSeed();

  const preset = getPreset(opts.preset, registry);
  validateConfigMapOptions(configMap);

  const values = generate(opts.preset, seed, registry);
  const entries = toScenarioJson(values, preset.spawnRate);
  if (opts.verbose) {
    console.error(
      `[scenario-gen] ${opts.preset}: kind=${preset.kind} seed=${seed} minutes=${values.length}`,
    );
  }

  await mkdir(outputDir, { recursive: true });

  const jsonPath = join(outputDir, `${opts.preset}.json`);
  await writeFile(jsonPath, formatScenarioJson(entries));

  const yamlPath = join(outputDir, `${opts.preset}.yaml`);
  await writeFile(yamlPath, toConfigMapYaml(entries, configMap));

  const plotPaths = opts.plot
    ? await opts.plot(values, outputDir, opts.preset, seed)
    : [];
  if (opts.verbose && plotPaths.length > 0) {
    console.error(`[scenario-gen] plots: ${plotPaths.join(", ")}`);
  }

  return {
    preset: opts.preset,
    seed,
    values,
    entries,
    jsonPath,
    yamlPath,
    plotPaths,
  };
}
