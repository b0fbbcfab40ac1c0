/**
 * Scenario facade: preset name → value series.
 */

import { UnsupportedKindError } from "./errors.ts";
import { buildPhaseValues } from "./phases.ts";
import {
  getPreset,
  type Preset,
  PRESETS,
  type PresetRegistry,
} from "./presets.ts";
import { generateProfileValues } from "./profile.ts";
import { Rng } from "./rng.ts";

/** Drops the fields only the facade and serializer care about. */
function generationParams<T extends Preset>(
  preset: T,
): Omit<T, "kind" | "spawnRate" | "description"> {
  const {
    kind: _kind,
    spawnRate: _spawnRate,
    description: _description,
    ...params
  } = preset;
  return params;
}

function unsupportedKind(preset: never): never {
  const { kind }: { kind: unknown } = preset;
  throw new UnsupportedKindError(String(kind));
}

export function generatePreset(preset: Preset, rng: Rng): number[] {
  switch (preset.kind) {
    case "profile":
      return generateProfileValues(generationParams(preset), rng);
    case "phases":
      return buildPhaseValues(generationParams(preset), rng);
    default:
      return unsupportedKind(preset);
  }
}

/**
 * Generates a named preset from its own random stream. The same seed always
 * yields the same series; without a seed one is drawn from the clock.
 */
export function generate(
  name: string,
  seed?: number,
  registry: PresetRegistry = PRESETS,
): number[] {
  return generateWith(name, new Rng(seed), registry);
}

/**
 * Generates a named preset drawing from a caller-owned stream. Runs that
 * share one Rng depend on everything drawn before them.
 */
export function generateWith(
  name: string,
  rng: Rng,
  registry: PresetRegistry = PRESETS,
): number[] {
  return generatePreset(getPreset(name, registry), rng);
}
