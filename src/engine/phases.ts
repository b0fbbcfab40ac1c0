/**
 * Phase-concatenation generator: flat and ramp segments joined in order.
 *
 * No smoothing happens at boundaries. A ramp without `start` begins at 0,
 * not at the previous phase's level.
 */

import { ConfigurationError } from "./errors.ts";
import type { Rng } from "./rng.ts";
import {
  clampSeries,
  injectSpikes,
  resolveSpikeOptions,
  type SpikeOptions,
} from "./spikes.ts";

export const DEFAULT_PHASE_SIGMA = 3;

export interface FlatPhase {
  kind: "flat";
  durationMin: number;
  target: number;
  sigma: number;
}

export interface RampPhase {
  kind: "ramp";
  durationMin: number;
  start?: number;
  target: number;
  sigma: number;
}

export type Phase = FlatPhase | RampPhase;

export function flat(
  durationMin: number,
  target: number,
  sigma = DEFAULT_PHASE_SIGMA,
): FlatPhase {
  return { kind: "flat", durationMin, target, sigma };
}

export function ramp(
  durationMin: number,
  target: number,
  start?: number,
  sigma = DEFAULT_PHASE_SIGMA,
): RampPhase {
  return { kind: "ramp", durationMin, start, target, sigma };
}

export interface PhaseOptions extends Partial<SpikeOptions> {
  phases: readonly Phase[];
}

export const PHASE_DEFAULTS = {
  loadThreshold: 200,
  spikeProb: 0,
  spikeMult: 1,
  minValue: 1,
} as const;

/** `count` evenly spaced points from `from` to `to`, both ends exact. */
export function linspace(from: number, to: number, count: number): number[] {
  if (count <= 0) return [];
  if (count === 1) return [from];
  const step = (to - from) / (count - 1);
  const out = new Array<number>(count);
  for (let i = 0; i < count - 1; i++) out[i] = from + i * step;
  out[count - 1] = to;
  return out;
}

function phaseValues(phase: Phase, rng: Rng): number[] {
  switch (phase.kind) {
    case "flat":
      return rng.normals(phase.target, phase.sigma, phase.durationMin);
    case "ramp":
      return linspace(phase.start ?? 0, phase.target, phase.durationMin)
        .map((base) => base + rng.normal(0, phase.sigma));
  }
}

export function buildPhaseValues(opts: PhaseOptions, rng: Rng): number[] {
  const spikes = resolveSpikeOptions(opts, PHASE_DEFAULTS);
  for (const [i, phase] of opts.phases.entries()) {
    if (!Number.isInteger(phase.durationMin) || phase.durationMin < 0) {
      throw new ConfigurationError(
        `Phase ${i} duration must be a non-negative integer, got ${phase.durationMin}`,
      );
    }
  }

  const values: number[] = [];
  for (const phase of opts.phases) {
    values.push(...phaseValues(phase, rng));
  }

  return injectSpikes(clampSeries(values, spikes.minValue), spikes, rng);
}
