/**
 * Clamp and spike post-processing shared by both generators.
 */

import type { Rng } from "./rng.ts";

export interface SpikeOptions {
  /** Samples strictly above this are eligible for a spike. */
  loadThreshold: number;
  /** Per-sample spike probability. 0 disables injection entirely. */
  spikeProb: number;
  spikeMult: number;
  minValue: number;
}

/** Fills every option left out or set to `undefined` from `defaults`. */
export function resolveSpikeOptions(
  opts: Partial<SpikeOptions>,
  defaults: SpikeOptions,
): SpikeOptions {
  return {
    loadThreshold: opts.loadThreshold ?? defaults.loadThreshold,
    spikeProb: opts.spikeProb ?? defaults.spikeProb,
    spikeMult: opts.spikeMult ?? defaults.spikeMult,
    minValue: opts.minValue ?? defaults.minValue,
  };
}

/** In-place floor clamp. */
export function clampSeries(values: number[], minValue: number): number[] {
  for (let i = 0; i < values.length; i++) {
    if (values[i] < minValue) values[i] = minValue;
  }
  return values;
}

/**
 * Multiplies eligible samples by `spikeMult` with probability `spikeProb`,
 * then clamps. One uniform draw per eligible sample, in series order.
 */
export function injectSpikes(
  values: number[],
  opts: SpikeOptions,
  rng: Rng,
): number[] {
  if (opts.spikeProb <= 0) return values;

  for (let i = 0; i < values.length; i++) {
    if (values[i] > opts.loadThreshold && rng.next() < opts.spikeProb) {
      values[i] *= opts.spikeMult;
    }
  }
  return clampSeries(values, opts.minValue);
}
