/**
 * Profile-compaction generator.
 *
 * Expands a cyclic day × step table of average users into a per-minute
 * series. One simulated 24h day is squeezed into `dayLengthHours` of wall
 * clock, so each step of `durations[i]` hours becomes
 * `trunc(durations[i] * stepLength)` minutes. Fractional minutes are dropped
 * per step and never carried over; existing presets depend on the resulting
 * lengths.
 */

import { ConfigurationError } from "./errors.ts";
import type { Rng } from "./rng.ts";
import {
  clampSeries,
  injectSpikes,
  resolveSpikeOptions,
  type SpikeOptions,
} from "./spikes.ts";

export interface ProfileOptions extends Partial<SpikeOptions> {
  /** [dayRow][step] average concurrent users. Rows cycle by day. */
  averages: readonly (readonly number[])[];
  /** Step lengths in hours; must sum to 24. */
  durations: readonly number[];
  /** Real hours one simulated day occupies. */
  dayLengthHours: number;
  numDays: number;
  /** Day-to-day jitter, relative to the step average. */
  sigmaWeek?: number;
  /** Absolute noise when the day's average is at or below the threshold. */
  sigmaLow?: number;
  /** Absolute noise above the threshold. */
  sigmaHigh?: number;
}

export const PROFILE_DEFAULTS = {
  sigmaWeek: 0.15,
  sigmaLow: 3,
  sigmaHigh: 80,
  loadThreshold: 200,
  spikeProb: 0.03,
  spikeMult: 1.4,
  minValue: 1,
} as const;

const HOURS_PER_DAY = 24;

export function validateProfileShape(
  averages: readonly (readonly number[])[],
  durations: readonly number[],
): void {
  const fractional = durations.find((hours) => !Number.isInteger(hours));
  if (fractional !== undefined) {
    throw new ConfigurationError(
      `Step durations must be whole hours, got ${fractional}`,
    );
  }
  const total = durations.reduce((a, b) => a + b, 0);
  if (total !== HOURS_PER_DAY) {
    throw new ConfigurationError(
      `Step durations must sum to ${HOURS_PER_DAY} hours, got ${total}`,
    );
  }
  if (averages.length === 0) {
    throw new ConfigurationError("Averages table has no rows");
  }
  averages.forEach((row, i) => {
    if (row.length !== durations.length) {
      throw new ConfigurationError(
        `Averages row ${i} has ${row.length} steps, durations define ${durations.length}`,
      );
    }
  });
}

/** Minutes per step after compaction. */
export function compactDurations(
  durations: readonly number[],
  dayLengthHours: number,
): number[] {
  if (!(dayLengthHours > 0) || !Number.isFinite(dayLengthHours)) {
    throw new ConfigurationError(
      `dayLengthHours must be a positive number, got ${dayLengthHours}`,
    );
  }
  const compactionFactor = HOURS_PER_DAY / dayLengthHours;
  const stepLength = 60 / compactionFactor;
  return durations.map((hours) => Math.trunc(hours * stepLength));
}

export function profileLength(
  opts: Pick<ProfileOptions, "durations" | "dayLengthHours" | "numDays">,
): number {
  const perDay = compactDurations(opts.durations, opts.dayLengthHours)
    .reduce((a, b) => a + b, 0);
  return opts.numDays * perDay;
}

export function generateProfileValues(
  opts: ProfileOptions,
  rng: Rng,
): number[] {
  const { averages, durations, dayLengthHours, numDays } = opts;
  const sigmaWeek = opts.sigmaWeek ?? PROFILE_DEFAULTS.sigmaWeek;
  const sigmaLow = opts.sigmaLow ?? PROFILE_DEFAULTS.sigmaLow;
  const sigmaHigh = opts.sigmaHigh ?? PROFILE_DEFAULTS.sigmaHigh;
  const spikes = resolveSpikeOptions(opts, PROFILE_DEFAULTS);

  validateProfileShape(averages, durations);
  if (!Number.isInteger(numDays) || numDays < 0) {
    throw new ConfigurationError(
      `numDays must be a non-negative integer, got ${numDays}`,
    );
  }
  const steps = compactDurations(durations, dayLengthHours);

  const values: number[] = [];
  const rows = averages.length;

  for (let day = 0; day < numDays; day++) {
    const row = averages[day % rows];
    for (let step = 0; step < steps.length; step++) {
      const avg = row[step];
      const thisAvg = rng.normal(avg, sigmaWeek * avg);
      const sigma = thisAvg > spikes.loadThreshold ? sigmaHigh : sigmaLow;
      for (let m = 0; m < steps[step]; m++) {
        values.push(Math.max(spikes.minValue, rng.normal(thisAvg, sigma)));
      }
    }
  }

  return injectSpikes(clampSeries(values, spikes.minValue), spikes, rng);
}
