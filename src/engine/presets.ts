/**
 * Declarative scenario presets.
 *
 * Each preset is one variant of a closed union keyed by generator kind and
 * is validated when the registry is built, so a bad entry fails at load time
 * instead of halfway through a run.
 */

import { z } from "zod";
import {
  ConfigurationError,
  UnknownPresetError,
  UnsupportedKindError,
} from "./errors.ts";
import { DEFAULT_PHASE_SIGMA, flat, PHASE_DEFAULTS, ramp } from "./phases.ts";
import {
  compactDurations,
  PROFILE_DEFAULTS,
  validateProfileShape,
} from "./profile.ts";
import weekly from "./weekly_averages.json";

// ─── Schemas ────────────────────────────────────────────────────

const durationMin = z.number().int().nonnegative();
const sigma = z.number().nonnegative().default(DEFAULT_PHASE_SIGMA);

export const phaseSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("flat"),
    durationMin,
    target: z.number(),
    sigma,
  }).strict(),
  z.object({
    kind: z.literal("ramp"),
    durationMin,
    start: z.number().optional(),
    target: z.number(),
    sigma,
  }).strict(),
]);

const facadeFields = {
  description: z.string().default(""),
  /** Only used when serializing the schedule. */
  spawnRate: z.number().int().positive(),
};

const probability = z.number().min(0).max(1);

export const profilePresetSchema = z.object({
  kind: z.literal("profile"),
  ...facadeFields,
  averages: z.array(z.array(z.number().nonnegative())).min(1),
  durations: z.array(z.number().int().nonnegative()).min(1),
  dayLengthHours: z.number().positive(),
  numDays: z.number().int().positive(),
  sigmaWeek: z.number().nonnegative().default(PROFILE_DEFAULTS.sigmaWeek),
  sigmaLow: z.number().nonnegative().default(PROFILE_DEFAULTS.sigmaLow),
  sigmaHigh: z.number().nonnegative().default(PROFILE_DEFAULTS.sigmaHigh),
  loadThreshold: z.number().default(PROFILE_DEFAULTS.loadThreshold),
  spikeProb: probability.default(PROFILE_DEFAULTS.spikeProb),
  spikeMult: z.number().nonnegative().default(PROFILE_DEFAULTS.spikeMult),
  minValue: z.number().nonnegative().default(PROFILE_DEFAULTS.minValue),
}).strict();

export const phasesPresetSchema = z.object({
  kind: z.literal("phases"),
  ...facadeFields,
  phases: z.array(phaseSchema).min(1),
  loadThreshold: z.number().default(PHASE_DEFAULTS.loadThreshold),
  spikeProb: probability.default(PHASE_DEFAULTS.spikeProb),
  spikeMult: z.number().nonnegative().default(PHASE_DEFAULTS.spikeMult),
  minValue: z.number().nonnegative().default(PHASE_DEFAULTS.minValue),
}).strict();

export const presetSchema = z.discriminatedUnion("kind", [
  profilePresetSchema,
  phasesPresetSchema,
]);

type DeepReadonly<T> = T extends (infer U)[] ? ReadonlyArray<DeepReadonly<U>>
  : T extends object ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
  : T;

export type Preset = DeepReadonly<z.infer<typeof presetSchema>>;
export type PresetInput = z.input<typeof presetSchema>;
export type ProfilePreset = DeepReadonly<z.infer<typeof profilePresetSchema>>;
export type PhasesPreset = DeepReadonly<z.infer<typeof phasesPresetSchema>>;
export type GeneratorKind = Preset["kind"];
export type PresetRegistry = Readonly<Record<string, Preset>>;

export const GENERATOR_KINDS = [
  "profile",
  "phases",
] as const satisfies readonly GeneratorKind[];

function isGeneratorKind(kind: unknown): kind is GeneratorKind {
  return GENERATOR_KINDS.some((k) => k === kind);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

function freezeDeep(value: unknown): void {
  if (typeof value !== "object" || value === null) return;
  Object.freeze(value);
  for (const child of Object.values(value)) freezeDeep(child);
}

// ─── Registry construction ──────────────────────────────────────

export function definePreset(name: string, raw: unknown): Preset {
  const kind = typeof raw === "object" && raw !== null && "kind" in raw
    ? raw.kind
    : undefined;
  if (!isGeneratorKind(kind)) {
    throw new UnsupportedKindError(String(kind));
  }

  const parsed = presetSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid preset "${name}": ${formatIssues(parsed.error)}`,
    );
  }

  const preset = parsed.data;
  if (preset.kind === "profile") {
    try {
      validateProfileShape(preset.averages, preset.durations);
      compactDurations(preset.durations, preset.dayLengthHours);
    } catch (e) {
      if (e instanceof ConfigurationError) {
        throw new ConfigurationError(`Invalid preset "${name}": ${e.message}`);
      }
      throw e;
    }
  }
  // phases, averages rows and durations included
  freezeDeep(preset);
  return preset;
}

export function definePresets(
  raw: Readonly<Record<string, unknown>>,
): PresetRegistry {
  const registry: Record<string, Preset> = {};
  for (const [name, def] of Object.entries(raw)) {
    registry[name] = definePreset(name, def);
  }
  return Object.freeze(registry);
}

// ─── Built-in presets ───────────────────────────────────────────

const STANDARD_DURATIONS = [6, 4, 2, 6, 2, 4];

const BUILTIN_PRESETS = {
  "2weeks": {
    kind: "profile",
    description: "Two low-load weeks, uniform noise, no spikes",
    averages: weekly.lowLoadWeek,
    durations: STANDARD_DURATIONS,
    dayLengthHours: 3,
    // 14 days over a 7-row table: each weekday is used twice
    numDays: 14,
    spawnRate: 1,
    sigmaWeek: 0.1,
    sigmaLow: 10,
    sigmaHigh: 10,
    spikeProb: 0,
  },
  "7days": {
    kind: "profile",
    description: "A full week compressed into 24 hours",
    averages: weekly.standardWeek,
    durations: STANDARD_DURATIONS,
    dayLengthHours: 24 / 7,
    numDays: 7,
    spawnRate: 50,
  },
  hpa_stress: {
    kind: "profile",
    description: "Autoscaler stress test (same parameters as 7days)",
    averages: weekly.standardWeek,
    durations: STANDARD_DURATIONS,
    dayLengthHours: 24 / 7,
    numDays: 7,
    spawnRate: 50,
  },
  thursday_3h: {
    kind: "phases",
    description: "Thursday compressed into 3 hours, ramps on big transitions",
    phases: [
      flat(40, 40, 3),
      ramp(5, 650, 40, 80),
      flat(27, 650, 80),
      // small midday dip transitions instantly
      flat(13, 470, 80),
      ramp(5, 850, 470, 80),
      flat(40, 850, 80),
      ramp(5, 360, 850, 80),
      flat(13, 360, 80),
      ramp(5, 40, 360, 3),
      flat(27, 40, 3),
    ],
    spawnRate: 50,
    spikeProb: 0.03,
    spikeMult: 1.4,
  },
  "1h_spike": {
    kind: "phases",
    description: "Low, ramp to a sustained peak, ramp back down",
    phases: [
      flat(15, 50, 3),
      ramp(5, 850, 50, 80),
      flat(20, 850, 80),
      ramp(5, 50, 850, 80),
      flat(15, 50, 3),
    ],
    spawnRate: 50,
    spikeProb: 0.03,
    spikeMult: 1.4,
  },
  linear_ramp: {
    kind: "phases",
    description: "Noise-free linear ramp from 10 to 1500 users over an hour",
    phases: [ramp(60, 1500, 10, 0)],
    spawnRate: 50,
  },
} satisfies Record<string, PresetInput>;

export const PRESETS: PresetRegistry = definePresets(BUILTIN_PRESETS);

// ─── Lookup ─────────────────────────────────────────────────────

export interface PresetListing {
  name: string;
  kind: GeneratorKind;
  description: string;
  spawnRate: number;
}

export function listPresets(
  registry: PresetRegistry = PRESETS,
): PresetListing[] {
  return Object.entries(registry).map(([name, preset]) => ({
    name,
    kind: preset.kind,
    description: preset.description,
    spawnRate: preset.spawnRate,
  }));
}

export function getPreset(
  name: string,
  registry: PresetRegistry = PRESETS,
): Preset {
  if (!Object.hasOwn(registry, name)) {
    throw new UnknownPresetError(name, Object.keys(registry));
  }
  return registry[name];
}
