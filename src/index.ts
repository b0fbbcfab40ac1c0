export {
  ConfigurationError,
  ScenarioError,
  type ScenarioErrorCategory,
  UnknownPresetError,
  UnsupportedKindError,
} from "./engine/errors.ts";
export { randomSeed, Rng } from "./engine/rng.ts";
export { clampSeries, injectSpikes, type SpikeOptions } from "./engine/spikes.ts";
export {
  compactDurations,
  generateProfileValues,
  PROFILE_DEFAULTS,
  profileLength,
  type ProfileOptions,
  validateProfileShape,
} from "./engine/profile.ts";
export {
  buildPhaseValues,
  flat,
  type FlatPhase,
  linspace,
  type Phase,
  PHASE_DEFAULTS,
  type PhaseOptions,
  ramp,
  type RampPhase,
} from "./engine/phases.ts";
export {
  definePreset,
  definePresets,
  type GeneratorKind,
  GENERATOR_KINDS,
  getPreset,
  listPresets,
  type Preset,
  type PresetInput,
  type PresetListing,
  type PresetRegistry,
  PRESETS,
} from "./engine/presets.ts";
export { generate, generatePreset, generateWith } from "./engine/scenario.ts";
export {
  DEFAULT_OUTPUT_DIR,
  type PlotFn,
  runPreset,
  type RunPresetOptions,
  type RunPresetResult,
} from "./engine/runner.ts";
export {
  type ConfigMapOptions,
  DEFAULT_CONFIGMAP,
  formatScenarioJson,
  SCENARIO_KEY,
  type ScenarioEntry,
  toConfigMapYaml,
  toScenarioJson,
} from "./output/serialize.ts";
export { renderChartHtml, savePlots } from "./dashboard/render.ts";
export { percentile, type SeriesSummary, summarize } from "./metrics/stats.ts";
