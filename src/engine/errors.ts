/**
 * Error taxonomy for scenario generation.
 */

export type ScenarioErrorCategory =
  | "configuration"
  | "unknown-preset"
  | "unsupported-kind";

export class ScenarioError extends Error {
  constructor(
    public category: ScenarioErrorCategory,
    message: string,
  ) {
    super(message);
    this.name = "ScenarioError";
  }
}

/** Malformed preset or generator parameters. Raised before any sampling. */
export class ConfigurationError extends ScenarioError {
  constructor(message: string) {
    super("configuration", message);
    this.name = "ConfigurationError";
  }
}

export class UnknownPresetError extends ScenarioError {
  constructor(
    public preset: string,
    public available: string[],
  ) {
    super(
      "unknown-preset",
      `Unknown preset: ${preset}. Available: ${available.join(", ")}`,
    );
    this.name = "UnknownPresetError";
  }
}

/** A registry entry whose generator kind has no matching generator. */
export class UnsupportedKindError extends ScenarioError {
  constructor(public kind: string) {
    super("unsupported-kind", `Unsupported generator kind: ${kind}`);
    this.name = "UnsupportedKindError";
  }
}
