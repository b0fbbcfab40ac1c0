/**
 * Schedule serialization: per-minute scenario entries and the ConfigMap
 * wrapper consumed by the load generator deployment.
 */

import { ConfigurationError } from "../engine/errors.ts";

export interface ScenarioEntry {
  n_users: number;
  spawn_rate: number;
  duration: 1;
}

export interface ConfigMapOptions {
  name: string;
  namespace: string;
}

export const DEFAULT_CONFIGMAP: ConfigMapOptions = {
  name: "test-scenario",
  namespace: "microservices-demo",
};

export const SCENARIO_KEY = "scenario.json";

const DNS_SUBDOMAIN = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?(\.[a-z0-9]([-a-z0-9]*[a-z0-9])?)*$/;
const DNS_LABEL = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;

/** Fractional users are truncated toward zero, never rounded. */
export function toScenarioJson(
  values: readonly number[],
  spawnRate: number,
): ScenarioEntry[] {
  return values.map((v) => ({
    n_users: Math.trunc(v),
    spawn_rate: spawnRate,
    duration: 1,
  }));
}

/** Exact text of `{preset}.json` and of the embedded ConfigMap field. */
export function formatScenarioJson(entries: readonly ScenarioEntry[]): string {
  return JSON.stringify(entries, null, 2) + "\n";
}

export function validateConfigMapOptions(opts: ConfigMapOptions): void {
  if (opts.name.length > 253 || !DNS_SUBDOMAIN.test(opts.name)) {
    throw new ConfigurationError(
      `Invalid ConfigMap name "${opts.name}": must be a lowercase RFC 1123 subdomain`,
    );
  }
  if (opts.namespace.length > 63 || !DNS_LABEL.test(opts.namespace)) {
    throw new ConfigurationError(
      `Invalid namespace "${opts.namespace}": must be a lowercase RFC 1123 label`,
    );
  }
}

export function toConfigMapYaml(
  entries: readonly ScenarioEntry[],
  opts: ConfigMapOptions = DEFAULT_CONFIGMAP,
): string {
  validateConfigMapOptions(opts);
  const body = formatScenarioJson(entries)
    .trimEnd()
    .split("\n")
    .map((line) => `    ${line}`)
    .join("\n");

  return [
    "apiVersion: v1",
    "kind: ConfigMap",
    "metadata:",
    `  name: ${opts.name}`,
    `  namespace: ${opts.namespace}`,
    "data:",
    `  ${SCENARIO_KEY}: |`,
    body,
    "",
  ].join("\n");
}
