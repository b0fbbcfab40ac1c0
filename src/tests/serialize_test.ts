import { expect, test } from "vitest";
import { parse } from "yaml";
import { ConfigurationError } from "../engine/errors.ts";
import {
  formatScenarioJson,
  toConfigMapYaml,
  toScenarioJson,
} from "../output/serialize.ts";

test("toScenarioJson: truncates toward zero", () => {
  expect(toScenarioJson([1.9, 2.1, 0.5, 3], 50).map((e) => e.n_users))
    .toEqual([1, 2, 0, 3]);
});

test("toScenarioJson: one entry per minute, in order", () => {
  expect(toScenarioJson([10, 20], 5)).toEqual([
    { n_users: 10, spawn_rate: 5, duration: 1 },
    { n_users: 20, spawn_rate: 5, duration: 1 },
  ]);
});

test("formatScenarioJson: two-space indent and trailing newline", () => {
  expect(formatScenarioJson(toScenarioJson([5], 2))).toBe(
    '[\n  {\n    "n_users": 5,\n    "spawn_rate": 2,\n    "duration": 1\n  }\n]\n',
  );
});

test("toConfigMapYaml: fixed document layout", () => {
  const yaml = toConfigMapYaml(toScenarioJson([5], 2), {
    name: "demo",
    namespace: "load",
  });
  expect(yaml).toBe(
    [
      "apiVersion: v1",
      "kind: ConfigMap",
      "metadata:",
      "  name: demo",
      "  namespace: load",
      "data:",
      "  scenario.json: |",
      "    [",
      "      {",
      '        "n_users": 5,',
      '        "spawn_rate": 2,',
      '        "duration": 1',
      "      }",
      "    ]",
      "",
    ].join("\n"),
  );
});

test("toConfigMapYaml: defaults", () => {
  const doc = parse(toConfigMapYaml([]));
  expect(doc.metadata).toEqual({
    name: "test-scenario",
    namespace: "microservices-demo",
  });
});

test("toConfigMapYaml: embedded JSON round-trips exactly", () => {
  const entries = toScenarioJson([1.5, 250.9, 1499.99, 42], 50);
  const doc = parse(
    toConfigMapYaml(entries, { name: "scenario-7days", namespace: "demo" }),
  );

  expect(doc.apiVersion).toBe("v1");
  expect(doc.kind).toBe("ConfigMap");
  expect(doc.metadata.name).toBe("scenario-7days");
  expect(doc.data["scenario.json"]).toBe(formatScenarioJson(entries));
  expect(JSON.parse(doc.data["scenario.json"])).toEqual(entries);
});

test("toConfigMapYaml: empty schedule round-trips", () => {
  const doc = parse(toConfigMapYaml([]));
  expect(doc.data["scenario.json"]).toBe("[]\n");
});

test("toConfigMapYaml: rejects names that are not RFC 1123", () => {
  expect(() => toConfigMapYaml([], { name: "Bad_Name", namespace: "ok" }))
    .toThrow(ConfigurationError);
  expect(() => toConfigMapYaml([], { name: "ok", namespace: "a.b" }))
    .toThrow(ConfigurationError);
  expect(() => toConfigMapYaml([], { name: "a.b", namespace: "ok" }))
    .not.toThrow();
});
