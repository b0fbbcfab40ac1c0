import { expect, test } from "vitest";
import { parseArgs, UsageError } from "../args.ts";

test("parseArgs: defaults", () => {
  expect(parseArgs(["generate", "7days"])).toEqual({
    command: "generate",
    positionalArgs: ["7days"],
    opts: {
      outputDir: "output",
      seed: undefined,
      configMapName: "test-scenario",
      namespace: "microservices-demo",
      plots: true,
      json: false,
      verbose: false,
      help: false,
    },
  });
});

test("parseArgs: generate options", () => {
  const parsed = parseArgs([
    "generate",
    "1h_spike",
    "--seed",
    "42",
    "-o",
    "out",
    "--configmap-name",
    "spike",
    "--namespace",
    "loadtest",
    "--no-plots",
    "--json",
    "-v",
  ]);
  expect(parsed.positionalArgs).toEqual(["1h_spike"]);
  expect(parsed.opts).toMatchObject({
    seed: 42,
    outputDir: "out",
    configMapName: "spike",
    namespace: "loadtest",
    plots: false,
    json: true,
    verbose: true,
  });
});

test("parseArgs: negative seeds are integers too", () => {
  expect(parseArgs(["generate", "x", "--seed", "-7"]).opts.seed).toBe(-7);
});

test("parseArgs: rejects unknown options", () => {
  expect(() => parseArgs(["generate", "--list"])).toThrow(
    "Unknown option: --list",
  );
});

test("parseArgs: rejects non-integer seeds", () => {
  expect(() => parseArgs(["generate", "x", "--seed", "abc"])).toThrow(
    UsageError,
  );
  expect(() => parseArgs(["generate", "x", "--seed", "1.5"])).toThrow(
    UsageError,
  );
  expect(() => parseArgs(["generate", "x", "--seed"])).toThrow(UsageError);
});

test("parseArgs: seeds must fit the generator's 32-bit state", () => {
  expect(() => parseArgs(["generate", "x", "--seed", "4294967338"])).toThrow(
    "--seed out of range: 4294967338",
  );
  expect(() => parseArgs(["generate", "x", "--seed", "2147483648"])).toThrow(
    UsageError,
  );
  expect(parseArgs(["generate", "x", "--seed", "2147483647"]).opts.seed).toBe(
    2147483647,
  );
  expect(parseArgs(["generate", "x", "--seed", "-2147483648"]).opts.seed).toBe(
    -2147483648,
  );
});

test("parseArgs: value flags need a value", () => {
  expect(() => parseArgs(["generate", "x", "-o"])).toThrow(
    "-o requires a value",
  );
});
