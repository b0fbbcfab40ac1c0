import { expect, test } from "vitest";
import { Rng } from "../engine/rng.ts";
import { clampSeries, injectSpikes } from "../engine/spikes.ts";

const base = { loadThreshold: 200, spikeProb: 1, spikeMult: 2, minValue: 1 };

test("clampSeries: raises values below the floor in place", () => {
  const values = [0.5, -3, 4];
  const out = clampSeries(values, 1);
  expect(out).toBe(values);
  expect(values).toEqual([1, 1, 4]);
});

test("injectSpikes: only samples strictly above the threshold are eligible", () => {
  expect(injectSpikes([100, 200, 201], base, new Rng(1))).toEqual([
    100,
    200,
    402,
  ]);
});

test("injectSpikes: zero probability consumes no draws", () => {
  const rng = new Rng(11);
  const values = [500, 600];
  injectSpikes(values, { ...base, spikeProb: 0 }, rng);
  expect(values).toEqual([500, 600]);
  expect(rng.next()).toBe(new Rng(11).next());
});

test("injectSpikes: one draw per eligible sample", () => {
  const rng = new Rng(5);
  injectSpikes([300, 50, 300], { ...base, spikeProb: 0.5 }, rng);

  const expected = new Rng(5);
  expected.next();
  expected.next();
  expect(rng.next()).toBe(expected.next());
});

test("injectSpikes: clamps after amplifying", () => {
  expect(injectSpikes([300], { ...base, spikeMult: 0 }, new Rng(1))).toEqual([
    1,
  ]);
});
