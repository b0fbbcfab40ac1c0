import { expect, test } from "vitest";
import { percentile, summarize } from "../metrics/stats.ts";

test("percentile: empty array", () => {
  expect(percentile([], 0.5)).toBe(0);
});

test("percentile: single element", () => {
  expect(percentile([42], 0.5)).toBe(42);
  expect(percentile([42], 0.99)).toBe(42);
});

test("percentile: p50 of even count", () => {
  // p50 at index 1.5 → interpolate between 2 and 3 → 2.5
  expect(percentile([1, 2, 3, 4], 0.5)).toBe(2.5);
});

test("percentile: p0 and p100", () => {
  const sorted = [10, 20, 30, 40, 50];
  expect(percentile(sorted, 0)).toBe(10);
  expect(percentile(sorted, 1)).toBe(50);
});

test("summarize: empty series", () => {
  expect(summarize([])).toEqual({
    minutes: 0,
    min: 0,
    max: 0,
    mean: 0,
    p50: 0,
    p95: 0,
    p99: 0,
  });
});

test("summarize: unsorted input", () => {
  const s = summarize([40, 10, 30, 20, 50]);
  expect(s.minutes).toBe(5);
  expect(s.min).toBe(10);
  expect(s.max).toBe(50);
  expect(s.mean).toBe(30);
  expect(s.p50).toBe(30);
  // index 3.8 → 40 + 10 * 0.8
  expect(s.p95).toBeCloseTo(48, 10);
});

test("summarize: does not reorder the caller's array", () => {
  const values = [3, 1, 2];
  summarize(values);
  expect(values).toEqual([3, 1, 2]);
});
