import { expect, test } from "vitest";
import { Rng } from "../engine/rng.ts";

test("rng: seeded determinism", () => {
  const a = new Rng(12345);
  const b = new Rng(12345);
  const first = [a.next(), a.next(), a.normal(0, 1)];
  expect([b.next(), b.next(), b.normal(0, 1)]).toEqual(first);
});

test("rng: different seeds produce different sequences", () => {
  expect(new Rng(1).next()).not.toBe(new Rng(2).next());
});

test("rng: uniform draws stay in [0, 1)", () => {
  const rng = new Rng(7);
  for (let i = 0; i < 1000; i++) {
    const x = rng.next();
    expect(x >= 0 && x < 1).toBe(true);
  }
});

test("rng: zero std-dev returns the mean exactly", () => {
  const rng = new Rng(99);
  expect(rng.normal(50, 0)).toBe(50);
  expect(rng.normal(-3.25, 0)).toBe(-3.25);
});

test("rng: zero std-dev consumes the same draws as a noisy call", () => {
  const quiet = new Rng(3);
  const noisy = new Rng(3);
  quiet.normal(10, 0);
  noisy.normal(10, 5);
  expect(quiet.next()).toBe(noisy.next());
});

test("rng: normals returns the requested count", () => {
  expect(new Rng(1).normals(0, 1, 17)).toHaveLength(17);
  expect(new Rng(1).normals(0, 1, 0)).toEqual([]);
});

test("rng: seed is kept as a 32-bit integer", () => {
  expect(new Rng(42).seed).toBe(42);
  expect(new Rng(2 ** 32 + 5).seed).toBe(5);
});

test("rng: unseeded instances still report their seed", () => {
  const rng = new Rng();
  const replay = new Rng(rng.seed);
  expect(replay.next()).toBe(rng.next());
});
