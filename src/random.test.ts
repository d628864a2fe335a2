import { describe, expect, test } from "vitest";
import { MersenneTwister } from "./random";

describe("MersenneTwister", () => {
  test("matches the reference MT19937 output", () => {
    expect(new MersenneTwister(5489).nextUint32()).toBe(3499211612);

    const rng = new MersenneTwister(42);
    expect(rng.nextUint32()).toBe(1608637542);
    expect(rng.nextUint32()).toBe(3421126067);
  });

  test("53-bit doubles", () => {
    expect(new MersenneTwister(42).nextDouble()).toBe(0.3745401188473625);
  });

  test("seed 42 normal stream", () => {
    const rng = new MersenneTwister(42);
    expect(rng.nextGaussian()).toBeCloseTo(0.4967141530112327, 14);
    expect(rng.nextGaussian()).toBeCloseTo(-0.13826430117118466, 14);
    expect(rng.nextGaussian()).toBeCloseTo(0.6476885381006925, 14);
  });

  test("gaussian matrix is filled row by row with scale and shift", () => {
    const m = new MersenneTwister(42).gaussianMatrix(2, 3, 0.5, 0.2);
    expect(m).toHaveLength(2);
    expect(m[0]).toHaveLength(3);
    expect(m[0][0]).toBeCloseTo(0.44835707650561635, 14);
    expect(m[0][1]).toBeCloseTo(0.13086784941440768, 14);
  });

  test("same seed, same stream", () => {
    const a = new MersenneTwister(7);
    const b = new MersenneTwister(7);
    for (let i = 0; i < 1000; i += 1) expect(a.nextUint32()).toBe(b.nextUint32());
  });
});
