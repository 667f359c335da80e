/**
 * Uniform random sources consumed by the generator. Passing the source
 * explicitly keeps generation reproducible: a seeded source replays the same
 * graph for the same arguments.
 */
import { z } from "zod";

import { GraphInvalidArgumentError } from "./errors.js";

/** Produces uniformly distributed numbers in `[0, 1)`. */
export interface RandomSource {
  next(): number;
}

const MODULUS = 2147483647; // 2^31 - 1
const MULTIPLIER = 48271; // Park–Miller recommended multiplier

const SeedSchema = z.union([z.number().finite(), z.string()]);

/** Hashes a seed token into the non-zero state expected by the generator. */
function deriveSeed(seed: number | string): number {
  let hash = 0;
  if (typeof seed === "number") {
    hash = Math.abs(Math.trunc(seed)) % MODULUS;
  } else {
    for (let index = 0; index < seed.length; index += 1) {
      hash = (hash * 31 + seed.charCodeAt(index)) % MODULUS;
    }
  }
  // Zero is a fixed point of the recurrence.
  return hash === 0 ? 1 : hash;
}

/**
 * Park–Miller linear congruential generator (modulus 2^31-1, multiplier
 * 48271). Numeric seeds are truncated; string seeds are hashed.
 *
 * @throws GraphInvalidArgumentError when a numeric seed is `NaN` or infinite.
 */
export function createSeededRandom(seed: number | string): RandomSource {
  const parsed = SeedSchema.safeParse(seed);
  if (!parsed.success) {
    throw new GraphInvalidArgumentError(`seed must be a finite number or a string (received ${String(seed)})`, {
      hint: "use_finite_seed",
      details: { seed: String(seed) },
    });
  }
  let state = deriveSeed(parsed.data);
  return {
    next() {
      state = (state * MULTIPLIER) % MODULUS;
      return (state - 1) / (MODULUS - 1);
    },
  };
}

/** Source backed by `Math.random`, resolved on every draw. */
export const mathRandomSource: RandomSource = {
  next: () => Math.random(),
};

/**
 * Uniform integer in `[0, bound)`.
 *
 * @throws GraphInvalidArgumentError when the source draws outside `[0, 1)`.
 */
export function randomInt(source: RandomSource, bound: number): number {
  const draw = source.next();
  const value = Math.floor(draw * bound);
  if (!Number.isInteger(value) || value < 0 || value >= bound) {
    throw new GraphInvalidArgumentError(`random source must draw from [0, 1) (received ${String(draw)})`, {
      hint: "fix_random_source",
      details: { draw, bound },
    });
  }
  return value;
}
