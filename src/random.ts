import seedrandom from "seedrandom";
import { EvaluationError } from "./errors";

/**
 * Source of die outcomes threaded through every evaluation.
 * `nextInt` returns an integer in [min, max], both ends inclusive.
 */
export interface RandomSource {
  nextInt(min: number, max: number): number;
}

function fromGenerator(rng: () => number): RandomSource {
  return {
    nextInt(min: number, max: number): number {
      if (!Number.isSafeInteger(min) || !Number.isSafeInteger(max)) {
        throw new RangeError("min and max must be safe integers");
      }
      if (min > max) {
        throw new RangeError(`min (${min}) must not exceed max (${max})`);
      }
      return min + Math.floor(rng() * (max - min + 1));
    },
  };
}

/** A generator seeded from system entropy. */
export function defaultRandom(): RandomSource {
  return fromGenerator(seedrandom());
}

/** A reproducible generator: the same seed always yields the same rolls. */
export function seededRandom(seed: string): RandomSource {
  return fromGenerator(seedrandom(seed));
}

/**
 * Replays a fixed list of outcomes in order, for tests and for re-running
 * a recorded roll. Fails if the list runs out or an outcome does not fit
 * the die being rolled.
 */
export function scriptedRandom(values: readonly number[]): RandomSource {
  let index = 0;
  return {
    nextInt(min: number, max: number): number {
      if (index >= values.length) {
        throw new EvaluationError(
          `Scripted random source exhausted after ${values.length} values`
        );
      }
      const value = values[index];
      if (!Number.isInteger(value) || value < min || value > max) {
        throw new EvaluationError(
          `Scripted value ${value} at position ${index} is outside [${min}, ${max}]`
        );
      }
      index++;
      return value;
    },
  };
}
