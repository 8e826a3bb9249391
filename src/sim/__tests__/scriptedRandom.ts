import type { RandomSource } from "../types";

/** Replays fixed draws and fails loudly if the code under test asks for more. */
export function scriptedRandom(...values: number[]): RandomSource & { remaining: () => number } {
  let index = 0;
  const next = () => {
    if (index >= values.length) {
      throw new Error(`random source exhausted after ${values.length} draws`);
    }
    const value = values[index];
    index += 1;
    return value;
  };
  return Object.assign(next, { remaining: () => values.length - index });
}
