/** Seeded randomness for reproducible grid fills. */

import type { Grid } from './grid.ts';

/** Random source returning a float in [0, 1). */
export type RandomSource = () => number;

/** FNV-1a 32-bit offset basis. */
const FNV_OFFSET_BASIS = 0x811c9dc5;
/** FNV-1a 32-bit prime. */
const FNV_PRIME = 0x01000193;

/**
 * Normalize a number into an unsigned 32-bit integer.
 * @param value - Input value to normalize.
 * @returns Unsigned 32-bit integer.
 */
export function toUint32(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return (Math.floor(value) >>> 0);
}

/**
 * Mix numeric inputs into one 32-bit seed, e.g. a base seed and a generation.
 * @param values - Numeric inputs.
 * @returns Unsigned 32-bit hash.
 */
export function hashSeed(...values: number[]): number {
  let hash = FNV_OFFSET_BASIS;
  for (const value of values) {
    hash ^= toUint32(value);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

/**
 * Create a deterministic xorshift32 generator.
 * @param seed - Seed value; 0 is replaced by 1.
 * @returns Random source.
 */
export function createRng(seed: number): RandomSource {
  let state = toUint32(seed) || 1;
  return () => {
    state ^= state << 13;
    state ^= state >>> 17;
    state ^= state << 5;
    return (state >>> 0) / 0x100000000;
  };
}

/**
 * Overwrite every cell with alive/dead drawn from `rng`.
 * @param grid - Grid to fill in place.
 * @param density - Probability in [0, 1] that a cell is alive.
 * @param rng - Random source.
 * @returns Number of live cells written.
 */
export function fillRandom(grid: Grid, density: number, rng: RandomSource): number {
  const p = Number.isFinite(density) ? Math.min(1, Math.max(0, density)) : 0;
  const cells = grid.cells;
  let live = 0;
  for (let i = 0; i < cells.length; i++) {
    const alive = rng() < p;
    cells[i] = alive ? 1 : 0;
    if (alive) live++;
  }
  return live;
}
