/** Generation transition shared by the engine and tests. */

import { GridSizeError } from './errors.ts';
import { Grid } from './grid.ts';
import type { RuleSet } from './rules.ts';

/**
 * Compute the generation after `grid` under `rules`.
 * Every cell reads neighbor counts from `grid` only, so updates never observe
 * each other within one generation. `grid` is left untouched.
 * @param grid - Current generation.
 * @param rules - Birth/survival rules.
 * @param target - Optional buffer of the same shape to write into; must not be `grid`.
 * @returns The next generation (`target` when given).
 */
export function nextGeneration(grid: Grid, rules: RuleSet, target?: Grid): Grid {
  if (target === grid) {
    throw new Error('next generation cannot be written into the grid it reads from');
  }
  if (target && !target.sameShape(grid)) {
    throw new GridSizeError(target.width, target.height, 'target buffer does not match the source grid');
  }
  const out = target ?? new Grid(grid.width, grid.height, { edge: grid.edge });
  const { width, height } = grid;
  const src = grid.cells;
  const dst = out.cells;
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const i = y * width + x;
      const n = grid.countLiveNeighbors(x, y);
      const alive = src[i] !== 0 ? rules.isSurvive(n) : rules.isBirth(n);
      dst[i] = alive ? 1 : 0;
    }
  }
  return out;
}

/**
 * Advance a grid several generations without modifying it.
 * @param grid - Starting generation.
 * @param rules - Birth/survival rules.
 * @param generations - Number of steps (>= 0).
 * @returns Grid after the given number of steps.
 */
export function advance(grid: Grid, rules: RuleSet, generations: number): Grid {
  let current = grid.clone();
  let spare = new Grid(grid.width, grid.height, { edge: grid.edge });
  for (let i = 0; i < generations; i++) {
    const next = nextGeneration(current, rules, spare);
    spare = current;
    current = next;
  }
  return current;
}
