import { describe, it, expect } from 'vitest';
import { Grid } from './grid.ts';
import { getPattern, stampPattern, type Pattern } from './patterns.ts';
import { createRng, fillRandom } from './rng.ts';
import { defaultRules, parseRule } from './rules.ts';
import { advance, nextGeneration } from './step.ts';

function builtin(name: string): Pattern {
  const pattern = getPattern(name);
  if (!pattern) throw new Error(`missing built-in pattern ${name}`);
  return pattern;
}

/** Grid with a built-in pattern stamped at (x, y). */
function gridWith(name: string, w: number, h: number, x: number, y: number, wrap = false): Grid {
  const grid = new Grid(w, h, { edge: wrap ? 'wrap' : 'clamp' });
  const pattern = builtin(name);
  stampPattern(grid, pattern, x, y);
  return grid;
}

describe('nextGeneration', () => {
  const life = defaultRules();

  it('keeps a block unchanged', () => {
    const block = gridWith('block', 6, 6, 2, 2);
    const next = nextGeneration(block, life);
    expect(next.equals(block)).toBe(true);
    expect(next.liveCells()).toEqual([
      { x: 2, y: 2 }, { x: 3, y: 2 },
      { x: 2, y: 3 }, { x: 3, y: 3 }
    ]);
  });

  it('flips a blinker and restores it after two steps', () => {
    const horizontal = gridWith('blinker', 5, 5, 1, 2);
    const vertical = nextGeneration(horizontal, life);
    expect(vertical.liveCells()).toEqual([{ x: 2, y: 1 }, { x: 2, y: 2 }, { x: 2, y: 3 }]);
    const back = nextGeneration(vertical, life);
    expect(back.equals(horizontal)).toBe(true);
  });

  it('does not modify the input grid', () => {
    const grid = gridWith('blinker', 5, 5, 1, 2);
    const before = grid.clone();
    nextGeneration(grid, life);
    expect(grid.equals(before)).toBe(true);
  });

  it('is deterministic across independent copies', () => {
    const grid = new Grid(24, 18, { edge: 'wrap' });
    fillRandom(grid, 0.35, createRng(1234));
    const rules = parseRule('B36/S23');
    const a = nextGeneration(grid.clone(), rules);
    const b = nextGeneration(grid.clone(), rules);
    expect(a.equals(b)).toBe(true);
  });

  it('kills everything under B/S', () => {
    const grid = new Grid(4, 4, { init: () => true });
    const next = nextGeneration(grid, parseRule('B/S'));
    expect(next.population()).toBe(0);
  });

  it('births cells with zero neighbors under B0', () => {
    const grid = new Grid(3, 3);
    const next = nextGeneration(grid, parseRule('B0/S'));
    expect(next.population()).toBe(9);
  });

  it('moves a glider one cell diagonally every four generations on a torus', () => {
    const start = gridWith('glider', 8, 8, 1, 1, true);
    const after4 = advance(start, life, 4);
    expect(after4.equals(gridWith('glider', 8, 8, 2, 2, true))).toBe(true);
    const after32 = advance(start, life, 32);
    expect(after32.equals(start)).toBe(true);
  });

  it('lets clamped edges differ from wrapped ones', () => {
    // A blinker on the left edge: its end cell sees the far edge only when wrapped.
    const clamp = new Grid(5, 5);
    const wrap = new Grid(5, 5, { edge: 'wrap' });
    for (const grid of [clamp, wrap]) {
      grid.set(0, 1, true);
      grid.set(0, 2, true);
      grid.set(0, 3, true);
    }
    expect(nextGeneration(clamp, life).liveCells()).toEqual([{ x: 0, y: 2 }, { x: 1, y: 2 }]);
    expect(nextGeneration(wrap, life).liveCells()).toEqual([
      { x: 0, y: 2 }, { x: 1, y: 2 }, { x: 4, y: 2 }
    ]);
  });

  it('writes into a target buffer of matching shape', () => {
    const grid = gridWith('blinker', 5, 5, 1, 2);
    const target = new Grid(5, 5, { init: () => true });
    const out = nextGeneration(grid, life, target);
    expect(out).toBe(target);
    expect(out.population()).toBe(3);
    expect(() => nextGeneration(grid, life, grid)).toThrow();
    expect(() => nextGeneration(grid, life, new Grid(4, 5))).toThrow();
  });

  it('advances zero generations to an equal copy', () => {
    const grid = gridWith('toad', 6, 6, 1, 2);
    const same = advance(grid, life, 0);
    expect(same).not.toBe(grid);
    expect(same.equals(grid)).toBe(true);
  });
});
