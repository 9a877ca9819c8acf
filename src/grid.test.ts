import { describe, it, expect } from 'vitest';
import { decodeGrid, encodeGrid } from './codec.ts';
import { GridSizeError, OutOfBoundsError } from './errors.ts';
import { Grid, MAX_CELLS } from './grid.ts';

describe('Grid', () => {
  it('starts all dead by default', () => {
    const grid = new Grid(4, 3);
    expect(grid.size).toBe(12);
    expect(grid.population()).toBe(0);
    expect(grid.edge).toBe('clamp');
  });

  it('fills from an init callback in row-major order', () => {
    const grid = new Grid(3, 2, { init: (x, y) => x === y });
    expect(Array.from(grid.cells)).toEqual([1, 0, 0, 0, 1, 0]);
    expect(grid.get(1, 1)).toBe(true);
    expect(grid.get(2, 1)).toBe(false);
  });

  it.each([
    [0, 5],
    [5, 0],
    [-1, 3],
    [2.5, 2]
  ])('rejects size %ix%i', (w, h) => {
    expect(() => new Grid(w, h)).toThrow(GridSizeError);
  });

  it('rejects grids above the cell limit', () => {
    expect(() => new Grid(MAX_CELLS, 2)).toThrow(GridSizeError);
  });

  it('sets, gets and toggles cells', () => {
    const grid = new Grid(5, 5);
    grid.set(2, 3, true);
    expect(grid.get(2, 3)).toBe(true);
    expect(grid.cells[3 * 5 + 2]).toBe(1);
    expect(grid.toggle(2, 3)).toBe(false);
    expect(grid.toggle(0, 0)).toBe(true);
    expect(grid.population()).toBe(1);
  });

  it('rejects out-of-range coordinates for both edge policies', () => {
    for (const edge of ['clamp', 'wrap'] as const) {
      const grid = new Grid(4, 4, { edge });
      expect(() => grid.get(4, 0)).toThrow(OutOfBoundsError);
      expect(() => grid.set(-1, 0, true)).toThrow(OutOfBoundsError);
      expect(() => grid.toggle(0, 4)).toThrow(OutOfBoundsError);
      expect(() => grid.countLiveNeighbors(1.5, 0)).toThrow(OutOfBoundsError);
    }
  });

  it('counts a full neighborhood as 8', () => {
    const grid = new Grid(3, 3, { init: () => true });
    expect(grid.countLiveNeighbors(1, 1)).toBe(8);
  });

  it('treats off-grid neighbors as dead when clamped', () => {
    const grid = new Grid(5, 5, { init: () => true });
    expect(grid.countLiveNeighbors(0, 0)).toBe(3);
    expect(grid.countLiveNeighbors(2, 0)).toBe(5);
  });

  it('wraps the corner diagonal only when wrap is enabled', () => {
    const wrap = new Grid(6, 4, { edge: 'wrap' });
    wrap.set(0, 0, true);
    wrap.set(5, 3, true);
    expect(wrap.countLiveNeighbors(0, 0)).toBe(1);
    expect(wrap.countLiveNeighbors(5, 3)).toBe(1);

    const clamp = new Grid(6, 4, { edge: 'clamp' });
    clamp.set(0, 0, true);
    clamp.set(5, 3, true);
    expect(clamp.countLiveNeighbors(0, 0)).toBe(0);
    expect(clamp.countLiveNeighbors(5, 3)).toBe(0);
  });

  it('does not count the cell itself', () => {
    const grid = new Grid(3, 3);
    grid.set(1, 1, true);
    expect(grid.countLiveNeighbors(1, 1)).toBe(0);
    expect(grid.countLiveNeighbors(0, 0)).toBe(1);
  });

  it('lists live cells', () => {
    const grid = new Grid(3, 2);
    grid.set(2, 0, true);
    grid.set(0, 1, true);
    expect(grid.liveCells()).toEqual([{ x: 2, y: 0 }, { x: 0, y: 1 }]);
  });

  it('clones independently and compares by value', () => {
    const grid = new Grid(3, 3, { edge: 'wrap', init: (x) => x === 1 });
    const copy = grid.clone();
    expect(copy.equals(grid)).toBe(true);
    copy.toggle(0, 0);
    expect(copy.equals(grid)).toBe(false);
    expect(grid.get(0, 0)).toBe(false);
    expect(grid.equals(Grid.fromCells(3, 3, grid.cells, 'clamp'))).toBe(false);
  });

  it('copies only between grids of the same shape', () => {
    const a = new Grid(2, 2, { init: () => true });
    const b = new Grid(2, 2);
    b.copyFrom(a);
    expect(b.population()).toBe(4);
    expect(() => new Grid(3, 2).copyFrom(a)).toThrow(GridSizeError);
  });

  it('builds from a flat state array', () => {
    const grid = Grid.fromCells(2, 2, [true, false, 0, 7]);
    expect(Array.from(grid.cells)).toEqual([1, 0, 0, 1]);
    expect(() => Grid.fromCells(2, 2, [1, 0, 1])).toThrow(GridSizeError);
  });

  it('reads any non-zero state byte as alive', () => {
    const grid = new Grid(3, 1);
    grid.cells[0] = 2;
    expect(grid.get(0, 0)).toBe(true);
    expect(grid.population()).toBe(1);
    expect(grid.liveCells()).toEqual([{ x: 0, y: 0 }]);
    expect(grid.countLiveNeighbors(1, 0)).toBe(1);
    expect(grid.equals(Grid.fromCells(3, 1, [1, 0, 0]))).toBe(true);
    expect(decodeGrid(encodeGrid(grid)).get(0, 0)).toBe(true);
    expect(grid.toggle(0, 0)).toBe(false);
    expect(grid.cells[0]).toBe(0);
  });
});
