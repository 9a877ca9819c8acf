import { describe, it, expect } from 'vitest';
import { encodeGrid } from './codec.ts';
import { Engine } from './engine.ts';
import { CodecError, OutOfBoundsError } from './errors.ts';
import { Grid } from './grid.ts';
import { getPattern, type Pattern } from './patterns.ts';
import { createRng } from './rng.ts';
import { defaultRules } from './rules.ts';

function builtin(name: string): Pattern {
  const pattern = getPattern(name);
  if (!pattern) throw new Error(`missing built-in pattern ${name}`);
  return pattern;
}

function blinkerEngine(running = false): Engine {
  const grid = new Grid(5, 5);
  grid.set(1, 2, true);
  grid.set(2, 2, true);
  grid.set(3, 2, true);
  return new Engine({ rules: defaultRules(), grid, running });
}

describe('Engine', () => {
  it('starts paused unless asked to run', () => {
    expect(blinkerEngine().state).toBe('paused');
    expect(blinkerEngine(true).state).toBe('running');
  });

  it('ignores ticks while paused', () => {
    const engine = blinkerEngine();
    const before = engine.grid.clone();
    expect(engine.tick()).toBe(false);
    expect(engine.generation).toBe(0);
    expect(engine.grid.equals(before)).toBe(true);
  });

  it('steps once per tick while running', () => {
    const engine = blinkerEngine(true);
    expect(engine.tick()).toBe(true);
    expect(engine.generation).toBe(1);
    expect(engine.grid.liveCells()).toEqual([{ x: 2, y: 1 }, { x: 2, y: 2 }, { x: 2, y: 3 }]);
    expect(engine.tick()).toBe(true);
    expect(engine.grid.liveCells()).toEqual([{ x: 1, y: 2 }, { x: 2, y: 2 }, { x: 3, y: 2 }]);
  });

  it('allows manual steps while paused', () => {
    const engine = blinkerEngine();
    engine.step();
    expect(engine.generation).toBe(1);
    expect(engine.state).toBe('paused');
    expect(engine.grid.get(2, 1)).toBe(true);
  });

  it('transitions between paused and running', () => {
    const engine = blinkerEngine();
    engine.resume();
    expect(engine.isRunning).toBe(true);
    engine.pause();
    expect(engine.isRunning).toBe(false);
    expect(engine.toggleRunning()).toBe('running');
    expect(engine.toggleRunning()).toBe('paused');
  });

  it('accepts edits in both states and rejects off-grid edits', () => {
    const engine = blinkerEngine();
    expect(engine.toggleCell(0, 0)).toBe(true);
    engine.resume();
    expect(engine.toggleCell(0, 0)).toBe(false);
    expect(() => engine.toggleCell(5, 0)).toThrow(OutOfBoundsError);
  });

  it('keeps the block still across many steps using both buffers', () => {
    const grid = new Grid(6, 6);
    const block = builtin('block');
    const engine = new Engine({ rules: defaultRules(), grid });
    engine.stamp(block, 2, 2);
    const start = engine.grid.clone();
    for (let i = 0; i < 5; i++) engine.step();
    expect(engine.grid.equals(start)).toBe(true);
    expect(engine.generation).toBe(5);
  });

  it('centers stamped patterns by default', () => {
    const engine = new Engine({ rules: defaultRules(), grid: new Grid(7, 7) });
    engine.stamp(builtin('blinker'));
    expect(engine.grid.liveCells()).toEqual([{ x: 2, y: 3 }, { x: 3, y: 3 }, { x: 4, y: 3 }]);
  });

  it('clears and randomizes reproducibly', () => {
    const a = blinkerEngine();
    const b = blinkerEngine();
    const liveA = a.randomize(createRng(99), 0.5);
    const liveB = b.randomize(createRng(99), 0.5);
    expect(liveA).toBe(liveB);
    expect(a.grid.equals(b.grid)).toBe(true);
    a.clear();
    expect(a.population()).toBe(0);
  });

  it('round-trips through save and load', () => {
    const engine = blinkerEngine();
    engine.step();
    const bytes = engine.save();
    const other = new Engine({ rules: defaultRules(), grid: new Grid(2, 2) });
    other.load(bytes);
    expect(other.grid.equals(engine.grid)).toBe(true);
    expect(other.generation).toBe(0);
    other.step();
    expect(other.grid.liveCells()).toEqual([{ x: 1, y: 2 }, { x: 2, y: 2 }, { x: 3, y: 2 }]);
  });

  it('reports the loaded shape rather than a buffer it will reuse', () => {
    const source = new Engine({ rules: defaultRules(), grid: new Grid(6, 4, { edge: 'wrap' }) });
    const engine = blinkerEngine();
    const shape = engine.load(source.save());
    expect(shape).toEqual({ width: 6, height: 4, edge: 'wrap' });
    expect(shape).not.toBeInstanceOf(Grid);
    engine.step();
    engine.step();
    expect(shape).toEqual({ width: 6, height: 4, edge: 'wrap' });
    expect(engine.grid.shape()).toEqual(shape);
  });

  it('leaves state unchanged when a load fails', () => {
    const engine = blinkerEngine();
    engine.step();
    const before = engine.grid.clone();
    const bytes = encodeGrid(new Grid(9, 9, { init: () => true }));
    expect(() => engine.load(bytes.subarray(0, bytes.length - 1))).toThrow(CodecError);
    expect(engine.grid.equals(before)).toBe(true);
    expect(engine.generation).toBe(1);
    engine.step();
    expect(engine.grid.liveCells()).toEqual([{ x: 1, y: 2 }, { x: 2, y: 2 }, { x: 3, y: 2 }]);
  });

  it('resizes its buffers when a differently sized grid replaces the current one', () => {
    const engine = blinkerEngine();
    const wide = new Grid(8, 3, { edge: 'wrap' });
    wide.set(3, 1, true);
    wide.set(4, 1, true);
    wide.set(5, 1, true);
    engine.replaceGrid(wide);
    engine.step();
    expect(engine.grid.width).toBe(8);
    expect(engine.grid.edge).toBe('wrap');
    expect(engine.grid.liveCells()).toEqual([{ x: 4, y: 0 }, { x: 4, y: 1 }, { x: 4, y: 2 }]);
  });
});
