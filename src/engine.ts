// engine.ts
// Owns the rule set, the current generation and a back buffer. step() writes
// the next generation into the back buffer and swaps, so reads always target
// the previous generation.

import { decodeGrid, encodeGrid } from './codec.ts';
import { Grid, type GridShape } from './grid.ts';
import { centerOf, stampPattern, type Pattern } from './patterns.ts';
import { fillRandom, type RandomSource } from './rng.ts';
import type { RuleSet } from './rules.ts';
import { nextGeneration } from './step.ts';

export type EngineState = 'paused' | 'running';

export interface EngineOptions {
  rules: RuleSet;
  grid: Grid;
  /** Start in the Running state. Defaults to paused. */
  running?: boolean;
}

export class Engine {
  readonly rules: RuleSet;
  private current: Grid;
  private back: Grid;
  private running: boolean;
  private generationCount = 0;

  constructor(options: EngineOptions) {
    this.rules = options.rules;
    this.current = options.grid;
    this.back = new Grid(options.grid.width, options.grid.height, { edge: options.grid.edge });
    this.running = options.running ?? false;
  }

  /** Current generation. Callers must not keep it across step(). */
  get grid(): Grid {
    return this.current;
  }

  get state(): EngineState {
    return this.running ? 'running' : 'paused';
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Steps taken since construction or the last grid replacement. */
  get generation(): number {
    return this.generationCount;
  }

  /** Advance one generation regardless of state. */
  step(): void {
    const next = nextGeneration(this.current, this.rules, this.back);
    this.back = this.current;
    this.current = next;
    this.generationCount += 1;
  }

  /**
   * Periodic tick from the driving loop.
   * @returns True when a generation was computed.
   */
  tick(): boolean {
    if (!this.running) return false;
    this.step();
    return true;
  }

  pause(): void {
    this.running = false;
  }

  resume(): void {
    this.running = true;
  }

  /** @returns The new state. */
  toggleRunning(): EngineState {
    this.running = !this.running;
    return this.state;
  }

  /**
   * Flip a cell; allowed while paused or running.
   * @returns The cell's new state.
   */
  toggleCell(x: number, y: number): boolean {
    return this.current.toggle(x, y);
  }

  setCell(x: number, y: number, alive: boolean): void {
    this.current.set(x, y, alive);
  }

  clear(): void {
    this.current.clear();
  }

  /**
   * Refill the grid randomly.
   * @returns Live cell count after the fill.
   */
  randomize(rng: RandomSource, density: number): number {
    return fillRandom(this.current, density, rng);
  }

  /**
   * Write a pattern at (x, y), or centered when no position is given.
   */
  stamp(pattern: Pattern, x?: number, y?: number): void {
    const center = centerOf(this.current, pattern);
    stampPattern(this.current, pattern, x ?? center.x, y ?? center.y);
  }

  /**
   * Replace the whole grid, e.g. after loading. Resets the generation count.
   * @param grid - New current generation; may differ in size and edge policy.
   */
  replaceGrid(grid: Grid): void {
    if (!this.back.sameShape(grid)) {
      this.back = new Grid(grid.width, grid.height, { edge: grid.edge });
    }
    this.current = grid;
    this.generationCount = 0;
  }

  /** Encode the current generation. */
  save(): Uint8Array {
    return encodeGrid(this.current);
  }

  /**
   * Decode and install a saved grid.
   * Decoding finishes before anything is replaced, so a CodecError leaves the engine unchanged.
   * @returns Shape of the loaded grid.
   */
  load(bytes: Uint8Array): GridShape {
    const grid = decodeGrid(bytes);
    this.replaceGrid(grid);
    return grid.shape();
  }

  population(): number {
    return this.current.population();
  }
}
