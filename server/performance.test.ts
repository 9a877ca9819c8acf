import { describe, it, expect } from 'vitest';
import { performance } from 'node:perf_hooks';
import { encodeGrid } from '../src/codec.ts';
import { Engine } from '../src/engine.ts';
import { Grid } from '../src/grid.ts';
import { createRng } from '../src/rng.ts';
import { parseRule } from '../src/rules.ts';

describe('performance: step + encode', () => {
  it('steps a 256x256 torus under a reasonable budget', () => {
    const engine = new Engine({
      rules: parseRule('B3/S23'),
      grid: new Grid(256, 256, { edge: 'wrap' }),
      running: true
    });
    engine.randomize(createRng(2024), 0.35);
    const generations = 60;
    const start = performance.now();
    for (let i = 0; i < generations; i++) {
      engine.tick();
      encodeGrid(engine.grid);
    }
    const elapsed = performance.now() - start;
    const msPerGeneration = elapsed / generations;
    expect(engine.generation).toBe(generations);
    // Generous budget to avoid CI flakiness.
    expect(msPerGeneration).toBeLessThan(40);
  });
});
