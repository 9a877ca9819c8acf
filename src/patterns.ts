// patterns.ts
// Plaintext patterns ("." dead, "O" or "*" alive, "!" comment lines) and
// helpers to stamp them onto a grid.

import { OutOfBoundsError } from './errors.ts';
import type { Grid } from './grid.ts';

export interface Pattern {
  name: string;
  width: number;
  height: number;
  /** Row-major states of the bounding box. */
  cells: Uint8Array;
}

const BUILTIN_SOURCES: Readonly<Record<string, string>> = {
  block: 'OO\nOO',
  blinker: 'OOO',
  toad: '.OOO\nOOO.',
  beacon: 'OO..\nOO..\n..OO\n..OO',
  glider: '.O.\n..O\nOOO',
  lwss: '.O..O\nO....\nO...O\nOOOO.',
  rpentomino: '.OO\nOO.\n.O.'
};

/**
 * Parse a plaintext pattern.
 * Short rows are padded with dead cells to the widest row.
 * @param text - Pattern source.
 * @param name - Label for error messages.
 * @returns Parsed pattern.
 */
export function parsePattern(text: string, name = 'pattern'): Pattern {
  const rows = text
    .split('\n')
    .map(line => line.replace(/\r$/, ''))
    .filter(line => !line.startsWith('!'));
  while (rows.length > 0 && rows[rows.length - 1] === '') rows.pop();
  if (rows.length === 0) {
    throw new Error(`pattern "${name}" is empty`);
  }
  const width = Math.max(...rows.map(row => row.length));
  if (width === 0) {
    throw new Error(`pattern "${name}" is empty`);
  }
  const height = rows.length;
  const cells = new Uint8Array(width * height);
  rows.forEach((row, y) => {
    for (let x = 0; x < row.length; x++) {
      const ch = row[x];
      if (ch === 'O' || ch === '*') {
        cells[y * width + x] = 1;
      } else if (ch !== '.') {
        throw new Error(`pattern "${name}" has unexpected character "${ch}" at row ${y + 1}`);
      }
    }
  });
  return { name, width, height, cells };
}

/** Built-in pattern names. */
export const PATTERN_NAMES = Object.keys(BUILTIN_SOURCES);

/**
 * Look up a built-in pattern.
 * @param name - Pattern name (case-insensitive).
 * @returns Pattern or null when unknown.
 */
export function getPattern(name: string): Pattern | null {
  const key = name.trim().toLowerCase();
  const source = BUILTIN_SOURCES[key];
  return source === undefined ? null : parsePattern(source, key);
}

/**
 * Write a pattern's bounding box onto the grid with its top-left at (ox, oy).
 * Wrap grids take coordinates modulo their size; clamp grids reject a pattern
 * that does not fit and leave the grid untouched.
 * @param grid - Target grid.
 * @param pattern - Pattern to write.
 * @param ox - Left column.
 * @param oy - Top row.
 */
export function stampPattern(grid: Grid, pattern: Pattern, ox: number, oy: number): void {
  const wrap = grid.edge === 'wrap';
  if (!wrap) {
    const right = ox + pattern.width - 1;
    const bottom = oy + pattern.height - 1;
    if (!grid.contains(ox, oy)) throw new OutOfBoundsError(ox, oy, grid.width, grid.height);
    if (!grid.contains(right, bottom)) {
      throw new OutOfBoundsError(right, bottom, grid.width, grid.height);
    }
  }
  for (let py = 0; py < pattern.height; py++) {
    for (let px = 0; px < pattern.width; px++) {
      let x = ox + px;
      let y = oy + py;
      if (wrap) {
        x = ((x % grid.width) + grid.width) % grid.width;
        y = ((y % grid.height) + grid.height) % grid.height;
      }
      grid.set(x, y, pattern.cells[py * pattern.width + px] === 1);
    }
  }
}

/**
 * Top-left offset that centers a pattern on the grid.
 * @returns Offset; negative when the pattern is larger than the grid.
 */
export function centerOf(grid: Grid, pattern: Pattern): { x: number; y: number } {
  return {
    x: Math.floor((grid.width - pattern.width) / 2),
    y: Math.floor((grid.height - pattern.height) / 2)
  };
}
