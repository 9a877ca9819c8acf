/** Birth/survival rules in B/S notation, stored as 9-bit neighbor-count masks. */

import { RuleParseError } from './errors.ts';

/** Largest neighbor count in the 8-neighborhood. */
export const MAX_NEIGHBORS = 8;

/** Rule used when none is supplied. */
export const DEFAULT_RULE = 'B3/S23';

/** Well-known rules addressable by name. */
export const RULE_PRESETS: Readonly<Record<string, string>> = {
  life: 'B3/S23',
  highlife: 'B36/S23',
  seeds: 'B2/S',
  daynight: 'B3678/S34678',
  maze: 'B3/S12345',
  coral: 'B3/S45678',
  replicator: 'B1357/S1357',
  grow: 'B12345678/S12345678'
};

/** Immutable birth/survival rule pair. */
export class RuleSet {
  /** Bit n set when a dead cell with n live neighbors is born. */
  readonly birthMask: number;
  /** Bit n set when a live cell with n live neighbors survives. */
  readonly surviveMask: number;

  constructor(birthMask: number, surviveMask: number) {
    this.birthMask = birthMask & 0x1ff;
    this.surviveMask = surviveMask & 0x1ff;
    Object.freeze(this);
  }

  /**
   * Build a rule from explicit neighbor counts.
   * @param birth - Counts that bring a dead cell to life.
   * @param survive - Counts that keep a live cell alive.
   * @returns Rule set.
   */
  static fromCounts(birth: Iterable<number>, survive: Iterable<number>): RuleSet {
    return new RuleSet(countsToMask(birth, 'birth'), countsToMask(survive, 'survive'));
  }

  isBirth(n: number): boolean {
    return hasCount(this.birthMask, n);
  }

  isSurvive(n: number): boolean {
    return hasCount(this.surviveMask, n);
  }

  birthCounts(): number[] {
    return maskToCounts(this.birthMask);
  }

  surviveCounts(): number[] {
    return maskToCounts(this.surviveMask);
  }

  equals(other: RuleSet): boolean {
    return this.birthMask === other.birthMask && this.surviveMask === other.surviveMask;
  }

  toString(): string {
    return formatRule(this);
  }
}

function hasCount(mask: number, n: number): boolean {
  if (!Number.isInteger(n) || n < 0 || n > MAX_NEIGHBORS) return false;
  return (mask & (1 << n)) !== 0;
}

function maskToCounts(mask: number): number[] {
  const counts: number[] = [];
  for (let n = 0; n <= MAX_NEIGHBORS; n++) {
    if (mask & (1 << n)) counts.push(n);
  }
  return counts;
}

function countsToMask(counts: Iterable<number>, section: string): number {
  let mask = 0;
  for (const n of counts) {
    if (!Number.isInteger(n) || n < 0 || n > MAX_NEIGHBORS) {
      throw new RangeError(`${section} count ${n} is outside 0..${MAX_NEIGHBORS}`);
    }
    mask |= 1 << n;
  }
  return mask;
}

/**
 * Parse the digits of one rule section into a mask.
 * @param text - Whole rule string, for error messages.
 * @param digits - Section body after its B or S marker.
 * @returns Count mask.
 */
function parseSection(text: string, digits: string): number {
  let mask = 0;
  for (const ch of digits) {
    if (ch < '0' || ch > '9') {
      throw new RuleParseError(text, `unexpected character "${ch}"`);
    }
    const n = ch.charCodeAt(0) - 48;
    if (n > MAX_NEIGHBORS) {
      throw new RuleParseError(text, `neighbor count ${n} exceeds ${MAX_NEIGHBORS}`);
    }
    mask |= 1 << n;
  }
  return mask;
}

/**
 * Parse a `B<digits>/S<digits>` rule string.
 * Digits are unordered and may repeat; either section may be empty.
 * @param text - Rule string, e.g. `B3/S23`.
 * @returns Parsed rule set.
 * @throws RuleParseError when the markers are missing or misplaced, a digit
 *   exceeds 8, or another character appears.
 */
export function parseRule(text: string): RuleSet {
  if (!text.startsWith('B')) {
    throw new RuleParseError(text, 'expected "B" at the start');
  }
  const slash = text.indexOf('/');
  if (slash < 0) {
    throw new RuleParseError(text, 'expected "/" between the B and S sections');
  }
  const survivePart = text.slice(slash + 1);
  if (!survivePart.startsWith('S')) {
    throw new RuleParseError(text, 'expected "S" after "/"');
  }
  const birthMask = parseSection(text, text.slice(1, slash));
  const surviveMask = parseSection(text, survivePart.slice(1));
  return new RuleSet(birthMask, surviveMask);
}

/**
 * Render a rule in canonical form with ascending digits.
 * @param rules - Rule set to format.
 * @returns Rule string such as `B36/S23`.
 */
export function formatRule(rules: RuleSet): string {
  return `B${rules.birthCounts().join('')}/S${rules.surviveCounts().join('')}`;
}

/** Conway's Game of Life. */
export function defaultRules(): RuleSet {
  return parseRule(DEFAULT_RULE);
}

/**
 * Resolve a preset name or a literal rule string.
 * @param nameOrRule - Preset name (case-insensitive) or B/S rule.
 * @returns Parsed rule set.
 */
export function resolveRule(nameOrRule: string): RuleSet {
  const preset = RULE_PRESETS[nameOrRule.trim().toLowerCase()];
  return parseRule(preset ?? nameOrRule);
}
