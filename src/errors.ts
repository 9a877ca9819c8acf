/** Error types raised by the simulation core. */

/** Raised when a rule string does not follow B/S notation. */
export class RuleParseError extends Error {
  /** Rule text that failed to parse. */
  readonly input: string;

  constructor(input: string, reason: string) {
    super(`invalid rule "${input}": ${reason}`);
    this.name = 'RuleParseError';
    this.input = input;
  }
}

/** Raised when grid dimensions are not positive integers or exceed the cell limit. */
export class GridSizeError extends Error {
  constructor(width: number, height: number, reason: string) {
    super(`invalid grid size ${width}x${height}: ${reason}`);
    this.name = 'GridSizeError';
  }
}

/** Raised for a coordinate outside the grid. */
export class OutOfBoundsError extends Error {
  readonly x: number;
  readonly y: number;

  constructor(x: number, y: number, width: number, height: number) {
    super(`cell (${x}, ${y}) is outside the ${width}x${height} grid`);
    this.name = 'OutOfBoundsError';
    this.x = x;
    this.y = y;
  }
}

/**
 * Failure category for save/load.
 * `malformed` means the bytes were read but are not a valid save;
 * `io` means the bytes could not be read or written at all.
 */
export type CodecErrorKind = 'malformed' | 'io';

export class CodecError extends Error {
  readonly kind: CodecErrorKind;
  /** Filesystem error code (ENOENT, EACCES, ...) for `io` failures. */
  readonly code: string | undefined;

  constructor(kind: CodecErrorKind, message: string, code?: string) {
    super(message);
    this.name = 'CodecError';
    this.kind = kind;
    this.code = code;
  }

  static malformed(reason: string): CodecError {
    return new CodecError('malformed', `malformed save data: ${reason}`);
  }
}

/**
 * Check whether a thrown value is a codec failure of the given kind.
 * @param err - Value caught from a save/load call.
 * @param kind - Expected failure kind.
 * @returns True when the error matches.
 */
export function isCodecError(err: unknown, kind?: CodecErrorKind): err is CodecError {
  if (!(err instanceof CodecError)) return false;
  return kind === undefined || err.kind === kind;
}
