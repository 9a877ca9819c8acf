import fs from 'node:fs';
import path from 'node:path';
import { decodeGrid, encodeGrid } from '../src/codec.ts';
import { CodecError } from '../src/errors.ts';
import type { Grid } from '../src/grid.ts';

/**
 * Pull the errno code off a filesystem error.
 * @param err - Error thrown by fs.
 * @returns Code such as ENOENT, or undefined.
 */
function errorCode(err: unknown): string | undefined {
  if (!err || typeof err !== 'object' || !('code' in err)) return undefined;
  return typeof err.code === 'string' ? err.code : undefined;
}

function ioError(action: string, filePath: string, err: unknown): CodecError {
  const code = errorCode(err);
  const detail = err instanceof Error ? err.message : String(err);
  return new CodecError('io', `failed to ${action} ${filePath}: ${detail}`, code);
}

/**
 * Read raw save bytes.
 * @throws CodecError with kind `io` when the file cannot be read.
 */
export function readSaveBytes(filePath: string): Uint8Array {
  try {
    return new Uint8Array(fs.readFileSync(filePath));
  } catch (err) {
    throw ioError('read', filePath, err);
  }
}

/**
 * Load a grid from a save file.
 * @param filePath - File to read.
 * @returns Decoded grid.
 * @throws CodecError `io` when reading fails, `malformed` when the content is invalid.
 */
export function readGridFile(filePath: string): Grid {
  return decodeGrid(readSaveBytes(filePath));
}

/**
 * Save a grid, creating parent directories as needed. Writes to a temp file
 * first and renames it over the target so a failed write keeps the old save.
 * @param filePath - Destination file.
 * @param grid - Grid to encode.
 * @returns Number of bytes written.
 * @throws CodecError `io` when the file cannot be written.
 */
export function writeGridFile(filePath: string, grid: Grid): number {
  const bytes = encodeGrid(grid);
  const tmpPath = `${filePath}.tmp`;
  try {
    fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
    fs.writeFileSync(tmpPath, bytes);
    fs.renameSync(tmpPath, filePath);
  } catch (err) {
    if (fs.existsSync(tmpPath)) fs.rmSync(tmpPath, { force: true });
    throw ioError('write', filePath, err);
  }
  return bytes.byteLength;
}
