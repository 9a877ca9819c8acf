/** Binary save format for grids. */

import { CodecError } from './errors.ts';
import { Grid, MAX_CELLS, type EdgePolicy } from './grid.ts';

/** ASCII "LGRD". */
export const CODEC_MAGIC = [0x4c, 0x47, 0x52, 0x44] as const;
export const CODEC_VERSION = 1;
/** Magic + version + flags + width + height. */
export const CODEC_HEADER_BYTES = 14;

/** Flag bit set for wrap grids. */
const FLAG_WRAP = 0x01;
const KNOWN_FLAGS = FLAG_WRAP;

/**
 * Number of payload bytes for a bit-packed grid of the given size.
 * @param cellCount - width * height.
 * @returns Byte count.
 */
export function packedLength(cellCount: number): number {
  return Math.ceil(cellCount / 8);
}

/**
 * Encode a grid into the v1 layout.
 *
 * Layout:
 *   [0..4)   magic "LGRD"
 *   [4]      version (1)
 *   [5]      flags (bit 0 = wrap edges)
 *   [6..10)  width, u32 big-endian
 *   [10..14) height, u32 big-endian
 *   [14..)   cells, one bit each, row-major, most significant bit first;
 *            unused bits of the last byte are zero.
 *
 * @param grid - Grid to encode.
 * @returns Encoded bytes.
 */
export function encodeGrid(grid: Grid): Uint8Array {
  const cellCount = grid.width * grid.height;
  const out = new Uint8Array(CODEC_HEADER_BYTES + packedLength(cellCount));
  const view = new DataView(out.buffer);
  out.set(CODEC_MAGIC, 0);
  view.setUint8(4, CODEC_VERSION);
  view.setUint8(5, grid.edge === 'wrap' ? FLAG_WRAP : 0);
  view.setUint32(6, grid.width, false);
  view.setUint32(10, grid.height, false);

  const cells = grid.cells;
  for (let i = 0; i < cellCount; i++) {
    if (cells[i] === 0) continue;
    const byte = CODEC_HEADER_BYTES + (i >> 3);
    out[byte] = (out[byte] ?? 0) | (0x80 >> (i & 7));
  }
  return out;
}

/**
 * Decode bytes produced by {@link encodeGrid}.
 * @param bytes - Encoded grid.
 * @returns Decoded grid.
 * @throws CodecError with kind `malformed` on any header or length problem.
 */
export function decodeGrid(bytes: Uint8Array): Grid {
  if (bytes.byteLength < CODEC_HEADER_BYTES) {
    throw CodecError.malformed(`expected at least ${CODEC_HEADER_BYTES} header bytes, got ${bytes.byteLength}`);
  }
  for (let i = 0; i < CODEC_MAGIC.length; i++) {
    if (bytes[i] !== CODEC_MAGIC[i]) {
      throw CodecError.malformed('unrecognized format tag');
    }
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const version = view.getUint8(4);
  if (version !== CODEC_VERSION) {
    throw CodecError.malformed(`unsupported format version ${version}`);
  }
  const flags = view.getUint8(5);
  if ((flags & ~KNOWN_FLAGS) !== 0) {
    throw CodecError.malformed(`unknown flags 0x${flags.toString(16)}`);
  }
  const width = view.getUint32(6, false);
  const height = view.getUint32(10, false);
  if (width < 1 || height < 1) {
    throw CodecError.malformed(`grid size ${width}x${height} must be at least 1x1`);
  }
  const cellCount = width * height;
  if (cellCount > MAX_CELLS) {
    throw CodecError.malformed(`grid size ${width}x${height} exceeds ${MAX_CELLS} cells`);
  }
  const expected = CODEC_HEADER_BYTES + packedLength(cellCount);
  if (bytes.byteLength !== expected) {
    throw CodecError.malformed(
      `${width}x${height} grid needs ${expected} bytes, got ${bytes.byteLength}`
    );
  }
  const spareBits = packedLength(cellCount) * 8 - cellCount;
  if (spareBits > 0) {
    const last = bytes[expected - 1] ?? 0;
    if ((last & ((1 << spareBits) - 1)) !== 0) {
      throw CodecError.malformed('padding bits are not zero');
    }
  }

  const edge: EdgePolicy = (flags & FLAG_WRAP) !== 0 ? 'wrap' : 'clamp';
  const grid = new Grid(width, height, { edge });
  const cells = grid.cells;
  for (let i = 0; i < cellCount; i++) {
    const byte = bytes[CODEC_HEADER_BYTES + (i >> 3)] ?? 0;
    if (byte & (0x80 >> (i & 7))) cells[i] = 1;
  }
  return grid;
}
