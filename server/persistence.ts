import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { decodeGrid, encodeGrid } from '../src/codec.ts';
import type { EdgePolicy, Grid } from '../src/grid.ts';

const MAX_NAME_LENGTH = 64;

export interface SnapshotMeta {
  id: number;
  name: string;
  createdAt: number;
  rule: string;
  generation: number;
  width: number;
  height: number;
  edge: EdgePolicy;
  population: number;
}

export interface Snapshot extends SnapshotMeta {
  grid: Grid;
}

export interface SnapshotInput {
  name: string;
  rule: string;
  generation: number;
  grid: Grid;
}

export interface Persistence {
  saveSnapshot: (input: SnapshotInput) => number;
  listSnapshots: (limit: number) => SnapshotMeta[];
  loadSnapshot: (id: number) => Snapshot | null;
  loadLatestSnapshot: () => Snapshot | null;
  deleteSnapshot: (id: number) => boolean;
}

type DbType = ReturnType<typeof Database>;

interface SnapshotRow {
  id: number;
  name: string;
  created_at: number;
  rule: string;
  generation: number;
  width: number;
  height: number;
  edge: string;
  population: number;
}

interface SnapshotRowWithGrid extends SnapshotRow {
  grid_blob: Buffer;
}

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS grid_snapshots (
  id INTEGER PRIMARY KEY,
  created_at INTEGER NOT NULL,
  name TEXT NOT NULL,
  rule TEXT NOT NULL,
  generation INTEGER NOT NULL,
  width INTEGER NOT NULL,
  height INTEGER NOT NULL,
  edge TEXT NOT NULL,
  population INTEGER NOT NULL,
  grid_blob BLOB NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_snap_created ON grid_snapshots(created_at);
CREATE INDEX IF NOT EXISTS idx_snap_name ON grid_snapshots(name);
`;

const META_COLUMNS = 'id, name, created_at, rule, generation, width, height, edge, population';

export function initDb(dbPath: string): DbType {
  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    fs.mkdirSync(dir, { recursive: true });
  }
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.exec(SCHEMA_SQL);
  return db;
}

function toMeta(row: SnapshotRow): SnapshotMeta {
  return {
    id: row.id,
    name: row.name,
    createdAt: row.created_at,
    rule: row.rule,
    generation: row.generation,
    width: row.width,
    height: row.height,
    edge: row.edge === 'wrap' ? 'wrap' : 'clamp',
    population: row.population
  };
}

/**
 * Decode a stored row. The blob is the authority for the grid; a blob that
 * disagrees with its row's dimensions is reported as corrupt.
 * @param row - Row including the grid blob.
 * @returns Snapshot with decoded grid.
 */
function toSnapshot(row: SnapshotRowWithGrid): Snapshot {
  const grid = decodeGrid(new Uint8Array(row.grid_blob));
  const meta = toMeta(row);
  if (grid.width !== meta.width || grid.height !== meta.height) {
    throw new Error(`snapshot ${meta.id} is corrupt: grid size does not match its record`);
  }
  return { ...meta, grid };
}

export function createPersistence(db: DbType): Persistence {
  const insertSnapshot = db.prepare(
    `INSERT INTO grid_snapshots
       (created_at, name, rule, generation, width, height, edge, population, grid_blob)
     VALUES
       (@created_at, @name, @rule, @generation, @width, @height, @edge, @population, @grid_blob)`
  );
  const listStmt = db.prepare<[number], SnapshotRow>(
    `SELECT ${META_COLUMNS} FROM grid_snapshots ORDER BY id DESC LIMIT ?`
  );
  const loadStmt = db.prepare<[number], SnapshotRowWithGrid>(
    `SELECT ${META_COLUMNS}, grid_blob FROM grid_snapshots WHERE id = ?`
  );
  const latestStmt = db.prepare<[], SnapshotRowWithGrid>(
    `SELECT ${META_COLUMNS}, grid_blob FROM grid_snapshots ORDER BY id DESC LIMIT 1`
  );
  const deleteStmt = db.prepare(`DELETE FROM grid_snapshots WHERE id = ?`);

  const saveSnapshot = (input: SnapshotInput): number => {
    const name = input.name.trim();
    if (!name) {
      throw new Error('snapshot name is required');
    }
    if (name.length > MAX_NAME_LENGTH) {
      throw new Error(`snapshot name exceeds ${MAX_NAME_LENGTH} characters`);
    }
    if (!Number.isInteger(input.generation) || input.generation < 0) {
      throw new Error('snapshot generation is invalid');
    }
    const { grid } = input;
    const info = insertSnapshot.run({
      created_at: Date.now(),
      name,
      rule: input.rule,
      generation: input.generation,
      width: grid.width,
      height: grid.height,
      edge: grid.edge,
      population: grid.population(),
      grid_blob: Buffer.from(encodeGrid(grid))
    });
    return Number(info.lastInsertRowid);
  };

  const listSnapshots = (limit: number): SnapshotMeta[] => {
    const rows = listStmt.all(limit);
    return rows.map(toMeta);
  };

  const loadSnapshot = (id: number): Snapshot | null => {
    const row = loadStmt.get(id);
    return row ? toSnapshot(row) : null;
  };

  const loadLatestSnapshot = (): Snapshot | null => {
    const row = latestStmt.get();
    return row ? toSnapshot(row) : null;
  };

  const deleteSnapshot = (id: number): boolean => {
    return deleteStmt.run(id).changes > 0;
  };

  return {
    saveSnapshot,
    listSnapshots,
    loadSnapshot,
    loadLatestSnapshot,
    deleteSnapshot
  };
}
