import type { IncomingMessage, ServerResponse } from 'node:http';
import { decodeGrid, encodeGrid } from '../src/codec.ts';
import { CodecError } from '../src/errors.ts';
import { formatRule } from '../src/rules.ts';
import { describeError, type Logger } from './logger.ts';
import { describeFileError, type SimServer } from './simServer.ts';

const MAX_GRID_BODY_BYTES = 4 * 1024 * 1024;
const MAX_JSON_BODY_BYTES = 64 * 1024;

export interface HttpApiDeps {
  getStatus: () => { tick: number; clients: number };
  sim: SimServer;
  logger: Logger;
}

export function createHttpHandler(deps: HttpApiDeps): (req: IncomingMessage, res: ServerResponse) => void {
  return (req, res) => {
    handleRequest(req, res, deps).catch((err: unknown) => {
      deps.logger.error('http', `${req.method ?? '?'} ${req.url ?? '/'} failed: ${describeError(err)}`);
      if (!res.headersSent) {
        sendJson(res, 500, { ok: false, message: 'internal error' });
      } else {
        res.end();
      }
    });
  };
}

function applyCors(req: IncomingMessage, res: ServerResponse): void {
  const origin = req.headers.origin;
  if (origin) {
    res.setHeader('Access-Control-Allow-Origin', origin);
    res.setHeader('Vary', 'Origin');
  } else {
    res.setHeader('Access-Control-Allow-Origin', '*');
  }
  res.setHeader('Access-Control-Allow-Methods', 'GET,POST,PUT,OPTIONS');
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
}

async function handleRequest(
  req: IncomingMessage,
  res: ServerResponse,
  deps: HttpApiDeps
): Promise<void> {
  applyCors(req, res);
  if (req.method === 'OPTIONS') {
    res.statusCode = 204;
    res.end();
    return;
  }
  const { sim } = deps;
  const url = new URL(req.url ?? '/', 'http://localhost');

  if (req.method === 'GET' && url.pathname === '/health') {
    const status = deps.getStatus();
    sendJson(res, 200, { ok: true, tick: status.tick, clients: status.clients });
    return;
  }

  if (req.method === 'GET' && url.pathname === '/api/state') {
    const engine = sim.getEngine();
    const grid = engine.grid;
    sendJson(res, 200, {
      ok: true,
      rule: formatRule(engine.rules),
      width: grid.width,
      height: grid.height,
      edge: grid.edge,
      generation: engine.generation,
      population: grid.population(),
      running: engine.isRunning
    });
    return;
  }

  if (req.method === 'GET' && url.pathname === '/api/grid') {
    const bytes = encodeGrid(sim.getEngine().grid);
    res.statusCode = 200;
    res.setHeader('Content-Type', 'application/octet-stream');
    res.setHeader('Content-Length', String(bytes.byteLength));
    res.end(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength));
    return;
  }

  if (req.method === 'PUT' && url.pathname === '/api/grid') {
    let body: Buffer;
    try {
      body = await readBody(req, MAX_GRID_BODY_BYTES);
    } catch (err) {
      sendJson(res, 413, { ok: false, message: describeError(err) });
      return;
    }
    try {
      const grid = decodeGrid(new Uint8Array(body.buffer, body.byteOffset, body.byteLength));
      sim.installGrid(grid);
      sendJson(res, 200, { ok: true, width: grid.width, height: grid.height, edge: grid.edge });
    } catch (err) {
      if (err instanceof CodecError) {
        sendJson(res, 400, { ok: false, message: err.message });
        return;
      }
      throw err;
    }
    return;
  }

  if (req.method === 'POST' && url.pathname === '/api/save') {
    try {
      const bytes = sim.saveToFile();
      sendJson(res, 200, { ok: true, bytes });
    } catch (err) {
      sendJson(res, 500, { ok: false, message: describeFileError('save', err) });
    }
    return;
  }

  if (req.method === 'POST' && url.pathname === '/api/load') {
    try {
      const shape = sim.loadFromFile();
      sendJson(res, 200, { ok: true, ...shape });
    } catch (err) {
      sendJson(res, loadFailureStatus(err), { ok: false, message: describeFileError('load', err) });
    }
    return;
  }

  if (url.pathname === '/api/snapshots' || url.pathname.startsWith('/api/snapshots/')) {
    if (!sim.hasPersistence()) {
      sendJson(res, 503, { ok: false, message: 'snapshots are unavailable' });
      return;
    }
  }

  if (req.method === 'GET' && url.pathname === '/api/snapshots') {
    const limitRaw = url.searchParams.get('limit');
    const parsedLimit = Number(limitRaw);
    const limit = limitRaw !== null && Number.isFinite(parsedLimit)
      ? Math.min(200, Math.max(1, Math.floor(parsedLimit)))
      : 50;
    sendJson(res, 200, { ok: true, snapshots: sim.listSnapshots(limit) });
    return;
  }

  if (req.method === 'POST' && url.pathname === '/api/snapshots') {
    let body: unknown;
    try {
      body = await readJsonBody(req, MAX_JSON_BODY_BYTES);
    } catch (err) {
      sendJson(res, 400, { ok: false, message: describeError(err) });
      return;
    }
    const name = body && typeof body === 'object' && 'name' in body && typeof body.name === 'string'
      ? body.name.trim()
      : '';
    if (!name) {
      sendJson(res, 400, { ok: false, message: 'snapshot name is required' });
      return;
    }
    try {
      const snapshotId = sim.saveSnapshot(name);
      sendJson(res, 200, { ok: true, snapshotId });
    } catch (err) {
      sendJson(res, 400, { ok: false, message: describeError(err) });
    }
    return;
  }

  const loadMatch = /^\/api\/snapshots\/([^/]+)\/load$/.exec(url.pathname);
  if (req.method === 'POST' && loadMatch) {
    const id = Number(loadMatch[1]);
    if (!Number.isInteger(id) || id < 1) {
      sendJson(res, 400, { ok: false, message: 'snapshot id must be a positive integer' });
      return;
    }
    try {
      const snapshot = sim.loadSnapshot(id);
      if (!snapshot) {
        sendJson(res, 404, { ok: false, message: 'snapshot not found' });
        return;
      }
      sendJson(res, 200, {
        ok: true,
        id: snapshot.id,
        name: snapshot.name,
        width: snapshot.width,
        height: snapshot.height
      });
    } catch (err) {
      sendJson(res, 422, { ok: false, message: describeError(err) });
    }
    return;
  }

  res.statusCode = 404;
  res.end('Not found');
}

/**
 * Map a load failure to a status: missing file 404, other I/O 500, bad content 422.
 * @param err - Error from SimServer.loadFromFile.
 * @returns HTTP status code.
 */
export function loadFailureStatus(err: unknown): number {
  if (err instanceof CodecError) {
    if (err.kind === 'malformed') return 422;
    return err.code === 'ENOENT' ? 404 : 500;
  }
  return 500;
}

function sendJson(res: ServerResponse, status: number, payload: unknown): void {
  res.statusCode = status;
  res.setHeader('Content-Type', 'application/json');
  res.end(JSON.stringify(payload));
}

async function readBody(req: IncomingMessage, limitBytes: number): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let total = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    total += buf.length;
    if (total > limitBytes) {
      throw new Error('payload too large');
    }
    chunks.push(buf);
  }
  return Buffer.concat(chunks);
}

async function readJsonBody(req: IncomingMessage, limitBytes: number): Promise<unknown> {
  const text = (await readBody(req, limitBytes)).toString('utf8');
  if (!text) return {};
  const parsed: unknown = JSON.parse(text);
  return parsed;
}
