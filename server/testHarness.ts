import WebSocket, { type RawData } from 'ws';
import { startServer, type RunningServer } from './index.ts';
import { DEFAULT_CONFIG, type ServerConfig } from './config.ts';
import type { Logger } from './logger.ts';

function errorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  return typeof err.code === 'string' ? err.code : undefined;
}

/**
 * Starts an in-process server on an ephemeral port with an in-memory
 * snapshot database. Returns null when permissions prevent binding.
 * @param overrides - Config fields to change for the test.
 * @param logger - Logger for the server; defaults to one at the config's level.
 * @returns Server handle or null when the port is unavailable.
 */
export async function startServerWithGuard(
  overrides: Partial<ServerConfig> = {},
  logger?: Logger
): Promise<RunningServer | null> {
  const isEperm = (err: unknown): boolean => errorCode(err) === 'EPERM';
  const startPromise = startServer({
    ...DEFAULT_CONFIG,
    port: 0,
    width: 16,
    height: 12,
    pattern: 'glider',
    startPaused: true,
    dbPath: ':memory:',
    logLevel: 'error',
    ...overrides
  }, logger).catch((err: unknown) => {
    if (isEperm(err)) return null;
    throw err;
  });

  let cleanup = () => {};
  const guard = new Promise<null>((resolve) => {
    const handler = (err: unknown) => {
      if (isEperm(err)) {
        resolve(null);
        return;
      }
      throw err;
    };
    process.once('uncaughtException', handler);
    cleanup = () => process.off('uncaughtException', handler);
  });

  try {
    return await Promise.race([startPromise, guard]);
  } finally {
    cleanup();
  }
}

/** Messages and frames received by a test client. */
export interface Inbox {
  json: Array<Record<string, unknown>>;
  frames: Uint8Array[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Parses WS text payloads into JSON objects when possible.
 * @param data - Raw websocket payload.
 * @returns Parsed JSON object or null on failure.
 */
function parseJsonMessage(data: RawData): Record<string, unknown> | null {
  let text: string;
  if (Array.isArray(data)) text = Buffer.concat(data).toString('utf8');
  else if (Buffer.isBuffer(data)) text = data.toString('utf8');
  else text = Buffer.from(data).toString('utf8');
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function toBytes(data: RawData): Uint8Array {
  if (Array.isArray(data)) return new Uint8Array(Buffer.concat(data));
  return new Uint8Array(data);
}

/**
 * Open a client that records everything it receives.
 * @param url - Server WebSocket URL.
 */
export function connect(url: string) {
  const ws = new WebSocket(url);
  const inbox: Inbox = { json: [], frames: [] };
  const waiters = new Set<() => void>();

  ws.on('message', (data: RawData, isBinary: boolean) => {
    if (isBinary) {
      inbox.frames.push(toBytes(data));
    } else {
      const msg = parseJsonMessage(data);
      if (msg) inbox.json.push(msg);
    }
    for (const check of waiters) check();
  });

  const opened = new Promise<void>((resolve, reject) => {
    ws.once('open', () => resolve());
    ws.once('error', reject);
  });

  const waitFor = (predicate: (box: Inbox) => boolean, label: string) =>
    new Promise<void>((resolve, reject) => {
      const timeout = setTimeout(() => {
        waiters.delete(check);
        reject(new Error(`timed out waiting for ${label}`));
      }, 4000);
      const check = () => {
        if (!predicate(inbox)) return;
        clearTimeout(timeout);
        waiters.delete(check);
        resolve();
      };
      waiters.add(check);
      check();
    });

  const send = (msg: Record<string, unknown>) => ws.send(JSON.stringify(msg));

  return { ws, inbox, opened, waitFor, send };
}

export const ofType = (box: Inbox, type: string) => box.json.filter(msg => msg['type'] === type);
