import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { createLogger } from './logger.ts';
import { connect, ofType, startServerWithGuard } from './testHarness.ts';

/** Resolves with the close code once the socket closes. */
function closeCode(client: ReturnType<typeof connect>): Promise<number> {
  return new Promise((resolve) => {
    client.ws.once('close', (code: number) => resolve(code));
  });
}

describe('security: websocket input', () => {
  let tmpDir = '';

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'lifegrid-security-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('closes the socket on malformed input', async () => {
    const server = await startServerWithGuard({ saveFile: path.join(tmpDir, 'save.lgrd') });
    if (!server) return;
    const invalidJson = connect(server.wsUrl);
    const binary = connect(server.wsUrl);
    const duplicate = connect(server.wsUrl);

    try {
      await Promise.all([invalidJson.opened, binary.opened, duplicate.opened]);

      const invalidClosed = closeCode(invalidJson);
      invalidJson.ws.send('{not json');
      expect(await invalidClosed).toBe(1008);
      expect(ofType(invalidJson.inbox, 'error')[0]?.['message']).toBe('invalid JSON');

      const binaryClosed = closeCode(binary);
      binary.send({ type: 'hello', clientType: 'script', version: 1 });
      await binary.waitFor(box => ofType(box, 'welcome').length > 0, 'welcome');
      binary.ws.send(new Uint8Array([1, 2, 3]));
      expect(await binaryClosed).toBe(1008);
      expect(ofType(binary.inbox, 'error')[0]?.['message']).toBe('binary messages are not supported');

      const duplicateClosed = closeCode(duplicate);
      duplicate.send({ type: 'hello', clientType: 'ui', version: 1 });
      duplicate.send({ type: 'hello', clientType: 'ui', version: 1 });
      expect(await duplicateClosed).toBe(1008);
      expect(ofType(duplicate.inbox, 'error')[0]?.['message']).toBe('duplicate hello');
    } finally {
      invalidJson.ws.close();
      binary.ws.close();
      duplicate.ws.close();
      await server.close();
    }
  }, 20000);

  it('drops oversized messages and keeps serving', async () => {
    const lines: string[] = [];
    const logger = createLogger('warn', (_level, line) => lines.push(line));
    const uncaught: unknown[] = [];
    const onUncaught = (err: unknown) => uncaught.push(err);
    process.on('uncaughtException', onUncaught);

    const server = await startServerWithGuard({ saveFile: path.join(tmpDir, 'save.lgrd') }, logger);
    if (!server) {
      process.off('uncaughtException', onUncaught);
      return;
    }
    const client = connect(server.wsUrl);
    const next = connect(server.wsUrl);

    try {
      await client.opened;
      const closed = closeCode(client);
      client.send({ type: 'hello', clientType: 'ui', version: 1, padding: 'x'.repeat(20000) });
      expect(await closed).toBe(1009);
      expect(ofType(client.inbox, 'welcome')).toEqual([]);

      await next.opened;
      next.send({ type: 'hello', clientType: 'ui', version: 1 });
      await next.waitFor(box => ofType(box, 'welcome').length > 0, 'welcome');

      expect(uncaught).toEqual([]);
      expect(lines.some(line => /\| warn \| ws \| connection \d+: Max payload size exceeded$/.test(line))).toBe(true);
    } finally {
      process.off('uncaughtException', onUncaught);
      client.ws.close();
      next.ws.close();
      await server.close();
    }
  }, 20000);

  it('ignores client-supplied paths on save and load', async () => {
    const saveFile = path.join(tmpDir, 'save.lgrd');
    const elsewhere = path.join(tmpDir, 'elsewhere.lgrd');
    const server = await startServerWithGuard({ saveFile });
    if (!server) return;
    const client = connect(server.wsUrl);

    try {
      await client.opened;
      client.send({ type: 'hello', clientType: 'script', version: 1 });
      client.send({ type: 'save', path: elsewhere });
      await client.waitFor(box => ofType(box, 'saved').length > 0, 'saved');
    } finally {
      client.ws.close();
      await server.close();
    }

    expect(fs.existsSync(saveFile)).toBe(true);
    expect(fs.existsSync(elsewhere)).toBe(false);
  }, 20000);
});
