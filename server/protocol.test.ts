import { describe, it, expect } from 'vitest';
import { parseClientMessage } from './protocol.ts';

describe('server protocol', () => {
  it('accepts a valid hello message', () => {
    const msg = parseClientMessage({ type: 'hello', clientType: 'ui', version: 1 });
    expect(msg?.type).toBe('hello');
  });

  it('rejects hello with NaN version', () => {
    const msg = parseClientMessage({
      type: 'hello',
      clientType: 'ui',
      version: Number.NaN
    });
    expect(msg).toBeNull();
  });

  it('rejects hello from an unknown client type', () => {
    expect(parseClientMessage({ type: 'hello', clientType: 'bot', version: 1 })).toBeNull();
  });

  it('accepts a toggle with integer coordinates', () => {
    const msg = parseClientMessage({ type: 'toggle', x: 3, y: 0 });
    expect(msg).toEqual({ type: 'toggle', x: 3, y: 0 });
  });

  it('rejects toggles with negative or fractional coordinates', () => {
    expect(parseClientMessage({ type: 'toggle', x: -1, y: 0 })).toBeNull();
    expect(parseClientMessage({ type: 'toggle', x: 1.5, y: 0 })).toBeNull();
    expect(parseClientMessage({ type: 'toggle', x: 1 })).toBeNull();
  });

  it('accepts randomize with and without density', () => {
    expect(parseClientMessage({ type: 'randomize' })).toEqual({ type: 'randomize' });
    expect(parseClientMessage({ type: 'randomize', density: 0.25 })).toEqual({
      type: 'randomize',
      density: 0.25
    });
    expect(parseClientMessage({ type: 'randomize', density: 1.5 })).toBeNull();
  });

  it('strips extra fields from bare commands', () => {
    for (const type of ['pause', 'resume', 'step', 'clear', 'save', 'load']) {
      expect(parseClientMessage({ type, path: '/etc/passwd' })).toEqual({ type });
    }
  });

  it('rejects unknown and untyped messages', () => {
    expect(parseClientMessage({ type: 'action', turn: 1 })).toBeNull();
    expect(parseClientMessage({ kind: 'pause' })).toBeNull();
    expect(parseClientMessage('pause')).toBeNull();
    expect(parseClientMessage(null)).toBeNull();
  });
});
