import { describe, expect, it } from 'vitest';
import {
  attempt,
  CommandError,
  ConnectionError,
  InvalidArgumentError,
  isStreamError,
  toStreamError,
} from '../src/core/errors';
import { ReplyError } from './support/fake-stream-server';

describe('toStreamError', () => {
  it('classifies server replies as command errors', () => {
    const cause = new ReplyError('NOGROUP No such key');
    const error = toStreamError(cause, 'XREADGROUP');
    expect(error).toBeInstanceOf(CommandError);
    expect(error.kind).toBe('command');
    expect(error.name).toBe('CommandError');
    expect(error.message).toBe('XREADGROUP: NOGROUP No such key');
    expect(error.cause).toBe(cause);
  });

  it('classifies anything else as a connection error', () => {
    expect(toStreamError(new Error('read ECONNRESET'), 'XACK').kind).toBe('connection');

    const fromString = toStreamError('socket hang up', 'PING');
    expect(fromString).toBeInstanceOf(ConnectionError);
    expect(fromString.message).toBe('PING: socket hang up');
  });

  it('passes stream errors through untouched', () => {
    const original = new InvalidArgumentError('bad id');
    expect(toStreamError(original, 'XACK')).toBe(original);
  });
});

describe('isStreamError', () => {
  it('recognises only the library errors', () => {
    expect(isStreamError(new ConnectionError('down'))).toBe(true);
    expect(isStreamError(new Error('down'))).toBe(false);
    expect(isStreamError({ kind: 'connection' })).toBe(false);
  });
});

describe('attempt', () => {
  it('wraps a resolved value', async () => {
    expect(await attempt('PING', async () => 'PONG')).toEqual({ ok: true, value: 'PONG' });
  });

  it('captures a rejection', async () => {
    const result = await attempt('XADD', () => Promise.reject(new ReplyError('ERR wrong number of arguments')));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('command');
      expect(result.error.message).toBe('XADD: ERR wrong number of arguments');
    }
  });
});
