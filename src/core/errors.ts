/**
 * Error kinds surfaced by every stream operation.
 * Operations return a StreamResult instead of throwing.
 */

export type StreamErrorKind =
  | 'connection'
  | 'command'
  | 'empty-reply'
  | 'timeout'
  | 'invalid-argument';

abstract class BaseStreamError extends Error {
  abstract readonly kind: StreamErrorKind;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
  }
}

/** Transport-level failure, possibly transient */
export class ConnectionError extends BaseStreamError {
  readonly kind = 'connection';
  name = 'ConnectionError';
}

/** The server rejected the request (bad arguments, missing group or stream) */
export class CommandError extends BaseStreamError {
  readonly kind = 'command';
  name = 'CommandError';
}

/** The server answered with a reply shape the client cannot interpret */
export class EmptyReplyError extends BaseStreamError {
  readonly kind = 'empty-reply';
  name = 'EmptyReplyError';
}

/** A connection did not become ready in time */
export class TimeoutError extends BaseStreamError {
  readonly kind = 'timeout';
  name = 'TimeoutError';
}

/** Rejected locally before any command was sent */
export class InvalidArgumentError extends BaseStreamError {
  readonly kind = 'invalid-argument';
  name = 'InvalidArgumentError';
}

export type StreamError =
  | ConnectionError
  | CommandError
  | EmptyReplyError
  | TimeoutError
  | InvalidArgumentError;

export type StreamResult<T> = { ok: true; value: T } | { ok: false; error: StreamError };

export function ok<T>(value: T): StreamResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: StreamError): StreamResult<T> {
  return { ok: false, error };
}

export function isStreamError(value: unknown): value is StreamError {
  return value instanceof BaseStreamError;
}

/**
 * Classify anything thrown by a round trip.
 * ioredis raises ReplyError for server-side rejections; everything else is transport.
 */
export function toStreamError(err: unknown, context: string): StreamError {
  if (isStreamError(err)) {
    return err;
  }

  if (err instanceof Error) {
    if (err.name === 'ReplyError') {
      return new CommandError(`${context}: ${err.message}`, err);
    }
    return new ConnectionError(`${context}: ${err.message}`, err);
  }

  return new ConnectionError(`${context}: ${String(err)}`, err);
}

/**
 * Run one command and capture its failure as a value
 */
export async function attempt<T>(context: string, op: () => Promise<T>): Promise<StreamResult<T>> {
  try {
    return ok(await op());
  } catch (err) {
    return fail(toStreamError(err, context));
  }
}
