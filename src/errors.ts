import { HttpError } from './http.js';

/** Missing or malformed configuration / credentials. Fatal at startup. */
export class ConfigError extends Error {
  override readonly name = 'ConfigError';
}

/** The remote entity vanished between enumeration and the operation. */
export class RemoteNotFoundError extends Error {
  override readonly name = 'RemoteNotFoundError';

  constructor(
    public readonly kind: 'item' | 'collection',
    public readonly id: string,
  ) {
    super(`${kind} ${id} not found`);
  }
}

/** Network, auth or rate-limit failure on a single remote operation. */
export class RemoteTransientError extends Error {
  override readonly name = 'RemoteTransientError';

  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class ParseError extends Error {
  override readonly name = 'ParseError';

  constructor(
    message: string,
    public readonly input: string,
  ) {
    super(message);
  }
}

export function isNotFound(e: unknown): boolean {
  if (e instanceof RemoteNotFoundError) return true;
  return e instanceof HttpError && e.status === 404;
}

/**
 * Normalize a provider failure: 404 becomes RemoteNotFoundError, everything
 * else a RemoteTransientError carrying the original as cause.
 */
export function toRemoteError(e: unknown, kind: 'item' | 'collection', id: string): Error {
  if (e instanceof RemoteNotFoundError || e instanceof RemoteTransientError) return e;
  if (isNotFound(e)) return new RemoteNotFoundError(kind, id);
  const status = e instanceof HttpError ? e.status : undefined;
  return new RemoteTransientError(errorMessage(e), status, { cause: e });
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Deleting something that is already gone counts as success. */
export async function ignoreNotFound(op: Promise<void>): Promise<void> {
  try {
    await op;
  } catch (e) {
    if (!isNotFound(e)) throw e;
  }
}
