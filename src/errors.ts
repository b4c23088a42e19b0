import { truncate } from './lib/text';

/** A collaborator is missing required setup (API key, OAuth tokens). Not retried. */
export class NotConfiguredError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotConfiguredError';
  }
}

/** The generation provider asked us to slow down. */
export class RateLimitedError extends Error {
  constructor(message = 'Rate limit reached') {
    super(message);
    this.name = 'RateLimitedError';
  }
}

/** The generation provider could not be reached at all. */
export class ConnectionFailedError extends Error {
  constructor(message = 'Connection to provider failed') {
    super(message);
    this.name = 'ConnectionFailedError';
  }
}

/**
 * Human-readable one-line description of a thrown value, capped at maxLen.
 * Only the first line of the message is kept so stack-like detail never reaches users.
 */
export function describeError(err: unknown, maxLen = 200): string {
  const raw = err instanceof Error ? err.message : typeof err === 'string' ? err : 'Unknown error';
  const firstLine = raw.split('\n')[0].trim() || 'Unknown error';
  return truncate(firstLine, maxLen);
}
