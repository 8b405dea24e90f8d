/**
 * Error types raised by the producer.
 * Per-feature rejections are counted, never thrown; these cover the failures that end
 * a fetch, a source or the whole run.
 */

export type ProducerErrorCode =
  | 'CONFIG_INVALID'
  | 'FATAL_TRANSPORT'
  | 'STATE_CORRUPTED'
  | 'STATE_PERSISTENCE_FAILED';

export class ProducerError extends Error {
  readonly code: ProducerErrorCode;

  constructor(message: string, code: ProducerErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends ProducerError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'CONFIG_INVALID');
    this.issues = issues;
  }
}

/**
 * Connection-level failure (DNS, reset, timeout without a response).
 * Ends the current source's run; HTTP error responses are handled inside the client instead.
 */
export class FatalTransportError extends ProducerError {
  readonly url: string;

  constructor(url: string, cause: unknown) {
    super(`Transport failure while fetching ${url}: ${describeError(cause)}`, 'FATAL_TRANSPORT', { cause });
    this.url = url;
  }
}

export class StateCorruptedError extends ProducerError {
  constructor(location: string, detail: string) {
    super(`State document at ${location} is not valid: ${detail}`, 'STATE_CORRUPTED');
  }
}

export class StatePersistenceError extends ProducerError {
  constructor(location: string, cause: unknown) {
    super(`Failed to persist state to ${location}: ${describeError(cause)}`, 'STATE_PERSISTENCE_FAILED', { cause });
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}
