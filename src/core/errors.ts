/**
 * Errors raised locally by the Orchid client.
 *
 * HTTP error statuses are never raised: a 401 or a 404 comes back as an
 * ordinary {@link ServiceResponse}. Only failures that leave no response to
 * inspect end up here.
 */

/**
 * Base class for every error thrown by the client.
 */
export class OrchidClientError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OrchidClientError';
  }
}

export type TransportErrorKind = 'dns' | 'connection' | 'tls' | 'unknown';

/**
 * The request never produced a response: name resolution, connection or TLS
 * handshake failed.
 */
export class TransportError extends OrchidClientError {
  readonly kind: TransportErrorKind;
  /** System or undici error code reported by the runtime, e.g. `ECONNREFUSED` */
  readonly code?: string;

  constructor(message: string, kind: TransportErrorKind, code?: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'TransportError';
    this.kind = kind;
    this.code = code;
  }
}

export type TimeoutPhase = 'connect' | 'read';

/**
 * The server did not answer within the configured connect or read timeout.
 */
export class TimeoutError extends OrchidClientError {
  readonly phase: TimeoutPhase;
  readonly timeoutMs: number;

  constructor(phase: TimeoutPhase, timeoutMs: number) {
    super(`Request ${phase} timeout after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.phase = phase;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The response body could not be decoded as its content type declares.
 */
export class ResponseDecodeError extends OrchidClientError {
  readonly contentType: string;

  constructor(contentType: string, cause: unknown) {
    super(`Failed to decode ${contentType} response body: ${describeCause(cause)}`, { cause });
    this.name = 'ResponseDecodeError';
    this.contentType = contentType;
  }
}

/**
 * The client was closed before or while the request ran.
 */
export class ClientClosedError extends OrchidClientError {
  constructor() {
    super('The Orchid client has been closed');
    this.name = 'ClientClosedError';
  }
}

// json-bigint throws plain objects carrying a message rather than Error instances.
function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  if (typeof cause === 'object' && cause !== null && 'message' in cause) {
    return String(cause.message);
  }
  return String(cause);
}
