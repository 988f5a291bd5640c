import { AuthOptions } from '../auth';
import { DEFAULT_TIMEOUT_MS, MAX_TIMEOUT_MS } from './constants';

/**
 * Validate that a URI has a proper protocol (http or https)
 * @param uri The URI to validate
 * @returns true if valid, false otherwise
 */
function isValidHttpUri(uri: string): boolean {
  try {
    const url = new URL(uri);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Independent connect and read timeouts, in milliseconds.
 */
export interface TimeoutConfig {
  /** Time allowed until the response headers arrive */
  connectMs: number;
  /** Time allowed to read the response body */
  readMs: number;
}

/**
 * Configuration options for an Orchid client
 */
export interface OrchidClientOptions extends AuthOptions {
  /**
   * Address of the Orchid Core VMS server, e.g. "https://vms.example.com:8080".
   * API calls go to `<address>/service/<path>`.
   */
  address: string;

  /**
   * Timeout for HTTP requests in milliseconds. A single number sets both the
   * connect and the read timeout. Defaults to 30 seconds each.
   */
  timeout?: number | Partial<TimeoutConfig>;

  /**
   * Transport used to send requests. Defaults to the global `fetch`.
   */
  transport?: typeof fetch;
}

/**
 * Fully resolved client configuration.
 */
export interface OrchidClientConfig {
  /** Server address without trailing slashes */
  address: string;
  timeout: TimeoutConfig;
  transport: typeof fetch;
}

/**
 * Validate the constructor options and fill in defaults.
 *
 * @throws Error if the address is not an HTTP(S) URL or a timeout is not a positive number
 */
export function resolveClientConfig(options: OrchidClientOptions): OrchidClientConfig {
  if (!options.address) {
    throw new Error('An Orchid server address is required, please provide the address option');
  }

  if (typeof options.address !== 'string') {
    throw new Error('address must be a string');
  }

  if (!isValidHttpUri(options.address)) {
    throw new Error(
      `Invalid address: '${options.address}'. Must be a valid HTTP or HTTPS URL.`
    );
  }

  return {
    address: options.address.replace(/\/+$/, ''),
    timeout: resolveTimeout(options.timeout),
    transport: options.transport ?? ((input, init) => globalThis.fetch(input, init))
  };
}

/**
 * Expand the timeout option into separate connect and read timeouts.
 */
export function resolveTimeout(timeout?: number | Partial<TimeoutConfig>): TimeoutConfig {
  if (timeout === undefined) {
    return { connectMs: DEFAULT_TIMEOUT_MS, readMs: DEFAULT_TIMEOUT_MS };
  }

  if (typeof timeout === 'number') {
    return { connectMs: validateTimeout('timeout', timeout), readMs: timeout };
  }

  return {
    connectMs: validateTimeout('timeout.connectMs', timeout.connectMs ?? DEFAULT_TIMEOUT_MS),
    readMs: validateTimeout('timeout.readMs', timeout.readMs ?? DEFAULT_TIMEOUT_MS)
  };
}

function validateTimeout(name: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${name} must be a positive number of milliseconds, got ${value}`);
  }
  if (value > MAX_TIMEOUT_MS) {
    throw new Error(`${name} must not exceed ${MAX_TIMEOUT_MS} milliseconds, got ${value}`);
  }
  return value;
}
