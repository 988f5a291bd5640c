import { TextDecoder } from 'util';
import { AuthProvider } from '../auth';
import { TimeoutConfig } from '../core/config';
import { HttpMethod, SERVICE_PATH_PREFIX } from '../core/constants';
import { ResponseBody, ServiceResponse } from '../core/entities/service_response';
import {
  ClientClosedError,
  OrchidClientError,
  ResponseDecodeError,
  TimeoutError,
  TimeoutPhase,
  TransportError,
  TransportErrorKind
} from '../core/errors';
import { isJsonObject, JsonObject, JsonValue, parseJson, stringifyJson } from '../core/utils/json';

/**
 * Request body accepted by the dispatcher. A plain mapping is serialized to
 * JSON; byte buffers and strings are sent as they are.
 */
export type RequestBody = JsonObject | Uint8Array | ArrayBuffer | string;

export type QueryValue = string | number | bigint | boolean | undefined;

export type ResourceId = string | number;

/**
 * Comma-separated list, or the list itself.
 */
export type IdList = string | ReadonlyArray<ResourceId>;

/**
 * Everything the dispatcher needs besides the request itself.
 */
export interface DispatchContext {
  /** Server address without trailing slash */
  address: string;
  transport: typeof fetch;
  timeout: TimeoutConfig;
  authProvider: AuthProvider;
  /** Aborted when the owning client is closed */
  closeSignal?: AbortSignal;
}

interface SerializedBody {
  body?: string | Uint8Array | ArrayBuffer;
  contentType?: string;
}

const TLS_ERROR_CODE = /^(ERR_TLS_|ERR_SSL_|CERT_|UNABLE_TO_|DEPTH_ZERO_SELF_SIGNED_CERT|SELF_SIGNED_CERT_IN_CHAIN)/;
const DNS_ERROR_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN', 'EAI_FAIL', 'EAI_NODATA']);
const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'ETIMEDOUT',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_CLOSED'
]);

/**
 * Send a single request to the Orchid service API and decode the response.
 *
 * There is exactly one round trip per call. HTTP error statuses are returned
 * as ordinary responses; only transport failures, timeouts, undecodable JSON
 * and closed clients are thrown.
 */
export async function makeRequest(
  method: HttpMethod,
  path: string,
  context: DispatchContext,
  body?: RequestBody
): Promise<ServiceResponse> {
  const { closeSignal, timeout } = context;
  if (closeSignal?.aborted) {
    throw new ClientClosedError();
  }

  const url = buildServiceUrl(context.address, path);
  const payload = serializeBody(body);
  const headers: Record<string, string> = {};
  const { authorizationHeader } = await context.authProvider.authenticate();
  // close() may have run while the credential resolved
  if (closeSignal?.aborted) {
    throw new ClientClosedError();
  }
  if (authorizationHeader) {
    headers['Authorization'] = authorizationHeader;
  }
  if (payload.contentType) {
    headers['Content-Type'] = payload.contentType;
  }

  const controller = new AbortController();

  try {
    const response = await interruptible(
      context.transport(url, { method, headers, body: payload.body, signal: controller.signal }),
      'connect',
      timeout.connectMs,
      controller,
      closeSignal
    );
    const raw = new Uint8Array(
      await interruptible(response.arrayBuffer(), 'read', timeout.readMs, controller, closeSignal)
    );
    const contentType = response.headers.get('content-type') ?? '';

    return {
      status: response.status,
      statusText: response.statusText,
      ok: response.ok,
      url,
      headers: response.headers,
      contentType,
      raw,
      body: decodeResponseBody(contentType, raw)
    };
  } catch (error) {
    throw toClientError(error, method, url, closeSignal);
  }
}

/**
 * Build the absolute URL of a service path. Leading slashes on the path are
 * ignored: `/cameras` and `cameras` both map to `<address>/service/cameras`.
 */
export function buildServiceUrl(address: string, path: string): string {
  return `${address}/${SERVICE_PATH_PREFIX}/${path.replace(/^\/+/, '')}`;
}

/**
 * Serialize a structured body to JSON text. Anything else passes through untouched.
 */
export function serializeBody(body?: RequestBody): SerializedBody {
  if (body === undefined) {
    return {};
  }
  if (isJsonObject(body)) {
    return { body: stringifyJson(body), contentType: 'application/json' };
  }
  return { body };
}

/**
 * Decode a response body according to its content type:
 * - `application/json` → parsed JSON
 * - any other type containing `text` → string in the declared charset
 * - anything else, including a missing content type → raw bytes
 *
 * @throws ResponseDecodeError if a JSON body does not parse, empty bodies included
 */
export function decodeResponseBody(contentType: string, raw: Uint8Array): ResponseBody {
  const normalized = contentType.toLowerCase();

  if (normalized.includes('application/json')) {
    return { type: 'json', value: decodeJson(contentType, raw) };
  }
  if (normalized.includes('text')) {
    return { type: 'text', value: decodeText(normalized, raw) };
  }
  return { type: 'bytes', value: raw };
}

/**
 * Append query parameters to a path. Parameters whose value is `undefined` are
 * left out entirely; `0`, `false` and empty strings are sent as given.
 */
export function withQuery(path: string, params: Record<string, QueryValue>): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) {
      continue;
    }
    search.append(key, String(value));
  }

  const query = search.toString();
  return query ? `${path}?${query}` : path;
}

/**
 * Join an ID or event type filter into the comma-separated form the server
 * expects. An empty list means no filter.
 */
export function joinIds(ids?: IdList): string | undefined {
  if (ids === undefined) {
    return undefined;
  }
  const joined = typeof ids === 'string' ? ids : ids.join(',');
  return joined.length > 0 ? joined : undefined;
}

/**
 * Encode an identifier for use as a single path segment.
 */
export function segment(id: ResourceId): string {
  return encodeURIComponent(String(id));
}

function decodeJson(contentType: string, raw: Uint8Array): JsonValue {
  try {
    return parseJson(decodeText(contentType.toLowerCase(), raw));
  } catch (error) {
    throw new ResponseDecodeError(contentType, error);
  }
}

function decodeText(normalizedContentType: string, raw: Uint8Array): string {
  const charset = normalizedContentType.match(/charset=\s*"?([^";\s]+)"?/)?.[1] ?? 'utf-8';

  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(charset);
  } catch (error) {
    console.debug(`Unsupported response charset '${charset}', decoding as utf-8: ${String(error)}`);
    decoder = new TextDecoder('utf-8');
  }
  return decoder.decode(raw);
}

/**
 * Race an in-flight operation against its timeout and the client's close signal.
 * Either interruption also aborts the underlying request.
 */
function interruptible<T>(
  operation: Promise<T>,
  phase: TimeoutPhase,
  timeoutMs: number,
  controller: AbortController,
  closeSignal?: AbortSignal
): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  let onClose: (() => void) | undefined;

  const interruption = new Promise<never>((_, reject) => {
    // Reject before aborting so the interruption settles ahead of the aborted request.
    const interrupt = (error: OrchidClientError) => {
      reject(error);
      controller.abort();
    };

    timeoutId = setTimeout(() => interrupt(new TimeoutError(phase, timeoutMs)), timeoutMs);

    if (closeSignal?.aborted) {
      interrupt(new ClientClosedError());
    } else if (closeSignal) {
      onClose = () => interrupt(new ClientClosedError());
      closeSignal.addEventListener('abort', onClose, { once: true });
    }
  });

  return Promise.race([operation, interruption]).finally(() => {
    clearTimeout(timeoutId);
    if (onClose) {
      closeSignal?.removeEventListener('abort', onClose);
    }
  });
}

function toClientError(
  error: unknown,
  method: HttpMethod,
  url: string,
  closeSignal?: AbortSignal
): OrchidClientError {
  if (error instanceof OrchidClientError) {
    return error;
  }
  if (closeSignal?.aborted) {
    return new ClientClosedError();
  }

  const code = getErrorCode(error);
  const kind = classifyTransportFailure(code);
  const reason = code ?? (error instanceof Error ? error.message : String(error));
  return new TransportError(`${method} ${url} failed: ${reason}`, kind, code, error);
}

function classifyTransportFailure(code?: string): TransportErrorKind {
  if (!code) {
    return 'unknown';
  }
  if (DNS_ERROR_CODES.has(code)) {
    return 'dns';
  }
  if (TLS_ERROR_CODE.test(code)) {
    return 'tls';
  }
  if (CONNECTION_ERROR_CODES.has(code)) {
    return 'connection';
  }
  return 'unknown';
}

/**
 * Find the system error code of a failed fetch. Node reports it on the
 * `cause` of the TypeError, or on the first error of an AggregateError when
 * several addresses were tried.
 */
function getErrorCode(error: unknown): string | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < 4 && current instanceof Error; depth++) {
    if ('code' in current && typeof current.code === 'string') {
      return current.code;
    }
    if (current instanceof AggregateError && current.errors.length > 0) {
      current = current.errors[0];
      continue;
    }
    current = current.cause;
  }
  return undefined;
}
