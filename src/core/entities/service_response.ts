import type { JsonValue } from '../utils/json';

/**
 * Body decoded from an `application/json` response.
 */
export interface JsonBody {
  type: 'json';
  value: JsonValue;
}

/**
 * Body decoded from any other text-based response (`text/plain`, `text/csv`, ...).
 */
export interface TextBody {
  type: 'text';
  value: string;
}

/**
 * Body of every other response (JPEG frames, exported video, gzipped logs).
 */
export interface BytesBody {
  type: 'bytes';
  value: Uint8Array;
}

/**
 * Response body, decoded once by the dispatcher according to the declared
 * content type.
 */
export type ResponseBody = JsonBody | TextBody | BytesBody;

export type ResponseBodyType = ResponseBody['type'];

/**
 * Envelope returned for every API call, whatever the status code.
 */
export interface ServiceResponse {
  /** HTTP status code. 4xx and 5xx are returned, not thrown. */
  status: number;
  statusText: string;
  /** Whether the status is in the 2xx range */
  ok: boolean;
  /** Absolute URL the request was sent to */
  url: string;
  headers: Headers;
  /** Value of the Content-Type header, or an empty string when absent */
  contentType: string;
  /** Body bytes as received, before decoding */
  raw: Uint8Array;
  body: ResponseBody;
}
