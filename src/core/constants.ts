/**
 * Constants for the Orchid client
 */

/**
 * Prefix every API path lives under on an Orchid server.
 */
export const SERVICE_PATH_PREFIX = 'service';

/**
 * Default connect and read timeout (30 seconds each).
 */
export const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Longest delay a timer accepts (2^31 - 1 ms, about 24.8 days).
 */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export const HttpMethod = {
  GET: 'GET',
  POST: 'POST',
  PUT: 'PUT',
  PATCH: 'PATCH',
  DELETE: 'DELETE'
} as const;

export type HttpMethod = (typeof HttpMethod)[keyof typeof HttpMethod];

export const SessionType = {
  USER: 'user',
  REMOTE: 'remote'
} as const;

export type SessionType = (typeof SessionType)[keyof typeof SessionType];

export const SessionCookie = {
  PERSISTENT: 'persistent',
  SESSION: 'session'
} as const;

export type SessionCookie = (typeof SessionCookie)[keyof typeof SessionCookie];

export const UserRole = {
  ADMINISTRATOR: 'Administrator',
  MANAGER: 'Manager',
  LIVE_VIEWER: 'Live Viewer',
  VIEWER: 'Viewer'
} as const;

export type UserRole = (typeof UserRole)[keyof typeof UserRole];

/**
 * Container formats accepted by the stream export endpoint.
 */
export const ExportContainer = {
  MKV: 'mkv',
  MOV: 'mov',
  MP4: 'mp4',
  DEWARP: 'dewarp',
  DEWARP_PARENT: 'dewarp-parent'
} as const;

export type ExportContainer = (typeof ExportContainer)[keyof typeof ExportContainer];

export const LogFormat = {
  GZIP: 'gzip',
  TEXT: 'text'
} as const;

export type LogFormat = (typeof LogFormat)[keyof typeof LogFormat];

/**
 * How a low-bandwidth stream delivers its frames.
 */
export const LbmTransport = {
  HTTP: 'http',
  WEBSOCKET_BASE64: 'websocket-base64'
} as const;

export type LbmTransport = (typeof LbmTransport)[keyof typeof LbmTransport];

export const CameraDriver = {
  ONVIF: 'ONVIF',
  GENERIC_RTSP: 'Generic RTSP'
} as const;

export type CameraDriver = (typeof CameraDriver)[keyof typeof CameraDriver];
