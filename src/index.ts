export { OrchidClient, getSessionToken } from './clients';
export type {
  ArchiveQueryOptions,
  EventQueryOptions,
  HistogramQueryOptions,
  LbmStreamOptions,
  OnvifCameraOptions,
  RemoteSessionOptions,
  RequestBody,
  ResourceId,
  IdList,
  ServerEventQueryOptions,
  ServerLogOptions,
  StreamEventQueryOptions,
  StreamFrameOptions
} from './clients';
export {
  BasicAuthProvider,
  BearerTokenProvider,
  NoAuthProvider,
  createIssuerToken,
  encodeIssuerKey,
  generateIssuerSecret,
  resolveAuthProvider
} from './auth';
export type { AuthOptions, AuthProvider, AuthResult, CredentialType, IssuerKey } from './auth';
export type { OrchidClientOptions, TimeoutConfig } from './core/config';

// Export entities
export * from './core/constants';
export * from './core/errors';
export type {
  BytesBody,
  JsonBody,
  ResponseBody,
  ResponseBodyType,
  ServiceResponse,
  TextBody
} from './core/entities/service_response';
export type { JsonObject, JsonValue } from './core/utils/json';
