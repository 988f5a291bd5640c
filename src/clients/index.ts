export {
  OrchidClient,
  getSessionToken,
  type ArchiveQueryOptions,
  type EventQueryOptions,
  type HistogramQueryOptions,
  type LbmStreamOptions,
  type OnvifCameraOptions,
  type RemoteSessionOptions,
  type ServerEventQueryOptions,
  type ServerLogOptions,
  type StreamEventQueryOptions,
  type StreamFrameOptions
} from './client';
export {
  buildServiceUrl,
  decodeResponseBody,
  makeRequest,
  serializeBody,
  withQuery,
  type DispatchContext,
  type IdList,
  type QueryValue,
  type RequestBody,
  type ResourceId
} from './utils';
