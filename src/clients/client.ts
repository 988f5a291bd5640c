import {
  AuthProvider,
  BearerTokenProvider,
  CredentialType,
  encodeIssuerKey,
  resolveAuthProvider
} from '../auth';
import { OrchidClientConfig, OrchidClientOptions, resolveClientConfig, TimeoutConfig } from '../core/config';
import {
  CameraDriver,
  ExportContainer,
  HttpMethod,
  LbmTransport,
  LogFormat,
  SessionCookie,
  SessionType,
  UserRole
} from '../core/constants';
import { ServiceResponse } from '../core/entities/service_response';
import { JsonObject } from '../core/utils/json';
import {
  Archives,
  CameraPtz,
  Cameras,
  CameraStreams,
  Discoverable,
  Endpoints,
  Events,
  LicenseSession,
  Logs,
  LowBandwidthStreams,
  ServerProperties,
  Servers,
  Sessions,
  Storages,
  Streams,
  Time,
  TrustedIssuer,
  UserInterface,
  Users,
  Version
} from './spec';
import { IdList, joinIds, makeRequest, RequestBody, ResourceId, withQuery } from './utils';

export interface RemoteSessionOptions {
  /** Lifetime in seconds (default 3600) */
  expiresIn?: number;
  cookie?: SessionCookie;
  scope?: Sessions.RemoteScope;
}

export interface OnvifCameraOptions {
  /** Camera name, defaults to the address */
  name?: string;
  /** Register through https instead of http */
  https?: boolean;
}

export interface StreamFrameOptions {
  /**
   * Frame time in epoch milliseconds. 0 selects the first frame of the latest archive.
   */
  time?: number;
  /** 0 keeps the native resolution */
  height?: number;
  /** 0 keeps the native resolution */
  width?: number;
  /** Return a black GIF instead of an error status when no frame is available */
  fallback?: boolean;
}

export interface ArchiveQueryOptions {
  /** Epoch milliseconds; the server substitutes the current time for 0 */
  start?: number;
  take?: number;
  offset?: number;
  /** Only list archives of this stream */
  streamId?: ResourceId;
}

export interface LbmStreamOptions {
  /** Epoch milliseconds, 0 for live */
  start?: number;
  /** Offset playback by the request latency */
  sync?: boolean;
  /** Playback rate */
  rate?: number;
  /** Longest wait (ms) for media to start playing or to bridge a gap */
  waitThreshold?: number;
  transport?: LbmTransport;
}

export interface EventQueryOptions {
  /** Epoch milliseconds; defaults to the latest event on the server */
  stop?: number;
  /** Maximum number of events; all events when omitted */
  count?: number;
  eventTypes?: IdList;
}

export interface ServerEventQueryOptions extends EventQueryOptions {
  serverIds?: IdList;
}

export interface StreamEventQueryOptions extends EventQueryOptions {
  streamIds?: IdList;
}

export interface HistogramQueryOptions {
  streamIds?: IdList;
  eventTypes?: IdList;
}

export interface ServerLogOptions {
  format?: LogFormat;
  /** Epoch milliseconds; defaults to the earliest log file */
  start?: number;
  /** Epoch milliseconds; defaults to the latest log file */
  stop?: number;
}

/**
 * Client for the Orchid Core VMS HTTP API.
 *
 * Every method performs exactly one request and resolves with the
 * {@link ServiceResponse}, whatever its status code. Check `status` to decide
 * whether the call succeeded.
 *
 * @example
 * ```typescript
 * const client = new OrchidClient({ address: 'https://vms.example.com' });
 * const session = await client.createUserSession('admin', 'test-password');
 * const token = getSessionToken(session);
 * if (token) {
 *   client.setBearerToken(token);
 * }
 * const cameras = await client.getCameras();
 * client.close();
 * ```
 */
export class OrchidClient {
  /** Orchid server address, without trailing slash */
  readonly address: string;
  /** Connect and read timeouts applied to every request */
  readonly timeout: TimeoutConfig;
  private readonly transport: typeof fetch;
  /** Credential attached to outgoing requests, replaced by setBearerToken() */
  private authProvider: AuthProvider;
  private readonly closeController = new AbortController();

  constructor(options: OrchidClientOptions) {
    const config: OrchidClientConfig = resolveClientConfig(options);
    this.address = config.address;
    this.timeout = config.timeout;
    this.transport = config.transport;
    this.authProvider = resolveAuthProvider(options);
  }

  /** The credential variant currently attached to requests */
  get authType(): CredentialType {
    return this.authProvider.type;
  }

  get closed(): boolean {
    return this.closeController.signal.aborted;
  }

  /**
   * Authenticate all subsequent requests with a bearer token, replacing any
   * basic or bearer credential set before. Use it with the ID returned by the
   * session endpoints.
   */
  setBearerToken(token: string): void {
    this.authProvider = new BearerTokenProvider(token);
  }

  /**
   * Abort in-flight requests and refuse new ones. Calling it again has no effect.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closeController.abort();
  }

  /**
   * Send a request to a service path, e.g. `request('GET', '/cameras')`.
   * The resource methods below all go through here.
   */
  request(method: HttpMethod, path: string, body?: RequestBody): Promise<ServiceResponse> {
    return makeRequest(
      method,
      path,
      {
        address: this.address,
        transport: this.transport,
        timeout: this.timeout,
        authProvider: this.authProvider,
        closeSignal: this.closeController.signal
      },
      body
    );
  }

  // === TIME SERVICES ===
  /**
   * Get the server time in epoch milliseconds (UTC). The extended response
   * also carries timezone information; the plain one is a bare number as text.
   */
  getServerTime(extended: boolean = true): Promise<ServiceResponse> {
    return this.get(Time.getEndpoint(extended));
  }

  // === TRUSTED ISSUER SERVICES ===
  /** Get the registered trusted issuer; 404 when there is none */
  getTrustedIssuer(): Promise<ServiceResponse> {
    return this.get(TrustedIssuer.getEndpoint());
  }

  /**
   * Register a trusted issuer. JWTs signed with `secret` (see
   * `createIssuerToken`) are then accepted as bearer tokens.
   *
   * @param orchidUuid - UUID of the Orchid server, as reported by `getOrchid()`
   * @param secret - 32-byte shared secret
   */
  createTrustedIssuer(
    orchidUuid: string,
    secret: Uint8Array,
    description: string = '',
    uri: string = ''
  ): Promise<ServiceResponse> {
    const payload: TrustedIssuer.Request = {
      id: orchidUuid,
      access_token: '',
      key: encodeIssuerKey(secret),
      description,
      uri
    };
    return this.post(TrustedIssuer.getCreateEndpoint(), payload);
  }

  deleteTrustedIssuer(): Promise<ServiceResponse> {
    return this.delete(TrustedIssuer.getEndpoint());
  }

  // === SESSION SERVICES ===
  /** Get the identity behind the current session */
  getSessionIdentity(): Promise<ServiceResponse> {
    return this.get(Sessions.getIdentityEndpoint());
  }

  getSessionInfo(): Promise<ServiceResponse> {
    return this.get(Sessions.getCurrentEndpoint());
  }

  /** Delete the session this client is authenticated with */
  deleteCurrentSession(): Promise<ServiceResponse> {
    return this.delete(Sessions.getCurrentEndpoint());
  }

  /**
   * Create a user session. The `id` of the returned session is a bearer token,
   * pass it to {@link setBearerToken} to use it.
   *
   * @param expiresIn - Session lifetime in seconds
   */
  createUserSession(
    username: string,
    password: string,
    expiresIn: number = 3600,
    cookie: SessionCookie = SessionCookie.SESSION
  ): Promise<ServiceResponse> {
    const payload: Sessions.CreateUserRequest = { username, password, expiresIn, cookie };
    return this.post(Sessions.getUserEndpoint(), payload);
  }

  /**
   * Create a remote session, optionally limited to a permission scope.
   * Like user sessions, the returned `id` is a bearer token.
   */
  createRemoteSession(name: string, options: RemoteSessionOptions = {}): Promise<ServiceResponse> {
    const payload: Sessions.CreateRemoteRequest = {
      name,
      expiresIn: options.expiresIn ?? 3600,
      cookie: options.cookie ?? SessionCookie.SESSION
    };
    if (options.scope) {
      payload.scope = options.scope;
    }
    return this.post(Sessions.getRemoteEndpoint(), payload);
  }

  /** List sessions, all types unless `type` is given */
  getSessions(type?: SessionType): Promise<ServiceResponse> {
    return this.get(withQuery(Sessions.getEndpoint(), { type }));
  }

  /** Delete sessions, all types unless `type` is given */
  deleteSessions(type?: SessionType): Promise<ServiceResponse> {
    return this.delete(withQuery(Sessions.getEndpoint(), { type }));
  }

  getSession(sessionId: ResourceId): Promise<ServiceResponse> {
    return this.get(Sessions.getEndpoint(sessionId));
  }

  deleteSession(sessionId: ResourceId): Promise<ServiceResponse> {
    return this.delete(Sessions.getEndpoint(sessionId));
  }

  // === DISCOVERABLE SERVICES ===
  /** Cameras found through ONVIF autodiscovery */
  getDiscoveredCameras(): Promise<ServiceResponse> {
    return this.get(Discoverable.getCamerasEndpoint());
  }

  getOrchids(): Promise<ServiceResponse> {
    return this.get(Discoverable.getOrchidsEndpoint());
  }

  getOrchid(orchidId: ResourceId = 1): Promise<ServiceResponse> {
    return this.get(Discoverable.getOrchidsEndpoint(orchidId));
  }

  // === CAMERA SERVICES ===
  getCameras(): Promise<ServiceResponse> {
    return this.get(Cameras.getEndpoint());
  }

  /**
   * Register an ONVIF camera by IP address (e.g. 192.168.202.55). The device
   * service URI is derived from the address.
   */
  registerOnvifCamera(
    address: string,
    cameraUser: string,
    password: string,
    options: OnvifCameraOptions = {}
  ): Promise<ServiceResponse> {
    const scheme = options.https ? 'https' : 'http';
    const payload = cameraRegistration(
      `${scheme}://${address}/onvif/device_service`,
      cameraUser,
      password,
      options.name || address,
      CameraDriver.ONVIF
    );
    return this.post(Cameras.getEndpoint(), payload);
  }

  /** Register a generic RTSP camera; the name defaults to the URI */
  registerRtspCamera(
    uri: string,
    cameraUser: string,
    password: string,
    name?: string
  ): Promise<ServiceResponse> {
    const payload = cameraRegistration(
      uri,
      cameraUser,
      password,
      name || uri,
      CameraDriver.GENERIC_RTSP
    );
    return this.post(Cameras.getEndpoint(), payload);
  }

  getCamera(cameraId: ResourceId): Promise<ServiceResponse> {
    return this.get(Cameras.getEndpoint(cameraId));
  }

  /** Partially update a camera */
  patchCamera(cameraId: ResourceId, body: JsonObject): Promise<ServiceResponse> {
    return this.patch(Cameras.getEndpoint(cameraId), body);
  }

  deleteCamera(cameraId: ResourceId): Promise<ServiceResponse> {
    return this.delete(Cameras.getEndpoint(cameraId));
  }

  /** Check that the camera answers pings */
  verifyCamera(cameraId: ResourceId): Promise<ServiceResponse> {
    return this.get(Cameras.getVerifyEndpoint(cameraId));
  }

  getCamerasDiskUsage(): Promise<ServiceResponse> {
    return this.get(Cameras.getDiskUsageEndpoint());
  }

  /** IANA to POSIX timezone mappings */
  getTzList(): Promise<ServiceResponse> {
    return this.get(Cameras.getTimezonesEndpoint());
  }

  getCameraPtzPosition(cameraId: ResourceId): Promise<ServiceResponse> {
    return this.get(CameraPtz.getPositionEndpoint(cameraId));
  }

  setCameraPtzPosition(cameraId: ResourceId, body: JsonObject): Promise<ServiceResponse> {
    return this.post(CameraPtz.getPositionEndpoint(cameraId), body);
  }

  getCameraPtzPresets(cameraId: ResourceId): Promise<ServiceResponse> {
    return this.get(CameraPtz.getPresetsEndpoint(cameraId));
  }

  /** Save the camera's current PTZ position as a named preset */
  setCameraPtzPreset(cameraId: ResourceId, presetName: string): Promise<ServiceResponse> {
    const payload: CameraPtz.CreatePresetRequest = { name: presetName };
    return this.post(CameraPtz.getPresetsEndpoint(cameraId), payload);
  }

  deleteCameraPtzPreset(cameraId: ResourceId, presetToken: string): Promise<ServiceResponse> {
    return this.delete(CameraPtz.getPresetsEndpoint(cameraId, presetToken));
  }

  // === STREAM SERVICES ===
  getCameraStreams(cameraId: ResourceId): Promise<ServiceResponse> {
    return this.get(CameraStreams.getEndpoint(cameraId));
  }

  registerStream(cameraId: ResourceId, body: JsonObject): Promise<ServiceResponse> {
    return this.post(CameraStreams.getEndpoint(cameraId), body);
  }

  getCameraStream(cameraId: ResourceId, streamId: ResourceId): Promise<ServiceResponse> {
    return this.get(CameraStreams.getEndpoint(cameraId, streamId));
  }

  /** Partially update a stream */
  patchStream(
    cameraId: ResourceId,
    streamId: ResourceId,
    body: JsonObject
  ): Promise<ServiceResponse> {
    return this.patch(CameraStreams.getEndpoint(cameraId, streamId), body);
  }

  /** Replace a stream */
  updateStream(
    cameraId: ResourceId,
    streamId: ResourceId,
    body: JsonObject
  ): Promise<ServiceResponse> {
    return this.put(CameraStreams.getEndpoint(cameraId, streamId), body);
  }

  deleteStream(cameraId: ResourceId, streamId: ResourceId): Promise<ServiceResponse> {
    return this.delete(CameraStreams.getEndpoint(cameraId, streamId));
  }

  restartStream(cameraId: ResourceId, streamId: ResourceId): Promise<ServiceResponse> {
    return this.patch(CameraStreams.getRestartEndpoint(cameraId, streamId));
  }

  getStreamMotionMask(cameraId: ResourceId, streamId: ResourceId): Promise<ServiceResponse> {
    return this.get(CameraStreams.getMotionMaskEndpoint(cameraId, streamId));
  }

  /**
   * Upload a motion mask.
   *
   * @param mask - PNG image of a stream frame with the motion mask drawn on it
   */
  uploadStreamMotionMask(
    cameraId: ResourceId,
    streamId: ResourceId,
    mask: Uint8Array
  ): Promise<ServiceResponse> {
    return this.put(CameraStreams.getMotionMaskEndpoint(cameraId, streamId), mask);
  }

  deleteStreamMotionMask(cameraId: ResourceId, streamId: ResourceId): Promise<ServiceResponse> {
    return this.delete(CameraStreams.getMotionMaskEndpoint(cameraId, streamId));
  }

  getStreams(): Promise<ServiceResponse> {
    return this.get(Streams.getEndpoint());
  }

  getStreamStatuses(): Promise<ServiceResponse> {
    return this.get(Streams.getStatusesEndpoint());
  }

  getStream(streamId: ResourceId): Promise<ServiceResponse> {
    return this.get(Streams.getEndpoint(streamId));
  }

  /**
   * Get a JPEG frame of a stream. All query parameters are always sent; 0 is
   * meaningful for each of them. `fallback` goes out capitalized (`True` or
   * `False`), the form the server has always received.
   */
  getStreamFrame(streamId: ResourceId, options: StreamFrameOptions = {}): Promise<ServiceResponse> {
    return this.get(
      withQuery(Streams.getFrameEndpoint(streamId), {
        time: options.time ?? 0,
        width: options.width ?? 0,
        height: options.height ?? 0,
        fallback: options.fallback ? 'True' : 'False'
      })
    );
  }

  /**
   * Export the media recorded between `start` and `stop` (epoch milliseconds).
   */
  exportStream(
    streamId: ResourceId,
    start: number,
    stop: number,
    container: ExportContainer = ExportContainer.MKV
  ): Promise<ServiceResponse> {
    return this.get(
      withQuery(Streams.getExportEndpoint(streamId), { start, stop, format: container })
    );
  }

  getStreamMetadata(cameraId: ResourceId, streamId: ResourceId): Promise<ServiceResponse> {
    return this.get(CameraStreams.getMetadataEndpoint(cameraId, streamId));
  }

  getStreamStatus(streamId: ResourceId): Promise<ServiceResponse> {
    return this.get(Streams.getStatusEndpoint(streamId));
  }

  // === ARCHIVE SERVICES ===
  getArchives(options: ArchiveQueryOptions = {}): Promise<ServiceResponse> {
    return this.get(
      withQuery(Archives.getEndpoint(), {
        start: options.start ?? 0,
        take: options.take ?? 100,
        offset: options.offset ?? 0,
        streamId: options.streamId
      })
    );
  }

  getArchive(archiveId: ResourceId): Promise<ServiceResponse> {
    return this.get(Archives.getEndpoint(archiveId));
  }

  downloadArchive(archiveId: ResourceId): Promise<ServiceResponse> {
    return this.get(Archives.getDownloadEndpoint(archiveId));
  }

  /** Number of archives generated per day */
  getArchivesPerDay(): Promise<ServiceResponse> {
    return this.get(Archives.getPerDayEndpoint());
  }

  // === LOW-BANDWIDTH STREAM SERVICES ===
  getLbmStreams(): Promise<ServiceResponse> {
    return this.get(LowBandwidthStreams.getEndpoint());
  }

  /**
   * Start a low-bandwidth stream delivering `width`x`height` frames of a stream.
   */
  createLbmStream(
    streamId: ResourceId,
    height: number,
    width: number,
    options: LbmStreamOptions = {}
  ): Promise<ServiceResponse> {
    const payload: LowBandwidthStreams.CreateRequest = {
      streamId,
      resolution: { height, width },
      startTime: options.start ?? 0,
      sync: options.sync ?? false,
      rate: options.rate ?? 1.0,
      waitThres: options.waitThreshold ?? 2000,
      transport: options.transport ?? LbmTransport.WEBSOCKET_BASE64
    };
    return this.post(LowBandwidthStreams.getEndpoint(), payload);
  }

  getLbmStream(streamUuid: string): Promise<ServiceResponse> {
    return this.get(LowBandwidthStreams.getEndpoint(streamUuid));
  }

  deleteLbmStream(streamUuid: string): Promise<ServiceResponse> {
    return this.delete(LowBandwidthStreams.getEndpoint(streamUuid));
  }

  /** Get a JPEG frame from a low-bandwidth stream created with the `http` transport */
  getLbmFrame(streamUuid: string): Promise<ServiceResponse> {
    return this.get(LowBandwidthStreams.getFrameEndpoint(streamUuid));
  }

  // === EVENT SERVICES ===
  /**
   * Get server events from `start` (epoch milliseconds) on.
   */
  getServerEvents(start: number, options: ServerEventQueryOptions = {}): Promise<ServiceResponse> {
    return this.get(
      withQuery(Events.getServerEndpoint(), eventQuery(start, options, options.serverIds))
    );
  }

  /**
   * Get camera stream events from `start` (epoch milliseconds) on.
   */
  getStreamEvents(start: number, options: StreamEventQueryOptions = {}): Promise<ServiceResponse> {
    return this.get(
      withQuery(Events.getCameraStreamEndpoint(), eventQuery(start, options, options.streamIds))
    );
  }

  /**
   * Get camera stream events binned into segments of `minSegment` milliseconds.
   */
  getCameraStreamEventHistogram(
    start: number,
    stop: number,
    minSegment: number,
    options: HistogramQueryOptions = {}
  ): Promise<ServiceResponse> {
    return this.get(
      withQuery(Events.getHistogramEndpoint(), {
        start,
        stop,
        minSegment,
        id: joinIds(options.streamIds),
        type: joinIds(options.eventTypes)
      })
    );
  }

  // === LOG SERVICES ===
  getServerLogs(options: ServerLogOptions = {}): Promise<ServiceResponse> {
    return this.get(
      withQuery(Logs.getEndpoint(), {
        format: options.format ?? LogFormat.GZIP,
        from: options.start,
        to: options.stop
      })
    );
  }

  // === USER SERVICES ===
  getUsers(): Promise<ServiceResponse> {
    return this.get(Users.getEndpoint());
  }

  createUser(
    username: string,
    password: string,
    role: UserRole = UserRole.MANAGER
  ): Promise<ServiceResponse> {
    const payload: Users.CreateRequest = { username, password, role };
    return this.post(Users.getEndpoint(), payload);
  }

  getUser(userId: ResourceId): Promise<ServiceResponse> {
    return this.get(Users.getEndpoint(userId));
  }

  /** Replace a user */
  updateUser(userId: ResourceId, body: JsonObject): Promise<ServiceResponse> {
    return this.put(Users.getEndpoint(userId), body);
  }

  /** Partially update a user */
  patchUser(userId: ResourceId, body: JsonObject): Promise<ServiceResponse> {
    return this.patch(Users.getEndpoint(userId), body);
  }

  deleteUser(userId: ResourceId): Promise<ServiceResponse> {
    return this.delete(Users.getEndpoint(userId));
  }

  // === SERVER SERVICES ===
  getServers(): Promise<ServiceResponse> {
    return this.get(Servers.getEndpoint());
  }

  getServer(serverId: ResourceId = 1): Promise<ServiceResponse> {
    return this.get(Servers.getEndpoint(serverId));
  }

  generateServerReport(start: number, stop: number): Promise<ServiceResponse> {
    return this.get(withQuery(Servers.getReportEndpoint(), { start, stop }));
  }

  getServerDiskUtilization(): Promise<ServiceResponse> {
    return this.get(Servers.getDiskUtilizationEndpoint());
  }

  /**
   * Get database errors logged since `start`, up to `stop` when given.
   */
  getServerDatabaseFaults(start: number, stop?: number): Promise<ServiceResponse> {
    return this.get(withQuery(Servers.getDatabaseFaultsEndpoint(), { start, stop }));
  }

  // === SERVER PROPERTIES SERVICES ===
  /** Describe the configurable server properties */
  getServerPropertiesInfo(): Promise<ServiceResponse> {
    return this.get(ServerProperties.getInfoEndpoint());
  }

  getServerProperties(): Promise<ServiceResponse> {
    return this.get(ServerProperties.getEndpoint());
  }

  updateServerProperties(body: JsonObject): Promise<ServiceResponse> {
    return this.put(ServerProperties.getEndpoint(), body);
  }

  /** Whether property changes are waiting for confirmation */
  checkPropertiesConfirmation(): Promise<ServiceResponse> {
    return this.get(ServerProperties.getConfirmationEndpoint());
  }

  /**
   * Confirm pending property changes, or revert to the previous settings
   * when `confirmed` is false.
   */
  confirmProperties(confirmed: boolean = true): Promise<ServiceResponse> {
    const payload: ServerProperties.ConfirmRequest = { propertiesConfirmed: confirmed };
    return this.post(ServerProperties.getConfirmationEndpoint(), payload);
  }

  // === STORAGE SERVICES ===
  getStorages(): Promise<ServiceResponse> {
    return this.get(Storages.getEndpoint());
  }

  getStorage(storageId: ResourceId = 1): Promise<ServiceResponse> {
    return this.get(Storages.getEndpoint(storageId));
  }

  // === LICENSE SESSION SERVICES ===
  getLicenseSession(): Promise<ServiceResponse> {
    return this.get(LicenseSession.getEndpoint());
  }

  /** Upload a new Orchid license */
  createLicenseSession(license: string): Promise<ServiceResponse> {
    const payload: LicenseSession.CreateRequest = { license };
    return this.post(LicenseSession.getEndpoint(), payload);
  }

  deleteLicenseSession(): Promise<ServiceResponse> {
    return this.delete(LicenseSession.getEndpoint());
  }

  // === MISC SERVICES ===
  /** List every API endpoint the server exposes */
  getEndpoints(): Promise<ServiceResponse> {
    return this.get(Endpoints.getEndpoint());
  }

  getVersion(): Promise<ServiceResponse> {
    return this.get(Version.getEndpoint());
  }

  /**
   * Upload a user-interface update package.
   *
   * @param uiPackage - ZIP archive signed by the vendor
   */
  uploadUiPackage(uiPackage: Uint8Array): Promise<ServiceResponse> {
    return this.post(UserInterface.getEndpoint(), uiPackage);
  }

  private get(path: string): Promise<ServiceResponse> {
    return this.request(HttpMethod.GET, path);
  }

  private post(path: string, body?: RequestBody): Promise<ServiceResponse> {
    return this.request(HttpMethod.POST, path, body);
  }

  private put(path: string, body?: RequestBody): Promise<ServiceResponse> {
    return this.request(HttpMethod.PUT, path, body);
  }

  private patch(path: string, body?: RequestBody): Promise<ServiceResponse> {
    return this.request(HttpMethod.PATCH, path, body);
  }

  private delete(path: string): Promise<ServiceResponse> {
    return this.request(HttpMethod.DELETE, path);
  }
}

/**
 * Extract the bearer token from a session creation response: the `id` of
 * the session in its JSON body.
 */
export function getSessionToken(response: ServiceResponse): string | undefined {
  const { body } = response;
  if (body.type !== 'json' || typeof body.value !== 'object' || body.value === null) {
    return undefined;
  }
  if (Array.isArray(body.value)) {
    return undefined;
  }
  const id = body.value['id'];
  return typeof id === 'string' ? id : undefined;
}

function cameraRegistration(
  uri: string,
  username: string,
  password: string,
  name: string,
  driver: CameraDriver
): Cameras.RegisterRequest {
  return {
    driver,
    name,
    connection: { uri, username, password }
  };
}

function eventQuery(start: number, options: EventQueryOptions, ids?: IdList) {
  return {
    start,
    stop: options.stop,
    count: options.count,
    id: joinIds(ids),
    eventType: joinIds(options.eventTypes)
  };
}
