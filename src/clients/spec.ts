/**
 * Orchid Core VMS API endpoint specifications
 *
 * Service paths (relative to `<address>/service/`) and request payloads for
 * every endpoint the client exposes, grouped the way the server documents them.
 */

import type { IssuerKey } from '../auth';
import type {
  CameraDriver,
  LbmTransport,
  SessionCookie,
  UserRole
} from '../core/constants';
import type { JsonValue } from '../core/utils/json';
import { ResourceId, segment } from './utils';

/** Server time */
export namespace Time {
  export const getEndpoint = (extended: boolean) => (extended ? 'time-extended' : 'time');
}

/**
 * JWT signer the server trusts for bearer sessions. At most one exists.
 */
export namespace TrustedIssuer {
  export const getEndpoint = () => 'trusted/issuer';

  /** Creation goes through version 2 of the endpoint, which takes a JWK. */
  export const getCreateEndpoint = () => 'trusted/issuer?version=2';

  export type Request = {
    /** UUID of the Orchid server */
    id: string;
    access_token: string;
    key: IssuerKey;
    description: string;
    uri: string;
  };
}

export namespace Sessions {
  export const getEndpoint = (sessionId?: ResourceId) =>
    sessionId === undefined ? 'sessions' : `sessions/${segment(sessionId)}`;

  /** The session the request is authenticated with */
  export const getCurrentEndpoint = () => 'sessions/me';

  export const getIdentityEndpoint = () => 'identity';

  export const getUserEndpoint = () => 'sessions/user';

  export const getRemoteEndpoint = () => 'sessions/remote';

  export type CreateUserRequest = {
    username: string;
    password: string;
    /** Lifetime in seconds */
    expiresIn: number;
    cookie: SessionCookie;
  };

  /**
   * Permission sets granted to a remote session.
   */
  export type RemoteScope = {
    baseScope?: string[];
    cameraScope?: JsonValue[];
  };

  export type CreateRemoteRequest = {
    name: string;
    /** Lifetime in seconds */
    expiresIn: number;
    cookie: SessionCookie;
    scope?: RemoteScope;
  };
}

/** Cameras and Orchid servers found through autodiscovery */
export namespace Discoverable {
  export const getCamerasEndpoint = () => 'discoverable/cameras';

  export const getOrchidsEndpoint = (orchidId?: ResourceId) =>
    orchidId === undefined ? 'discoverable/orchids' : `discoverable/orchids/${segment(orchidId)}`;
}

export namespace Cameras {
  export const getEndpoint = (cameraId?: ResourceId) =>
    cameraId === undefined ? 'cameras' : `cameras/${segment(cameraId)}`;

  export const getVerifyEndpoint = (cameraId: ResourceId) => `${getEndpoint(cameraId)}/verify`;

  export const getDiskUsageEndpoint = () => 'cameras/disk-usage';

  export const getTimezonesEndpoint = () => 'cameras/tz-list';

  export type RegisterRequest = {
    driver: CameraDriver;
    name: string;
    connection: {
      uri: string;
      username: string;
      password: string;
    };
  };
}

/** Pan-tilt-zoom control of a camera */
export namespace CameraPtz {
  export const getPositionEndpoint = (cameraId: ResourceId) =>
    `${Cameras.getEndpoint(cameraId)}/position`;

  export const getPresetsEndpoint = (cameraId: ResourceId, presetToken?: string) =>
    presetToken === undefined
      ? `${getPositionEndpoint(cameraId)}/presets`
      : `${getPositionEndpoint(cameraId)}/presets/${segment(presetToken)}`;

  export type CreatePresetRequest = {
    name: string;
  };
}

/** Streams addressed through the camera they belong to */
export namespace CameraStreams {
  export const getEndpoint = (cameraId: ResourceId, streamId?: ResourceId) =>
    streamId === undefined
      ? `${Cameras.getEndpoint(cameraId)}/streams`
      : `${Cameras.getEndpoint(cameraId)}/streams/${segment(streamId)}`;

  export const getRestartEndpoint = (cameraId: ResourceId, streamId: ResourceId) =>
    `${getEndpoint(cameraId, streamId)}/restart`;

  /** PNG image of a stream frame marking where motion is detected */
  export const getMotionMaskEndpoint = (cameraId: ResourceId, streamId: ResourceId) =>
    `${getEndpoint(cameraId, streamId)}/motion/mask`;

  export const getMetadataEndpoint = (cameraId: ResourceId, streamId: ResourceId) =>
    `${getEndpoint(cameraId, streamId)}/metadata`;
}

export namespace Streams {
  export const getEndpoint = (streamId?: ResourceId) =>
    streamId === undefined ? 'streams' : `streams/${segment(streamId)}`;

  export const getStatusesEndpoint = () => 'streams/status';

  export const getStatusEndpoint = (streamId: ResourceId) => `${getEndpoint(streamId)}/status`;

  export const getFrameEndpoint = (streamId: ResourceId) => `${getEndpoint(streamId)}/frame`;

  export const getExportEndpoint = (streamId: ResourceId) => `${getEndpoint(streamId)}/export`;
}

export namespace Archives {
  export const getEndpoint = (archiveId?: ResourceId) =>
    archiveId === undefined ? 'archives' : `archives/${segment(archiveId)}`;

  export const getDownloadEndpoint = (archiveId: ResourceId) =>
    `${getEndpoint(archiveId)}/download`;

  export const getPerDayEndpoint = () => 'archives/per-day';
}

/**
 * Low-bandwidth mode (LBM) streams: server-side sessions delivering
 * downsampled frames over HTTP or a websocket.
 */
export namespace LowBandwidthStreams {
  export const getEndpoint = (streamUuid?: string) =>
    streamUuid === undefined
      ? 'low-bandwidth/streams'
      : `low-bandwidth/streams/${segment(streamUuid)}`;

  export const getFrameEndpoint = (streamUuid: string) => `${getEndpoint(streamUuid)}/frame`;

  export type CreateRequest = {
    streamId: ResourceId;
    resolution: {
      height: number;
      width: number;
    };
    /** Epoch milliseconds, 0 for live */
    startTime: number;
    sync: boolean;
    rate: number;
    waitThres: number;
    transport: LbmTransport;
  };
}

export namespace Events {
  export const getServerEndpoint = () => 'events/server';

  export const getCameraStreamEndpoint = () => 'events/camera-stream';

  export const getHistogramEndpoint = () => 'events/camera-stream/histogram';
}

export namespace Logs {
  export const getEndpoint = () => 'log';
}

export namespace Users {
  export const getEndpoint = (userId?: ResourceId) =>
    userId === undefined ? 'users' : `users/${segment(userId)}`;

  export type CreateRequest = {
    username: string;
    password: string;
    role: UserRole;
  };
}

export namespace Servers {
  export const getEndpoint = (serverId?: ResourceId) =>
    serverId === undefined ? 'servers' : `servers/${segment(serverId)}`;

  export const getReportEndpoint = () => 'server/report';

  export const getDiskUtilizationEndpoint = () => 'server/utilization/disk';

  export const getDatabaseFaultsEndpoint = () => 'server/database-faults';
}

export namespace ServerProperties {
  export const getEndpoint = () => 'server/properties';

  export const getInfoEndpoint = () => 'server/properties/info';

  export const getConfirmationEndpoint = () => 'server/properties/confirmed';

  export type ConfirmRequest = {
    propertiesConfirmed: boolean;
  };
}

/** Archive storage locations */
export namespace Storages {
  export const getEndpoint = (storageId?: ResourceId) =>
    storageId === undefined ? 'storages' : `storages/${segment(storageId)}`;
}

export namespace LicenseSession {
  export const getEndpoint = () => 'license-session';

  export type CreateRequest = {
    license: string;
  };
}

export namespace Endpoints {
  export const getEndpoint = () => 'endpoints';
}

export namespace Version {
  export const getEndpoint = () => 'version';
}

/** Signed user-interface update packages */
export namespace UserInterface {
  export const getEndpoint = () => 'ui';
}
