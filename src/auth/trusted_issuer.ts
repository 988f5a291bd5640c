import { createHmac, randomBytes } from 'crypto';

/**
 * Size of the shared secret the server expects for a trusted issuer.
 */
export const ISSUER_SECRET_BYTES = 32;

const DEFAULT_TOKEN_TTL_SECONDS = 300;

/**
 * Symmetric JSON Web Key registered with the server as the trusted issuer key.
 */
export type IssuerKey = {
  kty: 'oct';
  /** Shared secret in URL-safe base64, padding kept */
  k: string;
};

export interface IssuerTokenOptions {
  /** Lifetime of the token in seconds (default 300) */
  ttlSeconds?: number;
  /** Issue time in epoch milliseconds (default `Date.now()`) */
  now?: number;
}

/**
 * Generate a random shared secret for a new trusted issuer.
 */
export function generateIssuerSecret(): Uint8Array {
  return new Uint8Array(randomBytes(ISSUER_SECRET_BYTES));
}

export function encodeIssuerKey(secret: Uint8Array): IssuerKey {
  const k = Buffer.from(secret).toString('base64').replace(/\+/g, '-').replace(/\//g, '_');
  return { kty: 'oct', k };
}

/**
 * Sign a short-lived HS256 JWT with the trusted issuer secret.
 *
 * The server accepts the token as a bearer credential for as long as the
 * issuer stays registered and the token has not expired.
 *
 * @example
 * ```typescript
 * const secret = generateIssuerSecret();
 * await admin.createTrustedIssuer(orchidUuid, secret, 'integration');
 * const client = new OrchidClient({
 *   address: 'https://vms.example.com',
 *   auth: new BearerTokenProvider(createIssuerToken(secret))
 * });
 * ```
 */
export function createIssuerToken(secret: Uint8Array, options: IssuerTokenOptions = {}): string {
  const iat = Math.floor((options.now ?? Date.now()) / 1000);
  const exp = iat + (options.ttlSeconds ?? DEFAULT_TOKEN_TTL_SECONDS);

  const header = encodeSegment({ alg: 'HS256', typ: 'JWT' });
  const payload = encodeSegment({ iat, exp });
  const signature = createHmac('sha256', secret).update(`${header}.${payload}`).digest('base64url');

  return `${header}.${payload}.${signature}`;
}

function encodeSegment(value: Record<string, string | number>): string {
  return Buffer.from(JSON.stringify(value)).toString('base64url');
}
