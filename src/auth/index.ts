/**
 * Orchid client authentication module
 *
 * The Orchid server accepts three kinds of credentials:
 * - Basic auth with an Orchid username and password
 * - Bearer tokens: the ID of a user or remote session, or a JWT signed by the
 *   registered trusted issuer
 * - Nothing, for the few endpoints that create sessions
 *
 * Credentials are resolved once when the client is created and can later be
 * replaced with a bearer token via `OrchidClient.setBearerToken()`.
 *
 * @module auth
 */

import { AuthProvider } from './types';
import { BasicAuthProvider, NoAuthProvider } from './providers';

export type { AuthProvider, AuthResult, CredentialType } from './types';
export { BasicAuthProvider, BearerTokenProvider, NoAuthProvider } from './providers';
export {
  createIssuerToken,
  encodeIssuerKey,
  generateIssuerSecret,
  type IssuerKey,
  type IssuerTokenOptions
} from './trusted_issuer';

/**
 * Credential options accepted by the client constructor.
 */
export interface AuthOptions {
  /** Explicit credential, e.g. `new BearerTokenProvider(jwt)` */
  auth?: AuthProvider;

  /** Orchid username for basic auth */
  user?: string;

  /** Password of `user` */
  password?: string;
}

/**
 * Resolve the credential to attach to outgoing requests.
 *
 * Resolution order:
 * 1. Basic auth, when both `user` and `password` are given (`auth` is ignored)
 * 2. The explicit `auth` provider
 * 3. No authentication
 */
export function resolveAuthProvider(options: AuthOptions = {}): AuthProvider {
  if (options.user && options.password) {
    return new BasicAuthProvider(options.user, options.password);
  }
  return options.auth ?? new NoAuthProvider();
}
