/**
 * The credential variants the Orchid server understands.
 */
export type CredentialType = 'none' | 'basic' | 'bearer';

/**
 * Result of an authentication operation.
 * Contains the authorization header value to be used in HTTP requests.
 */
export interface AuthResult {
  /**
   * The full Authorization header value (e.g., "Bearer <token>" or "Basic <credentials>").
   * Empty string indicates no authentication should be applied.
   */
  authorizationHeader: string;
}

/**
 * Interface for authentication providers.
 * A provider only decorates outgoing requests; it never talks to the server.
 */
export interface AuthProvider {
  /** Which credential variant this provider carries */
  readonly type: CredentialType;

  /**
   * Get authentication credentials for a request.
   *
   * @returns Promise resolving to authentication result with header value
   */
  authenticate(): Promise<AuthResult>;
}
