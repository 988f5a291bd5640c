import { AuthProvider, AuthResult } from '../types';

/**
 * Authentication provider using a bearer token: a session ID returned by the
 * session endpoints, or a JWT signed by a trusted issuer.
 */
export class BearerTokenProvider implements AuthProvider {
  readonly type = 'bearer';
  readonly token: string;

  constructor(token: string) {
    this.token = token;
  }

  authenticate(): Promise<AuthResult> {
    return Promise.resolve({
      authorizationHeader: `Bearer ${this.token}`
    });
  }
}
