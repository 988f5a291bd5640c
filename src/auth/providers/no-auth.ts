import { AuthProvider, AuthResult } from '../types';

/**
 * Authentication provider for anonymous requests.
 * Used before a session exists, e.g. to call the user session endpoint.
 */
export class NoAuthProvider implements AuthProvider {
  readonly type = 'none';

  authenticate(): Promise<AuthResult> {
    return Promise.resolve({
      authorizationHeader: ''
    });
  }
}
