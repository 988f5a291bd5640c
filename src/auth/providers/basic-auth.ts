import { AuthProvider, AuthResult } from '../types';

/**
 * Authentication provider using HTTP Basic Authentication with an Orchid user.
 *
 * Credentials are not checked locally; the server answers 401 when they are wrong.
 */
export class BasicAuthProvider implements AuthProvider {
  readonly type = 'basic';
  readonly username: string;
  private readonly password: string;

  constructor(username: string, password: string) {
    this.username = username;
    this.password = password;
  }

  authenticate(): Promise<AuthResult> {
    const credentials = Buffer.from(`${this.username}:${this.password}`).toString('base64');
    return Promise.resolve({
      authorizationHeader: `Basic ${credentials}`
    });
  }
}
