import { createHmac, timingSafeEqual } from 'crypto';
import { http, HttpResponse } from 'msw';

/**
 * Address of the in-process Orchid server used for testing. Requests to it are
 * answered by msw handlers, nothing leaves the process.
 */
export const TEST_ADDRESS = 'http://orchid.test';
export const TEST_USER = 'admin';
export const TEST_PASSWORD = 'test-password';
export const TEST_ORCHID_UUID = '00000000-0000-4000-8000-000000000001';

const service = (path: string) => `${TEST_ADDRESS}/service/${path}`;

const PADDED_URLSAFE_BASE64 = /^(?:[A-Za-z0-9_-]{4})*(?:[A-Za-z0-9_-]{2}==|[A-Za-z0-9_-]{3}=)?$/;

/**
 * A request as seen by a stub transport.
 */
export interface RecordedCall {
  url: string;
  method: string;
  headers: Headers;
  body: unknown;
}

/**
 * Create a transport that records every request and answers with `respond`
 * (by default, an empty JSON object with status 200).
 */
export function createRecordingTransport(
  respond: () => Response = () =>
    new Response('{}', { status: 200, headers: { 'Content-Type': 'application/json' } })
): { calls: RecordedCall[]; transport: typeof fetch } {
  const calls: RecordedCall[] = [];
  const transport: typeof fetch = (input, init) => {
    calls.push({
      url: String(input),
      method: init?.method ?? 'GET',
      headers: new Headers(init?.headers),
      body: init?.body
    });
    return Promise.resolve(respond());
  };
  return { calls, transport };
}

/**
 * A transport that never answers. The returned promise only settles when the
 * request is aborted.
 */
export const hangingTransport: typeof fetch = (_input, init) =>
  new Promise<Response>((_resolve, reject) => {
    init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
  });

/**
 * Parse a request body into a plain record, whatever its shape.
 */
export async function readJsonBody(request: Request): Promise<Record<string, unknown>> {
  const value: unknown = await request.json();
  if (typeof value !== 'object' || value === null) {
    return {};
  }
  return Object.fromEntries(Object.entries(value));
}

/**
 * Minimal stateful Orchid server: user/remote sessions, a trusted issuer and
 * two protected resources (cameras and server properties).
 */
export class FakeOrchidServer {
  readonly sessions = new Map<string, 'user' | 'remote'>();
  issuerSecret: Buffer | null = null;
  private nextSessionId = 1;

  readonly handlers = [
    http.get(service('discoverable/orchids/1'), ({ request }) =>
      this.guard(request, () => HttpResponse.json({ id: 1, uuid: TEST_ORCHID_UUID }))
    ),

    http.get(service('trusted/issuer'), ({ request }) =>
      this.guard(request, () =>
        this.issuerSecret
          ? HttpResponse.json({ id: TEST_ORCHID_UUID })
          : HttpResponse.json({ message: 'No trusted issuer' }, { status: 404 })
      )
    ),

    http.post(service('trusted/issuer'), async ({ request }) => {
      if (!this.isAuthorized(request)) {
        return unauthorized();
      }
      const body = await readJsonBody(request);
      const key = body.key;
      if (typeof key !== 'object' || key === null || !('k' in key) || typeof key.k !== 'string') {
        return HttpResponse.json({ message: 'Missing key' }, { status: 400 });
      }
      if (!PADDED_URLSAFE_BASE64.test(key.k)) {
        return HttpResponse.json({ message: 'Invalid key encoding' }, { status: 400 });
      }
      this.issuerSecret = Buffer.from(key.k, 'base64url');
      return HttpResponse.json({ id: body.id }, { status: 201 });
    }),

    http.delete(service('trusted/issuer'), ({ request }) =>
      this.guard(request, () => {
        this.issuerSecret = null;
        return HttpResponse.json({});
      })
    ),

    http.post(service('sessions/user'), async ({ request }) => {
      const body = await readJsonBody(request);
      if (body.username !== TEST_USER || body.password !== TEST_PASSWORD) {
        return unauthorized();
      }
      return HttpResponse.json(this.openSession('user'), { status: 201 });
    }),

    http.post(service('sessions/remote'), ({ request }) =>
      this.guard(request, () => HttpResponse.json(this.openSession('remote'), { status: 201 }))
    ),

    http.get(service('sessions/me'), ({ request }) =>
      this.guard(request, () => HttpResponse.json({ id: bearerToken(request) }))
    ),

    http.delete(service('sessions/me'), ({ request }) =>
      this.guard(request, () => {
        const token = bearerToken(request);
        if (token) {
          this.sessions.delete(token);
        }
        return HttpResponse.json({});
      })
    ),

    http.get(service('cameras'), ({ request }) =>
      this.guard(request, () => HttpResponse.json({ cameras: [] }))
    ),

    http.get(service('server/properties'), ({ request }) =>
      this.guard(request, () => HttpResponse.json({ properties: {} }))
    )
  ];

  /**
   * Whether the request carries valid basic credentials, a live session ID, or
   * an unexpired JWT signed with the trusted issuer secret.
   */
  isAuthorized(request: Request): boolean {
    const header = request.headers.get('authorization') ?? '';
    if (header.startsWith('Basic ')) {
      const decoded = Buffer.from(header.slice('Basic '.length), 'base64').toString('utf-8');
      return decoded === `${TEST_USER}:${TEST_PASSWORD}`;
    }

    const token = bearerToken(request);
    if (!token) {
      return false;
    }
    return this.sessions.has(token) || this.verifyIssuerToken(token);
  }

  private guard(request: Request, handle: () => Response): Response {
    return this.isAuthorized(request) ? handle() : unauthorized();
  }

  private openSession(type: 'user' | 'remote') {
    const id = `session-${this.nextSessionId++}`;
    this.sessions.set(id, type);
    return { id, type };
  }

  private verifyIssuerToken(token: string): boolean {
    if (!this.issuerSecret) {
      return false;
    }
    const [header, payload, signature] = token.split('.');
    if (!header || !payload || !signature) {
      return false;
    }

    const expected = createHmac('sha256', this.issuerSecret)
      .update(`${header}.${payload}`)
      .digest();
    const actual = Buffer.from(signature, 'base64url');
    if (actual.length !== expected.length || !timingSafeEqual(actual, expected)) {
      return false;
    }

    const claims: unknown = JSON.parse(Buffer.from(payload, 'base64url').toString('utf-8'));
    if (typeof claims !== 'object' || claims === null || !('exp' in claims)) {
      return false;
    }
    return typeof claims.exp === 'number' && claims.exp * 1000 > Date.now();
  }
}

function bearerToken(request: Request): string | undefined {
  const header = request.headers.get('authorization') ?? '';
  return header.startsWith('Bearer ') ? header.slice('Bearer '.length) : undefined;
}

function unauthorized(): Response {
  return HttpResponse.json({ message: 'Unauthorized' }, { status: 401 });
}
