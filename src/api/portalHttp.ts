import type { Credentials, Scope } from '../config/credentials.js';
import { AuthenticationError, BackendError, SessionExpiredError } from '../errors/mcpErrors.js';
import { createLogger } from '../utils/logger.js';
import { encodePath } from './pathParser.js';
import type { SessionHandle } from './portalTypes.js';

const log = createLogger('portal-http');

/** Longest backend detail carried into an error */
const MAX_DETAIL_LENGTH = 500;

export type FetchFn = typeof fetch;

export interface PortalEndpoint {
  host: string;
  port: number;
  tls: boolean;
  scope: Scope;
}

export interface PortalHttpOptions {
  requestTimeoutMs?: number;
  fetch?: FetchFn;
}

export interface PortalRequest {
  method?: 'GET' | 'POST' | 'PUT' | 'DELETE';
  /** Path under the scope's base, e.g. '/api/currentSession' */
  path: string;
  json?: unknown;
  body?: URLSearchParams | FormData;
  /** How to read a successful response */
  accept?: 'json' | 'text' | 'bytes' | 'none';
}

export type PortalResponse = unknown;

/**
 * Admin principals live under /admin, end users under /ServicesPortal
 */
export function basePathFor(scope: Scope): string {
  return scope === 'admin' ? '/admin' : '/ServicesPortal';
}

export function endpointOf(credentials: Credentials): PortalEndpoint {
  return {
    host: credentials.host,
    port: credentials.port,
    tls: credentials.tls,
    scope: credentials.scope
  };
}

/**
 * Pick the session cookie out of a Set-Cookie header
 */
export function extractSessionCookie(setCookie: string | null): string | null {
  if (!setCookie) {
    return null;
  }
  const session = /JSESSIONID=[^;,\s]+/.exec(setCookie);
  if (session) {
    return session[0];
  }
  const first = /^\s*([^=;,\s]+=[^;,\s]*)/.exec(setCookie);
  return first ? first[1] : null;
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

/**
 * Low-level HTTP plumbing against the portal REST API.
 * Translates transport failures and status codes into the error taxonomy:
 * 401 on an authenticated call means the session expired.
 */
export class PortalHttp {
  readonly baseUrl: string;
  readonly basePath: string;
  private readonly requestTimeoutMs: number;
  private readonly fetchFn: FetchFn;

  constructor(endpoint: PortalEndpoint, options: PortalHttpOptions = {}) {
    const protocol = endpoint.tls ? 'https' : 'http';
    this.baseUrl = `${protocol}://${endpoint.host}:${endpoint.port}`;
    this.basePath = basePathFor(endpoint.scope);
    this.requestTimeoutMs = options.requestTimeoutMs ?? 25000;
    this.fetchFn = options.fetch ?? fetch;
  }

  /**
   * Full webdav path of a drive item, as the portal's RPC parameters expect it
   */
  webdavPath(path: string): string {
    const encoded = encodePath(path);
    return encoded ? `${this.basePath}/webdav/${encoded}` : `${this.basePath}/webdav`;
  }

  async login(credentials: Credentials): Promise<SessionHandle> {
    const form = new URLSearchParams({
      j_username: credentials.user,
      j_password: credentials.secret
    });

    const response = await this.send('POST', '/api/login', { body: form });
    if (response.status === 401 || response.status === 403) {
      throw new AuthenticationError(`Portal rejected the credentials of user "${credentials.user}"`);
    }
    if (!response.ok) {
      throw await this.failure('POST', '/api/login', response);
    }

    const cookie = extractSessionCookie(response.headers.get('set-cookie'));
    if (!cookie) {
      throw new BackendError('Portal login returned no session cookie', response.status);
    }
    log.debug(`Logged in as ${credentials.user}`);
    return { cookie };
  }

  async logout(handle: SessionHandle): Promise<void> {
    await this.request(handle, { method: 'POST', path: '/api/logout', accept: 'none' });
  }

  /**
   * Authenticated request on an existing session
   */
  async request(handle: SessionHandle, request: PortalRequest): Promise<PortalResponse> {
    const method = request.method ?? 'GET';
    const response = await this.send(method, request.path, {
      cookie: handle.cookie,
      body: request.body,
      json: request.json
    });

    if (response.status === 401) {
      throw new SessionExpiredError(`Portal session expired (${method} ${request.path})`);
    }
    if (!response.ok) {
      throw await this.failure(method, request.path, response);
    }

    switch (request.accept ?? 'json') {
      case 'none':
        return undefined;
      case 'text':
        return await response.text();
      case 'bytes':
        return new Uint8Array(await response.arrayBuffer());
      case 'json': {
        const text = await response.text();
        if (text.trim() === '') {
          return null;
        }
        try {
          return JSON.parse(text);
        } catch {
          // some endpoints answer with a bare string
          return text;
        }
      }
    }
  }

  /**
   * Execute a named server-side action (the portal's RPC entry point)
   */
  async execute(handle: SessionHandle, action: string, param: Record<string, unknown>): Promise<PortalResponse> {
    return this.request(handle, {
      method: 'POST',
      path: '/api/',
      json: { type: 'user-defined', name: action, param }
    });
  }

  private async send(
    method: string,
    path: string,
    options: { cookie?: string; body?: URLSearchParams | FormData; json?: unknown }
  ): Promise<Response> {
    const headers: Record<string, string> = { Accept: 'application/json, text/plain, */*' };
    if (options.cookie) {
      headers.Cookie = options.cookie;
    }

    let body: string | URLSearchParams | FormData | undefined = options.body;
    if (options.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(options.json);
    }

    const url = `${this.baseUrl}${this.basePath}${path}`;
    log.debug(`${method} ${url}`);

    try {
      return await this.fetchFn(url, {
        method,
        headers,
        body,
        signal: AbortSignal.timeout(this.requestTimeoutMs)
      });
    } catch (error) {
      if (isTimeout(error)) {
        throw new BackendError('timeout');
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new BackendError(`Portal unreachable: ${reason}`);
    }
  }

  private async failure(method: string, path: string, response: Response): Promise<BackendError> {
    let detail: string | undefined;
    try {
      detail = (await response.text()).slice(0, MAX_DETAIL_LENGTH) || undefined;
    } catch {
      detail = undefined;
    }
    return new BackendError(
      `Portal request ${method} ${path} failed with status ${response.status}`,
      response.status,
      detail
    );
  }
}
