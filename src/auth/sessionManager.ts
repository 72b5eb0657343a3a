import type { Credentials, Scope } from '../config/credentials.js';
import type { PortalAuthenticator, SessionHandle } from '../api/portalTypes.js';
import { AuthenticationError, BackendError, SessionExpiredError } from '../errors/mcpErrors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('session');

/**
 * The single authenticated portal session owned by the manager
 */
export interface PortalSession {
  handle: SessionHandle;
  establishedAt: Date;
  scope: Scope;
  /** Increases with every login; stale failures cannot invalidate a newer session */
  generation: number;
}

export type SessionOperation<T> = (session: PortalSession) => Promise<T>;

export interface SessionStatus {
  established: boolean;
  establishedAt: string | null;
  scope: Scope;
  generation: number;
}

export interface SessionManagerOptions {
  /** Bounded wait for one call(), retry included */
  callTimeoutMs?: number;
}

/**
 * Owns one authenticated portal session for the whole process.
 *
 * - Establishment is single-flight: concurrent callers share one login.
 * - Calls on a live session run concurrently.
 * - On SessionExpiredError the session is invalidated, re-established once and
 *   the operation retried once; a second expiry becomes AuthenticationError.
 * - Timeouts become BackendError('timeout') and leave the session alone.
 */
export class SessionManager {
  private session: PortalSession | null = null;
  private establishing: Promise<PortalSession> | null = null;
  private generation = 0;
  private readonly callTimeoutMs: number;

  constructor(
    private readonly authenticator: PortalAuthenticator,
    private readonly credentials: Credentials,
    options: SessionManagerOptions = {}
  ) {
    this.callTimeoutMs = options.callTimeoutMs ?? 30000;
  }

  /**
   * Current session if live, otherwise log in. Safe before every call.
   */
  async ensureSession(): Promise<PortalSession> {
    if (this.session) {
      return this.session;
    }
    if (!this.establishing) {
      this.establishing = this.establish().finally(() => {
        this.establishing = null;
      });
    }
    return this.establishing;
  }

  /**
   * Mark the session dead. With a session argument, only that generation is
   * dropped, so a late failure from an old session leaves a fresh one intact.
   */
  invalidate(session?: PortalSession): void {
    if (!this.session) {
      return;
    }
    if (session && session.generation !== this.session.generation) {
      log.debug(`Ignoring invalidation of stale session generation ${session.generation}`);
      return;
    }
    log.info(`Session generation ${this.session.generation} invalidated`);
    this.session = null;
  }

  /**
   * Run a portal operation on the live session, re-authenticating once on expiry
   */
  async call<T>(operation: SessionOperation<T>): Promise<T> {
    return this.withTimeout(this.callWithRefresh(operation));
  }

  /**
   * Log out and forget the session. Logout failures are logged, not thrown.
   */
  async shutdown(): Promise<void> {
    const pending = this.establishing;
    if (pending) {
      await pending.catch(() => null);
    }

    const session = this.session;
    this.session = null;
    if (!session) {
      return;
    }
    try {
      await this.authenticator.logout(session.handle);
      log.info('Logged out of portal');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      log.warn(`Logout failed: ${reason}`);
    }
  }

  status(): SessionStatus {
    return {
      established: this.session !== null,
      establishedAt: this.session ? this.session.establishedAt.toISOString() : null,
      scope: this.credentials.scope,
      generation: this.generation
    };
  }

  private async establish(): Promise<PortalSession> {
    log.info(`Authenticating as ${this.credentials.user} (${this.credentials.scope} scope)`);
    const handle = await this.authenticator.login(this.credentials);
    this.generation += 1;
    this.session = {
      handle,
      establishedAt: new Date(),
      scope: this.credentials.scope,
      generation: this.generation
    };
    log.info(`Session generation ${this.generation} established`);
    return this.session;
  }

  private async callWithRefresh<T>(operation: SessionOperation<T>): Promise<T> {
    const session = await this.ensureSession();
    try {
      return await operation(session);
    } catch (error) {
      if (!(error instanceof SessionExpiredError)) {
        throw error;
      }
      log.info('Session expired, re-authenticating...');
    }

    this.invalidate(session);
    let refreshed: PortalSession;
    try {
      refreshed = await this.ensureSession();
    } catch (error) {
      if (error instanceof AuthenticationError) {
        throw new AuthenticationError(`Session refresh failed: ${error.message}`, 'expired');
      }
      throw error;
    }

    try {
      return await operation(refreshed);
    } catch (error) {
      if (error instanceof SessionExpiredError) {
        this.invalidate(refreshed);
        throw new AuthenticationError('Portal session expired again after re-authentication', 'expired');
      }
      throw error;
    }
  }

  private withTimeout<T>(work: Promise<T>): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    let timedOut = false;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        timedOut = true;
        reject(new BackendError('timeout'));
      }, this.callTimeoutMs);
    });
    // a timed-out call may still settle later; its outcome is discarded
    work.catch((error: unknown) => {
      if (timedOut) {
        log.debug('Discarded failure of a timed-out call', error);
      }
    });
    return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
  }
}
