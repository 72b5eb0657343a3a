import type {
  AccessMode,
  DirectoryEntry,
  ListOptions,
  PortalApi,
  PortalAuthenticator,
  PortalIdentity,
  PublicLink,
  SessionHandle
} from '../../src/api/portalTypes.js';
import { normalizePath } from '../../src/api/pathParser.js';
import type { Credentials } from '../../src/config/credentials.js';
import { SessionExpiredError } from '../../src/errors/mcpErrors.js';

export const TEST_CREDENTIALS: Credentials = {
  host: 'portal.test',
  port: 443,
  user: 'alice',
  secret: 'test-secret',
  scope: 'user',
  tls: true
};

export const ADMIN_CREDENTIALS: Credentials = { ...TEST_CREDENTIALS, user: 'root', scope: 'admin' };

export interface RecordedCall {
  method: string;
  cookie: string;
  args: unknown[];
}

/**
 * In-process stand-in for the portal. Counts every call, issues numbered
 * session cookies and can be told to expire or fail upcoming operations.
 */
export class FakePortal implements PortalApi, PortalAuthenticator {
  identity: PortalIdentity = { username: 'alice' };
  tenant: string | null = null;
  directories = new Map<string, DirectoryEntry[]>();
  files = new Map<string, string>();

  logins = 0;
  logouts = 0;
  readonly calls: RecordedCall[] = [];

  /** Error thrown by the next login attempts, in order */
  loginFailures: Error[] = [];
  /** Number of upcoming operations that fail with SessionExpiredError */
  expireNext = 0;
  /** Errors thrown by upcoming operations, in order */
  operationFailures: Error[] = [];
  /** Operations never settle while set */
  hang = false;

  get operationCount(): number {
    return this.calls.length;
  }

  callsTo(method: string): RecordedCall[] {
    return this.calls.filter(call => call.method === method);
  }

  addDirectory(path: string, entries: Array<Partial<DirectoryEntry> & { name: string }>): this {
    const root = normalizePath(path);
    this.directories.set(root, entries.map(entry => ({
      path: root ? `${root}/${entry.name}` : entry.name,
      href: `/ServicesPortal/webdav/${root ? `${root}/` : ''}${entry.name}`,
      lastModified: null,
      isFolder: false,
      isDeleted: false,
      fileId: null,
      ...entry
    })));
    return this;
  }

  async login(_credentials: Credentials): Promise<SessionHandle> {
    this.logins += 1;
    await Promise.resolve();
    const failure = this.loginFailures.shift();
    if (failure) {
      throw failure;
    }
    return { cookie: `JSESSIONID=session-${this.logins}` };
  }

  async logout(handle: SessionHandle): Promise<void> {
    this.logouts += 1;
    this.calls.push({ method: 'logout', cookie: handle.cookie, args: [] });
  }

  async currentSession(handle: SessionHandle): Promise<PortalIdentity> {
    return this.operation('currentSession', handle, [], () => this.identity);
  }

  async listDir(handle: SessionHandle, path: string, options?: ListOptions): Promise<DirectoryEntry[]> {
    return this.operation('listDir', handle, [path, options], () => {
      const entries = this.directories.get(normalizePath(path)) ?? [];
      return options?.includeDeleted ? entries : entries.filter(entry => !entry.isDeleted);
    });
  }

  async walk(handle: SessionHandle, path: string, includeDeleted?: boolean): Promise<DirectoryEntry[]> {
    return this.operation('walk', handle, [path, includeDeleted], () => {
      const result: DirectoryEntry[] = [];
      const pending = [normalizePath(path)];
      while (pending.length > 0) {
        for (const entry of this.directories.get(pending.shift() ?? '') ?? []) {
          if (entry.isDeleted && !includeDeleted) continue;
          result.push(entry);
          if (entry.isFolder && !entry.isDeleted) pending.push(entry.path);
        }
      }
      return result;
    });
  }

  async mkdir(handle: SessionHandle, path: string): Promise<void> {
    return this.operation('mkdir', handle, [path], () => undefined);
  }

  async makedirs(handle: SessionHandle, path: string): Promise<void> {
    return this.operation('makedirs', handle, [path], () => undefined);
  }

  async copy(handle: SessionHandle, source: string, destination: string): Promise<void> {
    return this.operation('copy', handle, [source, destination], () => undefined);
  }

  async move(handle: SessionHandle, source: string, destination: string): Promise<void> {
    return this.operation('move', handle, [source, destination], () => undefined);
  }

  async rename(handle: SessionHandle, path: string, newName: string): Promise<void> {
    return this.operation('rename', handle, [path, newName], () => undefined);
  }

  async delete(handle: SessionHandle, paths: string[]): Promise<void> {
    return this.operation('delete', handle, [paths], () => undefined);
  }

  async undelete(handle: SessionHandle, paths: string[]): Promise<void> {
    return this.operation('undelete', handle, [paths], () => undefined);
  }

  async versions(handle: SessionHandle, path: string): Promise<string[]> {
    return this.operation('versions', handle, [path], () => ['2024-01-01T00:00:00', '2024-02-01T00:00:00']);
  }

  async publicLink(handle: SessionHandle, path: string, access: AccessMode, expireInDays: number): Promise<PublicLink> {
    return this.operation('publicLink', handle, [path, access, expireInDays], () => ({
      publicLink: `https://portal.test/invitations/${normalizePath(path)}`,
      accessMode: access
    }));
  }

  async permalink(handle: SessionHandle, path: string): Promise<string> {
    return this.operation('permalink', handle, [path], () => `https://portal.test/link/${normalizePath(path)}`);
  }

  async readText(handle: SessionHandle, path: string): Promise<string> {
    return this.operation('readText', handle, [path], () => this.files.get(normalizePath(path)) ?? '');
  }

  async readBytes(handle: SessionHandle, path: string): Promise<Uint8Array> {
    return this.operation('readBytes', handle, [path], () => new TextEncoder().encode(this.files.get(normalizePath(path)) ?? ''));
  }

  async upload(handle: SessionHandle, path: string, content: string | Uint8Array): Promise<void> {
    return this.operation('upload', handle, [path, content], () => {
      this.files.set(normalizePath(path), typeof content === 'string' ? content : new TextDecoder().decode(content));
    });
  }

  async currentTenant(handle: SessionHandle): Promise<string | null> {
    return this.operation('currentTenant', handle, [], () => this.tenant);
  }

  async browseTenant(handle: SessionHandle, tenant: string): Promise<void> {
    return this.operation('browseTenant', handle, [tenant], () => {
      this.tenant = tenant;
    });
  }

  async browseGlobalAdmin(handle: SessionHandle): Promise<void> {
    return this.operation('browseGlobalAdmin', handle, [], () => {
      this.tenant = null;
    });
  }

  private async operation<T>(method: string, handle: SessionHandle, args: unknown[], result: () => T): Promise<T> {
    this.calls.push({ method, cookie: handle.cookie, args });
    await Promise.resolve();

    if (this.hang) {
      return new Promise<T>(() => undefined);
    }
    if (this.expireNext > 0) {
      this.expireNext -= 1;
      throw new SessionExpiredError();
    }
    const failure = this.operationFailures.shift();
    if (failure) {
      throw failure;
    }
    return result();
  }
}
