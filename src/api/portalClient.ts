/**
 * PortalClient - Facade for portal REST API operations
 *
 * - portalHttp.ts: request plumbing, login/logout, status mapping
 * - portalFileOperations.ts: drive listing and file management
 *
 * Identity and tenant-context calls are small enough to live here.
 */

import type { Credentials } from '../config/credentials.js';
import { BackendError } from '../errors/mcpErrors.js';
import { PortalFileOperations } from './portalFileOperations.js';
import { PortalHttp, type PortalEndpoint, type PortalHttpOptions } from './portalHttp.js';
import type {
  AccessMode,
  DirectoryEntry,
  ListOptions,
  PortalApi,
  PortalAuthenticator,
  PortalIdentity,
  PublicLink,
  SessionHandle
} from './portalTypes.js';

export * from './portalTypes.js';

export class PortalClient implements PortalApi, PortalAuthenticator {
  private readonly http: PortalHttp;
  private readonly fileOps: PortalFileOperations;

  constructor(endpoint: PortalEndpoint, options: PortalHttpOptions = {}) {
    this.http = new PortalHttp(endpoint, options);
    this.fileOps = new PortalFileOperations(this.http);
  }

  get baseUrl(): string {
    return `${this.http.baseUrl}${this.http.basePath}`;
  }

  // ============================================================================
  // Authentication
  // ============================================================================

  async login(credentials: Credentials): Promise<SessionHandle> {
    return this.http.login(credentials);
  }

  async logout(handle: SessionHandle): Promise<void> {
    return this.http.logout(handle);
  }

  async currentSession(handle: SessionHandle): Promise<PortalIdentity> {
    const session = await this.http.request(handle, { path: '/api/currentSession' });
    if (typeof session !== 'object' || session === null || !('username' in session) || typeof session.username !== 'string') {
      throw new BackendError('Unexpected response from portal for currentSession');
    }
    const domain = 'domain' in session && typeof session.domain === 'string' && session.domain !== ''
      ? session.domain
      : undefined;
    return { username: session.username, domain };
  }

  // ============================================================================
  // Tenant context (global administrators)
  // ============================================================================

  async currentTenant(handle: SessionHandle): Promise<string | null> {
    const tenant = await this.http.request(handle, { path: '/api/currentPortal' });
    return typeof tenant === 'string' && tenant !== '' ? tenant : null;
  }

  async browseTenant(handle: SessionHandle, tenant: string): Promise<void> {
    await this.http.request(handle, { method: 'PUT', path: '/api/currentPortal', json: tenant, accept: 'none' });
  }

  async browseGlobalAdmin(handle: SessionHandle): Promise<void> {
    await this.http.request(handle, { method: 'PUT', path: '/api/currentPortal', json: '', accept: 'none' });
  }

  // ============================================================================
  // File operations
  // ============================================================================

  async listDir(handle: SessionHandle, path: string, options?: ListOptions): Promise<DirectoryEntry[]> {
    return this.fileOps.listDir(handle, path, options);
  }

  async walk(handle: SessionHandle, path: string, includeDeleted?: boolean): Promise<DirectoryEntry[]> {
    return this.fileOps.walk(handle, path, includeDeleted);
  }

  async mkdir(handle: SessionHandle, path: string): Promise<void> {
    return this.fileOps.mkdir(handle, path);
  }

  async makedirs(handle: SessionHandle, path: string): Promise<void> {
    return this.fileOps.makedirs(handle, path);
  }

  async copy(handle: SessionHandle, source: string, destination: string): Promise<void> {
    return this.fileOps.copy(handle, source, destination);
  }

  async move(handle: SessionHandle, source: string, destination: string): Promise<void> {
    return this.fileOps.move(handle, source, destination);
  }

  async rename(handle: SessionHandle, path: string, newName: string): Promise<void> {
    return this.fileOps.rename(handle, path, newName);
  }

  async delete(handle: SessionHandle, paths: string[]): Promise<void> {
    return this.fileOps.delete(handle, paths);
  }

  async undelete(handle: SessionHandle, paths: string[]): Promise<void> {
    return this.fileOps.undelete(handle, paths);
  }

  async versions(handle: SessionHandle, path: string): Promise<string[]> {
    return this.fileOps.versions(handle, path);
  }

  async publicLink(handle: SessionHandle, path: string, access: AccessMode, expireInDays: number): Promise<PublicLink> {
    return this.fileOps.publicLink(handle, path, access, expireInDays);
  }

  async permalink(handle: SessionHandle, path: string): Promise<string> {
    return this.fileOps.permalink(handle, path);
  }

  async readText(handle: SessionHandle, path: string): Promise<string> {
    return this.fileOps.readText(handle, path);
  }

  async readBytes(handle: SessionHandle, path: string): Promise<Uint8Array> {
    return this.fileOps.readBytes(handle, path);
  }

  async upload(handle: SessionHandle, path: string, content: string | Uint8Array): Promise<void> {
    return this.fileOps.upload(handle, path, content);
  }
}
