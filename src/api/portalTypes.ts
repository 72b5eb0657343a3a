import type { Credentials } from '../config/credentials.js';

/**
 * Opaque reference to an authenticated portal session (the session cookie)
 */
export interface SessionHandle {
  readonly cookie: string;
}

export interface PortalIdentity {
  username: string;
  domain?: string;
}

export interface DirectoryEntry {
  name: string;
  /** Path relative to the drive root */
  path: string;
  href: string;
  lastModified: string | null;
  isFolder: boolean;
  isDeleted: boolean;
  fileId: string | null;
}

export interface ListOptions {
  includeDeleted?: boolean;
  searchCriteria?: string;
}

export type AccessMode = 'RO' | 'RW';

export type PublicLink = Record<string, unknown>;

/**
 * Login and logout against the portal
 */
export interface PortalAuthenticator {
  login(credentials: Credentials): Promise<SessionHandle>;
  logout(handle: SessionHandle): Promise<void>;
}

/**
 * Portal operations available to tools. Every call takes the handle of the
 * session it runs on; an expired handle surfaces as SessionExpiredError.
 */
export interface PortalApi {
  currentSession(handle: SessionHandle): Promise<PortalIdentity>;
  listDir(handle: SessionHandle, path: string, options?: ListOptions): Promise<DirectoryEntry[]>;
  walk(handle: SessionHandle, path: string, includeDeleted?: boolean): Promise<DirectoryEntry[]>;
  mkdir(handle: SessionHandle, path: string): Promise<void>;
  makedirs(handle: SessionHandle, path: string): Promise<void>;
  copy(handle: SessionHandle, source: string, destination: string): Promise<void>;
  move(handle: SessionHandle, source: string, destination: string): Promise<void>;
  rename(handle: SessionHandle, path: string, newName: string): Promise<void>;
  delete(handle: SessionHandle, paths: string[]): Promise<void>;
  undelete(handle: SessionHandle, paths: string[]): Promise<void>;
  versions(handle: SessionHandle, path: string): Promise<string[]>;
  publicLink(handle: SessionHandle, path: string, access: AccessMode, expireInDays: number): Promise<PublicLink>;
  permalink(handle: SessionHandle, path: string): Promise<string>;
  readText(handle: SessionHandle, path: string): Promise<string>;
  readBytes(handle: SessionHandle, path: string): Promise<Uint8Array>;
  upload(handle: SessionHandle, path: string, content: string | Uint8Array): Promise<void>;
  currentTenant(handle: SessionHandle): Promise<string | null>;
  browseTenant(handle: SessionHandle, tenant: string): Promise<void>;
  browseGlobalAdmin(handle: SessionHandle): Promise<void>;
}
