/**
 * Portal file operations
 *
 * Drive items are addressed by webdav path inside RPC parameters; content
 * moves through the webdav and upload endpoints. Multi-step operations
 * (walk, makedirs) issue several independent requests and are not atomic.
 */

import { BackendError, ValidationError } from '../errors/mcpErrors.js';
import { ancestry, baseName, joinPath, normalizePath, parentPath, encodePath } from './pathParser.js';
import type { PortalHttp, PortalResponse } from './portalHttp.js';
import type { AccessMode, DirectoryEntry, ListOptions, PublicLink, SessionHandle } from './portalTypes.js';

/** Page size for fetchResources */
const PAGE_SIZE = 100;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(record: Record<string, unknown>, key: string): string | null {
  const value = record[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return null;
}

function unexpected(action: string): BackendError {
  return new BackendError(`Unexpected response from portal for ${action}`);
}

/**
 * ISO date (YYYY-MM-DD) a number of days from now
 *
 * @throws {ValidationError} when the day count yields no representable date
 */
export function expirationDate(expireInDays: number, now: Date = new Date()): string {
  const expires = new Date(now.getTime() + expireInDays * 24 * 60 * 60 * 1000);
  if (Number.isNaN(expires.getTime())) {
    throw new ValidationError('expire_in', 'is out of range', expireInDays);
  }
  return expires.toISOString().slice(0, 10);
}

export class PortalFileOperations {
  constructor(private readonly http: PortalHttp) {}

  async listDir(handle: SessionHandle, path: string, options: ListOptions = {}): Promise<DirectoryEntry[]> {
    const root = normalizePath(path);
    const entries: DirectoryEntry[] = [];
    let startIndex = 0;

    for (;;) {
      const param: Record<string, unknown> = {
        root: this.http.webdavPath(root),
        depth: 1,
        includeDeleted: options.includeDeleted === true,
        startIndex,
        limit: PAGE_SIZE
      };
      if (options.searchCriteria) {
        param.searchCriteria = options.searchCriteria;
      }

      const page = await this.http.execute(handle, 'fetchResources', param);
      if (!isRecord(page) || !Array.isArray(page.items)) {
        throw unexpected('fetchResources');
      }

      for (const item of page.items) {
        entries.push(this.toEntry(root, item));
      }

      if (page.hasMore !== true || page.items.length === 0) {
        return entries;
      }
      startIndex += page.items.length;
    }
  }

  /**
   * Breadth-first listing of everything under a path
   */
  async walk(handle: SessionHandle, path: string, includeDeleted: boolean = false): Promise<DirectoryEntry[]> {
    const result: DirectoryEntry[] = [];
    const pending = [normalizePath(path)];

    while (pending.length > 0) {
      const current = pending.shift() ?? '';
      const entries = await this.listDir(handle, current, { includeDeleted });
      for (const entry of entries) {
        result.push(entry);
        if (entry.isFolder && !entry.isDeleted) {
          pending.push(entry.path);
        }
      }
    }
    return result;
  }

  async mkdir(handle: SessionHandle, path: string): Promise<void> {
    await this.http.execute(handle, 'makeCollection', {
      name: baseName(path),
      parentPath: this.http.webdavPath(parentPath(path))
    });
  }

  /**
   * Create a directory and any missing parents; existing ones (409) are skipped
   */
  async makedirs(handle: SessionHandle, path: string): Promise<void> {
    for (const directory of ancestry(path)) {
      try {
        await this.mkdir(handle, directory);
      } catch (error) {
        if (error instanceof BackendError && error.data?.statusCode === 409) {
          continue;
        }
        throw error;
      }
    }
  }

  async copy(handle: SessionHandle, source: string, destination: string): Promise<void> {
    await this.http.execute(handle, 'copyResources', {
      urls: [{ src: this.http.webdavPath(source), dest: this.http.webdavPath(destination) }]
    });
  }

  async move(handle: SessionHandle, source: string, destination: string): Promise<void> {
    await this.http.execute(handle, 'moveResources', {
      urls: [{ src: this.http.webdavPath(source), dest: this.http.webdavPath(destination) }]
    });
  }

  async rename(handle: SessionHandle, path: string, newName: string): Promise<void> {
    await this.move(handle, path, joinPath(parentPath(path), newName));
  }

  async delete(handle: SessionHandle, paths: string[]): Promise<void> {
    await this.http.execute(handle, 'deleteResources', {
      urls: paths.map(path => this.http.webdavPath(path))
    });
  }

  async undelete(handle: SessionHandle, paths: string[]): Promise<void> {
    await this.http.execute(handle, 'restoreResources', {
      urls: paths.map(path => this.http.webdavPath(path))
    });
  }

  /**
   * Snapshot start timestamps of a file
   */
  async versions(handle: SessionHandle, path: string): Promise<string[]> {
    const response = await this.http.execute(handle, 'listSnapshots', { url: this.http.webdavPath(path) });
    if (!Array.isArray(response)) {
      throw unexpected('listSnapshots');
    }
    const timestamps: string[] = [];
    for (const snapshot of response) {
      const timestamp = isRecord(snapshot) ? stringField(snapshot, 'startTimestamp') : null;
      if (timestamp !== null) {
        timestamps.push(timestamp);
      }
    }
    return timestamps;
  }

  async publicLink(handle: SessionHandle, path: string, access: AccessMode, expireInDays: number): Promise<PublicLink> {
    const response = await this.http.execute(handle, 'createShare', {
      resourcePath: this.http.webdavPath(path),
      accessMode: access,
      protectionLevel: 'publicLink',
      expiration: expirationDate(expireInDays)
    });
    if (isRecord(response)) {
      return response;
    }
    if (typeof response === 'string') {
      return { publicLink: response, accessMode: access };
    }
    throw unexpected('createShare');
  }

  async permalink(handle: SessionHandle, path: string): Promise<string> {
    const response = await this.http.execute(handle, 'getPermalink', { url: this.http.webdavPath(path) });
    if (typeof response === 'string') {
      return response;
    }
    if (isRecord(response)) {
      const link = stringField(response, 'permalink') ?? stringField(response, 'url');
      if (link !== null) return link;
    }
    throw unexpected('getPermalink');
  }

  async readText(handle: SessionHandle, path: string): Promise<string> {
    return this.text(await this.http.request(handle, { path: this.webdavRoute(path), accept: 'text' }));
  }

  async readBytes(handle: SessionHandle, path: string): Promise<Uint8Array> {
    const response = await this.http.request(handle, { path: this.webdavRoute(path), accept: 'bytes' });
    if (response instanceof Uint8Array) {
      return response;
    }
    throw unexpected('download');
  }

  async upload(handle: SessionHandle, path: string, content: string | Uint8Array): Promise<void> {
    const name = baseName(path);
    if (!name) {
      throw new BackendError('Cannot upload to the drive root');
    }
    const size = typeof content === 'string' ? Buffer.byteLength(content, 'utf8') : content.byteLength;

    const form = new FormData();
    form.append('name', name);
    form.append('Filename', name);
    form.append('fullpath', this.http.webdavPath(path));
    form.append('fileSize', String(size));
    form.append('file', new Blob([content]), name);

    const parent = encodePath(parentPath(path));
    await this.http.request(handle, {
      method: 'POST',
      path: parent ? `/upload/folders/${parent}` : '/upload/folders',
      body: form,
      accept: 'none'
    });
  }

  private webdavRoute(path: string): string {
    const encoded = encodePath(path);
    return encoded ? `/webdav/${encoded}` : '/webdav';
  }

  private text(response: PortalResponse): string {
    if (typeof response === 'string') {
      return response;
    }
    throw unexpected('read');
  }

  private toEntry(root: string, item: unknown): DirectoryEntry {
    if (!isRecord(item)) {
      throw unexpected('fetchResources');
    }
    const name = stringField(item, 'name');
    if (name === null) {
      throw unexpected('fetchResources');
    }
    return {
      name,
      path: joinPath(root, name),
      href: stringField(item, 'href') ?? this.http.webdavPath(joinPath(root, name)),
      lastModified: stringField(item, 'lastmodified'),
      isFolder: item.isFolder === true,
      isDeleted: item.isDeleted === true,
      fileId: stringField(item, 'fileId')
    };
  }
}
