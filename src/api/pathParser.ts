/**
 * Portal path helpers. Paths are virtual, '/'-separated and relative to the
 * principal's cloud drive root; '' is the root itself.
 */

/**
 * Split a path into clean segments, resolving '.' and '..' without ever
 * climbing above the root.
 */
export function pathSegments(path: string): string[] {
  const segments: string[] = [];
  for (const part of path.replace(/\\/g, '/').split('/')) {
    const segment = part.trim();
    if (segment === '' || segment === '.') continue;
    if (segment === '..') {
      segments.pop();
      continue;
    }
    segments.push(segment);
  }
  return segments;
}

export function normalizePath(path: string): string {
  return pathSegments(path).join('/');
}

export function joinPath(...parts: string[]): string {
  return normalizePath(parts.join('/'));
}

export function parentPath(path: string): string {
  return pathSegments(path).slice(0, -1).join('/');
}

export function baseName(path: string): string {
  const segments = pathSegments(path);
  return segments[segments.length - 1] ?? '';
}

/**
 * Every ancestor of a path followed by the path itself, shortest first
 *
 * @example ancestry('a/b/c') // ['a', 'a/b', 'a/b/c']
 */
export function ancestry(path: string): string[] {
  const segments = pathSegments(path);
  return segments.map((_, index) => segments.slice(0, index + 1).join('/'));
}

export function encodePath(path: string): string {
  return pathSegments(path).map(encodeURIComponent).join('/');
}
