import { readdirSync, statSync, type Dirent } from 'fs';
import { join } from 'path';

/**
 * Minimal glob over a directory tree. Patterns are `/`-separated and relative
 * to the root; `*` and `?` match within one segment and `**` matches any
 * number of directories. Names starting with `.` never match.
 */

function segmentToRegExp(segment: string): RegExp {
  const source = segment
    .split('')
    .map((char) => {
      if (char === '*') return '[^/]*';
      if (char === '?') return '[^/]';
      return char.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    })
    .join('');
  return new RegExp(`^${source}$`);
}

function listEntries(dir: string): Dirent[] {
  try {
    return readdirSync(dir, { withFileTypes: true });
  } catch {
    return [];
  }
}

function entryKind(dir: string, entry: Dirent): 'file' | 'dir' | undefined {
  if (entry.isFile()) return 'file';
  if (entry.isDirectory()) return 'dir';
  if (!entry.isSymbolicLink()) return undefined;
  try {
    const target = statSync(join(dir, entry.name));
    if (target.isFile()) return 'file';
    if (target.isDirectory()) return 'dir';
  } catch {
    // Dangling link.
  }
  return undefined;
}

export function walkMatchingFiles(root: string, pattern: string, visit: (path: string) => void): void {
  const segments = pattern.split('/').filter((segment) => segment.length > 0);
  if (segments.length === 0) return;
  const matchers = segments.map((segment) => (segment === '**' ? undefined : segmentToRegExp(segment)));

  const walk = (dir: string, index: number): void => {
    if (index >= matchers.length) return;
    const matcher = matchers[index];
    if (matcher === undefined) {
      // `**`: zero directories here, or descend and keep the `**`.
      walk(dir, index + 1);
      for (const entry of listEntries(dir)) {
        if (entry.name.startsWith('.')) continue;
        if (entryKind(dir, entry) === 'dir') walk(join(dir, entry.name), index);
      }
      return;
    }

    const last = index === matchers.length - 1;
    for (const entry of listEntries(dir)) {
      if (entry.name.startsWith('.') || !matcher.test(entry.name)) continue;
      const kind = entryKind(dir, entry);
      if (last && kind === 'file') {
        visit(join(dir, entry.name));
      } else if (!last && kind === 'dir') {
        walk(join(dir, entry.name), index + 1);
      }
    }
  };

  walk(root, 0);
}
