import { existsSync, statSync } from 'fs';
import { walkMatchingFiles } from './file-walk.js';

export interface TranscriptLocatorOptions {
  root: string;
  /** Glob relative to `root` covering every candidate transcript. */
  pattern: string;
  /** Narrower glob tried first, e.g. one project's directory. */
  primaryPattern?: string;
  /**
   * Widen to `pattern` when `primaryPattern` finds nothing. Defaults to true.
   * Strict callers turn this off to avoid adopting another project's transcript.
   */
  fallback?: boolean;
  preferred?: string;
}

function modifiedMs(path: string): number | undefined {
  try {
    return statSync(path).mtimeMs;
  } catch {
    return undefined;
  }
}

/** Strictly newer by mtime; anything beats a missing or unbound `current`. */
export function isNewer(candidate: string, current: string | undefined): boolean {
  const candidateMtime = modifiedMs(candidate);
  if (candidateMtime === undefined) return false;
  const currentMtime = current === undefined ? undefined : modifiedMs(current);
  return currentMtime === undefined || candidateMtime > currentMtime;
}

/**
 * Finds the transcript an assistant is writing to: the newest candidate under
 * a root, or a previously bound file while it is still the newest.
 */
export class TranscriptLocator {
  readonly root: string;
  private readonly pattern: string;
  private readonly fallback: boolean;
  private primaryPattern?: string;
  private preferredPath?: string;

  constructor(options: TranscriptLocatorOptions) {
    this.root = options.root;
    this.pattern = options.pattern;
    this.primaryPattern = options.primaryPattern;
    this.fallback = options.fallback ?? true;
    this.preferredPath = options.preferred || undefined;
  }

  get preferred(): string | undefined {
    return this.preferredPath;
  }

  setPreferred(path: string | undefined): void {
    this.preferredPath = path || undefined;
  }

  setPrimaryPattern(pattern: string | undefined): void {
    this.primaryPattern = pattern;
  }

  /** Newest matching file by mtime, or undefined when there is none. */
  scanLatest(): string | undefined {
    if (!existsSync(this.root)) return undefined;

    if (this.primaryPattern) {
      const primary = this.newestMatching(this.primaryPattern);
      if (primary || !this.fallback) return primary;
    }
    return this.newestMatching(this.pattern);
  }

  /**
   * The bound file while it exists and nothing newer has appeared; otherwise
   * the newest candidate, which becomes the new binding.
   */
  resolve(): string | undefined {
    const preferred =
      this.preferredPath !== undefined && existsSync(this.preferredPath) ? this.preferredPath : undefined;
    const latest = this.scanLatest();

    if (!latest) {
      return preferred;
    }

    if (latest !== preferred) {
      const latestMtime = modifiedMs(latest);
      const preferredMtime = preferred === undefined ? 0 : (modifiedMs(preferred) ?? 0);
      if (latestMtime === undefined || latestMtime > preferredMtime) {
        this.preferredPath = latest;
        return latest;
      }
    }

    return preferred ?? latest;
  }

  private newestMatching(pattern: string): string | undefined {
    let latest: string | undefined;
    let latestMtime = -1;
    walkMatchingFiles(this.root, pattern, (path) => {
      const mtime = modifiedMs(path);
      if (mtime === undefined) return;
      if (mtime >= latestMtime) {
        latest = path;
        latestMtime = mtime;
      }
    });
    return latest;
  }
}
