import { createHash } from 'crypto';
import { homedir } from 'os';
import { basename, dirname, join, resolve } from 'path';

/**
 * Directory name Gemini uses for a project's chats: sha256 of the absolute
 * working directory, symlinks left unresolved.
 */
export function geminiProjectHash(workDir: string): string {
  const expanded = workDir === '~' ? homedir() : workDir.startsWith('~/') ? join(homedir(), workDir.slice(2)) : workDir;
  return createHash('sha256').update(resolve(expanded)).digest('hex');
}

/** `<root>/<hash>/chats/session-x.json` → `<hash>`. */
export function projectHashOfSessionFile(sessionPath: string): string {
  return basename(dirname(dirname(sessionPath)));
}
