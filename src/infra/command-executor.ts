/**
 * ICommandExecutor implementation that runs commands on the local machine.
 */

import { execFileSync } from 'child_process';
import type { ExecOptions, ICommandExecutor } from '../types/interfaces.js';

export class LocalCommandExecutor implements ICommandExecutor {
  exec(file: string, args: string[], options?: ExecOptions): string {
    return execFileSync(file, args, {
      encoding: 'utf-8',
      input: options?.input,
      timeout: options?.timeoutMs,
      stdio: ['pipe', 'pipe', 'pipe'],
    });
  }

  execVoid(file: string, args: string[], options?: ExecOptions): void {
    if (options?.interactive) {
      execFileSync(file, args, { stdio: 'inherit', timeout: options.timeoutMs });
      return;
    }
    execFileSync(file, args, {
      input: options?.input,
      timeout: options?.timeoutMs,
      stdio: [options?.input === undefined ? 'ignore' : 'pipe', 'ignore', 'pipe'],
    });
  }
}

export const localCommandExecutor = new LocalCommandExecutor();

/**
 * Extract a human-readable reason from an execFileSync failure.
 */
export function describeCommandFailure(error: unknown): string {
  if (error instanceof Error) {
    const stderr = 'stderr' in error ? error.stderr : undefined;
    const text = typeof stderr === 'string' ? stderr : Buffer.isBuffer(stderr) ? stderr.toString('utf-8') : '';
    return text.trim().length > 0 ? `${error.message}: ${text.trim()}` : error.message;
  }
  return String(error);
}
