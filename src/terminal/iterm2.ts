import { InjectionFailedError, TerminalQueryError } from '../errors.js';
import { describeCommandFailure, localCommandExecutor } from '../infra/command-executor.js';
import { escapeShellArg } from '../infra/shell-escape.js';
import { sleep } from '../infra/sleep.js';
import type { ICommandExecutor } from '../types/interfaces.js';
import { normalizeInjectedText, type CreatePaneOptions, type TerminalBackend } from './backend.js';

const KEYSTROKE_SETTLE_MS = 10;
const NEW_PANE_SETTLE_MS = 200;

export interface Iterm2BackendOptions {
  /** Path to the `it2` control CLI. */
  bin?: string;
}

/**
 * iTerm2 through the `it2` CLI. Targets are iTerm2 session ids.
 */
export class Iterm2Backend implements TerminalBackend {
  readonly kind = 'iterm2' as const;
  private readonly bin: string;

  constructor(
    private readonly executor: ICommandExecutor = localCommandExecutor,
    options: Iterm2BackendOptions = {},
  ) {
    this.bin = options.bin || 'it2';
  }

  async sendText(sessionId: string, text: string): Promise<void> {
    const sanitized = normalizeInjectedText(text);
    if (!sanitized) return;
    await this.typeLine(sessionId, sanitized);
  }

  isAlive(sessionId: string): boolean {
    let output: string;
    try {
      output = this.executor.exec(this.bin, ['session', 'list', '--json']);
    } catch {
      return false;
    }

    let sessions: unknown;
    try {
      sessions = JSON.parse(output);
    } catch {
      return false;
    }
    if (!Array.isArray(sessions)) return false;

    return sessions.some(
      (session: unknown) =>
        typeof session === 'object' && session !== null && 'id' in session && session.id === sessionId,
    );
  }

  killPane(sessionId: string): void {
    try {
      this.executor.execVoid(this.bin, ['session', 'close', '--session', sessionId, '--force']);
    } catch {
      // Session already closed.
    }
  }

  activate(sessionId: string): void {
    try {
      this.executor.execVoid(this.bin, ['session', 'focus', sessionId]);
    } catch (error) {
      throw new TerminalQueryError(`it2 session focus failed: ${describeCommandFailure(error)}`, { sessionId }, error);
    }
  }

  async createPane(options: CreatePaneOptions): Promise<string> {
    const args = ['session', 'split'];
    if ((options.direction ?? 'right') === 'right') {
      args.push('--vertical');
    }
    if (options.parentPane) {
      args.push('--session', options.parentPane);
    }

    let output: string;
    try {
      output = this.executor.exec(this.bin, args).trim();
    } catch (error) {
      throw new TerminalQueryError(
        `it2 session split failed: ${describeCommandFailure(error)}`,
        { command: [this.bin, ...args].join(' ') },
        error,
      );
    }

    // it2 prints "Created new pane: <session id>".
    const separator = output.lastIndexOf(':');
    const sessionId = separator >= 0 ? output.slice(separator + 1).trim() : output;

    if (sessionId && options.cmd) {
      await sleep(NEW_PANE_SETTLE_MS);
      await this.typeLine(sessionId, `cd ${escapeShellArg(options.cwd)} && ${options.cmd}`);
    }

    return sessionId;
  }

  private async typeLine(sessionId: string, line: string): Promise<void> {
    this.send(sessionId, line);
    await sleep(KEYSTROKE_SETTLE_MS);
    this.send(sessionId, '\r');
  }

  private send(sessionId: string, payload: string): void {
    try {
      this.executor.execVoid(this.bin, ['session', 'send', payload, '--session', sessionId]);
    } catch (error) {
      throw new InjectionFailedError(
        `it2 session send failed for ${sessionId}: ${describeCommandFailure(error)}`,
        { sessionId },
        error,
      );
    }
  }
}
