import { InjectionFailedError, TerminalQueryError } from '../errors.js';
import { describeCommandFailure, localCommandExecutor } from '../infra/command-executor.js';
import { sleep } from '../infra/sleep.js';
import type { ExecOptions, ICommandExecutor } from '../types/interfaces.js';
import { normalizeInjectedText, type CreatePaneOptions, type TerminalBackend } from './backend.js';

/** Longest single-line payload typed with `send-keys -l`; anything bigger is pasted. */
const SEND_KEYS_MAX_CHARS = 200;

export interface TmuxBackendOptions {
  bin?: string;
  /** Pause between a bulk paste and the Enter key. */
  enterDelayMs?: number;
  /** True when this process itself runs inside tmux; the factory derives it from $TMUX. */
  insideTmux?: boolean;
}

export class TmuxBackend implements TerminalBackend {
  readonly kind = 'tmux' as const;
  private readonly bin: string;
  private readonly enterDelayMs: number;
  private readonly insideTmux: boolean;

  constructor(
    private readonly executor: ICommandExecutor = localCommandExecutor,
    options: TmuxBackendOptions = {},
  ) {
    this.bin = options.bin || 'tmux';
    this.enterDelayMs = Math.max(0, options.enterDelayMs ?? 0);
    this.insideTmux = options.insideTmux ?? false;
  }

  async sendText(session: string, text: string): Promise<void> {
    const sanitized = normalizeInjectedText(text);
    if (!sanitized) return;

    if (!sanitized.includes('\n') && sanitized.length <= SEND_KEYS_MAX_CHARS) {
      this.inject(session, ['send-keys', '-t', session, '-l', sanitized]);
      this.inject(session, ['send-keys', '-t', session, 'Enter']);
      return;
    }

    await this.pasteAndSubmit(session, sanitized);
  }

  isAlive(session: string): boolean {
    try {
      this.executor.execVoid(this.bin, ['has-session', '-t', session]);
      return true;
    } catch {
      return false;
    }
  }

  killPane(session: string): void {
    try {
      this.executor.execVoid(this.bin, ['kill-session', '-t', session]);
    } catch {
      // Session already gone.
    }
  }

  activate(session: string): void {
    const action = this.insideTmux ? 'switch-client' : 'attach-session';
    try {
      this.executor.execVoid(this.bin, [action, '-t', session], { interactive: true });
    } catch (error) {
      throw new TerminalQueryError(`tmux ${action} failed: ${describeCommandFailure(error)}`, { session }, error);
    }
  }

  async createPane(options: CreatePaneOptions): Promise<string> {
    const sessionName = `ai-${Math.floor(Date.now() / 1000) % 100000}-${process.pid}`;
    try {
      this.executor.execVoid(this.bin, ['new-session', '-d', '-s', sessionName, '-c', options.cwd, options.cmd]);
    } catch (error) {
      throw new TerminalQueryError(
        `tmux new-session failed: ${describeCommandFailure(error)}`,
        { session: sessionName, cwd: options.cwd },
        error,
      );
    }
    return sessionName;
  }

  /**
   * Multi-line or long input goes through a named paste buffer so tmux does
   * not interpret each character as a key event. The buffer is always removed.
   */
  private async pasteAndSubmit(session: string, text: string): Promise<void> {
    const bufferName = `pb-${process.pid}-${Date.now()}`;
    this.inject(session, ['load-buffer', '-b', bufferName, '-'], { input: text });
    try {
      this.inject(session, ['paste-buffer', '-t', session, '-b', bufferName, '-p']);
      await sleep(this.enterDelayMs);
      this.inject(session, ['send-keys', '-t', session, 'Enter']);
    } finally {
      try {
        this.executor.execVoid(this.bin, ['delete-buffer', '-b', bufferName]);
      } catch {
        // paste-buffer may have consumed it already.
      }
    }
  }

  private inject(session: string, args: string[], options?: ExecOptions): void {
    try {
      this.executor.execVoid(this.bin, args, options);
    } catch (error) {
      throw new InjectionFailedError(
        `tmux ${args[0]} failed for session ${session}: ${describeCommandFailure(error)}`,
        { session, command: args[0] },
        error,
      );
    }
  }
}
