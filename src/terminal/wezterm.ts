import { InjectionFailedError, TerminalQueryError } from '../errors.js';
import { describeCommandFailure, localCommandExecutor } from '../infra/command-executor.js';
import { escapeShellArg } from '../infra/shell-escape.js';
import { sleep } from '../infra/sleep.js';
import type { ICommandExecutor } from '../types/interfaces.js';
import { normalizeInjectedText, type CreatePaneOptions, type TerminalBackend } from './backend.js';

/** Enter encodings tried in order; some hosts strip one or another from argv. */
const ENTER_SEQUENCES = ['\r', '\n', '\r\n'];

export interface WeztermWslLaunch {
  /** The new pane opens inside a WSL distro already (WSL_DISTRO_NAME / WSL_INTEROP set). */
  inWslPane: boolean;
  /** This process runs under WSL, so `wslpath` is on PATH rather than behind `wsl.exe`. */
  runningInWsl: boolean;
}

export interface WeztermBackendOptions {
  bin?: string;
  /** `--class` passed to every `wezterm cli` invocation. */
  className?: string;
  preferMux?: boolean;
  noAutoStart?: boolean;
  enterDelayMs?: number;
  platform?: string;
  /** Shell and its "run this string" flag used to start pane commands. */
  shell?: [string, string];
  /** Set when panes must be started through WSL from a Windows wezterm. */
  wsl?: WeztermWslLaunch;
}

export class WeztermBackend implements TerminalBackend {
  readonly kind = 'wezterm' as const;
  private readonly bin: string;
  private readonly enterDelayMs: number;

  constructor(
    private readonly executor: ICommandExecutor = localCommandExecutor,
    private readonly options: WeztermBackendOptions = {},
  ) {
    this.bin = options.bin || 'wezterm';
    this.enterDelayMs = Math.max(0, options.enterDelayMs ?? 10);
  }

  /** `wezterm cli` plus the global flags shared by every subcommand. */
  cliArgs(...rest: string[]): string[] {
    const args = ['cli'];
    if (this.options.className) args.push('--class', this.options.className);
    if (this.options.preferMux) args.push('--prefer-mux');
    if (this.options.noAutoStart) args.push('--no-auto-start');
    return [...args, ...rest];
  }

  async sendText(paneId: string, text: string): Promise<void> {
    const sanitized = normalizeInjectedText(text);
    if (!sanitized) return;

    // Multi-line input is sent as one bracketed paste; single lines are typed.
    const args = sanitized.includes('\n')
      ? this.cliArgs('send-text', '--pane-id', paneId, sanitized)
      : this.cliArgs('send-text', '--pane-id', paneId, '--no-paste', sanitized);
    try {
      this.executor.execVoid(this.bin, args);
    } catch (error) {
      throw new InjectionFailedError(
        `wezterm send-text failed for pane ${paneId}: ${describeCommandFailure(error)}`,
        { paneId },
        error,
      );
    }

    await sleep(this.enterDelayMs);
    this.pressEnter(paneId);
  }

  isAlive(paneId: string): boolean {
    let output: string;
    try {
      output = this.executor.exec(this.bin, this.cliArgs('list', '--format', 'json'));
    } catch {
      return false;
    }

    let panes: unknown;
    try {
      panes = JSON.parse(output);
    } catch {
      return false;
    }
    if (!Array.isArray(panes)) return false;

    return panes.some((pane: unknown) => {
      if (typeof pane !== 'object' || pane === null || !('pane_id' in pane)) return false;
      return String(pane.pane_id) === String(paneId);
    });
  }

  killPane(paneId: string): void {
    try {
      this.executor.execVoid(this.bin, this.cliArgs('kill-pane', '--pane-id', paneId));
    } catch {
      // Pane already closed.
    }
  }

  activate(paneId: string): void {
    try {
      this.executor.execVoid(this.bin, this.cliArgs('activate-pane', '--pane-id', paneId));
    } catch (error) {
      throw new TerminalQueryError(
        `wezterm activate-pane failed: ${describeCommandFailure(error)}`,
        { paneId },
        error,
      );
    }
  }

  async createPane(options: CreatePaneOptions): Promise<string> {
    const direction = options.direction ?? 'right';
    const percent = options.percent ?? 50;
    const args = this.cliArgs('split-pane');

    if (this.options.wsl) {
      this.pushSplitFlags(args, direction, percent, options.parentPane);
      const startup = `cd ${escapeShellArg(this.resolveWslCwd(options.cwd))} && exec ${options.cmd}`;
      if (this.options.wsl.inWslPane) {
        args.push('--', 'bash', '-l', '-i', '-c', startup);
      } else {
        args.push('--', 'wsl.exe', 'bash', '-l', '-i', '-c', startup);
      }
    } else {
      args.push('--cwd', options.cwd);
      this.pushSplitFlags(args, direction, percent, options.parentPane);
      const [shell, flag] = this.options.shell ?? ['bash', '-c'];
      args.push('--', shell, flag, options.cmd);
    }

    try {
      return this.executor.exec(this.bin, args).trim();
    } catch (error) {
      throw new TerminalQueryError(
        `WezTerm split-pane failed: ${describeCommandFailure(error)}`,
        { command: [this.bin, ...args].join(' ') },
        error,
      );
    }
  }

  private pushSplitFlags(args: string[], direction: string, percent: number, parentPane?: string): void {
    if (direction === 'right') {
      args.push('--right');
    } else if (direction === 'bottom') {
      args.push('--bottom');
    }
    args.push('--percent', String(percent));
    if (parentPane) {
      args.push('--pane-id', parentPane);
    }
  }

  private resolveWslCwd(cwd: string): string {
    const localhost = cwd.match(/^[/\\]{1,2}wsl\.localhost[/\\][^/\\]+(.+)$/i);
    if (localhost) {
      return localhost[1].replace(/\\/g, '/');
    }
    if (!cwd.includes('\\') && !/^[A-Za-z]:/.test(cwd)) {
      return cwd;
    }

    const [file, ...args] = this.options.wsl?.runningInWsl
      ? ['wslpath', '-a', cwd]
      : ['wsl.exe', 'wslpath', '-a', cwd];
    try {
      return this.executor.exec(file, args).trim() || cwd;
    } catch {
      // Leave the Windows path as-is; the pane shell reports the bad cd.
      return cwd;
    }
  }

  private pressEnter(paneId: string): void {
    const sendArgs = this.cliArgs('send-text', '--pane-id', paneId, '--no-paste');

    if (this.options.platform !== 'win32') {
      for (const sequence of ENTER_SEQUENCES) {
        try {
          this.executor.execVoid(this.bin, [...sendArgs, sequence]);
          return;
        } catch {
          continue;
        }
      }
    }

    // Windows shells may strip control characters from argv; stdin keeps them.
    try {
      this.executor.execVoid(this.bin, sendArgs, { input: '\r' });
    } catch (error) {
      throw new InjectionFailedError(
        `wezterm could not submit input to pane ${paneId}: ${describeCommandFailure(error)}`,
        { paneId },
        error,
      );
    }
  }
}
