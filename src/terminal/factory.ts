import { SystemEnvironment } from '../infra/environment.js';
import { FileStorage } from '../infra/storage.js';
import { TERMINAL_KINDS, type PanebridgeConfig, type SessionDescriptor, type TerminalKind } from '../types/index.js';
import type { ICommandExecutor, IEnvironment, IStorage } from '../types/interfaces.js';
import type { TerminalBackend } from './backend.js';
import {
  defaultShell,
  findOnPath,
  findWeztermBinary,
  isWindowsWezterm,
  isWsl,
  resolveIt2Binary,
  resolveWeztermBinary,
} from './binaries.js';
import { Iterm2Backend } from './iterm2.js';
import { TmuxBackend } from './tmux.js';
import { WeztermBackend, type WeztermWslLaunch } from './wezterm.js';

export interface TerminalFactoryDeps {
  env?: IEnvironment;
  storage?: IStorage;
  executor?: ICommandExecutor;
}

export function isTerminalKind(value: unknown): value is TerminalKind {
  return typeof value === 'string' && TERMINAL_KINDS.some((kind) => kind === value);
}

/** Unknown or missing values mean tmux. */
export function parseTerminalKind(value: unknown): TerminalKind {
  return isTerminalKind(value) ? value : 'tmux';
}

function envFlag(env: IEnvironment, key: string): boolean {
  const raw = env.get(key)?.trim().toLowerCase();
  return raw === '1' || raw === 'true' || raw === 'yes' || raw === 'on';
}

function resolveWslLaunch(
  config: Pick<PanebridgeConfig, 'terminal'>,
  env: IEnvironment,
  storage: IStorage,
): WeztermWslLaunch | undefined {
  const ctx = { env, storage };
  const runningInWsl = isWsl(ctx);
  const forced = config.terminal.wslBackend && env.platform() === 'win32';
  if (!forced && !(runningInWsl && isWindowsWezterm(ctx))) {
    return undefined;
  }
  return {
    inWslPane: Boolean(env.get('WSL_DISTRO_NAME') || env.get('WSL_INTEROP')),
    runningInWsl,
  };
}

/**
 * Build the backend for a declared terminal kind. Binary paths and flags are
 * resolved here, once, and held by the returned backend.
 */
export function createTerminalBackend(
  kind: TerminalKind,
  config: Pick<PanebridgeConfig, 'configDir' | 'terminal'>,
  deps: TerminalFactoryDeps = {},
): TerminalBackend {
  const env = deps.env || new SystemEnvironment();
  const storage = deps.storage || new FileStorage();

  switch (kind) {
    case 'wezterm':
      return new WeztermBackend(deps.executor, {
        bin: resolveWeztermBinary({ env, storage, configDir: config.configDir }),
        className: env.get('CODEX_WEZTERM_CLASS') || env.get('WEZTERM_CLASS') || undefined,
        preferMux: envFlag(env, 'CODEX_WEZTERM_PREFER_MUX'),
        noAutoStart: envFlag(env, 'CODEX_WEZTERM_NO_AUTO_START'),
        enterDelayMs: config.terminal.weztermEnterDelayMs,
        platform: env.platform(),
        shell: defaultShell({ env, storage }),
        wsl: resolveWslLaunch(config, env, storage),
      });
    case 'iterm2':
      return new Iterm2Backend(deps.executor, { bin: resolveIt2Binary({ env, storage }) });
    case 'tmux':
      return new TmuxBackend(deps.executor, {
        enterDelayMs: config.terminal.tmuxEnterDelayMs,
        insideTmux: Boolean(env.get('TMUX')),
      });
  }
}

/**
 * The multiplexer handle a descriptor addresses: the pane id for wezterm and
 * iTerm2, the session name for tmux.
 */
export function resolvePaneTarget(descriptor: Pick<SessionDescriptor, 'terminal' | 'paneId' | 'tmuxSession'>): string | undefined {
  return descriptor.terminal === 'tmux' ? descriptor.tmuxSession : descriptor.paneId;
}

/**
 * Guess the terminal this process runs in, for callers without a descriptor.
 */
export function detectTerminal(
  configDir: string,
  deps: Pick<TerminalFactoryDeps, 'env' | 'storage'> = {},
): TerminalKind | undefined {
  const env = deps.env || new SystemEnvironment();
  const storage = deps.storage || new FileStorage();

  if (env.get('WEZTERM_PANE')) return 'wezterm';
  if (env.get('ITERM_SESSION_ID')) return 'iterm2';
  if (env.get('TMUX')) return 'tmux';

  if (findWeztermBinary({ env, storage, configDir })) return 'wezterm';
  const it2Override = env.get('CODEX_IT2_BIN') || env.get('IT2_BIN');
  if (it2Override && storage.exists(it2Override)) return 'iterm2';
  if (findOnPath({ env, storage }, 'it2')) return 'iterm2';
  if (findOnPath({ env, storage }, 'tmux', 'tmux.exe')) return 'tmux';
  return undefined;
}
