/**
 * TypeScript type definitions
 */

export * from './interfaces.js';

export type TerminalKind = 'tmux' | 'wezterm' | 'iterm2';

export const TERMINAL_KINDS: readonly TerminalKind[] = ['tmux', 'wezterm', 'iterm2'];

export type ProviderName = 'codex' | 'gemini';

export interface PanebridgeConfig {
  /** Directory for installer-written state such as the cached wezterm path. */
  configDir: string;
  codex: {
    /** Root of the Codex JSONL session logs. Equivalent to CODEX_SESSION_ROOT. */
    sessionRoot: string;
    pollIntervalMs: number;
    /** Default `--wait` timeout. 0 waits indefinitely. */
    syncTimeoutSec: number;
  };
  gemini: {
    /** Root of the per-project Gemini chat directories. Equivalent to GEMINI_ROOT. */
    root: string;
    /** Overrides the hash derived from the working directory. */
    projectHash?: string;
    pollIntervalMs: number;
    /**
     * Re-read the session document at least this often while waiting, even when
     * mtime and size look unchanged.
     */
    forceReadIntervalMs: number;
    syncTimeoutSec: number;
  };
  terminal: {
    tmuxEnterDelayMs: number;
    weztermEnterDelayMs: number;
    /** Launch wezterm panes through WSL. Equivalent to PANEBRIDGE_BACKEND_ENV=wsl. */
    wslBackend: boolean;
  };
  /** Prepended to every injected message. */
  messagePrefix: string;
  /** Widen transcript discovery to sibling projects when the primary scope is empty. */
  locatorFallback: boolean;
}

/**
 * Persisted record that ties a logical assistant session to its terminal
 * surface and transcript. Owned by whatever launched the assistant; this
 * package reads it and writes back transcript bindings only.
 */
export interface SessionDescriptor {
  sessionId: string;
  runtimeDir: string;
  terminal: TerminalKind;
  /** wezterm / iterm2 pane handle. */
  paneId?: string;
  /** tmux session name. */
  tmuxSession?: string;
  inputFifo?: string;
  workDir?: string;
  /** Descriptor file the record was loaded from; absent for env-provided sessions. */
  sessionFile?: string;
  /** Full JSON object as read, so unrelated fields survive a rewrite. */
  raw: Record<string, unknown>;
}

export interface HealthResult {
  healthy: boolean;
  status: string;
}
