import type { TerminalKind } from '../types/index.js';

export type SplitDirection = 'right' | 'bottom';

export interface CreatePaneOptions {
  /** Command line started in the new pane. */
  cmd: string;
  cwd: string;
  direction?: SplitDirection;
  /** Size of the new pane as a percentage of the parent. */
  percent?: number;
  /** Pane to split; defaults to the active one. */
  parentPane?: string;
}

/**
 * One terminal multiplexer. `target` is the multiplexer's own handle: a tmux
 * session name, a wezterm pane id or an iTerm2 session id.
 */
export interface TerminalBackend {
  readonly kind: TerminalKind;
  /** Type `text` into the target and press Enter. Throws InjectionFailedError. */
  sendText(target: string, text: string): Promise<void>;
  /** Never throws; an absent multiplexer reports false. */
  isAlive(target: string): boolean;
  killPane(target: string): void;
  activate(target: string): void;
  /** Returns the new target handle. Throws TerminalQueryError. */
  createPane(options: CreatePaneOptions): Promise<string>;
}

/**
 * Drop carriage returns and surrounding whitespace. Returns an empty string
 * when there is nothing left to send.
 */
export function normalizeInjectedText(text: string): string {
  return text.replace(/\r/g, '').trim();
}
