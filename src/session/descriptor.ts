import { basename, join } from 'path';
import { describeError, isPermissionError } from '../errors.js';
import { parseTerminalKind } from '../terminal/factory.js';
import type { SessionDescriptor } from '../types/index.js';
import type { IEnvironment, IStorage } from '../types/interfaces.js';

export interface DescriptorLocation {
  /** Environment prefix, e.g. `CODEX` for `CODEX_SESSION_ID`. */
  envPrefix: string;
  /** Descriptor file name in the project directory, e.g. `.codex-session`. */
  fileName: string;
}

function stripBom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function readJsonObject(storage: IStorage, path: string): Record<string, unknown> | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripBom(storage.readFile(path, 'utf-8')));
  } catch {
    return undefined;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return undefined;
  return Object.fromEntries(Object.entries(parsed));
}

function fromEnvironment(location: DescriptorLocation, env: IEnvironment): SessionDescriptor | undefined {
  const read = (suffix: string): string | undefined => env.get(`${location.envPrefix}_${suffix}`);
  const sessionId = read('SESSION_ID');
  if (sessionId === undefined) return undefined;

  const terminal = parseTerminalKind(read('TERMINAL') || 'tmux');
  const paneId =
    terminal === 'wezterm' ? read('WEZTERM_PANE') : terminal === 'iterm2' ? read('ITERM2_PANE') : undefined;
  const raw: Record<string, unknown> = {
    session_id: sessionId,
    runtime_dir: read('RUNTIME_DIR') ?? '',
    terminal,
    tmux_session: read('TMUX_SESSION') ?? '',
    pane_id: paneId ?? '',
    input_fifo: read('INPUT_FIFO') ?? '',
  };

  return {
    sessionId,
    runtimeDir: read('RUNTIME_DIR') ?? '',
    terminal,
    paneId: paneId || undefined,
    tmuxSession: read('TMUX_SESSION') || undefined,
    inputFifo: read('INPUT_FIFO') || undefined,
    raw,
  };
}

function fromFile(path: string, storage: IStorage): SessionDescriptor | undefined {
  if (!storage.exists(path)) return undefined;

  const raw = readJsonObject(storage, path);
  if (!raw || raw.active !== true) return undefined;

  const runtimeDir = optionalString(raw.runtime_dir);
  if (!runtimeDir || !storage.exists(runtimeDir)) return undefined;

  return {
    sessionId: typeof raw.session_id === 'string' ? raw.session_id : String(raw.session_id ?? ''),
    runtimeDir,
    terminal: parseTerminalKind(raw.terminal),
    paneId: optionalString(raw.pane_id),
    tmuxSession: optionalString(raw.tmux_session),
    inputFifo: optionalString(raw.input_fifo),
    workDir: optionalString(raw.work_dir),
    sessionFile: path,
    raw,
  };
}

/**
 * The session record for a provider: from `<PREFIX>_*` environment variables
 * when the launcher exported them, else from the project's descriptor file.
 * A file record counts only while it is marked active and its runtime
 * directory exists.
 */
export function loadSessionDescriptor(
  location: DescriptorLocation,
  deps: { env: IEnvironment; storage: IStorage },
): SessionDescriptor | undefined {
  return (
    fromEnvironment(location, deps.env) ?? fromFile(join(deps.env.cwd(), location.fileName), deps.storage)
  );
}

/**
 * Merge `fields` into the descriptor file and mark it active. The file is
 * re-read first so fields written by other tools survive, then replaced
 * through a temporary file. Failures are reported and otherwise ignored.
 * Returns true when the file was rewritten.
 */
export function persistDescriptorFields(
  descriptor: SessionDescriptor,
  fields: Record<string, string>,
  storage: IStorage,
): boolean {
  Object.assign(descriptor.raw, fields);

  const file = descriptor.sessionFile;
  if (!file || !storage.exists(file)) return false;

  const data = readJsonObject(storage, file);
  if (!data) return false;

  let updated = false;
  for (const [key, value] of Object.entries(fields)) {
    if (data[key] !== value) {
      data[key] = value;
      updated = true;
    }
  }
  if (data.active === false) {
    data.active = true;
    updated = true;
  }
  if (!updated) return false;

  const tmpFile = `${file}.tmp`;
  try {
    storage.writeFile(tmpFile, `${JSON.stringify(data, null, 2)}\n`);
    storage.rename(tmpFile, file);
    return true;
  } catch (error) {
    console.warn(`⚠️  Cannot update ${basename(file)}: ${describeError(error)}`);
    if (isPermissionError(error)) {
      console.warn(`   Check ownership of ${file}`);
    }
    try {
      if (storage.exists(tmpFile)) storage.unlink(tmpFile);
    } catch {
      // Leftover temp file is harmless; the next write replaces it.
    }
    return false;
  }
}
