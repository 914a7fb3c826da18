/**
 * Seams for the outside world (filesystem, environment, subprocesses).
 * Production code uses the infra/ implementations; tests inject fakes.
 */

export interface ExecOptions {
  /** Written to the child's stdin. */
  input?: string;
  /** Kill the child after this many milliseconds. */
  timeoutMs?: number;
  /** Attach the child to this process's terminal (e.g. `tmux attach`). */
  interactive?: boolean;
}

export interface ICommandExecutor {
  /** Run a command and return its stdout. Throws on non-zero exit. */
  exec(file: string, args: string[], options?: ExecOptions): string;
  /** Run a command, discarding output. Throws on non-zero exit. */
  execVoid(file: string, args: string[], options?: ExecOptions): void;
}

export interface IStorage {
  readFile(path: string, encoding: BufferEncoding): string;
  writeFile(path: string, data: string): void;
  appendFile(path: string, data: string): void;
  exists(path: string): boolean;
  rename(from: string, to: string): void;
  unlink(path: string): void;
}

export interface IEnvironment {
  get(key: string): string | undefined;
  homedir(): string;
  platform(): string;
  cwd(): string;
}
