/**
 * Ask an assistant running in a terminal pane and collect its reply from the
 * transcript it writes.
 */

import { join } from 'path';
import { getConfig } from '../config/index.js';
import {
  InjectionFailedError,
  NoActiveSessionError,
  SessionUnhealthyError,
  TranscriptUnavailableError,
  describeError,
} from '../errors.js';
import { localCommandExecutor } from '../infra/command-executor.js';
import { SystemEnvironment } from '../infra/environment.js';
import { FileStorage } from '../infra/storage.js';
import type { TerminalBackend } from '../terminal/backend.js';
import { createTerminalBackend, resolvePaneTarget } from '../terminal/factory.js';
import type { TranscriptCursor, TranscriptReader } from '../transcript/types.js';
import type { HealthResult, PanebridgeConfig, ProviderName, SessionDescriptor } from '../types/index.js';
import type { ICommandExecutor, IEnvironment, IStorage } from '../types/interfaces.js';
import { loadSessionDescriptor, persistDescriptorFields } from './descriptor.js';
import { getProviderProfile, readPidFile, type ProviderProfile } from './providers.js';

/** Length of one bounded wait when the caller asked to wait indefinitely. */
const UNBOUNDED_ROUND_MS = 30_000;
const PROGRESS_EVERY_SEC = 30;

export interface CommunicatorOutput {
  /** Called about every 30 s while an indefinite wait is still running. */
  onWaiting?(elapsedSec: number): void;
}

export interface SessionCommunicatorOptions {
  provider: ProviderName;
  descriptor: SessionDescriptor;
  config?: PanebridgeConfig;
  env?: IEnvironment;
  storage?: IStorage;
  executor?: ICommandExecutor;
  backend?: TerminalBackend;
  reader?: TranscriptReader;
  output?: CommunicatorOutput;
  isProcessAlive?: (pid: number) => boolean;
}

export type OpenSessionOptions = Omit<SessionCommunicatorOptions, 'descriptor'>;

export interface AskAsyncResult {
  marker: string;
  transcriptPath?: string;
}

export interface PingResult {
  healthy: boolean;
  message: string;
}

export interface SessionStatus {
  provider: ProviderName;
  sessionId: string;
  runtimeDir: string;
  terminal: string;
  paneId?: string;
  healthy: boolean;
  status: string;
  transcriptPath?: string;
  inputFifo?: string;
  codexPid?: number;
}

function isProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

export function generateMarker(now: number = Date.now(), pid: number = process.pid): string {
  return `ask-${Math.floor(now / 1000)}-${pid}`;
}

export class SessionCommunicator {
  readonly provider: ProviderName;
  readonly descriptor: SessionDescriptor;
  readonly config: PanebridgeConfig;
  private readonly profile: ProviderProfile;
  private readonly env: IEnvironment;
  private readonly storage: IStorage;
  private readonly backend: TerminalBackend;
  private readonly output: CommunicatorOutput;
  private readonly isProcessAlive: (pid: number) => boolean;
  private transcriptReader?: TranscriptReader;

  /**
   * Load the provider's session record and build a communicator for it.
   * Throws NoActiveSessionError when there is none.
   */
  static open(options: OpenSessionOptions): SessionCommunicator {
    const env = options.env || new SystemEnvironment();
    const storage = options.storage || new FileStorage();
    const profile = getProviderProfile(options.provider);
    const descriptor = loadSessionDescriptor(profile.location, { env, storage });
    if (!descriptor) {
      throw new NoActiveSessionError(profile.displayName, profile.startHint);
    }
    return new SessionCommunicator({ ...options, env, storage, descriptor });
  }

  constructor(options: SessionCommunicatorOptions) {
    this.provider = options.provider;
    this.descriptor = options.descriptor;
    this.profile = getProviderProfile(options.provider);
    this.config = options.config || getConfig();
    this.env = options.env || new SystemEnvironment();
    this.storage = options.storage || new FileStorage();
    this.output = options.output || {};
    this.isProcessAlive = options.isProcessAlive || isProcessRunning;
    this.backend =
      options.backend ||
      createTerminalBackend(this.descriptor.terminal, this.config, {
        env: this.env,
        storage: this.storage,
        executor: options.executor || localCommandExecutor,
      });
    this.transcriptReader = options.reader;
  }

  /** Pane or tmux session this communicator types into. */
  get target(): string | undefined {
    return resolvePaneTarget(this.descriptor);
  }

  /**
   * Created on first use and bound to the transcript it finds, so the
   * descriptor records it even before the first reply.
   */
  get reader(): TranscriptReader {
    if (!this.transcriptReader) {
      this.transcriptReader = this.profile.createReader(this.descriptor, this.config, this.env);
      const current = this.transcriptReader.currentPath();
      if (current) this.rememberTranscript(current);
    }
    return this.transcriptReader;
  }

  /**
   * `probeTerminal` also asks the multiplexer whether the pane still exists;
   * sends skip that round trip.
   */
  checkHealth(options: { probeTerminal: boolean }): HealthResult {
    try {
      return this.evaluateHealth(options.probeTerminal);
    } catch (error) {
      return { healthy: false, status: `Health check failed: ${describeError(error)}` };
    }
  }

  async askAsync(text: string): Promise<AskAsyncResult> {
    this.ensureHealthy();
    const marker = generateMarker();
    const cursor = await this.reader.captureState();
    await this.deliver(text, marker);
    const transcriptPath = cursor.filePath ?? this.reader.currentPath();
    this.rememberTranscript(transcriptPath);
    return { marker, transcriptPath };
  }

  /**
   * Send and wait for the reply. `timeoutSec` 0 waits until one arrives;
   * undefined uses the provider's configured timeout. Returns null on timeout.
   */
  async askSync(text: string, timeoutSec?: number): Promise<string | null> {
    this.ensureHealthy();
    const marker = generateMarker();
    let cursor: TranscriptCursor = await this.reader.captureState();
    await this.deliver(text, marker);

    const waitSec = timeoutSec ?? this.profile.defaultTimeoutSec(this.config);
    if (waitSec > 0) {
      const result = await this.reader.waitForReply(cursor, waitSec * 1000);
      this.rememberTranscript(result.cursor.filePath);
      return result.reply ? result.reply.text : null;
    }

    const startedAt = Date.now();
    let lastProgressSec = 0;
    while (true) {
      const result = await this.reader.waitForReply(cursor, UNBOUNDED_ROUND_MS);
      cursor = result.cursor;
      this.rememberTranscript(cursor.filePath);
      if (result.reply) {
        return result.reply.text;
      }
      const elapsedSec = Math.floor((Date.now() - startedAt) / 1000);
      if (elapsedSec >= lastProgressSec + PROGRESS_EVERY_SEC) {
        lastProgressSec = elapsedSec;
        this.output.onWaiting?.(elapsedSec);
      }
    }
  }

  ping(): PingResult {
    const { healthy, status } = this.checkHealth({ probeTerminal: true });
    const name = this.profile.displayName;
    return {
      healthy,
      message: healthy ? `${name} connection OK (${status})` : `${name} connection error: ${status}`,
    };
  }

  /**
   * Latest reply already in the transcript. Sends nothing and moves no cursor.
   * Throws TranscriptUnavailableError when no transcript exists yet.
   */
  consumePending(): string | null {
    const reader = this.reader;
    const transcriptPath = reader.currentPath();
    if (!transcriptPath) {
      throw new TranscriptUnavailableError(reader.root);
    }
    this.rememberTranscript(transcriptPath);
    return reader.latestReply();
  }

  getStatus(): SessionStatus {
    const { healthy, status } = this.checkHealth({ probeTerminal: true });
    const result: SessionStatus = {
      provider: this.provider,
      sessionId: this.descriptor.sessionId,
      runtimeDir: this.descriptor.runtimeDir,
      terminal: this.descriptor.terminal,
      paneId: this.target,
      healthy,
      status,
      transcriptPath: this.reader.currentPath(),
    };
    if (this.descriptor.inputFifo) {
      result.inputFifo = this.descriptor.inputFifo;
    }
    if (this.provider === 'codex') {
      try {
        result.codexPid = readPidFile(this.storage, join(this.descriptor.runtimeDir, 'codex.pid'));
      } catch {
        // Reported as absent.
      }
    }
    return result;
  }

  private evaluateHealth(probeTerminal: boolean): HealthResult {
    const { runtimeDir, terminal } = this.descriptor;
    if (!runtimeDir || !this.storage.exists(runtimeDir)) {
      return { healthy: false, status: 'Runtime directory does not exist' };
    }

    const target = this.target;
    if (terminal === 'wezterm' || terminal === 'iterm2') {
      if (!target) {
        return { healthy: false, status: `${terminal} pane_id not found` };
      }
      if (probeTerminal && !this.backend.isAlive(target)) {
        return { healthy: false, status: `${terminal} pane does not exist: ${target}` };
      }
      return { healthy: true, status: 'Session healthy' };
    }

    const processFailure = this.profile.checkTmuxProcesses?.(this.descriptor, {
      storage: this.storage,
      isProcessAlive: this.isProcessAlive,
    });
    if (processFailure) {
      return { healthy: false, status: processFailure };
    }

    if (!this.profile.deliversViaFifo(this.descriptor)) {
      if (!target) {
        return { healthy: false, status: 'tmux session not found in descriptor' };
      }
      if (probeTerminal && !this.backend.isAlive(target)) {
        return { healthy: false, status: `tmux session ${target} not found` };
      }
    }
    return { healthy: true, status: 'Session healthy' };
  }

  private ensureHealthy(): void {
    const { healthy, status } = this.checkHealth({ probeTerminal: false });
    if (!healthy) {
      throw new SessionUnhealthyError(status, { provider: this.provider, sessionId: this.descriptor.sessionId });
    }
  }

  private async deliver(text: string, marker: string): Promise<void> {
    const prefix = this.config.messagePrefix.trim();
    const content = prefix ? `${prefix} ${text}` : text;

    const fifo = this.descriptor.inputFifo;
    if (fifo && this.profile.deliversViaFifo(this.descriptor)) {
      const message = { content, timestamp: new Date().toISOString(), marker };
      try {
        this.storage.appendFile(fifo, `${JSON.stringify(message)}\n`);
      } catch (error) {
        throw new InjectionFailedError(`Failed to write to ${fifo}: ${describeError(error)}`, { fifo }, error);
      }
      return;
    }

    const target = this.target;
    if (!target) {
      throw new InjectionFailedError('Terminal session not configured', { terminal: this.descriptor.terminal });
    }
    await this.backend.sendText(target, content);
  }

  /**
   * Bind the reader to `transcriptPath` and record it in the descriptor file.
   */
  private rememberTranscript(transcriptPath: string | undefined): void {
    const reader = this.reader;
    const path = transcriptPath ?? reader.currentPath();
    if (!path) return;

    reader.setPreferredPath(path);
    persistDescriptorFields(this.descriptor, this.profile.bindingFields(path), this.storage);
  }
}
