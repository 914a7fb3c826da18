import { join } from 'path';
import { CodexLogReader } from '../transcript/codex-log-reader.js';
import { GeminiSessionReader } from '../transcript/gemini-session-reader.js';
import { projectHashOfSessionFile } from '../transcript/project-hash.js';
import { extractCodexSessionId, readGeminiSessionId } from '../transcript/session-id.js';
import type { TranscriptReader } from '../transcript/types.js';
import type { PanebridgeConfig, ProviderName, SessionDescriptor } from '../types/index.js';
import type { IEnvironment, IStorage } from '../types/interfaces.js';
import type { DescriptorLocation } from './descriptor.js';

export interface ProcessProbe {
  storage: IStorage;
  isProcessAlive: (pid: number) => boolean;
}

/**
 * What differs between assistants: where their session record and transcript
 * live, and which fields are written back once a transcript is found.
 */
export interface ProviderProfile {
  name: ProviderName;
  displayName: string;
  location: DescriptorLocation;
  /** Hint shown when no session is found. */
  startHint: string;
  defaultTimeoutSec(config: PanebridgeConfig): number;
  createReader(descriptor: SessionDescriptor, config: PanebridgeConfig, env: IEnvironment): TranscriptReader;
  /** Descriptor fields recording which transcript the session writes to. */
  bindingFields(transcriptPath: string): Record<string, string>;
  /** Messages go to a bridge process through the input FIFO instead of the pane. */
  deliversViaFifo(descriptor: SessionDescriptor): boolean;
  /** Extra liveness rules for tmux sessions. Returns the failure, if any. */
  checkTmuxProcesses?(descriptor: SessionDescriptor, probe: ProcessProbe): string | undefined;
}

function stringField(raw: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = raw[key];
    if (typeof value === 'string' && value.length > 0) return value;
  }
  return undefined;
}

export function readPidFile(storage: IStorage, path: string): number | undefined {
  if (!storage.exists(path)) return undefined;
  const text = storage.readFile(path, 'utf-8').trim();
  if (!/^\d+$/.test(text)) return undefined;
  return parseInt(text, 10);
}

export const codexProfile: ProviderProfile = {
  name: 'codex',
  displayName: 'Codex',
  location: { envPrefix: 'CODEX', fileName: '.codex-session' },
  startHint: 'Start Codex through your session launcher first',
  defaultTimeoutSec: (config) => config.codex.syncTimeoutSec,

  createReader: (descriptor, config) =>
    new CodexLogReader({
      root: config.codex.sessionRoot,
      preferredPath: stringField(descriptor.raw, 'codex_session_path'),
      pollIntervalMs: config.codex.pollIntervalMs,
    }),

  bindingFields: (transcriptPath): Record<string, string> => {
    const sessionId = extractCodexSessionId(transcriptPath);
    if (!sessionId) {
      return { codex_session_path: transcriptPath };
    }
    return {
      codex_session_path: transcriptPath,
      codex_session_id: sessionId,
      codex_start_cmd: `codex resume ${sessionId}`,
    };
  },

  deliversViaFifo: (descriptor) => descriptor.terminal === 'tmux' && descriptor.inputFifo !== undefined,

  checkTmuxProcesses: (descriptor, probe) => {
    const codexPidFile = join(descriptor.runtimeDir, 'codex.pid');
    if (!probe.storage.exists(codexPidFile)) {
      return 'Codex process PID file not found';
    }
    const codexPid = readPidFile(probe.storage, codexPidFile);
    if (codexPid === undefined) {
      return 'Failed to read Codex process PID';
    }
    if (!probe.isProcessAlive(codexPid)) {
      return `Codex process (PID:${codexPid}) has exited`;
    }

    const bridgePidFile = join(descriptor.runtimeDir, 'bridge.pid');
    if (probe.storage.exists(bridgePidFile)) {
      const bridgePid = readPidFile(probe.storage, bridgePidFile);
      if (bridgePid === undefined) {
        return 'Failed to read bridge process PID';
      }
      if (!probe.isProcessAlive(bridgePid)) {
        return `Bridge process (PID:${bridgePid}) has exited`;
      }
    }

    if (descriptor.inputFifo && !probe.storage.exists(descriptor.inputFifo)) {
      return 'Communication pipe does not exist';
    }
    return undefined;
  },
};

export const geminiProfile: ProviderProfile = {
  name: 'gemini',
  displayName: 'Gemini',
  location: { envPrefix: 'GEMINI', fileName: '.gemini-session' },
  startHint: 'Start Gemini through your session launcher first',
  defaultTimeoutSec: (config) => config.gemini.syncTimeoutSec,

  createReader: (descriptor, config, env) =>
    new GeminiSessionReader({
      root: config.gemini.root,
      workDir: descriptor.workDir || env.cwd(),
      projectHash: config.gemini.projectHash,
      preferredPath: stringField(descriptor.raw, 'gemini_session_path', 'session_path'),
      pollIntervalMs: config.gemini.pollIntervalMs,
      forceReadIntervalMs: config.gemini.forceReadIntervalMs,
      fallback: config.locatorFallback,
    }),

  bindingFields: (transcriptPath): Record<string, string> => {
    const fields: Record<string, string> = { gemini_session_path: transcriptPath };
    const projectHash = projectHashOfSessionFile(transcriptPath);
    if (projectHash) fields.gemini_project_hash = projectHash;
    const sessionId = readGeminiSessionId(transcriptPath);
    if (sessionId) fields.gemini_session_id = sessionId;
    return fields;
  },

  deliversViaFifo: () => false,
};

export const PROVIDERS: Record<ProviderName, ProviderProfile> = {
  codex: codexProfile,
  gemini: geminiProfile,
};

export function getProviderProfile(name: ProviderName): ProviderProfile {
  return PROVIDERS[name];
}
