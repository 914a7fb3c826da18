export * from './types/index.js';
export * from './errors.js';
export { ConfigManager, getConfig, getConfigDir } from './config/index.js';

export type { CreatePaneOptions, SplitDirection, TerminalBackend } from './terminal/backend.js';
export { TmuxBackend } from './terminal/tmux.js';
export { WeztermBackend } from './terminal/wezterm.js';
export { Iterm2Backend } from './terminal/iterm2.js';
export { createTerminalBackend, detectTerminal, parseTerminalKind, resolvePaneTarget } from './terminal/factory.js';

export type {
  CountCursor,
  OffsetCursor,
  PollOptions,
  PollResult,
  Reply,
  TranscriptCursor,
  TranscriptReader,
} from './transcript/types.js';
export { TranscriptLocator } from './transcript/locator.js';
export { CodexLogReader, extractCodexReply } from './transcript/codex-log-reader.js';
export { GeminiSessionReader } from './transcript/gemini-session-reader.js';
export { geminiProjectHash } from './transcript/project-hash.js';
export { fingerprint } from './transcript/fingerprint.js';

export { loadSessionDescriptor, persistDescriptorFields } from './session/descriptor.js';
export { codexProfile, geminiProfile, getProviderProfile } from './session/providers.js';
export { SessionCommunicator } from './session/communicator.js';
export type {
  AskAsyncResult,
  CommunicatorOutput,
  PingResult,
  SessionCommunicatorOptions,
  SessionStatus,
} from './session/communicator.js';
