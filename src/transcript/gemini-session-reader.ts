import { existsSync, readFileSync, statSync } from 'fs';
import { TranscriptParseError } from '../errors.js';
import { sleep } from '../infra/sleep.js';
import { fingerprint, isSameReply, makeReply } from './fingerprint.js';
import { TranscriptLocator, isNewer } from './locator.js';
import { geminiProjectHash, projectHashOfSessionFile } from './project-hash.js';
import { clampInterval, rescanIntervalMs } from './timing.js';
import type { CountCursor, PollOptions, PollResult, Reply, TranscriptReader } from './types.js';

const CAPTURE_PARSE_ATTEMPTS = 10;
const CAPTURE_RETRY_MAX_MS = 50;

export const GEMINI_SESSION_PATTERN = '*/chats/session-*.json';

export function geminiPrimaryPattern(projectHash: string): string {
  return `${projectHash}/chats/session-*.json`;
}

export interface GeminiSessionReaderOptions {
  /** Root holding one directory per project hash, e.g. ~/.gemini/tmp. */
  root: string;
  /** Working directory of the Gemini process; used to derive the project hash. */
  workDir: string;
  /** Skips hashing `workDir`. */
  projectHash?: string;
  preferredPath?: string;
  /** Clamped to 20–500 ms. */
  pollIntervalMs?: number;
  /** Clamped to 200–5000 ms. */
  forceReadIntervalMs?: number;
  /** Search other projects when this one has no session. Defaults to true. */
  fallback?: boolean;
}

interface SessionMessage {
  id?: string;
  type?: string;
  content: string;
}

interface SessionDocument {
  messages: SessionMessage[];
}

interface AssistantMessage {
  id?: string;
  content: string;
}

function coerceContent(value: unknown): string {
  if (value === undefined || value === null) return '';
  return typeof value === 'string' ? value : String(value);
}

function toSessionMessage(value: unknown): SessionMessage | undefined {
  if (typeof value !== 'object' || value === null) return undefined;
  const message: SessionMessage = { content: '' };
  if ('id' in value && value.id !== undefined && value.id !== null) message.id = String(value.id);
  if ('type' in value && typeof value.type === 'string') message.type = value.type;
  if ('content' in value) message.content = coerceContent(value.content);
  return message;
}

/** Parse a session document. Throws TranscriptParseError while it is being rewritten. */
export function parseSessionDocument(path: string): SessionDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new TranscriptParseError(path, error);
  }
  if (typeof raw !== 'object' || raw === null || !('messages' in raw) || !Array.isArray(raw.messages)) {
    return { messages: [] };
  }
  // Keep positions: message counts index into the raw list.
  return {
    messages: raw.messages.map((entry: unknown) => toSessionMessage(entry) ?? { content: '' }),
  };
}

export function lastAssistantMessage(document: SessionDocument): AssistantMessage | undefined {
  for (let i = document.messages.length - 1; i >= 0; i--) {
    const message = document.messages[i];
    if (message.type !== 'gemini') continue;
    return { id: message.id, content: message.content.trim() };
  }
  return undefined;
}

/**
 * Reads replies from Gemini's per-session JSON documents, which are rewritten
 * whole on every update. Replies are detected by message-list growth or by the
 * last assistant message changing in place.
 */
export class GeminiSessionReader implements TranscriptReader<CountCursor> {
  readonly kind = 'count' as const;
  private readonly locator: TranscriptLocator;
  private readonly pollIntervalMs: number;
  private readonly forceReadIntervalMs: number;
  private hash: string;

  constructor(options: GeminiSessionReaderOptions) {
    this.hash = options.projectHash || geminiProjectHash(options.workDir);
    this.locator = new TranscriptLocator({
      root: options.root,
      pattern: GEMINI_SESSION_PATTERN,
      primaryPattern: geminiPrimaryPattern(this.hash),
      fallback: options.fallback,
    });
    this.pollIntervalMs = clampInterval(options.pollIntervalMs, 50, 20, 500);
    this.forceReadIntervalMs = clampInterval(options.forceReadIntervalMs, 1000, 200, 5000);
    this.setPreferredPath(options.preferredPath);
  }

  get projectHash(): string {
    return this.hash;
  }

  get root(): string {
    return this.locator.root;
  }

  currentPath(): string | undefined {
    const before = this.locator.preferred;
    const resolved = this.locator.resolve();
    if (resolved && resolved !== before) {
      this.adopt(resolved);
    }
    return resolved;
  }

  setPreferredPath(path: string | undefined): void {
    if (path && existsSync(path)) {
      this.locator.setPreferred(path);
    }
  }

  async captureState(): Promise<CountCursor> {
    const filePath = this.currentPath();
    const cursor: CountCursor = { kind: 'count', filePath, messageCount: 0, mtimeMs: 0, size: 0 };
    if (!filePath || !existsSync(filePath)) return cursor;

    try {
      const stat = statSync(filePath);
      cursor.mtimeMs = stat.mtimeMs;
      cursor.size = stat.size;
    } catch {
      // Stat fields stay zero; the document read below decides.
    }

    let document: SessionDocument | undefined;
    for (let attempt = 0; attempt < CAPTURE_PARSE_ATTEMPTS; attempt++) {
      if (!existsSync(filePath)) break;
      try {
        document = parseSessionDocument(filePath);
        break;
      } catch {
        if (attempt < CAPTURE_PARSE_ATTEMPTS - 1) {
          await sleep(Math.min(this.pollIntervalMs, CAPTURE_RETRY_MAX_MS));
        }
      }
    }

    if (!document) {
      // Unknown baseline: the first successful read during the wait decides.
      return { ...cursor, messageCount: null };
    }

    cursor.messageCount = document.messages.length;
    const last = lastAssistantMessage(document);
    if (last && last.content) {
      cursor.lastReplyId = last.id;
      cursor.lastReplyFingerprint = fingerprint(last.content);
    }
    return cursor;
  }

  waitForReply(cursor: CountCursor, timeoutMs: number): Promise<PollResult<CountCursor>> {
    return this.poll(cursor, { timeoutMs, block: true });
  }

  tryGetReply(cursor: CountCursor): Promise<PollResult<CountCursor>> {
    return this.poll(cursor, { timeoutMs: 0, block: false });
  }

  async poll(cursor: CountCursor, options: PollOptions): Promise<PollResult<CountCursor>> {
    const { block } = options;
    const deadline = Date.now() + options.timeoutMs;
    const rescanEveryMs = rescanIntervalMs(options.timeoutMs);
    let lastRescan = Date.now();
    let lastForcedRead = Date.now();
    let unknownBaseline = cursor.messageCount === null;
    let state: CountCursor = { ...cursor };

    while (true) {
      if (Date.now() - lastRescan >= rescanEveryMs) {
        const latest = this.locator.scanLatest();
        if (latest && latest !== this.locator.preferred && isNewer(latest, this.locator.preferred)) {
          this.adopt(latest);
        }
        lastRescan = Date.now();
      }

      const filePath = this.currentPath();
      if (!filePath || !existsSync(filePath)) {
        if (!block) {
          return {
            reply: null,
            cursor: {
              kind: 'count',
              filePath: undefined,
              messageCount: 0,
              mtimeMs: 0,
              size: 0,
              lastReplyId: state.lastReplyId,
              lastReplyFingerprint: state.lastReplyFingerprint,
            },
          };
        }
        await sleep(this.pollIntervalMs);
        if (Date.now() >= deadline) {
          return { reply: null, cursor: state };
        }
        continue;
      }
      if (state.filePath !== undefined && state.filePath !== filePath) {
        // New session document: everything in it is unseen.
        state = { kind: 'count', filePath, messageCount: 0, mtimeMs: 0, size: 0 };
        unknownBaseline = false;
      } else {
        state = { ...state, filePath };
      }

      try {
        const stat = statSync(filePath);
        const unchanged = stat.mtimeMs <= state.mtimeMs && stat.size === state.size;
        // Coarse mtime can hide a rewrite of equal size, so read anyway now and then.
        if (block && unchanged && Date.now() - lastForcedRead < this.forceReadIntervalMs) {
          await sleep(this.pollIntervalMs);
          if (Date.now() >= deadline) {
            return { reply: null, cursor: state };
          }
          continue;
        }

        const document = parseSessionDocument(filePath);
        lastForcedRead = Date.now();
        const messageCount = document.messages.length;

        if (unknownBaseline) {
          const reply = this.replyOverUnknownBaseline(document, stat.mtimeMs, stat.size, state);
          if (reply) {
            return {
              reply,
              cursor: this.advance(state, messageCount, stat.mtimeMs, stat.size, reply.originId, reply.fingerprint),
            };
          }
          unknownBaseline = false;
          state = this.rebase(state, document, messageCount, stat.mtimeMs, stat.size);
        } else {
          const reply = this.findNewReply(document, state);
          if (reply) {
            return {
              reply,
              cursor: this.advance(state, messageCount, stat.mtimeMs, stat.size, reply.originId, reply.fingerprint),
            };
          }
          state = this.rebase(state, document, messageCount, stat.mtimeMs, stat.size);
        }
      } catch {
        // Document mid-rewrite or briefly missing; try again next round.
      }

      if (!block) {
        return { reply: null, cursor: state };
      }

      await sleep(this.pollIntervalMs);
      if (Date.now() >= deadline) {
        return { reply: null, cursor: state };
      }
    }
  }

  latestReply(): string | null {
    const filePath = this.currentPath();
    if (!filePath) return null;
    try {
      return lastAssistantMessage(parseSessionDocument(filePath))?.content || null;
    } catch {
      return null;
    }
  }

  /**
   * First successful read after a capture that could not parse: the last
   * message counts as new only if it is a non-empty assistant message and the
   * file changed since the capture-time stat.
   */
  private replyOverUnknownBaseline(
    document: SessionDocument,
    mtimeMs: number,
    size: number,
    state: CountCursor,
  ): Reply | null {
    const last = document.messages[document.messages.length - 1];
    if (!last || last.type !== 'gemini') return null;
    const content = last.content.trim();
    if (!content) return null;
    if (mtimeMs <= state.mtimeMs && size === state.size) return null;
    return makeReply(content, last.id);
  }

  private findNewReply(document: SessionDocument, state: CountCursor): Reply | null {
    const previousCount = state.messageCount ?? 0;

    if (document.messages.length > previousCount) {
      // The last non-empty assistant message wins; earlier ones are progress notes.
      let found: Reply | null = null;
      for (const message of document.messages.slice(previousCount)) {
        if (message.type !== 'gemini') continue;
        const content = message.content.trim();
        if (!content) continue;
        const candidate = makeReply(content, message.id);
        if (isSameReply(candidate, state.lastReplyId, state.lastReplyFingerprint)) continue;
        found = candidate;
      }
      return found;
    }

    // Placeholder written first, then filled in place.
    const last = lastAssistantMessage(document);
    if (!last || !last.content) return null;
    const candidate = makeReply(last.content, last.id);
    return isSameReply(candidate, state.lastReplyId, state.lastReplyFingerprint) ? null : candidate;
  }

  private rebase(
    state: CountCursor,
    document: SessionDocument,
    messageCount: number,
    mtimeMs: number,
    size: number,
  ): CountCursor {
    const last = lastAssistantMessage(document);
    // An empty placeholder was never returned, so it must not become the last reply.
    if (!last || !last.content) {
      return { ...state, messageCount, mtimeMs, size };
    }
    return {
      ...state,
      messageCount,
      mtimeMs,
      size,
      lastReplyId: last.id,
      lastReplyFingerprint: fingerprint(last.content),
    };
  }

  private advance(
    state: CountCursor,
    messageCount: number,
    mtimeMs: number,
    size: number,
    lastReplyId: string | undefined,
    lastReplyFingerprint: string,
  ): CountCursor {
    return { ...state, messageCount, mtimeMs, size, lastReplyId, lastReplyFingerprint };
  }

  /** Bind a session file; one under another project directory rebinds the project hash. */
  private adopt(path: string): void {
    this.locator.setPreferred(path);
    const hash = projectHashOfSessionFile(path);
    if (hash && hash !== this.hash) {
      this.hash = hash;
      this.locator.setPrimaryPattern(geminiPrimaryPattern(hash));
    }
  }
}
