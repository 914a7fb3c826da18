import { closeSync, existsSync, fstatSync, openSync, readSync, statSync } from 'fs';
import { sleep } from '../infra/sleep.js';
import { isSameReply, makeReply } from './fingerprint.js';
import { TranscriptLocator, isNewer } from './locator.js';
import { clampInterval, rescanIntervalMs } from './timing.js';
import type { OffsetCursor, PollOptions, PollResult, Reply, TranscriptReader } from './types.js';

const READ_CHUNK_BYTES = 64 * 1024;
const TAIL_CHUNK_BYTES = 4 * 1024;
const TAIL_MAX_BYTES = 256 * 1024;
const TAIL_MIN_LINES = 50;
const NEWLINE = 0x0a;

export const CODEX_LOG_PATTERN = '**/*.jsonl';

export interface CodexLogReaderOptions {
  /** Root of the session logs, e.g. ~/.codex/sessions. */
  root: string;
  /** Log bound by an earlier run; kept while it is still the newest. */
  preferredPath?: string;
  /** Clamped to 10–500 ms. */
  pollIntervalMs?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reply carried by one log record: a `response_item` whose payload is a
 * `message`. Text comes from the `output_text` parts, or from the legacy
 * `payload.message` string.
 */
export function extractCodexReply(entry: unknown): Reply | null {
  if (!isRecord(entry) || entry.type !== 'response_item') return null;
  const payload = entry.payload;
  if (!isRecord(payload) || payload.type !== 'message') return null;

  const originId = typeof payload.id === 'string' ? payload.id : undefined;
  const content = Array.isArray(payload.content) ? payload.content : [];
  const texts = content
    .filter((item): item is Record<string, unknown> => isRecord(item) && item.type === 'output_text')
    .map((item) => (typeof item.text === 'string' ? item.text : ''))
    .filter((text) => text.length > 0);

  const joined = texts.join('\n').trim();
  if (joined) return makeReply(joined, originId);

  if (typeof payload.message === 'string' && payload.message.trim()) {
    return makeReply(payload.message.trim(), originId);
  }
  return null;
}

function parseLine(line: string): Reply | null {
  if (!line) return null;
  try {
    return extractCodexReply(JSON.parse(line));
  } catch {
    // Torn or foreign line.
    return null;
  }
}

interface ScanOutcome {
  reply: Reply | null;
  offset: number;
  lastModifiedMs: number;
  /** Stopped because the deadline passed mid-file. */
  expired: boolean;
}

/**
 * Tails Codex's append-only JSONL session logs.
 */
export class CodexLogReader implements TranscriptReader<OffsetCursor> {
  readonly kind = 'offset' as const;
  private readonly locator: TranscriptLocator;
  private readonly pollIntervalMs: number;

  constructor(options: CodexLogReaderOptions) {
    this.locator = new TranscriptLocator({
      root: options.root,
      pattern: CODEX_LOG_PATTERN,
      preferred: options.preferredPath,
    });
    this.pollIntervalMs = clampInterval(options.pollIntervalMs, 50, 10, 500);
  }

  get root(): string {
    return this.locator.root;
  }

  currentPath(): string | undefined {
    return this.locator.resolve();
  }

  setPreferredPath(path: string | undefined): void {
    this.locator.setPreferred(path);
  }

  async captureState(): Promise<OffsetCursor> {
    const filePath = this.locator.resolve();
    if (filePath) {
      try {
        const stat = statSync(filePath);
        return { kind: 'offset', filePath, offset: stat.size, lastModifiedMs: stat.mtimeMs };
      } catch {
        // Unreadable: everything in it counts as new.
      }
    }
    return { kind: 'offset', filePath, offset: 0, lastModifiedMs: 0 };
  }

  waitForReply(cursor: OffsetCursor, timeoutMs: number): Promise<PollResult<OffsetCursor>> {
    return this.poll(cursor, { timeoutMs, block: true });
  }

  tryGetReply(cursor: OffsetCursor): Promise<PollResult<OffsetCursor>> {
    return this.poll(cursor, { timeoutMs: 0, block: false });
  }

  async poll(cursor: OffsetCursor, options: PollOptions): Promise<PollResult<OffsetCursor>> {
    const { block } = options;
    const deadline = Date.now() + options.timeoutMs;
    const rescanEveryMs = rescanIntervalMs(options.timeoutMs);
    let lastRescan = Date.now();
    let state: OffsetCursor = { ...cursor };

    while (true) {
      const filePath = this.ensureLog(state.filePath);
      if (!filePath) {
        if (!block) {
          return { reply: null, cursor: { ...state, filePath: undefined, offset: 0 } };
        }
        if (Date.now() >= deadline) {
          return { reply: null, cursor: state };
        }
        await sleep(this.pollIntervalMs);
        continue;
      }

      if (state.filePath !== undefined && state.filePath !== filePath) {
        // A different log was bound meanwhile; read it from the start.
        state = { ...state, filePath, offset: 0 };
      } else if (state.filePath === undefined) {
        state = { ...state, filePath };
      }

      const outcome = this.scanFrom(filePath, state, block ? deadline : undefined);
      state = { ...state, offset: outcome.offset, lastModifiedMs: outcome.lastModifiedMs };
      if (outcome.reply) {
        return {
          reply: outcome.reply,
          cursor: {
            ...state,
            lastReplyId: outcome.reply.originId,
            lastReplyFingerprint: outcome.reply.fingerprint,
          },
        };
      }
      if (outcome.expired) {
        return { reply: null, cursor: state };
      }

      if (Date.now() - lastRescan >= rescanEveryMs) {
        const latest = this.locator.scanLatest();
        lastRescan = Date.now();
        if (latest && latest !== filePath && isNewer(latest, filePath)) {
          // Rotation: start the new log from its beginning so a reply written
          // before we noticed it is not skipped.
          this.locator.setPreferred(latest);
          state = { ...state, filePath: latest, offset: 0 };
          if (!block) {
            return { reply: null, cursor: state };
          }
          await sleep(this.pollIntervalMs);
          continue;
        }
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
    const filePath = this.locator.resolve();
    if (!filePath) return null;

    let lines: string[];
    try {
      lines = this.readTail(filePath);
    } catch {
      return null;
    }

    for (let i = lines.length - 1; i >= 0; i--) {
      const reply = parseLine(lines[i].trim());
      if (reply) return reply.text;
    }
    return null;
  }

  private ensureLog(current: string | undefined): string | undefined {
    const preferred = this.locator.preferred;
    if (preferred && existsSync(preferred)) return preferred;
    if (current && existsSync(current)) return current;

    const latest = this.locator.scanLatest();
    if (latest) {
      this.locator.setPreferred(latest);
    }
    return latest;
  }

  /**
   * Read complete lines from `state.offset` and return the first new reply.
   * An unterminated last line is left for the next read.
   */
  private scanFrom(filePath: string, state: OffsetCursor, deadline: number | undefined): ScanOutcome {
    let fd: number;
    try {
      fd = openSync(filePath, 'r');
    } catch {
      return { reply: null, offset: state.offset, lastModifiedMs: state.lastModifiedMs, expired: false };
    }

    try {
      const stat = fstatSync(fd);
      const size = stat.size;
      let offset = Math.min(Math.max(state.offset, 0), size);
      let readPosition = offset;
      let pending = Buffer.alloc(0);
      const chunk = Buffer.alloc(READ_CHUNK_BYTES);

      while (readPosition < size) {
        const bytesRead = readSync(fd, chunk, 0, Math.min(chunk.length, size - readPosition), readPosition);
        if (bytesRead <= 0) break;
        readPosition += bytesRead;
        pending = pending.length === 0 ? Buffer.from(chunk.subarray(0, bytesRead)) : Buffer.concat([pending, chunk.subarray(0, bytesRead)]);

        let newline = pending.indexOf(NEWLINE);
        while (newline !== -1) {
          if (deadline !== undefined && Date.now() >= deadline) {
            return { reply: null, offset, lastModifiedMs: stat.mtimeMs, expired: true };
          }
          const line = pending.subarray(0, newline).toString('utf-8').trim();
          pending = pending.subarray(newline + 1);
          offset += newline + 1;

          const reply = parseLine(line);
          if (reply && !isSameReply(reply, state.lastReplyId, state.lastReplyFingerprint)) {
            return { reply, offset, lastModifiedMs: stat.mtimeMs, expired: false };
          }
          newline = pending.indexOf(NEWLINE);
        }
      }

      return { reply: null, offset, lastModifiedMs: stat.mtimeMs, expired: false };
    } catch {
      return { reply: null, offset: state.offset, lastModifiedMs: state.lastModifiedMs, expired: false };
    } finally {
      closeSync(fd);
    }
  }

  /** Last lines of the log: at most 256 KiB, fewer once 50 lines are in hand. */
  private readTail(filePath: string): string[] {
    const fd = openSync(filePath, 'r');
    try {
      let position = fstatSync(fd).size;
      const chunks: Buffer[] = [];
      let total = 0;
      let newlines = 0;

      while (position > 0 && total < TAIL_MAX_BYTES) {
        const readSize = Math.min(TAIL_CHUNK_BYTES, position);
        position -= readSize;
        const chunk = Buffer.alloc(readSize);
        const bytesRead = readSync(fd, chunk, 0, readSize, position);
        const data = chunk.subarray(0, bytesRead);
        chunks.unshift(data);
        total += bytesRead;
        for (const byte of data) {
          if (byte === NEWLINE) newlines++;
        }
        if (newlines >= TAIL_MIN_LINES) break;
      }

      return Buffer.concat(chunks).toString('utf-8').split(/\r?\n/);
    } finally {
      closeSync(fd);
    }
  }
}
