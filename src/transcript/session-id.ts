import { closeSync, openSync, readFileSync, readSync } from 'fs';
import { basename, extname } from 'path';

const SESSION_ID_PATTERN = /[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/i;
const FIRST_LINE_MAX_BYTES = 64 * 1024;

function matchSessionId(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  return value.match(SESSION_ID_PATTERN)?.[0];
}

function readFirstLine(path: string): string | undefined {
  let fd: number;
  try {
    fd = openSync(path, 'r');
  } catch {
    return undefined;
  }
  try {
    const buffer = Buffer.alloc(FIRST_LINE_MAX_BYTES);
    const bytesRead = readSync(fd, buffer, 0, buffer.length, 0);
    const text = buffer.subarray(0, bytesRead).toString('utf-8');
    const newline = text.indexOf('\n');
    return newline === -1 ? text : text.slice(0, newline);
  } catch {
    return undefined;
  } finally {
    closeSync(fd);
  }
}

/**
 * Codex session UUID: from the log's file name, else from its first record
 * (`session_id`, `payload.id` or `payload.session.id`).
 */
export function extractCodexSessionId(logPath: string): string | undefined {
  const name = basename(logPath);
  const fromName = matchSessionId(basename(name, extname(name))) ?? matchSessionId(name);
  if (fromName) return fromName;

  const firstLine = readFirstLine(logPath);
  if (!firstLine) return undefined;

  const inLine = matchSessionId(firstLine);
  if (inLine) return inLine;

  let entry: unknown;
  try {
    entry = JSON.parse(firstLine);
  } catch {
    return undefined;
  }
  if (typeof entry !== 'object' || entry === null) return undefined;

  const candidates: unknown[] = [];
  if ('session_id' in entry) candidates.push(entry.session_id);
  if ('payload' in entry && typeof entry.payload === 'object' && entry.payload !== null) {
    const payload = entry.payload;
    if ('id' in payload) candidates.push(payload.id);
    if ('session' in payload && typeof payload.session === 'object' && payload.session !== null && 'id' in payload.session) {
      candidates.push(payload.session.id);
    }
  }

  for (const candidate of candidates) {
    const match = matchSessionId(candidate);
    if (match) return match;
  }
  return undefined;
}

/** `sessionId` of a Gemini session document. */
export function readGeminiSessionId(sessionPath: string): string | undefined {
  try {
    const data: unknown = JSON.parse(readFileSync(sessionPath, 'utf-8'));
    if (typeof data === 'object' && data !== null && 'sessionId' in data && typeof data.sessionId === 'string') {
      return data.sessionId || undefined;
    }
  } catch {
    // Mid-rewrite or gone; the next ask binds it.
  }
  return undefined;
}
