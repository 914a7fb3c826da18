import { createHash } from 'crypto';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { fingerprint, isSameReply, makeReply } from '../../src/transcript/fingerprint.js';
import { geminiProjectHash, projectHashOfSessionFile } from '../../src/transcript/project-hash.js';
import { extractCodexSessionId, readGeminiSessionId } from '../../src/transcript/session-id.js';

const SESSION_UUID = '0199a1b2-c3d4-7e5f-8a9b-0c1d2e3f4a5b';

describe('session identifiers', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'panebridge-ids-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads the Codex session id from the log file name', () => {
    const log = join(dir, `rollout-2026-10-18T09-30-00-${SESSION_UUID}.jsonl`);
    writeFileSync(log, '');
    expect(extractCodexSessionId(log)).toBe(SESSION_UUID);
  });

  it('falls back to the first record of the log', () => {
    const log = join(dir, 'rollout.jsonl');
    writeFileSync(log, `${JSON.stringify({ type: 'session_meta', payload: { id: SESSION_UUID } })}\n{"type":"x"}\n`);
    expect(extractCodexSessionId(log)).toBe(SESSION_UUID);
  });

  it('returns undefined when neither name nor first record carries an id', () => {
    const log = join(dir, 'rollout.jsonl');
    writeFileSync(log, `${JSON.stringify({ type: 'session_meta', payload: { id: 'not-a-uuid' } })}\n`);
    expect(extractCodexSessionId(log)).toBeUndefined();
    expect(extractCodexSessionId(join(dir, 'missing.jsonl'))).toBeUndefined();
  });

  it('reads the Gemini sessionId field', () => {
    const file = join(dir, 'session-1.json');
    writeFileSync(file, JSON.stringify({ sessionId: 'gemini-session-1', messages: [] }));
    expect(readGeminiSessionId(file)).toBe('gemini-session-1');

    writeFileSync(file, '{"sessionId": ');
    expect(readGeminiSessionId(file)).toBeUndefined();
  });
});

describe('geminiProjectHash', () => {
  it('hashes the absolute working directory', () => {
    const expected = createHash('sha256').update('/work/app').digest('hex');
    expect(geminiProjectHash('/work/app')).toBe(expected);
    expect(geminiProjectHash('/work/app/../app')).toBe(expected);
  });

  it('takes the project hash from a session file path', () => {
    expect(projectHashOfSessionFile('/root/.gemini/tmp/abc123/chats/session-1.json')).toBe('abc123');
  });
});

describe('reply fingerprints', () => {
  it('treats equal text with matching or missing ids as the same reply', () => {
    const reply = makeReply('hello', 'm1');
    expect(reply.fingerprint).toBe(fingerprint('hello'));
    expect(isSameReply(reply, 'm1', fingerprint('hello'))).toBe(true);
    expect(isSameReply(reply, undefined, fingerprint('hello'))).toBe(true);
  });

  it('tells replies apart by id or text', () => {
    const reply = makeReply('hello', 'm2');
    expect(isSameReply(reply, 'm1', fingerprint('hello'))).toBe(false);
    expect(isSameReply(reply, 'm2', fingerprint('hello!'))).toBe(false);
    expect(isSameReply(reply, 'm2', undefined)).toBe(false);
  });

  it('omits originId when the record has none', () => {
    expect(makeReply('plain')).toEqual({ text: 'plain', fingerprint: fingerprint('plain') });
  });
});
