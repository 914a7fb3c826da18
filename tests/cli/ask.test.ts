import { afterEach, describe, expect, it, vi } from 'vitest';
import { dispatch } from '../../bin/panebridge.js';
import { askCommand, normalizeQuestion } from '../../src/cli/commands/ask.js';

describe('normalizeQuestion', () => {
  it('drops a leading ask and joins the words', () => {
    expect(normalizeQuestion(['ask', 'what', 'changed?'])).toBe('what changed?');
    expect(normalizeQuestion(['ASK', 'hi'])).toBe('hi');
    expect(normalizeQuestion(['why', 'ask', 'twice'])).toBe('why ask twice');
  });

  it('returns an empty question for ask alone', () => {
    expect(normalizeQuestion(['ask'])).toBe('');
    expect(normalizeQuestion([])).toBe('');
  });
});

describe('cli dispatch', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  const request = {
    provider: 'codex' as const,
    question: [],
    wait: false,
    ping: false,
    status: false,
    pending: false,
  };

  it('rejects a negative or fractional timeout before opening a session', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(await dispatch({ ...request, question: ['hi'], wait: true, timeout: -1 })).toBe(1);
    expect(await dispatch({ ...request, question: ['hi'], wait: true, timeout: 1.5 })).toBe(1);
    expect(error).toHaveBeenCalledTimes(2);
    expect(error).toHaveBeenLastCalledWith(expect.stringContaining('--timeout must be a whole number of seconds'));
  });

  it('asks for input when there is nothing to do', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(await dispatch(request)).toBe(1);
    expect(error).toHaveBeenCalledWith(expect.stringContaining('Please provide a question or use --ping/--status/--pending'));
  });

  it('refuses an empty question', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(await askCommand({ provider: 'gemini', question: ['ask'] })).toBe(1);
    expect(error).toHaveBeenCalledWith(expect.stringContaining('Please provide a question'));
  });
});
