import { afterEach, describe, expect, it, vi } from 'vitest';
import { InjectionFailedError, TerminalQueryError } from '../../src/errors.js';
import { TmuxBackend } from '../../src/terminal/tmux.js';
import { FakeExecutor } from '../helpers/fakes.js';

describe('TmuxBackend', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('types a short single line literally and presses Enter', async () => {
    const executor = new FakeExecutor();
    const tmux = new TmuxBackend(executor, { insideTmux: false });

    await tmux.sendText('ai-1', '  hello\r ');

    expect(executor.commandLines()).toEqual(['tmux send-keys -t ai-1 -l hello', 'tmux send-keys -t ai-1 Enter']);
  });

  it('sends nothing for blank input', async () => {
    const executor = new FakeExecutor();
    const tmux = new TmuxBackend(executor, { insideTmux: false });

    await tmux.sendText('ai-1', ' \r\n ');

    expect(executor.calls).toEqual([]);
  });

  it('pastes multi-line input through a named buffer and removes it', async () => {
    const executor = new FakeExecutor();
    const tmux = new TmuxBackend(executor, { insideTmux: false });

    await tmux.sendText('ai-1', 'line one\r\nline two');

    const [load, paste, enter, remove] = executor.calls;
    const bufferName = load.args[2];
    expect(bufferName).toMatch(/^pb-\d+-\d+$/);
    expect(load.args).toEqual(['load-buffer', '-b', bufferName, '-']);
    expect(load.options).toEqual({ input: 'line one\nline two' });
    expect(paste.args).toEqual(['paste-buffer', '-t', 'ai-1', '-b', bufferName, '-p']);
    expect(enter.args).toEqual(['send-keys', '-t', 'ai-1', 'Enter']);
    expect(remove.args).toEqual(['delete-buffer', '-b', bufferName]);
    expect(executor.calls).toHaveLength(4);
  });

  it('pastes a single line that is too long to type', async () => {
    const executor = new FakeExecutor();
    const tmux = new TmuxBackend(executor, { insideTmux: false });

    await tmux.sendText('ai-1', 'x'.repeat(201));

    expect(executor.calls[0].args[0]).toBe('load-buffer');
  });

  it('raises InjectionFailedError and still removes the buffer when pasting fails', async () => {
    const executor = new FakeExecutor((call) => {
      if (call.args[0] === 'paste-buffer') throw new Error('no server running');
      return undefined;
    });
    const tmux = new TmuxBackend(executor, { insideTmux: false });

    await expect(tmux.sendText('ai-1', 'a\nb')).rejects.toBeInstanceOf(InjectionFailedError);
    expect(executor.calls.map((call) => call.args[0])).toEqual(['load-buffer', 'paste-buffer', 'delete-buffer']);
  });

  it('reports liveness from has-session', () => {
    const executor = new FakeExecutor((call) => {
      if (call.args[2] === 'gone') throw new Error("can't find session");
      return undefined;
    });
    const tmux = new TmuxBackend(executor, { insideTmux: false });

    expect(tmux.isAlive('ai-1')).toBe(true);
    expect(tmux.isAlive('gone')).toBe(false);
  });

  it('switches client when already inside tmux', () => {
    const executor = new FakeExecutor();
    const tmux = new TmuxBackend(executor, { insideTmux: true });

    tmux.activate('ai-1');

    expect(executor.calls).toEqual([{ file: 'tmux', args: ['switch-client', '-t', 'ai-1'], options: { interactive: true } }]);
  });

  it('attaches by default without consulting the process environment', () => {
    vi.stubEnv('TMUX', '/tmp/tmux-1000/default,123,0');
    const executor = new FakeExecutor();
    const tmux = new TmuxBackend(executor);

    tmux.activate('ai-1');

    expect(executor.calls).toEqual([{ file: 'tmux', args: ['attach-session', '-t', 'ai-1'], options: { interactive: true } }]);
  });

  it('wraps a failed attach in TerminalQueryError', () => {
    const executor = new FakeExecutor(() => {
      throw new Error('not a terminal');
    });
    const tmux = new TmuxBackend(executor, { insideTmux: false });

    expect(() => tmux.activate('ai-1')).toThrow(TerminalQueryError);
  });

  it('starts a detached session for a new pane', async () => {
    const executor = new FakeExecutor();
    const tmux = new TmuxBackend(executor, { insideTmux: false });

    const name = await tmux.createPane({ cmd: 'codex', cwd: '/work/app' });

    expect(name).toMatch(/^ai-\d+-\d+$/);
    expect(executor.calls[0].args).toEqual(['new-session', '-d', '-s', name, '-c', '/work/app', 'codex']);
  });

  it('ignores failures when killing a session', () => {
    const executor = new FakeExecutor(() => {
      throw new Error('no such session');
    });
    const tmux = new TmuxBackend(executor, { insideTmux: false });

    expect(() => tmux.killPane('ai-1')).not.toThrow();
  });
});
