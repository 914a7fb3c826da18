import { describe, expect, it } from 'vitest';
import { InjectionFailedError, TerminalQueryError } from '../../src/errors.js';
import { WeztermBackend } from '../../src/terminal/wezterm.js';
import { FakeExecutor } from '../helpers/fakes.js';

describe('WeztermBackend', () => {
  it('types a single line without paste mode and submits with a carriage return', async () => {
    const executor = new FakeExecutor();
    const wezterm = new WeztermBackend(executor, { enterDelayMs: 0 });

    await wezterm.sendText('3', 'hello');

    expect(executor.calls.map((call) => call.args)).toEqual([
      ['cli', 'send-text', '--pane-id', '3', '--no-paste', 'hello'],
      ['cli', 'send-text', '--pane-id', '3', '--no-paste', '\r'],
    ]);
  });

  it('pastes multi-line input in one piece', async () => {
    const executor = new FakeExecutor();
    const wezterm = new WeztermBackend(executor, { enterDelayMs: 0 });

    await wezterm.sendText('3', 'first\nsecond');

    expect(executor.calls[0].args).toEqual(['cli', 'send-text', '--pane-id', '3', 'first\nsecond']);
  });

  it('passes the global cli flags to every subcommand', async () => {
    const executor = new FakeExecutor();
    const wezterm = new WeztermBackend(executor, {
      bin: '/opt/wezterm/wezterm',
      className: 'work',
      preferMux: true,
      noAutoStart: true,
      enterDelayMs: 0,
    });

    await wezterm.sendText('3', 'hi');

    expect(executor.calls[0]).toEqual({
      file: '/opt/wezterm/wezterm',
      args: ['cli', '--class', 'work', '--prefer-mux', '--no-auto-start', 'send-text', '--pane-id', '3', '--no-paste', 'hi'],
      options: undefined,
    });
  });

  it('tries the next Enter encoding when one is rejected', async () => {
    const executor = new FakeExecutor((call) => {
      if (call.args[call.args.length - 1] === '\r') throw new Error('invalid argument');
      return undefined;
    });
    const wezterm = new WeztermBackend(executor, { enterDelayMs: 0 });

    await wezterm.sendText('3', 'hello');

    expect(executor.calls.map((call) => call.args[call.args.length - 1])).toEqual(['hello', '\r', '\n']);
  });

  it('submits through stdin on Windows', async () => {
    const executor = new FakeExecutor();
    const wezterm = new WeztermBackend(executor, { enterDelayMs: 0, platform: 'win32' });

    await wezterm.sendText('3', 'hello');

    expect(executor.calls[1]).toEqual({
      file: 'wezterm',
      args: ['cli', 'send-text', '--pane-id', '3', '--no-paste'],
      options: { input: '\r' },
    });
  });

  it('raises InjectionFailedError when no Enter encoding gets through', async () => {
    const executor = new FakeExecutor((call) => {
      if (call.args[call.args.length - 1] !== 'hello') throw new Error('pane gone');
      return undefined;
    });
    const wezterm = new WeztermBackend(executor, { enterDelayMs: 0 });

    await expect(wezterm.sendText('3', 'hello')).rejects.toBeInstanceOf(InjectionFailedError);
    expect(executor.calls).toHaveLength(5);
  });

  it('finds panes in the json pane list', () => {
    const executor = new FakeExecutor(() => JSON.stringify([{ pane_id: 3 }, { pane_id: 7, title: 'codex' }]));
    const wezterm = new WeztermBackend(executor);

    expect(wezterm.isAlive('7')).toBe(true);
    expect(wezterm.isAlive('9')).toBe(false);
    expect(executor.calls[0].args).toEqual(['cli', 'list', '--format', 'json']);
  });

  it('treats an unreadable pane list as dead', () => {
    expect(new WeztermBackend(new FakeExecutor(() => 'not json')).isAlive('3')).toBe(false);
    const failing = new FakeExecutor(() => {
      throw new Error('no gui running');
    });
    expect(new WeztermBackend(failing).isAlive('3')).toBe(false);
  });

  it('splits a pane and returns the new pane id', async () => {
    const executor = new FakeExecutor(() => '12\n');
    const wezterm = new WeztermBackend(executor);

    const paneId = await wezterm.createPane({ cmd: 'codex', cwd: '/work/app', parentPane: '3' });

    expect(paneId).toBe('12');
    expect(executor.calls[0].args).toEqual([
      'cli',
      'split-pane',
      '--cwd',
      '/work/app',
      '--right',
      '--percent',
      '50',
      '--pane-id',
      '3',
      '--',
      'bash',
      '-c',
      'codex',
    ]);
  });

  it('starts the pane command through wsl.exe with a translated UNC path', async () => {
    const executor = new FakeExecutor(() => '5');
    const wezterm = new WeztermBackend(executor, { wsl: { inWslPane: false, runningInWsl: false } });

    await wezterm.createPane({
      cmd: 'codex',
      cwd: '\\\\wsl.localhost\\Ubuntu\\home\\dev\\app',
      direction: 'bottom',
      percent: 30,
    });

    expect(executor.calls[0].args).toEqual([
      'cli',
      'split-pane',
      '--bottom',
      '--percent',
      '30',
      '--',
      'wsl.exe',
      'bash',
      '-l',
      '-i',
      '-c',
      "cd '/home/dev/app' && exec codex",
    ]);
  });

  it('converts a drive path with wslpath when running under WSL', async () => {
    const executor = new FakeExecutor((call) => (call.file === 'wslpath' ? '/mnt/c/work\n' : '5'));
    const wezterm = new WeztermBackend(executor, { wsl: { inWslPane: true, runningInWsl: true } });

    await wezterm.createPane({ cmd: 'codex', cwd: 'C:\\work' });

    expect(executor.calls[0]).toEqual({ file: 'wslpath', args: ['-a', 'C:\\work'], options: undefined });
    expect(executor.calls[1].args.slice(-6)).toEqual(['--', 'bash', '-l', '-i', '-c', "cd '/mnt/c/work' && exec codex"]);
  });

  it('wraps a failed split in TerminalQueryError', async () => {
    const executor = new FakeExecutor(() => {
      throw new Error('no mux server');
    });
    const wezterm = new WeztermBackend(executor);

    await expect(wezterm.createPane({ cmd: 'codex', cwd: '/work' })).rejects.toBeInstanceOf(TerminalQueryError);
  });
});
