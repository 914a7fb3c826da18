import { describe, expect, it } from 'vitest';
import { InjectionFailedError } from '../../src/errors.js';
import { Iterm2Backend } from '../../src/terminal/iterm2.js';
import { FakeExecutor } from '../helpers/fakes.js';

describe('Iterm2Backend', () => {
  it('sends the text and then a carriage return', async () => {
    const executor = new FakeExecutor();
    const iterm = new Iterm2Backend(executor);

    await iterm.sendText('w0t0p0:ABC', ' hello ');

    expect(executor.calls.map((call) => call.args)).toEqual([
      ['session', 'send', 'hello', '--session', 'w0t0p0:ABC'],
      ['session', 'send', '\r', '--session', 'w0t0p0:ABC'],
    ]);
  });

  it('raises InjectionFailedError when it2 rejects the send', async () => {
    const executor = new FakeExecutor(() => {
      throw new Error('session not found');
    });
    const iterm = new Iterm2Backend(executor, { bin: '/usr/local/bin/it2' });

    await expect(iterm.sendText('S1', 'hello')).rejects.toBeInstanceOf(InjectionFailedError);
    expect(executor.calls[0].file).toBe('/usr/local/bin/it2');
  });

  it('looks the session up in the json session list', () => {
    const executor = new FakeExecutor(() => JSON.stringify([{ id: 'S1' }, { id: 'S2', name: 'codex' }]));
    const iterm = new Iterm2Backend(executor);

    expect(iterm.isAlive('S2')).toBe(true);
    expect(iterm.isAlive('S3')).toBe(false);
  });

  it('splits, then changes directory and starts the command in the new session', async () => {
    const executor = new FakeExecutor((call) => (call.args[1] === 'split' ? 'Created new pane: NEW-1\n' : undefined));
    const iterm = new Iterm2Backend(executor);

    const sessionId = await iterm.createPane({ cmd: 'gemini', cwd: '/work/app', parentPane: 'S1' });

    expect(sessionId).toBe('NEW-1');
    expect(executor.calls.map((call) => call.args)).toEqual([
      ['session', 'split', '--vertical', '--session', 'S1'],
      ['session', 'send', "cd '/work/app' && gemini", '--session', 'NEW-1'],
      ['session', 'send', '\r', '--session', 'NEW-1'],
    ]);
  });

  it('closes sessions and ignores ones already gone', () => {
    const executor = new FakeExecutor(() => {
      throw new Error('no such session');
    });
    const iterm = new Iterm2Backend(executor);

    expect(() => iterm.killPane('S1')).not.toThrow();
    expect(executor.calls[0].args).toEqual(['session', 'close', '--session', 'S1', '--force']);
  });
});
