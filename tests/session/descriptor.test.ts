import { afterEach, describe, expect, it, vi } from 'vitest';
import { loadSessionDescriptor, persistDescriptorFields } from '../../src/session/descriptor.js';
import { MockEnvironment, MockStorage } from '../helpers/fakes.js';

const codexLocation = { envPrefix: 'CODEX', fileName: '.codex-session' };
const descriptorFile = '/mock/project/.codex-session';

function writeDescriptor(storage: MockStorage, record: Record<string, unknown>, bom = false): void {
  storage.setFile(descriptorFile, `${bom ? '\ufeff' : ''}${JSON.stringify(record)}`);
}

describe('loadSessionDescriptor', () => {
  it('prefers the record exported in the environment', () => {
    const env = new MockEnvironment({
      CODEX_SESSION_ID: 'sess-env',
      CODEX_RUNTIME_DIR: '/run/codex',
      CODEX_TERMINAL: 'wezterm',
      CODEX_WEZTERM_PANE: '7',
      CODEX_ITERM2_PANE: 'ignored',
    });
    const storage = new MockStorage();
    writeDescriptor(storage, { session_id: 'sess-file', runtime_dir: '/run/file', active: true });
    storage.addDirectory('/run/file');

    const descriptor = loadSessionDescriptor(codexLocation, { env, storage });

    expect(descriptor).toMatchObject({
      sessionId: 'sess-env',
      runtimeDir: '/run/codex',
      terminal: 'wezterm',
      paneId: '7',
    });
    expect(descriptor?.tmuxSession).toBeUndefined();
    expect(descriptor?.sessionFile).toBeUndefined();
  });

  it('reads the descriptor file in the working directory', () => {
    const storage = new MockStorage();
    storage.addDirectory('/run/s2');
    writeDescriptor(
      storage,
      {
        session_id: 's2',
        runtime_dir: '/run/s2',
        terminal: 'tmux',
        tmux_session: 'ai-2',
        input_fifo: '/run/s2/input.fifo',
        work_dir: '/work/app',
        active: true,
      },
      true,
    );

    const descriptor = loadSessionDescriptor(codexLocation, { env: new MockEnvironment(), storage });

    expect(descriptor).toMatchObject({
      sessionId: 's2',
      runtimeDir: '/run/s2',
      terminal: 'tmux',
      tmuxSession: 'ai-2',
      inputFifo: '/run/s2/input.fifo',
      workDir: '/work/app',
      sessionFile: descriptorFile,
    });
  });

  it('ignores inactive records and records whose runtime directory is gone', () => {
    const storage = new MockStorage();
    storage.addDirectory('/run/s3');
    const env = new MockEnvironment();

    writeDescriptor(storage, { session_id: 's3', runtime_dir: '/run/s3', active: false });
    expect(loadSessionDescriptor(codexLocation, { env, storage })).toBeUndefined();

    writeDescriptor(storage, { session_id: 's3', runtime_dir: '/run/elsewhere', active: true });
    expect(loadSessionDescriptor(codexLocation, { env, storage })).toBeUndefined();

    storage.setFile(descriptorFile, '[1, 2]');
    expect(loadSessionDescriptor(codexLocation, { env, storage })).toBeUndefined();
  });
});

describe('persistDescriptorFields', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  function loadFromFile(storage: MockStorage) {
    storage.addDirectory('/run/s1');
    const descriptor = loadSessionDescriptor(codexLocation, { env: new MockEnvironment(), storage });
    if (!descriptor) throw new Error('descriptor fixture did not load');
    return descriptor;
  }

  it('merges fields into the file and keeps unrelated ones', () => {
    const storage = new MockStorage();
    writeDescriptor(storage, { session_id: 's1', runtime_dir: '/run/s1', active: true, launcher: 'custom' });
    const descriptor = loadFromFile(storage);

    const written = persistDescriptorFields(descriptor, { codex_session_path: '/logs/a.jsonl' }, storage);

    expect(written).toBe(true);
    expect(JSON.parse(storage.getFile(descriptorFile) ?? '{}')).toEqual({
      session_id: 's1',
      runtime_dir: '/run/s1',
      active: true,
      launcher: 'custom',
      codex_session_path: '/logs/a.jsonl',
    });
    expect(storage.exists(`${descriptorFile}.tmp`)).toBe(false);
    expect(descriptor.raw.codex_session_path).toBe('/logs/a.jsonl');
  });

  it('leaves the file alone when nothing changes', () => {
    const storage = new MockStorage();
    writeDescriptor(storage, { session_id: 's1', runtime_dir: '/run/s1', active: true, codex_session_path: '/logs/a.jsonl' });
    const descriptor = loadFromFile(storage);

    expect(persistDescriptorFields(descriptor, { codex_session_path: '/logs/a.jsonl' }, storage)).toBe(false);
  });

  it('only updates the in-memory record for sessions without a file', () => {
    const storage = new MockStorage();
    const env = new MockEnvironment({ CODEX_SESSION_ID: 'sess-env', CODEX_RUNTIME_DIR: '/run/codex' });
    const descriptor = loadSessionDescriptor(codexLocation, { env, storage });
    if (!descriptor) throw new Error('descriptor fixture did not load');

    expect(persistDescriptorFields(descriptor, { codex_session_path: '/logs/b.jsonl' }, storage)).toBe(false);
    expect(descriptor.raw.codex_session_path).toBe('/logs/b.jsonl');
  });

  it('warns and cleans up when the file cannot be replaced', () => {
    class ReadOnlyStorage extends MockStorage {
      override rename(): void {
        throw Object.assign(new Error('permission denied'), { code: 'EACCES' });
      }
    }
    const storage = new ReadOnlyStorage();
    writeDescriptor(storage, { session_id: 's1', runtime_dir: '/run/s1', active: true });
    const descriptor = loadFromFile(storage);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const written = persistDescriptorFields(descriptor, { codex_session_path: '/logs/a.jsonl' }, storage);

    expect(written).toBe(false);
    expect(warn).toHaveBeenNthCalledWith(1, '⚠️  Cannot update .codex-session: permission denied');
    expect(warn).toHaveBeenNthCalledWith(2, `   Check ownership of ${descriptorFile}`);
    expect(storage.exists(`${descriptorFile}.tmp`)).toBe(false);
  });
});
