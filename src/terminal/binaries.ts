/**
 * Locating the multiplexer CLIs. Each lookup runs once, when a backend is
 * built; nothing here caches across calls.
 */

import { delimiter, join } from 'path';
import type { IEnvironment, IStorage } from '../types/interfaces.js';

export interface BinaryLookupContext {
  env: IEnvironment;
  storage: IStorage;
  /** Directory holding the installer-written `env` file. */
  configDir: string;
}

const WINDOWS_DRIVES = 'cdefghijklmnopqrstuvwxyz';

function envOverride(env: IEnvironment, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = env.get(key)?.trim();
    if (value) return value;
  }
  return undefined;
}

/**
 * First executable named `names[i]` on PATH, checked in PATH order.
 */
export function findOnPath(ctx: Pick<BinaryLookupContext, 'env' | 'storage'>, ...names: string[]): string | undefined {
  const dirs = (ctx.env.get('PATH') || '').split(delimiter).filter((dir) => dir.length > 0);
  for (const dir of dirs) {
    for (const name of names) {
      const candidate = join(dir, name);
      if (ctx.storage.exists(candidate)) return candidate;
    }
  }
  return undefined;
}

export function isWsl(ctx: Pick<BinaryLookupContext, 'env' | 'storage'>): boolean {
  if (ctx.env.platform() !== 'linux') return false;
  try {
    return ctx.storage.readFile('/proc/version', 'utf-8').toLowerCase().includes('microsoft');
  } catch {
    return false;
  }
}

function windowsWeztermInstalls(ctx: Pick<BinaryLookupContext, 'storage'>): string | undefined {
  for (const drive of WINDOWS_DRIVES) {
    for (const programFiles of ['Program Files', 'Program Files (x86)']) {
      const candidate = `/mnt/${drive}/${programFiles}/WezTerm/wezterm.exe`;
      if (ctx.storage.exists(candidate)) return candidate;
    }
  }
  return undefined;
}

function readInstallerCache(ctx: BinaryLookupContext): string | undefined {
  const file = join(ctx.configDir, 'env');
  if (!ctx.storage.exists(file)) return undefined;

  let content: string;
  try {
    content = ctx.storage.readFile(file, 'utf-8');
  } catch {
    return undefined;
  }

  for (const line of content.split(/\r?\n/)) {
    if (!line.startsWith('CODEX_WEZTERM_BIN=')) continue;
    const path = line.slice('CODEX_WEZTERM_BIN='.length).trim();
    if (path && ctx.storage.exists(path)) return path;
  }
  return undefined;
}

/**
 * wezterm path, or undefined when nothing is installed.
 * Order: env override → installer cache → PATH → Windows install seen from WSL.
 */
export function findWeztermBinary(ctx: BinaryLookupContext): string | undefined {
  const override = envOverride(ctx.env, 'CODEX_WEZTERM_BIN', 'WEZTERM_BIN');
  if (override && ctx.storage.exists(override)) return override;

  return (
    readInstallerCache(ctx) ??
    findOnPath(ctx, 'wezterm', 'wezterm.exe') ??
    (isWsl(ctx) ? windowsWeztermInstalls(ctx) : undefined)
  );
}

export function resolveWeztermBinary(ctx: BinaryLookupContext): string {
  return findWeztermBinary(ctx) ?? 'wezterm';
}

export function resolveIt2Binary(ctx: Pick<BinaryLookupContext, 'env' | 'storage'>): string {
  return envOverride(ctx.env, 'CODEX_IT2_BIN', 'IT2_BIN') ?? findOnPath(ctx, 'it2') ?? 'it2';
}

/** True when the wezterm we would drive is the Windows build. */
export function isWindowsWezterm(ctx: Pick<BinaryLookupContext, 'env' | 'storage'>): boolean {
  const override = envOverride(ctx.env, 'CODEX_WEZTERM_BIN', 'WEZTERM_BIN');
  if (override && (override.toLowerCase().includes('.exe') || override.includes('/mnt/'))) {
    return true;
  }
  if (findOnPath(ctx, 'wezterm.exe')) return true;
  return isWsl(ctx) && windowsWeztermInstalls(ctx) !== undefined;
}

/** Shell and its command flag used to start a pane command. */
export function defaultShell(ctx: Pick<BinaryLookupContext, 'env' | 'storage'>): [string, string] {
  if (ctx.env.platform() === 'win32' && !isWsl(ctx)) {
    for (const shell of ['pwsh', 'powershell']) {
      if (findOnPath(ctx, shell, `${shell}.exe`)) return [shell, '-Command'];
    }
    return ['powershell', '-Command'];
  }
  return ['bash', '-c'];
}
