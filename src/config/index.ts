/**
 * Configuration management
 */

import { config as loadEnv } from 'dotenv';
import { join } from 'path';
import type { PanebridgeConfig } from '../types/index.js';
import type { IEnvironment } from '../types/interfaces.js';
import { SystemEnvironment } from '../infra/environment.js';

export class ConfigManager {
  private env: IEnvironment;
  private configDir: string;
  private _config?: PanebridgeConfig;
  private envLoaded = false;

  constructor(env?: IEnvironment, configDir?: string) {
    this.env = env || new SystemEnvironment();
    this.configDir = configDir || join(this.env.homedir(), '.panebridge');
  }

  get config(): PanebridgeConfig {
    if (!this._config) {
      // Lazy load environment variables only once
      if (!this.envLoaded) {
        loadEnv();
        this.envLoaded = true;
      }

      const home = this.env.homedir();
      const forcedHash = this.env.get('GEMINI_PROJECT_HASH')?.trim();

      this._config = {
        configDir: this.configDir,
        codex: {
          sessionRoot: this.expandHome(this.env.get('CODEX_SESSION_ROOT')?.trim() || join(home, '.codex', 'sessions')),
          pollIntervalMs: this.resolveSeconds(this.env.get('CODEX_POLL_INTERVAL'), 0.05, 0.01, 0.5),
          syncTimeoutSec: this.resolveTimeoutSec(this.env.get('CODEX_SYNC_TIMEOUT'), 30),
        },
        gemini: {
          root: this.expandHome(this.env.get('GEMINI_ROOT')?.trim() || join(home, '.gemini', 'tmp')),
          ...(forcedHash ? { projectHash: forcedHash } : {}),
          pollIntervalMs: this.resolveSeconds(this.env.get('GEMINI_POLL_INTERVAL'), 0.05, 0.02, 0.5),
          forceReadIntervalMs: this.resolveSeconds(this.env.get('GEMINI_FORCE_READ_INTERVAL'), 1.0, 0.2, 5.0),
          syncTimeoutSec: this.resolveTimeoutSec(this.env.get('GEMINI_SYNC_TIMEOUT'), 60),
        },
        terminal: {
          tmuxEnterDelayMs: this.resolveDelayMs(this.env.get('PANEBRIDGE_TMUX_ENTER_DELAY'), 0),
          weztermEnterDelayMs: this.resolveDelayMs(this.env.get('PANEBRIDGE_WEZTERM_ENTER_DELAY'), 0.01),
          wslBackend: this.env.get('PANEBRIDGE_BACKEND_ENV')?.trim().toLowerCase() === 'wsl',
        },
        messagePrefix: this.env.get('PANEBRIDGE_MESSAGE_PREFIX') || '',
        locatorFallback: this.parseBool(this.env.get('PANEBRIDGE_LOCATOR_FALLBACK')) ?? true,
      };
    }
    return this._config;
  }

  getConfigDir(): string {
    return this.configDir;
  }

  resetConfig(): void {
    this._config = undefined;
    this.envLoaded = false;
  }

  /**
   * Seconds from the environment, clamped into [min, max] and returned as ms.
   * Unparseable values fall back to the default.
   */
  private resolveSeconds(raw: string | undefined, fallback: number, min: number, max: number): number {
    const parsed = this.parseNumber(raw);
    const seconds = parsed === undefined ? fallback : Math.min(max, Math.max(min, parsed));
    return Math.round(seconds * 1000);
  }

  private resolveDelayMs(raw: string | undefined, fallback: number): number {
    const parsed = this.parseNumber(raw);
    return Math.round(Math.max(0, parsed ?? fallback) * 1000);
  }

  private resolveTimeoutSec(raw: string | undefined, fallback: number): number {
    if (raw === undefined || raw.trim() === '') return fallback;
    const trimmed = raw.trim();
    if (!/^\d+$/.test(trimmed)) return fallback;
    return parseInt(trimmed, 10);
  }

  private parseNumber(raw: string | undefined): number | undefined {
    if (raw === undefined || raw.trim() === '') return undefined;
    const value = Number(raw.trim());
    return Number.isFinite(value) ? value : undefined;
  }

  private parseBool(raw: string | undefined): boolean | undefined {
    if (!raw) return undefined;
    const normalized = raw.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
    return undefined;
  }

  private expandHome(path: string): string {
    if (path === '~') return this.env.homedir();
    if (path.startsWith('~/')) return join(this.env.homedir(), path.slice(2));
    return path;
  }
}

const defaultConfigManager = new ConfigManager();

export function getConfig(): PanebridgeConfig {
  return defaultConfigManager.config;
}

export function getConfigDir(): string {
  return defaultConfigManager.getConfigDir();
}
