/**
 * Configuration file management for ghostpad
 */

import fs from 'fs';
import path from 'path';
import os from 'os';
import { CONFIG_LOCATIONS } from './constants.js';
import { ConfigError } from '../lib/utils/errors.js';
import { logger } from '../lib/utils/logger.js';
import { formatErrorMessage } from '../utils/errors.js';
import { EditorSettings, LoadedSettings, SettingsFile } from '../types/index.js';

export const DEFAULT_SETTINGS: Readonly<EditorSettings> = {
  apiEndpoint: 'https://api.openai.com/v1',
  apiKey: '',
  model: 'gpt-4',
  maxTokens: 30,
  temperature: 0.7,
  pauseDelayMs: 200,
};

type Env = Record<string, string | undefined>;

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge a parsed settings object over the defaults. Fields that are missing
 * or have the wrong type keep their default value.
 */
export function mergeSettings(raw: unknown): EditorSettings {
  const settings: EditorSettings = { ...DEFAULT_SETTINGS };
  if (!isRecord(raw)) {
    return settings;
  }

  const rejected: string[] = [];

  if (typeof raw.api_endpoint === 'string' && raw.api_endpoint.trim() !== '') {
    settings.apiEndpoint = raw.api_endpoint.trim();
  } else if (raw.api_endpoint !== undefined) {
    rejected.push('api_endpoint');
  }

  if (typeof raw.api_key === 'string') {
    settings.apiKey = raw.api_key.trim();
  } else if (raw.api_key !== undefined) {
    rejected.push('api_key');
  }

  if (typeof raw.model === 'string' && raw.model.trim() !== '') {
    settings.model = raw.model.trim();
  } else if (raw.model !== undefined) {
    rejected.push('model');
  }

  if (isPositiveInteger(raw.max_tokens)) {
    settings.maxTokens = raw.max_tokens;
  } else if (raw.max_tokens !== undefined) {
    rejected.push('max_tokens');
  }

  if (isFiniteNumber(raw.temperature) && raw.temperature >= 0) {
    settings.temperature = raw.temperature;
  } else if (raw.temperature !== undefined) {
    rejected.push('temperature');
  }

  if (isPositiveInteger(raw.pause_delay_ms)) {
    settings.pauseDelayMs = raw.pause_delay_ms;
  } else if (raw.pause_delay_ms !== undefined) {
    rejected.push('pause_delay_ms');
  }

  if (rejected.length > 0) {
    logger.warn('Ignoring invalid config fields, using defaults', { fields: rejected });
  }

  return settings;
}

/**
 * Environment variables (and .env, loaded at startup) win over the file
 */
export function applyEnvOverrides(settings: EditorSettings, env: Env = process.env): EditorSettings {
  return {
    ...settings,
    apiKey: env.GHOSTPAD_API_KEY || settings.apiKey,
    apiEndpoint: env.GHOSTPAD_API_ENDPOINT || settings.apiEndpoint,
    model: env.GHOSTPAD_MODEL || settings.model,
  };
}

export function toSettingsFile(settings: EditorSettings): SettingsFile {
  return {
    api_endpoint: settings.apiEndpoint,
    api_key: settings.apiKey,
    model: settings.model,
    max_tokens: settings.maxTokens,
    temperature: settings.temperature,
    pause_delay_ms: settings.pauseDelayMs,
  };
}

/**
 * Pick the config file: an explicit path, then the project directory, then home
 */
export function resolveConfigPath(
  explicitPath?: string,
  cwd: string = process.cwd(),
  homeDir: string = os.homedir()
): string {
  if (explicitPath) {
    return path.resolve(cwd, explicitPath);
  }

  const projectPath = path.join(cwd, CONFIG_LOCATIONS.DIR_NAME, CONFIG_LOCATIONS.FILE_NAME);
  if (fs.existsSync(projectPath)) {
    return projectPath;
  }

  return path.join(homeDir, CONFIG_LOCATIONS.DIR_NAME, CONFIG_LOCATIONS.FILE_NAME);
}

export class ConfigManager {
  private configPath: string;
  private env: Env;

  constructor(configPath: string = resolveConfigPath(), env: Env = process.env) {
    this.configPath = configPath;
    this.env = env;
  }

  /**
   * Check if config file exists
   */
  exists(): boolean {
    return fs.existsSync(this.configPath);
  }

  /**
   * Load settings. A missing or unreadable file is not an error: the
   * defaults are used and the editor runs with whatever that allows.
   */
  load(): LoadedSettings {
    if (!this.exists()) {
      logger.debug('No config file, using defaults', { path: this.configPath });
      return {
        settings: applyEnvOverrides({ ...DEFAULT_SETTINGS }, this.env),
        source: 'defaults',
        path: this.configPath,
      };
    }

    try {
      const content = fs.readFileSync(this.configPath, 'utf-8');
      const settings = mergeSettings(JSON.parse(content));
      logger.debug('Loaded config', { path: this.configPath });
      return { settings: applyEnvOverrides(settings, this.env), source: 'file', path: this.configPath };
    } catch (error) {
      logger.warn('Failed to read config, using defaults', {
        path: this.configPath,
        error: formatErrorMessage(error),
      });
      return {
        settings: applyEnvOverrides({ ...DEFAULT_SETTINGS }, this.env),
        source: 'defaults',
        path: this.configPath,
      };
    }
  }

  /**
   * Save settings to the config file, creating its directory
   */
  save(settings: EditorSettings): void {
    try {
      fs.mkdirSync(path.dirname(this.configPath), { recursive: true, mode: 0o700 });
      const content = JSON.stringify(toSettingsFile(settings), null, 2);
      fs.writeFileSync(this.configPath, content + '\n', { mode: 0o600 });
      logger.debug('Saved config', { path: this.configPath });
    } catch (error) {
      throw new ConfigError(`Failed to save config: ${formatErrorMessage(error)}`);
    }
  }

  /**
   * Get config file path
   */
  getPath(): string {
    return this.configPath;
  }
}
