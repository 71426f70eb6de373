import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  applyEnvOverrides,
  ConfigManager,
  DEFAULT_SETTINGS,
  mergeSettings,
  resolveConfigPath,
} from '../config.js';
import { logger, LogLevel } from '../../lib/utils/logger.js';

describe('config', () => {
  let tmpDir: string;

  beforeAll(() => {
    logger.setLevel(LogLevel.SILENT);
  });

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ghostpad-config-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('mergeSettings', () => {
    it('fills missing fields from the defaults', () => {
      expect(mergeSettings({ model: 'gpt-4o-mini' })).toEqual({ ...DEFAULT_SETTINGS, model: 'gpt-4o-mini' });
    });

    it('keeps defaults for fields with the wrong type', () => {
      const settings = mergeSettings({
        max_tokens: '30',
        temperature: -1,
        pause_delay_ms: 0,
        api_key: 42,
        api_endpoint: 'http://localhost:8080/v1',
      });

      expect(settings).toEqual({ ...DEFAULT_SETTINGS, apiEndpoint: 'http://localhost:8080/v1' });
    });

    it('uses the defaults when the file is not an object', () => {
      expect(mergeSettings(['api_key'])).toEqual(DEFAULT_SETTINGS);
      expect(mergeSettings(null)).toEqual(DEFAULT_SETTINGS);
    });
  });

  describe('applyEnvOverrides', () => {
    it('lets environment variables win over the file', () => {
      const settings = applyEnvOverrides(
        { ...DEFAULT_SETTINGS, apiKey: 'file-key' },
        { GHOSTPAD_API_KEY: 'test-secret', GHOSTPAD_MODEL: 'local-model' }
      );

      expect(settings.apiKey).toBe('test-secret');
      expect(settings.model).toBe('local-model');
      expect(settings.apiEndpoint).toBe(DEFAULT_SETTINGS.apiEndpoint);
    });

    it('ignores empty variables', () => {
      const settings = applyEnvOverrides({ ...DEFAULT_SETTINGS, apiKey: 'file-key' }, { GHOSTPAD_API_KEY: '' });
      expect(settings.apiKey).toBe('file-key');
    });
  });

  describe('resolveConfigPath', () => {
    it('prefers an explicit path', () => {
      expect(resolveConfigPath('custom.json', tmpDir, '/home/test')).toBe(path.join(tmpDir, 'custom.json'));
    });

    it('uses the project config when it exists', () => {
      const projectConfig = path.join(tmpDir, '.ghostpad', 'config.json');
      fs.mkdirSync(path.dirname(projectConfig));
      fs.writeFileSync(projectConfig, '{}');

      expect(resolveConfigPath(undefined, tmpDir, '/home/test')).toBe(projectConfig);
    });

    it('falls back to the home directory', () => {
      expect(resolveConfigPath(undefined, tmpDir, '/home/test')).toBe(
        path.join('/home/test', '.ghostpad', 'config.json')
      );
    });
  });

  describe('ConfigManager', () => {
    it('returns defaults when the file is missing', () => {
      const manager = new ConfigManager(path.join(tmpDir, 'missing.json'), {});
      const loaded = manager.load();

      expect(manager.exists()).toBe(false);
      expect(loaded.source).toBe('defaults');
      expect(loaded.settings).toEqual(DEFAULT_SETTINGS);
    });

    it('returns defaults when the file is not valid JSON', () => {
      const configPath = path.join(tmpDir, 'config.json');
      fs.writeFileSync(configPath, '{ not json');

      const loaded = new ConfigManager(configPath, {}).load();
      expect(loaded.source).toBe('defaults');
      expect(loaded.settings).toEqual(DEFAULT_SETTINGS);
    });

    it('loads the file in snake_case', () => {
      const configPath = path.join(tmpDir, 'config.json');
      fs.writeFileSync(configPath, JSON.stringify({ api_key: 'test-key', max_tokens: 12, temperature: 0.2 }));

      const loaded = new ConfigManager(configPath, {}).load();
      expect(loaded.source).toBe('file');
      expect(loaded.settings).toEqual({ ...DEFAULT_SETTINGS, apiKey: 'test-key', maxTokens: 12, temperature: 0.2 });
    });

    it('saves and reloads settings, creating the directory', () => {
      const configPath = path.join(tmpDir, 'nested', 'config.json');
      const manager = new ConfigManager(configPath, {});
      const settings = { ...DEFAULT_SETTINGS, apiKey: 'test-key', pauseDelayMs: 350 };

      manager.save(settings);

      expect(JSON.parse(fs.readFileSync(configPath, 'utf-8'))).toEqual({
        api_endpoint: 'https://api.openai.com/v1',
        api_key: 'test-key',
        model: 'gpt-4',
        max_tokens: 30,
        temperature: 0.7,
        pause_delay_ms: 350,
      });
      expect(manager.load().settings).toEqual(settings);
    });
  });
});
