import type { CompletionFailureReason } from '../lib/utils/errors.js';

/**
 * Effective editor settings after defaults and overrides are applied
 */
export interface EditorSettings {
  apiEndpoint: string;
  apiKey: string;
  model: string;
  maxTokens: number;
  temperature: number;
  pauseDelayMs: number;
}

/**
 * On-disk shape of the configuration file. Every field is optional.
 */
export interface SettingsFile {
  api_endpoint?: string;
  api_key?: string;
  model?: string;
  max_tokens?: number;
  temperature?: number;
  pause_delay_ms?: number;
}

export type SettingsSource = 'file' | 'defaults';

export interface LoadedSettings {
  settings: EditorSettings;
  source: SettingsSource;
  path: string;
}

/**
 * A location in the buffer (0-based)
 */
export interface Position {
  line: number;
  col: number;
}

export type CompletionResult =
  | { ok: true; text: string }
  | { ok: false; reason: CompletionFailureReason; message: string };

/**
 * Anything that can turn a context string into a continuation
 */
export interface CompletionProvider {
  complete(context: string, timeoutMs: number): Promise<CompletionResult>;
}

export type StatusTone = 'info' | 'warning' | 'error';

export interface StatusMessage {
  text: string;
  tone: StatusTone;
  shownAt: number;
}
