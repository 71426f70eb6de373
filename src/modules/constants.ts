/**
 * Application-wide constants and configuration values
 */

import fs from 'fs';
import path from 'path';
import { logger } from '../lib/utils/logger.js';

function loadPackageVersion(): string {
  try {
    const packageJsonPath = path.resolve(__dirname, '..', '..', 'package.json');
    const parsed: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
  } catch (error) {
    logger.debug('Could not read package version', error);
  }
  return '0.0.0';
}

export const CLI_VERSION = loadPackageVersion();

/**
 * Suggestion engine timing
 */
export const SUGGESTION = {
  /** Keyboard inactivity before a completion is requested (ms) */
  PAUSE_DELAY_MS: 200,
  /** Minimum interval between two dispatched requests (ms) */
  THROTTLE_MS: 1000,
  /** Ceiling for a single completion request (ms) */
  FETCH_TIMEOUT_MS: 3000,
  /** Characters of text before the cursor sent as context */
  CONTEXT_MAX_CHARS: 500,
  /** Preceding lines considered for context */
  CONTEXT_MAX_LINES: 10,
} as const;

/**
 * Main loop and editor behaviour
 */
export const EDITOR = {
  /** Interval between main loop iterations (ms) */
  TICK_MS: 20,
  /** Window in which a second exit request discards changes (ms) */
  EXIT_CONFIRM_MS: 3000,
  /** How long a status message stays visible (ms) */
  STATUS_MESSAGE_MS: 3000,
  /** How far back from the overflow column a space is searched for */
  WRAP_LOOKBACK: 20,
  /** Used when saving a buffer that has never been named */
  DEFAULT_FILENAME: 'untitled.txt',
  /** Typed at column 0 of an empty line to enter command mode */
  COMMAND_TRIGGER: ':',
  /** Rows taken by the status, message and help bars */
  CHROME_ROWS: 3,
} as const;

/**
 * Configuration file locations
 */
export const CONFIG_LOCATIONS = {
  DIR_NAME: '.ghostpad',
  FILE_NAME: 'config.json',
} as const;

export const HELP_TEXT = '^S Save | ^O Open | ^X Exit | ^G Toggle AI | Tab/→ Accept | : Command';
