import fs from 'fs';
import { FileError } from '../lib/utils/errors.js';
import { logger } from '../lib/utils/logger.js';
import { formatErrorMessage } from '../utils/errors.js';

/**
 * Plain-text persistence for the editor buffer
 */
export interface FileStore {
  /** Lines of the file, or null when it does not exist yet */
  read(filePath: string): string[] | null;
  write(filePath: string, lines: string[]): void;
}

export function splitLines(content: string): string[] {
  return content === '' ? [''] : content.split('\n');
}

export const fileStore: FileStore = {
  read(filePath) {
    if (!fs.existsSync(filePath)) {
      return null;
    }

    try {
      const content = fs.readFileSync(filePath, 'utf-8');
      logger.debug('Loaded file', { path: filePath, bytes: content.length });
      return splitLines(content);
    } catch (error) {
      throw new FileError(filePath, `Error loading file: ${formatErrorMessage(error)}`);
    }
  },

  write(filePath, lines) {
    try {
      fs.writeFileSync(filePath, lines.join('\n'), 'utf-8');
      logger.debug('Saved file', { path: filePath, lines: lines.length });
    } catch (error) {
      throw new FileError(filePath, `Error saving file: ${formatErrorMessage(error)}`);
    }
  },
};
