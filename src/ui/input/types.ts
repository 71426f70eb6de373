import { Key } from 'ink';

/**
 * Text buffer with a cursor. Always holds at least one line; the cursor
 * always points at a valid position.
 */
export interface BufferState {
  lines: string[];    // Document lines, without trailing newlines
  cursorLine: number; // 0-based line index
  cursorCol: number;  // 0-based column, may equal the line length
}

/**
 * Key flags as reported by ink; matchers only look at the ones they need
 */
export type KeyPress = Partial<Key>;

/**
 * Function that matches a key press to a command
 * Extended signature supports inputChar for paste detection and Ctrl+letter combinations
 */
export type KeyMatcher = (key: KeyPress, inputChar?: string) => boolean;
