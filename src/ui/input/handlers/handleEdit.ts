import { BufferState } from '../types.js';
import { wrapLine } from './handleWrap.js';

/**
 * Handles text editing operations (insert/backspace/newline)
 */

export function createBuffer(lines: string[] = ['']): BufferState {
  return {
    lines: lines.length > 0 ? [...lines] : [''],
    cursorLine: 0,
    cursorCol: 0,
  };
}

export function currentLine(state: BufferState): string {
  return state.lines[state.cursorLine] ?? '';
}

/**
 * Insert a character at cursor position, wrapping the line if it no
 * longer fits in `wrapWidth` columns
 */
export function handleInsertChar(
  state: BufferState,
  char: string,
  wrapWidth: number
): BufferState {
  const line = currentLine(state);
  const beforeCursor = line.slice(0, state.cursorCol);
  const afterCursor = line.slice(state.cursorCol);

  const lines = [...state.lines];
  lines[state.cursorLine] = beforeCursor + char + afterCursor;

  return wrapLine(
    { lines, cursorLine: state.cursorLine, cursorCol: state.cursorCol + char.length },
    state.cursorLine,
    wrapWidth
  );
}

/**
 * Split the current line at the cursor
 */
export function handleNewline(state: BufferState): BufferState {
  const line = currentLine(state);
  const lines = [...state.lines];
  lines.splice(state.cursorLine, 1, line.slice(0, state.cursorCol), line.slice(state.cursorCol));

  return {
    lines,
    cursorLine: state.cursorLine + 1,
    cursorCol: 0,
  };
}

/**
 * Insert a run of text one character at a time, so every step is wrapped
 * the same way typing would be. `\n` starts a new line.
 */
export function handleInsertText(
  state: BufferState,
  text: string,
  wrapWidth: number
): BufferState {
  let next = state;
  for (const char of text) {
    if (char === '\r') continue;
    next = char === '\n' ? handleNewline(next) : handleInsertChar(next, char, wrapWidth);
  }
  return next;
}

/**
 * Handle backspace (delete character before cursor, or join with the
 * previous line at column 0)
 */
export function handleBackspace(state: BufferState): BufferState {
  const { lines, cursorLine, cursorCol } = state;

  if (cursorCol > 0) {
    const line = lines[cursorLine];
    const nextLines = [...lines];
    nextLines[cursorLine] = line.slice(0, cursorCol - 1) + line.slice(cursorCol);
    return { lines: nextLines, cursorLine, cursorCol: cursorCol - 1 };
  }

  if (cursorLine > 0) {
    const previous = lines[cursorLine - 1];
    const nextLines = [...lines];
    nextLines.splice(cursorLine - 1, 2, previous + lines[cursorLine]);
    return { lines: nextLines, cursorLine: cursorLine - 1, cursorCol: previous.length };
  }

  return state;
}

/**
 * Text before the cursor used as completion context: a few preceding
 * lines plus the current line up to the cursor, keeping the last
 * `maxChars` characters
 */
export function contextBeforeCursor(
  state: BufferState,
  maxChars: number,
  maxLines: number
): string {
  const first = Math.max(0, state.cursorLine - maxLines);
  const parts = state.lines.slice(first, state.cursorLine);
  parts.push(currentLine(state).slice(0, state.cursorCol));

  const context = parts.join('\n');
  return context.length > maxChars ? context.slice(-maxChars) : context;
}
