import { BufferState } from '../types.js';

/**
 * Handles cursor movement (arrows/home/end)
 */

/**
 * Move cursor left, continuing at the end of the previous line
 */
export function handleCursorLeft(state: BufferState): BufferState {
  const { cursorLine, cursorCol, lines } = state;

  if (cursorCol > 0) {
    return { ...state, cursorCol: cursorCol - 1 };
  }

  if (cursorLine > 0) {
    return { ...state, cursorLine: cursorLine - 1, cursorCol: lines[cursorLine - 1].length };
  }

  return state;
}

/**
 * Move cursor right, continuing at the start of the next line
 */
export function handleCursorRight(state: BufferState): BufferState {
  const { cursorLine, cursorCol, lines } = state;

  if (cursorCol < lines[cursorLine].length) {
    return { ...state, cursorCol: cursorCol + 1 };
  }

  if (cursorLine < lines.length - 1) {
    return { ...state, cursorLine: cursorLine + 1, cursorCol: 0 };
  }

  return state;
}

function moveVertical(state: BufferState, delta: number): BufferState {
  const target = Math.max(0, Math.min(state.lines.length - 1, state.cursorLine + delta));
  if (target === state.cursorLine) {
    return state;
  }

  return {
    ...state,
    cursorLine: target,
    cursorCol: Math.min(state.cursorCol, state.lines[target].length),
  };
}

export function handleCursorUp(state: BufferState): BufferState {
  return moveVertical(state, -1);
}

export function handleCursorDown(state: BufferState): BufferState {
  return moveVertical(state, 1);
}

/**
 * Move cursor to start of line (Ctrl+A)
 */
export function handleHome(state: BufferState): BufferState {
  return { ...state, cursorCol: 0 };
}

/**
 * Move cursor to end of line (Ctrl+E)
 */
export function handleEnd(state: BufferState): BufferState {
  return { ...state, cursorCol: state.lines[state.cursorLine].length };
}
