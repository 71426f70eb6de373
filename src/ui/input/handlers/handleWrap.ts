import { EDITOR } from '../../../modules/constants.js';
import { BufferState } from '../types.js';

/**
 * Handles soft line wrapping at the terminal width
 */

/**
 * Find the column at which an overlong line is split. Prefers the position
 * just after the last space within `lookback` columns before the overflow
 * column; falls back to the overflow column itself.
 */
export function findWrapPoint(
  line: string,
  width: number,
  lookback: number = EDITOR.WRAP_LOOKBACK
): number {
  const lowest = Math.max(0, width - lookback);
  for (let i = width - 1; i >= lowest; i--) {
    if (line[i] === ' ') {
      return i + 1;
    }
  }
  return width;
}

/**
 * Split `lineIndex` (and each tail it produces) until every piece fits in
 * `width` columns. The tail goes to a new line directly below; the cursor
 * follows its character.
 */
export function wrapLine(state: BufferState, lineIndex: number, width: number): BufferState {
  if (width <= 0 || state.lines[lineIndex].length <= width) {
    return state;
  }

  const lines = [...state.lines];
  let { cursorLine, cursorCol } = state;
  let index = lineIndex;

  while (lines[index].length > width) {
    const line = lines[index];
    const split = findWrapPoint(line, width);
    lines.splice(index, 1, line.slice(0, split), line.slice(split));

    if (cursorLine === index && cursorCol >= split) {
      cursorLine = index + 1;
      cursorCol -= split;
    } else if (cursorLine > index) {
      cursorLine += 1;
    }

    index += 1;
  }

  return { lines, cursorLine, cursorCol };
}
